export type QueryParts = {
  name: string;
  street?: string;
  city?: string;
  country?: string;
};

type Part = keyof QueryParts;

// Most specific first.
const QUERY_SHAPES: Part[][] = [
  ["name", "street", "city", "country"],
  ["name", "city", "country"],
  ["name", "city"],
  ["name", "country"],
  ["name"],
  ["name", "street"]
];

export function buildQueries(parts: QueryParts): string[] {
  // Every shape is anchored on the name.
  if (!parts.name.trim()) return [];

  const seen = new Set<string>();
  const out: string[] = [];

  for (const shape of QUERY_SHAPES) {
    const q = shape
      .map((p) => (parts[p] || "").trim())
      .filter(Boolean)
      .join(" ");
    if (!q || seen.has(q)) continue;
    seen.add(q);
    out.push(q);
  }
  return out;
}
