import type { OutputColumn, ResolvedField, ResolvedRecord } from "../domain/types.js";
import { sheetRowToIndex, type Table } from "./table.js";

export function formatField(record: ResolvedRecord, field: ResolvedField): string {
  const v = record[field];
  if (typeof v === "number") return v.toFixed(2);
  if (typeof v === "string") return v;
  return v.join("; ");
}

// Overwrites the projection columns of the rows starting at `firstSheetRow`, one
// per record. Every other cell keeps its input value; new headers are appended.
export function reconcileTable(
  original: Table,
  records: readonly ResolvedRecord[],
  firstSheetRow: number,
  columns: readonly OutputColumn[]
): Table {
  const enabled = columns.filter((c) => c.enabled);
  const headers = [...original.headers];
  for (const c of enabled) {
    if (!headers.includes(c.output_header)) headers.push(c.output_header);
  }

  const rows = original.rows.map((r) => ({ ...r }));
  const start = sheetRowToIndex(firstSheetRow);

  records.forEach((record, offset) => {
    const row = rows[start + offset];
    if (!row) return;
    for (const c of enabled) row[c.output_header] = formatField(record, c.source_field);
  });

  return { headers, rows };
}
