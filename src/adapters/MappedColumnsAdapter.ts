import type { DatasetAdapter, RawRow } from "./DatasetAdapter.js";
import type { ColumnMapping, RawRecord } from "../domain/types.js";

function clean(s?: string): string {
  return (s ?? "").toString().trim();
}

export class MappedColumnsAdapter implements DatasetAdapter {
  private readonly mapped: Set<string>;

  constructor(private readonly mapping: Readonly<ColumnMapping>) {
    this.mapped = new Set(
      [mapping.merchant_name, mapping.address, mapping.city, mapping.country, mapping.state].filter(
        (c): c is string => Boolean(c)
      )
    );
  }

  parseRow(row: RawRow, headers: readonly string[]): RawRecord {
    const optional = (col?: string) => (col ? clean(row[col]) || undefined : undefined);

    return Object.freeze({
      merchant_name_raw: clean(row[this.mapping.merchant_name]),
      address: optional(this.mapping.address),
      city: optional(this.mapping.city),
      country: optional(this.mapping.country),
      state: optional(this.mapping.state),
      passthrough: Object.freeze(
        headers.filter((h) => !this.mapped.has(h)).map((h) => Object.freeze([h, row[h] ?? ""] as const))
      )
    });
  }
}
