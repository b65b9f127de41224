import type { RawRecord } from "../domain/types.js";

export type RawRow = Record<string, string>;

export interface DatasetAdapter {
  parseRow(row: RawRow, headers: readonly string[]): RawRecord;
}
