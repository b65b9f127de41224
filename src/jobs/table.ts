import fs from "fs";
import path from "path";
import csv from "csv-parser";
import type { RawRow } from "../adapters/DatasetAdapter.js";

export type Table = {
  headers: string[];
  // Data rows only; rows[0] is sheet row 2.
  rows: RawRow[];
};

export const FIRST_DATA_ROW = 2;

export function sheetRowToIndex(sheetRow: number): number {
  return sheetRow - FIRST_DATA_ROW;
}

export function lastSheetRow(table: Table): number {
  return table.rows.length + FIRST_DATA_ROW - 1;
}

export async function readTable(filePath: string): Promise<Table> {
  const headers: string[] = [];
  const rows: RawRow[] = [];

  await new Promise<void>((resolve, reject) => {
    const stream = fs.createReadStream(path.resolve(filePath)).pipe(
      // Spreadsheet "CSV UTF-8" exports start with a byte-order mark.
      csv({ mapHeaders: ({ header, index }) => (index === 0 ? header.replace(/^\uFEFF/, "") : header) })
    );

    stream.on("headers", (h: string[]) => {
      headers.push(...h);
    });
    stream.on("data", (row: RawRow) => {
      rows.push(row);
    });
    stream.on("end", () => resolve());
    stream.on("error", (err) => reject(err));
  });

  return { headers, rows };
}

function csvCell(v: string): string {
  return `"${v.replace(/"/g, '""')}"`;
}

export function formatTable(table: Table): string {
  const lines: string[] = [table.headers.map(csvCell).join(",")];
  for (const r of table.rows) {
    lines.push(table.headers.map((h) => csvCell(r[h] ?? "")).join(","));
  }
  return lines.join("\n") + "\n";
}

export function writeTable(filePath: string, table: Table) {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, formatTable(table), "utf8");
}
