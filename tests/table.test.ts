import fs from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { formatTable, lastSheetRow, readTable, sheetRowToIndex, writeTable, type Table } from "../src/jobs/table.js";
import { formatField, reconcileTable } from "../src/jobs/reconcile.js";
import type { OutputColumn, ResolvedRecord } from "../src/domain/types.js";
import { tempDir } from "./helpers/files.js";

const record: ResolvedRecord = {
  cleaned_name: "Bravo Deli",
  website: "",
  socials: ["https://facebook.com/bravo", "https://instagram.com/bravo"],
  evidence: "line one\nline two",
  evidence_links: [],
  accumulated_cost: 0.5,
  remarks: "website unavailable",
  logo_filename: "BravoDeli.png"
};

function original(): Table {
  return {
    headers: ["Name", "Website"],
    rows: [
      { Name: "Alpha", Website: "old-a" },
      { Name: "Bravo", Website: "old-b" },
      { Name: "Charlie", Website: "old-c" }
    ]
  };
}

const columns: OutputColumn[] = [
  { source_field: "website", output_header: "Website", enabled: true },
  { source_field: "socials", output_header: "Social(s)", enabled: true },
  { source_field: "accumulated_cost", output_header: "Cost", enabled: true },
  { source_field: "evidence", output_header: "Evidence", enabled: false }
];

describe("table", () => {
  it("maps sheet rows to data indexes", () => {
    expect(sheetRowToIndex(2)).toBe(0);
    expect(sheetRowToIndex(10)).toBe(8);
    expect(lastSheetRow(original())).toBe(4);
    expect(lastSheetRow({ headers: ["Name"], rows: [] })).toBe(1);
  });

  it("quotes every cell", () => {
    const t: Table = { headers: ["a", "b"], rows: [{ a: 'say "hi"', b: "x,y" }, { a: "z" }] };
    expect(formatTable(t)).toBe('"a","b"\n"say ""hi""","x,y"\n"z",""\n');
  });

  it("reads back what it writes, including embedded newlines", async () => {
    const file = path.join(tempDir(), "nested", "t.csv");
    const t: Table = { headers: ["Name", "Notes"], rows: [{ Name: "Alpha, Inc", Notes: "first\nsecond" }] };

    writeTable(file, t);

    expect(await readTable(file)).toEqual(t);
  });

  it("drops a byte-order mark from the first header", async () => {
    const file = path.join(tempDir(), "bom.csv");
    fs.writeFileSync(file, "\uFEFFMerchant Name,City\nAcme Bakery,Austin\n", "utf8");

    expect(await readTable(file)).toEqual({
      headers: ["Merchant Name", "City"],
      rows: [{ "Merchant Name": "Acme Bakery", City: "Austin" }]
    });
  });
});

describe("reconcileTable", () => {
  it("formats fields for a cell", () => {
    expect(formatField(record, "accumulated_cost")).toBe("0.50");
    expect(formatField(record, "socials")).toBe("https://facebook.com/bravo; https://instagram.com/bravo");
    expect(formatField(record, "evidence_links")).toBe("");
    expect(formatField(record, "evidence")).toBe("line one\nline two");
  });

  it("overwrites enabled columns of the covered rows only", () => {
    const input = original();
    const merged = reconcileTable(input, [record], 3, columns);

    expect(merged.headers).toEqual(["Name", "Website", "Social(s)", "Cost"]);
    expect(merged.rows).toEqual([
      { Name: "Alpha", Website: "old-a" },
      {
        Name: "Bravo",
        Website: "",
        "Social(s)": "https://facebook.com/bravo; https://instagram.com/bravo",
        Cost: "0.50"
      },
      { Name: "Charlie", Website: "old-c" }
    ]);
    expect(input.rows[1]).toEqual({ Name: "Bravo", Website: "old-b" });
    expect(input.headers).toEqual(["Name", "Website"]);
  });

  it("drops records that run past the last row", () => {
    const merged = reconcileTable(original(), [record, record], 4, columns);

    expect(merged.rows).toHaveLength(3);
    expect(merged.rows[2]?.["Cost"]).toBe("0.50");
  });
});
