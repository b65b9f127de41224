import { describe, expect, it } from "vitest";
import { MappedColumnsAdapter } from "../src/adapters/MappedColumnsAdapter.js";

describe("MappedColumnsAdapter", () => {
  const headers = ["Id", "Merchant Name", "City", "Country", "Amount"];
  const adapter = new MappedColumnsAdapter({ merchant_name: "Merchant Name", city: "City", country: "Country" });

  it("reads mapped columns and passes the rest through in header order", () => {
    const rec = adapter.parseRow({ Id: "7", "Merchant Name": "  Acme Bakery ", City: " ", Country: "USA", Amount: "12.50" }, headers);

    expect(rec.merchant_name_raw).toBe("Acme Bakery");
    expect(rec.city).toBeUndefined();
    expect(rec.country).toBe("USA");
    expect(rec.address).toBeUndefined();
    expect(rec.passthrough).toEqual([
      ["Id", "7"],
      ["Amount", "12.50"]
    ]);
    expect(Object.isFrozen(rec)).toBe(true);
  });

  it("treats a missing name cell as empty", () => {
    expect(adapter.parseRow({ Id: "8" }, headers).merchant_name_raw).toBe("");
  });
});
