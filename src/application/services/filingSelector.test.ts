import { describe, expect, it } from "vitest";
import type { BulkFilingRow } from "../../core/entities/issuer";
import { selectLatestFilings } from "./filingSelector";

const row = (overrides: Partial<BulkFilingRow>): BulkFilingRow => ({
  taxId: "11.111.111/0001-11",
  issuerCode: 14206,
  issuerName: "Empresa Teste SA",
  sector: "Energia",
  registrationStatus: "ATIVO",
  referenceDate: new Date("2024-12-31T00:00:00.000Z"),
  receivedAt: new Date("2024-01-01T00:00:00.000Z"),
  version: 1,
  sourceId: "100",
  category: "FRE",
  url: "https://example.test/100",
  ...overrides,
});

describe("selectLatestFilings", () => {
  it("prefers the latest receipt date over a higher version", () => {
    const selected = selectLatestFilings([
      row({ version: 5, receivedAt: new Date("2024-01-09T00:00:00.000Z"), sourceId: "v5" }),
      row({ version: 3, receivedAt: new Date("2024-01-10T00:00:00.000Z"), sourceId: "v3" }),
    ]);

    expect(selected.map((filing) => filing.sourceId)).toEqual(["v3"]);
  });

  it("breaks receipt ties by the highest version", () => {
    const selected = selectLatestFilings([
      row({ version: 2, sourceId: "v2" }),
      row({ version: 4, sourceId: "v4" }),
      row({ version: 3, sourceId: "v3" }),
    ]);

    expect(selected.map((filing) => filing.sourceId)).toEqual(["v4"]);
  });

  it("keeps the earliest source row on a full tie", () => {
    const selected = selectLatestFilings([
      row({ sourceId: "first" }),
      row({ sourceId: "second" }),
    ]);

    expect(selected.map((filing) => filing.sourceId)).toEqual(["first"]);
  });

  it("returns one row per tax id ordered by tax id", () => {
    const selected = selectLatestFilings([
      row({ taxId: "33", sourceId: "c" }),
      row({ taxId: "11", sourceId: "a" }),
      row({ taxId: "22", sourceId: "b1" }),
      row({ taxId: "22", sourceId: "b2", version: 2 }),
    ]);

    expect(selected.map((filing) => [filing.taxId, filing.sourceId])).toEqual([
      ["11", "a"],
      ["22", "b2"],
      ["33", "c"],
    ]);
  });

  it("returns nothing for an empty table", () => {
    expect(selectLatestFilings([])).toEqual([]);
  });
});
