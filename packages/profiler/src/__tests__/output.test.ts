import { describe, it, expect } from "vitest";
import type { RecordsPage } from "@qprof/sumo-api";
import { assembleOutput, buildBody, NO_RECORDS, outputFileName, separatorFor } from "../output";

const fields = [
  { name: "_sourcecategory", fieldType: "string", keyField: true },
  { name: "_count", fieldType: "int", keyField: false },
];

function page(rows: Array<Record<string, string>>): RecordsPage {
  return { fields, records: rows.map((map) => ({ map })) };
}

describe("output", () => {
  it("uses comma for csv and tab for txt", () => {
    expect(separatorFor("csv")).toBe(",");
    expect(separatorFor("txt")).toBe("\t");
  });

  it("escapes commas in cells and blanks missing columns", () => {
    expect(buildBody([{ map: { _sourcecategory: "a,b", _count: "1" } }, { map: { _count: "2" } }], ["_sourcecategory", "_count"], ",")).toEqual([
      "a|b,1",
      ",2",
    ]);
  });

  it("joins every page under a single header", () => {
    const pages = [page([{ _sourcecategory: "web", _count: "3" }]), page([{ _sourcecategory: "db", _count: "4" }])];

    expect(assembleOutput(pages, "\t")).toBe("_sourcecategory\t_count\nweb\t3\ndb\t4");
  });

  it("marks empty results", () => {
    expect(assembleOutput([], ",")).toBe(NO_RECORDS);
    expect(assembleOutput([page([])], ",")).toBe(NO_RECORDS);
  });

  it("names files by target and zero-padded query number", () => {
    expect(outputFileName("us2_42", 7, "csv")).toBe("sumoquery.us2_42.007.csv");
    expect(outputFileName("eu_1", 123, "txt")).toBe("sumoquery.eu_1.123.txt");
  });
});
