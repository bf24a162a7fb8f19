import type { Cell, Field, RecordsPage, ResultRow } from "@qprof/sumo-api";

export const OUTPUT_FORMATS = ["csv", "txt"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const OUTPUT_PREFIX = "sumoquery";
export const NO_RECORDS = "NORECORDS";

const SEPARATORS: Record<OutputFormat, string> = {
  csv: ",",
  txt: "\t",
};

export function separatorFor(format: OutputFormat): string {
  return SEPARATORS[format];
}

export function buildHeader(fields: readonly Field[], sep: string): { header: string; columns: string[] } {
  const columns = fields.map((field) => field.name);
  return { header: columns.join(sep), columns };
}

function cell(value: Cell | undefined): string {
  return String(value ?? "").replace(/,/g, "|");
}

export function buildBody(records: readonly ResultRow[], columns: readonly string[], sep: string): string[] {
  return records.map((record) => columns.map((column) => cell(record.map[column])).join(sep));
}

/** Header of the first page followed by every record line of every page. */
export function assembleOutput(pages: readonly RecordsPage[], sep: string): string {
  const first = pages[0];
  const total = pages.reduce((count, page) => count + page.records.length, 0);
  if (first === undefined || total === 0) {
    return NO_RECORDS;
  }
  const { header, columns } = buildHeader(first.fields, sep);
  const lines = pages.flatMap((page) => buildBody(page.records, columns, sep));
  return [header, ...lines].join("\n");
}

export function outputFileName(target: string, queryNumber: number, format: OutputFormat): string {
  const number = String(queryNumber).padStart(3, "0");
  return [OUTPUT_PREFIX, target, number, format].join(".");
}
