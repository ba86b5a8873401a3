export type CsvValue = string | number | null | undefined;

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quote a field when it contains a delimiter, quote or line break; embedded
 * quotes are doubled.
 */
export const formatCsvField = (value: CsvValue): string => {
  const text = value === null || value === undefined ? "" : String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
};

export const formatCsvRow = (values: readonly CsvValue[]): string =>
  values.map(formatCsvField).join(",");

/**
 * Serialize a header and rows, CRLF-terminated as RFC 4180 describes.
 */
export const formatCsv = (
  header: readonly string[],
  rows: readonly (readonly CsvValue[])[]
): string =>
  [header, ...rows].map((row) => `${formatCsvRow(row)}\r\n`).join("");
