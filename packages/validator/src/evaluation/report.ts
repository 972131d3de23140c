/**
 * Validation report: wire label to message. Nested records contribute a
 * nested report; lists contribute one entry per failing element. An empty
 * report means the record is valid.
 */
export interface Report {
  [label: string]: ReportEntry;
}

export type ReportEntry = string | Report | (string | Report)[];

export type FieldOutcome = { status: 'passed' } | { status: 'violated'; key: string; message: ReportEntry };

export function isValid(report: Report): boolean {
  return Object.keys(report).length === 0;
}
