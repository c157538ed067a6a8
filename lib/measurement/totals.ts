import type { ReportTotals, SlabRecord } from "./schema";

/**
 * Count and area sums for the sheet footer. Sums the already-rounded row areas
 * so the printed total always equals the printed rows added up.
 * Expects the reportable (filtered) sequence.
 */
export function summarizeSlabs(records: readonly SlabRecord[]): ReportTotals {
  let totalGrossArea = 0;
  let totalNetArea = 0;
  for (const r of records) {
    totalGrossArea += r.grossArea;
    totalNetArea += r.netArea;
  }
  return { slabCount: records.length, totalGrossArea, totalNetArea };
}
