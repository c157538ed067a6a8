/**
 * Slab measurement sheet: allowance, records, totals, layout, PDF and workbook renderers.
 */

export * from "./schema";
export * from "./errors";
export * from "./allowance";
export * from "./slab-records";
export * from "./slab-set";
export * from "./totals";
export * from "./theme";
export * from "./layout";
export { loadReportImage, fitImage } from "./images";
export { renderReportPdf } from "./pdf-export";
export { buildMeasurementWorkbook, renderReportWorkbook, MEASUREMENT_SHEET } from "./excel-export";
export { generateMeasurementReport, REPORT_CONTENT_TYPES } from "./generate";
export type { GenerateReportRequest, GeneratedReport } from "./generate";
