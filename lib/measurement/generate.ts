/**
 * One report generation: working set + metadata in, finished file out.
 * Each call is independent; nothing is shared between requests.
 */

import { buildReportLayout, type ReportLayout } from "./layout";
import { loadReportImage } from "./images";
import { renderReportPdf } from "./pdf-export";
import { renderReportWorkbook } from "./excel-export";
import { reportableSlabs, withAreas } from "./slab-records";
import { summarizeSlabs } from "./totals";
import type { ReportTheme } from "./theme";
import type {
  CompanyProfile,
  ImageSource,
  ReportFormat,
  ReportMetadata,
  ReportTotals,
  SlabMeasurement,
} from "./schema";

export interface GenerateReportRequest {
  metadata: ReportMetadata;
  /** Working set as edited; blank and zero rows are dropped here. Any areas sent along are ignored */
  records: readonly SlabMeasurement[];
  company: CompanyProfile;
  theme: ReportTheme;
  format: ReportFormat;
  logo?: ImageSource | null;
  signature?: ImageSource | null;
}

export interface GeneratedReport {
  fileName: string;
  contentType: string;
  bytes: Uint8Array;
  totals: ReportTotals;
  layout: ReportLayout;
}

export const REPORT_CONTENT_TYPES: Record<ReportFormat, string> = {
  pdf: "application/pdf",
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
};

/** Throws EmptyReportError when no slab has positive gross dimensions. */
export async function generateMeasurementReport(req: GenerateReportRequest): Promise<GeneratedReport> {
  const slabs = reportableSlabs(
    req.records.map((r) => withAreas(r.id, r.grossLength, r.grossHeight, r.netLength, r.netHeight))
  );
  const totals = summarizeSlabs(slabs);
  const [logo, signature] = await Promise.all([loadReportImage(req.logo), loadReportImage(req.signature)]);

  const layout = buildReportLayout({
    metadata: req.metadata,
    company: req.company,
    slabs,
    totals,
    logo,
    signature,
  });

  const bytes =
    req.format === "xlsx"
      ? new Uint8Array(await renderReportWorkbook(layout, req.theme))
      : renderReportPdf(layout, req.theme);

  return {
    fileName: `${layout.fileName}.${req.format}`,
    contentType: REPORT_CONTENT_TYPES[req.format],
    bytes,
    totals,
    layout,
  };
}
