/**
 * Report layout engine: the one authoritative structure of the inspection sheet.
 * Header (logo, company, title) -> 2-row metadata grid -> measurement table with a
 * two-row spanning head that repeats on every page and a TOTAL foot -> signatures.
 * Renderers (PDF, workbook) draw this description; they never decide structure.
 */

import { formatArea, formatInspectionDate, formatLength } from "@/lib/format";
import { EmptyReportError } from "./errors";
import { fitImage, type BoxSize } from "./images";
import type {
  CompanyProfile,
  ReportImage,
  ReportMetadata,
  ReportTotals,
  SlabRecord,
} from "./schema";

/** Points (1/72 in). */
export const PAGE_MARGIN = 20;
export const LOGO_BOX: BoxSize = { width: 1.8 * 72, height: 1.4 * 72 };
export const SIGNATURE_BOX: BoxSize = { width: 150, height: 40 };

/** S.NO, SLAB NO, gross L/H/AREA, net L/H/AREA */
export const TABLE_COLUMN_WIDTHS = [35, 75, 50, 50, 65, 50, 50, 65] as const;
export const TABLE_HEAD_ROWS = 2;
export const TOTAL_LABEL = "TOTAL";
export const SIGNATURE_LINE = "_______________________";

export interface HeadCell {
  content: string;
  colSpan?: number;
  rowSpan?: number;
  /** Group labels and S.NO / SLAB NO sit in the top row; unit labels in the sub-row */
  level: "main" | "sub";
}

export interface TableCell {
  content: string;
  bold: boolean;
}

export interface MetadataCell {
  label: string;
  value: string;
}

export interface PlacedImage {
  image: ReportImage;
  /** Drawn size in points, aspect preserved */
  width: number;
  height: number;
}

export interface SignatureBlock {
  label: string;
  image: PlacedImage | null;
  line: string;
  caption: string[];
}

export interface ReportLayout {
  header: {
    logo: PlacedImage | null;
    companyName: string;
    addressLines: string[];
    title: string;
    divider: boolean;
  };
  metadataGrid: MetadataCell[][];
  table: {
    columnWidths: readonly number[];
    head: HeadCell[][];
    repeatHeadRows: number;
    body: TableCell[][];
    foot: TableCell[];
  };
  signature: SignatureBlock[];
  /** Download name without extension */
  fileName: string;
  /** Inspection date as entered (YYYY-MM-DD); stamps the document metadata */
  documentDate: string;
}

export interface ReportLayoutInput {
  metadata: ReportMetadata;
  company: CompanyProfile;
  /** Reportable slabs in display order */
  slabs: readonly SlabRecord[];
  totals: ReportTotals;
  logo?: ReportImage | null;
  signature?: ReportImage | null;
}

function place(image: ReportImage | null | undefined, box: BoxSize): PlacedImage | null {
  if (!image) return null;
  const size = fitImage(image, box);
  if (size.width <= 0 || size.height <= 0) return null;
  return { image, ...size };
}

function sanitizeFilePart(value: string): string {
  return value.replace(/[\\/:*?"<>|\u0000-\u001f]+/g, "-").trim();
}

/** "Measurement_<material>_<invoice>" with path-unsafe characters replaced. */
export function reportFileName(metadata: Pick<ReportMetadata, "materialName" | "invoiceNo">): string {
  return `Measurement_${sanitizeFilePart(metadata.materialName)}_${sanitizeFilePart(metadata.invoiceNo)}`;
}

export function buildReportTitle(materialName: string): string {
  return `INSPECTION REPORT OF ${materialName.trim().toUpperCase()}`;
}

/** Seven metadata values in two rows of three labeled cells. */
export function buildMetadataGrid(metadata: ReportMetadata, totals: ReportTotals): MetadataCell[][] {
  const allowance = metadata.allowance.trim();
  return [
    [
      { label: "INVOICE NO", value: metadata.invoiceNo },
      { label: "DATE", value: formatInspectionDate(metadata.inspectionDate) },
      { label: "TOTAL SLABS", value: String(totals.slabCount) },
    ],
    [
      { label: "THICKNESS", value: metadata.thickness },
      { label: "MINE / BLOCK", value: metadata.mineName },
      { label: "CONTAINER NO", value: allowance ? `${metadata.containerNo} (${allowance})` : metadata.containerNo },
    ],
  ];
}

export function buildTableHead(): HeadCell[][] {
  const sub = (content: string): HeadCell => ({ content, level: "sub" });
  return [
    [
      { content: "S.NO", rowSpan: 2, level: "main" },
      { content: "SLAB NO", rowSpan: 2, level: "main" },
      { content: "GROSS MEASUREMENT", colSpan: 3, level: "main" },
      { content: "NET MEASUREMENT", colSpan: 3, level: "main" },
    ],
    [sub("L (cm)"), sub("H (cm)"), sub("AREA (m2)"), sub("L (cm)"), sub("H (cm)"), sub("AREA (m2)")],
  ];
}

/** S.NO is the position in the display sequence, not the slab id. */
export function buildTableBody(slabs: readonly SlabRecord[]): TableCell[][] {
  const plain = (content: string): TableCell => ({ content, bold: false });
  const bold = (content: string): TableCell => ({ content, bold: true });
  return slabs.map((slab, i) => [
    plain(String(i + 1)),
    bold(slab.id.trim()),
    plain(formatLength(slab.grossLength)),
    plain(formatLength(slab.grossHeight)),
    bold(formatArea(slab.grossArea)),
    plain(formatLength(slab.netLength)),
    plain(formatLength(slab.netHeight)),
    bold(formatArea(slab.netArea)),
  ]);
}

export function buildTableFoot(totals: ReportTotals): TableCell[] {
  const blank: TableCell = { content: "", bold: false };
  return [
    blank,
    { content: TOTAL_LABEL, bold: true },
    blank,
    blank,
    { content: formatArea(totals.totalGrossArea), bold: true },
    blank,
    blank,
    { content: formatArea(totals.totalNetArea), bold: true },
  ];
}

export function buildSignatureBlocks(company: CompanyProfile, signature?: ReportImage | null): SignatureBlock[] {
  return [
    { label: "Inspected By:", image: null, line: SIGNATURE_LINE, caption: [] },
    {
      label: "Authorized Signatory:",
      image: place(signature, SIGNATURE_BOX),
      line: SIGNATURE_LINE,
      caption: [`For ${company.name}`],
    },
  ];
}

/** Throws EmptyReportError when there is no slab to print. */
export function buildReportLayout(input: ReportLayoutInput): ReportLayout {
  const { metadata, company, slabs, totals } = input;
  if (slabs.length === 0) throw new EmptyReportError();

  return {
    header: {
      logo: place(input.logo, LOGO_BOX),
      companyName: company.name,
      addressLines: [...company.addressLines],
      title: buildReportTitle(metadata.materialName),
      divider: true,
    },
    metadataGrid: buildMetadataGrid(metadata, totals),
    table: {
      columnWidths: TABLE_COLUMN_WIDTHS,
      head: buildTableHead(),
      repeatHeadRows: TABLE_HEAD_ROWS,
      body: buildTableBody(slabs),
      foot: buildTableFoot(totals),
    },
    signature: buildSignatureBlocks(company, input.signature),
    fileName: reportFileName(metadata),
    documentDate: metadata.inspectionDate,
  };
}
