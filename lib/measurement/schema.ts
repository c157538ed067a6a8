/**
 * Slab measurement schema: the records, totals and metadata every stage of the
 * sheet pipeline passes forward (paste -> records -> totals -> layout -> file).
 */

/** Edge-loss deduction applied uniformly to every slab in one report. */
export interface AllowanceRule {
  /** Centimeters subtracted from gross length */
  lengthDeduction: number;
  /** Centimeters subtracted from gross height */
  heightDeduction: number;
}

/** One measured slab. Dimensions in cm, areas in m2 rounded to 3 decimals. */
export interface SlabRecord {
  id: string;
  grossLength: number;
  grossHeight: number;
  netLength: number;
  netHeight: number;
  grossArea: number;
  netArea: number;
}

/** Longest slab id accepted from a paste, the grid or a report request. */
export const SLAB_ID_MAX_LENGTH = 64;

/** What a caller supplies for one slab; areas are always computed here. */
export type SlabMeasurement = Pick<SlabRecord, "id" | "grossLength" | "grossHeight" | "netLength" | "netHeight">;

/** Caller-owned working set behind the editable grid. */
export type SlabRecordSet = readonly SlabRecord[];

export type SlabDimensionField = "grossLength" | "grossHeight" | "netLength" | "netHeight";
export type SlabEditableField = "id" | SlabDimensionField;

export interface ReportTotals {
  slabCount: number;
  /** Sum of the already-rounded per-slab gross areas */
  totalGrossArea: number;
  /** Sum of the already-rounded per-slab net areas */
  totalNetArea: number;
}

/** Free-form report fields, printed verbatim. */
export interface ReportMetadata {
  materialName: string;
  invoiceNo: string;
  inspectionDate: string; // YYYY-MM-DD
  thickness: string;
  containerNo: string;
  mineName: string;
  allowance: string;
}

export interface CompanyProfile {
  name: string;
  addressLines: string[];
}

/** Decoded raster ready for a renderer. */
export interface ReportImage {
  data: Uint8Array;
  format: "PNG";
  /** Pixel size of the decoded image */
  width: number;
  height: number;
}

export type ImageSource =
  | { kind: "path"; path: string }
  | { kind: "bytes"; data: Uint8Array }
  | { kind: "dataUrl"; dataUrl: string };

export const REPORT_FORMATS = ["pdf", "xlsx"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];
