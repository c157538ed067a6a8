/** Request and response shapes for /api/slabs and /api/report */

import { z } from "zod";
import {
  REPORT_FORMATS,
  SLAB_ID_MAX_LENGTH,
  type AllowanceRule,
  type ReportTotals,
  type SlabRecord,
} from "@/lib/measurement/schema";
import { REPORT_THEME_IDS } from "@/lib/measurement/theme";

const allowanceFields = {
  allowance: z.string().max(64).default(""),
  swap: z.boolean().default(false),
};

/** Dual-column entry: one value per line in each textarea. */
export const columnsRequestSchema = z.object({
  mode: z.literal("columns"),
  lengths: z.string().max(200_000),
  heights: z.string().max(200_000),
  ...allowanceFields,
});

/** Combined paste: Slab No, Gross L, Gross H[, Net L, Net H] per line. */
export const pasteRequestSchema = z.object({
  mode: z.literal("paste"),
  text: z.string().max(400_000),
  ...allowanceFields,
});

export const slabsRequestSchema = z.discriminatedUnion("mode", [columnsRequestSchema, pasteRequestSchema]);
export type SlabsRequest = z.infer<typeof slabsRequestSchema>;

export interface SlabsResponse {
  records: SlabRecord[];
  totals: ReportTotals;
  allowance: AllowanceRule;
}

const dimension = z.number().finite();

/** Areas in the body are dropped; the report recomputes them from the dimensions. */
export const slabRecordSchema = z.object({
  id: z.string().trim().max(SLAB_ID_MAX_LENGTH),
  grossLength: dimension,
  grossHeight: dimension,
  netLength: dimension,
  netHeight: dimension,
});

const metadataText = z.string().trim().max(200);

export const reportMetadataSchema = z.object({
  materialName: metadataText,
  invoiceNo: metadataText,
  inspectionDate: metadataText,
  thickness: metadataText.default(""),
  containerNo: metadataText.default(""),
  mineName: metadataText.default(""),
  allowance: metadataText.default(""),
});

/** Browser uploads arrive as data URLs (FileReader.readAsDataURL). */
const imageDataUrl = z
  .string()
  .max(15_000_000)
  .regex(/^data:image\//, "Image must be a data URL")
  .nullable()
  .optional();

export const reportRequestSchema = z.object({
  metadata: reportMetadataSchema,
  records: z.array(slabRecordSchema).max(5000),
  theme: z.enum(REPORT_THEME_IDS).optional(),
  logo: imageDataUrl,
  signature: imageDataUrl,
});
export type ReportRequest = z.infer<typeof reportRequestSchema>;

export const reportFormatSchema = z.enum(REPORT_FORMATS).default("pdf");

/** Error body shared by both routes. */
export interface ApiErrorBody {
  error: string;
  code?: string;
}
