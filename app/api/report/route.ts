import { getCompanyProfile, getDefaultLogoPath, getDefaultThemeId } from "@/lib/env";
import { contentDisposition, errorResponse, jsonError, readJsonBody } from "@/lib/http";
import { generateMeasurementReport, resolveTheme, type ImageSource } from "@/lib/measurement";
import { reportFormatSchema, reportRequestSchema } from "@/lib/types";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

function logoSource(dataUrl: string | null | undefined): ImageSource | null {
  if (dataUrl) return { kind: "dataUrl", dataUrl };
  const path = getDefaultLogoPath();
  return path ? { kind: "path", path } : null;
}

/**
 * Render the measurement sheet.
 * POST /api/report?format=pdf|xlsx  { metadata, records, theme?, logo?, signature? }
 */
export async function POST(req: Request) {
  const format = reportFormatSchema.safeParse(new URL(req.url).searchParams.get("format") ?? undefined);
  if (!format.success) return jsonError(400, "format must be pdf or xlsx.", "invalid_format");

  const body = await readJsonBody(req, reportRequestSchema);
  if (!body.ok) return body.response;

  try {
    const { metadata, records, theme, logo, signature } = body.data;
    const report = await generateMeasurementReport({
      metadata,
      records,
      company: getCompanyProfile(),
      theme: resolveTheme(theme ?? getDefaultThemeId()),
      format: format.data,
      logo: logoSource(logo),
      signature: signature ? { kind: "dataUrl", dataUrl: signature } : null,
    });
    return new Response(new Uint8Array(report.bytes), {
      status: 200,
      headers: {
        "content-type": report.contentType,
        "content-disposition": contentDisposition(report.fileName),
        "cache-control": "no-store",
        "x-slab-count": String(report.totals.slabCount),
      },
    });
  } catch (e) {
    return errorResponse(e, "[report]");
  }
}
