import { NextResponse } from "next/server";
import {
  buildSlabsFromColumns,
  buildSlabsFromPaste,
  parseAllowance,
  reportableSlabs,
  summarizeSlabs,
} from "@/lib/measurement";
import { errorResponse, readJsonBody } from "@/lib/http";
import { slabsRequestSchema, type SlabsResponse } from "@/lib/types";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/**
 * Turn pasted measurements into slab records.
 * POST /api/slabs  { mode: "columns", lengths, heights, allowance, swap } | { mode: "paste", text, allowance, swap }
 */
export async function POST(req: Request) {
  const body = await readJsonBody(req, slabsRequestSchema);
  if (!body.ok) return body.response;

  try {
    const input = body.data;
    const allowance = parseAllowance(input.allowance, input.swap);
    const records =
      input.mode === "columns"
        ? buildSlabsFromColumns(input.lengths, input.heights, allowance)
        : buildSlabsFromPaste(input.text, allowance);
    const payload: SlabsResponse = {
      records,
      totals: summarizeSlabs(reportableSlabs(records)),
      allowance,
    };
    return NextResponse.json(payload);
  } catch (e) {
    return errorResponse(e, "[slabs]");
  }
}
