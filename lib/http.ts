/**
 * Shared plumbing for the route handlers: JSON body validation and error -> response mapping.
 * Known input errors answer 422 with { error, code }; anything else is logged and answers 500.
 */

import { NextResponse } from "next/server";
import type { z } from "zod";
import { EmptyReportError, SlabInputError } from "@/lib/measurement/errors";
import type { ApiErrorBody } from "@/lib/types";

export const INTERNAL_ERROR_MESSAGE = "Something went wrong while preparing the report. Please try again.";

export function jsonError(status: number, error: string, code?: string): NextResponse<ApiErrorBody> {
  const body: ApiErrorBody = code ? { error, code } : { error };
  return NextResponse.json(body, { status });
}

type ParsedBody<T> = { ok: true; data: T } | { ok: false; response: NextResponse<ApiErrorBody> };

/** Parse and validate a JSON request body. Failures become a 400 naming the first issue. */
export async function readJsonBody<T>(
  req: Request,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<ParsedBody<T>> {
  let raw: unknown;
  try {
    raw = await req.json();
  } catch {
    return { ok: false, response: jsonError(400, "Request body must be JSON.", "invalid_body") };
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join(".")}: ` : "";
    return { ok: false, response: jsonError(400, `${where}${issue?.message ?? "Invalid request."}`, "invalid_body") };
  }
  return { ok: true, data: result.data };
}

export function errorResponse(e: unknown, tag: string): NextResponse<ApiErrorBody> {
  if (e instanceof SlabInputError || e instanceof EmptyReportError) {
    return jsonError(422, e.message, e.code);
  }
  console.error(`${tag} Unexpected error`, e);
  return jsonError(500, INTERNAL_ERROR_MESSAGE, "internal_error");
}

/** attachment header with an ASCII fallback name and the UTF-8 original. */
export function contentDisposition(fileName: string): string {
  const ascii = fileName.replace(/[^\x20-\x7e]/g, "_").replace(/["\\]/g, "_");
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}
