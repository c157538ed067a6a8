/**
 * Browser-side helpers for the same-origin /api routes: 60s timeout, friendly errors,
 * file download from a report response.
 */
import type { ReportFormat } from "@/lib/measurement/schema";
import type { ApiErrorBody, ReportRequest, SlabsRequest, SlabsResponse } from "@/lib/types";

const DEFAULT_TIMEOUT_MS = 60000;
const FRIENDLY_MESSAGE = "We're having trouble connecting right now. Please try again.";

/** Fallback user-facing error. Never show URLs or stack traces. */
export const USER_FACING_ERROR_MESSAGE = "We couldn't prepare the report. Please review the measurements and try again.";

const FORBIDDEN_IN_ERROR = ["127.0.0.1", "localhost", "npm run", "npx ", "\n    at ", ".ts:", ".tsx:", ".js:", "node_modules"];

/** Return a safe user-facing message: never expose URLs, CLI, or stack traces. */
export function getDisplayErrorMessage(error: unknown): string {
  const msg = error instanceof Error ? error.message : String(error ?? "");
  const lower = msg.toLowerCase();
  if (FORBIDDEN_IN_ERROR.some((f) => lower.includes(f.toLowerCase()))) return USER_FACING_ERROR_MESSAGE;
  return msg.trim() || USER_FACING_ERROR_MESSAGE;
}

/** Error returned by an /api route, carrying its status and code. */
export class ApiError extends Error {
  readonly status: number;
  readonly code: string | undefined;

  constructor(status: number, message: string, code?: string) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.code = code;
  }
}

function withTimeoutSignal(timeoutMs: number): { signal: AbortSignal; clear: () => void } {
  const controller = new AbortController();
  const id = setTimeout(() => controller.abort(), timeoutMs);
  return {
    signal: controller.signal,
    clear: () => clearTimeout(id),
  };
}

/** POST JSON with timeout; network failures become a friendly message. */
export async function postJson(
  path: string,
  body: unknown,
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<Response> {
  const timeout = withTimeoutSignal(timeoutMs);
  try {
    return await fetch(path, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal: timeout.signal,
    });
  } catch (e) {
    console.warn("[api] request failed", { path, e });
    throw new Error(FRIENDLY_MESSAGE);
  } finally {
    timeout.clear();
  }
}

function isApiErrorBody(value: unknown): value is ApiErrorBody {
  return typeof value === "object" && value !== null && typeof Reflect.get(value, "error") === "string";
}

async function toApiError(res: Response): Promise<ApiError> {
  const data: unknown = await res.json().catch(() => null);
  if (isApiErrorBody(data)) return new ApiError(res.status, data.error, data.code);
  return new ApiError(res.status, USER_FACING_ERROR_MESSAGE);
}

export async function postSlabs(request: SlabsRequest): Promise<SlabsResponse> {
  const res = await postJson("/api/slabs", request);
  if (!res.ok) throw await toApiError(res);
  const data: SlabsResponse = await res.json();
  return data;
}

/** filename* (RFC 5987) wins over the plain filename parameter. */
export function fileNameFromDisposition(header: string | null, fallback: string): string {
  if (!header) return fallback;
  const extended = header.match(/filename\*\s*=\s*UTF-8''([^;]+)/i);
  if (extended) {
    try {
      return decodeURIComponent(extended[1].trim());
    } catch {
      // malformed escape; fall through to the plain parameter
    }
  }
  const plain = header.match(/filename\s*=\s*"([^"]*)"/i) ?? header.match(/filename\s*=\s*([^;]+)/i);
  return plain ? plain[1].trim() : fallback;
}

export async function requestReport(
  format: ReportFormat,
  request: ReportRequest
): Promise<{ blob: Blob; fileName: string }> {
  const res = await postJson(`/api/report?format=${format}`, request);
  if (!res.ok) throw await toApiError(res);
  const blob = await res.blob();
  return { blob, fileName: fileNameFromDisposition(res.headers.get("content-disposition"), `Measurement.${format}`) };
}

/** Hand a blob to the browser as a download. */
export function saveBlob(blob: Blob, fileName: string): void {
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = fileName;
  document.body.appendChild(a);
  a.click();
  a.remove();
  setTimeout(() => URL.revokeObjectURL(url), 1000);
}
