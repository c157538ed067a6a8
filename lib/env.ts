/**
 * Server-side settings for the measurement sheet. Read on every call so each
 * request sees the current environment; nothing is cached at module load.
 */

import type { CompanyProfile } from "@/lib/measurement/schema";
import { DEFAULT_THEME_ID, isReportThemeId, type ReportThemeId } from "@/lib/measurement/theme";

const DEFAULT_COMPANY_NAME = "STONE SLAB EXPORTS";
const DEFAULT_COMPANY_ADDRESS = "Plot 12, Granite Industrial Area|Tel: +00 000 000 0000  |  exports@example.com";

function readEnv(name: string): string {
  return process.env[name]?.trim() ?? "";
}

/**
 * Company identity printed in the header and signature block.
 * COMPANY_ADDRESS holds one or more lines separated by "|".
 */
export function getCompanyProfile(): CompanyProfile {
  const name = readEnv("COMPANY_NAME") || DEFAULT_COMPANY_NAME;
  const address = readEnv("COMPANY_ADDRESS") || DEFAULT_COMPANY_ADDRESS;
  const addressLines = address
    .split("|")
    .map((line) => line.trim())
    .filter(Boolean);
  return { name, addressLines };
}

/** REPORT_THEME if it names a known theme, else the default. */
export function getDefaultThemeId(): ReportThemeId {
  const v = readEnv("REPORT_THEME").toLowerCase();
  if (v && !isReportThemeId(v)) {
    console.warn("[config] REPORT_THEME is not a known theme; using default:", DEFAULT_THEME_ID);
  }
  return isReportThemeId(v) ? v : DEFAULT_THEME_ID;
}

/** Logo file used when the request carries none. Empty = no logo. */
export function getDefaultLogoPath(): string {
  return readEnv("DEFAULT_LOGO_PATH");
}
