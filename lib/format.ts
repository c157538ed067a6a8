/**
 * Centralized formatting for measurement-sheet values: lengths, areas, counts, dates.
 * The PDF, the workbook and the on-screen totals all print through these helpers,
 * so a value reads the same everywhere.
 */

const NUMBER = (decimals: number) =>
  new Intl.NumberFormat("en-US", {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
    useGrouping: false,
  });

const WHOLE = NUMBER(0);
const AREA = NUMBER(3);

/** Intl keeps the sign of values that round to zero ("-0", "-0.000"). */
function dropNegativeZero(text: string): string {
  return /^-0(\.0+)?$/.test(text) ? text.slice(1) : text;
}

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"] as const;

/** Whole centimeters, no separators (e.g. 280). */
export function formatLength(value: number | null | undefined): string {
  if (value == null || Number.isNaN(value)) return "0";
  return dropNegativeZero(WHOLE.format(value));
}

/** Square meters to 3 decimals (e.g. 5.040). */
export function formatArea(value: number | null | undefined): string {
  if (value == null || Number.isNaN(value)) return "0.000";
  return dropNegativeZero(AREA.format(value));
}

/** Area with unit, for on-screen metrics (e.g. "10.550 m2"). */
export function formatAreaWithUnit(value: number | null | undefined): string {
  return `${formatArea(value)} m2`;
}

/**
 * Format date as DD-Mon-YYYY (05-Jan-2026). Accepts Date or YYYY-MM-DD.
 * Anything else is returned trimmed, unchanged.
 */
export function formatInspectionDate(value: string | Date | null | undefined): string {
  if (value == null) return "";
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return "";
    const dd = String(value.getUTCDate()).padStart(2, "0");
    return `${dd}-${MONTHS[value.getUTCMonth()]}-${value.getUTCFullYear()}`;
  }
  const trimmed = value.trim();
  const iso = trimmed.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:$|T)/);
  if (!iso) return trimmed;
  const yyyy = Number(iso[1]);
  const mm = Number(iso[2]);
  const dd = Number(iso[3]);
  const parsed = new Date(Date.UTC(yyyy, mm - 1, dd));
  if (parsed.getUTCFullYear() !== yyyy || parsed.getUTCMonth() + 1 !== mm || parsed.getUTCDate() !== dd) {
    return trimmed;
  }
  return formatInspectionDate(parsed);
}

/** Today's date as YYYY-MM-DD in UTC; the form's default inspection date. */
export function todayIso(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}
