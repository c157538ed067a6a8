/**
 * Visual themes for the measurement sheet. Layout is fixed; only these values vary.
 * Colors are #RRGGBB so both the PDF and the workbook renderer can read them.
 */

export const REPORT_THEME_IDS = ["luxury", "classic", "monochrome"] as const;
export type ReportThemeId = (typeof REPORT_THEME_IDS)[number];

/** Standard PDF font families; the workbook maps them to installed fonts. */
export type ReportFont = "helvetica" | "times" | "courier";

export interface ReportTheme {
  id: ReportThemeId;
  label: string;
  headingFont: ReportFont;
  bodyFont: ReportFont;
  /** Title accent, divider rule and group-label text */
  accent: string;
  text: string;
  mutedText: string;
  grid: string;
  infoFill: string;
  headFill: string;
  headText: string;
  subheadFill: string;
  subheadText: string;
  footFill: string;
  footText: string;
  /** Alternating body row fills, first row uses zebra[0] */
  zebra: readonly [string, string];
}

export const REPORT_THEMES: Record<ReportThemeId, ReportTheme> = {
  luxury: {
    id: "luxury",
    label: "Black & gold",
    headingFont: "times",
    bodyFont: "helvetica",
    accent: "#D4AF37",
    text: "#000000",
    mutedText: "#303030",
    grid: "#D3D3D3",
    infoFill: "#FAFAFA",
    headFill: "#000000",
    headText: "#D4AF37",
    subheadFill: "#303030",
    subheadText: "#F5F5F5",
    footFill: "#D4AF37",
    footText: "#000000",
    zebra: ["#FFFFFF", "#FAFAFA"],
  },
  classic: {
    id: "classic",
    label: "Navy",
    headingFont: "helvetica",
    bodyFont: "helvetica",
    accent: "#1F3A5F",
    text: "#111827",
    mutedText: "#4B5563",
    grid: "#CBD5E1",
    infoFill: "#F1F5F9",
    headFill: "#1F3A5F",
    headText: "#FFFFFF",
    subheadFill: "#E2E8F0",
    subheadText: "#1F3A5F",
    footFill: "#1F3A5F",
    footText: "#FFFFFF",
    zebra: ["#FFFFFF", "#F8FAFC"],
  },
  monochrome: {
    id: "monochrome",
    label: "Print friendly",
    headingFont: "helvetica",
    bodyFont: "helvetica",
    accent: "#000000",
    text: "#000000",
    mutedText: "#404040",
    grid: "#808080",
    infoFill: "#FFFFFF",
    headFill: "#FFFFFF",
    headText: "#000000",
    subheadFill: "#FFFFFF",
    subheadText: "#000000",
    footFill: "#E5E5E5",
    footText: "#000000",
    zebra: ["#FFFFFF", "#F2F2F2"],
  },
};

export const DEFAULT_THEME_ID: ReportThemeId = "luxury";

export function isReportThemeId(value: unknown): value is ReportThemeId {
  return typeof value === "string" && (REPORT_THEME_IDS as readonly string[]).includes(value);
}

/** Unknown or missing ids fall back to the default theme. */
export function resolveTheme(id: string | null | undefined): ReportTheme {
  const key = (id ?? "").trim().toLowerCase();
  return isReportThemeId(key) ? REPORT_THEMES[key] : REPORT_THEMES[DEFAULT_THEME_ID];
}

/** "#D4AF37" -> [212, 175, 55] */
export function hexToRgb(hex: string): [number, number, number] {
  const m = hex.trim().match(/^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i);
  if (!m) return [0, 0, 0];
  return [parseInt(m[1], 16), parseInt(m[2], 16), parseInt(m[3], 16)];
}

/** "#D4AF37" -> "FFD4AF37" (exceljs ARGB) */
export function hexToArgb(hex: string): string {
  const [r, g, b] = hexToRgb(hex);
  return `FF${[r, g, b].map((c) => c.toString(16).padStart(2, "0")).join("").toUpperCase()}`;
}
