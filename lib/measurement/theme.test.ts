import { describe, it, expect } from "vitest";
import { REPORT_THEME_IDS, REPORT_THEMES, hexToArgb, hexToRgb, resolveTheme } from "./theme";

describe("report themes", () => {
  it("resolves ids case-insensitively and falls back to luxury", () => {
    expect(resolveTheme(" Classic ").id).toBe("classic");
    expect(resolveTheme("neon").id).toBe("luxury");
    expect(resolveTheme(undefined).id).toBe("luxury");
  });

  it("defines both zebra colors for every theme", () => {
    for (const id of REPORT_THEME_IDS) {
      const [even, odd] = REPORT_THEMES[id].zebra;
      expect(even).toMatch(/^#[0-9A-F]{6}$/i);
      expect(odd).toMatch(/^#[0-9A-F]{6}$/i);
    }
  });

  it("converts hex colors for both renderers", () => {
    expect(hexToRgb("#D4AF37")).toEqual([212, 175, 55]);
    expect(hexToRgb("nope")).toEqual([0, 0, 0]);
    expect(hexToArgb("#d4af37")).toBe("FFD4AF37");
  });
});
