import { describe, it, expect } from "vitest";
import { contentDisposition } from "./http";
import { fileNameFromDisposition, getDisplayErrorMessage, USER_FACING_ERROR_MESSAGE } from "./api";

describe("api helpers", () => {
  it("prefers the UTF-8 file name from Content-Disposition", () => {
    expect(fileNameFromDisposition(contentDisposition("Measurement_Café_1.pdf"), "x.pdf")).toBe("Measurement_Café_1.pdf");
    expect(fileNameFromDisposition('attachment; filename="plain.xlsx"', "x.xlsx")).toBe("plain.xlsx");
    expect(fileNameFromDisposition(null, "Measurement.pdf")).toBe("Measurement.pdf");
  });

  it("shows input errors but never stack frames", () => {
    expect(getDisplayErrorMessage(new Error("Row count mismatch: 2 length value(s) but 1 height value(s)."))).toBe(
      "Row count mismatch: 2 length value(s) but 1 height value(s)."
    );
    expect(getDisplayErrorMessage(new Error("TypeError at render (pdf-export.ts:12)"))).toBe(USER_FACING_ERROR_MESSAGE);
    expect(getDisplayErrorMessage(new Error("Please enter dimensions for at least one slab."))).toBe(
      "Please enter dimensions for at least one slab."
    );
    expect(getDisplayErrorMessage("")).toBe(USER_FACING_ERROR_MESSAGE);
  });
});
