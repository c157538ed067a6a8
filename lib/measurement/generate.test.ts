import { afterEach, describe, it, expect, vi } from "vitest";
import { parseAllowance } from "./allowance";
import { EmptyReportError } from "./errors";
import { generateMeasurementReport, type GenerateReportRequest } from "./generate";
import { buildSlabsFromColumns } from "./slab-records";
import { addSlabRow } from "./slab-set";
import { resolveTheme } from "./theme";
import type { SlabRecord } from "./schema";

const baseRequest: GenerateReportRequest = {
  metadata: {
    materialName: "Absolute Black",
    invoiceNo: "EXP/2026/001",
    inspectionDate: "2026-01-05",
    thickness: "2 cm",
    containerNo: "MSKU1234567",
    mineName: "Block 14",
    allowance: "-5 x 4",
  },
  // trailing blank row as left by the grid
  records: addSlabRow(buildSlabsFromColumns("280\n290", "180\n190", parseAllowance("-5 x 4"))),
  company: { name: "Test Stone Co", addressLines: ["Line A"] },
  theme: resolveTheme("luxury"),
  format: "pdf",
};

function head(bytes: Uint8Array, n: number): string {
  return Buffer.from(bytes.subarray(0, n)).toString("latin1");
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("generateMeasurementReport", () => {
  it("renders a PDF over the reportable slabs only", async () => {
    const report = await generateMeasurementReport(baseRequest);
    expect(report.fileName).toBe("Measurement_Absolute Black_EXP-2026-001.pdf");
    expect(report.contentType).toBe("application/pdf");
    expect(head(report.bytes, 5)).toBe("%PDF-");
    expect(report.totals.slabCount).toBe(2);
    expect(report.layout.table.body).toHaveLength(2);
  });

  it("renders the workbook for the xlsx format", async () => {
    const report = await generateMeasurementReport({ ...baseRequest, format: "xlsx" });
    expect(report.fileName).toBe("Measurement_Absolute Black_EXP-2026-001.xlsx");
    expect(report.contentType).toBe("application/vnd.openxmlformats-officedocument.spreadsheetml.sheet");
    expect(head(report.bytes, 2)).toBe("PK");
  });

  it("continues without a logo that cannot be decoded", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const report = await generateMeasurementReport({
      ...baseRequest,
      logo: { kind: "dataUrl", dataUrl: "data:image/png;base64,AAAA" },
    });
    expect(report.layout.header.logo).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("recomputes areas from the dimensions instead of trusting the request", async () => {
    const sent: SlabRecord[] = [
      { id: "A-1", grossLength: 100, grossHeight: 100, netLength: 100, netHeight: 100, grossArea: 1.0004, netArea: 7 },
      { id: "A-2", grossLength: 100, grossHeight: 100, netLength: 100, netHeight: 100, grossArea: 1.0004, netArea: 7 },
    ];
    const report = await generateMeasurementReport({ ...baseRequest, records: sent });
    expect(report.totals).toMatchObject({ slabCount: 2, grossArea: 2, netArea: 2 });
    expect(report.layout.table.body[0].map((c) => c.content)).toEqual(["1", "A-1", "100", "100", "1.000", "100", "100", "1.000"]);
    expect(report.layout.table.foot.map((c) => c.content)).toEqual(["", "TOTAL", "", "", "2.000", "", "", "2.000"]);
  });

  it("produces no document when every row is blank", async () => {
    await expect(
      generateMeasurementReport({ ...baseRequest, records: addSlabRow([]) })
    ).rejects.toBeInstanceOf(EmptyReportError);
  });
});
