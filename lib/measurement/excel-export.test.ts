import { describe, it, expect } from "vitest";
import ExcelJS from "exceljs";
import { parseAllowance } from "./allowance";
import { buildMeasurementWorkbook, MEASUREMENT_SHEET, renderReportWorkbook } from "./excel-export";
import { buildReportLayout } from "./layout";
import { buildSlabsFromColumns } from "./slab-records";
import { resolveTheme } from "./theme";
import { summarizeSlabs } from "./totals";

function sampleLayout() {
  const slabs = buildSlabsFromColumns("280\n290", "180\n190", parseAllowance("-5 x 4"));
  return buildReportLayout({
    metadata: {
      materialName: "Absolute Black",
      invoiceNo: "EXP/2026/001",
      inspectionDate: "2026-01-05",
      thickness: "2 cm",
      containerNo: "MSKU1234567",
      mineName: "Block 14",
      allowance: "-5 x 4",
    },
    company: { name: "Test Stone Co", addressLines: ["Line A", "Line B"] },
    slabs,
    totals: summarizeSlabs(slabs),
  });
}

function sheetOf(workbook: ExcelJS.Workbook): ExcelJS.Worksheet {
  const sheet = workbook.getWorksheet(MEASUREMENT_SHEET);
  if (!sheet) throw new Error("missing measurement sheet");
  return sheet;
}

describe("measurement workbook", () => {
  const theme = resolveTheme("luxury");

  it("writes the header and metadata grid above the table", () => {
    const sheet = sheetOf(buildMeasurementWorkbook(sampleLayout(), theme));
    expect(sheet.getCell(1, 1).value).toBe("Test Stone Co");
    expect(sheet.getCell(2, 1).value).toBe("Line A");
    expect(sheet.getCell(4, 1).value).toBe("INSPECTION REPORT OF ABSOLUTE BLACK");
    expect(sheet.getCell(1, 8).isMerged).toBe(true);
    expect(sheet.getCell(6, 1).value).toEqual({
      richText: [
        expect.objectContaining({ text: "INVOICE NO:\n" }),
        expect.objectContaining({ text: "EXP/2026/001" }),
      ],
    });
    expect(sheet.getCell(7, 6).value).toEqual({
      richText: [
        expect.objectContaining({ text: "CONTAINER NO:\n" }),
        expect.objectContaining({ text: "MSKU1234567 (-5 x 4)" }),
      ],
    });
  });

  it("merges the two head rows and marks them as print titles", () => {
    const sheet = sheetOf(buildMeasurementWorkbook(sampleLayout(), theme));
    expect(sheet.getCell(9, 1).value).toBe("S.NO");
    expect(sheet.getCell(10, 1).isMerged).toBe(true);
    expect(sheet.getCell(9, 3).value).toBe("GROSS MEASUREMENT");
    expect(sheet.getCell(9, 6).value).toBe("NET MEASUREMENT");
    expect(sheet.getCell(10, 3).value).toBe("L (cm)");
    expect(sheet.getCell(10, 8).value).toBe("AREA (m2)");
    expect(sheet.pageSetup.printTitlesRow).toBe("9:10");
  });

  it("writes numeric body cells and a summing TOTAL row", () => {
    const sheet = sheetOf(buildMeasurementWorkbook(sampleLayout(), theme));
    expect(sheet.getCell(11, 1).value).toBe(1);
    expect(sheet.getCell(11, 2).value).toBe("RG-1");
    expect(sheet.getCell(11, 3).value).toBe(280);
    expect(sheet.getCell(11, 5).value).toBe(5.04);
    expect(sheet.getCell(12, 8).value).toBe(5.291);
    expect(sheet.getCell(11, 5).numFmt).toBe("0.000");
    expect(sheet.getCell(11, 1).fill).toEqual({ type: "pattern", pattern: "solid", fgColor: { argb: "FFFFFFFF" } });
    expect(sheet.getCell(12, 1).fill).toEqual({ type: "pattern", pattern: "solid", fgColor: { argb: "FFFAFAFA" } });

    expect(sheet.getCell(13, 2).value).toBe("TOTAL");
    expect(sheet.getCell(13, 5).value).toMatchObject({ formula: "SUM(E11:E12)", result: 10.55 });
    expect(sheet.getCell(13, 8).value).toMatchObject({ formula: "SUM(H11:H12)", result: 10.121 });
  });

  it("places both signature blocks below the table", () => {
    const sheet = sheetOf(buildMeasurementWorkbook(sampleLayout(), theme));
    expect(sheet.getCell(16, 1).value).toBe("Inspected By:");
    expect(sheet.getCell(16, 5).value).toBe("Authorized Signatory:");
    expect(sheet.getCell(19, 5).value).toBe("For Test Stone Co");
  });

  it("round-trips through xlsx bytes", async () => {
    const buffer = await renderReportWorkbook(sampleLayout(), theme);
    const loaded = new ExcelJS.Workbook();
    await loaded.xlsx.load(buffer);
    const sheet = sheetOf(loaded);
    expect(sheet.getCell(13, 2).value).toBe("TOTAL");
    expect(sheet.getCell(12, 2).value).toBe("RG-2");
    expect(loaded.created.toISOString()).toBe("2026-01-05T00:00:00.000Z");
  });
});
