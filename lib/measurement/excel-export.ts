/**
 * Workbook rendition of the measurement sheet: one A4 worksheet laid out like the PDF.
 * The two table head rows are the sheet's print titles so they repeat on every
 * printed page; the TOTAL row sums the printed (rounded) area cells.
 */

import ExcelJS from "exceljs";
import type { PlacedImage, ReportLayout, TableCell } from "./layout";
import { hexToArgb, type ReportFont, type ReportTheme } from "./theme";

export const MEASUREMENT_SHEET = "Measurement Sheet";

const LAST_COL = 8;
const AREA_COLUMNS = new Set([5, 8]);
const PT_TO_PX = 96 / 72;
/** Metadata cells span 3, 2 and 3 of the eight table columns */
const METADATA_SPANS: ReadonlyArray<[number, number]> = [
  [1, 3],
  [4, 5],
  [6, 8],
];

const EXCEL_FONTS: Record<ReportFont, string> = {
  helvetica: "Arial",
  times: "Times New Roman",
  courier: "Courier New",
};

function solid(hex: string): ExcelJS.Fill {
  return { type: "pattern", pattern: "solid", fgColor: { argb: hexToArgb(hex) } };
}

function thinBorder(hex: string): Partial<ExcelJS.Borders> {
  const side: Partial<ExcelJS.Border> = { style: "thin", color: { argb: hexToArgb(hex) } };
  return { top: side, left: side, bottom: side, right: side };
}

function parseDocumentDate(value: string): Date | null {
  const m = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!m) return null;
  const date = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Numeric table text becomes a number cell so the sheet stays calculable. */
function tableValue(cell: TableCell, col: number): ExcelJS.CellValue {
  if (col === 2 || cell.content === "") return cell.content;
  const n = Number(cell.content);
  return Number.isFinite(n) ? n : cell.content;
}

function addPicture(
  workbook: ExcelJS.Workbook,
  sheet: ExcelJS.Worksheet,
  placed: PlacedImage,
  col: number,
  row: number
): void {
  const base64 = Buffer.from(placed.image.data).toString("base64");
  const imageId = workbook.addImage({ base64: `data:image/png;base64,${base64}`, extension: "png" });
  sheet.addImage(imageId, {
    tl: { col, row },
    ext: { width: placed.width * PT_TO_PX, height: placed.height * PT_TO_PX },
  });
}

function mergedText(
  sheet: ExcelJS.Worksheet,
  row: number,
  text: string,
  font: Partial<ExcelJS.Font>,
  height?: number
): void {
  sheet.mergeCells(row, 1, row, LAST_COL);
  const cell = sheet.getCell(row, 1);
  cell.value = text;
  cell.font = font;
  cell.alignment = { horizontal: "center", vertical: "middle" };
  if (height) sheet.getRow(row).height = height;
}

/** Build the workbook in memory. */
export function buildMeasurementWorkbook(layout: ReportLayout, theme: ReportTheme): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = layout.header.companyName;
  const issued = parseDocumentDate(layout.documentDate);
  if (issued) {
    workbook.created = issued;
    workbook.modified = issued;
  }

  const headingFont = EXCEL_FONTS[theme.headingFont];
  const bodyFont = EXCEL_FONTS[theme.bodyFont];
  const sheet = workbook.addWorksheet(MEASUREMENT_SHEET, {
    pageSetup: {
      paperSize: 9,
      orientation: "portrait",
      fitToPage: true,
      fitToWidth: 1,
      fitToHeight: 0,
      horizontalCentered: true,
      margins: { left: 0.3, right: 0.3, top: 0.3, bottom: 0.3, header: 0.2, footer: 0.2 },
    },
    headerFooter: { oddFooter: "Page &P of &N" },
  });
  layout.table.columnWidths.forEach((w, i) => {
    sheet.getColumn(i + 1).width = Math.max(6, Math.round(w / 5));
  });

  let row = 1;

  // ---- Header ----
  const { header } = layout;
  if (header.logo) {
    sheet.getRow(row).height = header.logo.height;
    const widthPx = layout.table.columnWidths.reduce((sum, w) => sum + w, 0) * PT_TO_PX;
    const leftCols = Math.max(0, (widthPx - header.logo.width * PT_TO_PX) / 2 / (widthPx / LAST_COL));
    addPicture(workbook, sheet, header.logo, leftCols, row - 1);
    row++;
  }
  mergedText(sheet, row++, header.companyName, { name: headingFont, bold: true, size: 20, color: { argb: hexToArgb(theme.text) } }, 28);
  for (const line of header.addressLines) {
    mergedText(sheet, row++, line, { name: bodyFont, size: 8, color: { argb: hexToArgb(theme.mutedText) } });
  }
  mergedText(sheet, row, header.title, { name: bodyFont, bold: true, size: 9, color: { argb: hexToArgb(theme.accent) } });
  if (header.divider) {
    for (let c = 1; c <= LAST_COL; c++) {
      sheet.getCell(row, c).border = { bottom: { style: "medium", color: { argb: hexToArgb(theme.accent) } } };
    }
  }
  row += 2;

  // ---- Metadata grid ----
  for (const cells of layout.metadataGrid) {
    cells.forEach((meta, i) => {
      const [from, to] = METADATA_SPANS[i] ?? [i + 1, i + 1];
      sheet.mergeCells(row, from, row, to);
      const cell = sheet.getCell(row, from);
      cell.value = {
        richText: [
          { text: `${meta.label}:\n`, font: { name: bodyFont, bold: true, size: 7, color: { argb: hexToArgb(theme.mutedText) } } },
          { text: meta.value, font: { name: bodyFont, bold: true, size: 9, color: { argb: hexToArgb(theme.text) } } },
        ],
      };
      cell.alignment = { vertical: "top", wrapText: true };
      for (let c = from; c <= to; c++) {
        sheet.getCell(row, c).fill = solid(theme.infoFill);
        sheet.getCell(row, c).border = thinBorder(theme.grid);
      }
    });
    sheet.getRow(row).height = 30;
    row++;
  }
  row++;

  // ---- Measurement table head ----
  const { table } = layout;
  const headStart = row;
  table.head.forEach((cells, level) => {
    const r = headStart + level;
    let col = 1;
    for (const head of cells) {
      while (sheet.getCell(r, col).isMerged) col++;
      const span = head.colSpan ?? 1;
      const rows = head.rowSpan ?? 1;
      if (span > 1 || rows > 1) sheet.mergeCells(r, col, r + rows - 1, col + span - 1);
      const cell = sheet.getCell(r, col);
      cell.value = head.content;
      const main = head.level === "main";
      cell.font = main
        ? { name: headingFont, bold: true, size: 9, color: { argb: hexToArgb(theme.headText) } }
        : { name: bodyFont, bold: true, size: 7, color: { argb: hexToArgb(theme.subheadText) } };
      for (let rr = r; rr < r + rows; rr++) {
        for (let c = col; c < col + span; c++) {
          const target = sheet.getCell(rr, c);
          target.fill = solid(main ? theme.headFill : theme.subheadFill);
          target.border = thinBorder(theme.grid);
          target.alignment = { horizontal: "center", vertical: "middle", wrapText: true };
        }
      }
      col += span;
    }
  });
  row = headStart + table.head.length;
  sheet.pageSetup.printTitlesRow = `${headStart}:${headStart + table.repeatHeadRows - 1}`;

  // ---- Body ----
  const bodyStart = row;
  table.body.forEach((cells, i) => {
    const fill = solid(theme.zebra[i % 2]);
    cells.forEach((cellDef, c) => {
      const col = c + 1;
      const cell = sheet.getCell(row, col);
      cell.value = tableValue(cellDef, col);
      cell.numFmt = AREA_COLUMNS.has(col) ? "0.000" : "0";
      cell.font = { name: bodyFont, size: 9, bold: cellDef.bold, color: { argb: hexToArgb(theme.text) } };
      cell.alignment = { horizontal: "center", vertical: "middle" };
      cell.fill = fill;
      cell.border = thinBorder(theme.grid);
    });
    row++;
  });
  const bodyEnd = row - 1;

  // ---- TOTAL foot ----
  table.foot.forEach((cellDef, c) => {
    const col = c + 1;
    const cell = sheet.getCell(row, col);
    if (AREA_COLUMNS.has(col) && cellDef.content !== "") {
      const letter = sheet.getColumn(col).letter;
      cell.value = {
        formula: `SUM(${letter}${bodyStart}:${letter}${bodyEnd})`,
        result: Number(cellDef.content),
        date1904: false,
      };
      cell.numFmt = "0.000";
    } else {
      cell.value = cellDef.content;
    }
    cell.font = { name: bodyFont, size: 9, bold: true, color: { argb: hexToArgb(theme.footText) } };
    cell.alignment = { horizontal: "center", vertical: "middle" };
    cell.fill = solid(theme.footFill);
    cell.border = {
      ...thinBorder(theme.grid),
      top: { style: "medium", color: { argb: hexToArgb(theme.text) } },
    };
  });
  row += 3;

  // ---- Signatures ----
  const blockWidth = LAST_COL / Math.max(1, layout.signature.length);
  layout.signature.forEach((block, i) => {
    const from = Math.round(i * blockWidth) + 1;
    const to = Math.round((i + 1) * blockWidth);
    let r = row;
    const put = (text: string, bold: boolean) => {
      sheet.mergeCells(r, from, r, to);
      const cell = sheet.getCell(r, from);
      cell.value = text;
      cell.font = { name: bodyFont, size: 9, bold, color: { argb: hexToArgb(theme.text) } };
      cell.alignment = { horizontal: "center", vertical: "bottom" };
      r++;
    };
    put(block.label, false);
    sheet.getRow(r).height = 40;
    if (block.image) addPicture(workbook, sheet, block.image, from - 1, r - 1);
    r++;
    put(block.line, false);
    for (const caption of block.caption) put(caption, true);
  });

  return workbook;
}

/** Render the layout to .xlsx bytes. */
export async function renderReportWorkbook(layout: ReportLayout, theme: ReportTheme): Promise<ExcelJS.Buffer> {
  const workbook = buildMeasurementWorkbook(layout, theme);
  return workbook.xlsx.writeBuffer();
}
