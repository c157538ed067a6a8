/**
 * PDF rendition of the measurement sheet (A4 portrait, points).
 * Draws a ReportLayout: header and metadata grid on page 1, the measurement table
 * with its two head rows repeated on every page and the TOTAL foot on the last,
 * then the signature block (on a fresh page when it would not fit).
 */

import { createHash } from "node:crypto";
import { jsPDF } from "jspdf";
import autoTable, { type UserOptions } from "jspdf-autotable";
import { PAGE_MARGIN, SIGNATURE_BOX, type ReportLayout, type TableCell } from "./layout";
import { hexToRgb, type ReportTheme } from "./theme";

type AutoTableRow = NonNullable<UserOptions["body"]>[number];

const SIGNATURE_BLOCK_HEIGHT = 110;

/** Run autoTable and return the y just below the table on its last page. */
function drawTable(doc: jsPDF, options: UserOptions): number {
  let finalY = typeof options.startY === "number" ? options.startY : PAGE_MARGIN;
  autoTable(doc, {
    ...options,
    didDrawPage: (data) => {
      if (data.cursor) finalY = data.cursor.y;
    },
  });
  return finalY;
}

function toRow(cells: TableCell[]): AutoTableRow {
  return cells.map((cell) => ({
    content: cell.content,
    styles: { fontStyle: cell.bold ? ("bold" as const) : ("normal" as const) },
  }));
}

/** YYYY-MM-DD -> PDF date string at UTC midnight. jsPDF accepts years 1970-2037 only. */
function pdfDate(value: string): string | null {
  const m = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!m) return null;
  const date = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  const year = Number(m[1]);
  if (year < 1970 || year > 2037 || date.toISOString().slice(0, 10) !== m[0]) return null;
  return `D:${m[1]}${m[2]}${m[3]}000000+00'00'`;
}

function drawHeader(doc: jsPDF, layout: ReportLayout, theme: ReportTheme): number {
  const pageWidth = doc.internal.pageSize.getWidth();
  const centerX = pageWidth / 2;
  const { header } = layout;
  let y = PAGE_MARGIN;

  if (header.logo) {
    const { image, width, height } = header.logo;
    doc.addImage(image.data, image.format, centerX - width / 2, y, width, height);
    y += height;
  }
  y += 10;

  doc.setFont(theme.headingFont, "bold");
  doc.setFontSize(20);
  doc.setTextColor(...hexToRgb(theme.text));
  y += 18;
  doc.text(header.companyName, centerX, y, { align: "center" });

  doc.setFont(theme.bodyFont, "normal");
  doc.setFontSize(8);
  doc.setTextColor(...hexToRgb(theme.mutedText));
  for (const line of header.addressLines) {
    y += 11;
    doc.text(line, centerX, y, { align: "center" });
  }

  doc.setFont(theme.bodyFont, "bold");
  doc.setFontSize(9);
  doc.setTextColor(...hexToRgb(theme.accent));
  y += 14;
  doc.text(header.title, centerX, y, { align: "center" });

  y += 6;
  if (header.divider) {
    doc.setDrawColor(...hexToRgb(theme.accent));
    doc.setLineWidth(1);
    doc.line(PAGE_MARGIN, y, pageWidth - PAGE_MARGIN, y);
  }
  return y + 15;
}

function drawMetadataGrid(doc: jsPDF, layout: ReportLayout, theme: ReportTheme, startY: number): number {
  const pageWidth = doc.internal.pageSize.getWidth();
  const columns = Math.max(1, ...layout.metadataGrid.map((row) => row.length));
  const cellWidth = (pageWidth - 2 * PAGE_MARGIN) / columns;
  return drawTable(doc, {
    startY,
    theme: "grid",
    margin: { left: PAGE_MARGIN, right: PAGE_MARGIN },
    body: layout.metadataGrid.map((row) => row.map((cell) => `${cell.label}:\n${cell.value}`)),
    styles: {
      font: theme.bodyFont,
      fontStyle: "bold",
      fontSize: 8,
      textColor: hexToRgb(theme.text),
      fillColor: hexToRgb(theme.infoFill),
      lineColor: hexToRgb(theme.grid),
      lineWidth: 0.5,
      valign: "top",
      cellPadding: 6,
      cellWidth,
    },
  });
}

function drawMeasurementTable(doc: jsPDF, layout: ReportLayout, theme: ReportTheme, startY: number): number {
  const pageWidth = doc.internal.pageSize.getWidth();
  const { table } = layout;
  const tableWidth = table.columnWidths.reduce((sum, w) => sum + w, 0);
  const side = Math.max(PAGE_MARGIN, (pageWidth - tableWidth) / 2);
  const columnStyles: NonNullable<UserOptions["columnStyles"]> = {};
  table.columnWidths.forEach((w, i) => {
    columnStyles[i] = { cellWidth: w };
  });
  const [zebraEven, zebraOdd] = theme.zebra;

  return drawTable(doc, {
    startY,
    theme: "grid",
    margin: { left: side, right: side, top: PAGE_MARGIN, bottom: PAGE_MARGIN },
    showHead: "everyPage",
    showFoot: "lastPage",
    head: table.head.map((row) =>
      row.map((cell) => ({
        content: cell.content,
        colSpan: cell.colSpan,
        rowSpan: cell.rowSpan,
        styles:
          cell.level === "main"
            ? {
                font: theme.headingFont,
                fontSize: 9,
                fillColor: hexToRgb(theme.headFill),
                textColor: hexToRgb(theme.headText),
              }
            : {
                fontSize: 7,
                fillColor: hexToRgb(theme.subheadFill),
                textColor: hexToRgb(theme.subheadText),
              },
      }))
    ),
    body: table.body.map(toRow),
    foot: [toRow(table.foot)],
    columnStyles,
    styles: {
      font: theme.bodyFont,
      fontSize: 9,
      halign: "center",
      valign: "middle",
      textColor: hexToRgb(theme.text),
      lineColor: hexToRgb(theme.grid),
      lineWidth: 0.5,
    },
    headStyles: { fontStyle: "bold", halign: "center", valign: "middle" },
    bodyStyles: { fillColor: hexToRgb(zebraEven) },
    alternateRowStyles: { fillColor: hexToRgb(zebraOdd) },
    footStyles: {
      fontStyle: "bold",
      halign: "center",
      fillColor: hexToRgb(theme.footFill),
      textColor: hexToRgb(theme.footText),
    },
    didDrawCell: (data) => {
      if (data.section !== "foot") return;
      doc.setDrawColor(...hexToRgb(theme.text));
      doc.setLineWidth(1.5);
      doc.line(data.cell.x, data.cell.y, data.cell.x + data.cell.width, data.cell.y);
    },
  });
}

function drawSignatures(doc: jsPDF, layout: ReportLayout, theme: ReportTheme, startY: number): void {
  const pageWidth = doc.internal.pageSize.getWidth();
  const pageHeight = doc.internal.pageSize.getHeight();
  let y = startY + 30;
  if (y + SIGNATURE_BLOCK_HEIGHT > pageHeight - PAGE_MARGIN) {
    doc.addPage();
    y = PAGE_MARGIN + 10;
  }

  const blocks = layout.signature;
  const columnWidth = (pageWidth - 2 * PAGE_MARGIN) / Math.max(1, blocks.length);
  doc.setTextColor(...hexToRgb(theme.text));
  doc.setFontSize(9);

  blocks.forEach((block, i) => {
    const centerX = PAGE_MARGIN + columnWidth * (i + 0.5);
    doc.setFont(theme.bodyFont, "normal");
    doc.text(block.label, centerX, y, { align: "center" });

    if (block.image) {
      const { image, width, height } = block.image;
      doc.addImage(image.data, image.format, centerX - width / 2, y + 6 + (SIGNATURE_BOX.height - height), width, height);
    }

    let lineY = y + 12 + SIGNATURE_BOX.height;
    doc.text(block.line, centerX, lineY, { align: "center" });
    doc.setFont(theme.bodyFont, "bold");
    for (const caption of block.caption) {
      lineY += 12;
      doc.text(caption, centerX, lineY, { align: "center" });
    }
  });
}

function drawPageNumbers(doc: jsPDF, theme: ReportTheme): void {
  const total = doc.getNumberOfPages();
  if (total < 2) return;
  const pageWidth = doc.internal.pageSize.getWidth();
  const pageHeight = doc.internal.pageSize.getHeight();
  doc.setFont(theme.bodyFont, "normal");
  doc.setFontSize(7);
  doc.setTextColor(...hexToRgb(theme.mutedText));
  for (let page = 1; page <= total; page++) {
    doc.setPage(page);
    doc.text(`Page ${page} of ${total}`, pageWidth - PAGE_MARGIN, pageHeight - 8, { align: "right" });
  }
}

/** Render the layout to PDF bytes. */
export function renderReportPdf(layout: ReportLayout, theme: ReportTheme): Uint8Array {
  const doc = new jsPDF({ unit: "pt", format: "a4", orientation: "portrait" });
  doc.setDocumentProperties({
    title: `${layout.header.title} - ${layout.fileName}`,
    subject: layout.header.title,
    creator: layout.header.companyName,
  });
  const issued = pdfDate(layout.documentDate);
  if (issued) doc.setCreationDate(issued);
  doc.setFileId(createHash("md5").update(layout.fileName).digest("hex").toUpperCase());

  let y = drawHeader(doc, layout, theme);
  y = drawMetadataGrid(doc, layout, theme, y);
  y = drawMeasurementTable(doc, layout, theme, y + 15);
  drawSignatures(doc, layout, theme, y);
  drawPageNumbers(doc, theme);

  return new Uint8Array(doc.output("arraybuffer"));
}
