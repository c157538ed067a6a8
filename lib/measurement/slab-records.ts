/**
 * Slab record builder: pasted spreadsheet text -> SlabRecord[].
 * Two entry shapes share one derivation path:
 *  - dual columns: a list of gross lengths and a list of gross heights, one number per line
 *  - combined paste: Excel rows of [Slab No, Gross L, Gross H] or [Slab No, Gross L, Gross H, Net L, Net H]
 */

import { SlabInputError } from "./errors";
import { SLAB_ID_MAX_LENGTH, type AllowanceRule, type SlabRecord } from "./schema";

const CM2_PER_M2 = 10000;
const AREA_DECIMALS = 3;

/** Round half away from zero at the third decimal, as printed on the sheet. */
export function roundArea(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const factor = 10 ** AREA_DECIMALS;
  const rounded = (Math.sign(value) * Math.round((Math.abs(value) + Number.EPSILON) * factor)) / factor;
  return rounded === 0 ? 0 : rounded;
}

/** cm x cm -> m2, rounded. */
export function slabArea(length: number, height: number): number {
  return roundArea((length * height) / CM2_PER_M2);
}

export function sequentialSlabId(position: number): string {
  return `RG-${position}`;
}

/** Record with both areas computed from the given dimensions. */
export function withAreas(
  id: string,
  grossLength: number,
  grossHeight: number,
  netLength: number,
  netHeight: number
): SlabRecord {
  return {
    id,
    grossLength,
    grossHeight,
    netLength,
    netHeight,
    grossArea: slabArea(grossLength, grossHeight),
    netArea: slabArea(netLength, netHeight),
  };
}

/** Net dimensions are gross minus the allowance; negative results are kept as-is. */
export function deriveSlab(id: string, grossLength: number, grossHeight: number, allowance: AllowanceRule): SlabRecord {
  return withAreas(
    id,
    grossLength,
    grossHeight,
    grossLength - allowance.lengthDeduction,
    grossHeight - allowance.heightDeduction
  );
}

/** Parse one spreadsheet cell. Thousands separators are dropped; blanks and text give null. */
export function parseMeasurement(raw: string | undefined): number | null {
  const cleaned = (raw ?? "").replace(/,/g, "").trim();
  if (!cleaned) return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

function parseNumericList(text: string, label: string): number[] {
  const values: number[] = [];
  (text ?? "").split(/\r?\n/).forEach((line, lineIndex) => {
    if (!line.trim()) return;
    const n = parseMeasurement(line);
    if (n == null) {
      throw new SlabInputError(
        "invalid_number",
        `${label} line ${lineIndex + 1} is not a number: "${line.trim()}".`
      );
    }
    values.push(n);
  });
  return values;
}

/**
 * Dual-column entry. Ids are always RG-1..RG-n in input order.
 * Blank lines are ignored; the two lists must then be the same length.
 */
export function buildSlabsFromColumns(
  lengthsText: string,
  heightsText: string,
  allowance: AllowanceRule
): SlabRecord[] {
  const lengths = parseNumericList(lengthsText, "Gross length");
  const heights = parseNumericList(heightsText, "Gross height");
  if (lengths.length !== heights.length) {
    throw new SlabInputError(
      "count_mismatch",
      `Row count mismatch: ${lengths.length} length value(s) but ${heights.length} height value(s).`
    );
  }
  return lengths.map((length, i) => deriveSlab(sequentialSlabId(i + 1), length, heights[i], allowance));
}

function splitPastedRow(line: string): string[] {
  const fields = line.includes("\t") ? line.split("\t") : line.trim().split(/[;\s]+/);
  const trimmed = fields.map((f) => f.trim());
  while (trimmed.length > 0 && trimmed[trimmed.length - 1] === "") trimmed.pop();
  return trimmed;
}

/**
 * Combined paste straight from Excel. Five columns carry their own net values;
 * three (or four) columns derive net from the allowance. Rows that do not parse,
 * such as a copied header row, are skipped.
 */
export function buildSlabsFromPaste(text: string, allowance: AllowanceRule): SlabRecord[] {
  const records: SlabRecord[] = [];
  for (const line of (text ?? "").split(/\r?\n/)) {
    if (!line.trim()) continue;
    const fields = splitPastedRow(line);
    if (fields.length < 3) continue;

    const grossLength = parseMeasurement(fields[1]);
    const grossHeight = parseMeasurement(fields[2]);
    if (grossLength == null || grossHeight == null) continue;

    const id = fields[0] || sequentialSlabId(records.length + 1);
    if (id.length > SLAB_ID_MAX_LENGTH) {
      throw new SlabInputError(
        "invalid_id",
        `Slab no "${id.slice(0, 16)}..." is longer than ${SLAB_ID_MAX_LENGTH} characters.`
      );
    }
    if (fields.length >= 5) {
      const netLength = parseMeasurement(fields[3]);
      const netHeight = parseMeasurement(fields[4]);
      if (netLength == null || netHeight == null) continue;
      records.push(withAreas(id, grossLength, grossHeight, netLength, netHeight));
    } else {
      records.push(deriveSlab(id, grossLength, grossHeight, allowance));
    }
  }
  if (records.length === 0) {
    throw new SlabInputError(
      "no_rows",
      "Could not parse data. Copy the columns Slab No, Gross L, Gross H (and optionally Net L, Net H)."
    );
  }
  return records;
}

/** Rows that belong on the sheet: both gross dimensions positive. Order is preserved. */
export function reportableSlabs(records: readonly SlabRecord[]): SlabRecord[] {
  return records.filter((r) => r.grossLength > 0 && r.grossHeight > 0);
}
