/**
 * Working-set operations behind the editable slab grid. Every function takes the
 * current set and returns a new one; nothing is kept between calls.
 */

import { deriveSlab, sequentialSlabId, withAreas } from "./slab-records";
import { NO_ALLOWANCE } from "./allowance";
import { SLAB_ID_MAX_LENGTH, type AllowanceRule, type SlabEditableField, type SlabRecord, type SlabRecordSet } from "./schema";

const DEFAULT_BLANK_ROWS = 5;

function blankSlab(position: number): SlabRecord {
  return deriveSlab(sequentialSlabId(position), 0, 0, NO_ALLOWANCE);
}

export function createBlankSlabSet(count: number = DEFAULT_BLANK_ROWS): SlabRecordSet {
  const n = Math.max(0, Math.floor(count));
  return Array.from({ length: n }, (_, i) => blankSlab(i + 1));
}

/**
 * Edit one cell. Areas follow the row's current dimensions; net values are not
 * re-derived from gross, so a manual net correction survives a later gross edit.
 * Ids are kept as typed (cut to SLAB_ID_MAX_LENGTH); the report trims them.
 */
export function updateSlabCell(
  set: SlabRecordSet,
  index: number,
  field: SlabEditableField,
  value: string | number
): SlabRecordSet {
  const current = set[index];
  if (!current) return set;

  const next: SlabRecord = { ...current };
  if (field === "id") {
    next.id = String(value).slice(0, SLAB_ID_MAX_LENGTH);
  } else {
    const n = typeof value === "number" ? value : Number(String(value).replace(/,/g, "").trim());
    next[field] = Number.isFinite(n) ? n : 0;
  }
  const updated = withAreas(next.id, next.grossLength, next.grossHeight, next.netLength, next.netHeight);
  return set.map((row, i) => (i === index ? updated : row));
}

export function addSlabRow(set: SlabRecordSet): SlabRecordSet {
  return [...set, blankSlab(set.length + 1)];
}

export function removeSlabRow(set: SlabRecordSet, index: number): SlabRecordSet {
  if (index < 0 || index >= set.length) return set;
  return set.filter((_, i) => i !== index);
}

/** Re-derive every row's net dimensions and areas after the allowance changes. */
export function applyAllowanceToSet(set: SlabRecordSet, allowance: AllowanceRule): SlabRecordSet {
  return set.map((row) => deriveSlab(row.id, row.grossLength, row.grossHeight, allowance));
}
