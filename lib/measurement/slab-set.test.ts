import { describe, it, expect } from "vitest";
import {
  addSlabRow,
  applyAllowanceToSet,
  createBlankSlabSet,
  removeSlabRow,
  updateSlabCell,
} from "./slab-set";
import { SLAB_ID_MAX_LENGTH } from "./schema";

describe("slab working set", () => {
  it("starts with five blank sequential rows", () => {
    const set = createBlankSlabSet();
    expect(set.map((r) => r.id)).toEqual(["RG-1", "RG-2", "RG-3", "RG-4", "RG-5"]);
    expect(set[0]).toEqual({
      id: "RG-1",
      grossLength: 0,
      grossHeight: 0,
      netLength: 0,
      netHeight: 0,
      grossArea: 0,
      netArea: 0,
    });
    expect(createBlankSlabSet(2)).toHaveLength(2);
  });

  it("recomputes areas when a dimension changes and leaves the input untouched", () => {
    const set = createBlankSlabSet(2);
    const withLength = updateSlabCell(set, 0, "grossLength", "280");
    const next = updateSlabCell(withLength, 0, "grossHeight", "180");
    expect(next[0]).toMatchObject({ grossLength: 280, grossHeight: 180, grossArea: 5.04, netArea: 0 });
    expect(set[0].grossLength).toBe(0);
    expect(next[1]).toBe(set[1]);
  });

  it("keeps a manual net correction when gross changes", () => {
    let set = createBlankSlabSet(1);
    set = updateSlabCell(set, 0, "netLength", 270);
    set = updateSlabCell(set, 0, "netHeight", 170);
    set = updateSlabCell(set, 0, "grossLength", "1,280");
    expect(set[0]).toMatchObject({ grossLength: 1280, netLength: 270, netHeight: 170, netArea: 4.59 });
  });

  it("treats unreadable numbers as 0 and keeps ids as typed", () => {
    let set = createBlankSlabSet(1);
    set = updateSlabCell(set, 0, "grossLength", "abc");
    set = updateSlabCell(set, 0, "id", "RG ");
    expect(set[0].id).toBe("RG ");
    set = updateSlabCell(set, 0, "id", "RG 1");
    expect(set[0].grossLength).toBe(0);
    expect(set[0].id).toBe("RG 1");
  });

  it("cuts an id at the length limit", () => {
    const set = updateSlabCell(createBlankSlabSet(1), 0, "id", "X".repeat(SLAB_ID_MAX_LENGTH + 10));
    expect(set[0].id).toBe("X".repeat(SLAB_ID_MAX_LENGTH));
  });

  it("returns the same set for an out-of-range index", () => {
    const set = createBlankSlabSet(2);
    expect(updateSlabCell(set, 5, "grossLength", 100)).toBe(set);
    expect(removeSlabRow(set, -1)).toBe(set);
  });

  it("adds and removes rows", () => {
    const added = addSlabRow(createBlankSlabSet(5));
    expect(added[5].id).toBe("RG-6");
    expect(removeSlabRow(added, 1).map((r) => r.id)).toEqual(["RG-1", "RG-3", "RG-4", "RG-5", "RG-6"]);
  });

  it("re-derives every row from gross when the allowance changes", () => {
    let set = createBlankSlabSet(1);
    set = updateSlabCell(set, 0, "grossLength", 280);
    set = updateSlabCell(set, 0, "grossHeight", 180);
    set = updateSlabCell(set, 0, "netLength", 1);
    const applied = applyAllowanceToSet(set, { lengthDeduction: 4, heightDeduction: 5 });
    expect(applied[0]).toEqual({
      id: "RG-1",
      grossLength: 280,
      grossHeight: 180,
      netLength: 276,
      netHeight: 175,
      grossArea: 5.04,
      netArea: 4.83,
    });
  });
});
