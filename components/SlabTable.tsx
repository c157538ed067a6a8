"use client";

import { formatArea } from "@/lib/format";
import {
  SLAB_ID_MAX_LENGTH,
  type SlabDimensionField,
  type SlabEditableField,
  type SlabRecordSet,
} from "@/lib/measurement/schema";

interface SlabTableProps {
  records: SlabRecordSet;
  onCellChange: (index: number, field: SlabEditableField, value: string) => void;
  onAddRow: () => void;
  onRemoveRow: (index: number) => void;
}

const GROSS: SlabDimensionField[] = ["grossLength", "grossHeight"];
const NET: SlabDimensionField[] = ["netLength", "netHeight"];

export function SlabTable({ records, onCellChange, onAddRow, onRemoveRow }: SlabTableProps) {
  const numberCell = (index: number, field: SlabDimensionField, value: number) => (
    <td key={field} className="px-1 py-1">
      <input
        type="number"
        inputMode="decimal"
        className="input-cell"
        aria-label={`${field} row ${index + 1}`}
        value={value === 0 ? "" : String(value)}
        placeholder="0"
        onChange={(e) => onCellChange(index, field, e.target.value)}
      />
    </td>
  );

  return (
    <div className="overflow-x-auto">
      <table className="sheet-table">
        <thead>
          <tr>
            <th rowSpan={2}>S.NO</th>
            <th rowSpan={2}>SLAB NO</th>
            <th colSpan={3}>GROSS MEASUREMENT</th>
            <th colSpan={3}>NET MEASUREMENT</th>
            <th rowSpan={2} aria-label="Actions" />
          </tr>
          <tr className="sub">
            <th>L (cm)</th>
            <th>H (cm)</th>
            <th>AREA (m2)</th>
            <th>L (cm)</th>
            <th>H (cm)</th>
            <th>AREA (m2)</th>
          </tr>
        </thead>
        <tbody>
          {records.map((row, i) => (
            <tr key={i}>
              <td className="text-center text-stone-500">{i + 1}</td>
              <td className="px-1 py-1">
                <input
                  type="text"
                  className="input-cell font-semibold"
                  aria-label={`Slab no row ${i + 1}`}
                  maxLength={SLAB_ID_MAX_LENGTH}
                  value={row.id}
                  onChange={(e) => onCellChange(i, "id", e.target.value)}
                />
              </td>
              {GROSS.map((field) => numberCell(i, field, row[field]))}
              <td className="text-center font-semibold tabular-nums">{formatArea(row.grossArea)}</td>
              {NET.map((field) => numberCell(i, field, row[field]))}
              <td className="text-center font-semibold tabular-nums">{formatArea(row.netArea)}</td>
              <td className="px-1">
                <button type="button" className="btn btn-ghost" onClick={() => onRemoveRow(i)} aria-label={`Remove row ${i + 1}`}>
                  x
                </button>
              </td>
            </tr>
          ))}
        </tbody>
      </table>
      <button type="button" className="btn btn-secondary mt-3" onClick={onAddRow}>
        Add row
      </button>
    </div>
  );
}
