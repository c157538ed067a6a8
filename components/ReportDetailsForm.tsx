"use client";

import type { ReportMetadata } from "@/lib/measurement/schema";
import { REPORT_THEMES, REPORT_THEME_IDS, type ReportThemeId } from "@/lib/measurement/theme";

interface ReportDetailsFormProps {
  metadata: ReportMetadata;
  onMetadataChange: (field: keyof ReportMetadata, value: string) => void;
  swap: boolean;
  onSwapChange: (swap: boolean) => void;
  themeId: ReportThemeId;
  onThemeChange: (themeId: ReportThemeId) => void;
}

const TEXT_FIELDS: { field: keyof ReportMetadata; label: string; placeholder?: string; type?: string }[] = [
  { field: "materialName", label: "Material", placeholder: "Absolute Black" },
  { field: "invoiceNo", label: "Invoice no", placeholder: "EXP/2026/001" },
  { field: "inspectionDate", label: "Inspection date", type: "date" },
  { field: "thickness", label: "Thickness", placeholder: "2 cm" },
  { field: "containerNo", label: "Container no", placeholder: "MSKU 000000-0" },
  { field: "mineName", label: "Mine / block", placeholder: "Block 14" },
];

export function ReportDetailsForm({
  metadata,
  onMetadataChange,
  swap,
  onSwapChange,
  themeId,
  onThemeChange,
}: ReportDetailsFormProps) {
  return (
    <div className="grid grid-cols-1 sm:grid-cols-2 lg:grid-cols-3 gap-4">
      {TEXT_FIELDS.map(({ field, label, placeholder, type }) => (
        <label key={field} className="block">
          <span className="field-label">{label}</span>
          <input
            type={type ?? "text"}
            className="input"
            value={metadata[field]}
            placeholder={placeholder}
            onChange={(e) => onMetadataChange(field, e.target.value)}
          />
        </label>
      ))}
      <label className="block">
        <span className="field-label">Allowance (cm)</span>
        <input
          type="text"
          className="input"
          value={metadata.allowance}
          placeholder="-5 x 4"
          onChange={(e) => onMetadataChange("allowance", e.target.value)}
        />
        <span className="mt-1 flex items-center gap-2 text-xs text-stone-600">
          <input type="checkbox" checked={swap} onChange={(e) => onSwapChange(e.target.checked)} />
          First number is the length deduction
        </span>
      </label>
      <label className="block">
        <span className="field-label">Style</span>
        <select
          className="input"
          value={themeId}
          onChange={(e) => {
            const next = REPORT_THEME_IDS.find((id) => id === e.target.value);
            if (next) onThemeChange(next);
          }}
        >
          {REPORT_THEME_IDS.map((id) => (
            <option key={id} value={id}>
              {REPORT_THEMES[id].label}
            </option>
          ))}
        </select>
      </label>
    </div>
  );
}
