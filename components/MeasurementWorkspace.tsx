"use client";

import { useCallback, useMemo, useState } from "react";
import { Panel } from "@/components/Panel";
import { ImageUploader } from "@/components/ImageUploader";
import { PastePanel, type PasteSubmission } from "@/components/PastePanel";
import { ReportDetailsForm } from "@/components/ReportDetailsForm";
import { SlabTable } from "@/components/SlabTable";
import { TotalsStrip } from "@/components/TotalsStrip";
import { getDisplayErrorMessage, postSlabs, requestReport, saveBlob } from "@/lib/api";
import { todayIso } from "@/lib/format";
import { parseAllowance } from "@/lib/measurement/allowance";
import { EMPTY_REPORT_MESSAGE } from "@/lib/measurement/errors";
import { reportableSlabs } from "@/lib/measurement/slab-records";
import {
  addSlabRow,
  applyAllowanceToSet,
  createBlankSlabSet,
  removeSlabRow,
  updateSlabCell,
} from "@/lib/measurement/slab-set";
import { summarizeSlabs } from "@/lib/measurement/totals";
import type { ReportThemeId } from "@/lib/measurement/theme";
import type { ReportFormat, ReportMetadata, SlabEditableField, SlabRecordSet } from "@/lib/measurement/schema";
import type { SlabsRequest } from "@/lib/types";

interface MeasurementWorkspaceProps {
  defaultThemeId: ReportThemeId;
}

function initialMetadata(): ReportMetadata {
  return {
    materialName: "",
    invoiceNo: "",
    inspectionDate: todayIso(),
    thickness: "",
    containerNo: "",
    mineName: "",
    allowance: "",
  };
}

function toSlabsRequest(sub: PasteSubmission, allowance: string, swap: boolean): SlabsRequest {
  return sub.mode === "columns"
    ? { mode: "columns", lengths: sub.lengths, heights: sub.heights, allowance, swap }
    : { mode: "paste", text: sub.text, allowance, swap };
}

export function MeasurementWorkspace({ defaultThemeId }: MeasurementWorkspaceProps) {
  const [metadata, setMetadata] = useState<ReportMetadata>(initialMetadata);
  const [swap, setSwap] = useState(false);
  const [themeId, setThemeId] = useState<ReportThemeId>(defaultThemeId);
  const [records, setRecords] = useState<SlabRecordSet>(() => createBlankSlabSet());
  const [logo, setLogo] = useState<string | null>(null);
  const [signature, setSignature] = useState<string | null>(null);
  const [loadingRows, setLoadingRows] = useState(false);
  const [generating, setGenerating] = useState<ReportFormat | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [notice, setNotice] = useState<string | null>(null);

  const totals = useMemo(() => summarizeSlabs(reportableSlabs(records)), [records]);

  const onMetadataChange = useCallback((field: keyof ReportMetadata, value: string) => {
    setMetadata((prev) => ({ ...prev, [field]: value }));
  }, []);

  const onPaste = useCallback(
    async (sub: PasteSubmission) => {
      setError(null);
      setNotice(null);
      setLoadingRows(true);
      try {
        const res = await postSlabs(toSlabsRequest(sub, metadata.allowance, swap));
        setRecords(res.records);
        setNotice(`Loaded ${res.records.length} slab(s).`);
      } catch (e) {
        setError(getDisplayErrorMessage(e));
      } finally {
        setLoadingRows(false);
      }
    },
    [metadata.allowance, swap]
  );

  const onCellChange = useCallback((index: number, field: SlabEditableField, value: string) => {
    setRecords((prev) => updateSlabCell(prev, index, field, value));
  }, []);

  const onApplyAllowance = useCallback(() => {
    setRecords((prev) => applyAllowanceToSet(prev, parseAllowance(metadata.allowance, swap)));
  }, [metadata.allowance, swap]);

  const onGenerate = useCallback(
    async (format: ReportFormat) => {
      setError(null);
      setNotice(null);
      if (totals.slabCount === 0) {
        setError(EMPTY_REPORT_MESSAGE);
        return;
      }
      setGenerating(format);
      try {
        const { blob, fileName } = await requestReport(format, {
          metadata,
          records: [...records],
          theme: themeId,
          logo,
          signature,
        });
        saveBlob(blob, fileName);
        setNotice(`Downloaded ${fileName}.`);
      } catch (e) {
        setError(getDisplayErrorMessage(e));
      } finally {
        setGenerating(null);
      }
    },
    [logo, metadata, records, signature, themeId, totals.slabCount]
  );

  return (
    <main className="max-w-6xl mx-auto px-6 py-8 space-y-6">
      <Panel kicker="Step 1" title="Report details">
        <ReportDetailsForm
          metadata={metadata}
          onMetadataChange={onMetadataChange}
          swap={swap}
          onSwapChange={setSwap}
          themeId={themeId}
          onThemeChange={setThemeId}
        />
        <div className="mt-4 grid grid-cols-1 md:grid-cols-2 gap-4">
          <ImageUploader
            label="Logo"
            helperText="Printed centered above the company name. Uses the configured logo when empty."
            value={logo}
            onChange={setLogo}
          />
          <ImageUploader
            label="Signature"
            helperText="Printed above the authorized signatory line."
            value={signature}
            onChange={setSignature}
          />
        </div>
      </Panel>

      <Panel kicker="Step 2" title="Paste measurements">
        <PastePanel busy={loadingRows} onSubmit={(sub) => void onPaste(sub)} />
      </Panel>

      <Panel
        kicker="Step 3"
        title="Review slabs"
        actions={
          <button type="button" className="btn btn-secondary" onClick={onApplyAllowance}>
            Apply allowance to all rows
          </button>
        }
      >
        <SlabTable
          records={records}
          onCellChange={onCellChange}
          onAddRow={() => setRecords((prev) => addSlabRow(prev))}
          onRemoveRow={(index) => setRecords((prev) => removeSlabRow(prev, index))}
        />
      </Panel>

      <Panel kicker="Step 4" title="Totals and download">
        <TotalsStrip totals={totals} />
        <div className="mt-4 flex flex-wrap items-center gap-3">
          <button
            type="button"
            className="btn btn-primary"
            disabled={generating !== null}
            onClick={() => void onGenerate("pdf")}
          >
            {generating === "pdf" ? "Generating..." : "Generate PDF"}
          </button>
          <button
            type="button"
            className="btn btn-secondary"
            disabled={generating !== null}
            onClick={() => void onGenerate("xlsx")}
          >
            {generating === "xlsx" ? "Preparing..." : "Download XLSX"}
          </button>
        </div>
        {error && (
          <p role="alert" className="mt-3 text-sm text-red-600">
            {error}
          </p>
        )}
        {notice && <p className="mt-3 text-sm text-emerald-700">{notice}</p>}
      </Panel>
    </main>
  );
}
