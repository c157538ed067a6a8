"use client";

import { useState } from "react";

export type PasteMode = "columns" | "paste";

export interface PasteSubmission {
  mode: PasteMode;
  lengths: string;
  heights: string;
  text: string;
}

interface PastePanelProps {
  busy: boolean;
  onSubmit: (submission: PasteSubmission) => void;
}

const MODES: { id: PasteMode; label: string; hint: string }[] = [
  { id: "columns", label: "Two columns", hint: "Paste gross lengths and gross heights, one value per line." },
  {
    id: "paste",
    label: "Excel rows",
    hint: "Paste rows of Slab No, Gross L, Gross H (and optionally Net L, Net H). A header row is skipped.",
  },
];

export function PastePanel({ busy, onSubmit }: PastePanelProps) {
  const [mode, setMode] = useState<PasteMode>("columns");
  const [lengths, setLengths] = useState("");
  const [heights, setHeights] = useState("");
  const [text, setText] = useState("");
  const active = MODES.find((m) => m.id === mode) ?? MODES[0];

  return (
    <div>
      <div className="flex gap-2 mb-3" role="tablist">
        {MODES.map((m) => (
          <button
            key={m.id}
            type="button"
            role="tab"
            aria-selected={m.id === mode}
            className={m.id === mode ? "btn btn-primary" : "btn btn-secondary"}
            onClick={() => setMode(m.id)}
          >
            {m.label}
          </button>
        ))}
      </div>
      <p className="text-xs text-stone-500 mb-2">{active.hint}</p>
      {mode === "columns" ? (
        <div className="grid grid-cols-2 gap-3">
          <label className="block">
            <span className="field-label">Gross length (cm)</span>
            <textarea className="input font-mono h-40" value={lengths} onChange={(e) => setLengths(e.target.value)} />
          </label>
          <label className="block">
            <span className="field-label">Gross height (cm)</span>
            <textarea className="input font-mono h-40" value={heights} onChange={(e) => setHeights(e.target.value)} />
          </label>
        </div>
      ) : (
        <textarea
          className="input font-mono h-40 w-full"
          value={text}
          placeholder={"RG-1\t280\t180\nRG-2\t290\t190"}
          onChange={(e) => setText(e.target.value)}
        />
      )}
      <div className="mt-3 flex justify-end">
        <button
          type="button"
          className="btn btn-primary"
          disabled={busy}
          onClick={() => onSubmit({ mode, lengths, heights, text })}
        >
          {busy ? "Reading..." : "Load into table"}
        </button>
      </div>
    </div>
  );
}
