"use client";

import { useCallback, useRef, useState } from "react";
import Image from "next/image";

interface ImageUploaderProps {
  label: string;
  helperText: string;
  /** Current image as a data URL, or null */
  value: string | null;
  onChange: (dataUrl: string | null) => void;
}

const ACCEPTED_MIME = new Set(["image/png", "image/jpeg", "image/jpg", "image/webp", "image/gif"]);
const MAX_BYTES = 8 * 1024 * 1024;

function readAsDataUrl(file: File): Promise<string> {
  return new Promise((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => {
      if (typeof reader.result === "string") resolve(reader.result);
      else reject(new Error("Could not read the image."));
    };
    reader.onerror = () => reject(new Error("Could not read the image."));
    reader.readAsDataURL(file);
  });
}

export function ImageUploader({ label, helperText, value, onChange }: ImageUploaderProps) {
  const [dragOver, setDragOver] = useState(false);
  const [reading, setReading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const fileInputRef = useRef<HTMLInputElement | null>(null);

  const processFiles = useCallback(
    async (files: FileList | null) => {
      const file = files?.[0];
      if (!file) return;
      setError(null);
      if (!ACCEPTED_MIME.has((file.type || "").toLowerCase())) {
        setError("Image must be PNG, JPG, WebP or GIF.");
        return;
      }
      if (file.size > MAX_BYTES) {
        setError("Image must be 8 MB or smaller.");
        return;
      }
      setReading(true);
      try {
        onChange(await readAsDataUrl(file));
      } catch (e) {
        setError(e instanceof Error ? e.message : "Could not read the image.");
      } finally {
        setReading(false);
      }
    },
    [onChange]
  );

  const onDrop = useCallback(
    (event: React.DragEvent<HTMLDivElement>) => {
      event.preventDefault();
      setDragOver(false);
      if (reading) return;
      void processFiles(event.dataTransfer.files);
    },
    [reading, processFiles]
  );

  const onDragOver = useCallback(
    (event: React.DragEvent<HTMLDivElement>) => {
      event.preventDefault();
      if (!reading) setDragOver(true);
    },
    [reading]
  );

  const onFileInputChange = useCallback(
    (event: React.ChangeEvent<HTMLInputElement>) => {
      const input = event.target;
      void processFiles(input.files).finally(() => {
        input.value = "";
      });
    },
    [processFiles]
  );

  return (
    <div>
      <p className="field-label">{label}</p>
      <div
        onDrop={onDrop}
        onDragOver={onDragOver}
        onDragLeave={() => setDragOver(false)}
        className={[
          "border border-dashed border-stone-300 bg-stone-50 p-3 transition-colors",
          dragOver ? "border-amber-500 bg-amber-50" : "",
          reading ? "opacity-70 pointer-events-none" : "",
        ].join(" ")}
      >
        <input
          ref={fileInputRef}
          type="file"
          accept=".png,.jpg,.jpeg,.webp,.gif,image/png,image/jpeg,image/webp,image/gif"
          className="hidden"
          onChange={onFileInputChange}
        />
        {value ? (
          <div className="flex items-center justify-between gap-3">
            <Image src={value} alt={`${label} preview`} className="max-h-16 w-auto object-contain" width={160} height={64} unoptimized />
            <div className="flex gap-2">
              <button type="button" className="btn btn-secondary" onClick={() => fileInputRef.current?.click()}>
                Replace
              </button>
              <button type="button" className="btn btn-danger" onClick={() => onChange(null)}>
                Remove
              </button>
            </div>
          </div>
        ) : (
          <div className="text-center">
            <button type="button" className="btn btn-secondary" onClick={() => fileInputRef.current?.click()}>
              {reading ? "Reading..." : "Choose image"}
            </button>
            <p className="mt-2 text-xs text-stone-500">or drop a file here</p>
          </div>
        )}
      </div>
      <p className="mt-1 text-xs text-stone-500">{helperText}</p>
      {error && <p className="mt-1 text-sm text-red-600">{error}</p>}
    </div>
  );
}
