// components/UploadBox.tsx
"use client";

import React, { useRef, useState } from "react";
import { FileText, UploadCloud, X } from "lucide-react";
import type { UploadedFile } from "@/types";
import { extensionOf, isSupportedFormat, SUPPORTED_FORMATS } from "@/utils/documentFormat";

type Props = {
  uploadedFile: UploadedFile | null;
  onFileChange: (file: UploadedFile | null) => void;
};

const ACCEPT = [
  ".pdf",
  ".docx",
  "application/pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
].join(",");

function uid() {
  if (typeof crypto !== "undefined" && crypto.randomUUID) return crypto.randomUUID();
  return `f_${Date.now()}_${Math.random().toString(36).slice(2)}`;
}

export default function UploadBox({ uploadedFile, onFileChange }: Props) {
  const inputRef = useRef<HTMLInputElement | null>(null);
  const [err, setErr] = useState<string | null>(null);
  const [isOver, setIsOver] = useState(false);

  function accept(f: File | undefined) {
    setErr(null);
    if (!f) return;
    if (!isSupportedFormat(extensionOf(f.name))) {
      setErr(`Only ${SUPPORTED_FORMATS.map((s) => s.toUpperCase()).join(" or ")} files are supported.`);
      return;
    }
    onFileChange({
      id: uid(),
      name: f.name,
      type: f.type || "application/octet-stream",
      size: f.size,
      file: f,
    });
  }

  function onPick(e: React.ChangeEvent<HTMLInputElement>) {
    accept(e.target.files?.[0]);
    if (inputRef.current) inputRef.current.value = "";
  }

  function onDragOver(e: React.DragEvent) {
    e.preventDefault();
    setIsOver(true);
  }
  function onDragLeave(e: React.DragEvent) {
    e.preventDefault();
    setIsOver(false);
  }
  function onDrop(e: React.DragEvent) {
    e.preventDefault();
    setIsOver(false);
    accept(e.dataTransfer.files?.[0]);
  }

  return (
    <div className="rounded-xl border border-gray-200 bg-white">
      <input
        ref={inputRef}
        type="file"
        accept={ACCEPT}
        onChange={onPick}
        className="hidden"
      />

      <div
        onDragOver={onDragOver}
        onDragLeave={onDragLeave}
        onDrop={onDrop}
        className={[
          "p-6 border-b border-gray-200 transition",
          isOver ? "bg-violet-50" : "bg-white",
        ].join(" ")}
      >
        <div className="flex items-center justify-between gap-4">
          <div className="flex items-center gap-3">
            <UploadCloud className="h-6 w-6 text-violet-600" />
            <div>
              <div className="text-sm font-medium text-gray-900">
                Drag & drop a PDF or DOCX résumé here
              </div>
              <div className="text-xs text-gray-500">…or click the button to pick a file</div>
            </div>
          </div>

          <button
            type="button"
            onClick={() => inputRef.current?.click()}
            className="rounded-md bg-violet-600 px-4 py-2 text-sm font-semibold text-white hover:bg-violet-700"
          >
            Choose file
          </button>
        </div>
      </div>

      {err && <div className="px-4 py-2 text-sm text-red-600">{err}</div>}

      {uploadedFile ? (
        <div className="px-4 py-3 flex items-center justify-between">
          <div className="flex items-center gap-2 min-w-0">
            <FileText className="h-4 w-4 shrink-0 text-gray-500" />
            <div className="min-w-0">
              <p className="truncate text-sm font-medium text-gray-900">{uploadedFile.name}</p>
              <p className="text-xs text-gray-500">
                {uploadedFile.type} • {(uploadedFile.size / 1024).toFixed(1)} KB
              </p>
            </div>
          </div>
          <button
            type="button"
            onClick={() => onFileChange(null)}
            aria-label="Remove file"
            className="text-rose-600 hover:text-rose-700"
          >
            <X className="h-4 w-4" />
          </button>
        </div>
      ) : (
        <div className="px-4 py-6 text-sm text-gray-500">No résumé selected yet.</div>
      )}
    </div>
  );
}
