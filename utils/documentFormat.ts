// utils/documentFormat.ts
import type { DocumentFormat } from "@/types";

export const SUPPORTED_FORMATS: readonly DocumentFormat[] = ["pdf", "docx"];

/** Lower-cased text after the last dot; the whole name when there is none. */
export function extensionOf(filename: string): string {
  return filename.toLowerCase().split(".").pop() ?? "";
}

export function isSupportedFormat(ext: string): ext is DocumentFormat {
  return SUPPORTED_FORMATS.some((f) => f === ext);
}
