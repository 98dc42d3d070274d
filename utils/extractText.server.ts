// utils/extractText.server.ts
import mammoth from "mammoth";
import pdfParse, { type PdfPageData } from "pdf-parse/lib/pdf-parse.js";
import { extensionOf, isSupportedFormat, SUPPORTED_FORMATS } from "@/utils/documentFormat";
import { ExtractionError, UnsupportedFormatError } from "@/utils/errors";

/** Turns uploaded bytes into plain text. */
export interface TextExtractor {
  extract(filename: string, bytes: Uint8Array): Promise<string>;
}

/**
 * Reads the text of a PDF or DOCX. Pages (PDF) or paragraphs (DOCX) are
 * joined with "\n" and the result is trimmed; nothing else is normalized.
 *
 * Throws UnsupportedFormatError for any other extension and ExtractionError
 * when the reader rejects the bytes.
 */
export async function extractText(filename: string, bytes: Uint8Array): Promise<string> {
  const ext = extensionOf(filename);
  if (!isSupportedFormat(ext)) {
    throw new UnsupportedFormatError(ext, SUPPORTED_FORMATS);
  }

  try {
    const text = ext === "pdf" ? await extractTextFromPdf(bytes) : await extractTextFromDocx(bytes);
    return text.trim();
  } catch (e) {
    throw new ExtractionError(ext, e);
  }
}

export const documentTextExtractor: TextExtractor = { extract: extractText };

/* ───────────────────────── PDF ───────────────────────── */

async function extractTextFromPdf(bytes: Uint8Array): Promise<string> {
  const pages: string[] = [];
  // pdf.js re-wraps `.buffer` and ignores byteOffset, so hand it a fresh array
  await pdfParse(new Uint8Array(bytes), {
    pagerender: async (page) => {
      const text = await renderPage(page);
      pages.push(text);
      return text;
    },
  });
  return pages.join("\n");
}

/** Text items sharing a baseline are concatenated; a new baseline starts a new line. */
async function renderPage(page: PdfPageData): Promise<string> {
  const content = await page.getTextContent({
    normalizeWhitespace: false,
    disableCombineTextItems: false,
  });
  let lastY: number | undefined;
  let text = "";
  for (const item of content.items) {
    const y = item.transform[5];
    text += lastY === undefined || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

/* ───────────────────────── DOCX ──────────────────────── */

/**
 * mammoth ends every paragraph with a blank line; collapsing those gives one
 * paragraph per line.
 */
async function extractTextFromDocx(bytes: Uint8Array): Promise<string> {
  const { value } = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
  return value.replace(/\n\n/g, "\n");
}
