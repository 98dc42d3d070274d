// types/pdf-parse.d.ts
// The package entry runs a self-test when loaded outside a CommonJS parent,
// so the server imports the library file directly; @types/pdf-parse only
// covers the package root.
declare module "pdf-parse/lib/pdf-parse.js" {
  export interface PdfTextItem {
    str: string;
    transform: number[];
  }

  export interface PdfPageData {
    getTextContent(options?: {
      normalizeWhitespace?: boolean;
      disableCombineTextItems?: boolean;
    }): Promise<{ items: PdfTextItem[] }>;
  }

  export interface PdfParseOptions {
    pagerender?: (pageData: PdfPageData) => Promise<string> | string;
    max?: number;
    version?: string;
  }

  export interface PdfParseResult {
    numpages: number;
    numrender: number;
    info: unknown;
    metadata: unknown;
    text: string;
    version: string;
  }

  export default function pdfParse(
    dataBuffer: Buffer | Uint8Array,
    options?: PdfParseOptions
  ): Promise<PdfParseResult>;
}
