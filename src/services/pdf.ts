// src/services/pdf.ts
// What: Contract for PDF text extraction.
// How: Injected into the orchestrator; no extractor ships with the vault.

export interface PdfExtraction {
  text: string;
  pageCount: number;
  metadata: Record<string, string>;
}

export interface PdfExtractor {
  extract(bytes: Uint8Array): Promise<PdfExtraction>;
}
