// src/extraction/pdf-extractor.ts
import { normalizeText } from './text';

/** Text of every page, in page order. */
export async function extractPdfText(buffer: Buffer): Promise<string> {
  // loaded on first use so the parser only initialises when a PDF shows up
  const { default: pdfParse } = await import('pdf-parse');
  const data = await pdfParse(buffer);
  return normalizeText(data.text);
}
