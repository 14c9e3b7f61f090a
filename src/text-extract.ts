import { createPdfjsExtractor, createPdftotextExtractor } from "./pdf-extract.ts";
import type { TextExtractor } from "./pdf-extract.ts";
import type { ConversionLogger, ExtractionMethod, ExtractionMethodName } from "./outline-types.ts";

export interface ExtractionFailure {
  method: ExtractionMethodName;
  message: string;
}

export type ExtractionResult =
  | { ok: true; text: string; method: ExtractionMethodName }
  | { ok: false; failures: ExtractionFailure[] };

export interface ExtractorFactories {
  pdfjs: () => TextExtractor;
  pdftotext: () => TextExtractor;
}

const DEFAULT_FACTORIES: ExtractorFactories = {
  pdfjs: createPdfjsExtractor,
  pdftotext: () => createPdftotextExtractor(),
};

/**
 * pdf.js is the primary method and is always backed by pdftotext. Asking for
 * pdftotext explicitly skips pdf.js.
 */
export function planExtraction(
  method: ExtractionMethod,
  factories: ExtractorFactories = DEFAULT_FACTORIES,
): TextExtractor[] {
  if (method === "pdftotext") return [factories.pdftotext()];
  return [factories.pdfjs(), factories.pdftotext()];
}

export async function extractText(
  data: Uint8Array,
  extractors: readonly TextExtractor[],
  logger: ConversionLogger = console,
): Promise<ExtractionResult> {
  const failures: ExtractionFailure[] = [];

  for (const extractor of extractors) {
    try {
      const text = await extractor.extract(data);
      if (failures.length > 0) {
        logger.info(`Extracted text with ${extractor.method} after ${failures.length} failed attempt(s)`);
      }
      return { ok: true, text, method: extractor.method };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Error extracting text with ${extractor.method}: ${message}`);
      failures.push({ method: extractor.method, message });
    }
  }

  return { ok: false, failures };
}

export function describeExtractionFailure(failures: readonly ExtractionFailure[]): string {
  if (failures.length === 0) return "Failed to extract text from PDF: no extraction method available.";
  const details = failures.map((failure) => `${failure.method}: ${failure.message}`).join("; ");
  return `Failed to extract text from PDF: ${details}`;
}
