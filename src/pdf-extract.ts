import { execFile } from "node:child_process";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { promisify } from "node:util";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ExtractionMethodName } from "./outline-types.ts";
import type { ExtractedDocument, ExtractedFragment, ExtractedPage } from "./pdf-types.ts";
import { renderDocumentText } from "./text-lines.ts";

const execFileAsync = promisify(execFile);
const PDFTOTEXT_MAX_BUFFER = 64 * 1024 * 1024;

export interface TextExtractor {
  method: ExtractionMethodName;
  extract: (data: Uint8Array) => Promise<string>;
}

interface PdfTextItem {
  str: string;
  transform: number[];
  width: number;
}

export interface PdftotextDependencies {
  createWorkDir: () => Promise<string>;
  writeInput: (filePath: string, data: Uint8Array) => Promise<void>;
  runPdftotext: (args: string[]) => Promise<string>;
  removeWorkDir: (dirPath: string) => Promise<void>;
}

export function createPdfjsExtractor(): TextExtractor {
  return {
    method: "pdfjs",
    extract: async (data) => renderDocumentText(await extractDocumentFromBuffer(data)),
  };
}

export function createPdftotextExtractor(dependencies?: PdftotextDependencies): TextExtractor {
  const resolvedDependencies = dependencies ?? createDefaultPdftotextDependencies();
  return {
    method: "pdftotext",
    extract: (data) => extractWithPdftotext(data, resolvedDependencies),
  };
}

export async function extractDocumentFromBuffer(data: Uint8Array): Promise<ExtractedDocument> {
  // pdf.js may take ownership of the buffer; the fallback extractor still needs it.
  const pdf = await getDocument({ data: new Uint8Array(data), useSystemFonts: true }).promise;
  const pages: ExtractedPage[] = [];

  try {
    for (let i = 0; i < pdf.numPages; i++) {
      const page = await pdf.getPage(i + 1);
      const viewport = page.getViewport({ scale: 1 });
      const textContent = await page.getTextContent();
      pages.push({
        pageIndex: i,
        height: viewport.height,
        fragments: collectPageFragments(textContent.items),
      });
    }
    return { pages };
  } finally {
    await pdf.destroy();
  }
}

export function buildPdftotextArgs(inputPdfPath: string): string[] {
  return ["-enc", "UTF-8", inputPdfPath, "-"];
}

async function extractWithPdftotext(
  data: Uint8Array,
  dependencies: PdftotextDependencies,
): Promise<string> {
  const workDir = await dependencies.createWorkDir();
  try {
    const inputPdfPath = join(workDir, "input.pdf");
    await dependencies.writeInput(inputPdfPath, data);
    try {
      return await dependencies.runPdftotext(buildPdftotextArgs(inputPdfPath));
    } catch (error: unknown) {
      throw createExtractionError(error);
    }
  } finally {
    await dependencies.removeWorkDir(workDir);
  }
}

function createDefaultPdftotextDependencies(): PdftotextDependencies {
  return {
    createWorkDir: () => mkdtemp(join(tmpdir(), "outline2xlsx-")),
    writeInput: (filePath, data) => writeFile(filePath, data),
    runPdftotext: async (args) => {
      const { stdout } = await execFileAsync("pdftotext", args, {
        encoding: "utf8",
        maxBuffer: PDFTOTEXT_MAX_BUFFER,
      });
      return stdout;
    },
    removeWorkDir: (dirPath) => rm(dirPath, { recursive: true, force: true }),
  };
}

function collectPageFragments(items: unknown[]): ExtractedFragment[] {
  const fragments: ExtractedFragment[] = [];

  for (const item of items) {
    if (!isPdfTextItem(item)) continue;
    const fragment = toExtractedFragment(item);
    if (fragment) fragments.push(fragment);
  }

  return fragments;
}

function isPdfTextItem(item: unknown): item is PdfTextItem {
  return (
    typeof item === "object" &&
    item !== null &&
    "str" in item &&
    typeof item.str === "string" &&
    "transform" in item &&
    Array.isArray(item.transform) &&
    "width" in item &&
    typeof item.width === "number"
  );
}

function toExtractedFragment(item: PdfTextItem): ExtractedFragment | undefined {
  const text = normalizePdfText(item.str);
  if (!text) return undefined;
  return {
    text,
    x: item.transform[4],
    y: item.transform[5],
    fontSize: Math.hypot(item.transform[2], item.transform[3]),
    width: item.width,
  };
}

function normalizePdfText(text: string): string | undefined {
  const normalized = text.replace(/\s+/g, " ").trim();
  return normalized.length > 0 ? normalized : undefined;
}

export function createExtractionError(error: unknown): Error {
  const typed: NodeJS.ErrnoException & { stderr?: string } =
    error instanceof Error ? error : new Error(String(error));

  if (typed.code === "ENOENT") {
    return new Error(
      "pdftotext command not found. Install poppler to enable the fallback extractor.",
    );
  }

  const stderr = typed.stderr?.trim();
  const detail = stderr && stderr.length > 0 ? stderr : typed.message;

  return new Error(`pdftotext failed: ${detail}`);
}

export const pdfExtractInternals = {
  collectPageFragments,
  isPdfTextItem,
  toExtractedFragment,
  normalizePdfText,
};
