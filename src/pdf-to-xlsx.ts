import { constants } from "node:fs";
import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join, parse, resolve } from "node:path";
import type { TextExtractor } from "./pdf-extract.ts";
import { formatOutlineSummary, parseOutline, summarizeOutline } from "./outline-parse.ts";
import {
  DEFAULT_OUTPUT_FILE_NAME,
  EMPTY_CONTENT_MESSAGE,
  TEXT_PREVIEW_LENGTH,
} from "./outline-types.ts";
import type {
  CellRange,
  ConversionLogger,
  ExtractionMethod,
  ExtractionMethodName,
  OutlineRecord,
} from "./outline-types.ts";
import { describeExtractionFailure, extractText, planExtraction } from "./text-extract.ts";
import { renderOutlineWorkbook, serializeWorkbook } from "./xlsx-render.ts";
import type { SkippedMerge } from "./xlsx-render.ts";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const DATA_URL_PREFIX_PATTERN = /^data:[^,]*;base64,/;

export interface ConvertPdfDataInput {
  /** Raw PDF bytes, or the same bytes base64-encoded (a `data:` URL prefix is accepted). */
  data: Uint8Array | string;
  fileName?: string;
  method?: ExtractionMethod;
  sheetName?: string;
}

export interface ConvertTextInput {
  text: string;
  fileName?: string;
  sheetName?: string;
}

export interface OutlineWorkbook {
  workbook: Uint8Array;
  records: OutlineRecord[];
  merges: CellRange[];
  skippedMerges: SkippedMerge[];
}

export type ConversionResult =
  | ({
      status: "success";
      fileName: string;
      outputFileName: string;
      method: ExtractionMethodName | "text";
    } & OutlineWorkbook)
  | { status: "empty"; message: string }
  | { status: "failed"; message: string };

export type Base64ConversionResult =
  | { success: true; excelDataBase64: string; fileName: string }
  | { error: string };

export interface ConversionDependencies {
  planExtraction: (method: ExtractionMethod) => TextExtractor[];
  logger: ConversionLogger;
}

export interface ConvertPdfToXlsxInput {
  inputPdfPath: string;
  outputXlsxPath?: string;
  method?: ExtractionMethod;
  sheetName?: string;
}

export interface ConvertPdfToXlsxResult {
  outputXlsxPath: string;
  recordCount: number;
  method: ExtractionMethodName | "text";
}

export interface ConvertTextFileToXlsxInput {
  inputTextPath: string;
  outputXlsxPath: string;
  sheetName?: string;
}

export interface FileConversionDependencies extends ConversionDependencies {
  assertReadableFile: (filePath: string) => Promise<void>;
  readInput: (filePath: string) => Promise<Uint8Array>;
  writeOutput: (filePath: string, data: Uint8Array) => Promise<void>;
}

export function getDefaultOutputFileName(fileName: string): string {
  const name = parse(fileName).name.trim();
  return name.length > 0 ? `${name}.xlsx` : DEFAULT_OUTPUT_FILE_NAME;
}

export function decodePdfPayload(data: Uint8Array | string): Uint8Array | undefined {
  if (typeof data !== "string") return data;
  const payload = data.trim().replace(DATA_URL_PREFIX_PATTERN, "").replace(/\s+/g, "");
  if (payload.length % 4 !== 0 || !BASE64_PATTERN.test(payload)) return undefined;
  return new Uint8Array(Buffer.from(payload, "base64"));
}

/**
 * Converts one PDF payload to an outline workbook. Every failure comes back as
 * a result; nothing escapes this boundary as an exception.
 */
export async function convertPdfData(
  { data, fileName = "", method = "auto", sheetName }: ConvertPdfDataInput,
  dependencies?: Partial<ConversionDependencies>,
): Promise<ConversionResult> {
  const resolvedDependencies = { ...createDefaultDependencies(), ...dependencies };
  const { logger } = resolvedDependencies;
  logger.info(`Processing PDF data for filename: ${fileName}`);

  const bytes = decodePdfPayload(data);
  if (!bytes) {
    return { status: "failed", message: "PDF payload is not valid base64." };
  }

  const extracted = await extractText(bytes, resolvedDependencies.planExtraction(method), logger);
  if (!extracted.ok) {
    return { status: "failed", message: describeExtractionFailure(extracted.failures) };
  }

  return buildConversionResult(
    { text: extracted.text, fileName, sheetName },
    extracted.method,
    logger,
  );
}

export async function convertTextToWorkbook(
  input: ConvertTextInput,
  logger: ConversionLogger = console,
): Promise<ConversionResult> {
  return buildConversionResult(input, "text", logger);
}

/** Mirrors the shape the desktop front end exchanges: base64 in, base64 out. */
export async function convertBase64Payload(
  pdfDataBase64: string,
  fileName = "",
  dependencies?: Partial<ConversionDependencies>,
): Promise<Base64ConversionResult> {
  const result = await convertPdfData({ data: pdfDataBase64, fileName }, dependencies);
  if (result.status !== "success") return { error: result.message };
  return {
    success: true,
    excelDataBase64: Buffer.from(result.workbook).toString("base64"),
    fileName,
  };
}

export async function convertPdfToXlsx(
  { inputPdfPath, outputXlsxPath, method = "auto", sheetName }: ConvertPdfToXlsxInput,
  dependencies?: Partial<FileConversionDependencies>,
): Promise<ConvertPdfToXlsxResult> {
  const resolvedDependencies = { ...createDefaultFileDependencies(), ...dependencies };
  const resolvedInputPdfPath = resolve(inputPdfPath);
  const fileName = parse(resolvedInputPdfPath).base;
  const resolvedOutputXlsxPath = resolve(
    outputXlsxPath ?? join(dirname(resolvedInputPdfPath), getDefaultOutputFileName(fileName)),
  );

  await resolvedDependencies.assertReadableFile(resolvedInputPdfPath);
  const data = await resolvedDependencies.readInput(resolvedInputPdfPath);

  const result = await convertPdfData({ data, fileName, method, sheetName }, resolvedDependencies);
  if (result.status !== "success") {
    throw new Error(result.message);
  }

  await resolvedDependencies.writeOutput(resolvedOutputXlsxPath, result.workbook);

  return {
    outputXlsxPath: resolvedOutputXlsxPath,
    recordCount: result.records.length,
    method: result.method,
  };
}

export async function convertTextFileToXlsx(
  { inputTextPath, outputXlsxPath, sheetName }: ConvertTextFileToXlsxInput,
  logger: ConversionLogger = console,
): Promise<ConvertPdfToXlsxResult> {
  const resolvedInputTextPath = resolve(inputTextPath);
  const resolvedOutputXlsxPath = resolve(outputXlsxPath);
  const text = await readFile(resolvedInputTextPath, "utf8");

  const result = await convertTextToWorkbook(
    { text, fileName: parse(resolvedInputTextPath).base, sheetName },
    logger,
  );
  if (result.status !== "success") {
    throw new Error(result.message);
  }

  await mkdir(dirname(resolvedOutputXlsxPath), { recursive: true });
  await writeFile(resolvedOutputXlsxPath, result.workbook);

  return {
    outputXlsxPath: resolvedOutputXlsxPath,
    recordCount: result.records.length,
    method: result.method,
  };
}

async function buildConversionResult(
  { text, fileName = "", sheetName }: ConvertTextInput,
  method: ExtractionMethodName | "text",
  logger: ConversionLogger,
): Promise<ConversionResult> {
  if (text.trim().length === 0) {
    return { status: "empty", message: EMPTY_CONTENT_MESSAGE };
  }

  logger.info(`Extracted text length: ${text.length} characters`);
  logger.info(`First ${TEXT_PREVIEW_LENGTH} characters of extracted text:\n${text.slice(0, TEXT_PREVIEW_LENGTH)}`);

  try {
    const records = parseOutline(text);
    logger.info(`Parsed ${records.length} data rows (${formatOutlineSummary(summarizeOutline(records))})`);

    const rendered = renderOutlineWorkbook(records, { sheetName, logger });
    if (rendered.skippedMerges.length > 0) {
      logger.warn(`Skipped ${rendered.skippedMerges.length} merge range(s)`);
    }

    return {
      status: "success",
      fileName,
      outputFileName: getDefaultOutputFileName(fileName),
      method,
      workbook: await serializeWorkbook(rendered.workbook),
      records,
      merges: rendered.appliedMerges,
      skippedMerges: rendered.skippedMerges,
    };
  } catch (error: unknown) {
    return { status: "failed", message: `Failed to build workbook: ${describeError(error)}` };
  }
}

async function assertReadableFile(filePath: string): Promise<void> {
  try {
    await access(filePath, constants.R_OK);
  } catch {
    throw new Error(`Cannot read input PDF: ${filePath}`);
  }
}

function createDefaultDependencies(): ConversionDependencies {
  return {
    planExtraction: (method) => planExtraction(method),
    logger: console,
  };
}

function createDefaultFileDependencies(): FileConversionDependencies {
  return {
    ...createDefaultDependencies(),
    assertReadableFile,
    readInput: async (filePath) => new Uint8Array(await readFile(filePath)),
    writeOutput: async (filePath, data) => {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, data);
    },
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
