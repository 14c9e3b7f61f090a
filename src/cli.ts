#!/usr/bin/env tsx

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Command, Option } from "commander";
import { formatOutlineSummary, parseOutline, summarizeOutline } from "./outline-parse.ts";
import { DEFAULT_SHEET_NAME, EXTRACTION_METHODS } from "./outline-types.ts";
import type { ConversionLogger, ExtractionMethod } from "./outline-types.ts";
import { convertPdfToXlsx, convertTextFileToXlsx } from "./pdf-to-xlsx.ts";
import { describeExtractionFailure, extractText, planExtraction } from "./text-extract.ts";

interface OutputOptions {
  quiet?: boolean;
}

interface PdfOptions extends OutputOptions {
  method: ExtractionMethod;
}

interface WorkbookOptions extends OutputOptions {
  sheetName: string;
}

const program = new Command();

program
  .name("outline2xlsx")
  .description("Convert numbered outlines in PDF documents to spreadsheets")
  .showHelpAfterError();

program.action(() => {
  program.outputHelp();
});

program
  .command("pdf2xlsx")
  .description("Convert a PDF outline to an .xlsx workbook with merged heading cells")
  .argument("<pdfPath>", "Path to input PDF file")
  .argument("[outputXlsxPath]", "Path to output workbook (defaults to <pdf name>.xlsx beside the input)")
  .addOption(createMethodOption())
  .addOption(createSheetNameOption())
  .option("-q, --quiet", "Only print the result line")
  .action(async (pdfPath: string, outputXlsxPath: string | undefined, options: PdfOptions & WorkbookOptions) => {
    const conversion = await convertPdfToXlsx(
      {
        inputPdfPath: pdfPath,
        outputXlsxPath,
        method: options.method,
        sheetName: options.sheetName,
      },
      { logger: createLogger(options) },
    );

    console.log(
      `Generated ${conversion.recordCount} row(s) with ${conversion.method} at ${conversion.outputXlsxPath}`,
    );
  });

program
  .command("text2xlsx")
  .description("Convert already extracted outline text to an .xlsx workbook")
  .argument("<textPath>", "Path to input UTF-8 text file")
  .argument("<outputXlsxPath>", "Path to output workbook")
  .addOption(createSheetNameOption())
  .option("-q, --quiet", "Only print the result line")
  .action(async (textPath: string, outputXlsxPath: string, options: WorkbookOptions) => {
    const conversion = await convertTextFileToXlsx(
      { inputTextPath: textPath, outputXlsxPath, sheetName: options.sheetName },
      createLogger(options),
    );

    console.log(`Generated ${conversion.recordCount} row(s) at ${conversion.outputXlsxPath}`);
  });

program
  .command("pdf2outline")
  .description("Print the parsed outline records of a PDF as JSON")
  .argument("<pdfPath>", "Path to input PDF file")
  .addOption(createMethodOption())
  .option("-q, --quiet", "Do not print the summary line")
  .action(async (pdfPath: string, options: PdfOptions) => {
    // stdout carries the JSON, so diagnostics go to stderr.
    const logger: ConversionLogger = {
      info: (message) => {
        if (!options.quiet) console.error(message);
      },
      warn: (message) => console.error(message),
    };
    const data = new Uint8Array(await readFile(resolve(pdfPath)));
    const extracted = await extractText(data, planExtraction(options.method), logger);
    if (!extracted.ok) {
      throw new Error(describeExtractionFailure(extracted.failures));
    }

    const records = parseOutline(extracted.text);
    logger.info(`Parsed ${records.length} data rows (${formatOutlineSummary(summarizeOutline(records))})`);
    console.log(JSON.stringify(records, null, 2));
  });

function createMethodOption(): Option {
  return new Option("-m, --method <method>", "Text extraction method")
    .choices(EXTRACTION_METHODS)
    .default("auto")
    .env("PDF_EXTRACTION_METHOD");
}

function createSheetNameOption(): Option {
  return new Option("-s, --sheet-name <name>", "Worksheet name")
    .default(DEFAULT_SHEET_NAME)
    .env("OUTLINE_SHEET_NAME");
}

function createLogger({ quiet }: OutputOptions): ConversionLogger {
  return {
    info: (message) => {
      if (!quiet) console.log(message);
    },
    warn: (message) => console.error(message),
  };
}

void program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
