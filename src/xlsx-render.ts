import ExcelJS from "exceljs";
import type { Alignment, Borders, Cell, Workbook, Worksheet } from "exceljs";
import { computeHierarchyMerges } from "./merge-ranges.ts";
import {
  COLUMN_WIDTHS,
  DEFAULT_SHEET_NAME,
  OUTLINE_HEADERS,
  ROW_HEIGHT,
} from "./outline-types.ts";
import type { CellRange, ConversionLogger, OutlineRecord } from "./outline-types.ts";

export interface RenderOutlineWorkbookOptions {
  sheetName?: string;
  logger?: ConversionLogger;
}

export interface SkippedMerge {
  range: CellRange;
  reference: string;
  message: string;
}

export interface SkippedCell {
  row: number;
  column: number;
  message: string;
}

export interface RenderedWorkbook {
  workbook: Workbook;
  worksheet: Worksheet;
  merges: CellRange[];
  appliedMerges: CellRange[];
  skippedMerges: SkippedMerge[];
  skippedCells: SkippedCell[];
}

const THIN_BORDER: Partial<Borders> = {
  top: { style: "thin" },
  left: { style: "thin" },
  bottom: { style: "thin" },
  right: { style: "thin" },
};

const CENTERED: Partial<Alignment> = { horizontal: "center", vertical: "middle", wrapText: true };
const TOP_LEFT: Partial<Alignment> = { horizontal: "left", vertical: "top", wrapText: true };
const HEADING_COLUMN_COUNT = 3;

export function renderOutlineWorkbook(
  records: readonly OutlineRecord[],
  { sheetName = DEFAULT_SHEET_NAME, logger = console }: RenderOutlineWorkbookOptions = {},
): RenderedWorkbook {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(sheetName);

  worksheet.columns = COLUMN_WIDTHS.map((width) => ({ width }));
  worksheet.addRow([...OUTLINE_HEADERS]);
  for (const record of records) {
    worksheet.addRow([record.level1, record.level2, record.level3, record.itemNo, record.itemDesc]);
  }

  const rowCount = records.length + 1;
  for (let row = 1; row <= rowCount; row++) {
    worksheet.getRow(row).height = ROW_HEIGHT;
  }

  const skippedCells = applyGridStyles(worksheet, rowCount, logger);
  const merges = computeHierarchyMerges(records);
  const { applied, skipped } = applyMergeRanges(worksheet, merges, logger);

  return {
    workbook,
    worksheet,
    merges,
    appliedMerges: applied,
    skippedMerges: skipped,
    skippedCells,
  };
}

/** Borders every cell of the five-column grid and aligns it by column role. */
export function applyGridStyles(
  worksheet: Pick<Worksheet, "getCell">,
  rowCount: number,
  logger: ConversionLogger = console,
): SkippedCell[] {
  const skipped: SkippedCell[] = [];

  for (let row = 1; row <= rowCount; row++) {
    for (let column = 1; column <= OUTLINE_HEADERS.length; column++) {
      try {
        styleCell(worksheet.getCell(row, column), row, column);
      } catch (error: unknown) {
        const message = describeError(error);
        logger.warn(`Error formatting cell ${row},${column}: ${message}`);
        skipped.push({ row, column, message });
      }
    }
  }

  return skipped;
}

/**
 * Applies precomputed merge ranges. A range the sheet rejects (for example one
 * overlapping an existing merge) is logged and skipped; the rest still apply.
 */
export function applyMergeRanges(
  worksheet: Pick<Worksheet, "getCell" | "mergeCells">,
  ranges: readonly CellRange[],
  logger: ConversionLogger = console,
): { applied: CellRange[]; skipped: SkippedMerge[] } {
  const applied: CellRange[] = [];
  const skipped: SkippedMerge[] = [];

  for (const range of ranges) {
    const reference = toRangeReference(range);
    try {
      worksheet.mergeCells(reference);
      worksheet.getCell(range.startRow, range.column).alignment = CENTERED;
      applied.push(range);
    } catch (error: unknown) {
      const message = describeError(error);
      logger.warn(`Error merging ${reference}: ${message}`);
      skipped.push({ range, reference, message });
    }
  }

  return { applied, skipped };
}

export async function serializeWorkbook(workbook: Workbook): Promise<Uint8Array> {
  const buffer = await workbook.xlsx.writeBuffer();
  return new Uint8Array(buffer);
}

export function toRangeReference(range: CellRange): string {
  const letter = toColumnLetter(range.column);
  return `${letter}${range.startRow}:${letter}${range.endRow}`;
}

function toColumnLetter(column: number): string {
  return String.fromCharCode("A".charCodeAt(0) + column - 1);
}

function styleCell(cell: Cell, row: number, column: number): void {
  cell.border = THIN_BORDER;
  if (row === 1) {
    cell.font = { bold: true, size: 11 };
    cell.alignment = CENTERED;
  } else if (column <= HEADING_COLUMN_COUNT) {
    cell.alignment = CENTERED;
  } else {
    cell.alignment = TOP_LEFT;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
