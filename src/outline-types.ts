export type ExtractionMethodName = "pdfjs" | "pdftotext";
export type ExtractionMethod = "auto" | ExtractionMethodName;

export const EXTRACTION_METHODS: readonly ExtractionMethod[] = ["auto", "pdfjs", "pdftotext"];

export type ClassifiedLine =
  | { kind: "blank" }
  | { kind: "heading1"; text: string }
  | { kind: "heading2"; text: string }
  | { kind: "heading3"; text: string }
  | { kind: "numberedItem"; designator: string; description: string }
  | { kind: "bulletItem"; designator: typeof BULLET_DESIGNATOR; description: string }
  | { kind: "continuation"; text: string };

export type HeadingLine = Extract<ClassifiedLine, { kind: "heading1" | "heading2" | "heading3" }>;
export type ListItemLine = Extract<ClassifiedLine, { kind: "numberedItem" | "bulletItem" }>;

export interface PendingItem {
  designator: string;
  description: string;
}

export interface OutlineContext {
  level1: string;
  level2: string;
  level3: string;
  pendingItem: PendingItem | undefined;
}

export interface OutlineRecord {
  readonly level1: string;
  readonly level2: string;
  readonly level3: string;
  readonly itemNo: string;
  readonly itemDesc: string;
}

export interface OutlineSummary {
  heading1: number;
  heading2: number;
  heading3: number;
  numberedItems: number;
  bulletItems: number;
}

/** A contiguous block of rows in one heading column that renders as a single merged cell. */
export interface CellRange {
  column: HeadingColumn;
  startRow: number;
  endRow: number;
}

export type HeadingColumn = 1 | 2 | 3;

export interface ConversionLogger {
  info(message: string): void;
  warn(message: string): void;
}

export const BULLET_DESIGNATOR = "•";

export const OUTLINE_HEADERS = [
  "Level 1 Heading",
  "Level 2 Heading",
  "Level 3 Heading",
  "List Item No.",
  "List Item Description",
] as const;

export const HEADING_COLUMNS: readonly HeadingColumn[] = [1, 2, 3];
export const COLUMN_WIDTHS = [25, 30, 35, 8, 60] as const;
export const ROW_HEIGHT = 25;
export const FIRST_DATA_ROW = 2;
export const DEFAULT_SHEET_NAME = "Outline";
export const DEFAULT_OUTPUT_FILE_NAME = "outline.xlsx";
export const EMPTY_CONTENT_MESSAGE = "No text could be extracted from the PDF data.";
export const TEXT_PREVIEW_LENGTH = 500;
