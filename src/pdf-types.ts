export interface ExtractedDocument {
  pages: ExtractedPage[];
}

export interface ExtractedPage {
  pageIndex: number;
  height: number;
  fragments: ExtractedFragment[];
}

export interface ExtractedFragment {
  text: string;
  x: number;
  y: number;
  fontSize: number;
  /** Actual rendered width from the PDF engine (when available). */
  width?: number;
}

export interface TextLine {
  pageIndex: number;
  y: number;
  fontSize: number;
  text: string;
}

export const LINE_Y_BUCKET_SIZE = 2;
export const MAX_REASONABLE_Y_MULTIPLIER = 2.5;
export const WORD_GAP_FONT_SIZE_RATIO = 0.2;
export const PARAGRAPH_GAP_FONT_SIZE_RATIO = 1.8;
export const ESTIMATED_CHARACTER_WIDTH_RATIO = 0.52;
