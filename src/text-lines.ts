import type { ExtractedDocument, ExtractedFragment, ExtractedPage, TextLine } from "./pdf-types.ts";
import {
  ESTIMATED_CHARACTER_WIDTH_RATIO,
  LINE_Y_BUCKET_SIZE,
  MAX_REASONABLE_Y_MULTIPLIER,
  PARAGRAPH_GAP_FONT_SIZE_RATIO,
  WORD_GAP_FONT_SIZE_RATIO,
} from "./pdf-types.ts";

/**
 * Rebuilds plain text from positioned fragments, one output line per baseline.
 * A vertical gap well beyond the line's font size becomes an empty line so
 * paragraph breaks survive extraction.
 */
export function renderDocumentText(document: ExtractedDocument): string {
  const output: string[] = [];

  for (const page of document.pages) {
    let previous: TextLine | undefined;
    for (const line of collectPageLines(page)) {
      if (previous && isParagraphGap(previous, line)) output.push("");
      output.push(line.text);
      previous = line;
    }
  }

  return output.join("\n");
}

function collectPageLines(page: ExtractedPage): TextLine[] {
  const lines: TextLine[] = [];

  for (const [bucket, fragments] of bucketFragments(page)) {
    const sorted = [...fragments].sort((left, right) => left.x - right.x);
    const text = joinFragments(sorted);
    if (text.length === 0) continue;

    lines.push({
      pageIndex: page.pageIndex,
      y: bucket,
      fontSize: Math.max(...sorted.map((f) => f.fontSize)),
      text,
    });
  }

  return lines.sort((left, right) => right.y - left.y);
}

function bucketFragments(page: ExtractedPage): Map<number, ExtractedFragment[]> {
  const buckets = new Map<number, ExtractedFragment[]>();
  for (const fragment of page.fragments) {
    if (fragment.y > page.height * MAX_REASONABLE_Y_MULTIPLIER) continue;
    const bucket = Math.round(fragment.y / LINE_Y_BUCKET_SIZE) * LINE_Y_BUCKET_SIZE;
    const existing = buckets.get(bucket);
    if (existing) {
      existing.push(fragment);
    } else {
      buckets.set(bucket, [fragment]);
    }
  }
  return buckets;
}

export function joinFragments(fragments: ExtractedFragment[]): string {
  let text = "";
  let previous: ExtractedFragment | undefined;

  for (const fragment of fragments) {
    if (previous && hasWordGap(previous, fragment)) text += " ";
    text += fragment.text;
    previous = fragment;
  }

  return normalizeSpacing(text);
}

function hasWordGap(left: ExtractedFragment, right: ExtractedFragment): boolean {
  const leftEnd = left.x + (left.width ?? estimateTextWidth(left.text, left.fontSize));
  const fontSize = Math.max(left.fontSize, right.fontSize, 1);
  return right.x - leftEnd > fontSize * WORD_GAP_FONT_SIZE_RATIO;
}

function isParagraphGap(previous: TextLine, current: TextLine): boolean {
  if (previous.pageIndex !== current.pageIndex) return false;
  const fontSize = Math.max(previous.fontSize, current.fontSize, 1);
  return previous.y - current.y > fontSize * PARAGRAPH_GAP_FONT_SIZE_RATIO;
}

export function normalizeSpacing(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function estimateTextWidth(text: string, fontSize: number): number {
  return text.length * fontSize * ESTIMATED_CHARACTER_WIDTH_RATIO;
}
