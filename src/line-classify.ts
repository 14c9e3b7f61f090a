import { BULLET_DESIGNATOR } from "./outline-types.ts";
import type { ClassifiedLine } from "./outline-types.ts";

// `.` also spans \r and the Unicode line separators; `\p{Nd}` takes any decimal digit.
const HEADING3_PATTERN = /^\p{Nd}+\.\p{Nd}+\.\p{Nd}+(?:\s+.+)?$/su;
const HEADING2_PATTERN = /^\p{Nd}+\.\p{Nd}+(?:\s+.+)?$/su;
const HEADING1_PATTERN = /^\p{Nd}+(?:\s+.+)?$/su;
const NUMBERED_ITEM_PATTERN = /^(\p{Nd}+)\.\s+(.+)$/su;
// • ‣ ● the Symbol-font private-use bullet, * - ·
const BULLET_ITEM_PATTERN = /^[ \t]*[\u2022\u2023\u25CF\uF0B7*\-\u00B7]\s*(.+)$/su;

type LineRule = (trimmed: string, raw: string) => ClassifiedLine | undefined;

/**
 * Classification rules in priority order; the first rule returning a value wins.
 *
 * Narrower numeric headings come before broader ones and every heading comes
 * before the list rules. A heading-shaped list line is therefore read as a
 * heading, and reordering this table changes parser output.
 *
 * Only the bullet rule looks at the raw line: the glyph has to sit at the
 * true start of the line, after spaces or tabs at most.
 */
const LINE_RULES: readonly LineRule[] = [
  (trimmed) => (trimmed.length === 0 ? { kind: "blank" } : undefined),
  (trimmed) => (HEADING3_PATTERN.test(trimmed) ? { kind: "heading3", text: trimmed } : undefined),
  (trimmed) => (HEADING2_PATTERN.test(trimmed) ? { kind: "heading2", text: trimmed } : undefined),
  (trimmed) => (HEADING1_PATTERN.test(trimmed) ? { kind: "heading1", text: trimmed } : undefined),
  (trimmed) => {
    const match = NUMBERED_ITEM_PATTERN.exec(trimmed);
    if (!match) return undefined;
    return { kind: "numberedItem", designator: match[1], description: match[2] };
  },
  (_trimmed, raw) => {
    const match = BULLET_ITEM_PATTERN.exec(raw);
    if (!match) return undefined;
    return { kind: "bulletItem", designator: BULLET_DESIGNATOR, description: match[1] };
  },
];

export function classifyLine(rawLine: string): ClassifiedLine {
  const trimmed = rawLine.trim();
  for (const rule of LINE_RULES) {
    const classified = rule(trimmed, rawLine);
    if (classified) return classified;
  }
  return { kind: "continuation", text: trimmed };
}

export function splitTextLines(text: string): string[] {
  return text.replace(/\f/g, "").split(/\r?\n/);
}
