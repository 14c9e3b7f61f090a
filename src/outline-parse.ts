import { classifyLine, splitTextLines } from "./line-classify.ts";
import { BULLET_DESIGNATOR } from "./outline-types.ts";
import type {
  ClassifiedLine,
  HeadingLine,
  ListItemLine,
  OutlineContext,
  OutlineRecord,
  OutlineSummary,
} from "./outline-types.ts";

export function createOutlineContext(): OutlineContext {
  return { level1: "", level2: "", level3: "", pendingItem: undefined };
}

/**
 * Single-pass outline reader. Each instance owns its context, so separate
 * documents never share heading state or a half-built list item.
 */
export class OutlineParser {
  private readonly context: OutlineContext = createOutlineContext();
  private readonly records: OutlineRecord[] = [];

  feed(rawLine: string): void {
    this.apply(classifyLine(rawLine));
  }

  finish(): OutlineRecord[] {
    this.flushPendingItem();
    return [...this.records];
  }

  private apply(line: ClassifiedLine): void {
    switch (line.kind) {
      case "blank":
        this.flushPendingItem();
        return;
      case "heading1":
      case "heading2":
      case "heading3":
        this.flushPendingItem();
        this.enterHeading(line);
        return;
      case "numberedItem":
      case "bulletItem":
        this.flushPendingItem();
        this.startItem(line);
        return;
      case "continuation":
        // Free text outside a list item belongs to no record.
        if (this.context.pendingItem) {
          this.context.pendingItem.description += ` ${line.text}`;
        }
        return;
    }
  }

  private enterHeading(line: HeadingLine): void {
    const { context } = this;
    if (line.kind === "heading1") {
      context.level1 = line.text;
      context.level2 = "";
      context.level3 = "";
    } else if (line.kind === "heading2") {
      context.level2 = line.text;
      context.level3 = "";
    } else {
      context.level3 = line.text;
    }
    this.emit("", "");
  }

  private startItem(line: ListItemLine): void {
    this.context.pendingItem = {
      designator: line.designator,
      description: line.description,
    };
  }

  private flushPendingItem(): void {
    const { pendingItem } = this.context;
    if (!pendingItem) return;
    this.context.pendingItem = undefined;
    this.emit(pendingItem.designator, pendingItem.description.trim());
  }

  private emit(itemNo: string, itemDesc: string): void {
    const { level1, level2, level3 } = this.context;
    this.records.push(Object.freeze({ level1, level2, level3, itemNo, itemDesc }));
  }
}

export function parseOutline(input: string | Iterable<string>): OutlineRecord[] {
  const parser = new OutlineParser();
  const lines = typeof input === "string" ? splitTextLines(input) : input;
  for (const line of lines) {
    parser.feed(line);
  }
  return parser.finish();
}

export function summarizeOutline(records: readonly OutlineRecord[]): OutlineSummary {
  const summary: OutlineSummary = {
    heading1: 0,
    heading2: 0,
    heading3: 0,
    numberedItems: 0,
    bulletItems: 0,
  };

  for (const record of records) {
    if (record.itemNo === BULLET_DESIGNATOR) {
      summary.bulletItems += 1;
    } else if (record.itemNo.length > 0) {
      summary.numberedItems += 1;
    } else if (record.level3.length > 0) {
      summary.heading3 += 1;
    } else if (record.level2.length > 0) {
      summary.heading2 += 1;
    } else {
      summary.heading1 += 1;
    }
  }

  return summary;
}

export function formatOutlineSummary(summary: OutlineSummary): string {
  return [
    `${summary.heading1} level-1`,
    `${summary.heading2} level-2`,
    `${summary.heading3} level-3 heading(s)`,
    `${summary.numberedItems} numbered`,
    `${summary.bulletItems} bulleted item(s)`,
  ].join(", ");
}
