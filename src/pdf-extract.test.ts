import { join } from "node:path";
import { describe, expect, it } from "vitest";

import {
  buildPdftotextArgs,
  createExtractionError,
  createPdftotextExtractor,
  pdfExtractInternals,
} from "./pdf-extract.ts";
import type { PdftotextDependencies } from "./pdf-extract.ts";

function createDependencies(overrides: Partial<PdftotextDependencies> = {}): {
  dependencies: PdftotextDependencies;
  written: Array<{ filePath: string; data: Uint8Array }>;
  observedArgs: string[][];
  removed: string[];
} {
  const written: Array<{ filePath: string; data: Uint8Array }> = [];
  const observedArgs: string[][] = [];
  const removed: string[] = [];

  return {
    written,
    observedArgs,
    removed,
    dependencies: {
      createWorkDir: async () => "/tmp/work",
      writeInput: async (filePath, data) => {
        written.push({ filePath, data });
      },
      runPdftotext: async (args) => {
        observedArgs.push(args);
        return "1 Intro\n• item\n";
      },
      removeWorkDir: async (dirPath) => {
        removed.push(dirPath);
      },
      ...overrides,
    },
  };
}

describe("buildPdftotextArgs", () => {
  it("asks pdftotext for UTF-8 text on stdout", () => {
    expect(buildPdftotextArgs("/tmp/work/input.pdf")).toEqual(["-enc", "UTF-8", "/tmp/work/input.pdf", "-"]);
  });
});

describe("createPdftotextExtractor", () => {
  it("runs pdftotext on a temporary copy and cleans up afterwards", async () => {
    const { dependencies, written, observedArgs, removed } = createDependencies();
    const data = new Uint8Array([1, 2, 3]);
    const extractor = createPdftotextExtractor(dependencies);

    expect(extractor.method).toBe("pdftotext");
    await expect(extractor.extract(data)).resolves.toBe("1 Intro\n• item\n");

    const inputPath = join("/tmp/work", "input.pdf");
    expect(written).toEqual([{ filePath: inputPath, data }]);
    expect(observedArgs).toEqual([["-enc", "UTF-8", inputPath, "-"]]);
    expect(removed).toEqual(["/tmp/work"]);
  });

  it("reports a missing binary and still removes the work directory", async () => {
    const { dependencies, removed } = createDependencies({
      runPdftotext: async () => {
        throw Object.assign(new Error("spawn pdftotext ENOENT"), { code: "ENOENT" });
      },
    });

    await expect(createPdftotextExtractor(dependencies).extract(new Uint8Array())).rejects.toThrow(
      "pdftotext command not found. Install poppler to enable the fallback extractor.",
    );
    expect(removed).toEqual(["/tmp/work"]);
  });
});

describe("createExtractionError", () => {
  it("prefers stderr output over the process error message", () => {
    const error = Object.assign(new Error("Command failed"), {
      stderr: "Syntax Error: Couldn't find trailer dictionary\n",
    });

    expect(createExtractionError(error).message).toBe(
      "pdftotext failed: Syntax Error: Couldn't find trailer dictionary",
    );
  });

  it("falls back to the error message when stderr is empty", () => {
    expect(createExtractionError(Object.assign(new Error("Command failed"), { stderr: "  " })).message).toBe(
      "pdftotext failed: Command failed",
    );
    expect(createExtractionError("boom").message).toBe("pdftotext failed: boom");
  });
});

describe("pdfExtractInternals", () => {
  it("accepts only positioned text items", () => {
    expect(pdfExtractInternals.isPdfTextItem({ str: "a", transform: [1, 0, 0, 1, 10, 20], width: 5 })).toBe(true);
    expect(pdfExtractInternals.isPdfTextItem({ type: "beginMarkedContent" })).toBe(false);
    expect(pdfExtractInternals.isPdfTextItem(null)).toBe(false);
  });

  it("normalizes item text and reads position and size from the transform", () => {
    expect(
      pdfExtractInternals.toExtractedFragment({
        str: "  Hello   world ",
        transform: [12, 0, 0, 12, 72, 700],
        width: 60,
      }),
    ).toEqual({ text: "Hello world", x: 72, y: 700, fontSize: 12, width: 60 });
  });

  it("drops whitespace-only and marked-content items", () => {
    const fragments = pdfExtractInternals.collectPageFragments([
      { str: " ", transform: [10, 0, 0, 10, 50, 700], width: 3 },
      { type: "endMarkedContent" },
      { str: "1 Intro", transform: [10, 0, 0, 10, 50, 700], width: 30 },
    ]);

    expect(fragments.map((f) => f.text)).toEqual(["1 Intro"]);
  });
});
