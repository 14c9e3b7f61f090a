import { FIRST_DATA_ROW, HEADING_COLUMNS } from "./outline-types.ts";
import type { CellRange, HeadingColumn, OutlineRecord } from "./outline-types.ts";

export interface ValueRun {
  value: string;
  /** Zero-based index of the first value in the run. */
  start: number;
  /** Zero-based index of the last value in the run, inclusive. */
  end: number;
}

interface ComputeHierarchyMergesOptions {
  firstDataRow?: number;
}

/**
 * Splits a column into maximal runs of identical non-empty values. An empty
 * value closes the open run without starting one, so equal values on either
 * side of a gap come back as separate runs.
 */
export function findColumnRuns(values: readonly string[]): ValueRun[] {
  const runs: ValueRun[] = [];
  let open: ValueRun | undefined;

  values.forEach((value, index) => {
    if (value.trim().length === 0) {
      open = undefined;
      return;
    }
    if (open && open.value === value) {
      open.end = index;
      return;
    }
    open = { value, start: index, end: index };
    runs.push(open);
  });

  return runs;
}

export function computeHierarchyMerges(
  records: readonly OutlineRecord[],
  { firstDataRow = FIRST_DATA_ROW }: ComputeHierarchyMergesOptions = {},
): CellRange[] {
  const ranges: CellRange[] = [];

  for (const column of HEADING_COLUMNS) {
    const values = records.map((record) => headingValue(record, column));
    for (const run of findColumnRuns(values)) {
      if (run.end === run.start) continue;
      ranges.push({
        column,
        startRow: firstDataRow + run.start,
        endRow: firstDataRow + run.end,
      });
    }
  }

  return ranges;
}

function headingValue(record: OutlineRecord, column: HeadingColumn): string {
  switch (column) {
    case 1:
      return record.level1;
    case 2:
      return record.level2;
    case 3:
      return record.level3;
  }
}
