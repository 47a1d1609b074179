export interface PositionedWord {
  text: string;
  x0: number;
  x1: number;
  top: number;
}

export interface TableDetectorOptions {
  pageWidth: number;
  yTolerance?: number;
  columnGap?: number;
  globalColumnGap?: number;
  alignTolerance?: number;
  minTableDensity?: number;
  maxColumns?: number;
}

/** A page, top to bottom: plain lines and the column-aligned regions between them. */
export type PageRegion =
  | { kind: "line"; text: string }
  | { kind: "table"; rows: string[][] };

interface RowInfo {
  words: PositionedWord[];
  text: string;
  isParagraph: boolean;
  numColumns: number;
  isTableRow: boolean;
  alignedCount: number;
}

interface Thresholds {
  columnGap: number;
  globalColumnGap: number;
  alignTolerance: number;
}

/**
 * Column gaps adapt to the page: intra-cell gaps are small and column
 * separators large, so the split sits at the 65th percentile of all gaps.
 */
function thresholds(gaps: number[], options: TableDetectorOptions): Thresholds {
  const { columnGap, globalColumnGap, alignTolerance } = options;
  if (columnGap !== undefined) {
    return {
      columnGap,
      globalColumnGap: globalColumnGap ?? Math.max(columnGap * 0.6, 8),
      alignTolerance: alignTolerance ?? columnGap * 0.8,
    };
  }
  if (gaps.length > 0) {
    const sorted = [...gaps].sort((a, b) => a - b);
    const p65 = sorted[Math.floor(sorted.length * 0.65)] ?? 0;
    const gap = Math.max(p65 * 1.2, 8);
    return {
      columnGap: gap,
      globalColumnGap: globalColumnGap ?? Math.max(gap * 0.6, 6),
      alignTolerance: alignTolerance ?? Math.max(gap * 1.5, 15),
    };
  }
  return {
    columnGap: 50,
    globalColumnGap: globalColumnGap ?? 30,
    alignTolerance: alignTolerance ?? 40,
  };
}

function groupRows(words: PositionedWord[], yTolerance: number): PositionedWord[][] {
  const rowsByY = new Map<number, PositionedWord[]>();
  for (const w of words) {
    const yKey = Math.round(w.top / yTolerance) * yTolerance;
    const row = rowsByY.get(yKey) ?? [];
    row.push(w);
    rowsByY.set(yKey, row);
  }
  return [...rowsByY.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, row]) => row.sort((a, b) => a.x0 - b.x0));
}

function gapsOf(row: PositionedWord[]): number[] {
  const gaps: number[] = [];
  for (let i = 1; i < row.length; i++) {
    const prev = row[i - 1];
    const word = row[i];
    if (!prev || !word) continue;
    const gap = word.x0 - prev.x1;
    if (gap > 0) gaps.push(gap);
  }
  return gaps;
}

/**
 * Finds column-aligned regions among positioned words. Returns null when the
 * page has no table, or when too few rows align to call it one.
 */
export function detectTables(
  words: PositionedWord[],
  options: TableDetectorOptions,
): PageRegion[] | null {
  const { pageWidth, yTolerance = 5, minTableDensity = 0.2, maxColumns = 30 } = options;
  if (words.length === 0) return null;

  const physicalRows = groupRows(words, yTolerance);
  const { columnGap, globalColumnGap, alignTolerance } = thresholds(
    physicalRows.flatMap(gapsOf),
    options,
  );

  const rows: RowInfo[] = physicalRows.map((rowWords) => {
    const text = rowWords.map((w) => w.text).join(" ");
    const first = rowWords[0];
    const last = rowWords[rowWords.length - 1];
    const lineWidth = first && last ? last.x1 - first.x0 : 0;
    const xGroups = clusterPositions(rowWords.map((w) => w.x0), columnGap);

    // Paragraph lines have uniform word gaps; table rows vary even when dense.
    const rowGaps = gapsOf(rowWords);
    const gapRange = rowGaps.length > 1 ? Math.max(...rowGaps) - Math.min(...rowGaps) : 0;
    const uniformGapThreshold = Math.max(columnGap * 0.25, 10);

    return {
      words: rowWords,
      text,
      isParagraph:
        lineWidth > pageWidth * 0.55 &&
        text.length > 60 &&
        (rowWords.length <= 2 || gapRange < uniformGapThreshold),
      numColumns: xGroups.length,
      isTableRow: false,
      alignedCount: 0,
    };
  });

  // Global columns: x positions that recur across candidate rows, so that a
  // header spanning two data columns does not merge them.
  const candidates = rows.filter((row) => row.numColumns >= 3 && !row.isParagraph);
  if (candidates.length === 0) return null;
  const minFrequency = Math.max(Math.ceil(candidates.length * 0.3), 2);
  const frequentPositions = findFrequentPositions(
    candidates.flatMap((row) => row.words.map((w) => w.x0)),
    Math.max(yTolerance, 5),
    minFrequency,
  );
  if (frequentPositions.length === 0) return null;

  const globalColumns = clusterPositions(frequentPositions, globalColumnGap);
  if (globalColumns.length > maxColumns) return null;

  // With many columns almost any short line aligns somewhere.
  const minAligned = Math.max(2, Math.ceil(globalColumns.length * 0.25));
  for (const row of rows) {
    if (row.isParagraph) continue;
    row.alignedCount = row.words.filter((word) =>
      globalColumns.some((x) => Math.abs(word.x0 - x) < alignTolerance),
    ).length;
    if (row.alignedCount >= minAligned) row.isTableRow = true;
  }
  if (minAligned > 2) promoteSparseRows(rows);

  const tableRowCount = rows.filter((r) => r.isTableRow).length;
  if (tableRowCount / rows.length < minTableDensity) return null;

  const regions: PageRegion[] = [];
  const colBuffer = Math.max(globalColumnGap * 0.5, 4);
  let i = 0;
  while (i < rows.length) {
    const row = rows[i];
    if (!row) break;
    if (!row.isTableRow) {
      if (row.text.trim()) regions.push({ kind: "line", text: row.text.trim() });
      i++;
      continue;
    }

    const cells: string[][] = [];
    while (i < rows.length) {
      const current = rows[i];
      if (!current?.isTableRow) break;
      cells.push(assignColumns(current.words, globalColumns, colBuffer));
      i++;
    }
    const merged = mergeLogicalRows(cells);
    if (merged.length > 0) regions.push({ kind: "table", rows: merged });
  }

  return regions.length > 0 ? regions : null;
}

/**
 * Sparse sub-header rows may align with too few columns to pass the
 * threshold; they still belong to a table they sit inside.
 */
function promoteSparseRows(rows: RowInfo[]): void {
  const maxGap = 3;
  const near = (from: number, step: 1 | -1): boolean => {
    for (let k = 1; k <= maxGap; k++) {
      const row = rows[from + k * step];
      if (!row || row.isParagraph) return false;
      if (row.isTableRow) return true;
    }
    return false;
  };
  rows.forEach((row, idx) => {
    if (row.isTableRow || row.isParagraph || row.alignedCount < 2) return;
    if (near(idx, -1) && near(idx, 1)) row.isTableRow = true;
  });
}

function assignColumns(words: PositionedWord[], columns: number[], buffer: number): string[] {
  const cells = new Array<string>(columns.length).fill("");
  for (const word of words) {
    let col = columns.length - 1;
    for (let c = 0; c < columns.length - 1; c++) {
      const next = columns[c + 1];
      if (next !== undefined && word.x0 < next - buffer) {
        col = c;
        break;
      }
    }
    cells[col] = cells[col] ? `${cells[col]} ${word.text}` : word.text;
  }
  return cells;
}

/**
 * Merges physical rows into logical ones when cell content wraps: a row joins
 * the buffer when no column overlaps, or when it fills fewer than half as
 * many columns.
 */
function mergeLogicalRows(rows: string[][]): string[][] {
  const [first, ...rest] = rows;
  if (!first) return [];

  const result: string[][] = [];
  let buffer = first.slice();
  for (const row of rest) {
    const bufferFilled = buffer.filter((c) => c !== "").length;
    const newFilled = row.filter((c) => c !== "").length;
    const overlap = row.filter((c, i) => c !== "" && buffer[i] !== "").length;

    if (overlap === 0 || newFilled < bufferFilled * 0.5) {
      buffer = buffer.map((cell, i) => {
        const extra = row[i] ?? "";
        if (!extra) return cell;
        return cell ? `${cell} ${extra}` : extra;
      });
    } else {
      result.push(buffer);
      buffer = row.slice();
    }
  }
  result.push(buffer);
  return result;
}

/** Median of each group of nearby positions that occurs at least `minCount` times. */
function findFrequentPositions(positions: number[], tolerance: number, minCount: number): number[] {
  const sorted = [...positions].sort((a, b) => a - b);
  const groups: number[][] = [];
  let previous: number | undefined;
  for (const position of sorted) {
    const group = groups[groups.length - 1];
    if (group && previous !== undefined && position - previous <= tolerance) group.push(position);
    else groups.push([position]);
    previous = position;
  }
  return groups
    .filter((g) => g.length >= minCount)
    .map((g) => g[Math.floor(g.length / 2)] ?? 0);
}

function clusterPositions(positions: number[], gap: number): number[] {
  const sorted = [...positions].sort((a, b) => a - b);
  const clusters: number[] = [];
  let previous: number | undefined;
  for (const position of sorted) {
    if (previous === undefined || position - previous > gap) clusters.push(position);
    previous = position;
  }
  return clusters;
}
