// src/lib/clean.ts
import type { Cell, CleaningReport, ColumnType, Dataset, Table } from "./types";
import { calendarParts, cellKey, columnValues, inferColumnType, isMissing, median, mode, numericValues } from "./stats";

const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

/** Mean string length above which a text column gets a `_Length` feature. */
const LONG_TEXT_CHARS = 10;

function countMissing(rows: Record<string, Cell>[], col: string) {
  let n = 0;
  for (const r of rows) if (isMissing(r[col])) n++;
  return n;
}

export function cleanScore(missing: number, totalCells: number) {
  if (totalCells <= 0) return 100;
  return Math.round(100 * (1 - missing / totalCells));
}

/** Removes exact-duplicate rows in place, keeping the first occurrence. */
export function dropDuplicates(dataset: Table) {
  const seen = new Set<string>();
  const before = dataset.rows.length;
  dataset.rows = dataset.rows.filter((r) => {
    const key = dataset.columns.map((c) => cellKey(r[c])).join("\u0001");
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
  return before - dataset.rows.length;
}

function fillValue(dataset: Dataset, col: string): Cell {
  if (dataset.types[col] === "numeric") return median(numericValues(dataset, col));
  return mode(columnValues(dataset, col));
}

export function imputeMissing(dataset: Dataset) {
  for (const col of dataset.columns) {
    if (countMissing(dataset.rows, col) === 0) continue;
    const fill = fillValue(dataset, col);
    for (const r of dataset.rows) {
      if (isMissing(r[col])) r[col] = fill;
    }
  }
}

/**
 * Deduplicates and imputes the table. The score and missing count describe the
 * upload as received; every other figure describes the cleaned dataset.
 */
export function cleanDataset(table: Table): { dataset: Dataset; report: CleaningReport } {
  const totalCells = table.rows.length * table.columns.length;
  const missingByColumn: Record<string, number> = {};
  let missingBefore = 0;
  for (const col of table.columns) {
    missingByColumn[col] = countMissing(table.rows, col);
    missingBefore += missingByColumn[col];
  }

  const droppedColumns = table.columns.filter((c) => missingByColumn[c] === table.rows.length);
  const columns = table.columns.filter((c) => !droppedColumns.includes(c));
  const rows = table.rows.map((r) => {
    const out: Record<string, Cell> = {};
    for (const c of columns) out[c] = r[c] ?? null;
    return out;
  });

  const types: Record<string, ColumnType> = {};
  for (const c of columns) types[c] = inferColumnType(rows.map((r) => r[c]));
  const dataset: Dataset = { columns, rows, types };

  let duplicatesRemoved = dropDuplicates(dataset);
  imputeMissing(dataset);
  // imputation can turn distinct rows into duplicates
  duplicatesRemoved += dropDuplicates(dataset);

  const missingAfter = columns.reduce((s, c) => s + countMissing(dataset.rows, c), 0);

  return {
    dataset,
    report: {
      rows: dataset.rows.length,
      totalCells,
      missingBefore,
      missingAfter,
      missingByColumn,
      duplicatesRemoved,
      droppedColumns,
      engineeredColumns: [],
      cleanScore: cleanScore(missingBefore, totalCells),
    },
  };
}

function addColumn(dataset: Dataset, name: string, type: ColumnType, values: Cell[]) {
  dataset.columns.push(name);
  dataset.types[name] = type;
  dataset.rows.forEach((r, i) => { r[name] = values[i]; });
}

/**
 * Derives calendar parts from datetime columns and a length feature from long
 * free-text columns. Returns the names of the added columns.
 */
export function engineerFeatures(dataset: Dataset): string[] {
  const added: string[] = [];
  const free = (name: string) => !dataset.columns.includes(name);

  for (const col of [...dataset.columns]) {
    const type = dataset.types[col];

    if (type === "datetime") {
      const dates = dataset.rows.map((r) => calendarParts(String(r[col])));
      if (free(`${col}_Year`)) {
        addColumn(dataset, `${col}_Year`, "numeric", dates.map((d) => (d ? d.year : null)));
        added.push(`${col}_Year`);
      }
      if (free(`${col}_Month`)) {
        addColumn(dataset, `${col}_Month`, "categorical", dates.map((d) => (d ? MONTHS[d.month - 1] ?? null : null)));
        added.push(`${col}_Month`);
      }
      continue;
    }

    if (type === "categorical") {
      const lengths = dataset.rows.map((r) => String(r[col]).length);
      const avg = lengths.reduce((a, x) => a + x, 0) / Math.max(1, lengths.length);
      if (avg > LONG_TEXT_CHARS && free(`${col}_Length`)) {
        addColumn(dataset, `${col}_Length`, "numeric", lengths);
        added.push(`${col}_Length`);
      }
    }
  }
  return added;
}
