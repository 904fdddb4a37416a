// src/lib/stats.ts
import type { Cell, ColumnType, Dataset, NumericSummary } from "./types";

/** ======================= Type Coercion & Detection ======================= */

const NUMERIC_RE = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;
const INTEGER_RE = /^[-+]?\d+$/;
const DATE_RE =
  /^(?:\d{4}-\d{1,2}-\d{1,2}(?:[ T]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?|\d{1,2}\/\d{1,2}\/\d{4})$/;

export const MISSING_TOKENS = new Set(["", "NA", "N/A", "NaN", "nan", "null", "NULL", "None", "#N/A"]);

export function coerceValue(v: string | null | undefined): string | number | null {
  if (v === null || v === undefined) return null;
  const s = v.trim();
  if (MISSING_TOKENS.has(s)) return null;
  if (NUMERIC_RE.test(s)) {
    const n = Number(s);
    // ids past 2^53 stay text so distinct values never collapse
    if (INTEGER_RE.test(s) && !Number.isSafeInteger(n)) return s;
    return Number.isFinite(n) ? n : s;
  }
  return s;
}

export function isMissing(v: Cell | undefined): v is null | undefined {
  return v === null || v === undefined || (typeof v === "number" && Number.isNaN(v));
}

export function isDateString(v: string) {
  return DATE_RE.test(v) && !Number.isNaN(Date.parse(v));
}

/** Calendar year and month (1-12) as written, independent of the server's time zone. */
export function calendarParts(v: string): { year: number; month: number } | null {
  const iso = /^(\d{4})-(\d{1,2})-\d{1,2}/.exec(v);
  if (iso) return { year: Number(iso[1]), month: Number(iso[2]) };
  const us = /^(\d{1,2})\/\d{1,2}\/(\d{4})$/.exec(v);
  if (us) return { year: Number(us[2]), month: Number(us[1]) };
  return null;
}

/** ---- type inference ---- */
export function inferColumnType(values: Cell[]): ColumnType {
  let n = 0, d = 0, seen = 0;
  for (const v of values) {
    if (isMissing(v)) continue;
    seen++;
    if (typeof v === "object") return "unknown";
    if (typeof v === "number") n++;
    else if (typeof v === "string" && isDateString(v)) d++;
  }
  if (seen === 0) return "unknown";
  if (n === seen) return "numeric";
  if (d === seen) return "datetime";
  return "categorical";
}

export function columnValues(dataset: Pick<Dataset, "rows">, col: string): Cell[] {
  return dataset.rows.map((r) => r[col] ?? null);
}

export function numericValues(dataset: Pick<Dataset, "rows">, col: string): number[] {
  const out: number[] = [];
  for (const r of dataset.rows) {
    const v = r[col];
    if (typeof v === "number" && Number.isFinite(v)) out.push(v);
  }
  return out;
}

/** Stable key for equality of cells and rows. */
export function cellKey(v: Cell | undefined): string {
  return isMissing(v) ? "null" : JSON.stringify(v);
}

/** ======================= Basic Stats ======================= */

export function quantile(sortedNums: number[], q: number) {
  if (sortedNums.length === 0) return NaN;
  const pos = (sortedNums.length - 1) * q;
  const base = Math.floor(pos);
  const rest = pos - base;
  const next = sortedNums[base + 1];
  if (next !== undefined) return sortedNums[base] + rest * (next - sortedNums[base]);
  return sortedNums[base];
}

export function median(nums: number[]) {
  return quantile([...nums].sort((a, b) => a - b), 0.5);
}

export function mean(nums: number[]) {
  return nums.length ? nums.reduce((a, x) => a + x, 0) / nums.length : NaN;
}

export function stdev(nums: number[], m = mean(nums)) {
  if (nums.length <= 1) return 0;
  const v = nums.reduce((a, x) => a + (x - m) ** 2, 0) / (nums.length - 1);
  return Math.sqrt(v);
}

/** Most frequent non-missing value; ties go to the value seen first. */
export function mode(values: Cell[]): Cell {
  const counts = new Map<string, { value: Cell; count: number }>();
  for (const v of values) {
    if (isMissing(v)) continue;
    const k = cellKey(v);
    const entry = counts.get(k);
    if (entry) entry.count++;
    else counts.set(k, { value: v, count: 1 });
  }
  let best: { value: Cell; count: number } | null = null;
  for (const entry of counts.values()) {
    if (!best || entry.count > best.count) best = entry;
  }
  return best ? best.value : null;
}

export function summarize(nums: number[]): NumericSummary | null {
  const n = nums.length;
  if (!n) return null;
  const sorted = [...nums].sort((a, b) => a - b);
  const m = mean(nums);
  return {
    n,
    mean: m,
    median: quantile(sorted, 0.5),
    min: sorted[0],
    max: sorted[n - 1],
    stdev: stdev(nums, m),
    q1: quantile(sorted, 0.25),
    q3: quantile(sorted, 0.75),
  };
}

/** ======================= Associations ======================= */

export function pearson(xs: number[], ys: number[]) {
  const n = Math.min(xs.length, ys.length);
  if (n < 3) return NaN;
  const x = xs.slice(0, n), y = ys.slice(0, n);
  const mx = x.reduce((a, v) => a + v, 0) / n;
  const my = y.reduce((a, v) => a + v, 0) / n;
  let num = 0, dx2 = 0, dy2 = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - mx, dy = y[i] - my;
    num += dx * dy; dx2 += dx * dx; dy2 += dy * dy;
  }
  const den = Math.sqrt(dx2 * dy2);
  return den ? num / den : NaN;
}

/** Pairwise Pearson over rows where both cells are numeric. */
export function corrMatrix(dataset: Pick<Dataset, "rows">, cols: string[]) {
  const mat: number[][] = cols.map(() => cols.map(() => NaN));
  for (let i = 0; i < cols.length; i++) {
    for (let j = i; j < cols.length; j++) {
      if (i === j) { mat[i][j] = 1; continue; }
      const xs: number[] = [], ys: number[] = [];
      for (const r of dataset.rows) {
        const a = r[cols[i]], b = r[cols[j]];
        if (typeof a === "number" && typeof b === "number" && Number.isFinite(a) && Number.isFinite(b)) {
          xs.push(a); ys.push(b);
        }
      }
      mat[i][j] = mat[j][i] = pearson(xs, ys);
    }
  }
  return { cols, mat };
}

/** ======================= Density ======================= */

// Silverman's rule of thumb
export function bandwidth(nums: number[]) {
  const sorted = [...nums].sort((a, b) => a - b);
  const sd = stdev(nums);
  const iqr = quantile(sorted, 0.75) - quantile(sorted, 0.25);
  const spread = Math.min(sd, iqr / 1.34) || sd || Math.abs(sorted[0]) || 1;
  return 0.9 * spread * Math.pow(nums.length, -0.2);
}

export function gaussianKde(values: number[], points = 100) {
  const nums = values.filter(Number.isFinite);
  if (nums.length === 0) return { x: [] as number[], y: [] as number[] };
  const h = bandwidth(nums);
  let min = nums[0], max = nums[0];
  for (const v of nums) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  const lo = min - 3 * h;
  const hi = max + 3 * h;
  const step = (hi - lo) / (points - 1);
  const norm = 1 / (nums.length * h * Math.sqrt(2 * Math.PI));
  const x: number[] = [], y: number[] = [];
  for (let i = 0; i < points; i++) {
    const at = lo + i * step;
    let sum = 0;
    for (const v of nums) {
      const u = (at - v) / h;
      sum += Math.exp(-0.5 * u * u);
    }
    x.push(at);
    y.push(sum * norm);
  }
  return { x, y };
}

/** ======================= Frequencies ======================= */

export function categoryLabel(v: Cell): string {
  if (isMissing(v)) return "Unknown";
  return typeof v === "object" ? JSON.stringify(v) : String(v);
}

/** Top-k categories by count; the remainder is folded into "Other". */
export function topCategories(values: Cell[], k: number) {
  const counts = new Map<string, number>();
  for (const v of values) {
    const key = categoryLabel(v);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  const sorted = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  const top = sorted.slice(0, k).map(([name, count]) => ({ name, count }));
  const rest = sorted.slice(k).reduce((s, [, c]) => s + c, 0);
  if (rest > 0) top.push({ name: "Other", count: rest });
  return top;
}
