// src/lib/charts.ts
import type { ChartSpec, Dataset } from "./types";
import { columnValues, corrMatrix, numericValues, summarize, topCategories } from "./stats";
import { barFigure, boxFigure, chart, heatmapFigure, histogramFigure, lineFigure, tableFigure } from "./figures";

export type StandardOptions = { topN: number };

const TREND_SERIES = 3;

export function columnsOfType(dataset: Dataset, type: Dataset["types"][string]) {
  return dataset.columns.filter((c) => dataset.types[c] === type);
}

// -------- builders --------
export function buildTimeSeries(dataset: Dataset, x: string, y: string) {
  return dataset.rows
    .map((r) => ({ t: Date.parse(String(r[x])), x: r[x], y: r[y] }))
    .filter((p): p is { t: number; x: string | number; y: number } =>
      (typeof p.x === "string" || typeof p.x === "number") &&
      typeof p.y === "number" && Number.isFinite(p.y) && !Number.isNaN(p.t))
    .sort((a, b) => a.t - b.t)
    .map(({ x: at, y: value }) => ({ x: at, y: value }));
}

export function buildDescribe(dataset: Dataset, cols: string[]) {
  const stats = ["count", "mean", "std", "min", "25%", "50%", "75%", "max"];
  const round = (v: number) => +v.toFixed(2);
  const columns = cols.map((c) => {
    const s = summarize(numericValues(dataset, c));
    if (!s) return stats.map(() => 0);
    return [s.n, s.mean, s.stdev, s.min, s.q1, s.median, s.q3, s.max].map(round);
  });
  return { header: ["stat", ...cols], columns: [stats, ...columns] };
}

/**
 * The standard suite: charts every upload gets regardless of content or of
 * whether the suggestion service answers.
 */
export function generateStandardCharts(dataset: Dataset, opts: StandardOptions): ChartSpec[] {
  const numCols = columnsOfType(dataset, "numeric");
  const catCols = columnsOfType(dataset, "categorical");
  const dateCols = columnsOfType(dataset, "datetime");

  for (const c of columnsOfType(dataset, "unknown")) {
    console.warn(`[charts] skipping "${c}": column type could not be determined`);
  }

  const out: ChartSpec[] = [];

  if (numCols.length) {
    const { header, columns } = buildDescribe(dataset, numCols);
    out.push(chart("table", "Descriptive Statistics", "Summary statistics for all numerical variables.",
      numCols, tableFigure(header, columns, "Descriptive Statistics")));
  }

  if (numCols.length > 1) {
    const { mat } = corrMatrix(dataset, numCols);
    out.push(chart("heatmap", "Correlation Matrix",
      "Correlation heatmap showing relationships between all numerical variables.",
      numCols, heatmapFigure(numCols, mat, "Feature Correlation")));
  }

  for (const col of numCols) {
    const values = numericValues(dataset, col);
    out.push(chart("histogram", `Dist: ${col}`, `Frequency distribution of ${col}.`,
      [col], histogramFigure(col, values, `Distribution: ${col}`)));
    out.push(chart("box", `Box: ${col}`, `Box plot identifying outliers in ${col}.`,
      [col], boxFigure(col, values, `Outliers: ${col}`)));
  }

  for (const col of catCols) {
    const counts = topCategories(columnValues(dataset, col), opts.topN);
    const capped = counts.some((c) => c.name === "Other") ? ` (top ${opts.topN}, rest as Other)` : "";
    out.push(chart("bar", `Count: ${col}`, `Count plot for ${col}${capped}.`,
      [col], barFigure(col, counts, `Count: ${col}`)));
  }

  const dateCol = dateCols[0];
  if (dateCol) {
    for (const val of numCols.slice(0, TREND_SERIES)) {
      const points = buildTimeSeries(dataset, dateCol, val);
      if (points.length < 2) continue;
      out.push(chart("line", `Trend: ${val}`, `Time series trend of ${val}.`,
        [dateCol, val], lineFigure(dateCol, val, points, `${val} over Time`)));
    }
  }

  return out;
}
