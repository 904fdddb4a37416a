// src/lib/profile.ts
import type { AIProfile, CleaningReport, Dataset } from "./types";
import { cellKey, columnValues, numericValues, summarize } from "./stats";

const round4 = (v: number) => +v.toFixed(4);

/** Build compact profile for the LLM (no raw rows) */
export function buildAiProfile(dataset: Dataset, report: Pick<CleaningReport, "missingByColumn">): AIProfile {
  const columns: AIProfile["columns"] = dataset.columns.map((name) => {
    const type = dataset.types[name];
    const distinct = new Set(columnValues(dataset, name).map(cellKey)).size;
    const s = type === "numeric" ? summarize(numericValues(dataset, name)) : null;
    return {
      name,
      type,
      distinct,
      missing: report.missingByColumn[name] ?? 0,
      ...(s ? { numeric: { min: s.min, max: s.max, mean: round4(s.mean) } } : {}),
    };
  });

  return {
    rows: dataset.rows.length,
    columns,
    datetimeColumns: dataset.columns.filter((c) => dataset.types[c] === "datetime"),
  };
}
