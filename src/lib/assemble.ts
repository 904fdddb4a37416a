// src/lib/assemble.ts
import type {
  AiStatus, AnalysisReport, AnalysisSections, Cell, ChartKind, ChartSpec, CleaningReport, Dataset, SectionName,
} from "./types";
import { RenderError } from "./errors";
import { serializeFigure } from "./figures";

const SECTION_OF: Record<ChartKind, SectionName> = {
  histogram: "univariate",
  box: "univariate",
  bar: "univariate",
  kde: "univariate",
  table: "univariate",
  line: "bivariate",
  scatter: "bivariate",
  heatmap: "multivariate",
};

export function sectionFor(kind: ChartKind): SectionName {
  return SECTION_OF[kind];
}

export function buildPreview(dataset: Dataset, limit: number): Record<string, Cell>[] {
  return dataset.rows.slice(0, limit).map((r) => {
    const out: Record<string, Cell> = {};
    for (const c of dataset.columns) out[c] = r[c] ?? null;
    return out;
  });
}

export type AssembleInput = {
  dataset: Dataset;
  report: CleaningReport;
  standard: ChartSpec[];
  ai: ChartSpec[];
  aiStatus: AiStatus;
  previewRows: number;
};

export function assembleReport({ dataset, report, standard, ai, aiStatus, previewRows }: AssembleInput): AnalysisReport {
  const sections: AnalysisSections = { univariate: [], bivariate: [], multivariate: [] };
  let aiPlaced = 0;

  for (const spec of [...standard, ...ai]) {
    let json: string;
    try {
      json = serializeFigure(spec.figure);
    } catch (e) {
      if (!(e instanceof RenderError)) throw e;
      console.warn(`[assemble] dropping chart "${spec.title}": ${e.message}`);
      continue;
    }
    sections[sectionFor(spec.kind)].push({ type: spec.kind, title: spec.title, description: spec.description, json });
    if (spec.source === "ai") aiPlaced++;
  }

  return {
    rows: report.rows,
    clean_score: report.cleanScore,
    missing_values: report.missingBefore,
    analysis_sections: sections,
    preview: buildPreview(dataset, previewRows),
    cleaning: {
      duplicates_removed: report.duplicatesRemoved,
      dropped_columns: report.droppedColumns,
      missing_after: report.missingAfter,
      engineered_columns: report.engineeredColumns,
    },
    ai: { status: aiStatus, suggestions: aiPlaced },
  };
}
