// src/lib/types.ts
export type Cell = string | number | boolean | null | object;

export type Table = { columns: string[]; rows: Record<string, Cell>[] };

export type ColumnType = "numeric" | "categorical" | "datetime" | "unknown";

export type Dataset = Table & { types: Record<string, ColumnType> };

export type NumericSummary = {
  n: number; mean: number; median: number; min: number; max: number;
  stdev: number; q1: number; q3: number;
};

export type CleaningReport = {
  rows: number;
  totalCells: number;
  missingBefore: number;
  missingAfter: number;
  missingByColumn: Record<string, number>;
  duplicatesRemoved: number;
  droppedColumns: string[];
  engineeredColumns: string[];
  cleanScore: number;
};

/** ======================= Plotly figure shape ======================= */

export type Marker = { color?: string; line?: { width: number; color: string } };

export type Trace =
  | { type: "histogram"; x: number[]; name: string; marker?: Marker }
  | { type: "box"; y: number[]; name: string; boxpoints: "outliers"; marker?: Marker }
  | { type: "bar"; x: string[]; y: number[]; name: string; marker?: Marker }
  | {
      type: "scatter"; mode: "lines" | "markers"; x: (number | string)[]; y: number[];
      name: string; fill?: "tozeroy"; line?: { color: string; width: number }; marker?: Marker;
    }
  | {
      type: "heatmap"; z: (number | null)[][]; x: string[]; y: string[]; text: string[][];
      texttemplate: string; colorscale: string; zmin: number; zmax: number;
    }
  | {
      type: "table";
      header: { values: string[]; fill: { color: string }; font: { color: string; size: number }; align: string };
      cells: { values: (string | number)[][]; fill: { color: string }; font: { color: string; size: number }; align: string };
    };

export type Axis = {
  title?: { text: string };
  showgrid?: boolean; gridcolor?: string; gridwidth?: number;
  linecolor?: string; linewidth?: number;
};

export type Layout = {
  title: { text: string; font?: { size: number; family: string; color: string } };
  xaxis?: Axis;
  yaxis?: Axis;
  paper_bgcolor?: string;
  plot_bgcolor?: string;
  font?: { family: string; color: string };
  margin?: { l: number; r: number; t: number; b: number };
  bargap?: number;
  showlegend?: boolean;
};

export type Figure = { data: Trace[]; layout: Layout };

/** ======================= Charts & report ======================= */

export type ChartKind = "histogram" | "box" | "bar" | "kde" | "line" | "scatter" | "heatmap" | "table";

export type ChartSpec = {
  kind: ChartKind;
  title: string;
  description: string;
  columns: string[];
  source: "standard" | "ai";
  figure: Figure;
};

export type SectionName = "univariate" | "bivariate" | "multivariate";

export type SerializedChart = { type: ChartKind; title: string; description: string; json: string };

export type AnalysisSections = Record<SectionName, SerializedChart[]>;

export type AiStatus = "ai" | "fallback" | "disabled";

export type AnalysisReport = {
  rows: number;
  clean_score: number;
  missing_values: number;
  analysis_sections: AnalysisSections;
  preview: Record<string, Cell>[];
  cleaning: {
    duplicates_removed: number;
    dropped_columns: string[];
    missing_after: number;
    engineered_columns: string[];
  };
  ai: { status: AiStatus; suggestions: number };
};

/** ======================= AI suggestions ======================= */

export type AIProfile = {
  rows: number;
  columns: {
    name: string;
    type: ColumnType;
    distinct: number;
    missing: number;
    numeric?: { min: number; max: number; mean: number };
  }[];
  datetimeColumns: string[];
};

export type ChartSuggestion =
  | { chartType: "kde"; columns: [string]; rationale: string }
  | { chartType: "line"; columns: [string, string]; rationale: string }
  | { chartType: "scatter"; columns: [string, string]; rationale: string }
  | { chartType: "heatmap"; columns: string[]; rationale: string };
