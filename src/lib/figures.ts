// src/lib/figures.ts
import type { Axis, ChartKind, ChartSpec, Figure, Trace } from "./types";
import { RenderError } from "./errors";

/* ---------------------- theme ---------------------- */

export const INK = "#1E1E1E";
export const NEON = "#39FF14";
const PAPER = "#FFFFFF";
const PLOT = "#f0f0f0";

const axis: Axis = { showgrid: true, gridcolor: INK, gridwidth: 1, linecolor: INK, linewidth: 2 };

function outlined(trace: Trace): Trace {
  if (trace.type === "heatmap" || trace.type === "table") return trace;
  return { ...trace, marker: { ...trace.marker, line: { width: 2, color: INK } } };
}

export function applyTheme(figure: Figure): Figure {
  return {
    data: figure.data.map(outlined),
    layout: {
      ...figure.layout,
      title: { ...figure.layout.title, font: { size: 20, family: "Inter, sans-serif", color: INK } },
      paper_bgcolor: PAPER,
      plot_bgcolor: PLOT,
      font: { family: "Courier New, monospace", color: INK },
      margin: { l: 40, r: 40, t: 60, b: 40 },
      xaxis: { ...axis, ...figure.layout.xaxis },
      yaxis: { ...axis, ...figure.layout.yaxis },
    },
  };
}

export function chart(
  kind: ChartKind,
  title: string,
  description: string,
  columns: string[],
  figure: Figure,
  source: ChartSpec["source"] = "standard",
): ChartSpec {
  return { kind, title, description, columns, source, figure: applyTheme(figure) };
}

/* ---------------------- builders ---------------------- */

const titled = (text: string) => ({ text });

export function histogramFigure(col: string, values: number[], title: string): Figure {
  return {
    data: [{ type: "histogram", x: values, name: col, marker: { color: NEON } }],
    layout: { title: titled(title), xaxis: { title: titled(col) }, yaxis: { title: titled("count") }, bargap: 0.05 },
  };
}

export function boxFigure(col: string, values: number[], title: string): Figure {
  return {
    data: [{ type: "box", y: values, name: col, boxpoints: "outliers", marker: { color: NEON } }],
    layout: { title: titled(title), yaxis: { title: titled(col) } },
  };
}

export function barFigure(col: string, counts: { name: string; count: number }[], title: string): Figure {
  return {
    data: [{ type: "bar", x: counts.map((c) => c.name), y: counts.map((c) => c.count), name: col, marker: { color: INK } }],
    layout: { title: titled(title), xaxis: { title: titled(col) }, yaxis: { title: titled("count") } },
  };
}

export function densityFigure(col: string, curve: { x: number[]; y: number[] }, title: string): Figure {
  return {
    data: [{
      type: "scatter", mode: "lines", x: curve.x, y: curve.y, name: col,
      fill: "tozeroy", line: { color: INK, width: 2 }, marker: { color: NEON },
    }],
    layout: { title: titled(title), xaxis: { title: titled(col) }, yaxis: { title: titled("density") }, showlegend: false },
  };
}

export function lineFigure(x: string, y: string, points: { x: number | string; y: number }[], title: string): Figure {
  return {
    data: [{
      type: "scatter", mode: "lines", x: points.map((p) => p.x), y: points.map((p) => p.y),
      name: y, line: { color: INK, width: 2 },
    }],
    layout: { title: titled(title), xaxis: { title: titled(x) }, yaxis: { title: titled(y) } },
  };
}

export function scatterFigure(x: string, y: string, points: { x: number; y: number }[], title: string): Figure {
  return {
    data: [{
      type: "scatter", mode: "markers", x: points.map((p) => p.x), y: points.map((p) => p.y),
      name: `${x} vs ${y}`, marker: { color: NEON },
    }],
    layout: { title: titled(title), xaxis: { title: titled(x) }, yaxis: { title: titled(y) } },
  };
}

export function heatmapFigure(cols: string[], mat: number[][], title: string): Figure {
  // undefined correlations (constant columns) render as blank cells
  const z = mat.map((row) => row.map((r) => (Number.isFinite(r) ? +r.toFixed(2) : null)));
  return {
    data: [{
      type: "heatmap", z, x: cols, y: cols,
      text: z.map((row) => row.map((r) => (r === null ? "" : r.toFixed(2)))), texttemplate: "%{text}",
      colorscale: "Viridis", zmin: -1, zmax: 1,
    }],
    layout: { title: titled(title) },
  };
}

export function tableFigure(header: string[], columns: (string | number)[][], title: string): Figure {
  return {
    data: [{
      type: "table",
      header: { values: header, fill: { color: INK }, font: { color: "white", size: 12 }, align: "left" },
      cells: { values: columns, fill: { color: PLOT }, font: { color: INK, size: 11 }, align: "left" },
    }],
    layout: { title: titled(title) },
  };
}

/* ---------------------- serialization ---------------------- */

/** JSON of exactly `{ data, layout }`, the shape Plotly.newPlot takes. */
export function serializeFigure(figure: Figure): string {
  if (!Array.isArray(figure.data) || figure.data.length === 0) {
    throw new RenderError("Figure has no traces.");
  }
  if (!figure.layout || typeof figure.layout !== "object") {
    throw new RenderError("Figure has no layout.");
  }
  try {
    return JSON.stringify({ data: figure.data, layout: figure.layout });
  } catch (e) {
    throw new RenderError("Figure is not serializable.", { cause: e });
  }
}
