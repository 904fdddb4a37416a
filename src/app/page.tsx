// src/app/page.tsx
"use client";

import { useRef, useState } from "react";
import dynamic from "next/dynamic";
import html2canvas from "html2canvas";
import type { Data, Layout } from "plotly.js";

import type { AnalysisReport, SectionName, SerializedChart } from "@/lib/types";

// Plotly touches window on import
const Plot = dynamic(() => import("react-plotly.js"), { ssr: false });

type PlotlyFigure = { data: Data[]; layout: Partial<Layout> };

/* ------------------------- utils ------------------------- */
function parseFigure(chart: SerializedChart): PlotlyFigure | null {
  try {
    const fig: PlotlyFigure = JSON.parse(chart.json);
    return Array.isArray(fig.data) && fig.layout ? fig : null;
  } catch {
    return null;
  }
}

function cellText(v: unknown) {
  if (v === null || v === undefined) return "";
  return typeof v === "object" ? JSON.stringify(v) : String(v);
}

function ChartCard({ chart }: { chart: SerializedChart }) {
  const ref = useRef<HTMLDivElement>(null);
  const fig = parseFigure(chart);
  async function exportPNG() {
    if (!ref.current) return;
    const canvas = await html2canvas(ref.current);
    const link = document.createElement("a");
    link.download = `${chart.title.replace(/\s+/g, "_")}.png`;
    link.href = canvas.toDataURL();
    link.click();
  }
  return (
    <div className="rounded-xl border-2 border-ink bg-white p-3 space-y-2 shadow-brutal">
      <div className="flex items-center justify-between">
        <p className="text-sm font-semibold">{chart.title}</p>
        <button className="btn text-xs" onClick={() => void exportPNG()}>Export PNG</button>
      </div>
      <div ref={ref} style={{ width: "100%", height: 360 }}>
        {fig ? (
          <Plot
            data={fig.data}
            layout={{ ...fig.layout, autosize: true }}
            config={{ responsive: true, displaylogo: false }}
            style={{ width: "100%", height: "100%" }}
            useResizeHandler
          />
        ) : (
          <p className="text-sm">Chart could not be displayed.</p>
        )}
      </div>
      {chart.description && <p className="text-xs text-ink/80">{chart.description}</p>}
    </div>
  );
}

/* ------------------------- component ------------------------- */
type TabKey = "Upload" | "Preview" | "Univariate" | "Bivariate" | "Multivariate";

const SECTION_TABS: Record<Exclude<TabKey, "Upload" | "Preview">, SectionName> = {
  Univariate: "univariate",
  Bivariate: "bivariate",
  Multivariate: "multivariate",
};

export default function Home() {
  const [active, setActive] = useState<TabKey>("Upload");
  const [file, setFile] = useState<File | null>(null);
  const [report, setReport] = useState<AnalysisReport | null>(null);
  const [loading, setLoading] = useState(false);
  const [toast, setToast] = useState<string>("");
  const [dzHover, setDzHover] = useState(false);

  function showToast(msg: string) { setToast(msg); setTimeout(() => setToast(""), 2600); }

  function pickFile(f: File | undefined) {
    if (!f) return;
    setFile(f);
    setReport(null);
  }

  async function processData() {
    if (!file) return;
    setLoading(true);
    try {
      const form = new FormData();
      form.append("file", file);
      const res = await fetch("/api/upload", { method: "POST", body: form });
      const data = await res.json();
      if (!res.ok) { showToast(data?.error || `Upload failed (HTTP ${res.status})`); return; }
      setReport(data);
      setActive("Preview");
      showToast(data.ai?.status === "ai" ? "Analysis ready (with AI charts)" : "Analysis ready");
    } catch {
      showToast("Upload failed");
    } finally {
      setLoading(false);
    }
  }

  function clearAll() {
    setFile(null); setReport(null); setActive("Upload");
  }

  const columns = report?.preview.length ? Object.keys(report.preview[0]) : [];

  return (
    <div className="space-y-6">
      {/* Tabs */}
      <nav className="tabs sticky top-4 z-10">
        {(["Upload", "Preview", "Univariate", "Bivariate", "Multivariate"] as const).map((t) => (
          <button key={t} className="tab" data-active={active === t} disabled={t !== "Upload" && !report}
                  onClick={() => setActive(t)}>{t}</button>
        ))}
        <div className="ml-auto flex gap-2">
          <button className="btn" onClick={clearAll}>Reset</button>
        </div>
      </nav>

      {/* UPLOAD */}
      {active === "Upload" && (
        <section id="upload" className="card p-5">
          <h2 className="section-title mb-3">1) Upload Data</h2>
          <div
            className="dropzone"
            data-hover={dzHover}
            onDragOver={(e) => { e.preventDefault(); setDzHover(true); }}
            onDragLeave={() => setDzHover(false)}
            onDrop={(e) => { e.preventDefault(); setDzHover(false); pickFile(e.dataTransfer.files?.[0]); }}
          >
            <div className="space-y-2">
              <p className="text-sm">Drag & drop a CSV, JSON or XLSX file here</p>
              <p className="text-xs small-muted">or</p>
              <button className="btn" onClick={() => document.getElementById("fileInput")?.click()}>Browse</button>
              {file && <div className="file-pill" title={file.name}>{file.name} ({(file.size / 1024).toFixed(2)} KB)</div>}
            </div>
            <input id="fileInput" type="file" accept=".csv,.json,.xlsx,.xls" hidden
                   onChange={(e) => pickFile(e.target.files?.[0])} />
          </div>
          <div className="mt-4">
            <button className="btn btn-primary" disabled={!file || loading} onClick={() => void processData()}>
              {loading ? "Processing…" : "Analyse"}
            </button>
          </div>
        </section>
      )}

      {report && (
        <div className="grid gap-3 sm:grid-cols-4">
          <div className="stat"><p className="small-muted">Rows</p><p className="stat-value">{report.rows}</p></div>
          <div className="stat"><p className="small-muted">Clean score</p><p className="stat-value">{report.clean_score}%</p></div>
          <div className="stat"><p className="small-muted">Missing values</p><p className="stat-value">{report.missing_values}</p></div>
          <div className="stat"><p className="small-muted">Duplicates removed</p><p className="stat-value">{report.cleaning.duplicates_removed}</p></div>
        </div>
      )}

      {/* PREVIEW */}
      {active === "Preview" && report && (
        <section id="preview" className="card p-5">
          <h2 className="section-title mb-2">2) Cleaned Preview</h2>
          {report.cleaning.dropped_columns.length > 0 && (
            <p className="mb-2 text-sm">Dropped empty columns: <b>{report.cleaning.dropped_columns.join(", ")}</b></p>
          )}
          {report.ai.status !== "ai" && (
            <p className="mb-2 text-xs small-muted">
              {report.ai.status === "disabled" ? "AI suggestions are switched off." : "AI suggestions unavailable; showing standard charts."}
            </p>
          )}
          <div className="table-wrap">
            <table className="min-w-full text-sm">
              <thead className="sticky top-0 z-10">
                <tr className="bg-neon">
                  {columns.map((c) => (
                    <th key={c} className="border-2 border-ink px-3 py-2 text-left font-semibold">{c}</th>
                  ))}
                </tr>
              </thead>
              <tbody>
                {report.preview.map((row, i) => (
                  <tr key={i} className="odd:bg-white even:bg-surface">
                    {columns.map((c) => (
                      <td key={c} className="border-2 border-ink px-3 py-2">{cellText(row[c])}</td>
                    ))}
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
          <p className="mt-2 text-xs small-muted">Showing first {report.preview.length} rows.</p>
        </section>
      )}

      {/* SECTIONS */}
      {report && active !== "Upload" && active !== "Preview" && (() => {
        const charts = report.analysis_sections[SECTION_TABS[active]];
        return (
          <section id={SECTION_TABS[active]} className="card p-5 space-y-3">
            <h2 className="section-title">{active} analysis</h2>
            {charts.length === 0
              ? <p className="text-sm">No charts in this section.</p>
              : (
                <div className="grid gap-6 lg:grid-cols-2">
                  {charts.map((chart, idx) => <ChartCard key={`${chart.type}-${idx}`} chart={chart} />)}
                </div>
              )}
          </section>
        );
      })()}

      {toast && <div className="toast">{toast}</div>}
    </div>
  );
}
