// src/lib/suggestions.ts
import OpenAI from "openai";
import { z } from "zod";
import type { AIProfile, AiStatus, ChartSpec, ChartSuggestion, Dataset } from "./types";
import type { AiConfig } from "./config";
import { aiEnabled } from "./config";
import { AIServiceError } from "./errors";
import { corrMatrix, gaussianKde, numericValues } from "./stats";
import { buildTimeSeries, columnsOfType } from "./charts";
import { chart, densityFigure, heatmapFigure, lineFigure, scatterFigure } from "./figures";

/* ---------------------- transport ---------------------- */

export type CompletionRequest = { system: string; user: string; signal: AbortSignal };

/** Text in, text out. The only seam between the pipeline and the hosted model. */
export interface CompletionClient {
  complete(req: CompletionRequest): Promise<string>;
}

export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(private readonly ai: Pick<AiConfig, "model" | "baseURL" | "timeoutMs"> & { apiKey: string }) {
    this.client = new OpenAI({ apiKey: ai.apiKey, baseURL: ai.baseURL, timeout: ai.timeoutMs, maxRetries: 0 });
  }

  async complete({ system, user, signal }: CompletionRequest) {
    const resp = await this.client.chat.completions.create(
      {
        model: this.ai.model,
        temperature: 0.2,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: system },
          { role: "user", content: user },
        ],
      },
      { signal },
    );
    return resp.choices[0]?.message?.content ?? "";
  }
}

/* ---------------------- prompt ---------------------- */

export function instructionFor(maxSuggestions: number) {
  return [
    "You are an expert data scientist choosing deep-dive charts for a dataset.",
    "You will receive a compact JSON profile: row count, and per column its name, type (numeric, categorical, datetime), distinct count, and min/max/mean for numeric columns.",
    "Return a JSON OBJECT ONLY (no prose outside JSON):",
    "{",
    '  "suggestions": [{ "chart_type": string, "columns": string[], "rationale": string }]',
    "}",
    'Allowed chart_type values: "kde", "line", "heatmap", "scatter".',
    '- "kde": exactly one numeric column (density estimate).',
    '- "line": [x, y] where x is a datetime column and y is numeric (time series).',
    '- "scatter": two numeric columns.',
    '- "heatmap": two or more numeric columns for a correlation heatmap, or [] for all of them.',
    `Use only column names from the profile. At most ${maxSuggestions} suggestions. Keep each rationale to one or two sentences.`,
  ].join("\n");
}

/* ---------------------- decode ---------------------- */

const CHART_TYPES = ["kde", "line", "time_series", "time-series", "heatmap", "scatter"] as const;

const itemSchema = z.object({
  chart_type: z.string().trim().toLowerCase().pipe(z.enum(CHART_TYPES)),
  columns: z.array(z.string().trim()).default([]),
  rationale: z.string().trim().default(""),
});

const envelopeSchema = z.union([
  z.array(z.unknown()),
  z.object({ suggestions: z.array(z.unknown()) }),
]);

type SuggestionItem = z.infer<typeof itemSchema>;

function stripFences(text: string) {
  return text.trim().replace(/^```(?:json)?\s*/i, "").replace(/\s*```$/, "");
}

function accept(item: SuggestionItem, dataset: Dataset): ChartSuggestion | null {
  const cols = item.columns;
  const { rationale } = item;
  if (cols.some((c) => !dataset.columns.includes(c))) return null;
  if (new Set(cols).size !== cols.length) return null;
  const isNum = (c: string) => dataset.types[c] === "numeric";

  switch (item.chart_type) {
    case "kde": {
      const [col] = cols;
      if (cols.length !== 1 || !isNum(col)) return null;
      return { chartType: "kde", columns: [col], rationale };
    }
    case "line":
    case "time_series":
    case "time-series": {
      const [x, y] = cols;
      if (cols.length !== 2 || !isNum(y)) return null;
      const xType = dataset.types[x];
      if (xType !== "datetime" && xType !== "numeric") return null;
      return { chartType: "line", columns: [x, y], rationale };
    }
    case "scatter": {
      const [x, y] = cols;
      if (cols.length !== 2 || !isNum(x) || !isNum(y)) return null;
      return { chartType: "scatter", columns: [x, y], rationale };
    }
    case "heatmap": {
      const chosen = cols.length ? cols : columnsOfType(dataset, "numeric");
      if (chosen.length < 2 || !chosen.every(isNum)) return null;
      return { chartType: "heatmap", columns: chosen, rationale };
    }
  }
}

/**
 * Decodes the model's reply into validated suggestions. A reply that is not
 * JSON, or not a list of suggestions, is an AIServiceError; individual items
 * that name an unknown chart type or column are dropped.
 */
export function decodeSuggestions(text: string, dataset: Dataset, max: number): ChartSuggestion[] {
  let raw: unknown;
  try {
    raw = JSON.parse(stripFences(text));
  } catch (e) {
    throw new AIServiceError("Suggestion reply is not JSON.", { cause: e });
  }
  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) throw new AIServiceError("Suggestion reply has no suggestion list.");
  const items = Array.isArray(envelope.data) ? envelope.data : envelope.data.suggestions;

  const out: ChartSuggestion[] = [];
  const seen = new Set<string>();
  for (const entry of items) {
    const parsed = itemSchema.safeParse(entry);
    if (!parsed.success) continue;
    const s = accept(parsed.data, dataset);
    if (!s) continue;
    const key = `${s.chartType}:${s.columns.join("|")}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(s);
    if (out.length >= max) break;
  }
  return out;
}

/* ---------------------- client ---------------------- */

export type SuggestionOptions = { timeoutMs: number; maxSuggestions: number };

export class SuggestionClient {
  constructor(
    private readonly completions: CompletionClient,
    private readonly opts: SuggestionOptions,
  ) {}

  async suggest(profile: AIProfile, dataset: Dataset): Promise<ChartSuggestion[]> {
    const text = await this.request(profile);
    return decodeSuggestions(text, dataset, this.opts.maxSuggestions);
  }

  private async request(profile: AIProfile): Promise<string> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new AIServiceError(`Suggestion request timed out after ${this.opts.timeoutMs}ms.`));
      }, this.opts.timeoutMs);
    });

    try {
      return await Promise.race([
        this.completions.complete({
          system: instructionFor(this.opts.maxSuggestions),
          user: JSON.stringify(profile),
          signal: controller.signal,
        }),
        timeout,
      ]);
    } catch (e) {
      if (e instanceof AIServiceError) throw e;
      throw new AIServiceError("Suggestion request failed.", { cause: e });
    } finally {
      clearTimeout(timer);
    }
  }
}

export function createSuggestionClient(ai: AiConfig): SuggestionClient | null {
  if (!aiEnabled(ai) || ai.apiKey === null) return null;
  const completions = new OpenAICompletionClient({ ...ai, apiKey: ai.apiKey });
  return new SuggestionClient(completions, { timeoutMs: ai.timeoutMs, maxSuggestions: ai.maxSuggestions });
}

/** Never throws: any failure degrades to an empty list. */
export async function fetchSuggestions(
  client: SuggestionClient | null,
  profile: AIProfile,
  dataset: Dataset,
): Promise<{ status: AiStatus; suggestions: ChartSuggestion[] }> {
  if (!client) return { status: "disabled", suggestions: [] };
  try {
    const suggestions = await client.suggest(profile, dataset);
    console.info("[suggestions] accepted", { count: suggestions.length });
    return { status: "ai", suggestions };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    console.error("[suggestions] falling back to standard charts:", message);
    return { status: "fallback", suggestions: [] };
  }
}

/* ---------------------- charts ---------------------- */

function describe(s: ChartSuggestion) {
  return s.rationale ? `AI Insight: ${s.rationale}` : "Suggested by the AI assistant.";
}

function buildOne(s: ChartSuggestion, dataset: Dataset): ChartSpec {
  switch (s.chartType) {
    case "kde": {
      const [col] = s.columns;
      const title = `Density: ${col}`;
      return chart("kde", title, describe(s), s.columns,
        densityFigure(col, gaussianKde(numericValues(dataset, col)), title), "ai");
    }
    case "line": {
      const [x, y] = s.columns;
      const points = dataset.types[x] === "datetime"
        ? buildTimeSeries(dataset, x, y)
        : dataset.rows
            .map((r) => ({ x: r[x], y: r[y] }))
            .filter((p): p is { x: number; y: number } => typeof p.x === "number" && typeof p.y === "number")
            .sort((a, b) => a.x - b.x);
      const title = `${y} over ${x}`;
      return chart("line", title, describe(s), s.columns, lineFigure(x, y, points, title), "ai");
    }
    case "scatter": {
      const [x, y] = s.columns;
      const points = dataset.rows
        .map((r) => ({ x: r[x], y: r[y] }))
        .filter((p): p is { x: number; y: number } => typeof p.x === "number" && typeof p.y === "number");
      const title = `${x} vs ${y}`;
      return chart("scatter", title, describe(s), s.columns, scatterFigure(x, y, points, title), "ai");
    }
    case "heatmap": {
      const { cols, mat } = corrMatrix(dataset, s.columns);
      const title = `Correlation: ${cols.join(", ")}`;
      return chart("heatmap", title, describe(s), cols, heatmapFigure(cols, mat, title), "ai");
    }
  }
}

export function buildAiCharts(suggestions: ChartSuggestion[], dataset: Dataset): ChartSpec[] {
  const out: ChartSpec[] = [];
  for (const s of suggestions) {
    try {
      out.push(buildOne(s, dataset));
    } catch (e) {
      console.warn(`[suggestions] dropping ${s.chartType} chart for ${s.columns.join(", ")}:`, e);
    }
  }
  return out;
}
