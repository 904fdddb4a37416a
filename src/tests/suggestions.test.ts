import { afterEach, describe, expect, it, vi } from "vitest";
import {
  SuggestionClient, buildAiCharts, decodeSuggestions, fetchSuggestions, instructionFor,
  type CompletionClient, type CompletionRequest,
} from "../lib/suggestions";
import { AIServiceError } from "../lib/errors";
import { buildAiProfile } from "../lib/profile";
import type { Dataset } from "../lib/types";

const dataset: Dataset = {
  columns: ["date", "sales", "cost", "region"],
  types: { date: "datetime", sales: "numeric", cost: "numeric", region: "categorical" },
  rows: [
    { date: "2024-01-03", sales: 12, cost: 5, region: "north" },
    { date: "2024-01-01", sales: 10, cost: 4, region: "south" },
    { date: "2024-01-02", sales: 11, cost: 6, region: "north" },
    { date: "2024-01-04", sales: 15, cost: 7, region: "east" },
  ],
};

const profile = buildAiProfile(dataset, { missingByColumn: {} });

function stub(reply: (req: CompletionRequest) => Promise<string>) {
  const complete = vi.fn(reply);
  const client: CompletionClient = { complete };
  return { client, complete };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("decodeSuggestions", () => {
  it("keeps valid suggestions and discards unknown types and columns", () => {
    const reply = JSON.stringify({
      suggestions: [
        { chart_type: "kde", columns: ["sales"], rationale: "r1" },
        { chart_type: "pie", columns: ["region"], rationale: "not allowed" },
        { chart_type: "kde", columns: ["profit"], rationale: "no such column" },
        { chart_type: "scatter", columns: ["sales", "region"], rationale: "region is text" },
        { chart_type: "line", columns: ["date", "sales"], rationale: "r2" },
        { chart_type: "time_series", columns: ["date", "sales"], rationale: "same chart again" },
        { chart_type: "heatmap", columns: [] },
      ],
    });

    expect(decodeSuggestions(reply, dataset, 8)).toEqual([
      { chartType: "kde", columns: ["sales"], rationale: "r1" },
      { chartType: "line", columns: ["date", "sales"], rationale: "r2" },
      { chartType: "heatmap", columns: ["sales", "cost"], rationale: "" },
    ]);
  });

  it("accepts a bare array wrapped in a code fence", () => {
    const reply = '```json\n[{"chart_type":"Scatter","columns":["sales","cost"],"rationale":"x"}]\n```';

    expect(decodeSuggestions(reply, dataset, 8)).toEqual([
      { chartType: "scatter", columns: ["sales", "cost"], rationale: "x" },
    ]);
  });

  it("drops items that are not objects", () => {
    const reply = JSON.stringify([42, "kde", { chart_type: "kde", columns: ["cost"], rationale: "ok" }]);

    expect(decodeSuggestions(reply, dataset, 8)).toEqual([
      { chartType: "kde", columns: ["cost"], rationale: "ok" },
    ]);
  });

  it("stops at the configured maximum", () => {
    const reply = JSON.stringify([
      { chart_type: "kde", columns: ["sales"] },
      { chart_type: "kde", columns: ["cost"] },
      { chart_type: "scatter", columns: ["sales", "cost"] },
    ]);

    expect(decodeSuggestions(reply, dataset, 2).map((s) => s.columns)).toEqual([["sales"], ["cost"]]);
  });

  it("rejects replies that are not JSON or have no list", () => {
    expect(() => decodeSuggestions("Sure! Here are some charts.", dataset, 8)).toThrow(AIServiceError);
    expect(() => decodeSuggestions('{"charts":[]}', dataset, 8)).toThrow("Suggestion reply has no suggestion list.");
  });
});

describe("SuggestionClient", () => {
  it("sends the profile with the fixed instruction", async () => {
    const { client, complete } = stub(async () => '{"suggestions":[]}');

    await new SuggestionClient(client, { timeoutMs: 1000, maxSuggestions: 5 }).suggest(profile, dataset);

    expect(complete).toHaveBeenCalledTimes(1);
    const [req] = complete.mock.calls[0];
    expect(req.system).toBe(instructionFor(5));
    expect(JSON.parse(req.user)).toEqual(profile);
  });
});

describe("fetchSuggestions", () => {
  it("reports disabled when no client is configured", async () => {
    await expect(fetchSuggestions(null, profile, dataset)).resolves.toEqual({ status: "disabled", suggestions: [] });
  });

  it("returns accepted suggestions", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const { client } = stub(async () => '{"suggestions":[{"chart_type":"kde","columns":["sales"],"rationale":"r"}]}');

    const out = await fetchSuggestions(new SuggestionClient(client, { timeoutMs: 1000, maxSuggestions: 8 }), profile, dataset);

    expect(out).toEqual({ status: "ai", suggestions: [{ chartType: "kde", columns: ["sales"], rationale: "r" }] });
  });

  it("falls back when the service errors", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const { client } = stub(async () => { throw new Error("503 Service Unavailable"); });

    const out = await fetchSuggestions(new SuggestionClient(client, { timeoutMs: 1000, maxSuggestions: 8 }), profile, dataset);

    expect(out).toEqual({ status: "fallback", suggestions: [] });
    expect(error).toHaveBeenCalledWith("[suggestions] falling back to standard charts:", "Suggestion request failed.");
  });

  it("falls back on a malformed reply", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const { client } = stub(async () => "not json at all");

    const out = await fetchSuggestions(new SuggestionClient(client, { timeoutMs: 1000, maxSuggestions: 8 }), profile, dataset);

    expect(out).toEqual({ status: "fallback", suggestions: [] });
  });

  it("falls back and aborts the request after the timeout", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    let seen: AbortSignal | undefined;
    const { client } = stub((req) => {
      seen = req.signal;
      return new Promise<string>(() => {});
    });

    const out = await fetchSuggestions(new SuggestionClient(client, { timeoutMs: 20, maxSuggestions: 8 }), profile, dataset);

    expect(out).toEqual({ status: "fallback", suggestions: [] });
    expect(seen?.aborted).toBe(true);
    expect(error).toHaveBeenCalledWith(
      "[suggestions] falling back to standard charts:",
      "Suggestion request timed out after 20ms.",
    );
  });
});

describe("buildAiCharts", () => {
  it("builds one chart per suggestion tagged as AI", () => {
    const charts = buildAiCharts([
      { chartType: "kde", columns: ["sales"], rationale: "Sales are skewed." },
      { chartType: "line", columns: ["date", "sales"], rationale: "" },
      { chartType: "scatter", columns: ["cost", "sales"], rationale: "Cost drives sales." },
      { chartType: "heatmap", columns: ["sales", "cost"], rationale: "" },
    ], dataset);

    expect(charts.map((c) => [c.kind, c.title, c.source])).toEqual([
      ["kde", "Density: sales", "ai"],
      ["line", "sales over date", "ai"],
      ["scatter", "cost vs sales", "ai"],
      ["heatmap", "Correlation: sales, cost", "ai"],
    ]);
    expect(charts[0].description).toBe("AI Insight: Sales are skewed.");
    expect(charts[1].description).toBe("Suggested by the AI assistant.");
  });

  it("draws the density as a filled curve", () => {
    const [kde] = buildAiCharts([{ chartType: "kde", columns: ["sales"], rationale: "" }], dataset);
    const trace = kde.figure.data[0];

    if (trace.type !== "scatter") throw new Error("expected a scatter trace");
    expect(trace.mode).toBe("lines");
    expect(trace.fill).toBe("tozeroy");
    expect(trace.x).toHaveLength(100);
    expect(trace.y.every((v) => v >= 0)).toBe(true);
  });

  it("builds a density for a very large column", () => {
    const n = 300_000;
    const big: Dataset = {
      columns: ["v"],
      types: { v: "numeric" },
      rows: Array.from({ length: n }, (_, i) => ({ v: i % 1000 })),
    };

    const charts = buildAiCharts([{ chartType: "kde", columns: ["v"], rationale: "" }], big);

    expect(charts).toHaveLength(1);
    const trace = charts[0].figure.data[0];
    if (trace.type !== "scatter") throw new Error("expected a scatter trace");
    expect(trace.x).toHaveLength(100);
    expect(trace.x[0]).toBeLessThan(0);
    expect(trace.x[99]).toBeGreaterThan(999);
  });

  it("orders time series by date", () => {
    const [line] = buildAiCharts([{ chartType: "line", columns: ["date", "sales"], rationale: "" }], dataset);

    expect(line.figure.data[0]).toMatchObject({
      x: ["2024-01-01", "2024-01-02", "2024-01-03", "2024-01-04"],
      y: [10, 11, 12, 15],
    });
  });
});

describe("buildAiProfile", () => {
  it("summarises columns without raw rows", () => {
    expect(profile).toEqual({
      rows: 4,
      datetimeColumns: ["date"],
      columns: [
        { name: "date", type: "datetime", distinct: 4, missing: 0 },
        { name: "sales", type: "numeric", distinct: 4, missing: 0, numeric: { min: 10, max: 15, mean: 12 } },
        { name: "cost", type: "numeric", distinct: 4, missing: 0, numeric: { min: 4, max: 7, mean: 5.5 } },
        { name: "region", type: "categorical", distinct: 3, missing: 0 },
      ],
    });
  });
});
