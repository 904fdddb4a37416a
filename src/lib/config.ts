// src/lib/config.ts
export type AiProvider = "groq" | "openai" | "none";

export type AiConfig = {
  provider: AiProvider;
  apiKey: string | null;
  model: string;
  baseURL: string | undefined;
  timeoutMs: number;
  maxSuggestions: number;
};

export type AppConfig = {
  ai: AiConfig;
  chartTopN: number;
  previewRows: number;
  maxUploadBytes: number;
};

type Env = Record<string, string | undefined>;

const GROQ_BASE_URL = "https://api.groq.com/openai/v1";
const DEFAULT_MODELS: Record<Exclude<AiProvider, "none">, string> = {
  groq: "llama-3.1-70b-versatile",
  openai: "gpt-4.1-mini",
};

function positiveInt(raw: string | undefined, fallback: number) {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function parseProvider(raw: string | undefined): AiProvider {
  const p = (raw || "groq").trim().toLowerCase();
  return p === "openai" || p === "none" ? p : "groq";
}

export function loadConfig(env: Env): AppConfig {
  const provider = parseProvider(env.AI_PROVIDER);
  const key =
    provider === "groq" ? env.GROQ_API_KEY :
    provider === "openai" ? env.OPENAI_API_KEY :
    undefined;

  return {
    ai: {
      provider,
      apiKey: key && key.trim() !== "" ? key.trim() : null,
      model: env.AI_MODEL || (provider === "none" ? "" : DEFAULT_MODELS[provider]),
      baseURL: provider === "groq" ? GROQ_BASE_URL : undefined,
      timeoutMs: positiveInt(env.AI_TIMEOUT_MS, 15_000),
      maxSuggestions: positiveInt(env.AI_MAX_SUGGESTIONS, 8),
    },
    chartTopN: positiveInt(env.CHART_TOP_N, 20),
    previewRows: positiveInt(env.PREVIEW_ROWS, 10),
    maxUploadBytes: positiveInt(env.MAX_UPLOAD_MB, 16) * 1024 * 1024,
  };
}

export function aiEnabled(ai: AiConfig) {
  return ai.provider !== "none" && ai.apiKey !== null;
}
