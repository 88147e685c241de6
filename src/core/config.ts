import path from "path";

export type ProviderName = "openai" | "gemini" | "none";

export type ClassifierThresholds = {
  scoreThreshold: number;
  scoreDenominator: number;
  externalCutover: number;
};

export type AppConfig = {
  port: number;
  apiKey: string;
  sessionTtlMs: number;
  sessionSweepMs: number;
  rateLimitWindowMs: number;
  rateLimitMax: number;
  artifactGraphCapacity: number;
  escalationUrl: string;
  escalationMinTurns: number;
  escalationTimeoutMs: number;
  thresholds: ClassifierThresholds;
  probabilityProvider: ProviderName;
  probabilityTimeoutMs: number;
  dataDir: string;
};

export const DEFAULT_THRESHOLDS: ClassifierThresholds = {
  scoreThreshold: 7,
  scoreDenominator: 12,
  externalCutover: 0.65
};

type Env = Record<string, string | undefined>;

function positiveNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function providerName(raw: string | undefined): ProviderName {
  const value = (raw || "").trim().toLowerCase();
  if (value === "openai" || value === "gemini") return value;
  return "none";
}

export function loadConfig(env: Env = process.env): AppConfig {
  const cutover = positiveNumber(env.EXTERNAL_CUTOVER, DEFAULT_THRESHOLDS.externalCutover);
  return Object.freeze({
    port: positiveNumber(env.PORT, 3000),
    apiKey: env.API_KEY || "",
    sessionTtlMs: positiveNumber(env.SESSION_TTL_MS, 10 * 60 * 1000),
    sessionSweepMs: positiveNumber(env.SESSION_SWEEP_MS, 60 * 1000),
    rateLimitWindowMs: positiveNumber(env.RATE_LIMIT_WINDOW_MS, 60 * 1000),
    rateLimitMax: Math.floor(positiveNumber(env.RATE_LIMIT_MAX, 20)),
    artifactGraphCapacity: Math.floor(positiveNumber(env.ARTIFACT_GRAPH_CAPACITY, 10000)),
    escalationUrl: (env.ESCALATION_URL || "").trim(),
    escalationMinTurns: Math.floor(positiveNumber(env.ESCALATION_MIN_TURNS, 3)),
    escalationTimeoutMs: positiveNumber(env.ESCALATION_TIMEOUT_MS, 5000),
    thresholds: {
      scoreThreshold: Math.floor(positiveNumber(env.SCAM_SCORE_THRESHOLD, DEFAULT_THRESHOLDS.scoreThreshold)),
      scoreDenominator: positiveNumber(env.SCORE_DENOMINATOR, DEFAULT_THRESHOLDS.scoreDenominator),
      externalCutover: cutover < 1 ? cutover : DEFAULT_THRESHOLDS.externalCutover
    },
    probabilityProvider: providerName(env.PROBABILITY_PROVIDER),
    probabilityTimeoutMs: positiveNumber(env.PROBABILITY_TIMEOUT_MS, 1200),
    dataDir: env.DATA_DIR ? path.resolve(env.DATA_DIR) : path.resolve(__dirname, "..", "..", "data")
  });
}
