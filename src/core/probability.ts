import { clamp01 } from "../utils/mask";
import { describeError, safeWarn } from "../utils/logging";
import type { AppConfig } from "./config";
import { GeminiProbabilityProvider } from "./providers/geminiClient";
import { OpenAIProbabilityProvider } from "./providers/openaiClient";

/** Black-box scam probability estimate for a message, in [0, 1]. */
export interface ProbabilityProvider {
  readonly name: string;
  estimate(text: string): Promise<number>;
}

type Env = Record<string, string | undefined>;

export function createProbabilityProvider(
  config: Pick<AppConfig, "probabilityProvider" | "probabilityTimeoutMs">,
  env: Env = process.env
): ProbabilityProvider | null {
  if (config.probabilityProvider === "openai") {
    const apiKey = env.OPENAI_API_KEY || "";
    if (!apiKey) {
      safeWarn("[PROVIDER] openai selected but OPENAI_API_KEY is not set; scoring without it");
      return null;
    }
    return new OpenAIProbabilityProvider(apiKey, env.OPENAI_MODEL || undefined, config.probabilityTimeoutMs);
  }
  if (config.probabilityProvider === "gemini") {
    const apiKey = env.GEMINI_API_KEY || env.GOOGLE_API_KEY || "";
    if (!apiKey) {
      safeWarn("[PROVIDER] gemini selected but GEMINI_API_KEY is not set; scoring without it");
      return null;
    }
    return new GeminiProbabilityProvider(apiKey, env.GEMINI_MODEL || undefined);
  }
  return null;
}

/**
 * Asks the provider for an estimate. Absence, errors and timeouts all come back
 * as `undefined` so the classifier runs without the external signal.
 */
export async function estimateProbability(
  provider: ProbabilityProvider | null,
  text: string,
  timeoutMs: number
): Promise<number | undefined> {
  if (!provider || !text.trim()) return undefined;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${provider.name} timeout`)), timeoutMs);
  });
  try {
    const value = await Promise.race([provider.estimate(text), timeout]);
    return Number.isFinite(value) ? clamp01(value) : undefined;
  } catch (err) {
    safeWarn(`[PROVIDER] ${provider.name} unavailable: ${describeError(err)}`);
    return undefined;
  } finally {
    if (timer) clearTimeout(timer);
  }
}
