import OpenAI from "openai";
import { readProbability } from "../../utils/json";
import type { ProbabilityProvider } from "../probability";
import { buildProbabilityPrompt } from "./prompt";

const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

export class OpenAIProbabilityProvider implements ProbabilityProvider {
  readonly name = "openai";
  private client: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string = process.env.OPENAI_MODEL || DEFAULT_OPENAI_MODEL,
    timeoutMs = 1200
  ) {
    this.client = new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });
  }

  async estimate(text: string): Promise<number> {
    const response = await this.client.responses.create({
      model: this.model,
      input: [{ role: "user", content: buildProbabilityPrompt(text) }],
      max_output_tokens: 40,
      temperature: 0
    });
    const probability = readProbability(response.output_text?.trim() || "");
    if (probability === null) {
      throw new Error(`OpenAI returned no probability (${this.model})`);
    }
    return probability;
  }
}
