import { GoogleGenerativeAI } from "@google/generative-ai";
import { readProbability } from "../../utils/json";
import type { ProbabilityProvider } from "../probability";
import { buildProbabilityPrompt } from "./prompt";

const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";

export class GeminiProbabilityProvider implements ProbabilityProvider {
  readonly name = "gemini";
  private client: GoogleGenerativeAI;

  constructor(
    apiKey: string,
    private readonly modelName: string = process.env.GEMINI_MODEL || DEFAULT_GEMINI_MODEL
  ) {
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async estimate(text: string): Promise<number> {
    const model = this.client.getGenerativeModel({ model: this.modelName });
    const result = await model.generateContent(buildProbabilityPrompt(text));
    const probability = readProbability(result.response.text());
    if (probability === null) {
      throw new Error(`Gemini returned no probability (${this.modelName})`);
    }
    return probability;
  }
}
