/**
 * Gemini-backed subtitle simplifier.
 */

import type { GoogleGenAI } from "@google/genai";
import { geminiLogger } from "../logger";
import { getGeminiClient } from "./geminiClient";
import {
  buildSimplificationPrompt,
  parseSimplificationResponse,
  type SimplificationRequest,
  type SimplificationResponse,
  type Simplifier,
} from "./simplifierPrompt";

export interface GeminiSimplifierOptions {
  model: string;
  temperature?: number;
  /** Injected client; defaults to the shared lazily-created one */
  client?: GoogleGenAI;
}

export class GeminiSimplifier implements Simplifier {
  readonly name = "gemini";

  constructor(private readonly options: GeminiSimplifierOptions) {}

  async simplify(request: SimplificationRequest): Promise<SimplificationResponse> {
    const client = this.options.client ?? getGeminiClient();
    const prompt = buildSimplificationPrompt(request);

    const response = await client.models.generateContent({
      model: this.options.model,
      contents: prompt,
      config: {
        temperature: this.options.temperature ?? 0.3,
      },
    });

    const raw = response.text ?? "";
    const parsed = parseSimplificationResponse(raw);
    if (!parsed) {
      throw new Error(`Unparseable simplifier response for cue ${request.cue.index}: ${raw.slice(0, 120)}`);
    }

    geminiLogger.debug(`Cue ${request.cue.index} simplified: "${request.cue.text}" -> "${parsed.text}"`);
    return parsed;
  }
}
