/**
 * LLM handler generator — OpenAI-compatible chat completions.
 */

import OpenAI from "openai";
import type { LlmConfig } from "../config.ts";
import { GenerationFailure } from "../domain/errors.ts";
import type { GenerationRequest, HandlerGenerator } from "../domain/types.ts";
import { GENERATION_SYSTEM_PROMPT, buildGenerationPrompt } from "../application/plugins/prompt.ts";

const MAX_TOKENS = 2048;
const TEMPERATURE = 0.2;

export class LlmHandlerGenerator implements HandlerGenerator {
  readonly name = "llm";
  private client: OpenAI;

  constructor(private config: LlmConfig) {
    if (!config.apiKey) {
      throw new GenerationFailure("LLM_API_KEY is required for the llm generator");
    }
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      // PluginCreator owns the timeout; one attempt per request.
      maxRetries: 0,
    });
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.config.model,
        messages: [
          { role: "system", content: GENERATION_SYSTEM_PROMPT },
          { role: "user", content: buildGenerationPrompt(request) },
        ],
        max_tokens: MAX_TOKENS,
        temperature: TEMPERATURE,
        stream: false,
      },
      { signal },
    );

    return response.choices[0]?.message.content ?? "";
  }
}
