import fetch from "node-fetch";
import { Logger, errorMessage } from "../config/logger";
import { SCORING_SYSTEM_PROMPT } from "./system/scoring.system";
import { UsageMeter, estimateTokens } from "./usage.meter";

const SCORING_EXECUTION_SYSTEM_PROMPT = [
  "Universal execution rules.",
  "Answer in the exact line format the request asks for.",
  "Numbers must be plain decimals without units.",
  "Keep explanations to one or two sentences.",
].join(" ");

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  max_tokens?: number;
  max_completion_tokens?: number;
}

interface ChatCompletionsResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
  };
}

export interface LlmCallOptions {
  promptName?: string;
  signal?: AbortSignal;
}

export interface LlmClientOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  usageMeter?: UsageMeter;
}

export class LlmClient {
  constructor(
    private readonly options: LlmClientOptions,
    private readonly logger: Logger,
  ) {
    if (!SCORING_SYSTEM_PROMPT.trim()) {
      throw new Error("SCORING_SYSTEM_PROMPT is empty. Refusing to start.");
    }
  }

  getModelName(): string {
    return this.options.model;
  }

  async generateText(prompt: string, maxTokens = 512, options?: LlmCallOptions): Promise<string> {
    const promptName = options?.promptName ?? "scoring_text";
    const startedAt = Date.now();
    const requestBody = this.buildRequestBody(prompt, maxTokens, 0.2);
    try {
      const response = await fetch(`${this.options.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.options.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
        signal: options?.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`LLM API error: HTTP ${response.status} - ${body}`);
      }

      const body: ChatCompletionsResponse = await response.json();
      const content = body.choices?.[0]?.message?.content;
      if (!content) {
        throw new Error("LLM response does not contain message content");
      }

      const trimmed = content.trim();
      const inputTokens = body.usage?.prompt_tokens ?? estimateTokens(prompt);
      const outputTokens = body.usage?.completion_tokens ?? estimateTokens(trimmed);
      this.options.usageMeter?.record(promptName, inputTokens, outputTokens);
      this.logger.info("llm.call.completed", {
        promptName,
        modelName: this.options.model,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        inputTokens,
        outputTokens,
      });
      return trimmed;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName,
        modelName: this.options.model,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  buildRequestBody(prompt: string, maxTokens: number, temperature: number): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.options.model,
      temperature,
      messages: [
        {
          role: "system",
          content: SCORING_SYSTEM_PROMPT,
        },
        {
          role: "system",
          content: SCORING_EXECUTION_SYSTEM_PROMPT,
        },
        {
          role: "user",
          content: prompt,
        },
      ],
    };
    if (usesMaxCompletionTokens(this.options.model)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
    }
    return body;
  }
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5") || /^o\d/.test(normalized);
}
