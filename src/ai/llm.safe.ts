import { Logger, LoggerContext, errorMessage, logContext } from "../config/logger";

export interface TextGenerateOptions {
  promptName?: string;
  signal?: AbortSignal;
}

export interface TextGenerator {
  generateText(prompt: string, maxTokens?: number, options?: TextGenerateOptions): Promise<string>;
  getModelName?(): string;
}

export interface TextSafeCallArgs {
  llmClient: TextGenerator;
  prompt: string;
  promptName: string;
  maxTokens?: number;
  logger?: Logger;
  timeoutMs?: number;
}

export type SafeCallErrorCode = "timeout" | "transient_failure" | "llm_failure";

export type SafeTextResult =
  | { ok: true; text: string; attempts: number }
  | { ok: false; error_code: SafeCallErrorCode; message: string; attempts: number };

const DEFAULT_TIMEOUT_MS = 25_000;
const MAX_ATTEMPTS = 2;
const TRANSIENT_MARKERS = [
  "timeout",
  "econnreset",
  "network",
  "429",
  "rate limit",
  "http 500",
  "http 502",
  "http 503",
  "http 504",
];

export class LlmTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`timeout after ${timeoutMs}ms`);
    this.name = "LlmTimeoutError";
  }
}

/**
 * Single oracle call that never throws. Each attempt gets its own timeout;
 * transient failures (timeouts, network resets, 429, 5xx) get one retry,
 * anything else fails on the spot. A timed-out attempt is aborted and awaited
 * before the next one starts, so callers holding a concurrency slot never
 * have two requests in flight.
 */
export async function callTextPromptSafe(args: TextSafeCallArgs): Promise<SafeTextResult> {
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const context: LoggerContext = { prompt_name: args.promptName, model_name: args.llmClient.getModelName?.() };
  let attempts = 0;
  let lastError: unknown;

  while (attempts < MAX_ATTEMPTS) {
    attempts += 1;
    try {
      const text = await attemptOnce(args, timeoutMs);
      return { ok: true, text: text.trim(), attempts };
    } catch (error) {
      lastError = error;
      if (!isTransientError(error) || attempts >= MAX_ATTEMPTS) {
        break;
      }
      if (args.logger) {
        logContext(
          args.logger,
          "warn",
          "llm.safe.retry.once",
          { ...context, error_code: classifyError(error) },
          { error: errorMessage(error) },
        );
      }
    }
  }

  return { ok: false, error_code: classifyError(lastError), message: errorMessage(lastError), attempts };
}

async function attemptOnce(args: TextSafeCallArgs, timeoutMs: number): Promise<string> {
  const controller = new AbortController();
  const pending = args.llmClient.generateText(args.prompt, args.maxTokens ?? 512, {
    promptName: args.promptName,
    signal: controller.signal,
  });
  try {
    return await withTimeout(pending, timeoutMs, () => controller.abort());
  } catch (error) {
    if (error instanceof LlmTimeoutError) {
      await Promise.allSettled([pending]);
    }
    throw error;
  }
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout?: () => void): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new LlmTimeoutError(timeoutMs));
      onTimeout?.();
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof LlmTimeoutError) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return TRANSIENT_MARKERS.some((marker) => message.includes(marker));
}

function classifyError(error: unknown): SafeCallErrorCode {
  if (error instanceof LlmTimeoutError || (error instanceof Error && error.message.toLowerCase().includes("timeout"))) {
    return "timeout";
  }
  return isTransientError(error) ? "transient_failure" : "llm_failure";
}

function normalizeTimeout(value?: number): number {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? Math.round(value) : DEFAULT_TIMEOUT_MS;
}
