import { Logger, logContext } from "../config/logger";
import { Semaphore } from "../shared/utils/worker-pool";
import { SafeCallErrorCode, TextGenerator, callTextPromptSafe } from "./llm.safe";
import { ParsedScore, parseScoreResponse } from "./parsers/score-response.parser";

export type OracleErrorCode = SafeCallErrorCode | "oracle_unavailable";

export class OracleCallError extends Error {
  constructor(
    readonly code: OracleErrorCode,
    readonly promptName: string,
    message: string,
  ) {
    super(`${promptName} failed (${code}): ${message}`);
    this.name = "OracleCallError";
  }
}

export interface OracleQueryOptions {
  promptName: string;
  maxTokens?: number;
}

/**
 * Text-generation capability used by the semantic parts of scoring.
 * Implementations either resolve with the raw reply or reject with an error;
 * callers decide how to fall back.
 */
export interface OracleGateway {
  query(prompt: string, options: OracleQueryOptions): Promise<string>;
}

interface LlmOracleGatewayOptions {
  timeoutMs: number;
  maxConcurrentCalls: number;
}

export class LlmOracleGateway implements OracleGateway {
  private readonly semaphore: Semaphore;

  constructor(
    private readonly llmClient: TextGenerator,
    private readonly logger: Logger,
    private readonly options: LlmOracleGatewayOptions,
  ) {
    this.semaphore = new Semaphore(options.maxConcurrentCalls);
  }

  async query(prompt: string, options: OracleQueryOptions): Promise<string> {
    const result = await this.semaphore.run(() =>
      callTextPromptSafe({
        llmClient: this.llmClient,
        prompt,
        maxTokens: options.maxTokens,
        promptName: options.promptName,
        logger: this.logger,
        timeoutMs: this.options.timeoutMs,
      }),
    );
    logContext(
      this.logger,
      "debug",
      "oracle.query.finished",
      { prompt_name: options.promptName, ok: result.ok, error_code: result.ok ? undefined : result.error_code },
      { attempts: result.attempts },
    );
    if (!result.ok) {
      throw new OracleCallError(result.error_code, options.promptName, result.message);
    }
    return result.text;
  }
}

/** Stand-in used when no API key is configured; every call rejects. */
export class UnavailableOracleGateway implements OracleGateway {
  async query(_prompt: string, options: OracleQueryOptions): Promise<string> {
    throw new OracleCallError("oracle_unavailable", options.promptName, "no oracle configured");
  }
}

export async function scoreDimension(
  oracle: OracleGateway,
  input: { prompt: string; maxScore: number; promptName: string; logger?: Logger },
): Promise<ParsedScore> {
  const reply = await oracle.query(input.prompt, { promptName: input.promptName, maxTokens: 512 });
  const parsed = parseScoreResponse(reply, input.maxScore);
  if (!parsed.wellFormed) {
    input.logger?.warn("oracle.score.parse_fallback", {
      promptName: input.promptName,
      salvagedScore: parsed.score,
      reply,
    });
  }
  return parsed;
}
