import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { SCORING_SYSTEM_PROMPT } from "./ai/system/scoring.system";
import { ScoringEngine, createScoringEngine } from "./matching/matching.engine";

export interface AppContext {
  env: EnvConfig;
  logger: Logger;
  engine: ScoringEngine;
}

export function createApp(env: EnvConfig, logger: Logger = createLogger({ minLevel: env.logLevel })): AppContext {
  const engine = createScoringEngine(env, logger);
  logger.info("Scoring engine ready", {
    nodeEnv: env.nodeEnv,
    oracleEnabled: Boolean(env.openaiApiKey),
    modelName: env.openaiChatModel,
    systemPromptLength: SCORING_SYSTEM_PROMPT.length,
    matchConcurrency: env.matchConcurrency,
    oracleMaxConcurrentCalls: env.oracleMaxConcurrentCalls,
  });
  return { env, logger, engine };
}
