import dotenv from "dotenv";
import { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  openaiApiKey?: string;
  openaiBaseUrl: string;
  openaiChatModel: string;
  oracleTimeoutMs: number;
  oracleMaxConcurrentCalls: number;
  matchConcurrency: number;
  triageTopN: number;
  triageMinQuickScore: number;
  matchCacheMaxEntries: number;
  llmInputCostPer1M: number;
  llmOutputCostPer1M: number;
}

function getOptionalTrimmed(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const oracleTimeoutRaw = source.ORACLE_TIMEOUT_MS ?? "25000";
  const oracleMaxConcurrentRaw = source.ORACLE_MAX_CONCURRENT_CALLS ?? "4";
  const matchConcurrencyRaw = source.MATCH_CONCURRENCY ?? "2";
  const triageTopNRaw = source.TRIAGE_TOP_N ?? "3";
  const triageMinQuickScoreRaw = source.TRIAGE_MIN_QUICK_SCORE ?? "45";
  const matchCacheMaxRaw = source.MATCH_CACHE_MAX_ENTRIES ?? "200";
  const inputCostRaw = source.LLM_INPUT_COST_PER_1M ?? "3";
  const outputCostRaw = source.LLM_OUTPUT_COST_PER_1M ?? "15";
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();

  const oracleTimeoutMs = Number(oracleTimeoutRaw);
  const oracleMaxConcurrentCalls = Number(oracleMaxConcurrentRaw);
  const matchConcurrency = Number(matchConcurrencyRaw);
  const triageTopN = Number(triageTopNRaw);
  const triageMinQuickScore = Number(triageMinQuickScoreRaw);
  const matchCacheMaxEntries = Number(matchCacheMaxRaw);
  const llmInputCostPer1M = Number(inputCostRaw);
  const llmOutputCostPer1M = Number(outputCostRaw);

  if (!Number.isInteger(oracleTimeoutMs) || oracleTimeoutMs < 1000) {
    throw new Error(`Invalid ORACLE_TIMEOUT_MS value: ${oracleTimeoutRaw}`);
  }
  if (!Number.isInteger(oracleMaxConcurrentCalls) || oracleMaxConcurrentCalls < 1) {
    throw new Error(`Invalid ORACLE_MAX_CONCURRENT_CALLS value: ${oracleMaxConcurrentRaw}`);
  }
  if (!Number.isInteger(matchConcurrency) || matchConcurrency < 1) {
    throw new Error(`Invalid MATCH_CONCURRENCY value: ${matchConcurrencyRaw}`);
  }
  if (!Number.isInteger(triageTopN) || triageTopN < 1) {
    throw new Error(`Invalid TRIAGE_TOP_N value: ${triageTopNRaw}`);
  }
  if (!Number.isFinite(triageMinQuickScore) || triageMinQuickScore < 0 || triageMinQuickScore > 100) {
    throw new Error(
      `Invalid TRIAGE_MIN_QUICK_SCORE value: ${triageMinQuickScoreRaw}. Expected number between 0 and 100.`,
    );
  }
  if (!Number.isInteger(matchCacheMaxEntries) || matchCacheMaxEntries < 0) {
    throw new Error(`Invalid MATCH_CACHE_MAX_ENTRIES value: ${matchCacheMaxRaw}`);
  }
  if (!Number.isFinite(llmInputCostPer1M) || llmInputCostPer1M < 0) {
    throw new Error(`Invalid LLM_INPUT_COST_PER_1M value: ${inputCostRaw}`);
  }
  if (!Number.isFinite(llmOutputCostPer1M) || llmOutputCostPer1M < 0) {
    throw new Error(`Invalid LLM_OUTPUT_COST_PER_1M value: ${outputCostRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    logLevel: parseLogLevel(logLevelRaw),
    openaiApiKey: getOptionalTrimmed(source, "OPENAI_API_KEY"),
    openaiBaseUrl: (getOptionalTrimmed(source, "OPENAI_BASE_URL") ?? "https://api.openai.com/v1").replace(/\/+$/, ""),
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    oracleTimeoutMs,
    oracleMaxConcurrentCalls,
    matchConcurrency,
    triageTopN,
    triageMinQuickScore,
    matchCacheMaxEntries,
    llmInputCostPer1M,
    llmOutputCostPer1M,
  };
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
