import assert from "node:assert/strict";
import { test } from "node:test";
import { loadEnv } from "../../config/env";
import { createLogger } from "../../config/logger";

test("applies defaults", () => {
  const env = loadEnv({});
  assert.equal(env.openaiApiKey, undefined);
  assert.equal(env.openaiBaseUrl, "https://api.openai.com/v1");
  assert.equal(env.openaiChatModel, "gpt-4o-mini");
  assert.equal(env.logLevel, "info");
  assert.equal(env.oracleTimeoutMs, 25000);
  assert.equal(env.oracleMaxConcurrentCalls, 4);
  assert.equal(env.matchConcurrency, 2);
  assert.equal(env.triageTopN, 3);
  assert.equal(env.triageMinQuickScore, 45);
  assert.equal(env.matchCacheMaxEntries, 200);
});

test("trims the key and the base url", () => {
  const env = loadEnv({ OPENAI_API_KEY: "  test-secret ", OPENAI_BASE_URL: "http://localhost:8080/v1/" });
  assert.equal(env.openaiApiKey, "test-secret");
  assert.equal(env.openaiBaseUrl, "http://localhost:8080/v1");
});

test("rejects invalid values", () => {
  assert.throws(() => loadEnv({ ORACLE_TIMEOUT_MS: "10" }), /Invalid ORACLE_TIMEOUT_MS value: 10/);
  assert.throws(() => loadEnv({ TRIAGE_MIN_QUICK_SCORE: "120" }), /Invalid TRIAGE_MIN_QUICK_SCORE value: 120/);
  assert.throws(() => loadEnv({ LOG_LEVEL: "verbose" }), /Invalid LOG_LEVEL value: verbose/);
});

test("filters by level and redacts secrets", () => {
  const lines: string[] = [];
  const logger = createLogger({ minLevel: "warn", write: (line) => lines.push(line) });
  logger.info("dropped");
  logger.warn("llm.call.failed", { apiKey: "test-secret", promptName: "soft_skills_v1", reply: "x".repeat(600) });

  assert.equal(lines.length, 1);
  const line = lines[0] ?? "";
  assert.match(line, /"level":"warn","message":"llm\.call\.failed"/);
  assert.ok(
    line.endsWith(
      `"meta":{"apiKey":"[REDACTED]","promptName":"soft_skills_v1","reply":"${"x".repeat(500)}..."}}\n`,
    ),
  );
});
