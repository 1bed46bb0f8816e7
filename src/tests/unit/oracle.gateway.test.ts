import assert from "node:assert/strict";
import { test } from "node:test";
import { silentLogger } from "../../config/logger";
import { LlmClient } from "../../ai/llm.client";
import { TextGenerateOptions } from "../../ai/llm.safe";
import { LlmOracleGateway, OracleCallError, UnavailableOracleGateway, scoreDimension } from "../../ai/oracle.gateway";
import { SCORING_SYSTEM_PROMPT } from "../../ai/system/scoring.system";
import { UsageMeter, estimateTokens } from "../../ai/usage.meter";
import { ScriptedOracle } from "../helpers/scripted-oracle";

function fakeClient(handler: (call: number, signal?: AbortSignal) => Promise<string>): {
  calls: () => number;
  client: {
    generateText(prompt: string, maxTokens?: number, options?: TextGenerateOptions): Promise<string>;
    getModelName(): string;
  };
} {
  let calls = 0;
  return {
    calls: () => calls,
    client: {
      async generateText(_prompt: string, _maxTokens?: number, options?: TextGenerateOptions): Promise<string> {
        calls += 1;
        return handler(calls, options?.signal);
      },
      getModelName(): string {
        return "gpt-test";
      },
    },
  };
}

const gatewayOptions = { timeoutMs: 1000, maxConcurrentCalls: 2 };

test("returns the trimmed reply", async () => {
  const fake = fakeClient(async () => "  SCORE: 3  ");
  const gateway = new LlmOracleGateway(fake.client, silentLogger, gatewayOptions);
  assert.equal(await gateway.query("prompt", { promptName: "soft_skills_v1" }), "SCORE: 3");
});

test("retries a transient failure once", async () => {
  const fake = fakeClient(async (call) => {
    if (call === 1) {
      throw new Error("LLM API error: HTTP 503 - busy");
    }
    return "SCORE: 4";
  });
  const gateway = new LlmOracleGateway(fake.client, silentLogger, gatewayOptions);
  assert.equal(await gateway.query("prompt", { promptName: "soft_skills_v1" }), "SCORE: 4");
  assert.equal(fake.calls(), 2);
});

test("does not retry a client error", async () => {
  const fake = fakeClient(async () => {
    throw new Error("LLM API error: HTTP 400 - bad");
  });
  const gateway = new LlmOracleGateway(fake.client, silentLogger, gatewayOptions);
  await assert.rejects(gateway.query("prompt", { promptName: "soft_skills_v1" }), (error: unknown) => {
    assert.ok(error instanceof OracleCallError);
    assert.equal(error.code, "llm_failure");
    assert.equal(error.message, "soft_skills_v1 failed (llm_failure): LLM API error: HTTP 400 - bad");
    return true;
  });
  assert.equal(fake.calls(), 1);
});

function untilAborted(signal?: AbortSignal): Promise<string> {
  return new Promise<string>((_resolve, reject) => {
    signal?.addEventListener("abort", () => reject(new Error("request aborted")));
  });
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

test("times out a hanging call after one retry", async () => {
  const fake = fakeClient((_call, signal) => untilAborted(signal));
  const gateway = new LlmOracleGateway(fake.client, silentLogger, { timeoutMs: 20, maxConcurrentCalls: 1 });
  await assert.rejects(gateway.query("prompt", { promptName: "culture_fit_v1" }), (error: unknown) => {
    assert.ok(error instanceof OracleCallError);
    assert.equal(error.code, "timeout");
    return true;
  });
  assert.equal(fake.calls(), 2);
});

test("bounds concurrent oracle calls", async () => {
  let active = 0;
  let maxActive = 0;
  const fake = fakeClient(async () => {
    active += 1;
    maxActive = Math.max(maxActive, active);
    await new Promise((resolve) => setTimeout(resolve, 10));
    active -= 1;
    return "ok";
  });
  const gateway = new LlmOracleGateway(fake.client, silentLogger, { timeoutMs: 1000, maxConcurrentCalls: 1 });
  await Promise.all([1, 2, 3].map(() => gateway.query("prompt", { promptName: "rare_skills_v1" })));
  assert.equal(maxActive, 1);
  assert.equal(fake.calls(), 3);
});

test("aborts timed-out requests and keeps them inside the concurrency limit", async () => {
  let active = 0;
  let maxActive = 0;
  let aborted = 0;
  const fake = fakeClient(async (_call, signal) => {
    active += 1;
    maxActive = Math.max(maxActive, active);
    try {
      return await untilAborted(signal);
    } finally {
      aborted += signal?.aborted ? 1 : 0;
      active -= 1;
    }
  });
  const gateway = new LlmOracleGateway(fake.client, silentLogger, { timeoutMs: 20, maxConcurrentCalls: 1 });
  const results = await Promise.allSettled(
    [1, 2, 3].map(() => gateway.query("prompt", { promptName: "culture_fit_v1" })),
  );
  assert.deepEqual(
    results.map((result) => result.status),
    ["rejected", "rejected", "rejected"],
  );
  assert.equal(fake.calls(), 6);
  assert.equal(aborted, 6);
  assert.equal(maxActive, 1);
});

test("waits for a slow request that ignores the abort before freeing its slot", async () => {
  let active = 0;
  let maxActive = 0;
  const fake = fakeClient(async () => {
    active += 1;
    maxActive = Math.max(maxActive, active);
    await delay(40);
    active -= 1;
    return "SCORE: 1";
  });
  const gateway = new LlmOracleGateway(fake.client, silentLogger, { timeoutMs: 10, maxConcurrentCalls: 1 });
  const results = await Promise.allSettled(
    [1, 2].map(() => gateway.query("prompt", { promptName: "growth_potential_v1" })),
  );
  for (const result of results) {
    assert.ok(result.status === "rejected");
    assert.ok(result.reason instanceof OracleCallError);
    assert.equal(result.reason.code, "timeout");
  }
  assert.equal(fake.calls(), 4);
  assert.equal(maxActive, 1);
});

test("rejects every call without a configured oracle", async () => {
  await assert.rejects(new UnavailableOracleGateway().query("prompt", { promptName: "growth_potential_v1" }), {
    name: "OracleCallError",
    code: "oracle_unavailable",
  });
});

test("parses a dimension score from the oracle reply", async () => {
  const oracle = new ScriptedOracle({ industry_experience_v1: "SCORE: 6\nEXPLANATION: Logistics background." });
  const parsed = await scoreDimension(oracle, { prompt: "p", maxScore: 10, promptName: "industry_experience_v1" });
  assert.deepEqual(parsed, { score: 6, explanation: "Logistics background.", wellFormed: true });
});

test("attaches the system prompt and picks the token limit field", () => {
  const client = new LlmClient(
    { apiKey: "test-secret", baseUrl: "http://localhost:9999/v1", model: "gpt-4o-mini" },
    silentLogger,
  );
  const body = client.buildRequestBody("hello", 100, 0.2);
  assert.equal(body.messages[0]?.content, SCORING_SYSTEM_PROMPT);
  assert.deepEqual(body.messages[2], { role: "user", content: "hello" });
  assert.equal(body.max_tokens, 100);
  assert.equal(body.max_completion_tokens, undefined);

  const reasoning = new LlmClient(
    { apiKey: "test-secret", baseUrl: "http://localhost:9999/v1", model: "gpt-5-mini" },
    silentLogger,
  );
  assert.equal(reasoning.buildRequestBody("hello", 100, 0.2).max_completion_tokens, 100);
});

test("meters token usage and cost", () => {
  const meter = new UsageMeter({ inputCostPer1M: 3, outputCostPer1M: 15 });
  meter.record("soft_skills_v1", 2_000_000, 1_000_000);
  meter.record("culture_fit_v1", 10, 5);
  const snapshot = meter.snapshot();
  assert.equal(snapshot.calls, 2);
  assert.equal(snapshot.inputTokens, 2_000_010);
  assert.deepEqual(snapshot.byPrompt.culture_fit_v1, { calls: 1, inputTokens: 10, outputTokens: 5 });
  assert.equal(snapshot.estimatedCostUsd, 21.000105);

  meter.reset();
  assert.equal(meter.snapshot().calls, 0);
  assert.equal(estimateTokens("abcdefgh"), 2);
  assert.equal(estimateTokens(""), 1);
});
