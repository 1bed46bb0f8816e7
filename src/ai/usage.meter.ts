export interface UsageSnapshot {
  calls: number;
  inputTokens: number;
  outputTokens: number;
  estimatedCostUsd: number;
  byPrompt: Record<string, { calls: number; inputTokens: number; outputTokens: number }>;
}

export interface UsagePricing {
  inputCostPer1M: number;
  outputCostPer1M: number;
}

/**
 * Accumulates token usage across oracle calls. One meter is shared by every
 * request an engine serves; call `reset()` to start a new accounting window.
 */
export class UsageMeter {
  private calls = 0;
  private inputTokens = 0;
  private outputTokens = 0;
  private readonly byPrompt = new Map<string, { calls: number; inputTokens: number; outputTokens: number }>();

  constructor(private readonly pricing: UsagePricing) {}

  record(promptName: string, inputTokens: number, outputTokens: number): void {
    const input = Math.max(0, Math.round(inputTokens));
    const output = Math.max(0, Math.round(outputTokens));
    this.calls += 1;
    this.inputTokens += input;
    this.outputTokens += output;

    const current = this.byPrompt.get(promptName) ?? { calls: 0, inputTokens: 0, outputTokens: 0 };
    this.byPrompt.set(promptName, {
      calls: current.calls + 1,
      inputTokens: current.inputTokens + input,
      outputTokens: current.outputTokens + output,
    });
  }

  snapshot(): UsageSnapshot {
    const cost =
      (this.inputTokens / 1_000_000) * this.pricing.inputCostPer1M +
      (this.outputTokens / 1_000_000) * this.pricing.outputCostPer1M;
    return {
      calls: this.calls,
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      estimatedCostUsd: Math.round(cost * 1_000_000) / 1_000_000,
      byPrompt: Object.fromEntries(this.byPrompt.entries()),
    };
  }

  reset(): void {
    this.calls = 0;
    this.inputTokens = 0;
    this.outputTokens = 0;
    this.byPrompt.clear();
  }
}

export function estimateTokens(text: string): number {
  return Math.max(1, Math.round(text.length / 4));
}
