import { clampToRange } from "../../matching/scoring/score-detail";

export interface ParsedScore {
  score: number;
  explanation: string;
  /** false when no usable SCORE line was found and the value was salvaged or zeroed */
  wellFormed: boolean;
}

export interface ParsedRelevantYears {
  years: number;
  explanation: string;
}

const SCORE_PREFIX = "SCORE:";
const EXPLANATION_PREFIX = "EXPLANATION:";
const RELEVANT_YEARS_PREFIX = "RELEVANT_YEARS:";
const MATCHED_PREFIX = "MATCHED:";
const FIRST_NUMBER_PATTERN = /\d+\.?\d*/;
const MAX_RELEVANT_YEARS = 50;

/**
 * Reads a `SCORE: n` / `EXPLANATION: text` reply. The score may carry a
 * denominator ("12.5/15"). Without a usable SCORE line the first number in
 * the reply is salvaged, else 0. Always clamped to [0, maxScore].
 */
export function parseScoreResponse(response: string, maxScore: number): ParsedScore {
  const trimmed = response.trim();
  let score: number | null = null;
  let explanation: string | null = null;

  for (const line of splitLines(trimmed)) {
    if (score === null && line.startsWith(SCORE_PREFIX)) {
      const value = Number.parseFloat(line.slice(SCORE_PREFIX.length).split("/")[0].trim());
      if (Number.isFinite(value)) {
        score = value;
      }
    } else if (explanation === null && line.startsWith(EXPLANATION_PREFIX)) {
      const text = line.slice(EXPLANATION_PREFIX.length).trim();
      if (text) {
        explanation = text;
      }
    }
  }

  const wellFormed = score !== null;
  if (score === null) {
    const salvaged = trimmed.match(FIRST_NUMBER_PATTERN);
    score = salvaged ? Number.parseFloat(salvaged[0]) : 0;
  }

  return {
    score: clampToRange(score, 0, maxScore),
    explanation: explanation ?? trimmed,
    wellFormed,
  };
}

/**
 * Reads a `RELEVANT_YEARS: n` / `EXPLANATION: text` reply. Decimal years are
 * truncated and clamped to [0, 50]. Returns null when the reply carries
 * neither a usable year count nor an explanation.
 */
export function parseRelevantYears(response: string): ParsedRelevantYears | null {
  let years: number | null = null;
  let explanation: string | null = null;

  for (const line of splitLines(response.trim())) {
    if (years === null && line.startsWith(RELEVANT_YEARS_PREFIX)) {
      const value = Number.parseFloat(line.slice(RELEVANT_YEARS_PREFIX.length).trim());
      if (Number.isFinite(value)) {
        years = clampToRange(Math.trunc(value), 0, MAX_RELEVANT_YEARS);
      }
    } else if (explanation === null && line.startsWith(EXPLANATION_PREFIX)) {
      const text = line.slice(EXPLANATION_PREFIX.length).trim();
      if (text) {
        explanation = text;
      }
    }
  }

  if (years === null && explanation === null) {
    return null;
  }
  if (years === null || years === 0) {
    // A zero without reasoning is indistinguishable from a broken reply.
    return explanation === null ? null : { years: years ?? 0, explanation };
  }
  return { years, explanation: explanation ?? `${years} relevant years` };
}

/** Reads `MATCHED: [a, b]`; `MATCHED: []` and a missing line both give an empty list. */
export function parseMatchedSkills(response: string): string[] {
  for (const line of splitLines(response.trim())) {
    if (!line.startsWith(MATCHED_PREFIX)) {
      continue;
    }
    const inner = line
      .slice(MATCHED_PREFIX.length)
      .trim()
      .replace(/^\[/, "")
      .replace(/\]$/, "");
    return inner
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  return [];
}

function splitLines(text: string): string[] {
  return text.split(/\r?\n/).map((line) => line.trim());
}
