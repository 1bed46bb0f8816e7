import { Logger, errorMessage } from "../../config/logger";
import { OracleGateway } from "../../ai/oracle.gateway";
import { parseRelevantYears } from "../../ai/parsers/score-response.parser";
import { buildRelevantExperienceV1Prompt } from "../../ai/prompts/scoring/relevant-experience.v1.prompt";

const MIN_PLAUSIBLE_YEAR = 1950;

const CLOSED_RANGE_PATTERNS = [/(\d{4})\s*[-–—]\s*(\d{4})/g, /(\d{4})\s+(?:à|a|to)\s+(\d{4})/gi];

const OPEN_RANGE_PATTERNS = [
  /(?:depuis|since)\s+(\d{4})/gi,
  /(\d{4})\s+(?:à|a|to)\s+(?:aujourd['’]?hui|present|now|maintenant)/gi,
];

const RESUME_YEARS_KEYWORD_PATTERNS = [
  /(\d+)\+?\s*(?:years?|ans?)\s+(?:of\s+)?(?:experience|expérience)/,
  /(?:experience|expérience)\s*:?\s*(\d+)\+?\s*(?:years?|ans?)/,
  /(\d+)\+?\s*(?:years?|ans?)\s+(?:in|dans|en)/,
];

const REQUIRED_YEARS_PATTERNS = [
  /(\d+)\+?\s*(?:years?|ans?)\s+(?:of\s+)?(?:experience|expérience)/,
  /minimum\s+(?:of\s+)?(\d+)\s*(?:years?|ans?)/,
  /at least\s+(\d+)\s*(?:years?|ans?)/,
];

export interface RelevantYearsResult {
  years: number;
  explanation: string;
  /** true only when the oracle answered and its reply was usable */
  usedOracle: boolean;
  /** set when the oracle call itself failed */
  oracleFailed?: true;
}

/**
 * Sums the spans of dated work periods. Closed ranges count `end - start`;
 * open ranges ("Depuis 2015", "2015 to present") count up to the reference
 * year unless a closed range already starts that year. An identical
 * (start, end) pair is counted once, but distinct overlapping spans are
 * summed as-is.
 */
export function extractYearsFromDates(text: string, referenceYear: number): number {
  let total = 0;
  const counted = new Set<string>();
  const countedStarts = new Set<number>();

  for (const pattern of CLOSED_RANGE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const start = Number(match[1]);
      const end = Number(match[2]);
      if (start < MIN_PLAUSIBLE_YEAR || start > referenceYear || end < start || end > referenceYear + 1) {
        continue;
      }
      const key = `${start}-${end}`;
      if (counted.has(key)) {
        continue;
      }
      counted.add(key);
      countedStarts.add(start);
      total += end - start;
    }
  }

  for (const pattern of OPEN_RANGE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const start = Number(match[1]);
      if (start < MIN_PLAUSIBLE_YEAR || start > referenceYear || countedStarts.has(start)) {
        continue;
      }
      counted.add(`${start}-${referenceYear}`);
      countedStarts.add(start);
      total += referenceYear - start;
    }
  }

  return total;
}

/** "5 years of experience", "expérience : 8 ans", "3 ans dans ..."; the largest figure wins. */
export function extractYearsFromKeywords(text: string): number {
  return largestFirstMatch(text.toLowerCase(), RESUME_YEARS_KEYWORD_PATTERNS);
}

/**
 * Years demanded by a job posting. Explicit figures win; otherwise seniority
 * words decide (senior or lead 5, junior or graduate 1, else 3).
 */
export function extractRequiredYears(jobDescription: string): number {
  const lower = jobDescription.toLowerCase();
  const explicit = largestFirstMatch(lower, REQUIRED_YEARS_PATTERNS);
  if (explicit > 0) {
    return explicit;
  }
  if (lower.includes("senior") || lower.includes("lead")) {
    return 5;
  }
  if (lower.includes("junior") || lower.includes("graduate")) {
    return 1;
  }
  return 3;
}

function largestFirstMatch(text: string, patterns: ReadonlyArray<RegExp>): number {
  let largest = 0;
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match) {
      largest = Math.max(largest, Number(match[1]));
    }
  }
  return largest;
}

export class ExperienceExtractor {
  constructor(
    private readonly oracle: OracleGateway | null,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  hasOracle(): boolean {
    return this.oracle !== null;
  }

  extractYears(text: string): number {
    return extractYearsFromDates(text, this.now().getFullYear());
  }

  extractYearsFromKeywords(text: string): number {
    return extractYearsFromKeywords(text);
  }

  async extractRelevantYears(
    resumeText: string,
    jobTitle: string,
    jobDescription: string,
  ): Promise<RelevantYearsResult> {
    if (!this.oracle) {
      return {
        years: this.extractYears(resumeText),
        explanation: "Total experience (relevance evaluation unavailable)",
        usedOracle: false,
      };
    }

    const promptName = "relevant_experience_v1";
    try {
      const reply = await this.oracle.query(
        buildRelevantExperienceV1Prompt({ jobTitle, jobDescription, resumeText }),
        { promptName, maxTokens: 512 },
      );
      const parsed = parseRelevantYears(reply);
      if (parsed) {
        return { years: parsed.years, explanation: parsed.explanation, usedOracle: true };
      }
      const totalYears = this.extractYears(resumeText);
      this.logger.warn("experience.relevant_years.parse_fallback", {
        promptName,
        jobTitle,
        fallbackYears: totalYears,
        reply,
      });
      return {
        years: totalYears,
        explanation: `Fallback: ${totalYears} years total experience`,
        usedOracle: false,
      };
    } catch (error) {
      const totalYears = this.extractYears(resumeText);
      this.logger.warn("experience.relevant_years.error_fallback", {
        promptName,
        jobTitle,
        fallbackYears: totalYears,
        error: errorMessage(error),
      });
      return {
        years: totalYears,
        explanation: `Fallback due to error: ${totalYears} years total experience`,
        usedOracle: false,
        oracleFailed: true,
      };
    }
  }
}
