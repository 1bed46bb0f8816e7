import { escapeRegExp } from "../../shared/utils/text.util";

const STOP_WORDS = new Set([
  "a",
  "an",
  "the",
  "of",
  "and",
  "or",
  "in",
  "on",
  "at",
  "to",
  "for",
  "de",
  "des",
  "et",
  "ou",
  "à",
]);

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;
const CERTIFICATION_CODE_PATTERN = /\b([A-Z]+\d*)\b/;
const SEPARATORS_PATTERN = /[/\-\s]+/g;
const MAX_ACRONYM_LENGTH = 10;

/**
 * Decides whether a single job requirement is satisfied by free text (usually a resume).
 * Strategies run in order and the first hit wins:
 * 1. full requirement as a case-insensitive substring
 * 2. every non stop-word token present
 * 3. licence or certification code ("Permis C", "License B2") as a standalone token
 * 4. separator-insensitive acronym match for short requirements ("CI/CD" vs "cicd")
 */
export function matchesRequirement(requirement: string, text: string): boolean {
  const requirementLower = requirement.toLowerCase();
  const textLower = text.toLowerCase();

  if (textLower.includes(requirementLower)) {
    return true;
  }

  const tokens = (requirementLower.match(WORD_PATTERN) ?? []).filter((token) => !STOP_WORDS.has(token));
  if (tokens.every((token) => textLower.includes(token))) {
    return true;
  }

  if (requirementLower.includes("permis") || requirementLower.includes("license")) {
    const code = requirement.match(CERTIFICATION_CODE_PATTERN)?.[1];
    if (code && matchesCertificationCode(code, text)) {
      return true;
    }
  }

  const normalizedRequirement = stripSeparators(requirementLower);
  if (
    normalizedRequirement.length <= MAX_ACRONYM_LENGTH &&
    stripSeparators(textLower).includes(normalizedRequirement)
  ) {
    return true;
  }

  return false;
}

export function partitionByMatch(
  requirements: ReadonlyArray<string>,
  text: string,
): { matched: string[]; missing: string[] } {
  const matched: string[] = [];
  const missing: string[] = [];
  for (const requirement of requirements) {
    if (matchesRequirement(requirement, text)) {
      matched.push(requirement);
    } else {
      missing.push(requirement);
    }
  }
  return { matched, missing };
}

function matchesCertificationCode(code: string, text: string): boolean {
  const escaped = escapeRegExp(code);
  const patterns = [`\\b${escaped}\\b`, `,${escaped}\\b`, `\\b${escaped},`, `/${escaped}\\b`];
  return patterns.some((pattern) => new RegExp(pattern, "i").test(text));
}

function stripSeparators(value: string): string {
  return value.replace(SEPARATORS_PATTERN, "");
}
