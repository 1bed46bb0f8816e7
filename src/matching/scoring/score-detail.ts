import {
  BonusScore,
  DeterministicScore,
  ScoreBreakdown,
  ScoreDetail,
  SemanticScore,
} from "../../shared/types/scoring.types";

export const SKILLS_MAX = 15;
export const EXPERIENCE_MAX = 10;
export const EDUCATION_MAX = 5;
export const SALARY_MAX = 5;
export const LOCATION_MAX = 5;

export const SOFT_SKILLS_MAX = 15;
export const CULTURE_FIT_MAX = 10;
export const GROWTH_POTENTIAL_MAX = 10;
export const PROJECT_RELEVANCE_MAX = 5;

export const INDUSTRY_EXPERIENCE_MAX = 10;
export const RARE_SKILLS_MAX = 5;
export const CAREER_TRAJECTORY_MAX = 5;

/**
 * Builds a frozen ScoreDetail. Out-of-range and non-finite scores are clamped
 * into [0, maxScore] here so no code path can produce an invalid detail.
 * Array metadata values are copied and frozen as well.
 */
export function createScoreDetail(
  score: number,
  maxScore: number,
  explanation: string,
  metadata: Record<string, unknown> = {},
): ScoreDetail {
  return Object.freeze({
    score: clampToRange(Number.isFinite(score) ? score : 0, 0, maxScore),
    maxScore,
    explanation,
    metadata: Object.freeze(freezeMetadata(metadata)),
  });
}

function freezeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const frozen: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    frozen[key] = Array.isArray(value) ? Object.freeze([...value]) : value;
  }
  return frozen;
}

export function errorScoreDetail(maxScore: number, error: unknown): ScoreDetail {
  const message = error instanceof Error ? error.message : String(error);
  return createScoreDetail(0, maxScore, `error: ${message}`);
}

export function buildDeterministicScore(parts: {
  skillsMatching: ScoreDetail;
  experienceYears: ScoreDetail;
  educationMatch: ScoreDetail;
  salaryFit: ScoreDetail;
  locationMatch: ScoreDetail;
}): DeterministicScore {
  return Object.freeze({
    ...parts,
    total: sumScores([
      parts.skillsMatching,
      parts.experienceYears,
      parts.educationMatch,
      parts.salaryFit,
      parts.locationMatch,
    ]),
    maxTotal: 40,
  });
}

export function buildSemanticScore(parts: {
  softSkillsMatch: ScoreDetail;
  cultureFit: ScoreDetail;
  growthPotential: ScoreDetail;
  projectRelevance: ScoreDetail;
}): SemanticScore {
  return Object.freeze({
    ...parts,
    total: sumScores([
      parts.softSkillsMatch,
      parts.cultureFit,
      parts.growthPotential,
      parts.projectRelevance,
    ]),
    maxTotal: 40,
  });
}

export function buildBonusScore(parts: {
  industryExperience: ScoreDetail;
  rareSkillsPremium: ScoreDetail;
  careerTrajectory: ScoreDetail;
}): BonusScore {
  return Object.freeze({
    ...parts,
    total: sumScores([parts.industryExperience, parts.rareSkillsPremium, parts.careerTrajectory]),
    maxTotal: 20,
  });
}

export function buildScoreBreakdown(
  deterministic: DeterministicScore,
  semantic: SemanticScore,
  bonus: BonusScore,
): ScoreBreakdown {
  return Object.freeze({
    deterministic,
    semantic,
    bonus,
    totalScore: deterministic.total + semantic.total + bonus.total,
    maxScore: 100,
  });
}

function sumScores(details: ReadonlyArray<ScoreDetail>): number {
  return details.reduce((sum, detail) => sum + detail.score, 0);
}

export function clampToRange(value: number, min: number, max: number): number {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
