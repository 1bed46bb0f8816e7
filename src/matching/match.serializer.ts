import {
  DetailedMatch,
  DetailedMatchPayload,
  ScoreDetail,
  ScoreDetailPayload,
  ScoreGroupPayload,
} from "../shared/types/scoring.types";
import { round2 } from "./scoring/score-detail";

export function toMatchPayload(match: DetailedMatch): DetailedMatchPayload {
  const { deterministic, semantic, bonus } = match.scoreBreakdown;
  return {
    job_title: match.jobTitle,
    company: match.company,
    match_score: round2(match.matchScore),
    score_breakdown: {
      deterministic: toGroupPayload(deterministic.total, deterministic.maxTotal, {
        skills_matching: deterministic.skillsMatching,
        experience_years: deterministic.experienceYears,
        education_match: deterministic.educationMatch,
        salary_fit: deterministic.salaryFit,
        location_match: deterministic.locationMatch,
      }),
      semantic: toGroupPayload(semantic.total, semantic.maxTotal, {
        soft_skills_match: semantic.softSkillsMatch,
        culture_fit: semantic.cultureFit,
        growth_potential: semantic.growthPotential,
        project_relevance: semantic.projectRelevance,
      }),
      bonus: toGroupPayload(bonus.total, bonus.maxTotal, {
        industry_experience: bonus.industryExperience,
        rare_skills_premium: bonus.rareSkillsPremium,
        career_trajectory: bonus.careerTrajectory,
      }),
    },
    overall_explanation: match.overallExplanation,
    strengths: [...match.strengths],
    weaknesses: [...match.weaknesses],
    recommendation: match.recommendation,
    salary: match.salary,
    location: match.location,
  };
}

function toGroupPayload(
  total: number,
  max: number,
  details: Record<string, ScoreDetail>,
): ScoreGroupPayload {
  const output: Record<string, ScoreDetailPayload> = {};
  for (const [key, detail] of Object.entries(details)) {
    output[key] = toDetailPayload(detail);
  }
  return {
    total: round2(total),
    max,
    details: output,
  };
}

function toDetailPayload(detail: ScoreDetail): ScoreDetailPayload {
  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(detail.metadata)) {
    // Copied so edits to a payload never reach a cached detail.
    metadata[key] = Array.isArray(value) ? [...value] : value;
  }
  return {
    ...metadata,
    score: round2(detail.score),
    max: detail.maxScore,
    explanation: detail.explanation,
  };
}
