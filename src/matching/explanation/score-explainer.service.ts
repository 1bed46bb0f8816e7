import { Logger, LoggerContext, errorMessage, logContext } from "../../config/logger";
import { OracleGateway } from "../../ai/oracle.gateway";
import { buildMatchSummaryV1Prompt } from "../../ai/prompts/scoring/match-summary.v1.prompt";
import {
  BonusScore,
  DeterministicScore,
  DetailedMatch,
  JobMeta,
  ScoreBreakdown,
  ScoreDetail,
  SemanticScore,
} from "../../shared/types/scoring.types";
import { buildScoreBreakdown } from "../scoring/score-detail";

const MAX_STRENGTHS = 5;
const MAX_WEAKNESSES = 4;

interface Tier {
  minScore: number;
  label: string;
  recommendation: string;
}

const TIERS: ReadonlyArray<Tier> = [
  {
    minScore: 85,
    label: "Excellent",
    recommendation: "Strongly recommended - Excellent candidate, proceed to interview immediately",
  },
  { minScore: 75, label: "Strong", recommendation: "Recommended - Strong candidate, proceed to interview" },
  { minScore: 65, label: "Good", recommendation: "Consider for interview - Good candidate with minor gaps" },
  { minScore: 50, label: "Moderate", recommendation: "Moderate fit - Review carefully before proceeding" },
  { minScore: -Infinity, label: "Weak", recommendation: "Not recommended - Significant gaps in requirements" },
];

export class ScoreExplainerService {
  constructor(
    private readonly oracle: OracleGateway | null,
    private readonly logger: Logger,
  ) {}

  async aggregate(
    deterministic: DeterministicScore,
    semantic: SemanticScore,
    bonus: BonusScore,
    jobMeta: JobMeta,
    context: LoggerContext = {},
  ): Promise<DetailedMatch> {
    const breakdown = buildScoreBreakdown(deterministic, semantic, bonus);
    const summary = await this.explain(breakdown, jobMeta.title, context);

    return Object.freeze({
      jobTitle: jobMeta.title,
      company: jobMeta.company,
      matchScore: breakdown.totalScore,
      scoreBreakdown: breakdown,
      overallExplanation: summary.text,
      strengths: Object.freeze(extractStrengths(breakdown)),
      weaknesses: Object.freeze(extractWeaknesses(breakdown)),
      recommendation: recommendationFor(breakdown.totalScore),
      salary: jobMeta.salary,
      location: jobMeta.location,
      degraded: this.oracle !== null && (summary.oracleFailed || hasOracleFailure(breakdown)),
    });
  }

  private async explain(
    breakdown: ScoreBreakdown,
    jobTitle: string,
    context: LoggerContext,
  ): Promise<{ text: string; oracleFailed: boolean }> {
    if (!this.oracle) {
      return { text: buildFallbackExplanation(breakdown), oracleFailed: false };
    }
    try {
      const text = await this.oracle.query(buildMatchSummaryV1Prompt({ jobTitle, breakdown }), {
        promptName: "match_summary_v1",
        maxTokens: 512,
      });
      if (text.trim()) {
        return { text: text.trim(), oracleFailed: false };
      }
      logContext(this.logger, "warn", "explanation.summary.empty_reply", { ...context, stage: "explain" });
      return { text: buildFallbackExplanation(breakdown), oracleFailed: false };
    } catch (error) {
      logContext(
        this.logger,
        "warn",
        "explanation.summary.fallback",
        { ...context, stage: "explain" },
        { error: errorMessage(error) },
      );
      return { text: buildFallbackExplanation(breakdown), oracleFailed: true };
    }
  }
}

export function extractStrengths(breakdown: ScoreBreakdown): string[] {
  const { deterministic: det, semantic: sem, bonus } = breakdown;
  const strengths: string[] = [];

  if (det.skillsMatching.score >= 12) {
    const matched = listMeta(det.skillsMatching, "matched_skills").length;
    strengths.push(`Strong technical skills with ${matched}+ matched competencies`);
  }
  if (det.experienceYears.score >= 8) {
    strengths.push(`Excellent experience level (${numberMeta(det.experienceYears, "resume_years")}+ years)`);
  }
  if (det.educationMatch.score >= 4) {
    strengths.push("Strong educational background");
  }
  if (det.salaryFit.score >= 4) {
    strengths.push("Salary expectations well-aligned");
  }
  if (det.locationMatch.score >= 4) {
    strengths.push("Excellent location fit");
  }
  if (sem.softSkillsMatch.score >= 12) {
    strengths.push("Outstanding soft skills and communication");
  }
  if (sem.cultureFit.score >= 8) {
    strengths.push("Excellent cultural alignment");
  }
  if (sem.growthPotential.score >= 8) {
    strengths.push("High growth potential and adaptability");
  }
  if (sem.projectRelevance.score >= 4) {
    strengths.push("Highly relevant project experience");
  }
  if (bonus.industryExperience.score >= 7) {
    strengths.push("Strong industry-specific experience");
  }
  if (bonus.rareSkillsPremium.score >= 4) {
    strengths.push("Rare and highly valuable technical skills");
  }
  if (bonus.careerTrajectory.score >= 4) {
    strengths.push("Coherent and progressive career path");
  }

  return strengths.length > 0 ? strengths.slice(0, MAX_STRENGTHS) : ["Meets basic requirements"];
}

export function extractWeaknesses(breakdown: ScoreBreakdown): string[] {
  const { deterministic: det, semantic: sem, bonus } = breakdown;
  const weaknesses: string[] = [];

  if (det.skillsMatching.score < 10) {
    const missing = listMeta(det.skillsMatching, "missing_skills").length;
    if (missing > 0) {
      weaknesses.push(`Missing ${missing} key technical skills`);
    }
  }
  if (det.experienceYears.score < 5) {
    weaknesses.push(
      `Experience level below requirement (${numberMeta(det.experienceYears, "required_years")} years needed)`,
    );
  }
  if (det.educationMatch.score < 3) {
    weaknesses.push("Education level could be higher");
  }
  if (det.salaryFit.score < 3) {
    weaknesses.push("Salary expectations may not align");
  }
  if (det.locationMatch.score < 3) {
    weaknesses.push("Location not optimal");
  }
  if (sem.softSkillsMatch.score < 10) {
    weaknesses.push("Soft skills need development");
  }
  if (sem.cultureFit.score < 6) {
    weaknesses.push("Cultural fit uncertain");
  }
  if (sem.growthPotential.score < 6) {
    weaknesses.push("Growth potential unclear");
  }
  if (sem.projectRelevance.score < 3) {
    weaknesses.push("Limited relevant project experience");
  }
  if (bonus.industryExperience.score < 5) {
    weaknesses.push("Limited industry-specific experience");
  }
  if (bonus.rareSkillsPremium.score < 2) {
    weaknesses.push("Few rare or specialized skills");
  }
  if (bonus.careerTrajectory.score < 3) {
    weaknesses.push("Career progression unclear");
  }

  return weaknesses.length > 0 ? weaknesses.slice(0, MAX_WEAKNESSES) : ["No significant weaknesses identified"];
}

export function recommendationFor(totalScore: number): string {
  return tierFor(totalScore).recommendation;
}

/**
 * Template summary used when the oracle is absent or fails: tier label, the
 * two dimensions with the best score/max ratio and the two with the worst.
 */
export function buildFallbackExplanation(breakdown: ScoreBreakdown): string {
  const { deterministic: det, semantic: sem, bonus } = breakdown;
  const dimensions: Array<{ label: string; detail: ScoreDetail }> = [
    { label: "skills", detail: det.skillsMatching },
    { label: "experience", detail: det.experienceYears },
    { label: "education", detail: det.educationMatch },
    { label: "salary fit", detail: det.salaryFit },
    { label: "location", detail: det.locationMatch },
    { label: "soft skills", detail: sem.softSkillsMatch },
    { label: "culture fit", detail: sem.cultureFit },
    { label: "growth potential", detail: sem.growthPotential },
    { label: "project relevance", detail: sem.projectRelevance },
    { label: "industry experience", detail: bonus.industryExperience },
    { label: "rare skills", detail: bonus.rareSkillsPremium },
    { label: "career trajectory", detail: bonus.careerTrajectory },
  ];

  const ranked = [...dimensions].sort((a, b) => ratio(b.detail) - ratio(a.detail));
  const best = ranked.slice(0, 2).map((entry) => entry.label);
  const worst = ranked.slice(-2).map((entry) => entry.label);

  return (
    `${tierFor(breakdown.totalScore).label} candidate with ${breakdown.totalScore.toFixed(0)}/100. ` +
    `Strong ${best.join(" and ")}. ` +
    `Could improve ${worst.join(" and ")}.`
  );
}

/** A dimension that errored out, or a deterministic one whose oracle step fell back after a failure. */
export function hasOracleFailure(breakdown: ScoreBreakdown): boolean {
  return allDetails(breakdown).some(
    (detail) => detail.explanation.startsWith("error:") || detail.metadata.oracle_failed === true,
  );
}

function allDetails(breakdown: ScoreBreakdown): ScoreDetail[] {
  const { deterministic: det, semantic: sem, bonus } = breakdown;
  return [
    det.skillsMatching,
    det.experienceYears,
    det.educationMatch,
    det.salaryFit,
    det.locationMatch,
    sem.softSkillsMatch,
    sem.cultureFit,
    sem.growthPotential,
    sem.projectRelevance,
    bonus.industryExperience,
    bonus.rareSkillsPremium,
    bonus.careerTrajectory,
  ];
}

function tierFor(totalScore: number): Tier {
  return TIERS.find((tier) => totalScore >= tier.minScore) ?? TIERS[TIERS.length - 1];
}

function ratio(detail: ScoreDetail): number {
  return detail.maxScore > 0 ? detail.score / detail.maxScore : 0;
}

function numberMeta(detail: ScoreDetail, key: string): number {
  const value = detail.metadata[key];
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function listMeta(detail: ScoreDetail, key: string): unknown[] {
  const value = detail.metadata[key];
  return Array.isArray(value) ? value : [];
}
