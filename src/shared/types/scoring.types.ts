export type ScoreMetadata = Readonly<Record<string, unknown>>;

export interface ScoreDetail {
  readonly score: number;
  readonly maxScore: number;
  readonly explanation: string;
  readonly metadata: ScoreMetadata;
}

export interface DeterministicScore {
  readonly skillsMatching: ScoreDetail;
  readonly experienceYears: ScoreDetail;
  readonly educationMatch: ScoreDetail;
  readonly salaryFit: ScoreDetail;
  readonly locationMatch: ScoreDetail;
  readonly total: number;
  readonly maxTotal: 40;
}

export interface SemanticScore {
  readonly softSkillsMatch: ScoreDetail;
  readonly cultureFit: ScoreDetail;
  readonly growthPotential: ScoreDetail;
  readonly projectRelevance: ScoreDetail;
  readonly total: number;
  readonly maxTotal: 40;
}

export interface BonusScore {
  readonly industryExperience: ScoreDetail;
  readonly rareSkillsPremium: ScoreDetail;
  readonly careerTrajectory: ScoreDetail;
  readonly total: number;
  readonly maxTotal: 20;
}

export interface ScoreBreakdown {
  readonly deterministic: DeterministicScore;
  readonly semantic: SemanticScore;
  readonly bonus: BonusScore;
  readonly totalScore: number;
  readonly maxScore: 100;
}

export interface JobMeta {
  title: string;
  company: string;
  salary: number;
  location: string;
}

export interface DetailedMatch {
  readonly jobTitle: string;
  readonly company: string;
  readonly matchScore: number;
  readonly scoreBreakdown: ScoreBreakdown;
  readonly overallExplanation: string;
  readonly strengths: ReadonlyArray<string>;
  readonly weaknesses: ReadonlyArray<string>;
  readonly recommendation: string;
  readonly salary: number;
  readonly location: string;
  /** a configured oracle failed somewhere and a fallback stood in for it */
  readonly degraded: boolean;
}

export type DimensionKey =
  | "skills_matching"
  | "experience_years"
  | "education_match"
  | "salary_fit"
  | "location_match"
  | "soft_skills_match"
  | "culture_fit"
  | "growth_potential"
  | "project_relevance"
  | "industry_experience"
  | "rare_skills_premium"
  | "career_trajectory";

export interface ScoreDetailPayload {
  score: number;
  max: number;
  explanation: string;
  [metadataKey: string]: unknown;
}

export interface ScoreGroupPayload {
  total: number;
  max: number;
  details: Record<string, ScoreDetailPayload>;
}

export interface DetailedMatchPayload {
  job_title: string;
  company: string;
  match_score: number;
  score_breakdown: {
    deterministic: ScoreGroupPayload;
    semantic: ScoreGroupPayload;
    bonus: ScoreGroupPayload;
  };
  overall_explanation: string;
  strengths: string[];
  weaknesses: string[];
  recommendation: string;
  salary: number;
  location: string;
}
