export { createApp } from "./app";
export type { AppContext } from "./app";
export { loadEnv } from "./config/env";
export type { EnvConfig } from "./config/env";
export { createLogger, silentLogger } from "./config/logger";
export type { Logger, LogLevel } from "./config/logger";
export { LlmClient } from "./ai/llm.client";
export { LlmOracleGateway, OracleCallError, UnavailableOracleGateway, scoreDimension } from "./ai/oracle.gateway";
export type { OracleGateway, OracleQueryOptions } from "./ai/oracle.gateway";
export { parseMatchedSkills, parseRelevantYears, parseScoreResponse } from "./ai/parsers/score-response.parser";
export { UsageMeter } from "./ai/usage.meter";
export { normalizeJobRecord, normalizeJobRecords } from "./jobs/job-record.normalizer";
export { searchJobs } from "./jobs/job-search";
export { parseSalaryAmount } from "./jobs/parsers/salary.parser";
export {
  ExperienceExtractor,
  extractRequiredYears,
  extractYearsFromDates,
  extractYearsFromKeywords,
} from "./matching/experience/experience-extractor";
export { ScoreExplainerService } from "./matching/explanation/score-explainer.service";
export { MatchCache, matchCacheKey } from "./matching/match-cache";
export { toMatchPayload } from "./matching/match.serializer";
export { ScoringEngine, createScoringEngine } from "./matching/matching.engine";
export { BonusScorer } from "./matching/scoring/bonus.scorer";
export { DeterministicScorer } from "./matching/scoring/deterministic.scorer";
export { SemanticScorer } from "./matching/scoring/semantic.scorer";
export { matchesRequirement } from "./matching/skills/skill-matcher";
export { quickScore } from "./matching/triage/quick-score";
export { TriagePipeline } from "./matching/triage/triage.pipeline";
export type { RankedMatch, TriageResult } from "./matching/triage/triage.pipeline";
export type { CandidateContext, JobRecord, JobSearchCriteria } from "./shared/types/job.types";
export type { DetailedMatch, DetailedMatchPayload, ScoreBreakdown, ScoreDetail } from "./shared/types/scoring.types";
