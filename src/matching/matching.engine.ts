import { EnvConfig } from "../config/env";
import { Logger, LoggerContext, logContext } from "../config/logger";
import { LlmClient } from "../ai/llm.client";
import { LlmOracleGateway, OracleGateway, UnavailableOracleGateway } from "../ai/oracle.gateway";
import { UsageMeter, UsageSnapshot } from "../ai/usage.meter";
import { searchJobs } from "../jobs/job-search";
import { CandidateContext, JobRecord, JobSearchCriteria } from "../shared/types/job.types";
import { DetailedMatch } from "../shared/types/scoring.types";
import { mapWithConcurrency } from "../shared/utils/worker-pool";
import { ExperienceExtractor } from "./experience/experience-extractor";
import { ScoreExplainerService } from "./explanation/score-explainer.service";
import { MatchCache, jobKeyOf, matchCacheKey } from "./match-cache";
import { BonusScorer } from "./scoring/bonus.scorer";
import { DeterministicScorer } from "./scoring/deterministic.scorer";
import { SemanticScorer } from "./scoring/semantic.scorer";
import { JobScorer, TriagePipeline, TriageResult } from "./triage/triage.pipeline";

const DEFAULT_MATCH_CONCURRENCY = 2;
const DEFAULT_TRIAGE_TOP_N = 3;
const DEFAULT_TRIAGE_MIN_QUICK_SCORE = 45;

export interface ScoringEngineOptions {
  /** null runs deterministic-only: oracle dimensions score 0 with an error explanation */
  oracle: OracleGateway | null;
  logger: Logger;
  cache?: MatchCache;
  usageMeter?: UsageMeter;
  matchConcurrency?: number;
  triageTopN?: number;
  triageMinQuickScore?: number;
  now?: () => Date;
}

export class ScoringEngine implements JobScorer {
  private readonly logger: Logger;
  private readonly deterministicScorer: DeterministicScorer;
  private readonly semanticScorer: SemanticScorer;
  private readonly bonusScorer: BonusScorer;
  private readonly explainer: ScoreExplainerService;
  private readonly triage: TriagePipeline;
  private readonly matchConcurrency: number;

  constructor(private readonly options: ScoringEngineOptions) {
    this.logger = options.logger;
    const oracle = options.oracle;
    const requiredOracle = oracle ?? new UnavailableOracleGateway();
    this.matchConcurrency = options.matchConcurrency ?? DEFAULT_MATCH_CONCURRENCY;

    this.deterministicScorer = new DeterministicScorer(
      new ExperienceExtractor(oracle, this.logger, options.now),
      oracle,
      this.logger,
    );
    this.semanticScorer = new SemanticScorer(requiredOracle, this.logger);
    this.bonusScorer = new BonusScorer(requiredOracle, this.logger);
    this.explainer = new ScoreExplainerService(oracle, this.logger);
    this.triage = new TriagePipeline(this, this.logger, {
      topN: options.triageTopN ?? DEFAULT_TRIAGE_TOP_N,
      minQuickScore: options.triageMinQuickScore ?? DEFAULT_TRIAGE_MIN_QUICK_SCORE,
      concurrency: this.matchConcurrency,
    });
  }

  async scoreCandidate(resumeText: string, job: JobRecord, context: CandidateContext = {}): Promise<DetailedMatch> {
    const logFields: LoggerContext = {
      job_title: job.title,
      company: job.company,
      job_key: jobKeyOf(job),
      used_oracle: this.options.oracle !== null,
    };
    const cacheKey = matchCacheKey(resumeText, job, context);
    const cached = this.options.cache?.get(cacheKey);
    if (cached) {
      logContext(this.logger, "debug", "match.cache.hit", { ...logFields, cache_hit: true });
      return cached;
    }

    const startedAt = Date.now();
    const [deterministic, semantic, bonus] = await Promise.all([
      this.deterministicScorer.score(
        {
          resumeText,
          jobRequirements: job.requirements,
          jobDescription: job.description,
          jobLocation: job.location,
          jobSalary: job.salary,
          jobTitle: job.title,
          candidateLocation: context.location,
          candidateSalaryExpectation: context.salaryExpectation,
        },
        { ...logFields, stage: "deterministic" },
      ),
      this.semanticScorer.score(
        { resumeText, jobDescription: job.description, jobTitle: job.title, companyCulture: job.culture },
        { ...logFields, stage: "semantic" },
      ),
      this.bonusScorer.score(
        { resumeText, jobDescription: job.description, jobTitle: job.title, industry: job.industry },
        { ...logFields, stage: "bonus" },
      ),
    ]);

    const match = await this.explainer.aggregate(
      deterministic,
      semantic,
      bonus,
      { title: job.title, company: job.company, salary: job.salary, location: job.location },
      { ...logFields, stage: "explain" },
    );

    if (match.degraded) {
      logContext(this.logger, "warn", "match.cache.skip_degraded", logFields);
    } else {
      this.options.cache?.set(cacheKey, match);
    }
    logContext(
      this.logger,
      "info",
      "match.scored",
      { ...logFields, cache_hit: false, latency_ms: Date.now() - startedAt },
      {
        matchScore: match.matchScore,
        deterministic: deterministic.total,
        semantic: semantic.total,
        bonus: bonus.total,
      },
    );
    return match;
  }

  async scoreMany(
    resumeText: string,
    jobs: ReadonlyArray<JobRecord>,
    context: CandidateContext = {},
  ): Promise<DetailedMatch[]> {
    return mapWithConcurrency(jobs, this.matchConcurrency, (job) => this.scoreCandidate(resumeText, job, context));
  }

  async rankJobs(
    resumeText: string | undefined,
    jobs: ReadonlyArray<JobRecord>,
    context: CandidateContext = {},
    criteria: JobSearchCriteria = {},
  ): Promise<TriageResult> {
    return this.triage.rank(resumeText, searchJobs(jobs, criteria), context);
  }

  getUsage(): UsageSnapshot | null {
    return this.options.usageMeter?.snapshot() ?? null;
  }
}

export function createScoringEngine(env: EnvConfig, logger: Logger): ScoringEngine {
  const usageMeter = new UsageMeter({
    inputCostPer1M: env.llmInputCostPer1M,
    outputCostPer1M: env.llmOutputCostPer1M,
  });

  let oracle: OracleGateway | null = null;
  if (env.openaiApiKey) {
    const llmClient = new LlmClient(
      { apiKey: env.openaiApiKey, baseUrl: env.openaiBaseUrl, model: env.openaiChatModel, usageMeter },
      logger,
    );
    oracle = new LlmOracleGateway(llmClient, logger, {
      timeoutMs: env.oracleTimeoutMs,
      maxConcurrentCalls: env.oracleMaxConcurrentCalls,
    });
  } else {
    logger.warn("OPENAI_API_KEY is not set, running deterministic-only scoring");
  }

  return new ScoringEngine({
    oracle,
    logger,
    cache: new MatchCache(env.matchCacheMaxEntries),
    usageMeter,
    matchConcurrency: env.matchConcurrency,
    triageTopN: env.triageTopN,
    triageMinQuickScore: env.triageMinQuickScore,
  });
}
