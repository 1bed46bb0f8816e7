import { Logger, LoggerContext, logContext } from "../../config/logger";
import { CandidateContext, JobRecord } from "../../shared/types/job.types";
import { DetailedMatch } from "../../shared/types/scoring.types";
import { mapWithConcurrency } from "../../shared/utils/worker-pool";
import { quickScore } from "./quick-score";

export const UNSCORED_LIST_SIZE = 5;

export interface JobScorer {
  scoreCandidate(resumeText: string, job: JobRecord, context?: CandidateContext): Promise<DetailedMatch>;
}

export interface TriageOptions {
  topN: number;
  minQuickScore: number;
  concurrency: number;
}

export interface RankedMatch {
  job: JobRecord;
  quickScore: number;
  match: DetailedMatch;
}

export type TriageResult =
  | { mode: "scored"; usedQuickFilterFallback: boolean; matches: RankedMatch[] }
  | { mode: "listed"; jobs: JobRecord[] };

/**
 * Ranks a resume against many jobs while keeping oracle spend bounded:
 * every job gets the cheap quick score, only the best `topN` get the full
 * scoring run. Without a resume the jobs are listed unscored.
 */
export class TriagePipeline {
  constructor(
    private readonly scorer: JobScorer,
    private readonly logger: Logger,
    private readonly options: TriageOptions,
  ) {}

  async rank(
    resumeText: string | undefined,
    jobs: ReadonlyArray<JobRecord>,
    context: CandidateContext = {},
  ): Promise<TriageResult> {
    if (!resumeText?.trim()) {
      return { mode: "listed", jobs: jobs.slice(0, UNSCORED_LIST_SIZE) };
    }

    const selection = selectForDeepScoring(resumeText, jobs, this.options);
    const logFields: LoggerContext = { stage: "triage" };
    logContext(this.logger, "info", "triage.selection", logFields, {
      candidates: jobs.length,
      selected: selection.selected.length,
      quickFilterFallback: selection.usedFallback,
    });

    const matches = await mapWithConcurrency(selection.selected, this.options.concurrency, async (entry) => ({
      job: entry.job,
      quickScore: entry.quickScore,
      match: await this.scorer.scoreCandidate(resumeText, entry.job, context),
    }));

    // Stable sort keeps quick-score order between equal final scores.
    matches.sort((a, b) => b.match.matchScore - a.match.matchScore);
    return { mode: "scored", usedQuickFilterFallback: selection.usedFallback, matches };
  }
}

export function selectForDeepScoring(
  resumeText: string,
  jobs: ReadonlyArray<JobRecord>,
  options: Pick<TriageOptions, "topN" | "minQuickScore">,
): { selected: Array<{ job: JobRecord; quickScore: number }>; usedFallback: boolean } {
  const scored = jobs.map((job) => ({ job, quickScore: quickScore(resumeText, job) }));
  const passing = scored
    .filter((entry) => entry.quickScore >= options.minQuickScore)
    .sort((a, b) => b.quickScore - a.quickScore);

  if (passing.length > 0) {
    return { selected: passing.slice(0, options.topN), usedFallback: false };
  }
  return { selected: scored.slice(0, options.topN), usedFallback: true };
}
