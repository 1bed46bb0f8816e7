import { createHash } from "node:crypto";
import { CandidateContext, JobRecord } from "../shared/types/job.types";
import { DetailedMatch } from "../shared/types/scoring.types";

export function hashResume(resumeText: string): string {
  return createHash("sha256").update(resumeText, "utf8").digest("hex");
}

/** Jobs without an id are told apart by title, company and a digest of their content. */
export function jobKeyOf(job: Pick<JobRecord, "id" | "title" | "company" | "description" | "requirements">): string {
  if (job.id) {
    return `id:${job.id}`;
  }
  const content = createHash("sha256")
    .update(`${job.description}\n${job.requirements.join("\n")}`, "utf8")
    .digest("hex")
    .slice(0, 16);
  return `job:${job.title.toLowerCase()}|${job.company.toLowerCase()}|${content}`;
}

/**
 * Candidate preferences change location and salary scores, so they are part
 * of the key alongside the resume hash and the job identity.
 */
export function matchCacheKey(resumeText: string, job: JobRecord, context: CandidateContext = {}): string {
  const preferences = `${context.location?.trim().toLowerCase() ?? ""}|${context.salaryExpectation ?? ""}`;
  return `${hashResume(resumeText)}:${jobKeyOf(job)}:${preferences}`;
}

/** Bounded least-recently-used store for finished matches. A size of 0 disables caching. */
export class MatchCache {
  private readonly entries = new Map<string, DetailedMatch>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxEntries: number) {}

  get(key: string): DetailedMatch | undefined {
    const match = this.entries.get(key);
    if (!match) {
      this.misses += 1;
      return undefined;
    }
    this.hits += 1;
    // Re-insert to mark as most recently used.
    this.entries.delete(key);
    this.entries.set(key, match);
    return match;
  }

  set(key: string, match: DetailedMatch): void {
    if (this.maxEntries <= 0) {
      return;
    }
    this.entries.delete(key);
    this.entries.set(key, match);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  size(): number {
    return this.entries.size;
  }

  stats(): { hits: number; misses: number; size: number } {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }

  clear(): void {
    this.entries.clear();
  }
}
