import { JobRecord } from "../../shared/types/job.types";

const BASE_SCORE = 50;
const REQUIREMENTS_WEIGHT = 30;
const WORD_OVERLAP_STEP = 0.5;
const WORD_OVERLAP_MAX = 20;

/**
 * Cheap pre-score used to decide which jobs deserve a full scoring run.
 * 50 base, up to 30 for requirements found verbatim in the resume, up to 20
 * for distinct whitespace-separated words shared with the description.
 */
export function quickScore(resumeText: string, job: Pick<JobRecord, "requirements" | "description">): number {
  const resumeLower = resumeText.toLowerCase();
  let score = BASE_SCORE;

  if (job.requirements.length > 0) {
    const matched = job.requirements.filter((requirement) => resumeLower.includes(requirement.toLowerCase())).length;
    score += (matched / job.requirements.length) * REQUIREMENTS_WEIGHT;
  }

  const resumeWords = new Set(splitWords(resumeLower));
  const sharedWords = new Set(splitWords(job.description.toLowerCase()).filter((word) => resumeWords.has(word)));
  score += Math.min(WORD_OVERLAP_MAX, sharedWords.size * WORD_OVERLAP_STEP);

  return Math.min(100, score);
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}
