import { buildScoreFormatBlock } from "../shared/score-format";

export function buildProjectRelevanceV1Prompt(input: {
  jobDescription: string;
  resumeText: string;
  maxScore: number;
}): string {
  return [
    "Analyze how relevant the candidate's past projects are to this job.",
    "",
    "JOB DESCRIPTION:",
    input.jobDescription,
    "",
    "CANDIDATE RESUME:",
    input.resumeText,
    "",
    "Evaluate:",
    "1. Domain similarity",
    "2. Technical similarity",
    "3. Comparable scope",
    "4. Measurable, relevant impact",
    "",
    buildScoreFormatBlock(input.maxScore, "1-2 sentences"),
  ].join("\n");
}
