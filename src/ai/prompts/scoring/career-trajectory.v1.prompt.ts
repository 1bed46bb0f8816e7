import { buildScoreFormatBlock } from "../shared/score-format";

export function buildCareerTrajectoryV1Prompt(input: {
  jobTitle: string;
  resumeText: string;
  maxScore: number;
}): string {
  return [
    "Analyze the candidate's career trajectory and progression.",
    "",
    `JOB TITLE: ${input.jobTitle}`,
    "",
    "CANDIDATE RESUME:",
    input.resumeText,
    "",
    "Evaluate coherence, advancement, consistency (gaps, job-hopping), and whether this job is a natural next step.",
    "",
    "Scoring guidelines:",
    "- 5: clear, coherent progression with steady advancement",
    "- 4: good progression with minor gaps or pivots",
    "- 3: acceptable trajectory with some inconsistencies",
    "- 1-2: fragmented career or unclear direction",
    "- 0: incoherent trajectory or major red flags",
    "",
    buildScoreFormatBlock(input.maxScore, "1-2 sentences"),
  ].join("\n");
}
