import { buildScoreFormatBlock } from "../shared/score-format";

export function buildGrowthPotentialV1Prompt(input: {
  jobTitle: string;
  resumeText: string;
  maxScore: number;
}): string {
  return [
    "Analyze the candidate's growth potential for this role.",
    "",
    `JOB TITLE: ${input.jobTitle}`,
    "",
    "CANDIDATE RESUME:",
    input.resumeText,
    "",
    "Evaluate:",
    "1. Learning capacity: continuous learning, certifications, new skills",
    "2. Career progression: increasing responsibilities",
    "3. Adaptability to new technologies, roles, or environments",
    "4. Likelihood of excelling and growing in this role",
    "",
    buildScoreFormatBlock(input.maxScore, "2-3 sentences"),
  ].join("\n");
}
