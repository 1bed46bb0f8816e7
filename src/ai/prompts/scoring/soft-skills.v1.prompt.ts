import { buildScoreFormatBlock } from "../shared/score-format";

export function buildSoftSkillsV1Prompt(input: {
  jobTitle: string;
  jobDescription: string;
  resumeText: string;
  maxScore: number;
}): string {
  return [
    "Analyze the soft skills match between this resume and the job.",
    "",
    `JOB TITLE: ${input.jobTitle}`,
    "",
    "JOB DESCRIPTION:",
    input.jobDescription,
    "",
    "CANDIDATE RESUME:",
    input.resumeText,
    "",
    "Evaluate:",
    "1. Leadership: leading projects, teams, or initiatives",
    "2. Communication: written and verbal",
    "3. Teamwork: collaboration with others",
    "4. Problem-solving: analytical, solution-oriented",
    "5. Initiative: proactive, self-motivated",
    "",
    `${input.maxScore} means an exceptional soft skills match.`,
    "",
    buildScoreFormatBlock(input.maxScore, "2-3 sentences"),
  ].join("\n");
}
