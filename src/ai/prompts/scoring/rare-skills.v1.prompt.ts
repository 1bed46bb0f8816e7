import { buildScoreFormatBlock } from "../shared/score-format";

export function buildRareSkillsV1Prompt(input: {
  jobTitle: string;
  jobDescription: string;
  resumeText: string;
  maxScore: number;
}): string {
  return [
    "Analyze the candidate's rare, sought-after skills FOR THIS SPECIFIC JOB.",
    "",
    `JOB TITLE: ${input.jobTitle}`,
    "",
    "JOB DESCRIPTION:",
    input.jobDescription,
    "",
    "CANDIDATE RESUME:",
    input.resumeText,
    "",
    "CRITICAL: award points only for rare skills that are relevant to this job.",
    "Rare skills that are irrelevant to the job score 0.",
    "- AI/ML skills for a Data Scientist job: high",
    "- AI/ML skills for a Truck Driver job: 0",
    "- Heavy goods licence plus hazardous materials certification for a Truck Driver: high",
    "- Heavy goods licence for a Data Scientist: 0",
    "",
    "Scoring guidelines:",
    "- 5: several rare, hard-to-find skills, all highly relevant",
    "- 4: at least one rare, in-demand, relevant skill",
    "- 3: some specialized skills that add value here",
    "- 1-2: minor differentiating skills",
    "- 0: no rare skills, or only irrelevant ones",
    "",
    buildScoreFormatBlock(input.maxScore, "1-2 sentences listing the skills and their relevance"),
  ].join("\n");
}
