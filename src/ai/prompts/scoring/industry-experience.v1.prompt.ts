import { buildScoreFormatBlock, optionalSection } from "../shared/score-format";

export function buildIndustryExperienceV1Prompt(input: {
  jobDescription: string;
  industry?: string;
  resumeText: string;
  maxScore: number;
}): string {
  return [
    "Analyze the candidate's industry-specific experience for this job.",
    "",
    "JOB DESCRIPTION:",
    input.jobDescription,
    "",
    ...optionalSection("INDUSTRY", input.industry),
    "CANDIDATE RESUME:",
    input.resumeText,
    "",
    "Evaluate years in the industry, domain knowledge, industry projects, and specialized domain skills.",
    "",
    "Scoring guidelines:",
    "- 10: 5+ years in the exact industry with deep domain expertise",
    "- 7-9: 3-5 years in the industry or related fields",
    "- 4-6: 1-3 years, or transferable experience from adjacent industries",
    "- 1-3: no direct industry experience but relevant skills",
    "- 0: no relevant industry experience",
    "",
    buildScoreFormatBlock(input.maxScore, "2-3 sentences"),
  ].join("\n");
}
