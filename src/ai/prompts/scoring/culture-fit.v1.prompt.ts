import { buildScoreFormatBlock, optionalSection } from "../shared/score-format";

export function buildCultureFitV1Prompt(input: {
  jobDescription: string;
  companyCulture?: string;
  resumeText: string;
  maxScore: number;
}): string {
  return [
    "Analyze the culture fit between this candidate and the company and role.",
    "",
    "JOB DESCRIPTION:",
    input.jobDescription,
    "",
    ...optionalSection("COMPANY CULTURE", input.companyCulture),
    "CANDIDATE RESUME:",
    input.resumeText,
    "",
    "Evaluate:",
    "1. Values alignment",
    "2. Work style against role expectations",
    "3. Preferred environment",
    "4. Long-term mutual fit",
    "",
    buildScoreFormatBlock(input.maxScore, "2-3 sentences"),
  ].join("\n");
}
