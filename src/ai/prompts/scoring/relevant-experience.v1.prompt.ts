export const RELEVANT_EXPERIENCE_V1_PROMPT = `Determine how many years of RELEVANT, DIRECTLY APPLICABLE experience the candidate has for the target job.

Rules:
1. Count only experience that applies to the target job.
2. Weigh domain alignment, technical overlap, and functional area (engineering, sales, operations, driving...).
3. Transferable experience earns partial credit:
   - leadership roles across industries: 50-75%
   - technical work in a similar domain: 75-100%
   - a different domain: 0%

Examples:
- 12 years as truck driver, target "Truck Driver": 12
- 12 years as truck driver, target "Software Developer": 0
- 3 years as data scientist, target "Truck Driver": 0
- 5 years team management + 3 years developer, target "Engineering Manager": 5 to 6
- 2 years Python developer + 3 years Java developer, target "Python Developer": 5

Answer with a number between 0 and 50 and a 2-3 sentence justification.

Format your response EXACTLY as:
RELEVANT_YEARS: [number]
EXPLANATION: [your explanation]`;

export function buildRelevantExperienceV1Prompt(input: {
  jobTitle: string;
  jobDescription: string;
  resumeText: string;
}): string {
  return [
    RELEVANT_EXPERIENCE_V1_PROMPT,
    "",
    `JOB TITLE: ${input.jobTitle}`,
    "",
    "JOB DESCRIPTION:",
    input.jobDescription,
    "",
    "CANDIDATE RESUME:",
    input.resumeText,
  ].join("\n");
}
