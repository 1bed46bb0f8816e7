import { ScoreBreakdown } from "../../../shared/types/scoring.types";

export const MATCH_SUMMARY_V1_PROMPT = `Write a concise overall explanation (2-3 sentences) for this resume and job match.

The summary must:
1. State the overall match quality (excellent, good, moderate, or weak)
2. Name the top 2-3 strengths (highest scores)
3. Mention 1-2 areas for improvement (lowest scores)

Use only the scores below. Do not change or recompute them.
Professional, factual, actionable. Maximum 3 sentences. Plain text only.`;

export function buildMatchSummaryV1Prompt(input: { jobTitle: string; breakdown: ScoreBreakdown }): string {
  const { deterministic: det, semantic: sem, bonus } = input.breakdown;
  return [
    MATCH_SUMMARY_V1_PROMPT,
    "",
    `JOB TITLE: ${input.jobTitle}`,
    "",
    `TOTAL SCORE: ${input.breakdown.totalScore.toFixed(1)}/100`,
    "",
    "BREAKDOWN:",
    `1. Deterministic Score: ${det.total.toFixed(1)}/${det.maxTotal}`,
    `   - Skills Matching: ${det.skillsMatching.score.toFixed(1)}/${det.skillsMatching.maxScore}`,
    `   - Experience Years: ${det.experienceYears.score.toFixed(1)}/${det.experienceYears.maxScore}`,
    `   - Education Match: ${det.educationMatch.score.toFixed(1)}/${det.educationMatch.maxScore}`,
    `   - Salary Fit: ${det.salaryFit.score.toFixed(1)}/${det.salaryFit.maxScore}`,
    `   - Location Match: ${det.locationMatch.score.toFixed(1)}/${det.locationMatch.maxScore}`,
    `2. Semantic Score: ${sem.total.toFixed(1)}/${sem.maxTotal}`,
    `   - Soft Skills: ${sem.softSkillsMatch.score.toFixed(1)}/${sem.softSkillsMatch.maxScore}`,
    `   - Culture Fit: ${sem.cultureFit.score.toFixed(1)}/${sem.cultureFit.maxScore}`,
    `   - Growth Potential: ${sem.growthPotential.score.toFixed(1)}/${sem.growthPotential.maxScore}`,
    `   - Project Relevance: ${sem.projectRelevance.score.toFixed(1)}/${sem.projectRelevance.maxScore}`,
    `3. Bonus Score: ${bonus.total.toFixed(1)}/${bonus.maxTotal}`,
    `   - Industry Experience: ${bonus.industryExperience.score.toFixed(1)}/${bonus.industryExperience.maxScore}`,
    `   - Rare Skills: ${bonus.rareSkillsPremium.score.toFixed(1)}/${bonus.rareSkillsPremium.maxScore}`,
    `   - Career Trajectory: ${bonus.careerTrajectory.score.toFixed(1)}/${bonus.careerTrajectory.maxScore}`,
  ].join("\n");
}
