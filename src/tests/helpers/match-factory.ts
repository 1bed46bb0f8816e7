import {
  buildBonusScore,
  buildDeterministicScore,
  buildScoreBreakdown,
  buildSemanticScore,
  createScoreDetail,
} from "../../matching/scoring/score-detail";
import { JobRecord } from "../../shared/types/job.types";
import { DetailedMatch } from "../../shared/types/scoring.types";

export function makeJob(overrides: Partial<JobRecord>): JobRecord {
  return {
    title: "Job",
    company: "Company",
    location: "Lyon",
    salary: 30000,
    industry: "Transport",
    description: "",
    requirements: [],
    ...overrides,
  };
}

/** A zeroed match carrying an arbitrary final score, for ranking tests. */
export function fakeMatch(job: JobRecord, matchScore: number): DetailedMatch {
  const zero = (max: number) => createScoreDetail(0, max, "");
  const breakdown = buildScoreBreakdown(
    buildDeterministicScore({
      skillsMatching: zero(15),
      experienceYears: zero(10),
      educationMatch: zero(5),
      salaryFit: zero(5),
      locationMatch: zero(5),
    }),
    buildSemanticScore({
      softSkillsMatch: zero(15),
      cultureFit: zero(10),
      growthPotential: zero(10),
      projectRelevance: zero(5),
    }),
    buildBonusScore({ industryExperience: zero(10), rareSkillsPremium: zero(5), careerTrajectory: zero(5) }),
  );
  return {
    jobTitle: job.title,
    company: job.company,
    matchScore,
    scoreBreakdown: breakdown,
    overallExplanation: "",
    strengths: [],
    weaknesses: [],
    recommendation: "",
    salary: job.salary,
    location: job.location,
    degraded: false,
  };
}
