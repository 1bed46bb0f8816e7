import { Logger, LoggerContext, errorMessage, logContext } from "../../config/logger";
import { OracleGateway } from "../../ai/oracle.gateway";
import { parseMatchedSkills } from "../../ai/parsers/score-response.parser";
import { buildSoftSkillsEvidenceV1Prompt } from "../../ai/prompts/scoring/soft-skills-evidence.v1.prompt";
import { DeterministicScore, ScoreDetail } from "../../shared/types/scoring.types";
import { containsTerm, removeDiacritics } from "../../shared/utils/text.util";
import vocabulary from "../data/vocabulary.json";
import { ExperienceExtractor, extractRequiredYears } from "../experience/experience-extractor";
import { partitionByMatch } from "../skills/skill-matcher";
import { runDimension } from "./dimension-runner";
import {
  EDUCATION_MAX,
  EXPERIENCE_MAX,
  LOCATION_MAX,
  SALARY_MAX,
  SKILLS_MAX,
  buildDeterministicScore,
  createScoreDetail,
  round2,
} from "./score-detail";

export interface DeterministicScoringInput {
  resumeText: string;
  jobRequirements: ReadonlyArray<string>;
  jobDescription: string;
  jobLocation: string;
  jobSalary: number;
  jobTitle?: string;
  candidateLocation?: string;
  candidateSalaryExpectation?: number;
}

const TECHNICAL_SKILLS: ReadonlyArray<string> = vocabulary.technicalSkills;
const SOFT_SKILL_KEYWORDS: ReadonlyArray<string> = vocabulary.softSkillKeywords;
const REGION_TOKENS: ReadonlyArray<string> = vocabulary.regionTokens;
const DEFAULT_HARD_SKILLS = ["programming", "development", "engineering"];
const EXTRA_SKILL_BONUS_STEP = 0.2;
const EXTRA_SKILL_BONUS_MAX = 2;
const NO_REQUIREMENTS_SCORE = 10;
const NO_REQUIREMENTS_RATIO = 0.67;

const EDUCATION_LEVELS: ReadonlyArray<{ keyword: string; level: number }> = [
  { keyword: "phd", level: 5 },
  { keyword: "doctorate", level: 5 },
  { keyword: "doctorat", level: 5 },
  { keyword: "master", level: 4 },
  { keyword: "msc", level: 4 },
  { keyword: "mba", level: 4 },
  { keyword: "bachelor", level: 3 },
  { keyword: "licence", level: 3 },
  { keyword: "degree", level: 3 },
  { keyword: "diploma", level: 2 },
  { keyword: "diplôme", level: 2 },
];
const DEFAULT_REQUIRED_EDUCATION = 3;

export function isSoftSkillRequirement(requirement: string): boolean {
  const normalized = removeDiacritics(requirement.toLowerCase());
  return SOFT_SKILL_KEYWORDS.some((keyword) => normalized.includes(keyword));
}

export function findTechnicalSkills(text: string): string[] {
  return TECHNICAL_SKILLS.filter((skill) => containsTerm(text, skill));
}

export class DeterministicScorer {
  constructor(
    private readonly experienceExtractor: ExperienceExtractor,
    private readonly oracle: OracleGateway | null,
    private readonly logger: Logger,
  ) {}

  async score(input: DeterministicScoringInput, context: LoggerContext = {}): Promise<DeterministicScore> {
    const [skillsMatching, experienceYears, educationMatch, salaryFit, locationMatch] = await Promise.all([
      runDimension("skills_matching", SKILLS_MAX, this.logger, context, () => this.scoreSkills(input, context)),
      runDimension("experience_years", EXPERIENCE_MAX, this.logger, context, () =>
        this.scoreExperience(input.resumeText, input.jobDescription, input.jobTitle),
      ),
      runDimension("education_match", EDUCATION_MAX, this.logger, context, async () =>
        scoreEducation(input.resumeText, input.jobRequirements, input.jobDescription),
      ),
      runDimension("salary_fit", SALARY_MAX, this.logger, context, async () =>
        scoreSalaryFit(input.jobSalary, input.candidateSalaryExpectation),
      ),
      runDimension("location_match", LOCATION_MAX, this.logger, context, async () =>
        scoreLocation(input.jobLocation, input.candidateLocation),
      ),
    ]);

    return buildDeterministicScore({ skillsMatching, experienceYears, educationMatch, salaryFit, locationMatch });
  }

  async scoreSkills(input: DeterministicScoringInput, context: LoggerContext = {}): Promise<ScoreDetail> {
    const softSkills: string[] = [];
    const explicitHard: string[] = [];
    for (const requirement of input.jobRequirements) {
      if (!requirement.trim()) {
        continue;
      }
      if (isSoftSkillRequirement(requirement)) {
        softSkills.push(requirement);
      } else {
        explicitHard.push(requirement);
      }
    }

    // Requirements keep their casing: licence codes ("Permis CE") are matched case-sensitively.
    let hardSkills = uniqueIgnoringCase([
      ...explicitHard.map((requirement) => requirement.trim()),
      ...findTechnicalSkills(input.jobDescription),
    ]);
    if (hardSkills.length === 0 && softSkills.length === 0) {
      hardSkills = [...DEFAULT_HARD_SKILLS];
    }
    const hardSkillKeys = new Set(hardSkills.map((skill) => skill.toLowerCase()));

    const hard = partitionByMatch(hardSkills, input.resumeText);
    const soft = await this.matchSoftSkills(softSkills, input.resumeText, input.jobDescription, context);

    const totalRequired = hardSkills.length + softSkills.length;
    const totalMatched = hard.matched.length + soft.matched.length;
    const matched = [...hard.matched, ...soft.matched];
    const missing = [...hard.missing, ...soft.missing];

    let score = NO_REQUIREMENTS_SCORE;
    let matchRatio = NO_REQUIREMENTS_RATIO;
    let extraSkills: string[] = [];
    if (totalRequired > 0) {
      matchRatio = totalMatched / totalRequired;
      extraSkills = findTechnicalSkills(input.resumeText).filter((skill) => !hardSkillKeys.has(skill));
      const bonus = Math.min(EXTRA_SKILL_BONUS_MAX, extraSkills.length * EXTRA_SKILL_BONUS_STEP);
      score = Math.min(SKILLS_MAX, matchRatio * SKILLS_MAX + bonus);
    }

    let explanation = `${totalMatched}/${totalRequired} required skills covered`;
    if (matched.length > 0) {
      explanation += `. Matched: ${matched.slice(0, 5).join(", ")}`;
    }
    if (missing.length > 0) {
      explanation += `. Missing: ${missing.slice(0, 3).join(", ")}`;
    }

    return createScoreDetail(score, SKILLS_MAX, explanation, {
      matched_skills: matched.slice(0, 10),
      missing_skills: missing.slice(0, 10),
      match_ratio: round2(matchRatio),
      hard_skills_matched: hard.matched.length,
      soft_skills_matched: soft.matched.length,
      extra_technical_skills: extraSkills.length,
      semantic_soft_skills: soft.usedOracle,
      ...(soft.oracleFailed ? { oracle_failed: true } : {}),
    });
  }

  async scoreExperience(resumeText: string, jobDescription: string, jobTitle?: string): Promise<ScoreDetail> {
    let resumeYears: number;
    let oracleExplanation: string | null = null;
    let usedOracle = false;
    let oracleFailed = false;

    if (this.experienceExtractor.hasOracle() && jobTitle) {
      const relevant = await this.experienceExtractor.extractRelevantYears(resumeText, jobTitle, jobDescription);
      resumeYears = relevant.years;
      oracleExplanation = relevant.explanation;
      usedOracle = relevant.usedOracle;
      oracleFailed = relevant.oracleFailed === true;
    } else {
      resumeYears = this.experienceExtractor.extractYears(resumeText);
      if (resumeYears === 0) {
        resumeYears = this.experienceExtractor.extractYearsFromKeywords(resumeText);
      }
    }

    const requiredYears = extractRequiredYears(jobDescription);
    const { score, explanation } = experienceBand(resumeYears, requiredYears);

    return createScoreDetail(score, EXPERIENCE_MAX, oracleExplanation ?? explanation, {
      resume_years: resumeYears,
      required_years: requiredYears,
      semantic_evaluation: usedOracle,
      ...(oracleFailed ? { oracle_failed: true } : {}),
    });
  }

  private async matchSoftSkills(
    softSkills: ReadonlyArray<string>,
    resumeText: string,
    jobDescription: string,
    context: LoggerContext,
  ): Promise<{ matched: string[]; missing: string[]; usedOracle: boolean; oracleFailed?: boolean }> {
    if (softSkills.length === 0) {
      return { matched: [], missing: [], usedOracle: false };
    }
    if (!this.oracle) {
      return { ...partitionByMatch(softSkills, resumeText), usedOracle: false };
    }

    try {
      const reply = await this.oracle.query(buildSoftSkillsEvidenceV1Prompt({ softSkills, jobDescription, resumeText }), {
        promptName: "soft_skills_evidence_v1",
        maxTokens: 256,
      });
      const confirmed = new Set(parseMatchedSkills(reply).map(skillKey));
      const matched = softSkills.filter((skill) => confirmed.has(skillKey(skill)));
      const missing = softSkills.filter((skill) => !confirmed.has(skillKey(skill)));
      return { matched, missing, usedOracle: true };
    } catch (error) {
      logContext(
        this.logger,
        "warn",
        "scoring.soft_skills.fallback",
        { ...context, dimension: "skills_matching" },
        { error: errorMessage(error) },
      );
      return { ...partitionByMatch(softSkills, resumeText), usedOracle: false, oracleFailed: true };
    }
  }
}

export function experienceBand(resumeYears: number, requiredYears: number): { score: number; explanation: string } {
  if (resumeYears >= requiredYears) {
    const surplus = resumeYears - requiredYears;
    if (surplus <= 5) {
      return { score: 10, explanation: `${resumeYears} years of relevant experience, strong fit` };
    }
    if (surplus <= 10) {
      return { score: 9, explanation: `${resumeYears} years of relevant experience, very experienced` };
    }
    if (surplus <= 15) {
      return { score: 8, explanation: `${resumeYears} years of relevant experience, very senior` };
    }
    return { score: 7, explanation: `${resumeYears} years of relevant experience, possibly overqualified` };
  }
  const gap = requiredYears - resumeYears;
  return {
    score: Math.max(0, 10 - gap * 2),
    explanation: `${resumeYears} years of relevant experience, ${requiredYears} required`,
  };
}

export function scoreEducation(
  resumeText: string,
  jobRequirements: ReadonlyArray<string>,
  jobDescription: string,
): ScoreDetail {
  const resumeLower = resumeText.toLowerCase();
  const jobText = `${jobDescription} ${jobRequirements.join(" ")}`.toLowerCase();

  const candidate = highestEducation(resumeLower);
  // The "required" marker may sit anywhere in the posting, not next to the degree.
  const mentionsRequirement =
    jobText.includes("required") || jobText.includes("requis") || jobText.includes("minimum");
  const required = mentionsRequirement ? highestEducation(jobText) : null;

  const candidateLevel = candidate?.level ?? 0;
  const requiredLevel = required?.level ?? DEFAULT_REQUIRED_EDUCATION;
  const candidateLabel = candidate ? capitalize(candidate.keyword) : "Not specified";
  const requiredLabel = required ? capitalize(required.keyword) : "Bachelor (default)";

  let score: number;
  let explanation: string;
  if (candidateLevel >= requiredLevel) {
    score = 5;
    explanation = `${candidateLabel} meets expectations (${requiredLabel})`;
  } else if (candidateLevel >= requiredLevel - 1) {
    score = 3;
    explanation = `${candidateLabel} slightly below ${requiredLabel}`;
  } else {
    score = 1;
    explanation = `${candidateLabel} below ${requiredLabel}`;
  }

  return createScoreDetail(score, EDUCATION_MAX, explanation, {
    candidate_level: candidateLevel,
    required_level: requiredLevel,
  });
}

export function scoreSalaryFit(jobSalary: number, candidateExpectation?: number): ScoreDetail {
  if (!candidateExpectation) {
    return createScoreDetail(SALARY_MAX, SALARY_MAX, "Salary expectation not specified, assumed acceptable", {
      job_salary: jobSalary,
    });
  }

  const diffPercent = ((jobSalary - candidateExpectation) / candidateExpectation) * 100;
  let score: number;
  let explanation: string;
  if (diffPercent >= 10) {
    score = 5;
    explanation = `Offered salary above expectations (+${diffPercent.toFixed(0)}%)`;
  } else if (diffPercent >= 0) {
    score = 5;
    explanation = `Offered salary matches expectations (±${Math.abs(diffPercent).toFixed(0)}%)`;
  } else if (diffPercent >= -10) {
    score = 4;
    explanation = `Offered salary slightly below expectations (${diffPercent.toFixed(0)}%)`;
  } else if (diffPercent >= -20) {
    score = 2;
    explanation = `Offered salary below expectations (${diffPercent.toFixed(0)}%)`;
  } else {
    score = 0;
    explanation = `Offered salary far below expectations (${diffPercent.toFixed(0)}%)`;
  }

  return createScoreDetail(score, SALARY_MAX, explanation, {
    job_salary: jobSalary,
    candidate_expectation: candidateExpectation,
    diff_percent: round2(diffPercent),
  });
}

export function scoreLocation(jobLocation: string, candidateLocation?: string): ScoreDetail {
  const candidate = candidateLocation?.trim() ?? "";
  if (!candidate) {
    return createScoreDetail(3, LOCATION_MAX, "Location preference not specified", {
      job_location: jobLocation,
    });
  }

  const jobLower = jobLocation.toLowerCase();
  const candidateLower = candidate.toLowerCase();
  let score: number;
  let explanation: string;

  if (jobLower.includes("remote") || jobLower.includes("télétravail")) {
    score = 5;
    explanation = "Remote position, location flexible";
  } else if (candidateLower.includes("remote")) {
    score = 1;
    explanation = "Candidate wants remote, position is on site";
  } else if (jobLower.includes(candidateLower) || candidateLower.includes(jobLower)) {
    score = 5;
    explanation = "Location fully aligned";
  } else {
    const candidateRegion = lastRegionToken(candidateLower);
    const jobRegion = lastRegionToken(jobLower);
    if (candidateRegion && candidateRegion === jobRegion) {
      score = 3;
      explanation = "Same region, different city";
    } else {
      score = 1;
      explanation = "Different locations";
    }
  }

  return createScoreDetail(score, LOCATION_MAX, explanation, {
    job_location: jobLocation,
    candidate_location: candidate,
  });
}

function lastRegionToken(text: string): string | null {
  let found: string | null = null;
  for (const token of REGION_TOKENS) {
    if (text.includes(token)) {
      found = token;
    }
  }
  return found;
}

function highestEducation(text: string): { keyword: string; level: number } | null {
  let best: { keyword: string; level: number } | null = null;
  for (const entry of EDUCATION_LEVELS) {
    if (text.includes(entry.keyword) && (!best || entry.level > best.level)) {
      best = entry;
    }
  }
  return best;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function skillKey(skill: string): string {
  return removeDiacritics(skill.toLowerCase().trim());
}

function uniqueIgnoringCase(values: ReadonlyArray<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(value);
    }
  }
  return result;
}
