import { Logger, LoggerContext } from "../../config/logger";
import { OracleGateway } from "../../ai/oracle.gateway";
import { buildCareerTrajectoryV1Prompt } from "../../ai/prompts/scoring/career-trajectory.v1.prompt";
import { buildIndustryExperienceV1Prompt } from "../../ai/prompts/scoring/industry-experience.v1.prompt";
import { buildRareSkillsV1Prompt } from "../../ai/prompts/scoring/rare-skills.v1.prompt";
import { BonusScore } from "../../shared/types/scoring.types";
import { runDimension, scoreWithOracle } from "./dimension-runner";
import { CAREER_TRAJECTORY_MAX, INDUSTRY_EXPERIENCE_MAX, RARE_SKILLS_MAX, buildBonusScore } from "./score-detail";

export interface BonusScoringInput {
  resumeText: string;
  jobDescription: string;
  jobTitle: string;
  industry?: string;
}

export class BonusScorer {
  constructor(
    private readonly oracle: OracleGateway,
    private readonly logger: Logger,
  ) {}

  async score(input: BonusScoringInput, context: LoggerContext = {}): Promise<BonusScore> {
    const { resumeText, jobDescription, jobTitle } = input;
    const [industryExperience, rareSkillsPremium, careerTrajectory] = await Promise.all([
      runDimension("industry_experience", INDUSTRY_EXPERIENCE_MAX, this.logger, context, () =>
        scoreWithOracle(this.oracle, this.logger, {
          prompt: buildIndustryExperienceV1Prompt({
            jobDescription,
            industry: input.industry,
            resumeText,
            maxScore: INDUSTRY_EXPERIENCE_MAX,
          }),
          maxScore: INDUSTRY_EXPERIENCE_MAX,
          promptName: "industry_experience_v1",
        }),
      ),
      runDimension("rare_skills_premium", RARE_SKILLS_MAX, this.logger, context, () =>
        scoreWithOracle(this.oracle, this.logger, {
          prompt: buildRareSkillsV1Prompt({ jobTitle, jobDescription, resumeText, maxScore: RARE_SKILLS_MAX }),
          maxScore: RARE_SKILLS_MAX,
          promptName: "rare_skills_v1",
        }),
      ),
      runDimension("career_trajectory", CAREER_TRAJECTORY_MAX, this.logger, context, () =>
        scoreWithOracle(this.oracle, this.logger, {
          prompt: buildCareerTrajectoryV1Prompt({ jobTitle, resumeText, maxScore: CAREER_TRAJECTORY_MAX }),
          maxScore: CAREER_TRAJECTORY_MAX,
          promptName: "career_trajectory_v1",
        }),
      ),
    ]);

    return buildBonusScore({ industryExperience, rareSkillsPremium, careerTrajectory });
  }
}
