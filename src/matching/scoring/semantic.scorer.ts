import { Logger, LoggerContext } from "../../config/logger";
import { OracleGateway } from "../../ai/oracle.gateway";
import { buildCultureFitV1Prompt } from "../../ai/prompts/scoring/culture-fit.v1.prompt";
import { buildGrowthPotentialV1Prompt } from "../../ai/prompts/scoring/growth-potential.v1.prompt";
import { buildProjectRelevanceV1Prompt } from "../../ai/prompts/scoring/project-relevance.v1.prompt";
import { buildSoftSkillsV1Prompt } from "../../ai/prompts/scoring/soft-skills.v1.prompt";
import { SemanticScore } from "../../shared/types/scoring.types";
import { runDimension, scoreWithOracle } from "./dimension-runner";
import {
  CULTURE_FIT_MAX,
  GROWTH_POTENTIAL_MAX,
  PROJECT_RELEVANCE_MAX,
  SOFT_SKILLS_MAX,
  buildSemanticScore,
} from "./score-detail";

export interface SemanticScoringInput {
  resumeText: string;
  jobDescription: string;
  jobTitle: string;
  companyCulture?: string;
}

export class SemanticScorer {
  constructor(
    private readonly oracle: OracleGateway,
    private readonly logger: Logger,
  ) {}

  async score(input: SemanticScoringInput, context: LoggerContext = {}): Promise<SemanticScore> {
    const { resumeText, jobDescription, jobTitle } = input;
    const [softSkillsMatch, cultureFit, growthPotential, projectRelevance] = await Promise.all([
      runDimension("soft_skills_match", SOFT_SKILLS_MAX, this.logger, context, () =>
        scoreWithOracle(this.oracle, this.logger, {
          prompt: buildSoftSkillsV1Prompt({ jobTitle, jobDescription, resumeText, maxScore: SOFT_SKILLS_MAX }),
          maxScore: SOFT_SKILLS_MAX,
          promptName: "soft_skills_v1",
        }),
      ),
      runDimension("culture_fit", CULTURE_FIT_MAX, this.logger, context, () =>
        scoreWithOracle(this.oracle, this.logger, {
          prompt: buildCultureFitV1Prompt({
            jobDescription,
            companyCulture: input.companyCulture,
            resumeText,
            maxScore: CULTURE_FIT_MAX,
          }),
          maxScore: CULTURE_FIT_MAX,
          promptName: "culture_fit_v1",
        }),
      ),
      runDimension("growth_potential", GROWTH_POTENTIAL_MAX, this.logger, context, () =>
        scoreWithOracle(this.oracle, this.logger, {
          prompt: buildGrowthPotentialV1Prompt({ jobTitle, resumeText, maxScore: GROWTH_POTENTIAL_MAX }),
          maxScore: GROWTH_POTENTIAL_MAX,
          promptName: "growth_potential_v1",
        }),
      ),
      runDimension("project_relevance", PROJECT_RELEVANCE_MAX, this.logger, context, () =>
        scoreWithOracle(this.oracle, this.logger, {
          prompt: buildProjectRelevanceV1Prompt({ jobDescription, resumeText, maxScore: PROJECT_RELEVANCE_MAX }),
          maxScore: PROJECT_RELEVANCE_MAX,
          promptName: "project_relevance_v1",
        }),
      ),
    ]);

    return buildSemanticScore({ softSkillsMatch, cultureFit, growthPotential, projectRelevance });
  }
}
