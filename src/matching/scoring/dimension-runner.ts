import { Logger, LoggerContext, errorMessage, logContext } from "../../config/logger";
import { OracleGateway, scoreDimension } from "../../ai/oracle.gateway";
import { DimensionKey, ScoreDetail } from "../../shared/types/scoring.types";
import { createScoreDetail, errorScoreDetail } from "./score-detail";

/**
 * Runs one scoring dimension. A failure never escapes: it is logged and
 * becomes a zero-score detail whose explanation starts with "error:".
 */
export async function runDimension(
  dimension: DimensionKey,
  maxScore: number,
  logger: Logger,
  context: LoggerContext,
  task: () => Promise<ScoreDetail>,
): Promise<ScoreDetail> {
  try {
    return await task();
  } catch (error) {
    logContext(logger, "warn", "scoring.dimension.failed", { ...context, dimension }, { error: errorMessage(error) });
    return errorScoreDetail(maxScore, error);
  }
}

export async function scoreWithOracle(
  oracle: OracleGateway,
  logger: Logger,
  input: { prompt: string; maxScore: number; promptName: string },
): Promise<ScoreDetail> {
  const parsed = await scoreDimension(oracle, { ...input, logger });
  return createScoreDetail(parsed.score, input.maxScore, parsed.explanation);
}
