import { Request, Response } from "express";
import httpStatus from "http-status";
import logger from "../utils/logger.js";
import { AppError, errorMessage } from "../utils/errors.js";
import {
  createAnalyzerFromConfig,
  type HoldingsAnalyzer,
} from "../services/institutional/analyzer.service.js";

let analyzer: HoldingsAnalyzer | null = null;

function getAnalyzer(): HoldingsAnalyzer {
  if (!analyzer) analyzer = createAnalyzerFromConfig();
  return analyzer;
}

const isTrue = (value: unknown) => value === "true" || value === "1";

/**
 * GET /api/institutional/:cik/analysis
 * Quarter-over-quarter 13F comparison for one filer.
 */
export async function getInstitutionAnalysis(req: Request<{ cik: string }>, res: Response) {
  const { cik } = req.params;

  try {
    const result = await getAnalyzer().analyze(
      cik,
      isTrue(req.query.export),
      isTrue(req.query.sortBySecondaryMetric),
    );
    res.status(httpStatus.OK).json({ success: true, data: result });
  } catch (error) {
    if (error instanceof AppError) {
      logger.warn(`⚠️ Analysis of CIK ${cik} failed: ${error.message}`);
      res.status(error.statusCode).json({ success: false, ...error.toJSON() });
      return;
    }

    logger.error(`❌ Analysis of CIK ${cik} failed: ${errorMessage(error)}`);
    res.status(httpStatus.BAD_GATEWAY).json({
      success: false,
      error: { code: "UPSTREAM_ERROR", message: errorMessage(error) },
    });
  }
}
