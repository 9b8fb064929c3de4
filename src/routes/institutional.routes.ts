import express from "express";
import { getInstitutionAnalysis } from "../controllers/institutional.controller.js";

const router = express.Router();

/**
 * GET /api/institutional/:cik/analysis
 *
 * Query Parameters:
 * - export: "true" writes the three tables as CSV to EXPORT_DIR
 * - sortBySecondaryMetric: "true" breaks weight ties by share change %
 *
 * Response:
 * {
 *   success: true,
 *   data: { cik, currentAccession, previousAccession, topHoldings, topBuys, topSells, ... }
 * }
 */
router.get("/:cik/analysis", getInstitutionAnalysis);

export default router;
