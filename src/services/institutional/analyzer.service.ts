import Joi from "joi";
import logger from "../../utils/logger.js";
import { ConfigError } from "../../utils/errors.js";
import { analysis, sec } from "../../config/config.js";
import { emptySnapshot } from "../../utils/institutional/holdings-snapshot.util.js";
import { toCikNumber } from "../../utils/institutional/sec-urls.util.js";
import { EdgarGateway } from "./sec-gateway.service.js";
import { locateFilings } from "./locator.service.js";
import { fetchHoldingsContent, requireHoldingsContent } from "./content-fetcher.service.js";
import { classifyAndParse } from "./format-classifier.service.js";
import { computeDeltas } from "./calculator.service.js";
import { generateTables } from "./table-generator.service.js";
import { exportTables } from "./export.service.js";
import type {
  AnalysisResult,
  HoldingsSnapshot,
  SecGateway,
} from "../../types/institutional.types.js";

export type AnalyzerSettings = {
  userAgent: string;
  requestTimeoutMs: number;
  requestDelayMs: number;
  identityKeyLength: number;
  exportDir: string;
};

export type AnalyzerOptions = Partial<AnalyzerSettings> & {
  userAgent: string;
  /** Replaces the EDGAR client, e.g. with an in-process stand-in. */
  gateway?: SecGateway;
  /** Builds the client for each run; takes precedence over `gateway`. */
  createGateway?: () => SecGateway;
};

const settingsSchema = Joi.object<AnalyzerSettings>({
  userAgent: Joi.string()
    .pattern(/@/, "contact email")
    .required()
    .messages({
      "string.pattern.name": "SEC requires the User-Agent to include a contactable email address",
    }),
  requestTimeoutMs: Joi.number().integer().min(1).default(30000),
  requestDelayMs: Joi.number().integer().min(0).default(200),
  identityKeyLength: Joi.number().integer().min(6).max(9).default(8),
  exportDir: Joi.string().default("."),
});

/**
 * Compares the latest 13F holdings of a filer against the previous quarter.
 * One instance can run many analyses. Unless a gateway is injected, each run
 * gets its own EDGAR client, so concurrent runs keep their own request spacing.
 */
export class HoldingsAnalyzer {
  readonly settings: Readonly<AnalyzerSettings>;
  private readonly createGateway: () => SecGateway;

  constructor(options: AnalyzerOptions) {
    const { gateway, createGateway, ...settings } = options;
    const validated = settingsSchema.validate(settings);
    if (validated.error) {
      throw new ConfigError(validated.error.message, { userAgent: settings.userAgent });
    }

    this.settings = Object.freeze(validated.value);
    const { userAgent, requestTimeoutMs, requestDelayMs } = this.settings;
    if (createGateway) {
      this.createGateway = createGateway;
    } else if (gateway) {
      this.createGateway = () => gateway;
    } else {
      this.createGateway = () => new EdgarGateway({ userAgent, requestTimeoutMs, requestDelayMs });
    }
  }

  private async parse(content: string): Promise<HoldingsSnapshot> {
    const outcome = await classifyAndParse(content, {
      identityKeyLength: this.settings.identityKeyLength,
    });
    return outcome.snapshot;
  }

  async analyze(
    cik: string,
    exportResults = false,
    sortBySecondaryMetric = false,
  ): Promise<AnalysisResult> {
    toCikNumber(cik);
    logger.info(`🏦 Analyzing 13F holdings for CIK ${cik}`);
    const gateway = this.createGateway();

    const { currentAccession, previousAccession } = await locateFilings(gateway, cik);

    const currentContent = await requireHoldingsContent(gateway, cik, currentAccession);
    const previousContent = await fetchHoldingsContent(gateway, cik, previousAccession);
    if (previousContent === null) {
      logger.warn(`⚠️ Previous quarter ${previousAccession} unavailable, every position is NEW`);
    }

    const current = await this.parse(currentContent);
    const previous = previousContent === null ? emptySnapshot() : await this.parse(previousContent);

    const allDeltaRows = computeDeltas(current, previous);
    const tables = generateTables(allDeltaRows, { sortBySecondaryMetric });
    logger.info(
      `✅ ${allDeltaRows.length} positions: ${tables.topBuys.length} buys, ` +
        `${tables.topSells.length} sells`,
    );

    const exportedFiles = exportResults
      ? await exportTables(tables, cik, this.settings.exportDir)
      : null;

    return {
      cik,
      currentAccession,
      previousAccession,
      ...tables,
      allDeltaRows,
      hasPreviousData: previous.size > 0,
      sortBySecondaryMetric,
      exportedFiles,
    };
  }
}

export function createAnalyzerFromConfig(gateway?: SecGateway): HoldingsAnalyzer {
  return new HoldingsAnalyzer({
    userAgent: sec.userAgent,
    requestTimeoutMs: sec.requestTimeoutMs,
    requestDelayMs: sec.requestDelayMs,
    identityKeyLength: analysis.identityKeyLength,
    exportDir: analysis.exportDir,
    gateway,
  });
}
