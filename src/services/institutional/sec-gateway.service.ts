import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import Joi from "joi";
import logger from "../../utils/logger.js";
import { ConfigError, SecRequestError, SecResponseError } from "../../utils/errors.js";
import { sleep } from "../../utils/institutional/sleep.util.js";
import { directoryIndexUrl, submissionsUrl } from "../../utils/institutional/sec-urls.util.js";
import type {
  DocumentResponse,
  FilingIndexEntry,
  SecGateway,
} from "../../types/institutional.types.js";

export type SecGatewayOptions = {
  userAgent: string;
  requestTimeoutMs?: number;
  requestDelayMs?: number;
  /** Swaps the transport (in-process stand-ins). */
  adapter?: AxiosAdapter;
};

type RecentFilings = {
  form: string[];
  accessionNumber: string[];
  filingDate: string[];
};

type SubmissionsPayload = {
  filings: { recent: RecentFilings };
};

type DirectoryPayload = {
  directory: { item: Array<{ name: string }> };
};

const submissionsSchema = Joi.object<SubmissionsPayload>({
  filings: Joi.object({
    recent: Joi.object({
      form: Joi.array().items(Joi.string().allow("")).required(),
      accessionNumber: Joi.array().items(Joi.string()).required(),
      filingDate: Joi.array().items(Joi.string().allow("")).required(),
    })
      .unknown()
      .required(),
  })
    .unknown()
    .required(),
}).unknown();

const directorySchema = Joi.object<DirectoryPayload>({
  directory: Joi.object({
    item: Joi.array()
      .items(Joi.object({ name: Joi.string().required() }).unknown())
      .required(),
  })
    .unknown()
    .required(),
}).unknown();

export function assertContactUserAgent(userAgent: unknown): asserts userAgent is string {
  if (typeof userAgent !== "string" || !userAgent.includes("@")) {
    throw new ConfigError("SEC requires the User-Agent to include a contactable email address", {
      userAgent,
    });
  }
}

/**
 * SEC EDGAR over axios. One attempt per request, a fixed pause between requests
 * (SEC allows ~10 requests/second), and the contact User-Agent on every call.
 */
export class EdgarGateway implements SecGateway {
  private readonly http: AxiosInstance;
  private readonly requestDelayMs: number;
  private requestsMade = 0;

  constructor(options: SecGatewayOptions) {
    assertContactUserAgent(options.userAgent);
    this.requestDelayMs = options.requestDelayMs ?? 200;
    this.http = axios.create({
      headers: {
        "User-Agent": options.userAgent,
        "Accept-Encoding": "gzip, deflate",
      },
      timeout: options.requestTimeoutMs ?? 30000,
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  private async throttle(): Promise<void> {
    if (this.requestsMade > 0 && this.requestDelayMs > 0) {
      await sleep(this.requestDelayMs);
    }
    this.requestsMade++;
  }

  async fetchFilingIndex(cik: string): Promise<FilingIndexEntry[]> {
    const url = submissionsUrl(cik);
    await this.throttle();
    logger.debug(`📥 GET ${url}`);

    const response = await this.http.get<unknown>(url, {
      headers: { Accept: "application/json" },
      responseType: "json",
    });
    if (response.status !== 200) {
      throw new SecRequestError(url, response.status);
    }

    const validated = submissionsSchema.validate(response.data);
    if (validated.error) {
      throw new SecResponseError(url, validated.error.message);
    }

    const { form, accessionNumber, filingDate } = validated.value.filings.recent;
    return accessionNumber.map((accession, i) => ({
      formType: (form[i] ?? "").trim(),
      accessionNumber: accession,
      filingDate: filingDate[i] ?? "",
    }));
  }

  async fetchDirectoryListing(cik: string, accessionNumber: string): Promise<string[] | null> {
    const url = directoryIndexUrl(cik, accessionNumber);
    await this.throttle();
    logger.debug(`📥 GET ${url}`);

    const response = await this.http.get<unknown>(url, {
      headers: { Accept: "application/json" },
      responseType: "json",
    });
    if (response.status !== 200) return null;

    const validated = directorySchema.validate(response.data);
    if (validated.error) {
      logger.warn(`⚠️ Unexpected directory listing shape for ${accessionNumber}`);
      return null;
    }
    return validated.value.directory.item.map((item) => item.name);
  }

  async fetchDocument(url: string): Promise<DocumentResponse> {
    await this.throttle();
    logger.debug(`📥 GET ${url}`);

    const response = await this.http.get<unknown>(url, { responseType: "text" });
    return {
      status: response.status,
      body: typeof response.data === "string" ? response.data : "",
    };
  }
}
