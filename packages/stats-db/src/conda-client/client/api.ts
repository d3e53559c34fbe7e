import type { z } from "zod";
import { CountSourceError } from "../../errors";
import { delay } from "../../utils";
import {
  anacondaPackageSchema,
  repodataSchema,
  type AnacondaPackage,
  type Repodata,
} from "../types/anaconda";

export interface AnacondaApiClientOpts {
  apiEndpoint?: string;
  channelEndpoint?: string;
  maxRetries?: number;
  /** Backoff before the second attempt, doubled after each failure. */
  initialRetryDelay?: number;
}

export const defaultAnacondaApiClientOpts: Required<AnacondaApiClientOpts> = {
  apiEndpoint: "https://api.anaconda.org",
  channelEndpoint: "https://conda.anaconda.org",
  maxRetries: 3,
  initialRetryDelay: 1000, // 1 second
};

const HTTP_HEADERS = {
  Accept: "application/json",
};

function isRetryable(error: unknown): boolean {
  if (!(error instanceof CountSourceError) || error.status === undefined) {
    return true; // network failure
  }
  return error.status === 429 || error.status >= 500;
}

export class AnacondaApiClient {
  private readonly options: Required<AnacondaApiClientOpts>;

  constructor(options: AnacondaApiClientOpts = {}) {
    this.options = { ...defaultAnacondaApiClientOpts, ...options };
  }

  private async getOnce<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    let response: Response;
    try {
      response = await fetch(url, { headers: HTTP_HEADERS });
    } catch (error) {
      throw new CountSourceError(
        url,
        error instanceof Error ? error.message : String(error)
      );
    }
    if (!response.ok) {
      throw new CountSourceError(
        url,
        `${response.status} ${response.statusText}`,
        response.status
      );
    }

    const body: unknown = await response.json();
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new CountSourceError(
        url,
        `unexpected response: ${parsed.error.message}`
      );
    }
    return parsed.data;
  }

  private async get<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const { initialRetryDelay } = this.options;
    const maxRetries = Math.max(1, this.options.maxRetries);
    let lastError: unknown;
    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        return await this.getOnce(url, schema);
      } catch (error) {
        lastError = error;
        if (attempt >= maxRetries || !isRetryable(error)) {
          break;
        }
        const backoffDelay = initialRetryDelay * Math.pow(2, attempt - 1);
        console.error(
          `⚠️ Attempt ${attempt}/${maxRetries} for ${url} failed:\n\tError: ${
            error instanceof Error ? error.message : error
          }\n\tRetrying in ${backoffDelay / 1000}s...`
        );
        await delay(backoffDelay);
      }
    }
    throw lastError;
  }

  public async packageInfo(
    channel: string,
    packageName: string
  ): Promise<AnacondaPackage> {
    const url = `${this.options.apiEndpoint}/package/${encodeURIComponent(
      channel
    )}/${encodeURIComponent(packageName)}`;
    return await this.get(url, anacondaPackageSchema);
  }

  public async repodata(channel: string, subdir: string): Promise<Repodata> {
    const url = `${this.options.channelEndpoint}/${encodeURIComponent(
      channel
    )}/${subdir}/repodata.json`;
    return await this.get(url, repodataSchema);
  }
}
