import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { HarvestRequestError } from '../errors.js';
import type { DateRange } from '../types/export.js';
import type {
  HarvestCredentials,
  HarvestFetchResult,
  PageErrorPolicy,
  TimeEntriesPage,
} from '../types/harvest.js';
import type { Logger } from './logger.js';
import { parseTimeEntriesPage } from './validation.js';

export const HARVEST_API_URL = 'https://api.harvestapp.com/v2';
export const PER_PAGE = 100;
export const REQUEST_TIMEOUT_MS = 30_000;

export interface HarvestServiceOptions {
  logger: Logger;
  pageErrorPolicy?: PageErrorPolicy;
  /** Pre-configured client; when omitted one is built from the credentials. */
  http?: AxiosInstance;
}

/**
 * Reads the page number from a `Link: <...?page=3>; rel="next"` header.
 */
export function nextPageFromLink(link: unknown): number | undefined {
  if (typeof link !== 'string') {
    return undefined;
  }
  for (const part of link.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(part);
    if (!match) {
      continue;
    }
    const page = Number(new URL(match[1], HARVEST_API_URL).searchParams.get('page'));
    return Number.isInteger(page) && page > 0 ? page : undefined;
  }
  return undefined;
}

export function nextPageOf(page: number, body: TimeEntriesPage, link: unknown): number | undefined {
  if (body.next_page) {
    return body.next_page;
  }
  const fromLink = nextPageFromLink(link);
  if (fromLink !== undefined) {
    return fromLink;
  }
  if (body.total_pages && page < body.total_pages) {
    return page + 1;
  }
  return undefined;
}

export class HarvestService {
  private client: AxiosInstance;
  private logger: Logger;
  private pageErrorPolicy: PageErrorPolicy;

  constructor(credentials: HarvestCredentials, options: HarvestServiceOptions) {
    this.logger = options.logger;
    this.pageErrorPolicy = options.pageErrorPolicy ?? 'abort';
    this.client =
      options.http ??
      axios.create({
        baseURL: HARVEST_API_URL,
        timeout: REQUEST_TIMEOUT_MS,
        headers: {
          'Harvest-Account-ID': credentials.accountId,
          Authorization: `Bearer ${credentials.authToken}`,
          'User-Agent': credentials.userAgent,
        },
      });
  }

  async getTimeEntries(range: DateRange, userId?: number): Promise<HarvestFetchResult> {
    const timeEntries: unknown[] = [];
    const skippedPages: number[] = [];
    let totalPages: number | undefined;
    let page: number | undefined = 1;

    if (userId !== undefined) {
      this.logger.info(`Filtering time entries for user ID: ${userId}`);
    }
    this.logger.info(`Fetching time entries from ${range.from} to ${range.to}`);

    while (page !== undefined) {
      let fetched: { body: TimeEntriesPage; link: unknown };
      try {
        const response = await this.fetchPage(range, page, userId);
        fetched = { body: this.parsePage(response.data, range, page), link: response.headers['link'] };
      } catch (error) {
        const failure = this.toRequestError(error, range, page);
        if (this.pageErrorPolicy === 'abort') {
          this.logger.error(failure.message, { from: range.from, to: range.to, page, status: failure.status });
          throw failure;
        }
        skippedPages.push(page);
        this.logger.warn(`Skipping page ${page}, the export will be incomplete: ${failure.message}`, {
          from: range.from,
          to: range.to,
          page,
        });
        page = totalPages !== undefined && page < totalPages ? page + 1 : undefined;
        continue;
      }

      const { body, link } = fetched;
      timeEntries.push(...body.time_entries);
      totalPages = body.total_pages ?? totalPages;
      this.logger.debug(`Fetched page ${page}`, { entries: body.time_entries.length, totalPages });
      const next = nextPageOf(page, body, link);
      if (next !== undefined && next <= page) {
        const failure = new HarvestRequestError(
          `Pagination did not advance past page ${page} (next page ${next})`,
          page,
          range
        );
        this.logger.error(failure.message, { from: range.from, to: range.to, page });
        throw failure;
      }
      page = next;
    }

    if (skippedPages.length > 0) {
      this.logger.warn(`Fetched ${timeEntries.length} time entries with pages ${skippedPages.join(', ')} missing`);
    } else {
      this.logger.info(`Fetched ${timeEntries.length} time entries`);
    }
    return { time_entries: timeEntries, skippedPages };
  }

  private async fetchPage(range: DateRange, page: number, userId?: number): Promise<AxiosResponse<unknown>> {
    const params: Record<string, string | number> = {
      from: range.from,
      to: range.to,
      page,
      per_page: PER_PAGE,
    };
    if (userId !== undefined) {
      params.user_id = userId;
    }
    return this.client.get<unknown>('/time_entries', { params });
  }

  private parsePage(data: unknown, range: DateRange, page: number): TimeEntriesPage {
    const parsed = parseTimeEntriesPage(data);
    if (!parsed.success) {
      throw new HarvestRequestError(
        `Unexpected response on page ${page}: ${parsed.error.message}`,
        page,
        range,
        undefined,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  private toRequestError(error: unknown, range: DateRange, page: number): HarvestRequestError {
    if (error instanceof HarvestRequestError) {
      return error;
    }
    if (axios.isAxiosError(error)) {
      return new HarvestRequestError(
        `Harvest API request failed on page ${page}: ${error.message}`,
        page,
        range,
        error.response?.status,
        { cause: error }
      );
    }
    const message = error instanceof Error ? error.message : 'An unknown error occurred';
    return new HarvestRequestError(`Unexpected error on page ${page}: ${message}`, page, range, undefined, {
      cause: error,
    });
  }
}
