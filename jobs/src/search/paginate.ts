import { logger } from "@trigger.dev/sdk";
import {
  ParcelQueryError,
  type ParcelQueryClient,
  type PropertyRecord,
  type QueryDescriptor,
} from "@parcel-radius/clients";
import { InvalidArgumentError, extractError } from "../utils/errors";
import { systemClock, type RateLimiter } from "../utils/rate-limiter";

export const DEFAULT_PAGE_SIZE = 100;
export const DEFAULT_MAX_PAGES = 10;
export const DEFAULT_PAGE_DELAY_MS = 1000;

export interface PageProgress {
  page: number;
  received: number;
  total: number;
}

export interface PageFailure {
  page: number;
  status: number | null;
  backendMessage: string | null;
  message: string;
}

export interface FetchAllPagesOptions {
  pageSize?: number;
  maxPages?: number;
  pageDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  limiter?: RateLimiter;
  onPage?: (progress: PageProgress) => void;
}

export interface FetchAllPagesResult {
  records: PropertyRecord[];
  pagesFetched: number;
  /** The last allowed page came back full; more records may exist */
  hitCap: boolean;
  failure: PageFailure | null;
}

export function assertPaging(pageSize: number, maxPages: number): void {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new InvalidArgumentError(
      "INVALID_PAGING",
      `Page size must be a positive integer, got ${pageSize}`
    );
  }
  if (!Number.isInteger(maxPages) || maxPages < 1) {
    throw new InvalidArgumentError(
      "INVALID_PAGING",
      `Max pages must be a positive integer, got ${maxPages}`
    );
  }
}

/**
 * Page through one query. A failed page ends the query; the pages received
 * before it are returned with the failure.
 */
export async function fetchAllPages(
  client: Pick<ParcelQueryClient, "queryPage">,
  descriptor: QueryDescriptor,
  options: FetchAllPagesOptions = {}
): Promise<FetchAllPagesResult> {
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const pageDelayMs = options.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS;
  const sleep = options.sleep ?? systemClock.sleep;
  assertPaging(pageSize, maxPages);

  const records: PropertyRecord[] = [];
  let pagesFetched = 0;
  let lastPageFull = false;
  let failure: PageFailure | null = null;

  for (let page = 0; page < maxPages; page++) {
    await options.limiter?.waitForSlot();

    let batch: PropertyRecord[];
    try {
      batch = await client.queryPage(descriptor, {
        offset: page * pageSize,
        limit: pageSize,
      });
    } catch (err) {
      failure =
        err instanceof ParcelQueryError
          ? { page, status: err.status, backendMessage: err.backendMessage, message: err.message }
          : { page, status: null, backendMessage: null, message: extractError(err).fullMessage };
      logger.warn("Page request failed", { ...failure, pagesKept: pagesFetched });
      break;
    }

    pagesFetched++;
    records.push(...batch);

    const progress = { page, received: batch.length, total: records.length };
    options.onPage?.(progress);
    logger.debug("Fetched page", { ...progress, pageSize });

    lastPageFull = batch.length === pageSize;
    if (!lastPageFull) break;

    if (page < maxPages - 1) {
      await sleep(pageDelayMs);
    }
  }

  return {
    records,
    pagesFetched,
    hitCap: failure === null && pagesFetched === maxPages && lastPageFull,
    failure,
  };
}
