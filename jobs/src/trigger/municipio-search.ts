import { task, logger } from "@trigger.dev/sdk";
import { z } from "zod";
import { loadConfig, type JobsConfig } from "../config";
import { generateSessionId, getParcelClient } from "../utils/clients";
import { createRateLimiter } from "../utils/rate-limiter";
import { FilterRecordSchema, filtersFromRecord } from "../search/query-builder";
import { municipioSearch, type GridSearchResult } from "../search/grid-search";
import { logAdvisories } from "./grid-radius-search";

export const MunicipioSearchPayloadSchema = z.object({
  municipio: z.string().min(1),
  filters: FilterRecordSchema.default({}),
});

export type MunicipioSearchPayload = z.input<typeof MunicipioSearchPayloadSchema>;

export async function runMunicipioSearch(
  input: unknown,
  config: JobsConfig = loadConfig()
): Promise<GridSearchResult> {
  const payload = MunicipioSearchPayloadSchema.parse(input);
  const sessionId = generateSessionId();
  const client = getParcelClient(config, sessionId);
  const limiter = createRateLimiter({ callsPerMinute: config.PARCEL_RATE_LIMIT_PER_MINUTE });

  logger.info("Municipio search requested", { municipio: payload.municipio, sessionId });

  const result = await municipioSearch(
    client,
    { municipio: payload.municipio, filters: filtersFromRecord(payload.filters) },
    {
      pageSize: config.PARCEL_PAGE_SIZE,
      maxPages: config.PARCEL_MAX_PAGES,
      pageDelayMs: config.PARCEL_PAGE_DELAY_MS,
      limiter,
    }
  );

  logAdvisories(result);
  return result;
}

export const municipioSearchTask = task({
  id: "municipio-search",
  queue: { name: "parcel-queries", concurrencyLimit: 1 },
  maxDuration: 3600,
  run: async (payload: MunicipioSearchPayload) => runMunicipioSearch(payload),
});
