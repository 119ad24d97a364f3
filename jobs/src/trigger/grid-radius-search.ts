import { task, logger } from "@trigger.dev/sdk";
import { z } from "zod";
import { loadConfig, type JobsConfig } from "../config";
import { generateSessionId, getParcelClient } from "../utils/clients";
import { createRateLimiter } from "../utils/rate-limiter";
import { FilterRecordSchema, filtersFromRecord } from "../search/query-builder";
import { gridRadiusSearch, type CenterSpec, type GridSearchResult } from "../search/grid-search";

export const GridRadiusSearchPayloadSchema = z
  .object({
    lat: z.number().optional(),
    lon: z.number().optional(),
    catastro: z.string().min(1).optional(),
    radiusMiles: z.number().positive(),
    gridSize: z.number().int().min(1).optional(),
    filters: FilterRecordSchema.default({}),
  })
  .refine((p) => p.catastro !== undefined || (p.lat !== undefined && p.lon !== undefined), {
    message: "Provide lat and lon, or a catastro number",
  });

export type GridRadiusSearchPayload = z.input<typeof GridRadiusSearchPayloadSchema>;

export function centerFromPayload(p: {
  lat?: number;
  lon?: number;
  catastro?: string;
}): CenterSpec {
  if (p.lat !== undefined && p.lon !== undefined) return { lat: p.lat, lon: p.lon };
  return { catastro: p.catastro ?? "" };
}

export function logAdvisories(result: GridSearchResult): void {
  for (const advisory of result.advisories) {
    if (advisory.kind === "fetch_failure") {
      logger.error(`Advisory: ${advisory.kind}`, { ...advisory });
    } else {
      logger.warn(`Advisory: ${advisory.kind}`, { ...advisory });
    }
  }
}

export async function runGridRadiusSearch(
  input: unknown,
  config: JobsConfig = loadConfig()
): Promise<GridSearchResult> {
  const payload = GridRadiusSearchPayloadSchema.parse(input);
  const sessionId = generateSessionId();
  const client = getParcelClient(config, sessionId);
  const limiter = createRateLimiter({ callsPerMinute: config.PARCEL_RATE_LIMIT_PER_MINUTE });

  logger.info("Grid radius search requested", {
    lat: payload.lat,
    lon: payload.lon,
    catastro: payload.catastro,
    radiusMiles: payload.radiusMiles,
    gridSize: payload.gridSize,
    sessionId,
  });

  const result = await gridRadiusSearch(
    client,
    {
      center: centerFromPayload(payload),
      radiusMiles: payload.radiusMiles,
      gridSize: payload.gridSize,
      filters: filtersFromRecord(payload.filters),
    },
    {
      pageSize: config.PARCEL_PAGE_SIZE,
      maxPages: config.PARCEL_MAX_PAGES,
      pageDelayMs: config.PARCEL_PAGE_DELAY_MS,
      cellJitterMs: {
        min: config.PARCEL_CELL_JITTER_MIN_MS,
        max: config.PARCEL_CELL_JITTER_MAX_MS,
      },
      limiter,
    }
  );

  logAdvisories(result);
  return result;
}

export const gridRadiusSearchTask = task({
  id: "grid-radius-search",
  queue: { name: "parcel-queries", concurrencyLimit: 1 },
  maxDuration: 3600,
  run: async (payload: GridRadiusSearchPayload) => runGridRadiusSearch(payload),
});
