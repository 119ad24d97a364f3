import { z } from "zod";
import type { Response } from "undici";
import { createFetch } from "../proxy";
import { ParcelQueryError } from "../errors";
import type { ParcelSession } from "../session";
import type {
  PageRequest,
  PropertyRecord,
  QueryDescriptor,
} from "../types";

// ── Endpoint Config ─────────────────────────────────────────────
const DEFAULT_BASE_URL = "https://catastro.crimpr.net";
const DEFAULT_LAYER_PATH =
  "/server/rest/services/Parcelario/Parcelas/MapServer/654/query";
const REFERER_PATH = "/cdprpc/";

/** Output spatial reference used by every query (Web Mercator) */
export const WEB_MERCATOR_WKID = 102100;

// ── Zod Schemas ──────────────────────────────────────────────────

const FeatureSchema = z
  .object({
    attributes: z.record(z.unknown()),
    geometry: z.unknown().optional(),
  })
  .passthrough();

const QueryResponseSchema = z
  .object({
    features: z.array(FeatureSchema).optional(),
    error: z
      .object({
        code: z.number().optional(),
        message: z.string().optional(),
        details: z.array(z.string()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type QueryFeature = z.infer<typeof FeatureSchema>;

// ── Param serialisation ─────────────────────────────────────────

/**
 * Serialise a descriptor (plus optional page window) into layer query
 * parameters. Geometry is sent as Esri JSON.
 */
export function toQueryParams(
  descriptor: QueryDescriptor,
  page?: PageRequest
): URLSearchParams {
  const params = new URLSearchParams({ f: "json" });

  if (descriptor.geometry) {
    params.set("geometry", JSON.stringify(descriptor.geometry));
    params.set("geometryType", "esriGeometryPolygon");
  }
  params.set("spatialRel", descriptor.spatialRel);
  if (descriptor.where) {
    params.set("where", descriptor.where);
  }
  params.set("returnGeometry", descriptor.returnGeometry ? "true" : "false");
  params.set(
    "outFields",
    descriptor.outFields === "*" ? "*" : descriptor.outFields.join(",")
  );
  params.set("outSR", String(descriptor.outSR));

  if (page) {
    params.set("resultOffset", String(page.offset));
    params.set("resultRecordCount", String(page.limit));
  }

  return params;
}

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

// ── Client Factory ──────────────────────────────────────────────

export interface ParcelClientConfig {
  session: ParcelSession;
  baseUrl?: string;
  layerPath?: string;
  proxyUrl?: string;
}

export function createParcelClient(config: ParcelClientConfig) {
  const baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  const layerPath = config.layerPath ?? DEFAULT_LAYER_PATH;
  const fetchFn = createFetch(config.proxyUrl);

  /**
   * The layer is only reachable through the site's own proxy, which takes the
   * target URL (with its trailing "?") as the query string.
   */
  function buildQueryUrl(params: URLSearchParams): string {
    return `${baseUrl}/proxy/proxy.ashx?${baseUrl}${layerPath}?${params.toString()}`;
  }

  async function runQuery(params: URLSearchParams): Promise<QueryFeature[]> {
    let res: Response;
    try {
      res = await fetchFn(buildQueryUrl(params), {
        method: "GET",
        headers: {
          Accept: "application/json",
          Referer: `${baseUrl}${REFERER_PATH}`,
          "User-Agent": config.session.userAgent,
          Cookie: config.session.cookieHeader,
        },
      });
    } catch (err) {
      throw new ParcelQueryError("Parcel query request failed", { cause: err });
    }

    if (!res.ok) {
      let text: string;
      try {
        text = await res.text();
      } catch (err) {
        throw new ParcelQueryError(`Parcel query failed with status ${res.status}`, {
          status: res.status,
          cause: err,
        });
      }
      throw new ParcelQueryError(`Parcel query failed with status ${res.status}`, {
        status: res.status,
        backendMessage: text || null,
      });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new ParcelQueryError("Parcel query returned invalid JSON", {
        status: res.status,
        cause: err,
      });
    }

    const parsed = QueryResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ParcelQueryError("Parcel query returned an unexpected payload", {
        status: res.status,
        backendMessage: parsed.error.issues[0]?.message ?? null,
      });
    }

    const data = parsed.data;
    if (data.error) {
      const backendMessage = data.error.message ?? "Unknown error";
      throw new ParcelQueryError(`Parcel query error: ${backendMessage}`, {
        status: data.error.code ?? res.status,
        backendMessage,
      });
    }
    if (!data.features) {
      throw new ParcelQueryError("No features found in response", {
        status: res.status,
      });
    }

    return data.features;
  }

  /** Run one page of a layer query and return the feature attributes. */
  async function queryPage(
    descriptor: QueryDescriptor,
    page: PageRequest
  ): Promise<PropertyRecord[]> {
    const features = await runQuery(toQueryParams(descriptor, page));
    return features.map((f) => f.attributes);
  }

  /**
   * Full-detail lookup of one parcel by catastro number (case-insensitive).
   * Returns null when the registry has no such parcel.
   */
  async function lookupParcel(catastro: string): Promise<PropertyRecord | null> {
    const descriptor: QueryDescriptor = {
      spatialRel: "esriSpatialRelIntersects",
      where: `LOWER(CATASTRO) = ${quoteLiteral(catastro.trim().toLowerCase())}`,
      outFields: "*",
      returnGeometry: true,
      outSR: WEB_MERCATOR_WKID,
    };
    const features = await runQuery(toQueryParams(descriptor));
    return features[0]?.attributes ?? null;
  }

  return {
    buildQueryUrl,
    queryPage,
    lookupParcel,
  };
}

export type ParcelClient = ReturnType<typeof createParcelClient>;
