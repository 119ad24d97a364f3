export { createParcelClient, toQueryParams, WEB_MERCATOR_WKID } from "./parcels/index";
export type { ParcelClient, ParcelClientConfig, QueryFeature } from "./parcels/index";

export { ParcelQueryError } from "./errors";

export {
  createSessionFromCookies,
  createSessionFromHeader,
  DEFAULT_USER_AGENT,
} from "./session";
export type { ParcelSession, BrowserCookie } from "./session";

export { createFetch } from "./proxy";
export type { FetchFn } from "./proxy";

export type {
  PropertyRecord,
  EsriPolygon,
  QueryDescriptor,
  PageRequest,
  ParcelQueryClient,
} from "./types";
