import {
  createParcelClient,
  createSessionFromHeader,
  DEFAULT_USER_AGENT,
} from "@parcel-radius/clients";
import type { JobsConfig } from "../config";

export function getProxyUrl(config: JobsConfig, sessionId: string): string | undefined {
  const user = config.PROXY_USERNAME;
  const pass = config.PROXY_PASSWORD;
  if (!user || !pass) return undefined;
  const proxyUser = `customer-${user}-cc-us-sessid-${sessionId}-sesstime-10`;
  return `http://${proxyUser}:${encodeURIComponent(pass)}@${config.PROXY_HOST}`;
}

/** Generate a random session ID for a job run. */
export function generateSessionId(): string {
  return Math.random().toString().slice(2, 12);
}

export function getParcelClient(config: JobsConfig, sessionId: string) {
  if (!config.PARCEL_SESSION_COOKIE) {
    throw new Error("PARCEL_SESSION_COOKIE is not set");
  }
  return createParcelClient({
    session: createSessionFromHeader(
      config.PARCEL_SESSION_COOKIE,
      config.PARCEL_USER_AGENT ?? DEFAULT_USER_AGENT
    ),
    baseUrl: config.PARCEL_BASE_URL,
    proxyUrl: getProxyUrl(config, sessionId),
  });
}
