import { fetch, ProxyAgent, type RequestInit, type Response } from "undici";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Creates a fetch function that optionally routes through a proxy.
 * When no proxyUrl is provided, requests go out directly.
 */
export function createFetch(proxyUrl?: string): FetchFn {
  if (!proxyUrl) return (url, init) => fetch(url, init);

  const dispatcher = new ProxyAgent(proxyUrl);

  return (url, init) => fetch(url, { ...init, dispatcher });
}
