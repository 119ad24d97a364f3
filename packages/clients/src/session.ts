export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/133.0.0.0 Safari/537.36";

/**
 * Authenticated session handle. Acquiring the cookies (splash page, browser
 * automation) happens outside this package; the client only replays them.
 */
export interface ParcelSession {
  cookieHeader: string;
  userAgent: string;
}

export interface BrowserCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
}

function matchesDomain(cookieDomain: string | undefined, domain: string): boolean {
  if (!cookieDomain) return true;
  const bare = cookieDomain.replace(/^\./, "").toLowerCase();
  const host = domain.toLowerCase();
  return host === bare || host.endsWith(`.${bare}`);
}

/** Build a session from cookies exported by a browser for the registry host. */
export function createSessionFromCookies(
  cookies: BrowserCookie[],
  domain: string,
  userAgent: string = DEFAULT_USER_AGENT
): ParcelSession {
  const cookieHeader = cookies
    .filter((c) => matchesDomain(c.domain, domain))
    .map((c) => `${c.name}=${c.value}`)
    .join("; ");

  return { cookieHeader, userAgent };
}

/** Session from a raw `Cookie` header value (e.g. copied from devtools). */
export function createSessionFromHeader(
  cookieHeader: string,
  userAgent: string = DEFAULT_USER_AGENT
): ParcelSession {
  return { cookieHeader: cookieHeader.trim(), userAgent };
}
