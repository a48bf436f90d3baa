/**
 * URL parsing utility.
 */

export interface ParsedUrl {
  /** Authority with an explicit port, e.g. "example.com:80" */
  host: string;
  /** Path plus query, never empty, e.g. "/v1/items?page=2" */
  resource: string;
  https: boolean;
}

/**
 * Split a URL into authority, resource and scheme flag in a single scan.
 *
 * The first two slashes are the scheme separator. Characters after them
 * build the authority until a third slash, from which point everything
 * (slashes included) belongs to the resource. Input without "//" leaves
 * the authority empty; that fails later, when connecting.
 */
export function parseUrl(url: string): ParsedUrl {
  let host = "";
  let resource = "";
  let slashes = 0;

  for (const c of url) {
    if (c === "/") {
      slashes++;
    } else if (slashes === 2) {
      host += c;
    }
    if (slashes >= 3) {
      resource += c;
    }
  }

  if (resource === "") resource = "/";

  const https = url.startsWith("https://");
  if (!host.includes(":")) {
    host += https ? ":443" : ":80";
  }

  return { host, resource, https };
}

/** Whether a redirect location names its own scheme ("https://...") */
export function hasScheme(location: string): boolean {
  return /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(location);
}

/**
 * Split an authority into socket connect arguments.
 * IPv6 literals keep their brackets in the authority and lose them here.
 */
export function splitAuthority(
  host: string,
  https: boolean,
): { hostname: string; port: number } {
  const defaultPort = https ? 443 : 80;
  const bracketEnd = host.lastIndexOf("]");
  const colon = host.lastIndexOf(":");

  if (colon === -1 || colon < bracketEnd) {
    return { hostname: stripBrackets(host), port: defaultPort };
  }

  const portText = host.substring(colon + 1);
  const port = /^\d+$/.test(portText) ? parseInt(portText, 10) : defaultPort;
  return { hostname: stripBrackets(host.substring(0, colon)), port };
}

function stripBrackets(hostname: string): string {
  return hostname.startsWith("[") && hostname.endsWith("]") ? hostname.slice(1, -1) : hostname;
}
