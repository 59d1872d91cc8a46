/**
 * Client Identity Resolution
 * Derives the rate-limit identity of a caller from request metadata
 */

export interface ClientRequestInfo {
  apiKey?: string;
  headers?: Record<string, string | undefined>;
  remoteAddress?: string;
}

function header(headers: ClientRequestInfo["headers"], name: string): string | undefined {
  if (!headers) return undefined;
  const match = Object.entries(headers).find(([key]) => key.toLowerCase() === name);
  return match?.[1];
}

/**
 * API key callers are keyed by key; everyone else by client IP
 */
export function resolveClientIdentity(request: ClientRequestInfo): string {
  if (request.apiKey) {
    return `api_key:${request.apiKey}`;
  }

  const forwarded = header(request.headers, "x-forwarded-for");
  if (forwarded) {
    const first = forwarded.split(",")[0]?.trim();
    if (first) {
      return `ip:${first}`;
    }
  }

  const realIp = header(request.headers, "x-real-ip");
  if (realIp) {
    return `ip:${realIp.trim()}`;
  }

  return `ip:${request.remoteAddress || "unknown"}`;
}
