// pattern: Imperative Shell
import type { z } from "zod";
import { HttpError } from "./errors";

const USER_AGENT = "feed-sync/0.1 (subscription sync)";
const TIMEOUT_MS = 15000;

export type RequestHeaders = Readonly<Record<string, string>>;

/**
 * One page of a JSON API response, with the `rel="next"` URL when the server
 * paginates through a `Link` header.
 */
export type JsonPage<T> = {
  readonly data: T;
  readonly next: string | null;
};

/**
 * Extracts the `rel="next"` target from an RFC 8288 `Link` header.
 */
export function parseNextLink(header: string | null): string | null {
  if (!header) return null;

  for (const part of header.split(",")) {
    const match = /<([^>]+)>\s*;\s*rel="?([^";]+)"?/.exec(part.trim());
    if (match?.[2]?.split(/\s+/).includes("next")) {
      return match[1] ?? null;
    }
  }
  return null;
}

async function send(
  method: string,
  url: string,
  headers: RequestHeaders,
  body?: unknown,
): Promise<Response> {
  const response = await fetch(url, {
    method,
    signal: AbortSignal.timeout(TIMEOUT_MS),
    headers: {
      "User-Agent": USER_AGENT,
      Accept: "application/json",
      ...(body === undefined ? {} : { "Content-Type": "application/json" }),
      ...headers,
    },
    body: body === undefined ? undefined : JSON.stringify(body),
  });

  if (!response.ok) {
    throw new HttpError(response.status, response.statusText, url);
  }
  return response;
}

/**
 * GETs a JSON document and validates it against `schema`.
 * Throws `HttpError` on a non-2xx status and `ZodError` on an unexpected shape.
 */
export async function getJson<S extends z.ZodTypeAny>(
  url: string,
  headers: RequestHeaders,
  schema: S,
): Promise<JsonPage<z.output<S>>> {
  const response = await send("GET", url, headers);
  const data: unknown = await response.json();

  return {
    data: schema.parse(data),
    next: parseNextLink(response.headers.get("link")),
  };
}

/**
 * Sends a request whose response body, if any, is not needed.
 */
export async function sendJson(
  method: "POST" | "PUT" | "DELETE",
  url: string,
  headers: RequestHeaders,
  body?: unknown,
): Promise<void> {
  await send(method, url, headers, body);
}
