// src/fetcher/http.ts
import { fetch, type Response } from "undici";
import {
  CancelledError,
  DecodeError,
  HttpError,
  InvalidUrlError,
  MetaFetchError,
  NetworkError,
  TimeoutError,
} from "./errors";
import type { FetchOptions, FetchResult } from "./types";

/**
 * Identifies this fetcher in the User-Agent header and when matching robots.txt groups.
 * Both uses must read this constant, otherwise the robots check is meaningless.
 */
export const USER_AGENT = "MetaFetcher/1.0";

export const DEFAULT_TIMEOUT_MS = 15000;

export const MAX_BODY_BYTES = 10 * 1024 * 1024;

const HTML_ACCEPT = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

const CHARSET_RE = /charset\s*=\s*["']?([^"';\s]+)/i;

/** Parse an absolute http(s) URL, or throw InvalidUrlError. No network activity. */
export function parseTargetUrl(input: string): URL {
  let u: URL;
  try {
    u = new URL(input);
  } catch {
    throw new InvalidUrlError(input);
  }
  if (u.protocol !== "http:" && u.protocol !== "https:") {
    throw new InvalidUrlError(input, `unsupported scheme "${u.protocol}"`);
  }
  if (!u.hostname) {
    throw new InvalidUrlError(input, "missing host");
  }
  return u;
}

/**
 * Decode a response body strictly, in the charset the content-type declares (UTF-8 otherwise).
 * Unknown charset labels fall back to UTF-8.
 */
export function decodeBody(url: string, bytes: ArrayBuffer | Uint8Array, contentType: string): string {
  const label = CHARSET_RE.exec(contentType)?.[1]?.toLowerCase() ?? "utf-8";
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(label, { fatal: true });
  } catch {
    decoder = new TextDecoder("utf-8", { fatal: true });
  }
  try {
    return decoder.decode(bytes);
  } catch (err) {
    throw new DecodeError(url, `not valid ${decoder.encoding}`, err);
  }
}

// Buffer the body, refusing anything over maxBytes whether or not content-length says so
async function readBody(url: string, res: Response, maxBytes: number): Promise<Uint8Array> {
  const tooLarge = () => new DecodeError(url, `larger than ${maxBytes} bytes`);

  if (Number(res.headers.get("content-length")) > maxBytes) {
    await res.body?.cancel();
    throw tooLarge();
  }
  if (!res.body) return new Uint8Array(0);

  const chunks: Uint8Array[] = [];
  let size = 0;
  for await (const chunk of res.body) {
    if (!(chunk instanceof Uint8Array)) continue;
    size += chunk.byteLength;
    if (size > maxBytes) throw tooLarge(); // leaving the loop cancels the stream
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

export type RequestLimits = {
  timeoutMs?: number;
  maxBytes?: number;
};

/**
 * GET a URL as text with the fixed user agent, a finite timeout and a body size cap.
 * Redirects are followed by undici.
 */
export async function getText(
  url: string,
  accept: string,
  { signal, dispatcher }: FetchOptions = {},
  { timeoutMs = DEFAULT_TIMEOUT_MS, maxBytes = MAX_BODY_BYTES }: RequestLimits = {}
): Promise<FetchResult> {
  if (signal?.aborted) throw new CancelledError(url, signal.reason);

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const res = await fetch(url, {
      signal: controller.signal,
      redirect: "follow",
      dispatcher,
      headers: {
        "user-agent": USER_AGENT,
        accept,
      },
    });

    const contentType = res.headers.get("content-type") ?? "";

    if (!res.ok) {
      await res.body?.cancel();
      throw new HttpError(url, res.status, res.statusText);
    }

    const bytes = await readBody(url, res, maxBytes);
    return {
      status: res.status,
      url: res.url || url,
      contentType,
      body: decodeBody(url, bytes, contentType),
    };
  } catch (err) {
    if (err instanceof MetaFetchError) throw err;
    if (signal?.aborted) throw new CancelledError(url, signal.reason);
    if (timedOut) throw new TimeoutError(url, timeoutMs);
    throw new NetworkError(url, err);
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onAbort);
  }
}

/** Fetch a page's HTML. Fails on transport errors, non-2xx statuses and unreadable bodies. */
export async function fetchPage(inputUrl: string, options: FetchOptions = {}): Promise<FetchResult> {
  const url = parseTargetUrl(inputUrl).toString();
  return getText(url, HTML_ACCEPT, options);
}
