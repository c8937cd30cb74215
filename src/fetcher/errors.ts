// src/fetcher/errors.ts

export type MetaFetchErrorCode =
  | "INVALID_URL"
  | "NETWORK_ERROR"
  | "HTTP_ERROR"
  | "DECODE_ERROR"
  | "POLICY_PARSE_ERROR"
  | "ROBOTS_DISALLOWED"
  | "CANCELLED";

export class MetaFetchError extends Error {
  public readonly code: MetaFetchErrorCode;
  public readonly url: string;

  constructor(message: string, code: MetaFetchErrorCode, url: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "MetaFetchError";
    this.code = code;
    this.url = url;
    Error.captureStackTrace(this, new.target);
  }
}

export class InvalidUrlError extends MetaFetchError {
  constructor(url: string, reason = "not an absolute http(s) URL") {
    super(`Invalid URL "${url}": ${reason}`, "INVALID_URL", url);
    this.name = "InvalidUrlError";
  }
}

export class NetworkError extends MetaFetchError {
  constructor(url: string, cause?: unknown, message = `Request to ${url} failed`) {
    super(message, "NETWORK_ERROR", url, cause);
    this.name = "NetworkError";
  }
}

/** A request that ran past the fixed timeout. Keeps the `NETWORK_ERROR` code. */
export class TimeoutError extends NetworkError {
  public readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(url, undefined, `Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class HttpError extends MetaFetchError {
  public readonly status: number;

  constructor(url: string, status: number, statusText = "") {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ""} from ${url}`, "HTTP_ERROR", url);
    this.name = "HttpError";
    this.status = status;
  }
}

/** The body could not be read as text: invalid bytes for its charset, or too large. */
export class DecodeError extends MetaFetchError {
  constructor(url: string, reason: string, cause?: unknown) {
    super(`Response body from ${url} could not be read as text: ${reason}`, "DECODE_ERROR", url, cause);
    this.name = "DecodeError";
  }
}

export class PolicyParseError extends MetaFetchError {
  public readonly robotsUrl: string;

  constructor(url: string, robotsUrl: string, reason: string, cause?: unknown) {
    super(`Could not parse ${robotsUrl}: ${reason}`, "POLICY_PARSE_ERROR", url, cause);
    this.name = "PolicyParseError";
    this.robotsUrl = robotsUrl;
  }
}

export class RobotsDisallowedError extends MetaFetchError {
  public readonly agent: string;

  constructor(url: string, agent: string) {
    super(`Not allowed to fetch ${url} as ${agent} per the site's robots.txt`, "ROBOTS_DISALLOWED", url);
    this.name = "RobotsDisallowedError";
    this.agent = agent;
  }
}

export class CancelledError extends MetaFetchError {
  constructor(url: string, cause?: unknown) {
    super(`Fetching ${url} was cancelled`, "CANCELLED", url, cause);
    this.name = "CancelledError";
  }
}

export function isMetaFetchError(err: unknown): err is MetaFetchError {
  return err instanceof MetaFetchError;
}
