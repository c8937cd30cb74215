// src/fetcher/robots.ts
import robotsParser from "robots-parser";
import { CancelledError, DecodeError, PolicyParseError } from "./errors";
import { USER_AGENT, getText, parseTargetUrl } from "./http";
import type { FetchOptions } from "./types";

const ROBOTS_ACCEPT = "text/plain,*/*;q=0.1";

/** `scheme://host[:port]/robots.txt` for the origin of `siteUrl`. */
export function getRobotsUrl(siteUrl: string): string {
  const u = parseTargetUrl(siteUrl);
  return `${u.protocol}//${u.host}/robots.txt`;
}

/**
 * Parsed robots.txt for one origin.
 *
 * Groups naming the agent's product token override the `*` group, and the
 * longest matching pattern wins (Allow on ties). A URL no rule matches is allowed.
 */
export class RobotsPolicy {
  private readonly robots: ReturnType<typeof robotsParser>;

  constructor(public readonly robotsUrl: string, text: string) {
    this.robots = robotsParser(robotsUrl, text);
  }

  allowed(agent: string, url: string): boolean {
    // undefined means the URL belongs to another origin; nothing here forbids it
    return this.robots.isAllowed(url, agent) !== false;
  }
}

/**
 * Build a policy from robots.txt text. The parser accepts any text, so only a
 * document that is not text at all is rejected.
 */
export function parsePolicy(robotsUrl: string, text: string, targetUrl = robotsUrl): RobotsPolicy {
  if (text.includes("\u0000")) {
    throw new PolicyParseError(targetUrl, robotsUrl, "document contains binary data");
  }
  return new RobotsPolicy(robotsUrl, text);
}

/**
 * Retrieve robots.txt. Returns null when it cannot be retrieved (network error,
 * timeout, non-2xx status). A 2xx body that cannot be read as text rejects with
 * PolicyParseError for `targetUrl`, and cancellation rejects with CancelledError.
 */
export async function fetchRobotsTxt(
  robotsUrl: string,
  options: FetchOptions = {},
  targetUrl = robotsUrl
): Promise<string | null> {
  try {
    const res = await getText(robotsUrl, ROBOTS_ACCEPT, options);
    return res.body;
  } catch (err) {
    if (err instanceof CancelledError) throw err;
    // the document was served, so it is a policy that cannot be read, not a missing one
    if (err instanceof DecodeError) throw new PolicyParseError(targetUrl, robotsUrl, "document is not text", err);
    return null; // no robots => allow all
  }
}

/** Resolve, retrieve and evaluate robots.txt for `url` as USER_AGENT. */
export async function isAllowedByRobots(url: string, options: FetchOptions = {}): Promise<boolean> {
  const target = parseTargetUrl(url).toString();
  const robotsUrl = getRobotsUrl(target);

  const txt = await fetchRobotsTxt(robotsUrl, options, target);
  if (txt === null) return true;

  return parsePolicy(robotsUrl, txt, target).allowed(USER_AGENT, target);
}
