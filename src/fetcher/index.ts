// src/fetcher/index.ts
import { extractMetadata } from "./extract";
import { RobotsDisallowedError } from "./errors";
import { USER_AGENT, fetchPage, parseTargetUrl } from "./http";
import { isAllowedByRobots } from "./robots";
import type { FetchOptions, Metadata } from "./types";

/**
 * Fetch a page and extract its metadata without consulting robots.txt.
 * Callers using this path are responsible for honouring the site's policy.
 */
export async function fetchMetadataUnchecked(url: string, options: FetchOptions = {}): Promise<Metadata> {
  const page = await fetchPage(url, options);
  return extractMetadata(page.body);
}

/**
 * Fetch a page's link-preview metadata, provided the site's robots.txt allows
 * USER_AGENT to fetch it. The page is never requested when it does not.
 */
export async function fetchMetadata(url: string, options: FetchOptions = {}): Promise<Metadata> {
  const target = parseTargetUrl(url).toString();

  if (!(await isAllowedByRobots(target, options))) {
    throw new RobotsDisallowedError(target, USER_AGENT);
  }
  return fetchMetadataUnchecked(target, options);
}

export { USER_AGENT, fetchPage } from "./http";
export { extractMetadata } from "./extract";
export { getRobotsUrl, isAllowedByRobots, parsePolicy, RobotsPolicy } from "./robots";
export { createMetadata } from "./types";
export type { FetchOptions, FetchResult, Metadata } from "./types";
export * from "./errors";
