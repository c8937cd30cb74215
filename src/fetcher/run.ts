#!/usr/bin/env node
// src/fetcher/run.ts
import { fetchMetadata, fetchMetadataUnchecked, isMetaFetchError } from "./index";

void (async () => {
  const args = process.argv.slice(2);
  const skipRobots = args.includes("--no-robots");
  const [url] = args.filter((a) => !a.startsWith("--"));

  if (!url) {
    console.error("usage: meta-fetcher <url> [--no-robots]");
    process.exit(2);
  }

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  try {
    const metadata = skipRobots
      ? await fetchMetadataUnchecked(url, { signal: controller.signal })
      : await fetchMetadata(url, { signal: controller.signal });
    console.log(JSON.stringify({ url, metadata }, null, 2));
  } catch (err) {
    if (isMetaFetchError(err)) {
      console.error(`[meta-fetcher] failed: ${err.code}: ${err.message}`);
    } else {
      console.error("[meta-fetcher] failed:", err);
    }
    process.exit(1);
  }
})();
