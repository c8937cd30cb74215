import { Router, type Request, type Response } from "express";
import { z } from "zod";
import {
  fetchMetadata,
  fetchMetadataUnchecked,
  HttpError,
  TimeoutError,
  isMetaFetchError,
  type FetchOptions,
  type Metadata,
  type MetaFetchErrorCode,
} from "./fetcher";

export type MetadataOperations = {
  fetchMetadata: (url: string, options?: FetchOptions) => Promise<Metadata>;
  fetchMetadataUnchecked: (url: string, options?: FetchOptions) => Promise<Metadata>;
};

const defaultOperations: MetadataOperations = { fetchMetadata, fetchMetadataUnchecked };

// Query strings only carry text, JSON bodies carry real booleans
const booleanish = z.union([
  z.boolean(),
  z.enum(["true", "false", "1", "0"]).transform((v) => v === "true" || v === "1"),
]);

const MetadataRequest = z.object({
  url: z.string().min(1),
  robots: booleanish.default(true),
});

const STATUS_BY_CODE: Record<MetaFetchErrorCode, number> = {
  INVALID_URL: 400,
  ROBOTS_DISALLOWED: 403,
  HTTP_ERROR: 502,
  NETWORK_ERROR: 502,
  DECODE_ERROR: 502,
  POLICY_PARSE_ERROR: 502,
  CANCELLED: 499,
};

export function metadataRouter(ops: MetadataOperations = defaultOperations): Router {
  const router = Router();

  async function handle(input: unknown, res: Response) {
    const parsed = MetadataRequest.safeParse(input);
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => `${i.path.join(".") || "request"}: ${i.message}`).join("; ");
      return res.status(400).json({ error: "INVALID_REQUEST", message });
    }
    const { url, robots } = parsed.data;

    // Client went away before we answered: stop fetching
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });
    const options: FetchOptions = { signal: controller.signal };

    try {
      const metadata = robots
        ? await ops.fetchMetadata(url, options)
        : await ops.fetchMetadataUnchecked(url, options);
      return res.json({ url, metadata });
    } catch (e) {
      if (isMetaFetchError(e)) {
        const status = e instanceof TimeoutError ? 504 : STATUS_BY_CODE[e.code];
        return res.status(status).json({
          error: e.code,
          message: e.message,
          ...(e instanceof HttpError ? { status: e.status } : {}),
        });
      }
      console.error("[server] metadata failed", url, e);
      return res.status(500).json({ error: "INTERNAL", message: e instanceof Error ? e.message : String(e) });
    }
  }

  // GET /v1/metadata?url=https://example.com&robots=false
  router.get("/v1/metadata", async (req: Request, res: Response) => {
    await handle(req.query, res);
  });

  // POST /v1/metadata {"url":"https://example.com","robots":true}
  router.post("/v1/metadata", async (req: Request, res: Response) => {
    await handle(req.body, res);
  });

  return router;
}

export default metadataRouter;
