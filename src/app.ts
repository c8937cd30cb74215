// src/app.ts
import express, { type ErrorRequestHandler } from "express";
import cors from "cors";
import bodyParser from "body-parser";

import { metadataRouter, type MetadataOperations } from "./metadataRoute";

export function createApp(ops?: MetadataOperations): express.Express {
  const app = express();
  app.use(cors());
  app.use(bodyParser.json({ limit: "16kb" }));

  /** ===== Health ===== */
  app.get("/healthz", (_req, res) => res.send("ok"));

  /** ===== Metadata ===== */
  app.use(metadataRouter(ops));

  // body-parser failures (bad JSON, oversized body) land here
  const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const status = err instanceof Error && "status" in err && typeof err.status === "number" ? err.status : 500;
    if (status >= 500) console.error("[server] request failed", err);
    res.status(status).json({
      error: status < 500 ? "INVALID_REQUEST" : "INTERNAL",
      message: err instanceof Error ? err.message : String(err),
    });
  };
  app.use(onError);

  return app;
}
