// src/server.ts
import "dotenv/config";

import { loadConfig } from "./config";
import { createApp } from "./app";
import { USER_AGENT } from "./fetcher";

const { port, host } = loadConfig();

// ===== Start server =====
createApp().listen(port, host, () => {
  console.log(`[server] on ${host}:${port} as ${USER_AGENT}`);
});
