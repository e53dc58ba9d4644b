// Multimodal Risk Triage - Entry point
// Loads configuration, wires the pipeline and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { createApplication } from "./app.js";
import { loadConfig, type AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { setLogLevel } from "./logger.js";
import type { DeepgramPrerecordedClient } from "./providers/deepgram-speech.js";
import type { OpenAIClient } from "./providers/openai-client.js";

const APP_NAME = "Multimodal Risk Triage";
const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logFatal(errorMessage(err));
  process.exit(1);
}
setLogLevel(config.logLevel);

// ─── Validate API keys ─────────────────────────────────────────────────────────

const { deepgramApiKey, openaiApiKey } = config;

if (!deepgramApiKey) {
  logFatal("DEEPGRAM_API_KEY is not set. Add it to your .env file.");
  process.exit(1);
}

if (!openaiApiKey) {
  logFatal("OPENAI_API_KEY is not set. Add it to your .env file.");
  process.exit(1);
}

logInit("API keys loaded");

// ─── Initialize API clients ─────────────────────────────────────────────────────

logInit("Creating Deepgram client...");
const deepgramClient = createDeepgramClient(deepgramApiKey);

logInit("Creating OpenAI client...");
const openaiClient = new OpenAI({ apiKey: openaiApiKey });

// ─── Wire pipeline and start server ─────────────────────────────────────────────

logInit(`Wiring pipeline (data directory "${config.dataDir}")...`);
const app = createApplication(config, {
  openai: openaiClient as unknown as OpenAIClient,
  deepgram: deepgramClient as unknown as DeepgramPrerecordedClient,
});

const shutdown = (signal: string) => {
  logInit(`${signal} received, shutting down`);
  app
    .stop()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logFatal(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
};
process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

app
  .start()
  .then((resumed) => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit(`Resumed ${resumed} in-flight request(s)`);
    logInit("Pipeline: ingest → visual/speech → sentiment → aggregate → fuse → evidence → report");
  })
  .catch((err: unknown) => {
    logFatal(`Startup failed: ${errorMessage(err)}`);
    process.exit(1);
  });
