// Multimodal Risk Triage - Application wiring
// Builds the store, providers, in-process job tables, orchestrator, scheduler
// and HTTP server from an AppConfig and the external clients.

import type { AppConfig } from "./config.js";
import { EvidenceSelector } from "./evidence-selector.js";
import { FusionEngine } from "./fusion-engine.js";
import { IngestGate } from "./ingest-gate.js";
import { JobOrchestrator } from "./job-orchestrator.js";
import { FfmpegToolkit, type MediaToolkit } from "./media-toolkit.js";
import { SentimentAdapter, SpeechAdapter, VisualAdapter, type ModalityAdapters } from "./modality-adapters.js";
import { DeepgramSpeechProvider, type DeepgramPrerecordedClient } from "./providers/deepgram-speech.js";
import type { OpenAIClient } from "./providers/openai-client.js";
import { OpenAIReasoningProvider } from "./providers/openai-reasoning.js";
import { OpenAISentimentProvider } from "./providers/openai-sentiment.js";
import { OpenAIVisionEmotionProvider } from "./providers/openai-vision-emotion.js";
import { ReportAssembler } from "./report-assembler.js";
import { FileRequestStore } from "./request-store.js";
import { ResultAggregator } from "./result-aggregator.js";
import { PipelineScheduler } from "./scheduler.js";
import { createAppServer, type AppServer } from "./server.js";
import type { EmotionEvent, SentimentInput, SpeechInput, Transcript, Utterance, VisualInput } from "./types.js";
import { InProcessJobTable } from "./utils/in-process-jobs.js";

/** ffmpeg/ffprobe child processes are killed after this long. */
const MEDIA_TIMEOUT_MS = 10 * 60 * 1000;

export interface AppClients {
  openai: OpenAIClient;
  deepgram: DeepgramPrerecordedClient;
  /** Defaults to the ffmpeg toolkit configured by `ffmpegPath`/`ffprobePath`. */
  media?: MediaToolkit;
}

export interface Application {
  store: FileRequestStore;
  orchestrator: JobOrchestrator;
  scheduler: PipelineScheduler;
  server: AppServer;
  /** Resumes in-flight requests, then listens. Resolves to the number resumed. */
  start(): Promise<number>;
  stop(): Promise<void>;
}

export function createApplication(config: AppConfig, clients: AppClients): Application {
  const store = new FileRequestStore(config.dataDir);
  const media =
    clients.media ??
    new FfmpegToolkit({ ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath, timeoutMs: MEDIA_TIMEOUT_MS });

  const vision = new OpenAIVisionEmotionProvider(clients.openai, media, { model: config.visionModel });
  const speech = new DeepgramSpeechProvider(clients.deepgram, { model: config.speechModel });
  const sentiment = new OpenAISentimentProvider(clients.openai, { model: config.sentimentModel });
  const reasoning = new OpenAIReasoningProvider(clients.openai, config.reasoningModel);

  const adapters: ModalityAdapters = {
    visual: new VisualAdapter(
      new InProcessJobTable<VisualInput, EmotionEvent[]>("visual", (input, signal) => vision.detect(input, signal)),
      store,
    ),
    speech: new SpeechAdapter(
      new InProcessJobTable<SpeechInput, Transcript>("speech", (input, signal) => speech.transcribe(input, signal)),
      store,
    ),
    sentiment: new SentimentAdapter(
      new InProcessJobTable<SentimentInput, Utterance[]>("sentiment", (input, signal) => sentiment.analyze(input, signal)),
      store,
    ),
  };

  const orchestrator = new JobOrchestrator({
    store,
    adapters,
    aggregator: new ResultAggregator(),
    fusion: new FusionEngine({ reasoning, config: config.fusion }),
    evidence: new EvidenceSelector({ media, store, config: config.evidence }),
    reports: new ReportAssembler(store),
    config: config.orchestrator,
    fusionConfig: config.fusion,
  });
  const scheduler = new PipelineScheduler({ orchestrator, store });
  const ingest = new IngestGate({ store, media, limits: config.ingest });
  const server = createAppServer({
    ingest,
    store,
    orchestrator,
    scheduler,
    bodyLimitBytes: config.ingest.maxUploadBytes,
  });

  return {
    store,
    orchestrator,
    scheduler,
    server,
    async start() {
      const resumed = await scheduler.resumeAll();
      await server.listen(config.port);
      return resumed;
    },
    async stop() {
      scheduler.stop();
      await server.close();
    },
  };
}
