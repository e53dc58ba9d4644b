// Multimodal Risk Triage - Evidence Frame Selector
// Picks a bounded set of still frames supporting the cited windows:
//   - at most K evenly spaced frames per window, clamped inside the media
//   - globally deduplicated so that no two kept frames are closer than the
//     minimum spacing (earliest frame wins)
//   - returned in time order
// Extraction is best effort: any failure degrades to an empty evidence list.

import { DEFAULT_EVIDENCE_CONFIG, type EvidenceConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import type { MediaToolkit } from "./media-toolkit.js";
import type { RequestStore } from "./request-store.js";
import type { EvidenceFrame, MediaDescriptor, TimeWindow } from "./types.js";
import { clamp, roundTo } from "./utils.js";

export interface PlannedFrame {
  timestamp: number;
  window: TimeWindow;
}

// Absorbs float noise from subtracting rounded timestamps
const SPACING_EPSILON = 1e-9;

/**
 * Plan frame timestamps for the cited windows. Pure: no media access.
 * Each window contributes up to `framesPerWindow` candidates at the centres
 * of K equal slices; candidates are then deduplicated by minimum spacing.
 */
export function planFrameTimestamps(
  windows: readonly TimeWindow[],
  durationSeconds: number,
  config: EvidenceConfig = DEFAULT_EVIDENCE_CONFIG,
): PlannedFrame[] {
  if (durationSeconds <= 0 || config.framesPerWindow <= 0) return [];

  const candidates: PlannedFrame[] = [];
  for (const window of windows) {
    const start = clamp(Math.min(window.start, window.end), 0, durationSeconds);
    const end = clamp(Math.max(window.start, window.end), 0, durationSeconds);
    const length = end - start;
    const count = length > 0 ? config.framesPerWindow : 1;

    for (let i = 0; i < count; i++) {
      const timestamp = length > 0 ? start + ((i + 0.5) * length) / count : start;
      candidates.push({ timestamp: roundTo(clamp(timestamp, 0, durationSeconds), 3), window: { ...window } });
    }
  }

  candidates.sort((a, b) => a.timestamp - b.timestamp);

  const selected: PlannedFrame[] = [];
  for (const candidate of candidates) {
    const last = selected[selected.length - 1];
    if (!last || candidate.timestamp - last.timestamp >= config.minSpacingSeconds - SPACING_EPSILON) {
      selected.push(candidate);
    }
  }
  return selected;
}

export interface EvidenceSelectorDeps {
  media: MediaToolkit;
  store: RequestStore;
  config?: Partial<EvidenceConfig>;
  logger?: Logger;
}

export class EvidenceSelector {
  private readonly media: MediaToolkit;
  private readonly store: RequestStore;
  private readonly config: EvidenceConfig;
  private readonly logger: Logger;

  constructor(deps: EvidenceSelectorDeps) {
    this.media = deps.media;
    this.store = deps.store;
    this.config = { ...DEFAULT_EVIDENCE_CONFIG, ...deps.config };
    this.logger = deps.logger ?? createLogger("EvidenceSelector");
  }

  /**
   * Extract the planned frames into `frames/` of the request. Image references
   * are relative to the request directory.
   */
  async select(requestId: string, windows: readonly TimeWindow[], media: MediaDescriptor): Promise<EvidenceFrame[]> {
    const plan = planFrameTimestamps(windows, media.durationSeconds, this.config);
    if (plan.length === 0) return [];

    const frames: EvidenceFrame[] = [];
    try {
      for (let i = 0; i < plan.length; i++) {
        const imageRef = `frames/frame-${String(i + 1).padStart(3, "0")}.jpg`;
        await this.media.extractFrame(media.sourcePath, plan[i].timestamp, this.store.artifactPath(requestId, imageRef));
        frames.push({ timestamp: plan[i].timestamp, imageRef, window: plan[i].window });
      }
    } catch (err) {
      this.logger.warn(`Evidence extraction failed for ${requestId}; continuing without frames: ${errorMessage(err)}`);
      return [];
    }

    this.logger.info(`Selected ${frames.length} evidence frame(s) for ${requestId} from ${windows.length} window(s)`);
    return frames;
  }
}
