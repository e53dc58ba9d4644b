// Multimodal Risk Triage - Report Assembler
// Builds the immutable Report for a completed request and persists it once.
// The report id is derived from the request id, so assembling again for the
// same request yields the already-stored report, byte for byte.

import { createHash } from "node:crypto";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import type { RequestStore } from "./request-store.js";
import type {
  AnalysisRequest,
  EvidenceFrame,
  FusedAssessment,
  Modality,
  ModalityStatus,
  Report,
  Timeline,
  Transcript,
} from "./types.js";
import { canonicalJson } from "./utils.js";

export const REPORT_DISCLAIMER =
  "This report is an automated screening aid produced from machine analysis of facial expression, speech and language. " +
  "It may contain errors and is not a clinical, legal or safety determination. " +
  "A trained reviewer must evaluate the source recording before any action is taken.";

export function reportIdFor(requestId: string): string {
  return `rpt-${createHash("sha256").update(requestId).digest("hex").slice(0, 24)}`;
}

export function modalityCoverage(missing: readonly Modality[]): Record<Modality, ModalityStatus> {
  const status = (modality: Modality): ModalityStatus => (missing.includes(modality) ? "missing" : "available");
  return { visual: status("visual"), speech: status("speech"), sentiment: status("sentiment") };
}

/** Material the assessment was made from, carried into the report for review. */
export interface ReportSources {
  timeline: Timeline;
  transcript: Transcript | null;
}

/** Canonical serialization used for storage and for the report endpoint. */
export function renderReport(report: Report): string {
  return canonicalJson(report);
}

export class ReportAssembler {
  private readonly store: RequestStore;
  private readonly logger: Logger;

  constructor(store: RequestStore, logger?: Logger) {
    this.store = store;
    this.logger = logger ?? createLogger("ReportAssembler");
  }

  /**
   * Persist the report for `request` unless one already exists, and return the
   * stored report.
   */
  async assemble(
    request: AnalysisRequest,
    assessment: FusedAssessment,
    frames: EvidenceFrame[],
    sources: ReportSources,
    completedAt: Date,
  ): Promise<Report> {
    const cited = new Set(assessment.citedEntryIds);
    const candidate: Report = {
      id: reportIdFor(request.id),
      requestId: request.id,
      assessment,
      citedEntries: sources.timeline.entries.filter((entry) => cited.has(entry.id)),
      transcript: sources.transcript ? { text: sources.transcript.text, language: sources.transcript.language } : null,
      evidence: frames,
      modalityCoverage: modalityCoverage(assessment.missingModalities),
      disclaimer: REPORT_DISCLAIMER,
      completedAt: completedAt.toISOString(),
    };

    const stored = await this.store.putReportIfAbsent(candidate);
    if (stored.completedAt !== candidate.completedAt) {
      this.logger.info(`Report ${stored.id} for ${request.id} already existed; keeping the stored copy`);
    } else {
      this.logger.info(`Report ${stored.id} written for ${request.id} (${frames.length} evidence frame(s))`);
    }
    return stored;
  }
}
