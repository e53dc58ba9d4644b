// Multimodal Risk Triage - Request Store
// The persisted record of every analysis request: the request/job state machine,
// raw modality results, the merged timeline, the submission ledger and the
// final report. All orchestration decisions are derived from this record.
//
// Layout (FileRequestStore):
//   {baseDir}/requests/{id}/
//     request.json       AnalysisRequest (with ModalityJob set), optimistic version
//     ledger.json        submission key → external handle
//     results/{name}.json modality results and the timeline
//     report.json        immutable Report, written once
//     source.<ext>, audio.wav, frames/*.jpg  media artifacts

import { link, mkdir, readFile, readdir, rename, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import { NotFoundError, ValidationError, VersionConflictError } from "./errors.js";
import type { AnalysisRequest, Report } from "./types.js";
import { canonicalJson } from "./utils.js";

export interface RequestStore {
  /** Persist a new request. @throws ValidationError if the id already exists. */
  create(request: AnalysisRequest): Promise<AnalysisRequest>;
  get(id: string): Promise<AnalysisRequest | null>;
  /**
   * Optimistic write: `request.version` must equal the stored version.
   * Returns the stored copy with the version incremented.
   * @throws VersionConflictError when another writer got there first.
   */
  update(request: AnalysisRequest): Promise<AnalysisRequest>;
  listIds(): Promise<string[]>;

  /** Stores a JSON artifact for the request and returns its reference. */
  putArtifact(id: string, name: string, value: unknown): Promise<string>;
  getArtifact(ref: string): Promise<unknown>;

  /** Handle recorded for a submission key, if any. */
  ledgerGet(requestId: string, key: string): Promise<string | null>;
  /** Records `handle` unless the key already has one; returns the winning handle. */
  ledgerPut(requestId: string, key: string, handle: string): Promise<string>;

  getReport(requestId: string): Promise<Report | null>;
  /** Writes the report unless one exists; returns whichever report is stored. */
  putReportIfAbsent(report: Report): Promise<Report>;
  /** Removes the report, if any. Only for a request that ended without completing. */
  deleteReport(requestId: string): Promise<void>;

  /** Filesystem path for a media artifact belonging to the request. */
  artifactPath(requestId: string, relativePath: string): string;
}

const SAFE_ID = /^[A-Za-z0-9_-]{1,128}$/;

function assertSafeId(id: string): void {
  if (!SAFE_ID.test(id)) {
    throw new ValidationError(`Invalid request id: "${id}"`);
  }
}

function assertSafeName(name: string): void {
  if (!SAFE_ID.test(name)) {
    throw new ValidationError(`Invalid artifact name: "${name}"`);
  }
}

function parseRef(ref: string): { id: string; name: string } {
  const [id, name, ...rest] = ref.split("/");
  if (!id || !name || rest.length > 0) {
    throw new ValidationError(`Invalid artifact reference: "${ref}"`);
  }
  assertSafeId(id);
  assertSafeName(name);
  return { id, name };
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * Serializes async critical sections per key within this process.
 */
class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release!: () => void;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

// ─── File-backed store ──────────────────────────────────────────────────────────

export class FileRequestStore implements RequestStore {
  private readonly baseDir: string;
  private readonly mutex = new KeyedMutex();

  constructor(baseDir: string = "data") {
    this.baseDir = baseDir;
  }

  private requestDir(id: string): string {
    assertSafeId(id);
    return join(this.baseDir, "requests", id);
  }

  artifactPath(requestId: string, relativePath: string): string {
    return join(this.requestDir(requestId), relativePath);
  }

  async create(request: AnalysisRequest): Promise<AnalysisRequest> {
    return this.mutex.run(request.id, async () => {
      const dir = this.requestDir(request.id);
      await mkdir(join(dir, "results"), { recursive: true });
      const file = join(dir, "request.json");
      try {
        await writeFile(file, JSON.stringify(request, null, 2), { encoding: "utf-8", flag: "wx" });
      } catch (err) {
        if (isErrnoCode(err, "EEXIST")) {
          throw new ValidationError(`Request already exists: ${request.id}`);
        }
        throw err;
      }
      return structuredClone(request);
    });
  }

  async get(id: string): Promise<AnalysisRequest | null> {
    return this.readRequest(id);
  }

  async update(request: AnalysisRequest): Promise<AnalysisRequest> {
    return this.mutex.run(request.id, async () => {
      const current = await this.readRequest(request.id);
      if (!current) {
        throw new NotFoundError(`Request not found: ${request.id}`);
      }
      if (current.version !== request.version) {
        throw new VersionConflictError(request.id, request.version, current.version);
      }
      const next: AnalysisRequest = { ...structuredClone(request), version: current.version + 1 };
      await this.atomicWrite(join(this.requestDir(request.id), "request.json"), JSON.stringify(next, null, 2));
      return next;
    });
  }

  async listIds(): Promise<string[]> {
    try {
      const entries = await readdir(join(this.baseDir, "requests"), { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory() && SAFE_ID.test(entry.name))
        .map((entry) => entry.name)
        .sort();
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return [];
      throw err;
    }
  }

  async putArtifact(id: string, name: string, value: unknown): Promise<string> {
    assertSafeName(name);
    const dir = join(this.requestDir(id), "results");
    await mkdir(dir, { recursive: true });
    await this.atomicWrite(join(dir, `${name}.json`), JSON.stringify(value));
    return `${id}/${name}`;
  }

  async getArtifact(ref: string): Promise<unknown> {
    const { id, name } = parseRef(ref);
    try {
      const raw = await readFile(join(this.requestDir(id), "results", `${name}.json`), "utf-8");
      const value: unknown = JSON.parse(raw);
      return value;
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) {
        throw new NotFoundError(`Artifact not found: ${ref}`);
      }
      throw err;
    }
  }

  async ledgerGet(requestId: string, key: string): Promise<string | null> {
    const ledger = await this.readLedger(requestId);
    return ledger[key] ?? null;
  }

  async ledgerPut(requestId: string, key: string, handle: string): Promise<string> {
    return this.mutex.run(`ledger:${requestId}`, async () => {
      const ledger = await this.readLedger(requestId);
      const existing = ledger[key];
      if (existing) return existing;
      ledger[key] = handle;
      await mkdir(this.requestDir(requestId), { recursive: true });
      await this.atomicWrite(join(this.requestDir(requestId), "ledger.json"), JSON.stringify(ledger, null, 2));
      return handle;
    });
  }

  async getReport(requestId: string): Promise<Report | null> {
    try {
      const raw = await readFile(join(this.requestDir(requestId), "report.json"), "utf-8");
      const report: Report = JSON.parse(raw);
      return report;
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return null;
      throw err;
    }
  }

  async putReportIfAbsent(report: Report): Promise<Report> {
    const dir = this.requestDir(report.requestId);
    const finalPath = join(dir, "report.json");
    const tmpPath = join(dir, `report.${uuidv4()}.tmp`);

    await mkdir(dir, { recursive: true });
    await writeFile(tmpPath, canonicalJson(report), "utf-8");
    try {
      // link() fails with EEXIST when a report is already in place: first writer wins
      await link(tmpPath, finalPath);
    } catch (err) {
      if (!isErrnoCode(err, "EEXIST")) {
        await unlink(tmpPath);
        throw err;
      }
    }
    await unlink(tmpPath);

    const stored = await this.getReport(report.requestId);
    if (!stored) {
      throw new NotFoundError(`Report vanished after write: ${report.requestId}`);
    }
    return stored;
  }

  async deleteReport(requestId: string): Promise<void> {
    try {
      await unlink(join(this.requestDir(requestId), "report.json"));
    } catch (err) {
      if (!isErrnoCode(err, "ENOENT")) throw err;
    }
  }

  private async readRequest(id: string): Promise<AnalysisRequest | null> {
    try {
      const raw = await readFile(join(this.requestDir(id), "request.json"), "utf-8");
      const request: AnalysisRequest = JSON.parse(raw);
      return request;
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return null;
      throw err;
    }
  }

  private async readLedger(requestId: string): Promise<Record<string, string>> {
    try {
      const raw = await readFile(join(this.requestDir(requestId), "ledger.json"), "utf-8");
      const ledger: Record<string, string> = JSON.parse(raw);
      return ledger;
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return {};
      throw err;
    }
  }

  private async atomicWrite(path: string, content: string): Promise<void> {
    const tmpPath = `${path}.${uuidv4()}.tmp`;
    await writeFile(tmpPath, content, "utf-8");
    await rename(tmpPath, path);
  }
}

// ─── In-memory store ────────────────────────────────────────────────────────────

/**
 * Same contract as FileRequestStore, held in process memory. Values are cloned
 * on the way in and out so callers never share mutable state with the store.
 */
export class MemoryRequestStore implements RequestStore {
  private readonly requests: Map<string, AnalysisRequest> = new Map();
  private readonly artifacts: Map<string, unknown> = new Map();
  private readonly ledgers: Map<string, Map<string, string>> = new Map();
  private readonly reports: Map<string, string> = new Map();
  private readonly baseDir: string;

  constructor(baseDir: string = "memory") {
    this.baseDir = baseDir;
  }

  artifactPath(requestId: string, relativePath: string): string {
    assertSafeId(requestId);
    return join(this.baseDir, "requests", requestId, relativePath);
  }

  async create(request: AnalysisRequest): Promise<AnalysisRequest> {
    assertSafeId(request.id);
    if (this.requests.has(request.id)) {
      throw new ValidationError(`Request already exists: ${request.id}`);
    }
    this.requests.set(request.id, structuredClone(request));
    return structuredClone(request);
  }

  async get(id: string): Promise<AnalysisRequest | null> {
    const request = this.requests.get(id);
    return request ? structuredClone(request) : null;
  }

  async update(request: AnalysisRequest): Promise<AnalysisRequest> {
    const current = this.requests.get(request.id);
    if (!current) {
      throw new NotFoundError(`Request not found: ${request.id}`);
    }
    if (current.version !== request.version) {
      throw new VersionConflictError(request.id, request.version, current.version);
    }
    const next: AnalysisRequest = { ...structuredClone(request), version: current.version + 1 };
    this.requests.set(request.id, next);
    return structuredClone(next);
  }

  async listIds(): Promise<string[]> {
    return [...this.requests.keys()].sort();
  }

  async putArtifact(id: string, name: string, value: unknown): Promise<string> {
    assertSafeId(id);
    assertSafeName(name);
    const ref = `${id}/${name}`;
    this.artifacts.set(ref, structuredClone(value));
    return ref;
  }

  async getArtifact(ref: string): Promise<unknown> {
    parseRef(ref);
    if (!this.artifacts.has(ref)) {
      throw new NotFoundError(`Artifact not found: ${ref}`);
    }
    return structuredClone(this.artifacts.get(ref));
  }

  async ledgerGet(requestId: string, key: string): Promise<string | null> {
    return this.ledgers.get(requestId)?.get(key) ?? null;
  }

  async ledgerPut(requestId: string, key: string, handle: string): Promise<string> {
    let ledger = this.ledgers.get(requestId);
    if (!ledger) {
      ledger = new Map();
      this.ledgers.set(requestId, ledger);
    }
    const existing = ledger.get(key);
    if (existing) return existing;
    ledger.set(key, handle);
    return handle;
  }

  async getReport(requestId: string): Promise<Report | null> {
    const raw = this.reports.get(requestId);
    if (raw === undefined) return null;
    const report: Report = JSON.parse(raw);
    return report;
  }

  async putReportIfAbsent(report: Report): Promise<Report> {
    if (!this.reports.has(report.requestId)) {
      this.reports.set(report.requestId, canonicalJson(report));
    }
    const stored = this.reports.get(report.requestId);
    if (stored === undefined) {
      throw new NotFoundError(`Report missing: ${report.requestId}`);
    }
    const parsed: Report = JSON.parse(stored);
    return parsed;
  }

  async deleteReport(requestId: string): Promise<void> {
    this.reports.delete(requestId);
  }
}
