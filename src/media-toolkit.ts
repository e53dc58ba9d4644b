// Multimodal Risk Triage - Media toolkit
// Thin wrappers around the ffprobe / ffmpeg binaries. The pipeline only ever
// talks to the MediaToolkit interface so tests can inject an in-process fake.

import { spawn } from "node:child_process";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";

export interface MediaProbe {
  /** ffprobe format aliases, e.g. ["mov", "mp4", "m4a", "3gp", "3g2", "mj2"]. */
  formatNames: string[];
  durationSeconds: number;
  sizeBytes: number;
  videoCodec: string | null;
  audioCodec: string | null;
}

export interface MediaToolkit {
  probe(path: string): Promise<MediaProbe>;
  /** Writes a mono 16 kHz 16-bit PCM WAV track to `destination`. */
  extractAudio(source: string, destination: string): Promise<void>;
  /** Writes a single JPEG still taken at `timestampSeconds` to `destination`, creating its directory. */
  extractFrame(source: string, timestampSeconds: number, destination: string): Promise<void>;
}

export interface FfmpegToolkitOptions {
  ffmpegPath: string;
  ffprobePath: string;
  /** Kill a child process that runs longer than this. */
  timeoutMs: number;
}

interface ProbeJson {
  format?: { format_name?: unknown; duration?: unknown; size?: unknown };
  streams?: Array<{ codec_type?: unknown; codec_name?: unknown }>;
}

/**
 * Parse `ffprobe -print_format json -show_format -show_streams` output.
 * @throws Error when the output is not JSON or lacks a usable duration.
 */
export function parseProbeOutput(raw: string): MediaProbe {
  let parsed: ProbeJson | null;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`ffprobe output is not valid JSON: ${raw.slice(0, 200)}`);
  }
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error(`ffprobe output is not a JSON object: ${raw.slice(0, 200)}`);
  }

  const format = parsed.format ?? {};
  const formatNames =
    typeof format.format_name === "string"
      ? format.format_name.split(",").map((name) => name.trim()).filter((name) => name.length > 0)
      : [];

  const durationSeconds = Number(format.duration);
  if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
    throw new Error(`ffprobe reported no usable duration (${String(format.duration)})`);
  }
  const sizeBytes = Number(format.size);

  const streams = parsed.streams ?? [];
  const firstCodec = (type: string): string | null => {
    const stream = streams.find((s) => s.codec_type === type);
    return stream && typeof stream.codec_name === "string" ? stream.codec_name : null;
  };

  return {
    formatNames,
    durationSeconds,
    sizeBytes: Number.isFinite(sizeBytes) ? sizeBytes : 0,
    videoCodec: firstCodec("video"),
    audioCodec: firstCodec("audio"),
  };
}

export class FfmpegToolkit implements MediaToolkit {
  private readonly options: FfmpegToolkitOptions;

  constructor(options: FfmpegToolkitOptions) {
    this.options = options;
  }

  async probe(path: string): Promise<MediaProbe> {
    const { stdout } = await this.run(this.options.ffprobePath, [
      "-v", "error",
      "-print_format", "json",
      "-show_format",
      "-show_streams",
      path,
    ]);
    return parseProbeOutput(stdout);
  }

  async extractAudio(source: string, destination: string): Promise<void> {
    await mkdir(dirname(destination), { recursive: true });
    await this.run(this.options.ffmpegPath, [
      "-y", "-v", "error",
      "-i", source,
      "-vn",
      "-ac", "1",
      "-ar", "16000",
      "-c:a", "pcm_s16le",
      destination,
    ]);
  }

  async extractFrame(source: string, timestampSeconds: number, destination: string): Promise<void> {
    await mkdir(dirname(destination), { recursive: true });
    await this.run(this.options.ffmpegPath, [
      "-y", "-v", "error",
      "-ss", timestampSeconds.toFixed(3),
      "-i", source,
      "-frames:v", "1",
      "-q:v", "2",
      destination,
    ]);
  }

  private run(command: string, args: string[]): Promise<{ stdout: string; stderr: string }> {
    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
      let stdout = "";
      let stderr = "";
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        proc.kill("SIGKILL");
        reject(new Error(`${command} timed out after ${this.options.timeoutMs}ms`));
      }, this.options.timeoutMs);

      proc.stdout.on("data", (chunk: Buffer) => {
        stdout += chunk.toString("utf-8");
      });
      proc.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString("utf-8");
      });

      proc.on("error", (err) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(new Error(`Failed to start ${command}: ${err.message}`));
      });

      proc.on("close", (code) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (code === 0) {
          resolve({ stdout, stderr });
        } else {
          reject(new Error(`${command} exited with code ${String(code)}: ${stderr.trim().slice(-300)}`));
        }
      });
    });
  }
}
