// Unit tests for DeepgramSpeechProvider

import { describe, it, expect, vi } from "vitest";
import {
  DeepgramSpeechProvider,
  toTranscript,
  type DeepgramPrerecordedClient,
  type DeepgramPrerecordedResult,
} from "./deepgram-speech.js";
import { PermanentServiceError, TransientServiceError } from "../errors.js";
import { silentLogger } from "../logger.js";

function makeResult(): DeepgramPrerecordedResult {
  return {
    metadata: { duration: 12.5 },
    results: {
      channels: [
        {
          alternatives: [
            {
              transcript: "Leave me alone. Please.",
              words: [
                { word: "leave", start: 0.5, end: 0.8, confidence: 0.98, punctuated_word: "Leave" },
                { word: "me", start: 0.8, end: 0.9, confidence: 0.97, punctuated_word: "me" },
                { word: "alone", start: 0.9, end: 1.4, confidence: 0.95, punctuated_word: "alone." },
                { word: "please", start: 2.0, end: 2.4, confidence: 0.9 },
              ],
            },
          ],
        },
      ],
    },
  };
}

function makeClient(
  response: Awaited<ReturnType<DeepgramPrerecordedClient["listen"]["prerecorded"]["transcribeFile"]>>,
) {
  const transcribeFile = vi.fn().mockResolvedValue(response);
  const client: DeepgramPrerecordedClient = { listen: { prerecorded: { transcribeFile } } };
  return { client, transcribeFile };
}

const readAudio = async () => Buffer.from("RIFF-test-audio");

describe("toTranscript()", () => {
  it("prefers punctuated words and keeps timings", () => {
    const transcript = toTranscript(makeResult(), "en");
    expect(transcript.text).toBe("Leave me alone. Please.");
    expect(transcript.language).toBe("en");
    expect(transcript.durationSeconds).toBe(12.5);
    expect(transcript.words.map((w) => w.word)).toEqual(["Leave", "me", "alone.", "please"]);
    expect(transcript.words[2]).toEqual({ word: "alone.", startTime: 0.9, endTime: 1.4, confidence: 0.95 });
  });

  it("falls back to the last word end when metadata has no duration", () => {
    const result = makeResult();
    delete result.metadata;
    expect(toTranscript(result, "en").durationSeconds).toBe(2.4);
  });

  it("throws PermanentServiceError when there is no alternative", () => {
    expect(() => toTranscript({ results: { channels: [] } }, "en")).toThrow(PermanentServiceError);
  });
});

describe("DeepgramSpeechProvider.transcribe()", () => {
  it("sends the audio with the configured model and language", async () => {
    const { client, transcribeFile } = makeClient({ result: makeResult(), error: null });
    const provider = new DeepgramSpeechProvider(client, { model: "nova-2", logger: silentLogger, readAudio });

    const transcript = await provider.transcribe({ audioPath: "/tmp/audio.wav", language: "es" });

    expect(transcribeFile).toHaveBeenCalledWith(Buffer.from("RIFF-test-audio"), {
      model: "nova-2",
      language: "es",
      smart_format: true,
      punctuate: true,
    });
    expect(transcript.words).toHaveLength(4);
  });

  it("maps a 4xx error response to PermanentServiceError", async () => {
    const { client } = makeClient({ result: null, error: { message: "bad audio", status: 400 } });
    const provider = new DeepgramSpeechProvider(client, { model: "nova-2", logger: silentLogger, readAudio });
    await expect(provider.transcribe({ audioPath: "a.wav", language: "en" })).rejects.toThrow(PermanentServiceError);
  });

  it("maps a 429 error response to TransientServiceError", async () => {
    const { client } = makeClient({ result: null, error: { message: "slow down", status: 429 } });
    const provider = new DeepgramSpeechProvider(client, { model: "nova-2", logger: silentLogger, readAudio });
    await expect(provider.transcribe({ audioPath: "a.wav", language: "en" })).rejects.toThrow(
      "Deepgram transcription failed: slow down",
    );
  });

  it("maps a thrown network error to TransientServiceError", async () => {
    const transcribeFile = vi.fn().mockRejectedValue(new Error("ECONNRESET"));
    const client: DeepgramPrerecordedClient = { listen: { prerecorded: { transcribeFile } } };
    const provider = new DeepgramSpeechProvider(client, { model: "nova-2", logger: silentLogger, readAudio });
    await expect(provider.transcribe({ audioPath: "a.wav", language: "en" })).rejects.toBeInstanceOf(
      TransientServiceError,
    );
  });
});
