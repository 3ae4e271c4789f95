import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { AssemblyAISpeechToText } from "@/lib/assemblyai";
import { buildTranscriptionPrompt, getMimeType } from "@/lib/gemini";
import { cancellableResponse, makeTempDir, removeDir } from "./helpers";

const BASE = "https://api.assemblyai.test/v2";

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("AssemblyAISpeechToText", () => {
  let dir: string;
  let media: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    media = path.join(dir, "clip.mp3");
    await fs.promises.writeFile(media, "fake audio");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function fakeApi(overrides: { sentences?: Response; completed?: Record<string, unknown> } = {}) {
    let polls = 0;
    return vi.fn(async (url: string, init?: RequestInit): Promise<Response> => {
      const route = `${init?.method ?? "GET"} ${url.replace(BASE, "")}`;
      switch (route) {
        case "POST /upload":
          return json({ upload_url: "https://cdn.assemblyai.test/upload/abc" });
        case "POST /transcript":
          return json({ id: "t1", status: "queued" });
        case "GET /transcript/t1":
          polls += 1;
          return polls === 1
            ? json({ id: "t1", status: "processing" })
            : json({
                id: "t1",
                status: "completed",
                text: "Olá. Tudo bem?",
                language_code: "pt",
                words: [
                  { text: "Olá.", start: 0, end: 800, speaker: "A" },
                  { text: "Tudo", start: 900, end: 1200, speaker: "B" },
                  { text: "bem?", start: 1250, end: 1800, speaker: "B" },
                ],
                ...overrides.completed,
              });
        case "GET /transcript/t1/sentences":
          return (
            overrides.sentences ??
            json({
              sentences: [
                { text: "Olá.", start: 0, end: 800, speaker: "A" },
                { text: "Tudo bem?", start: 900, end: 1800, speaker: "B" },
              ],
            })
          );
        default:
          return json({ error: `unexpected ${route}` }, 404);
      }
    });
  }

  test("uploads, polls and returns speaker-labelled sentences", async () => {
    const fetchImpl = fakeApi();
    const backend = new AssemblyAISpeechToText({ apiKey: "test-secret", fetchImpl, baseUrl: BASE, pollIntervalMs: 0 });

    const raw = await backend.transcribeFile(media, { language: "pt", signal: new AbortController().signal });

    expect(raw).toEqual({
      kind: "sentences",
      sentences: [
        { text: "Olá.", startMs: 0, endMs: 800, speaker: "Speaker A" },
        { text: "Tudo bem?", startMs: 900, endMs: 1800, speaker: "Speaker B" },
      ],
      text: "Olá. Tudo bem?",
      language: "pt",
    });

    const [uploadUrl, uploadInit] = fetchImpl.mock.calls[0];
    expect(uploadUrl).toBe(`${BASE}/upload`);
    expect(uploadInit?.headers).toEqual({ authorization: "test-secret", "content-type": "application/octet-stream" });

    const createBody = fetchImpl.mock.calls[1][1]?.body;
    expect(typeof createBody === "string" ? JSON.parse(createBody) : null).toEqual({
      audio_url: "https://cdn.assemblyai.test/upload/abc",
      speaker_labels: true,
      punctuate: true,
      format_text: true,
      language_code: "pt",
    });
  });

  test("falls back to words when sentences are unavailable", async () => {
    const backend = new AssemblyAISpeechToText({
      apiKey: "test-secret",
      fetchImpl: fakeApi({ sentences: json({ error: "not found" }, 404) }),
      baseUrl: BASE,
      pollIntervalMs: 0,
    });

    const raw = await backend.transcribeFile(media, { signal: new AbortController().signal });

    expect(raw.kind).toBe("words");
    expect(raw.kind === "words" && raw.words.map((word) => word.speaker)).toEqual([
      "Speaker A",
      "Speaker B",
      "Speaker B",
    ]);
  });

  test("releases a server error body before retrying", async () => {
    const api = fakeApi();
    let uploads = 0;
    let cancelled = 0;
    const fetchImpl = vi.fn(async (url: string, init?: RequestInit): Promise<Response> => {
      if (url === `${BASE}/upload` && uploads === 0) {
        uploads += 1;
        return cancellableResponse(502, () => {
          cancelled += 1;
        });
      }
      return api(url, init);
    });
    const backend = new AssemblyAISpeechToText({
      apiKey: "test-secret",
      fetchImpl,
      baseUrl: BASE,
      pollIntervalMs: 0,
      retryBaseDelayMs: 0,
    });

    const raw = await backend.transcribeFile(media, { signal: new AbortController().signal });

    expect(raw.kind).toBe("sentences");
    expect(cancelled).toBe(1);
    expect(fetchImpl.mock.calls[1][0]).toBe(`${BASE}/upload`);
  });

  test("surfaces a transcript error", async () => {
    const backend = new AssemblyAISpeechToText({
      apiKey: "test-secret",
      fetchImpl: fakeApi({ completed: { status: "error", error: "Audio file too short" } }),
      baseUrl: BASE,
      pollIntervalMs: 0,
    });

    await expect(backend.transcribeFile(media, { signal: new AbortController().signal })).rejects.toThrow(
      "Audio file too short"
    );
  });
});

describe("Gemini prompt and MIME types", () => {
  test("names the expected language and the failure marker", () => {
    const prompt = buildTranscriptionPrompt("pt-BR");

    expect(prompt).toContain("- The speech is in Portuguese; transcribe it in that language without translating\n");
    expect(prompt).toContain("- If there is no intelligible speech, return exactly: [TRANSCRIPTION_ERROR]");
    expect(buildTranscriptionPrompt()).not.toContain("The speech is in");
  });

  test("maps extensions to MIME types", () => {
    expect(getMimeType("/tmp/talk.MP4")).toBe("video/mp4");
    expect(getMimeType("clip.m4a")).toBe("audio/mp4");
    expect(getMimeType("unknown.xyz")).toBe("audio/mp3");
  });
});
