import { expect, test } from "vitest";
import { parseTranscriptionRequest } from "@/lib/request";
import { RequestValidationError } from "@/lib/errors";

test("accepts a single url source and defaults extract_subtitles", () => {
  expect(parseTranscriptionRequest({ url: "https://example.com/v.mp4" })).toEqual({
    url: "https://example.com/v.mp4",
    extract_subtitles: false,
  });
});

test("trims string fields", () => {
  const request = parseTranscriptionRequest({
    google_drive_url: "  https://drive.google.com/file/d/abc/view  ",
    language: " en ",
    max_segment_minutes: 5,
  });

  expect(request.google_drive_url).toBe("https://drive.google.com/file/d/abc/view");
  expect(request.language).toBe("en");
  expect(request.max_segment_minutes).toBe(5);
});

test("rejects a request without a source", () => {
  expect(() => parseTranscriptionRequest({})).toThrowError(
    "Invalid request: Provide exactly one of url, google_drive_url or base64_data"
  );
});

test("rejects a request with two sources", () => {
  expect(() =>
    parseTranscriptionRequest({ url: "https://example.com/a.mp4", base64_data: "SGVsbG8=" })
  ).toThrowError("Provide exactly one of url, google_drive_url or base64_data");
});

test("rejects non-http urls", () => {
  expect(() => parseTranscriptionRequest({ url: "ftp://example.com/a.mp4" })).toThrowError(
    "url: url must use http or https"
  );
});

test("rejects out-of-range segment lengths and wrong types", () => {
  expect(() => parseTranscriptionRequest({ url: "https://example.com/a.mp4", max_segment_minutes: 0 })).toThrow(
    RequestValidationError
  );
  expect(() => parseTranscriptionRequest({ url: "https://example.com/a.mp4", extract_subtitles: "yes" })).toThrow(
    RequestValidationError
  );
  expect(() => parseTranscriptionRequest("not an object")).toThrow(RequestValidationError);
});
