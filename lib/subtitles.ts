export interface CaptionCue {
  startMs: number;
  endMs: number;
  text: string;
}

const TIMING_LINE =
  /(\d{2}):(\d{2}):(\d{2})[,.](\d{3})\s*-->\s*(\d{2}):(\d{2}):(\d{2})[,.](\d{3})/;

function toMs(h: string, m: string, s: string, ms: string): number {
  return ((parseInt(h, 10) * 60 + parseInt(m, 10)) * 60 + parseInt(s, 10)) * 1000 + parseInt(ms, 10);
}

/**
 * Parse SRT (SubRip) content into cues.
 * Handles \n and \r\n line endings and both , and . as millisecond separators.
 * Inline markup such as <i> or {\an8} is stripped from the text.
 */
export function parseSRT(content: string): CaptionCue[] {
  const normalized = content.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  const blocks = normalized.trim().split(/\n\s*\n/);
  const cues: CaptionCue[] = [];

  for (const block of blocks) {
    const lines = block.trim().split("\n");
    const timeLineIdx = lines.findIndex((line) => line.includes("-->"));
    if (timeLineIdx === -1) continue;

    const match = lines[timeLineIdx].match(TIMING_LINE);
    if (!match) continue;

    const text = lines
      .slice(timeLineIdx + 1)
      .map((line) => line.replace(/<[^>]+>/g, "").replace(/\{\\[^}]*\}/g, "").trim())
      .filter(Boolean)
      .join(" ");

    if (text) {
      cues.push({
        startMs: toMs(match[1], match[2], match[3], match[4]),
        endMs: toMs(match[5], match[6], match[7], match[8]),
        text,
      });
    }
  }

  return cues;
}

/** Caption text, one cue per line, with consecutive duplicates collapsed. */
export function captionsToText(cues: CaptionCue[]): string {
  const lines: string[] = [];
  for (const cue of cues) {
    if (lines[lines.length - 1] !== cue.text) lines.push(cue.text);
  }
  return lines.join("\n");
}
