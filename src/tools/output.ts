/**
 * Cap tool output so a single call cannot flood the transcript.
 * `droppedEarlier` counts characters already discarded upstream, such as
 * shell output past the capture limit.
 */
export function capOutput(text: string, limit: number, droppedEarlier = 0): string {
  const dropped = Math.max(0, text.length - limit) + droppedEarlier;
  if (dropped === 0) {
    return text;
  }
  return `${text.slice(0, limit)}\n…[truncated ${dropped} characters]`;
}
