/**
 * Output cleanup for generated replies.
 * Turns raw model text into a single chat-sized line.
 */

const SENTENCE_SPLIT = /(?<=[.!?])\s+|(?<=[。！？])(?![。！？」』）])\s*/u;
const WRAPPING_QUOTES: Array<[string, string]> = [
  ['"', '"'],
  ["'", "'"],
  ['“', '”'],
  ['「', '」'],
  ['『', '』'],
];

/**
 * Cut `text` to at most `max` code points. Surrogate pairs (emoji) are never split.
 */
export function truncateToLength(text: string, max: number): string {
  if (max <= 0) return '';
  const codePoints = Array.from(text);
  if (codePoints.length <= max) return text;
  return codePoints.slice(0, max).join('').trimEnd();
}

/**
 * Remove repeated sentences, keeping the first occurrence.
 */
export function dedupeRepeatedSentences(text: string): string {
  const parts = text
    .split(SENTENCE_SPLIT)
    .map((part) => part.trim())
    .filter(Boolean);
  if (parts.length <= 1) return text;

  const unique: string[] = [];
  const seen = new Set<string>();
  for (const part of parts) {
    const key = part.toLowerCase().replace(/\s+/g, ' ');
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(part);
  }
  return unique.length === parts.length ? text : unique.join(' ');
}

export function stripWrappingQuotes(text: string): string {
  for (const [open, close] of WRAPPING_QUOTES) {
    if (text.length >= 2 && text.startsWith(open) && text.endsWith(close)) {
      return text.slice(open.length, text.length - close.length).trim();
    }
  }
  return text;
}

/**
 * Normalise a generated reply and cap it at `maxChars` code points.
 * Returns an empty string when nothing usable is left.
 */
export function cleanGeneratedReply(raw: string, maxChars: number): string {
  let text = raw.trim();
  if (!text) return '';

  // Markdown artefacts read badly in live chat.
  text = text
    .replace(/^#{1,6}\s+/gm, '')
    .replace(/^\s*[-*]\s+/gm, '')
    .replace(/\*\*(.*?)\*\*/g, '$1')
    .replace(/`+/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  text = stripWrappingQuotes(text);
  text = dedupeRepeatedSentences(text);

  return truncateToLength(text, maxChars);
}
