/** Small text helpers shared by extraction and scoring. */

const LIST_MARKER = /^\s*(?:\d+[.)]|[-*•])\s+/;

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Drop markdown emphasis and a leading list marker. */
export function cleanLine(line: string): string {
  return line.replace(/\*\*|__/g, '').replace(LIST_MARKER, '').trim();
}

export function isListItem(line: string): boolean {
  return LIST_MARKER.test(line);
}

/**
 * Sentences of a text. Lines are split first so list items count as
 * sentences of their own, then each line on terminal punctuation.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const cleaned = cleanLine(line);
    if (!cleaned) continue;
    for (const part of cleaned.split(/(?<=[.!?])\s+(?=[A-Z0-9"'(])/)) {
      const sentence = part.trim();
      if (sentence) sentences.push(sentence);
    }
  }
  return sentences;
}

export function words(text: string): string[] {
  return text.match(/[A-Za-z0-9][A-Za-z0-9'’&-]*/g) ?? [];
}

/** Case-insensitive whole-phrase occurrences of `phrase` in `text`. */
export function countPhrase(text: string, phrase: string): number {
  const pattern = new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(phrase)}(?![A-Za-z0-9])`, 'gi');
  return text.match(pattern)?.length ?? 0;
}

export function containsPhrase(text: string, phrase: string): boolean {
  return countPhrase(text, phrase) > 0;
}

export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}
