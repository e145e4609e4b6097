/**
 * Stable, URL-safe note filenames derived from topic and title
 */

export const NOTE_EXTENSION = '.md';
export const DEFAULT_FILENAME = 'untitled';

/**
 * Lowercase slug: letters, digits, underscores and single hyphens only
 */
export function sanitize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[\s-]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Build a filename slug from the main topic, adding up to two distinctive title words.
 * Falls back to the title, then to the given default, when the topic is empty.
 */
export function deriveFilename(
  mainTopic: string | undefined,
  title: string | undefined,
  fallback: string = DEFAULT_FILENAME
): string {
  const topicSlug = sanitize(mainTopic ?? '');
  const titleSlug = sanitize(title ?? '');

  if (!topicSlug) {
    return titleSlug || sanitize(fallback) || DEFAULT_FILENAME;
  }

  if (titleSlug && titleSlug !== topicSlug) {
    const topicLower = (mainTopic ?? '').toLowerCase();
    const keyWords = (title ?? '')
      .toLowerCase()
      .split(/\s+/)
      .filter(word => word.length > 3 && !topicLower.includes(word))
      .slice(0, 2)
      .map(sanitize)
      .filter(word => word.length > 0);

    if (keyWords.length > 0) {
      return `${topicSlug}-${keyWords.join('-')}`;
    }
  }

  return topicSlug;
}

export function withExtension(filename: string): string {
  return filename.endsWith(NOTE_EXTENSION) ? filename : filename + NOTE_EXTENSION;
}

export function stripExtension(filename: string): string {
  return filename.endsWith(NOTE_EXTENSION) ? filename.slice(0, -NOTE_EXTENSION.length) : filename;
}
