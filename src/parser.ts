/**
 * Parser for generated note text
 *
 * Model output arrives in whatever shape the model chose: a proper frontmatter
 * block, loose `key: value` lines above the prose, or no metadata at all. Parsing
 * is an ordered chain of attempts that each return a result or null, ending in a
 * fixed default, so `parse` always produces a usable frontmatter/body pair.
 */

import matter from 'gray-matter';
import { Frontmatter, FrontmatterValue, ParsedResponse } from './types.js';

export const RECOGNIZED_KEYS = ['title', 'main_topic', 'date', 'summary', 'tags'] as const;

export type RecognizedKey = (typeof RECOGNIZED_KEYS)[number];

export const DEFAULT_FRONTMATTER: Readonly<Frontmatter> = Object.freeze({
  title: 'Untitled',
  tags: [],
  main_topic: 'general'
});

export const MAX_TOPICS = 5;

const STRICT_BLOCK = /^---\n([\s\S]*?)\n---(?:\n([\s\S]*))?$/;
const KEY_VALUE_LINE = /^\s*([\p{L}\p{N}_-]+)\s*:(.*)$/u;

function isRecognizedKey(key: string): key is RecognizedKey {
  return (RECOGNIZED_KEYS as readonly string[]).includes(key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Strip surrounding single and double quotes
 */
export function unquote(value: string): string {
  return value.replace(/^["']+|["']+$/g, '');
}

/**
 * Coerce a raw value string: strip quotes, and split `[a, b]` into a list
 */
export function coerceValue(raw: string): string | string[] {
  const value = unquote(raw.trim()).trim();

  if (value.startsWith('[') && value.endsWith(']')) {
    return value
      .slice(1, -1)
      .split(',')
      .map(item => unquote(item.trim()).trim())
      .filter(item => item.length > 0);
  }

  return value;
}

/**
 * Drop a surrounding ``` fence (with or without a language tag)
 */
export function stripCodeFence(raw: string): string {
  let text = raw.trim();

  const opening = text.match(/^```[\w-]*[ \t]*(?:\n|$)/);
  if (opening) {
    text = text.slice(opening[0].length);
  }
  if (text.endsWith('```')) {
    text = text.slice(0, -3);
  }

  return text.trim();
}

function normalizeScalar(value: unknown): string | number | boolean | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : String(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value.toISOString().slice(0, 10);
  }
  return JSON.stringify(value);
}

/**
 * Bring a YAML value into the frontmatter value shape
 */
export function normalizeValue(value: unknown): FrontmatterValue | undefined {
  if (Array.isArray(value)) {
    const items: string[] = [];
    for (const item of value) {
      const scalar = normalizeScalar(item);
      if (scalar !== undefined) {
        items.push(String(scalar));
      }
    }
    return items;
  }
  return normalizeScalar(value);
}

/**
 * Normalize every value of a parsed YAML mapping, dropping empty ones
 */
export function normalizeFrontmatter(data: Record<string, unknown>): Frontmatter {
  const frontmatter: Frontmatter = {};
  for (const [key, value] of Object.entries(data)) {
    const normalized = normalizeValue(value);
    if (normalized !== undefined) {
      frontmatter[key] = normalized;
    }
  }
  return frontmatter;
}

/**
 * Line-by-line parse of a frontmatter block whose YAML is malformed
 */
export function parseBlockLines(block: string): Frontmatter {
  const frontmatter: Frontmatter = {};

  for (const line of block.trim().split('\n')) {
    const colon = line.indexOf(':');
    if (colon === -1) {
      continue;
    }

    const key = line.slice(0, colon).trim();
    if (!key) {
      continue;
    }

    const value = coerceValue(line.slice(colon + 1));
    if (typeof value !== 'string') {
      frontmatter[key] = value;
    } else if (value.toLowerCase() === 'true' || value.toLowerCase() === 'false') {
      frontmatter[key] = value.toLowerCase() === 'true';
    } else if (/^\d+$/.test(value)) {
      frontmatter[key] = parseInt(value, 10);
    } else {
      frontmatter[key] = value;
    }
  }

  return frontmatter;
}

function parseYamlBlock(block: string): Frontmatter | null {
  let data: unknown;
  try {
    // Passing options keeps gray-matter from caching the parsed object
    data = matter(`---\n${block}\n---\n`, {}).data;
  } catch (error) {
    const reason = error instanceof Error ? error.message.split('\n')[0] : String(error);
    console.error(`[parser] YAML parsing failed: ${reason}. Using line fallback.`);
    return null;
  }

  return isRecord(data) ? normalizeFrontmatter(data) : null;
}

/**
 * Strict attempt: a `---` delimited block at the very start of the text
 */
export function parseStrictBlock(text: string): ParsedResponse | null {
  const match = text.match(STRICT_BLOCK);
  if (!match) {
    return null;
  }

  const [, block, body = ''] = match;
  const yaml = parseYamlBlock(block);
  const frontmatter = yaml && Object.keys(yaml).length > 0 ? yaml : parseBlockLines(block);

  if (Object.keys(frontmatter).length === 0) {
    return null;
  }

  return { frontmatter, body };
}

/**
 * Permissive attempt: recognized `key: value` lines before the first heading
 */
export function scanMetadataLines(text: string): ParsedResponse | null {
  const frontmatter: Frontmatter = {};
  const lines = text.split('\n');
  let bodyStart = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (line.startsWith('#')) {
      break;
    }
    if (!line.includes(':')) {
      continue;
    }

    const match = line.match(KEY_VALUE_LINE);
    if (!match) {
      break;
    }

    const key = match[1].toLowerCase();
    if (!isRecognizedKey(key)) {
      continue;
    }

    const value = coerceValue(match[2]);
    if (key === 'tags') {
      frontmatter.tags = typeof value === 'string' ? [value] : value;
    } else {
      frontmatter[key] = typeof value === 'string' ? value : value.join(', ');
    }
    bodyStart = i + 1;
  }

  if (Object.keys(frontmatter).length === 0) {
    return null;
  }

  return {
    frontmatter,
    body: lines.slice(bodyStart).join('\n').trim()
  };
}

/**
 * Turn a frontmatter `tags` value into a list of tag strings
 */
export function normalizeTags(value: FrontmatterValue | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  const items = Array.isArray(value) ? value : String(value).split(',');
  return items.map(tag => tag.trim()).filter(tag => tag.length > 0);
}

export class NoteParser {
  private maxTopics: number;

  constructor(maxTopics = MAX_TOPICS) {
    this.maxTopics = maxTopics;
  }

  /**
   * Parse raw model output into frontmatter and body. Never fails on string input.
   */
  parse(raw: string): ParsedResponse {
    if (raw === null || raw === undefined) {
      throw new TypeError('Cannot parse a null or undefined response');
    }

    const text = stripCodeFence(raw);

    const strict = parseStrictBlock(text);
    if (strict) {
      return strict;
    }

    console.error('[parser] Frontmatter block not found. Scanning for metadata lines...');
    const scanned = scanMetadataLines(text);
    if (scanned) {
      return scanned;
    }

    return {
      frontmatter: { ...DEFAULT_FRONTMATTER, tags: [] },
      body: text
    };
  }

  /**
   * Topics from the first `## ` headings: lower-cased, spaces as underscores
   */
  extractTopics(body: string): string[] {
    const topics: string[] = [];
    for (const match of body.matchAll(/^## (.+)$/gm)) {
      const topic = match[1].trim().toLowerCase().replace(/ /g, '_');
      if (topic) {
        topics.push(topic);
      }
      if (topics.length >= this.maxTopics) {
        break;
      }
    }
    return topics;
  }

  /**
   * Title from frontmatter, first H1, or filename
   */
  extractTitle(frontmatter: Frontmatter, body: string, filename: string): string {
    const fromFrontmatter = frontmatter.title;
    if (typeof fromFrontmatter === 'string' && fromFrontmatter.trim()) {
      return fromFrontmatter.trim();
    }

    const h1Match = body.match(/^#\s+(.+)$/m);
    if (h1Match) {
      return h1Match[1].trim();
    }

    const base = filename.split('/').pop()?.replace(/\.md$/, '') || 'Untitled';
    return base.split('-').map(word =>
      word.charAt(0).toUpperCase() + word.slice(1)
    ).join(' ');
  }

  /**
   * Link targets from wikilinks and markdown links to .md files, as bare note names
   */
  extractLinks(body: string): string[] {
    const links = new Set<string>();

    for (const match of body.matchAll(/\[\[([^\]|#]+)(?:#[^\]|]*)?(?:\|[^\]]*)?\]\]/g)) {
      links.add(match[1].trim());
    }

    for (const match of body.matchAll(/\[[^\]]+\]\(([^)]+\.md)\)/g)) {
      const name = match[1].split('/').pop() ?? match[1];
      links.add(name.replace(/\.md$/, ''));
    }

    return Array.from(links).filter(link => link.length > 0);
  }
}
