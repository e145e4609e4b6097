/**
 * Knowledge index for generated notes
 * Maintains index.json with file records, tag/topic inverted indices and backlinks
 */

import { readFile, writeFile, rename, mkdir } from 'fs/promises';
import { dirname } from 'path';
import {
  FileEntry,
  FileRecord,
  GraphExport,
  GraphStats,
  IndexSnapshot,
  IndexStats,
  NewFileRecord,
  RelatedFile
} from './types.js';
import { createEmptySnapshot, parseSnapshot } from './snapshot.js';
import { relatedness } from './similarity.js';

export const DEFAULT_MAX_RESULTS = 5;
export const DEFAULT_MIN_RELEVANCE = 0.3;

type InvertedIndex = Record<string, string[]>;

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

function copyRecord(record: FileRecord): FileRecord {
  return {
    ...record,
    tags: [...record.tags],
    topics: [...record.topics],
    related: [...record.related]
  };
}

// Tags like "constructor" must not resolve to Object.prototype members
function lookup<T>(map: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

// Defines an own key even for "__proto__"
function setEntry<T>(map: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(map, key, { value, enumerable: true, writable: true, configurable: true });
}

function addToIndex(index: InvertedIndex, key: string, filename: string): boolean {
  let files = lookup(index, key);
  if (!files) {
    files = [];
    setEntry(index, key, files);
  }
  if (files.includes(filename)) {
    return false;
  }
  files.push(filename);
  return true;
}

function removeFromIndex(index: InvertedIndex, key: string, filename: string): void {
  const files = lookup(index, key);
  if (!files) {
    return;
  }
  const remaining = files.filter(f => f !== filename);
  if (remaining.length === 0) {
    delete index[key];
  } else {
    setEntry(index, key, remaining);
  }
}

export class KnowledgeIndex {
  private indexPath: string;
  private data: IndexSnapshot;

  constructor(indexPath: string, snapshot: IndexSnapshot = createEmptySnapshot()) {
    this.indexPath = indexPath;
    this.data = snapshot;
  }

  /**
   * Open the index at the given path, starting empty when no snapshot exists yet
   */
  static async open(indexPath: string): Promise<KnowledgeIndex> {
    const index = new KnowledgeIndex(indexPath);
    await index.load();
    return index;
  }

  getPath(): string {
    return this.indexPath;
  }

  /**
   * Load snapshot from disk, replacing in-memory state
   */
  async load(): Promise<IndexSnapshot> {
    let content: string;
    try {
      content = await readFile(this.indexPath, 'utf-8');
    } catch (error: unknown) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        this.data = createEmptySnapshot();
        return this.data;
      }
      throw error;
    }

    this.data = parseSnapshot(content, this.indexPath);
    return this.data;
  }

  /**
   * Save the complete snapshot. Writes a temp file and renames it over the target.
   */
  async save(): Promise<void> {
    this.data.last_updated = new Date().toISOString();

    await mkdir(dirname(this.indexPath), { recursive: true });
    const tempPath = this.indexPath + '.tmp';
    await writeFile(tempPath, JSON.stringify(this.data, null, 2), 'utf-8');
    await rename(tempPath, this.indexPath);

    console.error(`[index] Saved ${this.data.stats.total_files} files to ${this.indexPath}`);
  }

  /**
   * Drop every record, index entry and backlink
   */
  reset(): void {
    this.data = createEmptySnapshot();
  }

  /**
   * Add or overwrite a file record
   */
  add(filename: string, entry: NewFileRecord): void {
    const previous = lookup(this.data.files, filename);
    const now = today();

    const record: FileRecord = {
      title: entry.title,
      tags: [...entry.tags],
      topics: [...entry.topics],
      created: previous?.created ?? now,
      updated: now,
      size_chars: entry.sizeChars ?? 0,
      parent: entry.parent ?? null,
      related: entry.related ? [...entry.related] : []
    };

    if (previous) {
      this.unindex(this.data.tags_index, filename, previous.tags, record.tags);
      this.unindex(this.data.topics_index, filename, previous.topics, record.topics);
    }

    setEntry(this.data.files, filename, record);

    for (const topic of record.topics) {
      addToIndex(this.data.topics_index, topic, filename);
    }
    for (const tag of record.tags) {
      addToIndex(this.data.tags_index, tag, filename);
    }

    this.updateStats();
    console.error(`[index] File added: ${filename}`);
  }

  findByTag(tag: string): string[] {
    return [...(lookup(this.data.tags_index, tag) ?? [])];
  }

  findByTopic(topic: string): string[] {
    return [...(lookup(this.data.topics_index, topic) ?? [])];
  }

  /**
   * Topics with the files indexed under each, in insertion order
   */
  topicEntries(): Array<[string, string[]]> {
    return Object.entries(this.data.topics_index).map(([topic, files]) => [topic, [...files]]);
  }

  getFileInfo(filename: string): FileEntry | undefined {
    const record = lookup(this.data.files, filename);
    if (!record) {
      return undefined;
    }
    return { filename, ...copyRecord(record) };
  }

  has(filename: string): boolean {
    return Object.hasOwn(this.data.files, filename);
  }

  listFiles(): string[] {
    return Object.keys(this.data.files);
  }

  /**
   * Replace the related list of an existing record. Unknown filenames are ignored.
   */
  updateRelatedLinks(filename: string, related: string[]): void {
    const record = lookup(this.data.files, filename);
    if (!record) {
      return;
    }
    record.related = [...related];
    this.updateStats();
    console.error(`[index] Links updated for ${filename}`);
  }

  /**
   * Record that source links to target. Returns false when the backlink was already known.
   */
  updateBacklink(source: string, target: string): boolean {
    return addToIndex(this.data.backlinks, target, source);
  }

  getBacklinks(filename: string): string[] {
    return [...(lookup(this.data.backlinks, filename) ?? [])];
  }

  /**
   * Rank other files by weighted Jaccard similarity of tags and topics.
   * Equal scores are ordered by filename.
   */
  findRelated(
    filename: string,
    maxResults = DEFAULT_MAX_RESULTS,
    minRelevance = DEFAULT_MIN_RELEVANCE
  ): RelatedFile[] {
    const current = lookup(this.data.files, filename);
    if (!current) {
      return [];
    }

    const results: RelatedFile[] = [];
    for (const [other, record] of Object.entries(this.data.files)) {
      if (other === filename) {
        continue;
      }
      const score = relatedness(current, record);
      if (score >= minRelevance) {
        results.push({ filename: other, score });
      }
    }

    results.sort((a, b) => {
      if (b.score !== a.score) {
        return b.score - a.score;
      }
      return a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0;
    });

    return results.slice(0, Math.max(0, maxResults));
  }

  /**
   * Files with neither backlinks nor related links
   */
  findOrphans(): string[] {
    return Object.entries(this.data.files)
      .filter(([filename, record]) =>
        record.related.length === 0 && (lookup(this.data.backlinks, filename)?.length ?? 0) === 0
      )
      .map(([filename]) => filename);
  }

  getStats(): IndexStats {
    return { ...this.data.stats };
  }

  getGraphStats(): GraphStats {
    return {
      ...this.data.stats,
      unique_topics: Object.keys(this.data.topics_index).length,
      unique_tags: Object.keys(this.data.tags_index).length
    };
  }

  getLastUpdated(): string {
    return this.data.last_updated;
  }

  /**
   * Export nodes and related-link edges for graph visualization
   */
  exportGraph(): GraphExport {
    const entries = Object.entries(this.data.files);

    const nodes = entries.map(([filename, record]) => ({
      id: filename,
      label: record.title,
      tags: [...record.tags],
      group: record.tags[0] ?? 'other'
    }));

    const edges = entries.flatMap(([filename, record]) =>
      record.related.map(target => ({ source: filename, target, weight: 1 }))
    );

    return { nodes, edges, stats: this.getStats() };
  }

  /**
   * Complete copy of the in-memory snapshot
   */
  toSnapshot(): IndexSnapshot {
    return structuredClone(this.data);
  }

  private unindex(index: InvertedIndex, filename: string, before: string[], after: string[]): void {
    for (const key of before) {
      if (!after.includes(key)) {
        removeFromIndex(index, key, filename);
      }
    }
  }

  private updateStats(): void {
    const records = Object.values(this.data.files);
    this.data.stats.total_files = records.length;
    this.data.stats.total_links = records.reduce((sum, record) => sum + record.related.length, 0);
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}
