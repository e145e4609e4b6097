/**
 * Vault scanner: rebuilds the knowledge index from notes already on disk
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import matter from 'gray-matter';
import { glob } from 'glob';
import { KnowledgeIndex } from './index-manager.js';
import { NoteParser, normalizeFrontmatter, normalizeTags } from './parser.js';
import { withExtension } from './filename.js';
import { Frontmatter, FrontmatterValue, ParsedResponse } from './types.js';

export interface RebuildResult {
  indexed: number;
  failed: string[];
  backlinks: number;
}

function toFilenameList(value: FrontmatterValue | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  return (Array.isArray(value) ? value : [String(value)])
    .map(item => item.replace(/^\[\[|\]\]$/g, '').trim())
    .filter(item => item.length > 0)
    .map(withExtension);
}

export class VaultScanner {
  private vaultPath: string;
  private parser: NoteParser;

  constructor(vaultPath: string, parser?: NoteParser) {
    this.vaultPath = vaultPath;
    this.parser = parser || new NoteParser();
  }

  /**
   * Markdown files in the vault, relative to its root, skipping dot-directories
   */
  async listNotes(): Promise<string[]> {
    const files = await glob('**/*.md', {
      cwd: this.vaultPath,
      nodir: true,
      dot: false,
      windowsPathsNoEscape: true
    });
    return files.map(file => file.replace(/\\/g, '/')).sort();
  }

  /**
   * Replace the index contents with every note in the vault, then record backlinks between them
   */
  async rebuild(index: KnowledgeIndex): Promise<RebuildResult> {
    console.error('[scanner] Rebuilding knowledge index from vault...');

    const files = await this.listNotes();
    index.reset();
    const bodies = new Map<string, string>();
    const failed: string[] = [];

    for (const file of files) {
      let content: string;
      try {
        content = await readFile(join(this.vaultPath, file), 'utf-8');
      } catch (error) {
        console.error(`[scanner] Failed to read ${file}:`, error);
        failed.push(file);
        continue;
      }

      const { frontmatter, body } = this.parseNote(content, file);
      index.add(file, {
        title: this.parser.extractTitle(frontmatter, body, file),
        tags: normalizeTags(frontmatter.tags),
        topics: this.parser.extractTopics(body),
        parent: toFilenameList(frontmatter.parent)[0] ?? null,
        related: toFilenameList(frontmatter.related),
        sizeChars: body.length
      });
      bodies.set(file, body);
    }

    let backlinks = 0;
    const byName = new Map<string, string>();
    for (const file of index.listFiles()) {
      byName.set(file.split('/').pop() ?? file, file);
    }

    for (const [source, body] of bodies) {
      for (const link of this.parser.extractLinks(body)) {
        const target = byName.get(withExtension(link.split('/').pop() ?? link));
        if (target && target !== source && index.updateBacklink(source, target)) {
          backlinks++;
        }
      }
    }

    console.error(`[scanner] Rebuilt index with ${bodies.size} notes`);
    return { indexed: bodies.size, failed, backlinks };
  }

  /**
   * Notes we wrote have clean YAML; hand-edited ones get the layered parser
   */
  private parseNote(content: string, file: string): ParsedResponse {
    try {
      const { data, content: body } = matter(content, {});
      return { frontmatter: normalizeFrontmatter(data), body };
    } catch {
      console.error(`[scanner] Malformed frontmatter in ${file}, using fallback parser`);
      const parsed = this.parser.parse(content);
      const frontmatter: Frontmatter = { ...parsed.frontmatter };
      if (frontmatter.title === 'Untitled') {
        delete frontmatter.title;
      }
      return { frontmatter, body: parsed.body };
    }
  }
}
