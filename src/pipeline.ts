/**
 * Note pipeline: owns the knowledge index handle and runs one note at a time
 * through parse → index → link inference → write → save.
 */

import { basename, extname } from 'path';
import { KnowledgeIndex, DEFAULT_MAX_RESULTS, DEFAULT_MIN_RELEVANCE } from './index-manager.js';
import { NoteParser, normalizeTags } from './parser.js';
import { deriveFilename, stripExtension, withExtension } from './filename.js';
import { LinkInferencer, DEFAULT_AUTO_LINK_CONFIDENCE } from './links.js';
import { NoteWriter } from './writer.js';
import { DocumentSource, Frontmatter, GenerativeClient, GraphStats } from './types.js';

export interface PipelineOptions {
  index: KnowledgeIndex;
  writer: NoteWriter;
  parser?: NoteParser;
  client?: GenerativeClient;
  documents?: DocumentSource;
  autoLinkMinConfidence?: number;
  minRelevance?: number;
  maxRelated?: number;
}

export interface IngestResult {
  filename: string;
  path: string;
  title: string;
  tags: string[];
  topics: string[];
  related: string[];
  linked: string[];
}

function stringValue(frontmatter: Frontmatter, key: string): string | undefined {
  const value = frontmatter[key];
  if (value === undefined || Array.isArray(value)) {
    return undefined;
  }
  const text = String(value).trim();
  return text || undefined;
}

export class NotePipeline {
  private index: KnowledgeIndex;
  private writer: NoteWriter;
  private parser: NoteParser;
  private links: LinkInferencer;
  private client?: GenerativeClient;
  private documents?: DocumentSource;
  private autoLinkMinConfidence: number;
  private minRelevance: number;
  private maxRelated: number;

  constructor(options: PipelineOptions) {
    this.index = options.index;
    this.writer = options.writer;
    this.parser = options.parser || new NoteParser();
    this.client = options.client;
    this.documents = options.documents;
    this.autoLinkMinConfidence = options.autoLinkMinConfidence ?? DEFAULT_AUTO_LINK_CONFIDENCE;
    this.minRelevance = options.minRelevance ?? DEFAULT_MIN_RELEVANCE;
    this.maxRelated = options.maxRelated ?? DEFAULT_MAX_RESULTS;
    this.links = new LinkInferencer(this.index, {
      minRelevance: this.minRelevance,
      maxResults: this.maxRelated
    });
  }

  getIndex(): KnowledgeIndex {
    return this.index;
  }

  /**
   * Load an input document and a prompt, run the generative client, and ingest its output
   */
  async processDocument(inputPath: string, promptPath: string): Promise<IngestResult> {
    if (!this.client || !this.documents) {
      throw new Error('processDocument needs a generative client and a document source');
    }

    console.error(`[pipeline] Processing: ${inputPath}`);

    const document = await this.documents.load(inputPath);
    const prompt = await this.documents.load(promptPath);
    console.error(`[pipeline] Text size: ${document.content.length} characters`);

    const raw = await this.client.chat(document.content, prompt.content);

    return this.ingest(raw, {
      fallbackName: basename(document.file_name, extname(document.file_name))
    });
  }

  /**
   * Ingest raw generated text as a note in the vault
   */
  async ingest(raw: string, options: { fallbackName?: string } = {}): Promise<IngestResult> {
    const { frontmatter, body } = this.parser.parse(raw);

    const filename = withExtension(
      deriveFilename(
        stringValue(frontmatter, 'main_topic'),
        stringValue(frontmatter, 'title'),
        options.fallbackName
      )
    );
    const title = stringValue(frontmatter, 'title') ?? stripExtension(filename);
    const tags = normalizeTags(frontmatter.tags);
    const topics = this.parser.extractTopics(body);

    this.index.add(filename, {
      title,
      tags,
      topics,
      sizeChars: body.length
    });

    const enriched = this.links.enrich(filename, body, this.autoLinkMinConfidence);

    const related = this.index
      .findRelated(filename, this.maxRelated, this.minRelevance)
      .map(match => match.filename);
    this.index.updateRelatedLinks(filename, related);

    for (const target of new Set([...related, ...enriched.linked])) {
      this.index.updateBacklink(filename, target);
    }

    const written = await this.writer.write(filename, frontmatter, enriched.body);
    await this.index.save();

    console.error(`[pipeline] File saved: ${written.path}`);

    return {
      filename,
      path: written.path,
      title,
      tags,
      topics,
      related,
      linked: enriched.linked
    };
  }

  getGraphStats(): GraphStats {
    return this.index.getGraphStats();
  }

  findOrphans(): string[] {
    return this.index.findOrphans();
  }
}
