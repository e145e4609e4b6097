/**
 * Core types for the notegraph knowledge index
 */

export type FrontmatterValue = string | number | boolean | string[];

export type Frontmatter = Record<string, FrontmatterValue>;

export interface ParsedResponse {
  frontmatter: Frontmatter;
  body: string;
}

/**
 * One indexed note. Keys are snake_case because the record is persisted as-is.
 */
export interface FileRecord {
  title: string;
  tags: string[];
  topics: string[];
  created: string;
  updated: string;
  size_chars: number;
  parent: string | null;
  related: string[];
}

export interface FileEntry extends FileRecord {
  filename: string;
}

export interface NewFileRecord {
  title: string;
  tags: string[];
  topics: string[];
  parent?: string | null;
  related?: string[];
  sizeChars?: number;
}

export interface IndexStats {
  total_files: number;
  total_links: number;
}

export interface GraphStats extends IndexStats {
  unique_topics: number;
  unique_tags: number;
}

export interface IndexSnapshot {
  version: number;
  last_updated: string;
  stats: IndexStats;
  files: Record<string, FileRecord>;
  topics_index: Record<string, string[]>;
  tags_index: Record<string, string[]>;
  backlinks: Record<string, string[]>;
}

export interface RelatedFile {
  filename: string;
  score: number;
}

export interface LinkOpportunity {
  target: string;
  /** Mention text that triggered the match; absent for similarity matches */
  anchor?: string;
  confidence: number;
}

export interface GraphNode {
  id: string;
  label: string;
  tags: string[];
  group: string;
}

export interface GraphEdge {
  source: string;
  target: string;
  weight: number;
}

export interface GraphExport {
  nodes: GraphNode[];
  edges: GraphEdge[];
  stats: IndexStats;
}

export interface LoadedDocument {
  content: string;
  file_name: string;
}

/**
 * Supplies text for any input format. Format handling lives behind this seam.
 */
export interface DocumentSource {
  load(path: string): Promise<LoadedDocument>;
}

/**
 * Produces raw note text from an input document and a prompt.
 */
export interface GenerativeClient {
  chat(text: string, prompt: string): Promise<string>;
}

export interface NotegraphConfig {
  vaultPath: string;
  indexPath: string;
  autoLinkMinConfidence: number;
  minRelevance: number;
  maxRelated: number;
}
