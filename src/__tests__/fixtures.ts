/**
 * Shared test fixtures: temp directories, sample notes and pre-filled indices
 */

import { mkdtemp, rm, writeFile, mkdir } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { KnowledgeIndex } from '../index-manager.js';
import { NewFileRecord } from '../types.js';

export async function createTempDir(prefix = 'notegraph-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function cleanupTempDir(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

export async function writeNote(vault: string, relativePath: string, content: string): Promise<string> {
  const path = join(vault, relativePath);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf-8');
  return path;
}

export type SampleEntry = [string, NewFileRecord];

export const SAMPLE_NOTES: SampleEntry[] = [
  ['calculus-derivative.md', {
    title: 'The Derivative',
    tags: ['math', 'calculus'],
    topics: ['derivative', 'limits']
  }],
  ['calculus-integral.md', {
    title: 'The Integral',
    tags: ['math', 'calculus'],
    topics: ['integral', 'limits']
  }],
  ['algebra-groups.md', {
    title: 'Groups',
    tags: ['math', 'algebra'],
    topics: ['groups']
  }],
  ['cooking-bread.md', {
    title: 'Sourdough Bread',
    tags: ['cooking'],
    topics: ['fermentation']
  }]
];

/**
 * In-memory index filled with the given entries (nothing is written to disk)
 */
export function buildIndex(entries: SampleEntry[] = SAMPLE_NOTES, indexPath = join(tmpdir(), 'unused-index.json')): KnowledgeIndex {
  const index = new KnowledgeIndex(indexPath);
  for (const [filename, entry] of entries) {
    index.add(filename, entry);
  }
  return index;
}
