/**
 * Tests for KnowledgeIndex
 */

import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { KnowledgeIndex } from '../index-manager.js';
import { SnapshotError, createEmptySnapshot } from '../snapshot.js';
import { SAMPLE_NOTES, buildIndex, cleanupTempDir, createTempDir } from './fixtures.js';

describe('KnowledgeIndex', () => {
  let tempDir: string;
  let indexPath: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    indexPath = join(tempDir, '.obsidian', 'index.json');
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('loading', () => {
    test('creates empty snapshot when none exists', async () => {
      const index = await KnowledgeIndex.open(indexPath);

      expect(index.toSnapshot()).toEqual({
        version: 1,
        last_updated: expect.any(String),
        stats: { total_files: 0, total_links: 0 },
        files: {},
        topics_index: {},
        tags_index: {},
        backlinks: {}
      });
    });

    test('heals a snapshot without backlinks', async () => {
      await writeFile(join(tempDir, 'index.json'), JSON.stringify({
        version: 1,
        last_updated: '2025-01-01T00:00:00.000',
        stats: { total_files: 1, total_links: 0 },
        files: {
          'old.md': {
            title: 'Old',
            tags: ['legacy'],
            topics: [],
            created: '2025-01-01',
            updated: '2025-01-01',
            size_chars: 0,
            parent: null,
            related: []
          }
        },
        topics_index: {},
        tags_index: { legacy: ['old.md'] }
      }), 'utf-8');

      const index = await KnowledgeIndex.open(join(tempDir, 'index.json'));

      expect(index.getBacklinks('old.md')).toEqual([]);
      expect(index.toSnapshot().backlinks).toEqual({});
      expect(index.findByTag('legacy')).toEqual(['old.md']);
    });

    test('rejects a snapshot that is not JSON', async () => {
      await writeFile(join(tempDir, 'index.json'), '{"version": 1,', 'utf-8');

      await expect(KnowledgeIndex.open(join(tempDir, 'index.json'))).rejects.toThrow(SnapshotError);
    });

    test('rejects a structurally invalid snapshot', async () => {
      await writeFile(join(tempDir, 'index.json'), JSON.stringify({
        version: 1,
        last_updated: '2025-01-01T00:00:00.000Z',
        stats: { total_files: 0, total_links: 0 },
        files: [],
        topics_index: {},
        tags_index: {}
      }), 'utf-8');

      await expect(KnowledgeIndex.open(join(tempDir, 'index.json'))).rejects.toThrow(/malformed at files/);
    });
  });

  describe('add', () => {
    test('indexes tags and topics in insertion order', () => {
      const index = buildIndex();

      expect(index.findByTag('math')).toEqual([
        'calculus-derivative.md',
        'calculus-integral.md',
        'algebra-groups.md'
      ]);
      expect(index.findByTopic('limits')).toEqual(['calculus-derivative.md', 'calculus-integral.md']);
      expect(index.getStats()).toEqual({ total_files: 4, total_links: 0 });
    });

    test('does not duplicate filenames when added twice', () => {
      const index = buildIndex([]);
      index.add('a.md', { title: 'A', tags: ['x', 'x'], topics: ['t'] });
      index.add('a.md', { title: 'A', tags: ['x'], topics: ['t'] });

      expect(index.findByTag('x')).toEqual(['a.md']);
      expect(index.findByTopic('t')).toEqual(['a.md']);
      expect(index.getStats().total_files).toBe(1);
    });

    test('removes stale index entries on overwrite', () => {
      const index = buildIndex([]);
      index.add('a.md', { title: 'A', tags: ['x'], topics: ['t1'] });
      index.add('a.md', { title: 'A2', tags: ['y'], topics: ['t2'] });

      expect(index.findByTag('x')).toEqual([]);
      expect(index.findByTag('y')).toEqual(['a.md']);
      expect(index.findByTopic('t1')).toEqual([]);
      expect(index.toSnapshot().tags_index).toEqual({ y: ['a.md'] });
      expect(index.getFileInfo('a.md')?.title).toBe('A2');
    });

    test('keeps the creation date of an overwritten record', () => {
      const snapshot = createEmptySnapshot();
      snapshot.files['a.md'] = {
        title: 'A',
        tags: [],
        topics: [],
        created: '2020-01-01',
        updated: '2020-01-01',
        size_chars: 0,
        parent: null,
        related: []
      };
      const index = new KnowledgeIndex(indexPath, snapshot);

      index.add('a.md', { title: 'A', tags: ['x'], topics: [], sizeChars: 42 });

      const info = index.getFileInfo('a.md');
      expect(info?.created).toBe('2020-01-01');
      expect(info?.updated).toMatch(/^\d{4}-\d{2}-\d{2}$/);
      expect(info?.size_chars).toBe(42);
    });

    test('handles tags named like object members', () => {
      const index = buildIndex([]);
      index.add('a.md', { title: 'A', tags: ['constructor', 'toString'], topics: [] });

      expect(index.findByTag('constructor')).toEqual(['a.md']);
      expect(index.findByTag('hasOwnProperty')).toEqual([]);
    });

    test('indexes a tag, topic and backlink named __proto__', () => {
      const index = buildIndex([]);
      index.add('a.md', { title: 'A', tags: ['__proto__'], topics: ['__proto__'] });
      index.updateBacklink('a.md', '__proto__');

      expect(index.findByTag('__proto__')).toEqual(['a.md']);
      expect(index.findByTopic('__proto__')).toEqual(['a.md']);
      expect(index.getBacklinks('__proto__')).toEqual(['a.md']);
      expect(Object.keys(index.toSnapshot().tags_index)).toEqual(['__proto__']);
    });

    test('indexes a note named __proto__', () => {
      const index = buildIndex([]);
      index.add('__proto__', { title: 'Odd', tags: ['x'], topics: [] });

      expect(index.listFiles()).toEqual(['__proto__']);
      expect(index.getFileInfo('__proto__')?.title).toBe('Odd');
    });
  });

  describe('queries', () => {
    test('returns empty lists for unknown keys', () => {
      const index = buildIndex();

      expect(index.findByTag('unknown')).toEqual([]);
      expect(index.findByTopic('unknown')).toEqual([]);
      expect(index.getFileInfo('missing.md')).toBeUndefined();
    });

    test('returns copies of records', () => {
      const index = buildIndex();
      const info = index.getFileInfo('calculus-derivative.md');
      info?.tags.push('mutated');

      expect(index.getFileInfo('calculus-derivative.md')?.tags).toEqual(['math', 'calculus']);
      expect(index.getFileInfo('calculus-derivative.md')).toMatchObject({
        filename: 'calculus-derivative.md',
        title: 'The Derivative',
        parent: null,
        related: []
      });
    });
  });

  describe('findRelated', () => {
    test('ranks by weighted tag and topic similarity', () => {
      const index = buildIndex();
      const related = index.findRelated('calculus-derivative.md');

      expect(related).toHaveLength(1);
      expect(related[0].filename).toBe('calculus-integral.md');
      expect(related[0].score).toBeCloseTo(0.6 + 0.4 / 3, 10);
    });

    test('includes weaker matches above a lower threshold', () => {
      const index = buildIndex();
      const related = index.findRelated('calculus-derivative.md', 5, 0.1);

      expect(related.map(r => r.filename)).toEqual(['calculus-integral.md', 'algebra-groups.md']);
      expect(related[1].score).toBeCloseTo(0.2, 10);
    });

    test('excludes notes with disjoint tags and topics for any positive threshold', () => {
      const index = buildIndex();

      expect(index.findRelated('calculus-derivative.md', 5, 0.01).map(r => r.filename))
        .not.toContain('cooking-bread.md');
      expect(index.findRelated('cooking-bread.md', 5, 0.01)).toEqual([]);
    });

    test('never includes the note itself', () => {
      const index = buildIndex();
      const related = index.findRelated('calculus-derivative.md', 10, 0);

      expect(related.map(r => r.filename)).toEqual([
        'calculus-integral.md',
        'algebra-groups.md',
        'cooking-bread.md'
      ]);
    });

    test('orders equal scores by filename', () => {
      const index = buildIndex([
        ['z.md', { title: 'Z', tags: ['shared'], topics: [] }],
        ['b.md', { title: 'B', tags: ['shared'], topics: [] }],
        ['a.md', { title: 'A', tags: ['shared'], topics: [] }]
      ]);

      expect(index.findRelated('z.md').map(r => r.filename)).toEqual(['a.md', 'b.md']);
    });

    test('truncates to max results', () => {
      const index = buildIndex([
        ['z.md', { title: 'Z', tags: ['shared'], topics: [] }],
        ['b.md', { title: 'B', tags: ['shared'], topics: [] }],
        ['a.md', { title: 'A', tags: ['shared'], topics: [] }]
      ]);

      expect(index.findRelated('z.md', 1)).toEqual([{ filename: 'a.md', score: 0.6 }]);
    });

    test('returns nothing for an unknown note', () => {
      expect(buildIndex().findRelated('missing.md')).toEqual([]);
    });
  });

  describe('links', () => {
    test('updates related links and link stats', () => {
      const index = buildIndex();
      index.updateRelatedLinks('calculus-derivative.md', ['calculus-integral.md', 'algebra-groups.md']);

      expect(index.getFileInfo('calculus-derivative.md')?.related).toEqual([
        'calculus-integral.md',
        'algebra-groups.md'
      ]);
      expect(index.getStats()).toEqual({ total_files: 4, total_links: 2 });
    });

    test('ignores related links for unknown notes', () => {
      const index = buildIndex();
      index.updateRelatedLinks('missing.md', ['calculus-integral.md']);

      expect(index.getFileInfo('missing.md')).toBeUndefined();
      expect(index.getStats().total_links).toBe(0);
    });

    test('records each backlink once', () => {
      const index = buildIndex();

      expect(index.updateBacklink('calculus-integral.md', 'calculus-derivative.md')).toBe(true);
      expect(index.updateBacklink('calculus-integral.md', 'calculus-derivative.md')).toBe(false);

      expect(index.getBacklinks('calculus-derivative.md')).toEqual(['calculus-integral.md']);
      expect(index.getBacklinks('calculus-integral.md')).toEqual([]);
    });

    test('keeps related links and backlinks independent', () => {
      const index = buildIndex();
      index.updateRelatedLinks('calculus-derivative.md', ['calculus-integral.md']);

      expect(index.getBacklinks('calculus-integral.md')).toEqual([]);
    });

    test('finds orphans', () => {
      const index = buildIndex();
      index.updateRelatedLinks('calculus-derivative.md', ['calculus-integral.md']);
      index.updateBacklink('calculus-derivative.md', 'calculus-integral.md');

      expect(index.findOrphans()).toEqual(['algebra-groups.md', 'cooking-bread.md']);
    });
  });

  describe('exportGraph', () => {
    test('exports nodes and related edges', () => {
      const index = buildIndex([
        ['a.md', { title: 'A', tags: ['math', 'x'], topics: [] }],
        ['b.md', { title: 'B', tags: [], topics: [] }]
      ]);
      index.updateRelatedLinks('a.md', ['b.md']);

      expect(index.exportGraph()).toEqual({
        nodes: [
          { id: 'a.md', label: 'A', tags: ['math', 'x'], group: 'math' },
          { id: 'b.md', label: 'B', tags: [], group: 'other' }
        ],
        edges: [{ source: 'a.md', target: 'b.md', weight: 1 }],
        stats: { total_files: 2, total_links: 1 }
      });
    });

    test('reports graph stats', () => {
      expect(buildIndex().getGraphStats()).toEqual({
        total_files: 4,
        total_links: 0,
        unique_topics: 5,
        unique_tags: 4
      });
    });
  });

  describe('save', () => {
    test('round-trips the snapshot', async () => {
      const index = buildIndex(SAMPLE_NOTES, indexPath);
      index.updateRelatedLinks('calculus-derivative.md', ['calculus-integral.md']);
      index.updateBacklink('calculus-derivative.md', 'calculus-integral.md');
      await index.save();

      const reloaded = await KnowledgeIndex.open(indexPath);

      expect(reloaded.getStats()).toEqual(index.getStats());
      expect(reloaded.findByTag('calculus')).toEqual(index.findByTag('calculus'));
      expect(reloaded.findByTopic('limits')).toEqual(index.findByTopic('limits'));
      expect(reloaded.findRelated('calculus-derivative.md', 5, 0))
        .toEqual(index.findRelated('calculus-derivative.md', 5, 0));
      expect(reloaded.getBacklinks('calculus-integral.md')).toEqual(['calculus-derivative.md']);
      expect(reloaded.toSnapshot()).toEqual(index.toSnapshot());
    });

    test('writes snake_case JSON and leaves no temp file', async () => {
      const index = buildIndex([['a.md', { title: 'A', tags: ['t'], topics: [] }]], indexPath);
      await index.save();

      const raw = JSON.parse(await readFile(indexPath, 'utf-8'));
      expect(raw.stats).toEqual({ total_files: 1, total_links: 0 });
      expect(raw.tags_index).toEqual({ t: ['a.md'] });
      expect(raw.files['a.md'].size_chars).toBe(0);
      expect(await readdir(join(tempDir, '.obsidian'))).toEqual(['index.json']);
    });

    test('updates the last-updated timestamp', async () => {
      const snapshot = createEmptySnapshot(new Date('2020-01-01T00:00:00.000Z'));
      const index = new KnowledgeIndex(indexPath, snapshot);
      await index.save();

      expect(index.getLastUpdated()).not.toBe('2020-01-01T00:00:00.000Z');
    });
  });
});
