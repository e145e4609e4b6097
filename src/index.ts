#!/usr/bin/env node

/**
 * notegraph MCP server
 *
 * Ingests generated notes into a vault and answers knowledge-graph queries
 * against the persisted index.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema,
  Tool
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { loadConfig, ConfigError } from './config.js';
import { KnowledgeIndex } from './index-manager.js';
import { NoteWriter } from './writer.js';
import { NotePipeline } from './pipeline.js';
import { VaultScanner } from './scanner.js';
import { withExtension } from './filename.js';
import { NotegraphConfig } from './types.js';

function readConfig(): NotegraphConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      console.error('Please set NOTEGRAPH_VAULT_PATH to the directory notes are written to');
      process.exit(1);
    }
    throw error;
  }
}

const CONFIG = readConfig();

const FilenameArgs = z.object({ filename: z.string().min(1) });

const toolArgs = {
  ingest_note: z.object({
    raw: z.string(),
    fallback_name: z.string().optional()
  }),
  find_related: FilenameArgs.extend({
    max_results: z.number().int().positive().optional(),
    min_relevance: z.number().min(0).max(1).optional()
  }),
  find_by_tag: z.object({ tag: z.string() }),
  find_by_topic: z.object({ topic: z.string() }),
  get_note_info: FilenameArgs,
  get_backlinks: FilenameArgs,
  export_graph: z.object({}),
  graph_stats: z.object({}),
  find_orphans: z.object({}),
  rebuild_index: z.object({})
};

type ToolName = keyof typeof toolArgs;

function isToolName(name: string): name is ToolName {
  return Object.hasOwn(toolArgs, name);
}

const filenameProperty = {
  type: 'string',
  description: 'Note filename, e.g. "calculus-derivative.md" (extension optional)'
};

const tools: Tool[] = [
  {
    name: 'ingest_note',
    description: 'Parse raw generated note text, index it, insert cross-references and write it to the vault.',
    inputSchema: {
      type: 'object',
      properties: {
        raw: {
          type: 'string',
          description: 'Raw model output, with or without a frontmatter block'
        },
        fallback_name: {
          type: 'string',
          description: 'Filename to use when the text carries neither topic nor title'
        }
      },
      required: ['raw']
    }
  },
  {
    name: 'find_related',
    description: 'Rank notes by tag and topic similarity to the given note.',
    inputSchema: {
      type: 'object',
      properties: {
        filename: filenameProperty,
        max_results: { type: 'number', description: 'Maximum results (default 5)' },
        min_relevance: { type: 'number', description: 'Minimum score between 0 and 1 (default 0.3)' }
      },
      required: ['filename']
    }
  },
  {
    name: 'find_by_tag',
    description: 'List notes carrying a tag.',
    inputSchema: {
      type: 'object',
      properties: { tag: { type: 'string' } },
      required: ['tag']
    }
  },
  {
    name: 'find_by_topic',
    description: 'List notes indexed under a topic (lower-case, spaces as underscores).',
    inputSchema: {
      type: 'object',
      properties: { topic: { type: 'string' } },
      required: ['topic']
    }
  },
  {
    name: 'get_note_info',
    description: 'Indexed metadata of one note.',
    inputSchema: {
      type: 'object',
      properties: { filename: filenameProperty },
      required: ['filename']
    }
  },
  {
    name: 'get_backlinks',
    description: 'Notes that link to the given note.',
    inputSchema: {
      type: 'object',
      properties: { filename: filenameProperty },
      required: ['filename']
    }
  },
  {
    name: 'export_graph',
    description: 'Nodes and related-link edges of the whole knowledge graph.',
    inputSchema: { type: 'object', properties: {} }
  },
  {
    name: 'graph_stats',
    description: 'File, link, topic and tag counts.',
    inputSchema: { type: 'object', properties: {} }
  },
  {
    name: 'find_orphans',
    description: 'Notes with no backlinks and no related links.',
    inputSchema: { type: 'object', properties: {} }
  },
  {
    name: 'rebuild_index',
    description: 'Re-index every markdown note already in the vault and save the index.',
    inputSchema: { type: 'object', properties: {} }
  }
];

function json(payload: unknown): CallToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(payload, null, 2)
    }]
  };
}

function failure(error: string, tool: string): CallToolResult {
  return { ...json({ error, tool }), isError: true };
}

async function main() {
  const index = await KnowledgeIndex.open(CONFIG.indexPath);
  const writer = new NoteWriter(CONFIG.vaultPath);
  const pipeline = new NotePipeline({
    index,
    writer,
    autoLinkMinConfidence: CONFIG.autoLinkMinConfidence,
    minRelevance: CONFIG.minRelevance,
    maxRelated: CONFIG.maxRelated
  });
  const scanner = new VaultScanner(CONFIG.vaultPath);

  const server = new Server(
    {
      name: 'notegraph-mcp',
      version: '0.1.0'
    },
    {
      capabilities: {
        tools: {}
      }
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: rawArgs } = request.params;

    if (!isToolName(name)) {
      return failure('Unknown tool', name);
    }

    try {
      switch (name) {
        case 'ingest_note': {
          const args = toolArgs.ingest_note.parse(rawArgs ?? {});
          const result = await pipeline.ingest(args.raw, { fallbackName: args.fallback_name });
          return json({ success: true, ...result });
        }

        case 'find_related': {
          const args = toolArgs.find_related.parse(rawArgs ?? {});
          return json({
            filename: withExtension(args.filename),
            related: index.findRelated(
              withExtension(args.filename),
              args.max_results ?? CONFIG.maxRelated,
              args.min_relevance ?? CONFIG.minRelevance
            )
          });
        }

        case 'find_by_tag': {
          const { tag } = toolArgs.find_by_tag.parse(rawArgs ?? {});
          return json({ tag, files: index.findByTag(tag) });
        }

        case 'find_by_topic': {
          const { topic } = toolArgs.find_by_topic.parse(rawArgs ?? {});
          return json({ topic, files: index.findByTopic(topic) });
        }

        case 'get_note_info': {
          const { filename } = toolArgs.get_note_info.parse(rawArgs ?? {});
          const info = index.getFileInfo(withExtension(filename));
          if (!info) {
            return failure(`Note not indexed: ${filename}`, name);
          }
          return json(info);
        }

        case 'get_backlinks': {
          const { filename } = toolArgs.get_backlinks.parse(rawArgs ?? {});
          const target = withExtension(filename);
          return json({ filename: target, backlinks: index.getBacklinks(target) });
        }

        case 'export_graph':
          return json(index.exportGraph());

        case 'graph_stats':
          return json({ ...pipeline.getGraphStats(), last_updated: index.getLastUpdated() });

        case 'find_orphans':
          return json({ orphans: pipeline.findOrphans() });

        case 'rebuild_index': {
          const result = await scanner.rebuild(index);
          await index.save();
          return json({ success: true, ...result });
        }

        default:
          return failure('Unknown tool', name);
      }
    } catch (error) {
      if (error instanceof z.ZodError) {
        return failure(`Invalid arguments: ${error.issues.map(i => `${i.path.join('.')} ${i.message}`).join('; ')}`, name);
      }
      return failure(error instanceof Error ? error.message : 'Unknown error', name);
    }
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('notegraph MCP server running on stdio');
  console.error(`Vault path: ${CONFIG.vaultPath}`);
  console.error(`Index path: ${CONFIG.indexPath}`);
}

main().catch(error => {
  console.error('[server] Fatal error:', error);
  process.exit(1);
});
