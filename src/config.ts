/**
 * Environment configuration
 */

import { join, resolve } from 'path';
import { z } from 'zod';
import { NotegraphConfig } from './types.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const EnvSchema = z.object({
  NOTEGRAPH_VAULT_PATH: z.string({ required_error: 'NOTEGRAPH_VAULT_PATH environment variable not set' })
    .trim()
    .min(1, 'NOTEGRAPH_VAULT_PATH environment variable not set'),
  NOTEGRAPH_INDEX_PATH: z.string().trim().min(1).optional(),
  NOTEGRAPH_AUTO_LINK_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.6),
  NOTEGRAPH_MIN_RELEVANCE: z.coerce.number().min(0).max(1).default(0.3),
  NOTEGRAPH_MAX_RELATED: z.coerce.number().int().positive().default(5)
});

/**
 * Read configuration from environment variables. The index defaults to
 * `.obsidian/index.json` inside the vault.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): NotegraphConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const prefix = issue.path.length > 0 && !issue.message.includes(String(issue.path[0]))
      ? `${issue.path.join('.')}: `
      : '';
    throw new ConfigError(`${prefix}${issue.message}`);
  }

  const vars = result.data;
  const vaultPath = resolve(vars.NOTEGRAPH_VAULT_PATH);

  return {
    vaultPath,
    indexPath: vars.NOTEGRAPH_INDEX_PATH
      ? resolve(vars.NOTEGRAPH_INDEX_PATH)
      : join(vaultPath, '.obsidian', 'index.json'),
    autoLinkMinConfidence: vars.NOTEGRAPH_AUTO_LINK_CONFIDENCE,
    minRelevance: vars.NOTEGRAPH_MIN_RELEVANCE,
    maxRelated: vars.NOTEGRAPH_MAX_RELATED
  };
}
