/**
 * Note writer for the vault
 */

import { writeFile, readFile, mkdir } from 'fs/promises';
import { join, dirname, basename } from 'path';
import { Frontmatter, FrontmatterValue } from './types.js';

// Plain scalars that YAML would read back as something else, or fail on
const NEEDS_QUOTING = /^[\s\-?:,[\]{}#&*!|>'"%@`]|[:#]\s|\s$|^(true|false|null|yes|no|~)$|^[\d.+-][\d.eE+-]*$|^$/i;
// Inside a [a, b] list these end or split an item
const FLOW_INDICATOR = /[,[\]{}]/;

function formatScalar(value: string | number | boolean): string {
  if (typeof value !== 'string') {
    return String(value);
  }
  return NEEDS_QUOTING.test(value) || value.includes('\n') ? JSON.stringify(value) : value;
}

function formatValue(value: FrontmatterValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(item => FLOW_INDICATOR.test(item) ? JSON.stringify(item) : formatScalar(item)).join(', ')}]`;
  }
  return formatScalar(value);
}

/**
 * Serialize frontmatter and body as `---\n<key: value>\n---\n\n<body>\n`
 */
export function renderNote(frontmatter: Frontmatter, body: string): string {
  const lines = Object.entries(frontmatter).map(([key, value]) => `${key}: ${formatValue(value)}`);
  const header = lines.length > 0 ? `---\n${lines.join('\n')}\n---\n\n` : '';
  return `${header}${body.trim()}\n`;
}

export class NoteWriter {
  private vaultPath: string;

  constructor(vaultPath: string) {
    this.vaultPath = vaultPath;
  }

  getVaultPath(): string {
    return this.vaultPath;
  }

  /**
   * Write a note into the vault, creating directories as needed
   */
  async write(
    filename: string,
    frontmatter: Frontmatter,
    body: string
  ): Promise<{ path: string; filename: string }> {
    const path = join(this.vaultPath, filename);

    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, renderNote(frontmatter, body), 'utf-8');

    return {
      path,
      filename: basename(path)
    };
  }

  async read(filename: string): Promise<string> {
    return readFile(join(this.vaultPath, filename), 'utf-8');
  }
}
