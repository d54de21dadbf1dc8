/**
 * Reads schema.sql from beside this module.
 *
 * The file declares its own version through the `schema_version` insert,
 * so the migration check and the DDL cannot drift apart.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const SCHEMA_URL = new URL('./schema.sql', import.meta.url);

const VERSION_INSERT = /INSERT\s+OR\s+IGNORE\s+INTO\s+schema_version\s*\(\s*version\s*\)\s*VALUES\s*\(\s*(\d+)\s*\)/i;

export interface Schema {
  version: number;
  statements: string[];
}

let cached: Schema | undefined;

/**
 * The bundled schema, read once per process.
 */
export function loadSchema(): Schema {
  cached ??= parseSchema(readFileSync(fileURLToPath(SCHEMA_URL), 'utf-8'));
  return cached;
}

/**
 * @throws Error if the SQL does not record a schema version
 */
export function parseSchema(sql: string): Schema {
  const statements = splitStatements(sql);
  const match = statements.map((s) => VERSION_INSERT.exec(s)).find((m) => m !== null);
  if (!match) {
    throw new Error('Schema does not insert a schema_version row');
  }
  return { version: Number.parseInt(match[1], 10), statements };
}

/**
 * Split DDL into statements. Drops `--` comment lines; a statement ends at
 * a line ending in `;`. The schema has no triggers, so no BEGIN...END.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let buffer: string[] = [];

  for (const line of sql.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('--')) continue;

    buffer.push(line.trimEnd());
    if (trimmed.endsWith(';')) {
      statements.push(buffer.join('\n').trim().slice(0, -1).trimEnd());
      buffer = [];
    }
  }

  const rest = buffer.join('\n').trim();
  if (rest) statements.push(rest);
  return statements;
}
