import fs from 'node:fs/promises';
import { parse } from 'csv-parse/sync';

import { AuditInputError, errorMessage } from './errors.js';
import { isNotFoundError } from './io.js';

const GROUP_ID_COLUMN = 'groupId';
const REASON_COLUMN = 'reason';

function stripBom(s: string): string {
  return s.charCodeAt(0) === 0xfeff ? s.slice(1) : s;
}

function toRows(parsed: unknown): string[][] {
  if (!Array.isArray(parsed)) return [];
  return parsed.map((row: unknown) =>
    Array.isArray(row) ? row.map((v: unknown) => (typeof v === 'string' ? v.trim() : '')) : [],
  );
}

/**
 * Parses a `groupId,reason` CSV. The header must name `groupId` exactly; a file of bare ids
 * would otherwise read its first id as the header and protect nothing.
 */
export function parseKeepList(text: string, source = 'keep-list'): Map<string, string> {
  let rows: string[][];
  try {
    rows = toRows(
      parse(stripBom(text), {
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
      }),
    );
  } catch (error) {
    throw new AuditInputError(`${source} is not valid CSV: ${errorMessage(error)}`, { cause: error });
  }

  const [header, ...body] = rows;
  if (!header) return new Map();

  const idIndex = header.indexOf(GROUP_ID_COLUMN);
  if (idIndex < 0) throw new AuditInputError(`${source} has no ${GROUP_ID_COLUMN} column`);
  const reasonIndex = header.indexOf(REASON_COLUMN);

  const map = new Map<string, string>();
  for (const row of body) {
    const groupId = row[idIndex] ?? '';
    if (!groupId) continue;
    map.set(groupId, reasonIndex < 0 ? '' : row[reasonIndex] ?? '');
  }
  if (map.size === 0) throw new AuditInputError(`${source} lists no group ids`);
  return map;
}

/**
 * Reads the keep-list of groups that must never be proposed for deletion.
 * A keep-list that was asked for but can't be read fails the run.
 */
export async function loadKeepList(filePath: string | undefined): Promise<Map<string, string>> {
  if (!filePath) return new Map();
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFoundError(error)) throw new AuditInputError(`keep-list not found: ${filePath}`, { cause: error });
    throw error;
  }
  return parseKeepList(text, `keep-list ${filePath}`);
}
