import fs from 'node:fs/promises';
import path from 'node:path';

import { DEFAULT_OUTPUT_DIR, RUN_REGISTRY_SUBDIR } from './defaults.js';
import { ensureDir, isNotFoundError, readJsonFile, writeJsonFile } from './io.js';

export type RunRegistryEntry = {
  runId: string;
  region: string;
  mode: string;
  outputDir: string; // relative to the output root, posix separators
};

const LATEST = 'latest.json';

function registryDir(outputRoot: string): string {
  return path.join(outputRoot, DEFAULT_OUTPUT_DIR, RUN_REGISTRY_SUBDIR);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return Boolean(v) && typeof v === 'object' && !Array.isArray(v);
}

function asEntry(r: unknown, fallbackRunId: string): RunRegistryEntry | null {
  if (!isRecord(r)) return null;
  const runId = typeof r.runId === 'string' && r.runId.trim() ? r.runId.trim() : fallbackRunId;
  if (typeof r.outputDir !== 'string' || !r.outputDir) return null;
  return {
    runId,
    region: typeof r.region === 'string' ? r.region : '',
    mode: typeof r.mode === 'string' ? r.mode : '',
    outputDir: r.outputDir,
  };
}

export async function listRunRegistry(outputRoot: string): Promise<RunRegistryEntry[]> {
  const dir = registryDir(outputRoot);
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (error) {
    if (isNotFoundError(error)) return [];
    throw error;
  }

  const items: Array<{ entry: RunRegistryEntry; mtimeMs: number }> = [];
  for (const name of names) {
    if (!name.endsWith('.json') || name === LATEST) continue;
    const filePath = path.join(dir, name);
    try {
      const [raw, stat] = await Promise.all([readJsonFile(filePath), fs.stat(filePath)]);
      const entry = asEntry(raw, name.slice(0, -'.json'.length));
      if (entry) items.push({ entry, mtimeMs: stat.mtimeMs });
    } catch {
      // half-written or hand-edited entry
    }
  }

  items.sort((a, b) => b.mtimeMs - a.mtimeMs || b.entry.runId.localeCompare(a.entry.runId));
  return items.map((item) => item.entry);
}

export async function writeRunRegistry(outputRoot: string, entry: RunRegistryEntry): Promise<void> {
  const dir = registryDir(outputRoot);
  await ensureDir(dir);
  await writeJsonFile(path.join(dir, `${entry.runId}.json`), entry);
  await writeJsonFile(path.join(dir, LATEST), entry);
}

export async function resolveRunIdToOutputDir(outputRoot: string, runId?: string): Promise<string> {
  if (runId !== undefined && !/^[\w.-]+$/u.test(runId)) throw new Error(`invalid runId=${runId}`);
  const filePath = path.join(registryDir(outputRoot), runId ? `${runId}.json` : LATEST);
  const entry = asEntry(await readJsonFile(filePath), runId ?? '');
  if (!entry) throw new Error(`broken run registry entry: ${filePath}`);
  return path.resolve(outputRoot, entry.outputDir);
}
