import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { minimatch } from 'minimatch';
import { describeError } from '../common/errors';
import { Logger, getLogger } from '../common/logger';
import { PiiGuard } from '../guard/guard';

export interface ScanOptions {
  /** Glob matched against paths relative to the root. */
  pattern?: string;
  recursive?: boolean;
  /** Files larger than this are listed as skipped. */
  maxFileBytes?: number;
  logger?: Logger;
}

export interface ScannedFile {
  path: string;
  entities: number;
  byType: Record<string, number>;
}

export interface ScanResult {
  root: string;
  files: ScannedFile[];
  skipped: Array<{ path: string; reason: string }>;
  totals: { files: number; filesWithPii: number; entities: number };
}

const DEFAULT_PATTERN = '**/*';
const DEFAULT_MAX_FILE_BYTES = 1024 * 1024;
const SKIPPED_DIRECTORIES = new Set(['.git', 'node_modules']);

async function collectFiles(root: string, relativeDir: string, recursive: boolean, out: string[]): Promise<void> {
  const entries = await readdir(join(root, relativeDir), { withFileTypes: true });
  for (const entry of entries) {
    const relPath = relativeDir === '.' ? entry.name : `${relativeDir}/${entry.name}`;
    if (entry.isDirectory()) {
      if (recursive && !SKIPPED_DIRECTORIES.has(entry.name)) {
        await collectFiles(root, relPath, recursive, out);
      }
    } else if (entry.isFile()) {
      out.push(relPath);
    }
  }
}

export async function scanDirectory(root: string, guard: PiiGuard, options: ScanOptions = {}): Promise<ScanResult> {
  const pattern = options.pattern ?? DEFAULT_PATTERN;
  const maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  const logger = options.logger ?? getLogger('scan');
  const candidates: string[] = [];
  await collectFiles(root, '.', options.recursive ?? true, candidates);
  const paths = candidates
    .filter((path) => minimatch(path, pattern, { dot: true, matchBase: !pattern.includes('/') }))
    .sort((a, b) => a.localeCompare(b));

  const files: ScannedFile[] = [];
  const skipped: ScanResult['skipped'] = [];
  for (const path of paths) {
    const absolute = join(root, path);
    try {
      const info = await stat(absolute);
      if (info.size > maxFileBytes) {
        skipped.push({ path, reason: `larger than ${maxFileBytes} bytes` });
        continue;
      }
      const contents = await readFile(absolute, 'utf8');
      const byType: Record<string, number> = {};
      const matches = guard.detect(contents);
      for (const match of matches) {
        byType[match.entityType] = (byType[match.entityType] ?? 0) + 1;
      }
      files.push({ path, entities: matches.length, byType });
    } catch (error) {
      logger.warn('Failed to scan file', { path, error: describeError(error) });
      skipped.push({ path, reason: describeError(error) });
    }
  }

  const result: ScanResult = {
    root,
    files,
    skipped,
    totals: {
      files: files.length,
      filesWithPii: files.filter((file) => file.entities > 0).length,
      entities: files.reduce((sum, file) => sum + file.entities, 0),
    },
  };
  logger.info('Scan finished', { root, ...result.totals, skipped: skipped.length });
  return result;
}
