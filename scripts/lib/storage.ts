import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { FilesystemError } from './errors.js';
import type { AggregateRecord } from './types.js';

export const channelMessageSchema = z.object({
  id: z.number().int(),
  timestamp: z.string(),
  text: z.string(),
});

export const aggregateRecordSchema = z.object({
  summary: channelMessageSchema.nullable(),
  channels: z.record(z.string(), z.array(channelMessageSchema)),
});

export function todayKey(now: Date = new Date()): string {
  return now.toISOString().split('T')[0];
}

export function dayDirectory(saveDir: string, date: string): string {
  return join(saveDir, date);
}

export function recordPath(saveDir: string, date: string): string {
  return join(dayDirectory(saveDir, date), 'messages.json');
}

export function filteredPath(saveDir: string, date: string): string {
  return join(dayDirectory(saveDir, date), 'filtered.json');
}

export function reportPath(saveDir: string, date: string): string {
  return join(dayDirectory(saveDir, date), 'report.md');
}

export function ensureDirectory(dir: string): void {
  try {
    mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw new FilesystemError(`Cannot create directory ${dir}`, dir, error);
  }
}

/** Writes beside the target and renames, so readers never see a partial file. */
export function saveText(content: string, path: string, mode?: number): void {
  const tmpPath = `${path}.${process.pid}.tmp`;
  try {
    writeFileSync(tmpPath, content, { encoding: 'utf-8', mode });
    renameSync(tmpPath, path);
  } catch (error) {
    rmSync(tmpPath, { force: true });
    throw new FilesystemError(`Cannot write ${path}`, path, error);
  }
}

export function loadText(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new FilesystemError(`Cannot read ${path}`, path, error);
  }
}

export function saveRecord(record: AggregateRecord, path: string): void {
  saveText(JSON.stringify(record, null, 2), path);
}

export function loadRecord(path: string): AggregateRecord {
  const raw = loadText(path);

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new FilesystemError(`Invalid JSON in ${path}`, path, error);
  }

  const result = aggregateRecordSchema.safeParse(parsed);
  if (!result.success) {
    throw new FilesystemError(`Unexpected record shape in ${path}: ${result.error.message}`, path);
  }
  return result.data;
}

