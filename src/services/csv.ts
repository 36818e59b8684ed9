import fs from 'fs/promises';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { WriteError } from '../errors.js';
import type { Column, OutputRow } from '../types/export.js';

const CsvGridSchema = z.array(z.array(z.string()));

export function resolveOutputPath(file: string, outputDir: string): string {
  return path.isAbsolute(file) ? file : path.resolve(outputDir, file);
}

/**
 * Writes to a sibling temp file and renames it into place, so a failed
 * write never leaves a truncated file at `target`.
 */
export async function writeFileAtomic(target: string, content: string): Promise<void> {
  const dir = path.dirname(target);
  const temp = path.join(dir, `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (error) {
    throw new WriteError(target, error);
  }
  try {
    await fs.writeFile(temp, content, 'utf-8');
    await fs.rename(temp, target);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw new WriteError(target, error);
  }
}

export function toCsv(rows: readonly OutputRow[], columns: readonly Column[]): string {
  const records = rows.map((row) => columns.map((column) => row[column] ?? ''));
  return stringify(records, { header: true, columns: [...columns] });
}

export async function writeCsv(
  rows: readonly OutputRow[],
  target: string,
  columns: readonly Column[]
): Promise<void> {
  await writeFileAtomic(target, toCsv(rows, columns));
}

/** Reads a CSV back as a grid of strings, header row included. */
export async function readCsv(file: string): Promise<string[][]> {
  const content = await fs.readFile(file, 'utf-8');
  const grid: unknown = parse(content, { relax_column_count: true });
  return CsvGridSchema.parse(grid);
}

export async function writeRawJson(payload: unknown, target: string): Promise<void> {
  await writeFileAtomic(target, `${JSON.stringify(payload, null, 2)}\n`);
}
