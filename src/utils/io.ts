/**
 * File I/O utilities
 */

import { mkdir, writeFile, readFile, access } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import { constants } from 'fs';
import type { SourceFile } from '../domain/types.js';

export async function ensureDir(dir_path: string): Promise<void> {
  await mkdir(dir_path, { recursive: true });
}

export async function writeJson(file_path: string, data: unknown): Promise<void> {
  await ensureDir(dirname(file_path));
  await writeFile(file_path, JSON.stringify(data, null, 2), 'utf-8');
}

export async function readJson<T>(file_path: string): Promise<T> {
  const content = await readFile(file_path, 'utf-8');
  return JSON.parse(content) as T;
}

export async function readSourceFile(file_path: string): Promise<SourceFile> {
  const content = await readFile(file_path, 'utf-8');
  return { name: basename(file_path), content };
}

export async function fileExists(file_path: string): Promise<boolean> {
  try {
    await access(file_path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export function getOutputDir(base?: string): string {
  return base ? resolve(base) : join(process.cwd(), 'out');
}
