/**
 * Resource stores give the loader and exporter a narrow, synchronous view of a course
 * directory. Paths are relative and `/`-separated.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { dirname, join, posix } from 'path';
import { randomBytes } from 'crypto';
import { ResourceNotFoundError } from '../../shared/src/errors.js';
import { isWithinDirectory } from '../../../config/olx.js';

export interface ResourceStore {
  exists(path: string): boolean;
  readText(path: string): string;
  /** Replaces the whole file in one operation. */
  writeText(path: string, content: string): void;
  makedirs(path: string): void;
}

function normalizeResourcePath(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, '/')).replace(/^\/+/, '');
  if (normalized === '..' || normalized.startsWith('../')) {
    throw new Error(`Resource path escapes the store root: ${path}`);
  }
  return normalized === '.' ? '' : normalized;
}

/**
 * In-process store, used by tests and by hosts that keep course content in memory.
 */
export class MemoryResourceStore implements ResourceStore {
  private readonly files = new Map<string, string>();
  private readonly directories = new Set<string>();

  constructor(files: Record<string, string> = {}) {
    for (const [path, content] of Object.entries(files)) {
      this.writeText(path, content);
    }
  }

  exists(path: string): boolean {
    const key = normalizeResourcePath(path);
    return this.files.has(key) || this.directories.has(key);
  }

  readText(path: string): string {
    const content = this.files.get(normalizeResourcePath(path));
    if (content === undefined) {
      throw new ResourceNotFoundError(path);
    }
    return content;
  }

  writeText(path: string, content: string): void {
    const key = normalizeResourcePath(path);
    this.makedirs(posix.dirname(key));
    this.files.set(key, content);
  }

  makedirs(path: string): void {
    let current = normalizeResourcePath(path);
    while (current !== '' && current !== '.') {
      this.directories.add(current);
      current = posix.dirname(current);
    }
  }

  listFiles(): string[] {
    return Array.from(this.files.keys()).sort();
  }
}

/**
 * Store rooted at a directory on disk. Writes go to a temporary sibling first and are
 * renamed into place, so an interrupted export never leaves a partial file behind.
 */
export class DiskResourceStore implements ResourceStore {
  constructor(private readonly rootDir: string) {}

  private resolve(path: string): string {
    const absolute = join(this.rootDir, normalizeResourcePath(path));
    if (!isWithinDirectory(absolute, this.rootDir)) {
      throw new Error(`Resource path escapes the store root: ${path}`);
    }
    return absolute;
  }

  exists(path: string): boolean {
    return existsSync(this.resolve(path));
  }

  readText(path: string): string {
    const absolute = this.resolve(path);
    if (!existsSync(absolute)) {
      throw new ResourceNotFoundError(path);
    }
    return readFileSync(absolute, 'utf-8');
  }

  writeText(path: string, content: string): void {
    const absolute = this.resolve(path);
    mkdirSync(dirname(absolute), { recursive: true });

    const tempPath = `${absolute}.${randomBytes(6).toString('hex')}.tmp`;
    try {
      writeFileSync(tempPath, content, 'utf-8');
      renameSync(tempPath, absolute);
    } catch (error) {
      if (existsSync(tempPath)) {
        unlinkSync(tempPath);
      }
      throw error;
    }
  }

  makedirs(path: string): void {
    mkdirSync(this.resolve(path), { recursive: true });
  }
}
