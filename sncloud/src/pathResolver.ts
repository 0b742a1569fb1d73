import type { Logger } from 'pino';

import { NotFoundError } from './errors.js';
import { silentLogger } from './logger.js';
import { ROOT_DIRECTORY, type DirectoryEntry, type DirectoryLister, type Entry } from './types.js';

export type ParsedPath = {
  /** Segments walked as directories, in order. */
  directories: string[];
  /** Final segment when it looks like a file name, otherwise undefined. */
  file?: string;
};

/**
 * Splits a slash-separated path. Empty and `.` segments are dropped, so `/a//b/` and
 * `a/b` are the same path. The last segment is a file exactly when it contains a `.`;
 * this is purely syntactic, so a directory named `archive.old` is treated as a file.
 */
export function parsePath(path: string): ParsedPath {
  const segments = path.split('/').filter((segment) => segment.length > 0 && segment !== '.');
  const last = segments[segments.length - 1];
  if (last !== undefined && last.includes('.')) {
    return { directories: segments.slice(0, -1), file: last };
  }
  return { directories: segments };
}

function joinPrefix(segments: readonly string[]): string {
  return `/${segments.join('/')}`;
}

/**
 * Walks a path one directory listing at a time. Nothing is cached: every call
 * re-lists from the service, and the first exact (case-sensitive) name match in
 * listing order wins, so duplicate sibling names resolve to whichever the service
 * lists first.
 */
export class PathResolver {
  constructor(
    private readonly lister: DirectoryLister,
    private readonly logger: Logger = silentLogger(),
  ) {}

  async resolve(path: string): Promise<Entry> {
    const { directories, file } = parsePath(path);
    if (directories.length === 0 && file === undefined) {
      return ROOT_DIRECTORY;
    }

    let cursor: DirectoryEntry = ROOT_DIRECTORY;
    for (const [index, segment] of directories.entries()) {
      const children = await this.lister.list(cursor.id);
      this.logger.debug({ segment, directoryId: cursor.id }, 'resolving segment');
      const match = children.find(
        (child): child is DirectoryEntry => child.kind === 'directory' && child.fileName === segment,
      );
      if (!match) {
        throw new NotFoundError(segment, joinPrefix(directories.slice(0, index + 1)), 'directory');
      }
      cursor = match;
    }

    if (file === undefined) {
      return cursor;
    }

    const children = await this.lister.list(cursor.id);
    this.logger.debug({ segment: file, directoryId: cursor.id }, 'resolving final segment');
    const match = children.find((child) => child.fileName === file);
    if (!match) {
      throw new NotFoundError(file, joinPrefix(directories), 'file');
    }
    return match;
  }
}
