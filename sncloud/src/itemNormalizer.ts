import { InvalidArgumentError, RemoteError } from './errors.js';
import type { PathResolver } from './pathResolver.js';
import { ROOT_DIRECTORY, ROOT_ID, type DirectoryEntry, type DirectoryLister, type Entry, type EntryId } from './types.js';

export type ItemRef =
  | { kind: 'root' }
  | { kind: 'id'; id: EntryId }
  | { kind: 'entry'; entry: Entry }
  | { kind: 'path'; path: string };

/** What callers may pass wherever a remote item is expected. */
export type ItemInput = ItemRef | Entry | string | number | null | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isEntry(value: unknown): value is Entry {
  return (
    isRecord(value) &&
    (value.kind === 'file' || value.kind === 'directory') &&
    typeof value.id === 'string' &&
    typeof value.fileName === 'string' &&
    (typeof value.directoryId === 'string' || value.directoryId === null)
  );
}

function isItemRef(value: unknown): value is ItemRef {
  if (!isRecord(value)) {
    return false;
  }
  switch (value.kind) {
    case 'root':
      return true;
    case 'id':
      return typeof value.id === 'string' && /^\d+$/.test(value.id);
    case 'entry':
      return isEntry(value.entry);
    case 'path':
      return typeof value.path === 'string';
    default:
      return false;
  }
}

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

/** Classifies caller input once; nothing downstream inspects the raw value again. */
export function toItemRef(input: unknown): ItemRef {
  if (input === null || input === undefined || input === 0 || input === '/') {
    return { kind: 'root' };
  }
  if (typeof input === 'number') {
    if (!Number.isSafeInteger(input) || input < 0) {
      throw new InvalidArgumentError(`Invalid item id: ${input}`);
    }
    return { kind: 'id', id: String(input) };
  }
  if (typeof input === 'string') {
    return { kind: 'path', path: input };
  }
  if (isEntry(input)) {
    return { kind: 'entry', entry: input };
  }
  if (isItemRef(input)) {
    return input;
  }
  throw new InvalidArgumentError(`Expected a path, entry, id or root, got ${describe(input)}`);
}

export class ItemNormalizer {
  constructor(
    private readonly resolver: PathResolver,
    private readonly lister: DirectoryLister,
  ) {}

  /** Identifier of any item; only path strings cost remote calls. */
  async normalize(input: ItemInput): Promise<EntryId> {
    const ref = toItemRef(input);
    switch (ref.kind) {
      case 'root':
        return ROOT_ID;
      case 'id':
        return ref.id;
      case 'entry':
        return ref.entry.id;
      case 'path':
        return (await this.resolver.resolve(ref.path)).id;
    }
  }

  /** Like `normalize`, but a resolved entry must be a directory. */
  async directoryId(input: ItemInput): Promise<EntryId> {
    const ref = toItemRef(input);
    switch (ref.kind) {
      case 'root':
        return ROOT_ID;
      case 'id':
        return ref.id;
      case 'entry':
        return requireDirectory(ref.entry).id;
      case 'path':
        return requireDirectory(await this.resolver.resolve(ref.path)).id;
    }
  }

  async entry(input: ItemInput): Promise<Entry> {
    const ref = toItemRef(input);
    switch (ref.kind) {
      case 'root':
        return this.rootEntry();
      case 'id':
        throw new InvalidArgumentError(`Item id ${ref.id} cannot be expanded into an entry; pass a path or entry`);
      case 'entry':
        return ref.entry;
      case 'path':
        return this.resolver.resolve(ref.path);
    }
  }

  /**
   * The service exposes no root entry, so the root is derived from the parent of the
   * first root child. Path resolution uses the synthetic root directly; both must
   * agree on id 0.
   */
  async rootEntry(): Promise<DirectoryEntry> {
    const [first] = await this.lister.list(ROOT_ID);
    if (first && first.directoryId !== ROOT_ID) {
      throw new RemoteError(`Root listing reported parent ${first.directoryId ?? 'none'}, expected ${ROOT_ID}`);
    }
    return ROOT_DIRECTORY;
  }
}

function requireDirectory(entry: Entry): DirectoryEntry {
  switch (entry.kind) {
    case 'directory':
      return entry;
    case 'file':
      throw new InvalidArgumentError(`${entry.fileName} is not a directory`);
  }
}
