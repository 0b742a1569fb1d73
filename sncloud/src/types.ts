/** Server-assigned identifier, kept as a decimal string since real ids exceed 2^53. */
export type EntryId = string;

export const ROOT_ID: EntryId = '0';

type EntryBase = {
  id: EntryId;
  fileName: string;
  /** Parent directory id; `null` only for the root. */
  directoryId: EntryId | null;
};

export type FileEntry = EntryBase & {
  kind: 'file';
  size: number;
  md5?: string;
  updatedAt?: number;
};

export type DirectoryEntry = EntryBase & {
  kind: 'directory';
};

export type Entry = FileEntry | DirectoryEntry;

export const ROOT_DIRECTORY: DirectoryEntry = Object.freeze({
  kind: 'directory',
  id: ROOT_ID,
  fileName: '/',
  directoryId: null,
});

export interface DirectoryLister {
  list(directoryId: EntryId): Promise<Entry[]>;
}

export type JsonPayload = Record<string, unknown>;

export interface ApiTransport {
  call(endpoint: string, payload: JsonPayload): Promise<unknown>;
  download(url: string): Promise<Buffer>;
  upload(url: string, body: Buffer, headers: Record<string, string>): Promise<number>;
}
