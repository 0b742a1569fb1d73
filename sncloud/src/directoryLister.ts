import type { Logger } from 'pino';

import { ENDPOINTS } from './endpoints.js';
import { ensureSuccess, listResponseSchema, parseResponse, toEntry } from './schemas.js';
import type { Session } from './session.js';
import type { ApiTransport, DirectoryLister, Entry, EntryId } from './types.js';

/** Only the first page is fetched; directories with more children are truncated. */
export const LIST_PAGE_SIZE = 100;

export class RemoteDirectoryLister implements DirectoryLister {
  constructor(
    private readonly transport: ApiTransport,
    private readonly session: Session,
    private readonly logger: Logger,
  ) {}

  async list(directoryId: EntryId): Promise<Entry[]> {
    this.session.requireAccessToken('list files');

    const data = await this.transport.call(ENDPOINTS.list, {
      directoryId,
      pageNo: 1,
      pageSize: LIST_PAGE_SIZE,
      order: 'time',
      sequence: 'desc',
    });
    const body = parseResponse(listResponseSchema, data, ENDPOINTS.list);
    ensureSuccess(body, `Failed to list directory ${directoryId}`);

    const entries = body.userFileVOList.map(toEntry);
    this.logger.debug({ directoryId, count: entries.length }, 'listed directory');
    return entries;
  }
}
