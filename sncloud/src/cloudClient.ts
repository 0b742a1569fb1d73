import fs from 'fs/promises';
import path from 'path';

import type { Logger } from 'pino';

import { RemoteDirectoryLister } from './directoryLister.js';
import { ENDPOINTS } from './endpoints.js';
import { AuthenticationFailedError, InvalidArgumentError, RemoteError } from './errors.js';
import { md5Hex, passwordDigest } from './hashing.js';
import { ItemNormalizer, type ItemInput } from './itemNormalizer.js';
import { silentLogger } from './logger.js';
import { PathResolver } from './pathResolver.js';
import {
  ensureSuccess,
  loginResponseSchema,
  parseResponse,
  pngResponseSchema,
  randomCodeResponseSchema,
  statusResponseSchema,
  uploadApplyResponseSchema,
  urlResponseSchema,
} from './schemas.js';
import { Session } from './session.js';
import type { ApiTransport, Entry, FileEntry } from './types.js';

export type CloudClientOptions = {
  countryCode?: string;
  logger?: Logger;
};

export class CloudClient {
  readonly lister: RemoteDirectoryLister;
  readonly resolver: PathResolver;
  readonly items: ItemNormalizer;
  private readonly countryCode: string;
  private readonly logger: Logger;

  constructor(
    private readonly transport: ApiTransport,
    readonly session: Session = new Session(),
    options: CloudClientOptions = {},
  ) {
    this.countryCode = options.countryCode ?? '1';
    this.logger = options.logger ?? silentLogger();
    this.lister = new RemoteDirectoryLister(transport, session, this.logger);
    this.resolver = new PathResolver(this.lister, this.logger);
    this.items = new ItemNormalizer(this.resolver, this.lister);
  }

  get authenticated(): boolean {
    return this.session.accessToken !== undefined;
  }

  useToken(token: string | undefined): void {
    this.session.accessToken = token;
  }

  async login(email: string, password: string): Promise<string> {
    const codeBody = parseResponse(
      randomCodeResponseSchema,
      await this.transport.call(ENDPOINTS.randomCode, { countryCode: this.countryCode, account: email }),
      ENDPOINTS.randomCode,
    );
    ensureSuccess(codeBody, 'Failed to get random code');
    if (!codeBody.randomCode || codeBody.timestamp === undefined || codeBody.timestamp === null) {
      throw new RemoteError('Failed to get random code');
    }

    const loginBody = parseResponse(
      loginResponseSchema,
      await this.transport.call(ENDPOINTS.login, {
        countryCode: this.countryCode,
        account: email,
        password: passwordDigest(password, codeBody.randomCode),
        browser: 'Chrome134',
        equipment: '1',
        loginMethod: '1',
        timestamp: codeBody.timestamp,
        language: 'en',
      }),
      ENDPOINTS.login,
    );
    if (loginBody.success === false || !loginBody.token) {
      throw new AuthenticationFailedError(loginBody.errorMsg || 'Login rejected');
    }

    this.session.accessToken = loginBody.token;
    this.logger.info({ account: email }, 'logged in');
    return loginBody.token;
  }

  async ls(directory?: ItemInput): Promise<Entry[]> {
    this.session.requireAccessToken('list files');
    return this.lister.list(await this.items.directoryId(directory));
  }

  async stat(item: ItemInput): Promise<Entry> {
    this.session.requireAccessToken('look up files');
    return this.items.entry(item);
  }

  async get(item: ItemInput, outputDir = '.'): Promise<string> {
    const file = await this.resolveFile(item, 'download files');
    const body = parseResponse(
      urlResponseSchema,
      await this.transport.call(ENDPOINTS.downloadUrl, { id: file.id, type: 0 }),
      ENDPOINTS.downloadUrl,
    );
    ensureSuccess(body, `Failed to get download URL for ${file.fileName}`);
    if (!body.url) {
      throw new RemoteError(`No download URL for ${file.fileName}`);
    }

    const target = path.join(outputDir, file.fileName);
    await fs.writeFile(target, await this.transport.download(body.url));
    this.logger.info({ id: file.id, target }, 'downloaded file');
    return target;
  }

  async getPdf(item: ItemInput, outputDir = '.', pageNumbers: number[] = []): Promise<string> {
    const file = await this.resolveFile(item, 'download files');
    const body = parseResponse(
      urlResponseSchema,
      await this.transport.call(ENDPOINTS.noteToPdf, { id: file.id, pageNoList: pageNumbers }),
      ENDPOINTS.noteToPdf,
    );
    ensureSuccess(body, `Failed to convert ${file.fileName} to PDF`);
    if (!body.url) {
      throw new RemoteError(`No PDF URL for ${file.fileName}`);
    }

    const target = path.join(outputDir, `${stripNoteExtension(file.fileName)}.pdf`);
    await fs.writeFile(target, await this.transport.download(body.url));
    this.logger.info({ id: file.id, target }, 'downloaded pdf');
    return target;
  }

  async getPng(item: ItemInput, outputDir = '.', pageNumbers: number[] = []): Promise<string[]> {
    const file = await this.resolveFile(item, 'download files');
    const body = parseResponse(
      pngResponseSchema,
      await this.transport.call(ENDPOINTS.noteToPng, { id: file.id }),
      ENDPOINTS.noteToPng,
    );
    ensureSuccess(body, `Failed to convert ${file.fileName} to PNG`);

    const pages = new Map(body.pngPageVOList.map((page): [number, string] => [page.pageNo, page.url]));
    const wanted = (pageNumbers.length > 0 ? pageNumbers : Array.from(pages.keys())).map((page) => {
      const url = pages.get(page);
      if (url === undefined) {
        throw new InvalidArgumentError(`Page ${page} is not available for ${file.fileName}`);
      }
      return { page, url };
    });

    const written: string[] = [];
    for (const { page, url } of wanted) {
      const target = path.join(outputDir, `${file.fileName}_${page}.png`);
      await fs.writeFile(target, await this.transport.download(url));
      written.push(target);
    }
    this.logger.info({ id: file.id, pages: written.length }, 'downloaded png pages');
    return written;
  }

  async mkdir(folderName: string, parent?: ItemInput): Promise<string> {
    this.session.requireAccessToken('create folders');
    if (folderName.length === 0 || folderName.includes('/')) {
      throw new InvalidArgumentError(`Invalid folder name: ${JSON.stringify(folderName)}`);
    }
    const directoryId = await this.items.directoryId(parent);

    const body = parseResponse(
      statusResponseSchema,
      await this.transport.call(ENDPOINTS.createFolder, { directoryId, fileName: folderName }),
      ENDPOINTS.createFolder,
    );
    ensureSuccess(body, `Failed to create folder ${folderName}`);
    this.logger.info({ directoryId, folderName }, 'created folder');
    return folderName;
  }

  async put(localFile: string, parent?: ItemInput): Promise<string> {
    this.session.requireAccessToken('upload files');

    let data: Buffer;
    try {
      data = await fs.readFile(localFile);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new InvalidArgumentError(`File not found: ${localFile}`);
      }
      throw error;
    }
    const fileName = path.basename(localFile);
    const md5 = md5Hex(data);
    const directoryId = await this.items.directoryId(parent);

    const apply = parseResponse(
      uploadApplyResponseSchema,
      await this.transport.call(ENDPOINTS.uploadApply, { directoryId, fileName, md5, size: data.length }),
      ENDPOINTS.uploadApply,
    );
    ensureSuccess(apply, `Upload of ${fileName} was rejected`);
    if (!apply.url || !apply.s3Authorization || !apply.xamzDate) {
      throw new RemoteError(`Upload of ${fileName} was not granted a storage URL`);
    }

    const status = await this.transport.upload(apply.url, data, {
      Authorization: apply.s3Authorization,
      'x-amz-date': apply.xamzDate,
      'x-amz-content-sha256': 'UNSIGNED-PAYLOAD',
    });
    if (status !== 200) {
      throw new RemoteError(`Storage rejected ${fileName} with HTTP ${status}`);
    }

    const finish = parseResponse(
      statusResponseSchema,
      await this.transport.call(ENDPOINTS.uploadFinish, {
        directoryId,
        fileName,
        fileSize: data.length,
        innerName: innerNameOf(apply.url),
        md5,
      }),
      ENDPOINTS.uploadFinish,
    );
    ensureSuccess(finish, `Failed to finish upload of ${fileName}`);
    this.logger.info({ directoryId, fileName, size: data.length }, 'uploaded file');
    return fileName;
  }

  /**
   * Deletes one item or a batch. The remote call is scoped to a single directory, so
   * every item must share a parent; this is checked before anything is deleted.
   */
  async delete(items: ItemInput | ItemInput[]): Promise<string> {
    this.session.requireAccessToken('delete files');
    const inputs = Array.isArray(items) ? items : [items];
    if (inputs.length === 0) {
      throw new InvalidArgumentError('Nothing to delete');
    }

    const entries: Entry[] = [];
    for (const input of inputs) {
      entries.push(await this.items.entry(input));
    }

    const [first] = entries;
    const directoryId = first?.directoryId;
    if (first === undefined || directoryId === null || directoryId === undefined) {
      throw new InvalidArgumentError('The root directory cannot be deleted');
    }
    for (const entry of entries) {
      if (entry.directoryId !== directoryId) {
        throw new InvalidArgumentError(`Files are not in the same directory: ${entry.fileName}`);
      }
    }

    const body = parseResponse(
      statusResponseSchema,
      await this.transport.call(ENDPOINTS.delete, { directoryId, idList: entries.map((entry) => entry.id) }),
      ENDPOINTS.delete,
    );
    ensureSuccess(body, 'Failed to delete');
    const names = entries.map((entry) => entry.fileName).join(', ');
    this.logger.info({ directoryId, count: entries.length }, 'deleted items');
    return names;
  }

  private async resolveFile(item: ItemInput, action: string): Promise<FileEntry> {
    this.session.requireAccessToken(action);
    const entry = await this.items.entry(item);
    switch (entry.kind) {
      case 'file':
        return entry;
      case 'directory':
        throw new InvalidArgumentError(`${entry.fileName} is a directory`);
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function stripNoteExtension(fileName: string): string {
  return fileName.endsWith('.note') ? fileName.slice(0, -'.note'.length) : fileName;
}

function innerNameOf(signedUrl: string): string {
  const { pathname } = new URL(signedUrl);
  return path.posix.basename(pathname);
}
