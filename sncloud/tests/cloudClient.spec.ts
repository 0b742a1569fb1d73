import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { CloudClient } from '../src/cloudClient.js';
import { ENDPOINTS } from '../src/endpoints.js';
import { AuthenticationFailedError, AuthRequiredError, InvalidArgumentError, RemoteError } from '../src/errors.js';
import {
  authenticatedClient,
  FakeCloud,
  seedTree,
  TEST_EMAIL,
  TEST_PASSWORD,
  TEST_TOKEN,
  UPLOAD_URL,
} from './fakeCloud.js';

describe('CloudClient', () => {
  let cloud: FakeCloud;
  let client: CloudClient;
  let workDir: string;

  beforeEach(async () => {
    cloud = new FakeCloud();
    seedTree(cloud);
    client = authenticatedClient(cloud);
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sncloud-client-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe('login', () => {
    it('sends the hashed password and keeps the token', async () => {
      const anonymous = new CloudClient(cloud);

      expect(await anonymous.login(TEST_EMAIL, TEST_PASSWORD)).toBe(TEST_TOKEN);
      expect(anonymous.session.accessToken).toBe(TEST_TOKEN);
      expect(cloud.callsTo(ENDPOINTS.randomCode)).toEqual([{ countryCode: '1', account: TEST_EMAIL }]);
      expect(cloud.callsTo(ENDPOINTS.login)).toEqual([
        {
          countryCode: '1',
          account: TEST_EMAIL,
          password: '080e18fbd21544ff0fb583ab8a10d984e90dc31b3873d5e3ab8649e24119f957',
          browser: 'Chrome134',
          equipment: '1',
          loginMethod: '1',
          timestamp: 1700000000000,
          language: 'en',
        },
      ]);
    });

    it('reports rejected credentials', async () => {
      const anonymous = new CloudClient(cloud);

      await expect(anonymous.login(TEST_EMAIL, 'wrong-password')).rejects.toThrow(
        new AuthenticationFailedError('Invalid account or password'),
      );
      expect(anonymous.authenticated).toBe(false);
    });
  });

  describe('ls', () => {
    it('lists the root by default, newest first', async () => {
      const names = (await client.ls()).map((entry) => entry.fileName);

      expect(names).toEqual(['top.txt', 'Docs']);
    });

    it('lists a directory given by path', async () => {
      const names = (await client.ls('/Docs')).map((entry) => entry.fileName);

      expect(names).toEqual(['archive.old', 'README', 'Sub', 'report.pdf']);
    });

    it('refuses to list a file', async () => {
      await expect(client.ls('/Docs/report.pdf')).rejects.toThrow(InvalidArgumentError);
    });

    it('requires authentication', async () => {
      await expect(new CloudClient(cloud).ls()).rejects.toThrow('Must be authenticated to list files');
    });
  });

  describe('get', () => {
    it('downloads a file named after the entry', async () => {
      const target = await client.get('/Docs/report.pdf', workDir);

      expect(target).toBe(path.join(workDir, 'report.pdf'));
      expect(await fs.readFile(target, 'utf8')).toBe('content of https://files.test/42');
      expect(cloud.callsTo(ENDPOINTS.downloadUrl)).toEqual([{ id: '42', type: 0 }]);
    });

    it('refuses directories', async () => {
      await expect(client.get('/Docs', workDir)).rejects.toThrow('Docs is a directory');
      expect(cloud.downloads).toHaveLength(0);
    });

    it('converts a note to PDF, replacing its extension', async () => {
      const target = await client.getPdf('/Docs/Sub/deep.note', workDir, [1, 3]);

      expect(target).toBe(path.join(workDir, 'deep.pdf'));
      expect(await fs.readFile(target, 'utf8')).toBe('content of https://files.test/43.pdf');
      expect(cloud.callsTo(ENDPOINTS.noteToPdf)).toEqual([{ id: '43', pageNoList: [1, 3] }]);
    });

    it('writes one PNG per page, every page by default', async () => {
      const targets = await client.getPng('/Docs/Sub/deep.note', workDir);

      expect(targets).toEqual([path.join(workDir, 'deep.note_1.png'), path.join(workDir, 'deep.note_2.png')]);
      expect(await fs.readFile(targets[1] ?? '', 'utf8')).toBe('content of https://files.test/43-2.png');
    });

    it('writes only the requested PNG pages', async () => {
      const targets = await client.getPng('/Docs/Sub/deep.note', workDir, [2]);

      expect(targets).toEqual([path.join(workDir, 'deep.note_2.png')]);
      expect(cloud.downloads).toEqual(['https://files.test/43-2.png']);
    });

    it('rejects unknown PNG pages before downloading anything', async () => {
      await expect(client.getPng('/Docs/Sub/deep.note', workDir, [1, 5])).rejects.toThrow(
        'Page 5 is not available for deep.note',
      );
      expect(cloud.downloads).toHaveLength(0);
    });
  });

  describe('mkdir', () => {
    it('creates a folder under the resolved parent', async () => {
      expect(await client.mkdir('Drafts', '/Docs')).toBe('Drafts');
      expect(cloud.callsTo(ENDPOINTS.createFolder)).toEqual([{ directoryId: '5', fileName: 'Drafts' }]);
      expect((await client.ls('/Docs'))[0]).toMatchObject({ kind: 'directory', fileName: 'Drafts' });
    });

    it('creates in the root without resolving anything', async () => {
      await client.mkdir('Inbox');

      expect(cloud.callsTo(ENDPOINTS.createFolder)).toEqual([{ directoryId: '0', fileName: 'Inbox' }]);
      expect(cloud.listedDirectories()).toEqual([]);
    });

    it('reports a rejected creation', async () => {
      cloud.respond(ENDPOINTS.createFolder, { success: false, errorMsg: 'Folder already exists' });

      await expect(client.mkdir('Docs')).rejects.toThrow(new RemoteError('Folder already exists'));
    });
  });

  describe('put', () => {
    it('applies, uploads to storage and finishes', async () => {
      const localFile = path.join(workDir, 'upload.note');
      await fs.writeFile(localFile, 'note-bytes');

      expect(await client.put(localFile, '/Docs')).toBe('upload.note');

      expect(cloud.callsTo(ENDPOINTS.uploadApply)).toEqual([
        { directoryId: '5', fileName: 'upload.note', md5: '37f26c32dce3ca66694944c450257b56', size: 10 },
      ]);
      expect(cloud.uploads).toHaveLength(1);
      expect(cloud.uploads[0]?.url).toBe(UPLOAD_URL);
      expect(cloud.uploads[0]?.body.toString('utf8')).toBe('note-bytes');
      expect(cloud.uploads[0]?.headers).toEqual({
        Authorization: 'AWS4 test-signature',
        'x-amz-date': '20260101T000000Z',
        'x-amz-content-sha256': 'UNSIGNED-PAYLOAD',
      });
      expect(cloud.callsTo(ENDPOINTS.uploadFinish)).toEqual([
        {
          directoryId: '5',
          fileName: 'upload.note',
          fileSize: 10,
          innerName: 'inner-abc123.note',
          md5: '37f26c32dce3ca66694944c450257b56',
        },
      ]);
    });

    it('does not finish when storage rejects the bytes', async () => {
      const localFile = path.join(workDir, 'upload.note');
      await fs.writeFile(localFile, 'note-bytes');
      cloud.uploadStatus = 403;

      await expect(client.put(localFile)).rejects.toThrow('Storage rejected upload.note with HTTP 403');
      expect(cloud.callsTo(ENDPOINTS.uploadFinish)).toHaveLength(0);
    });

    it('reports a rejected application', async () => {
      const localFile = path.join(workDir, 'upload.note');
      await fs.writeFile(localFile, 'note-bytes');
      cloud.respond(ENDPOINTS.uploadApply, { success: false, errorMsg: 'Insufficient storage' });

      await expect(client.put(localFile)).rejects.toThrow(new RemoteError('Insufficient storage'));
      expect(cloud.uploads).toHaveLength(0);
    });

    it('rejects a missing local file', async () => {
      await expect(client.put(path.join(workDir, 'absent.note'))).rejects.toThrow(InvalidArgumentError);
      expect(cloud.calls).toHaveLength(0);
    });
  });

  describe('delete', () => {
    it('deletes a batch sharing one directory in a single call', async () => {
      expect(await client.delete(['/Docs/report.pdf', '/Docs/Sub'])).toBe('report.pdf, Sub');
      expect(cloud.callsTo(ENDPOINTS.delete)).toEqual([{ directoryId: '5', idList: ['42', '6'] }]);
    });

    it('accepts a single item', async () => {
      expect(await client.delete('/top.txt')).toBe('top.txt');
      expect(cloud.callsTo(ENDPOINTS.delete)).toEqual([{ directoryId: '0', idList: ['50'] }]);
    });

    it('refuses items from different directories before deleting anything', async () => {
      await expect(client.delete(['/top.txt', '/Docs/report.pdf'])).rejects.toThrow(
        new InvalidArgumentError('Files are not in the same directory: report.pdf'),
      );
      expect(cloud.callsTo(ENDPOINTS.delete)).toHaveLength(0);
    });

    it('refuses the root and empty batches', async () => {
      await expect(client.delete('/')).rejects.toThrow('The root directory cannot be deleted');
      await expect(client.delete([])).rejects.toThrow('Nothing to delete');
      expect(cloud.callsTo(ENDPOINTS.delete)).toHaveLength(0);
    });

    it('requires authentication', async () => {
      await expect(new CloudClient(cloud).delete('/top.txt')).rejects.toThrow(AuthRequiredError);
    });
  });

  it('looks up entries by path', async () => {
    expect(await client.stat('/Docs/Sub/deep.note')).toMatchObject({ kind: 'file', id: '43', directoryId: '6' });
  });
});
