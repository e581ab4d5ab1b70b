import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { MemoryFileStore, MemoryIdentityDirectory, MemoryStorage } from '../server/storage/memory.storage';
import { LocalFileStore, StorageError } from '../server/storage/providers/local';
import { parseStoredDeadline } from '../server/storage/domains/configuration.storage';
import { STUDENT, TEACHER, draftRecord } from './helpers/fixtures';

function newRecord(overrides: Parameters<typeof draftRecord>[0] = {}) {
  const { certId: _certId, updatedAt: _updatedAt, ...record } = draftRecord(overrides);
  return record;
}

describe('MemoryStorage', () => {
  let storage: MemoryStorage;

  beforeEach(() => {
    storage = new MemoryStorage();
  });

  it('updates only while the status matches', async () => {
    const certId = await storage.createCertificate(newRecord());

    const first = await storage.updateCertificate(certId, { status: 'submitted' }, 'draft');
    expect(first.ok && first.record.status).toBe('submitted');

    const second = await storage.updateCertificate(certId, { advisor: '王老师' }, 'draft');
    expect(second).toEqual({ ok: false, reason: 'conflict' });
    expect((await storage.getCertificate(certId))?.advisor).toBeNull();
  });

  it('reports a missing record separately from a conflict', async () => {
    expect(await storage.updateCertificate('missing', {}, 'draft')).toEqual({ ok: false, reason: 'not_found' });
  });

  it('returns copies that callers cannot mutate', async () => {
    const certId = await storage.createCertificate(newRecord());
    const copy = await storage.getCertificate(certId);
    if (!copy) throw new Error('record missing');

    copy.status = 'submitted';
    expect((await storage.getCertificate(certId))?.status).toBe('draft');
  });

  it('lists newest first with filters', async () => {
    const older = await storage.createCertificate(newRecord({ createdAt: new Date('2025-05-01T00:00:00Z') }));
    const newer = await storage.createCertificate(newRecord({ createdAt: new Date('2025-05-02T00:00:00Z') }));
    await storage.createCertificate(newRecord({ submitterAccountId: TEACHER.accountId, submitterRole: 'teacher' }));
    await storage.updateCertificate(older, { status: 'submitted' }, 'draft');

    const own = await storage.listCertificates({ submitterAccountId: STUDENT.accountId });
    expect(own.map(record => record.certId)).toEqual([newer, older]);

    const submitted = await storage.listCertificates({ status: 'submitted' });
    expect(submitted.map(record => record.certId)).toEqual([older]);
  });

  it('deletes records and reports whether one existed', async () => {
    const certId = await storage.createCertificate(newRecord());
    expect(await storage.deleteCertificate(certId)).toBe(true);
    expect(await storage.deleteCertificate(certId)).toBe(false);
  });

  it('deletes uploaded file records', async () => {
    await storage.createUploadedFile({
      fileId: 'file-9',
      ownerAccountId: STUDENT.accountId,
      originalName: 'award.png',
      storedPath: 'memory://2024010101001/file-9.png',
      mimeOrExtension: 'png',
      byteSize: 10,
    });

    expect(await storage.getUploadedFile('file-9')).toMatchObject({ originalName: 'award.png' });
    expect(await storage.deleteUploadedFile('file-9')).toBe(true);
    expect(await storage.getUploadedFile('file-9')).toBeUndefined();
    expect(await storage.deleteUploadedFile('file-9')).toBe(false);
  });

  it('keeps the deadline until it is cleared', async () => {
    expect(await storage.getDeadline()).toBeNull();
    const deadline = new Date('2025-06-30T16:00:00Z');
    await storage.setDeadline(deadline, 'admin');
    expect(await storage.getDeadline()).toEqual(deadline);
    await storage.setDeadline(null, 'admin');
    expect(await storage.getDeadline()).toBeNull();
  });
});

describe('MemoryIdentityDirectory', () => {
  it('finds added identities by account id', async () => {
    const directory = new MemoryIdentityDirectory([STUDENT]);
    directory.add(TEACHER);

    expect(await directory.getIdentity(TEACHER.accountId)).toEqual(TEACHER);
    expect(await directory.getIdentity('nobody')).toBeUndefined();
  });
});

describe('MemoryFileStore', () => {
  it('stores a copy of the bytes', async () => {
    const store = new MemoryFileStore();
    const data = Buffer.from('abc');

    expect(await store.save('a/b.png', data)).toBe('memory://a/b.png');
    data.write('x');
    expect(store.objects.get('a/b.png')?.toString()).toBe('abc');

    await store.remove('a/b.png');
    expect(store.objects.size).toBe(0);
  });
});

describe('LocalFileStore', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(path.join(tmpdir(), 'intake-files-'));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('writes under the base path and removes again', async () => {
    const store = new LocalFileStore(baseDir);
    const storedPath = await store.save('2024010101001/one.png', Buffer.from('png'));

    expect(storedPath).toBe(path.join(baseDir, '2024010101001', 'one.png'));
    expect((await readFile(storedPath)).toString()).toBe('png');

    await store.remove('2024010101001/one.png');
    await expect(readFile(storedPath)).rejects.toThrow();
    await expect(store.remove('2024010101001/one.png')).resolves.toBeUndefined();
  });

  it('refuses to overwrite an existing object', async () => {
    const store = new LocalFileStore(baseDir);
    await store.save('dup.png', Buffer.from('1'));

    const error = await store.save('dup.png', Buffer.from('2')).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({ key: 'dup.png' });
  });

  it('keeps keys inside the base path', async () => {
    const store = new LocalFileStore(baseDir);
    const storedPath = await store.save('../escape.png', Buffer.from('x'));

    expect(storedPath).toBe(path.join(baseDir, 'escape.png'));
  });
});

describe('parseStoredDeadline', () => {
  it('parses ISO timestamps with an offset', () => {
    expect(parseStoredDeadline('2025-07-01T00:00:00+08:00')).toEqual(new Date('2025-06-30T16:00:00.000Z'));
  });

  it('rejects values that are not timestamps', () => {
    expect(() => parseStoredDeadline('soon')).toThrow();
  });
});
