import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import fsPromises from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { eq } from 'drizzle-orm';
import type { Database } from '../db/index.js';
import { bundleFiles, bundles, files } from '../db/schema/index.js';
import { createTestDatabase, insertUser, resetDatabase } from '../test-utils/database.js';
import type { TestDatabase } from '../test-utils/database.js';
import { FileService } from './file.service.js';
import type { UploadFileInput } from './file.service.js';
import { StorageService } from './storage.service.js';

let testDb: TestDatabase;
let db: Database;
let tmpDir: string;
let storage: StorageService;
let service: FileService;
let owner: { id: string };
let stranger: { id: string };

function upload(overrides: Partial<UploadFileInput> = {}): UploadFileInput {
  return {
    filename: 'invoice.pdf',
    content: Buffer.from('%PDF-1.4 test'),
    isPublic: false,
    transactionNumber: 'TX-100',
    ...overrides,
  };
}

async function storedBlobs(): Promise<string[]> {
  return fsPromises.readdir(tmpDir);
}

beforeAll(async () => {
  testDb = await createTestDatabase();
  db = testDb.db;
});

afterAll(async () => {
  await testDb.close();
});

beforeEach(async () => {
  await resetDatabase(db);
  tmpDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), 'sharebox-files-test-'));
  storage = new StorageService(tmpDir);
  service = new FileService(db, storage, { allowedExtensions: ['pdf', 'png', 'txt', 'docx'] });
  owner = await insertUser(db, 'owner');
  stranger = await insertUser(db, 'stranger');
});

afterEach(async () => {
  await fsPromises.rm(tmpDir, { recursive: true, force: true });
});

describe('FileService.uploadFile', () => {
  it('should store the blob and record the row with a zero counter', async () => {
    const row = await service.uploadFile(owner.id, upload());

    expect(row.originalFilename).toBe('invoice.pdf');
    expect(row.userId).toBe(owner.id);
    expect(row.fileType).toBe('pdf');
    expect(row.sizeBytes).toBe(13);
    expect(row.downloadCount).toBe(0);
    expect(row.transactionNumber).toBe('TX-100');
    expect(row.storageName).toMatch(/^[0-9a-f]{16}_invoice\.pdf$/);
    expect(await storage.retrieve(row.storageName)).toEqual(Buffer.from('%PDF-1.4 test'));
  });

  it('should keep only the last path component of the client filename', async () => {
    const row = await service.uploadFile(owner.id, upload({ filename: 'C:\\scans\\invoice.pdf' }));
    expect(row.originalFilename).toBe('invoice.pdf');
  });

  it('should issue pairwise distinct share tokens', async () => {
    const rows = await Promise.all(
      Array.from({ length: 5 }, (_, i) =>
        service.uploadFile(owner.id, upload({ filename: `doc-${i}.txt` })),
      ),
    );
    const tokens = new Set(rows.map((row) => row.shareToken));
    expect(tokens.size).toBe(5);
    for (const token of tokens) {
      expect(token).toMatch(/^[A-Za-z0-9_-]{22}$/);
    }
  });

  it('should reject an empty filename before writing anything', async () => {
    await expect(service.uploadFile(owner.id, upload({ filename: '  ' }))).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      field: 'file',
    });
    expect(await storedBlobs()).toEqual([]);
  });

  it('should reject an extension outside the allow-list', async () => {
    await expect(
      service.uploadFile(owner.id, upload({ filename: 'setup.exe' })),
    ).rejects.toMatchObject({ code: 'UNSUPPORTED_TYPE', message: 'File type not allowed: exe' });
    expect(await storedBlobs()).toEqual([]);
  });

  it('should reject a 300-character filename before writing anything', async () => {
    await expect(
      service.uploadFile(owner.id, upload({ filename: `${'a'.repeat(300)}.txt` })),
    ).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      field: 'file',
      message: 'File name must be at most 255 characters',
    });
    expect(await storedBlobs()).toEqual([]);
    expect(await db.select().from(files)).toEqual([]);
  });

  it('should keep a 255-character multi-byte filename and shorten only its storage name', async () => {
    const filename = `${'é'.repeat(251)}.txt`;
    const row = await service.uploadFile(owner.id, upload({ filename }));

    expect(row.originalFilename).toBe(filename);
    expect(row.storageName).toMatch(/^[0-9a-f]{16}_é{117}\.txt$/);
    expect(Buffer.byteLength(row.storageName)).toBe(255);
    expect(await storedBlobs()).toEqual([row.storageName]);
  });

  it('should reject a blank transaction number', async () => {
    await expect(
      service.uploadFile(owner.id, upload({ transactionNumber: '   ' })),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', field: 'transactionNumber' });
    expect(await storedBlobs()).toEqual([]);
  });

  it('should match extensions case-insensitively', async () => {
    const row = await service.uploadFile(owner.id, upload({ filename: 'SCAN.PNG' }));
    expect(row.fileType).toBe('png');
  });

  it('should remove the blob again when the row cannot be recorded', async () => {
    await expect(service.uploadFile(randomUUID(), upload())).rejects.toThrow();
    expect(await storedBlobs()).toEqual([]);
    expect(await db.select().from(files)).toEqual([]);
  });
});

describe('FileService token access', () => {
  it('should serve a private file to its owner only', async () => {
    const row = await service.uploadFile(owner.id, upload());

    const shared = await service.getSharedFile(owner, row.shareToken);
    expect(shared.file.id).toBe(row.id);

    await expect(service.getSharedFile(stranger, row.shareToken)).rejects.toMatchObject({
      code: 'FORBIDDEN',
      message: 'Access denied',
    });
    await expect(service.getSharedFile(null, row.shareToken)).rejects.toMatchObject({
      code: 'FORBIDDEN',
    });
  });

  it('should serve a public file to anyone holding the token', async () => {
    const row = await service.uploadFile(owner.id, upload({ isPublic: true }));

    expect((await service.getSharedFile(null, row.shareToken)).file.id).toBe(row.id);
    expect((await service.getSharedFile(stranger, row.shareToken)).file.id).toBe(row.id);
  });

  it('should report an unknown token as not found', async () => {
    await expect(service.getSharedFile(owner, 'no-such-token')).rejects.toMatchObject({
      code: 'NOT_FOUND',
      message: 'Shared item not found',
    });
  });

  it('should not count inline views', async () => {
    const row = await service.uploadFile(owner.id, upload({ isPublic: true }));

    const viewed = await service.viewFile(null, row.shareToken);
    expect(viewed.content).toEqual(Buffer.from('%PDF-1.4 test'));

    const [stored] = await db.select().from(files).where(eq(files.id, row.id));
    expect(stored?.downloadCount).toBe(0);
  });

  it('should count each successful download exactly once', async () => {
    const row = await service.uploadFile(owner.id, upload({ isPublic: true }));

    const first = await service.downloadFile(null, row.shareToken);
    expect(first.file.downloadCount).toBe(1);
    expect(first.content).toEqual(Buffer.from('%PDF-1.4 test'));

    const second = await service.downloadFile(stranger, row.shareToken);
    expect(second.file.downloadCount).toBe(2);
  });

  it('should not count a denied download', async () => {
    const row = await service.uploadFile(owner.id, upload());

    await expect(service.downloadFile(stranger, row.shareToken)).rejects.toMatchObject({
      code: 'FORBIDDEN',
    });

    const [stored] = await db.select().from(files).where(eq(files.id, row.id));
    expect(stored?.downloadCount).toBe(0);
  });

  it('should raise INCONSISTENT and leave the counter alone when the blob is gone', async () => {
    const row = await service.uploadFile(owner.id, upload({ isPublic: true }));
    await storage.delete(row.storageName);

    await expect(service.downloadFile(null, row.shareToken)).rejects.toMatchObject({
      code: 'INCONSISTENT',
      statusCode: 500,
    });
    await expect(service.viewFile(null, row.shareToken)).rejects.toMatchObject({
      code: 'INCONSISTENT',
    });

    const [stored] = await db.select().from(files).where(eq(files.id, row.id));
    expect(stored?.downloadCount).toBe(0);
  });
});

describe('FileService.getSharedFile bundle context', () => {
  async function insertBundle(isPublic: boolean, memberIds: string[]) {
    const [bundle] = await db
      .insert(bundles)
      .values({
        name: 'Quarter close',
        transactionNumber: 'TX-200',
        userId: owner.id,
        isPublic,
        shareToken: `bundle-token-${memberIds.length}-${String(isPublic)}`,
      })
      .returning();
    if (!bundle) throw new Error('bundle insert failed');
    if (memberIds.length > 0) {
      await db
        .insert(bundleFiles)
        .values(memberIds.map((fileId) => ({ bundleId: bundle.id, fileId })));
    }
    return bundle;
  }

  it('should attach the bundle when the file is a member of a readable bundle', async () => {
    const file = await service.uploadFile(owner.id, upload({ isPublic: true }));
    const bundle = await insertBundle(true, [file.id]);

    const shared = await service.getSharedFile(null, file.shareToken, bundle.shareToken);
    expect(shared.bundle?.id).toBe(bundle.id);
  });

  it('should drop the context when the file is not a member', async () => {
    const file = await service.uploadFile(owner.id, upload({ isPublic: true }));
    const other = await service.uploadFile(owner.id, upload({ filename: 'other.txt' }));
    const bundle = await insertBundle(true, [other.id]);

    const shared = await service.getSharedFile(null, file.shareToken, bundle.shareToken);
    expect(shared.bundle).toBeNull();
  });

  it('should drop the context when the caller may not read the bundle', async () => {
    const file = await service.uploadFile(owner.id, upload({ isPublic: true }));
    const bundle = await insertBundle(false, [file.id]);

    expect((await service.getSharedFile(null, file.shareToken, bundle.shareToken)).bundle).toBeNull();
    expect((await service.getSharedFile(owner, file.shareToken, bundle.shareToken)).bundle?.id).toBe(
      bundle.id,
    );
  });

  it('should ignore an unknown bundle token', async () => {
    const file = await service.uploadFile(owner.id, upload({ isPublic: true }));
    const shared = await service.getSharedFile(null, file.shareToken, 'missing-bundle');
    expect(shared.bundle).toBeNull();
  });
});

describe('FileService owner mutations', () => {
  it('should flip visibility and keep the share token', async () => {
    const row = await service.uploadFile(owner.id, upload());

    const once = await service.toggleVisibility(owner, row.id);
    expect(once.isPublic).toBe(true);
    expect(once.shareToken).toBe(row.shareToken);

    const twice = await service.toggleVisibility(owner, row.id);
    expect(twice.isPublic).toBe(false);
    expect(twice.shareToken).toBe(row.shareToken);
  });

  it('should rename with the trimmed name', async () => {
    const row = await service.uploadFile(owner.id, upload());
    const renamed = await service.renameFile(owner, row.id, '  Final invoice.pdf  ');
    expect(renamed.originalFilename).toBe('Final invoice.pdf');
    expect(renamed.storageName).toBe(row.storageName);
  });

  it('should reject an empty rename', async () => {
    const row = await service.uploadFile(owner.id, upload());
    await expect(service.renameFile(owner, row.id, '   ')).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      field: 'name',
    });
  });

  it('should drop directory components from a new name', async () => {
    const row = await service.uploadFile(owner.id, upload());
    const renamed = await service.renameFile(owner, row.id, '../../../../tmp/evil.sh');
    expect(renamed.originalFilename).toBe('evil.sh');
  });

  it('should reject a rename longer than 255 characters', async () => {
    const row = await service.uploadFile(owner.id, upload());
    await expect(
      service.renameFile(owner, row.id, `${'n'.repeat(256)}.pdf`),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', field: 'name' });
  });

  it('should forbid every mutation to a non-owner', async () => {
    const row = await service.uploadFile(owner.id, upload({ isPublic: true }));

    await expect(service.renameFile(stranger, row.id, 'x.pdf')).rejects.toMatchObject({
      code: 'FORBIDDEN',
    });
    await expect(service.toggleVisibility(stranger, row.id)).rejects.toMatchObject({
      code: 'FORBIDDEN',
    });
    await expect(service.deleteFile(null, row.id)).rejects.toMatchObject({ code: 'FORBIDDEN' });

    const [stored] = await db.select().from(files).where(eq(files.id, row.id));
    expect(stored?.originalFilename).toBe('invoice.pdf');
    expect(stored?.isPublic).toBe(true);
  });

  it('should answer FORBIDDEN for ids that do not exist', async () => {
    await expect(service.toggleVisibility(owner, randomUUID())).rejects.toMatchObject({
      code: 'FORBIDDEN',
      message: 'Access denied',
    });
    await expect(service.deleteFile(owner, 'not-a-uuid')).rejects.toMatchObject({
      code: 'FORBIDDEN',
    });
  });

  it('should delete the row, its memberships and the blob', async () => {
    const row = await service.uploadFile(owner.id, upload({ isPublic: true }));
    const [bundle] = await db
      .insert(bundles)
      .values({
        name: 'Holder',
        transactionNumber: 'TX-300',
        userId: owner.id,
        shareToken: 'holder-token',
      })
      .returning();
    if (!bundle) throw new Error('bundle insert failed');
    await db.insert(bundleFiles).values({ bundleId: bundle.id, fileId: row.id });

    await service.deleteFile(owner, row.id);

    expect(await db.select().from(files)).toEqual([]);
    expect(await db.select().from(bundleFiles)).toEqual([]);
    expect(await storage.exists(row.storageName)).toBe(false);
    await expect(service.getSharedFile(null, row.shareToken)).rejects.toMatchObject({
      code: 'NOT_FOUND',
    });
  });
});

describe('FileService.getUserStats', () => {
  it('should return zeros for a user without files', async () => {
    expect(await service.getUserStats(owner.id)).toEqual({
      totalFiles: 0,
      publicFiles: 0,
      totalSizeBytes: 0,
      totalDownloads: 0,
    });
  });

  it('should aggregate only the owner\'s files', async () => {
    const a = await service.uploadFile(owner.id, upload({ content: Buffer.from('12345'), isPublic: true }));
    await service.uploadFile(owner.id, upload({ filename: 'b.txt', content: Buffer.from('123') }));
    await service.uploadFile(stranger.id, upload({ filename: 'c.txt', content: Buffer.from('1') }));
    await service.downloadFile(null, a.shareToken);
    await service.downloadFile(null, a.shareToken);

    expect(await service.getUserStats(owner.id)).toEqual({
      totalFiles: 2,
      publicFiles: 1,
      totalSizeBytes: 8,
      totalDownloads: 2,
    });
  });

  it('should list only the owner\'s files', async () => {
    await service.uploadFile(owner.id, upload());
    await service.uploadFile(stranger.id, upload({ filename: 'theirs.txt' }));

    const listed = await service.listFiles(owner.id);
    expect(listed.map((row) => row.originalFilename)).toEqual(['invoice.pdf']);
  });
});

describe('two-user sharing scenario', () => {
  it('should gate anonymous access on visibility and keep mutations with the owner', async () => {
    const f = await service.uploadFile(owner.id, upload({ filename: 'contract.pdf' }));
    expect(f.isPublic).toBe(false);

    await expect(service.downloadFile(null, f.shareToken)).rejects.toMatchObject({
      code: 'FORBIDDEN',
    });

    await service.toggleVisibility(owner, f.id);
    const downloaded = await service.downloadFile(null, f.shareToken);
    expect(downloaded.content).toEqual(Buffer.from('%PDF-1.4 test'));
    expect(downloaded.file.downloadCount).toBe(1);

    await expect(service.deleteFile(stranger, f.id)).rejects.toMatchObject({
      code: 'FORBIDDEN',
    });

    const [stored] = await db.select().from(files).where(eq(files.id, f.id));
    expect(stored?.downloadCount).toBe(1);
    expect(stored?.originalFilename).toBe('contract.pdf');
    expect(await storage.exists(f.storageName)).toBe(true);
  });
});
