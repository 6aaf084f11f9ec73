import { and, count, desc, eq, sql } from 'drizzle-orm';
import type { UserStats } from '@sharebox/shared';
import { ErrorCodes } from '@sharebox/shared';
import { authorize, resolveBundleContext } from '../access/access-control.js';
import type { Subject } from '../access/access-control.js';
import type { Database } from '../db/index.js';
import { bundleFiles, bundles, files } from '../db/schema/index.js';
import type { BundleRow, FileRow } from '../db/schema/index.js';
import {
  conflict,
  inconsistent,
  internalError,
  isAppError,
  isUniqueViolation,
  notFound,
  unsupportedType,
  validationError,
} from '../utils/errors.js';
import {
  buildStorageName,
  extractExtension,
  MAX_FILENAME_LENGTH,
  stripDirectories,
} from '../utils/filename.js';
import { isUuid } from '../utils/ids.js';
import { createLogger } from '../utils/logger.js';
import { generateShareToken } from '../utils/token.js';
import type { IStorageService } from './storage.service.js';

const logger = createLogger('FileService');

export interface UploadFileInput {
  filename: string;
  content: Buffer;
  isPublic: boolean;
  transactionNumber: string;
}

export interface FileContent {
  file: FileRow;
  content: Buffer;
}

export interface SharedFile {
  file: FileRow;
  bundle: BundleRow | null;
}

export interface FileServiceOptions {
  allowedExtensions: readonly string[];
}

export class FileService {
  constructor(
    private readonly db: Database,
    private readonly storage: IStorageService,
    private readonly options: FileServiceOptions,
  ) {}

  // ---- Upload ----

  /**
   * Validate, write the blob, then record the row. If the row cannot be
   * written the blob is removed again so no orphan is left behind.
   */
  async uploadFile(ownerId: string, input: UploadFileInput): Promise<FileRow> {
    const originalFilename = stripDirectories(input.filename).trim();
    if (!originalFilename) {
      throw validationError('No file was selected', 'file');
    }
    if (originalFilename.length > MAX_FILENAME_LENGTH) {
      throw validationError(`File name must be at most ${MAX_FILENAME_LENGTH} characters`, 'file');
    }

    const transactionNumber = input.transactionNumber.trim();
    if (!transactionNumber) {
      throw validationError('Transaction number is required', 'transactionNumber');
    }

    const fileType = extractExtension(originalFilename);
    if (fileType === null || !this.options.allowedExtensions.includes(fileType)) {
      throw unsupportedType(`File type not allowed: ${fileType ?? 'none'}`, 'file');
    }

    const storageName = buildStorageName(originalFilename);
    await this.storage.store(storageName, input.content);

    try {
      const [row] = await this.db
        .insert(files)
        .values({
          storageName,
          originalFilename,
          userId: ownerId,
          isPublic: input.isPublic,
          shareToken: generateShareToken(),
          sizeBytes: input.content.length,
          fileType,
          transactionNumber,
        })
        .returning();

      if (!row) {
        throw internalError('Failed to record upload');
      }

      logger.info(
        { fileId: row.id, ownerId, sizeBytes: row.sizeBytes, fileType },
        'File uploaded',
      );
      return row;
    } catch (err) {
      await this.discardBlob(storageName);
      if (isUniqueViolation(err)) {
        throw conflict('Upload could not be recorded: duplicate key');
      }
      throw err;
    }
  }

  // ---- Owner queries ----

  async listFiles(ownerId: string): Promise<FileRow[]> {
    return this.db
      .select()
      .from(files)
      .where(eq(files.userId, ownerId))
      .orderBy(desc(files.uploadedAt));
  }

  async getUserStats(ownerId: string): Promise<UserStats> {
    const [row] = await this.db
      .select({
        totalFiles: count(),
        publicFiles: sql<number>`count(*) filter (where ${files.isPublic})`.mapWith(Number),
        totalSizeBytes: sql<number>`coalesce(sum(${files.sizeBytes}), 0)`.mapWith(Number),
        totalDownloads: sql<number>`coalesce(sum(${files.downloadCount}), 0)`.mapWith(Number),
      })
      .from(files)
      .where(eq(files.userId, ownerId));

    return {
      totalFiles: row?.totalFiles ?? 0,
      publicFiles: row?.publicFiles ?? 0,
      totalSizeBytes: row?.totalSizeBytes ?? 0,
      totalDownloads: row?.totalDownloads ?? 0,
    };
  }

  // ---- Token access ----

  async findByToken(token: string): Promise<FileRow | undefined> {
    const [row] = await this.db
      .select()
      .from(files)
      .where(eq(files.shareToken, token))
      .limit(1);
    return row;
  }

  /**
   * Metadata for a shared file. `bundleToken` names the bundle link the
   * file was opened from; it is honoured only if the file is a member.
   */
  async getSharedFile(subject: Subject, token: string, bundleToken?: string): Promise<SharedFile> {
    const file = authorize(subject, await this.findByToken(token), 'read');

    if (!bundleToken) {
      return { file, bundle: null };
    }

    const [bundle] = await this.db
      .select()
      .from(bundles)
      .where(eq(bundles.shareToken, bundleToken))
      .limit(1);

    const memberIds = bundle
      ? (
          await this.db
            .select({ fileId: bundleFiles.fileId })
            .from(bundleFiles)
            .where(and(eq(bundleFiles.bundleId, bundle.id), eq(bundleFiles.fileId, file.id)))
        ).map((member) => member.fileId)
      : [];

    return { file, bundle: resolveBundleContext(file.id, bundle, memberIds, subject) };
  }

  /** Content for inline display. Does not count as a download. */
  async viewFile(subject: Subject, token: string): Promise<FileContent> {
    const file = authorize(subject, await this.findByToken(token), 'read');
    const content = await this.readBlob(file);
    return { file, content };
  }

  /**
   * Content as a download. The counter moves by exactly one, and only once
   * the blob has been read successfully.
   */
  async downloadFile(subject: Subject, token: string): Promise<FileContent> {
    const file = authorize(subject, await this.findByToken(token), 'read');
    const content = await this.readBlob(file);

    const [updated] = await this.db
      .update(files)
      .set({ downloadCount: sql`${files.downloadCount} + 1` })
      .where(eq(files.id, file.id))
      .returning();

    if (!updated) {
      // Deleted between the read and the increment
      throw notFound('Shared item not found');
    }

    return { file: updated, content };
  }

  // ---- Owner mutations ----

  async getOwnedFile(subject: Subject, fileId: string): Promise<FileRow> {
    return authorize(subject, await this.findById(fileId), 'mutate');
  }

  async renameFile(subject: Subject, fileId: string, newName: string): Promise<FileRow> {
    const file = authorize(subject, await this.findById(fileId), 'mutate');

    const name = stripDirectories(newName).trim();
    if (!name) {
      throw validationError('File name cannot be empty', 'name');
    }
    if (name.length > MAX_FILENAME_LENGTH) {
      throw validationError(`File name must be at most ${MAX_FILENAME_LENGTH} characters`, 'name');
    }

    const [updated] = await this.db
      .update(files)
      .set({ originalFilename: name })
      .where(eq(files.id, file.id))
      .returning();

    if (!updated) {
      throw notFound(`File not found: ${fileId}`);
    }

    logger.info({ fileId }, 'File renamed');
    return updated;
  }

  /** Flip public/private. The share token is left as it is. */
  async toggleVisibility(subject: Subject, fileId: string): Promise<FileRow> {
    const file = authorize(subject, await this.findById(fileId), 'mutate');

    const [updated] = await this.db
      .update(files)
      .set({ isPublic: sql`NOT ${files.isPublic}` })
      .where(eq(files.id, file.id))
      .returning();

    if (!updated) {
      throw notFound(`File not found: ${fileId}`);
    }

    logger.info({ fileId, isPublic: updated.isPublic }, 'File visibility changed');
    return updated;
  }

  /**
   * Remove the row and its bundle memberships in one transaction, then the
   * blob.
   */
  async deleteFile(subject: Subject, fileId: string): Promise<void> {
    const file = authorize(subject, await this.findById(fileId), 'mutate');

    await this.db.transaction(async (tx) => {
      await tx.delete(bundleFiles).where(eq(bundleFiles.fileId, file.id));
      await tx.delete(files).where(eq(files.id, file.id));
    });

    await this.storage.delete(file.storageName);

    logger.info({ fileId }, 'File deleted');
  }

  // ---- Private helpers ----

  private async findById(fileId: string): Promise<FileRow | undefined> {
    if (!isUuid(fileId)) return undefined;
    const [row] = await this.db.select().from(files).where(eq(files.id, fileId)).limit(1);
    return row;
  }

  private async readBlob(file: FileRow): Promise<Buffer> {
    try {
      return await this.storage.retrieve(file.storageName);
    } catch (err) {
      if (isAppError(err, ErrorCodes.NOT_FOUND)) {
        logger.error({ fileId: file.id }, 'File row has no blob');
        throw inconsistent('File content is unavailable');
      }
      throw err;
    }
  }

  private async discardBlob(storageName: string): Promise<void> {
    try {
      await this.storage.delete(storageName);
    } catch (cleanupErr) {
      logger.error({ storageName, err: cleanupErr }, 'Failed to remove blob after aborted upload');
    }
  }
}
