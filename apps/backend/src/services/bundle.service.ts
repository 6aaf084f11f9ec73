import { and, asc, count, desc, eq, inArray, sql } from 'drizzle-orm';
import { ErrorCodes } from '@sharebox/shared';
import { authorize } from '../access/access-control.js';
import type { Subject } from '../access/access-control.js';
import type { Database } from '../db/index.js';
import { bundleFiles, bundles, files } from '../db/schema/index.js';
import type { BundleRow, FileRow } from '../db/schema/index.js';
import { buildZipArchive } from '../utils/archive.js';
import type { ArchiveEntry } from '../utils/archive.js';
import {
  conflict,
  forbidden,
  inconsistent,
  internalError,
  isAppError,
  isUniqueViolation,
  notFound,
  validationError,
} from '../utils/errors.js';
import { sanitizeFilename } from '../utils/filename.js';
import { isUuid } from '../utils/ids.js';
import { createLogger } from '../utils/logger.js';
import { generateShareToken } from '../utils/token.js';
import type { IStorageService } from './storage.service.js';

const logger = createLogger('BundleService');

type Executor = Pick<Database, 'select'>;

export interface BundleInput {
  name: string;
  transactionNumber: string;
  fileIds: readonly string[];
  isPublic?: boolean;
}

export interface BundleWithFiles {
  bundle: BundleRow;
  files: FileRow[];
}

export interface BundleSummary {
  bundle: BundleRow;
  fileCount: number;
}

export interface BundleArchive {
  bundle: BundleRow;
  filename: string;
  content: Buffer;
}

function requireBundleFields(input: BundleInput): void {
  if (!input.name.trim()) {
    throw validationError('Bundle name is required', 'name');
  }
  if (!input.transactionNumber.trim()) {
    throw validationError('Transaction number is required', 'transactionNumber');
  }
  if (input.fileIds.length === 0) {
    throw validationError('Select at least one file', 'fileIds');
  }
}

export class BundleService {
  constructor(
    private readonly db: Database,
    private readonly storage: IStorageService,
  ) {}

  // ---- Create / edit ----

  async createBundle(subject: Subject, input: BundleInput): Promise<BundleWithFiles> {
    if (!subject) {
      throw forbidden();
    }
    requireBundleFields(input);

    try {
      const bundleId = await this.db.transaction(async (tx) => {
        const fileIds = await this.assertOwnedFiles(tx, subject.id, input.fileIds);

        const [row] = await tx
          .insert(bundles)
          .values({
            name: input.name.trim(),
            transactionNumber: input.transactionNumber.trim(),
            userId: subject.id,
            isPublic: input.isPublic ?? false,
            shareToken: generateShareToken(),
          })
          .returning({ id: bundles.id });

        if (!row) {
          throw internalError('Failed to create bundle');
        }

        await tx.insert(bundleFiles).values(fileIds.map((fileId) => ({ bundleId: row.id, fileId })));
        return row.id;
      });

      const created = await this.loadWithFiles(bundleId);
      logger.info(
        { bundleId, ownerId: subject.id, fileCount: created.files.length },
        'Bundle created',
      );
      return created;
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw conflict('Bundle could not be recorded: duplicate key');
      }
      throw err;
    }
  }

  /**
   * Replace name, label, visibility (when given) and the whole membership
   * set in one transaction. Readers never see a half-updated bundle.
   */
  async updateBundle(subject: Subject, bundleId: string, input: BundleInput): Promise<BundleWithFiles> {
    if (!isUuid(bundleId)) {
      throw forbidden();
    }
    requireBundleFields(input);

    await this.db.transaction(async (tx) => {
      // Row stays locked until commit
      const [locked] = await tx
        .select()
        .from(bundles)
        .where(eq(bundles.id, bundleId))
        .for('update');
      const bundle = authorize(subject, locked, 'mutate');

      const fileIds = await this.assertOwnedFiles(tx, bundle.userId, input.fileIds);

      await tx
        .update(bundles)
        .set({
          name: input.name.trim(),
          transactionNumber: input.transactionNumber.trim(),
          ...(input.isPublic !== undefined ? { isPublic: input.isPublic } : {}),
        })
        .where(eq(bundles.id, bundleId));

      await tx.delete(bundleFiles).where(eq(bundleFiles.bundleId, bundleId));
      await tx.insert(bundleFiles).values(fileIds.map((fileId) => ({ bundleId, fileId })));
    });

    logger.info({ bundleId, fileCount: input.fileIds.length }, 'Bundle updated');
    return this.loadWithFiles(bundleId);
  }

  // ---- Owner queries ----

  async listBundles(ownerId: string): Promise<BundleSummary[]> {
    return this.db
      .select({ bundle: bundles, fileCount: count(bundleFiles.fileId) })
      .from(bundles)
      .leftJoin(bundleFiles, eq(bundleFiles.bundleId, bundles.id))
      .where(eq(bundles.userId, ownerId))
      .groupBy(bundles.id)
      .orderBy(desc(bundles.createdAt));
  }

  async getOwnedBundle(subject: Subject, bundleId: string): Promise<BundleWithFiles> {
    const bundle = authorize(subject, await this.findById(bundleId), 'mutate');
    return { bundle, files: await this.loadMembers(bundle.id) };
  }

  // ---- Token access ----

  async findByToken(token: string): Promise<BundleRow | undefined> {
    const [row] = await this.db
      .select()
      .from(bundles)
      .where(eq(bundles.shareToken, token))
      .limit(1);
    return row;
  }

  async getSharedBundle(subject: Subject, token: string): Promise<BundleWithFiles> {
    const bundle = authorize(subject, await this.findByToken(token), 'read');
    return { bundle, files: await this.loadMembers(bundle.id) };
  }

  /**
   * Zip of every member, named after the transaction number. The archive is
   * built before the counter moves; a missing member blob aborts the download.
   */
  async downloadBundle(subject: Subject, token: string): Promise<BundleArchive> {
    const bundle = authorize(subject, await this.findByToken(token), 'read');
    const members = await this.loadMembers(bundle.id);

    const entries: ArchiveEntry[] = [];
    for (const file of members) {
      entries.push({ name: file.originalFilename, content: await this.readBlob(bundle, file) });
    }

    const content = await buildZipArchive(entries);

    const [updated] = await this.db
      .update(bundles)
      .set({ downloadCount: sql`${bundles.downloadCount} + 1` })
      .where(eq(bundles.id, bundle.id))
      .returning();

    if (!updated) {
      throw notFound('Shared item not found');
    }

    return {
      bundle: updated,
      filename: `${sanitizeFilename(updated.transactionNumber)}.zip`,
      content,
    };
  }

  // ---- Owner mutations ----

  async toggleVisibility(subject: Subject, bundleId: string): Promise<BundleRow> {
    const bundle = authorize(subject, await this.findById(bundleId), 'mutate');

    const [updated] = await this.db
      .update(bundles)
      .set({ isPublic: sql`NOT ${bundles.isPublic}` })
      .where(eq(bundles.id, bundle.id))
      .returning();

    if (!updated) {
      throw notFound(`Bundle not found: ${bundleId}`);
    }

    logger.info({ bundleId, isPublic: updated.isPublic }, 'Bundle visibility changed');
    return updated;
  }

  /** Deletes the bundle and its memberships. Member files are kept. */
  async deleteBundle(subject: Subject, bundleId: string): Promise<void> {
    const bundle = authorize(subject, await this.findById(bundleId), 'mutate');

    await this.db.transaction(async (tx) => {
      await tx.delete(bundleFiles).where(eq(bundleFiles.bundleId, bundle.id));
      await tx.delete(bundles).where(eq(bundles.id, bundle.id));
    });

    logger.info({ bundleId }, 'Bundle deleted');
  }

  // ---- Private helpers ----

  private async findById(bundleId: string): Promise<BundleRow | undefined> {
    if (!isUuid(bundleId)) return undefined;
    const [row] = await this.db.select().from(bundles).where(eq(bundles.id, bundleId)).limit(1);
    return row;
  }

  private async loadMembers(bundleId: string): Promise<FileRow[]> {
    const rows = await this.db
      .select({ file: files })
      .from(bundleFiles)
      .innerJoin(files, eq(files.id, bundleFiles.fileId))
      .where(eq(bundleFiles.bundleId, bundleId))
      .orderBy(asc(files.uploadedAt));
    return rows.map((row) => row.file);
  }

  private async loadWithFiles(bundleId: string): Promise<BundleWithFiles> {
    const bundle = await this.findById(bundleId);
    if (!bundle) {
      throw notFound(`Bundle not found: ${bundleId}`);
    }
    return { bundle, files: await this.loadMembers(bundleId) };
  }

  /**
   * Every requested id must be a file the owner holds. One stray id rejects
   * the whole selection. Returns the ids de-duplicated.
   */
  private async assertOwnedFiles(
    executor: Executor,
    ownerId: string,
    fileIds: readonly string[],
  ): Promise<string[]> {
    const unique = [...new Set(fileIds)];
    if (unique.some((id) => !isUuid(id))) {
      throw forbidden();
    }

    const owned = await executor
      .select({ id: files.id })
      .from(files)
      .where(and(inArray(files.id, unique), eq(files.userId, ownerId)));

    if (owned.length !== unique.length) {
      throw forbidden();
    }
    return unique;
  }

  private async readBlob(bundle: BundleRow, file: FileRow): Promise<Buffer> {
    try {
      return await this.storage.retrieve(file.storageName);
    } catch (err) {
      if (isAppError(err, ErrorCodes.NOT_FOUND)) {
        logger.error({ bundleId: bundle.id, fileId: file.id }, 'Bundle member has no blob');
        throw inconsistent('Bundle content is unavailable');
      }
      throw err;
    }
  }
}
