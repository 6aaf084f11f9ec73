import { desc } from 'drizzle-orm';
import { LOGO_EXTENSIONS } from '@sharebox/shared';
import type { Database } from '../db/index.js';
import { settings } from '../db/schema/index.js';
import type { SettingRow } from '../db/schema/index.js';
import { internalError, notFound, unsupportedType, validationError } from '../utils/errors.js';
import {
  buildStorageName,
  extractExtension,
  isAllowedExtension,
  sanitizeFilename,
} from '../utils/filename.js';
import { createLogger } from '../utils/logger.js';
import type { IStorageService } from './storage.service.js';

const logger = createLogger('SettingsService');

const LOGO_PREFIX = 'logo';

export interface LogoContent {
  filename: string;
  content: Buffer;
}

/**
 * Site logo. Every change appends a row; the current logo is the row with
 * the highest id. Older rows are history and are never read back.
 */
export class SettingsService {
  constructor(
    private readonly db: Database,
    private readonly logos: IStorageService,
  ) {}

  async getCurrentLogo(): Promise<SettingRow | null> {
    const [row] = await this.db.select().from(settings).orderBy(desc(settings.id)).limit(1);
    return row ?? null;
  }

  async setLogo(filename: string, content: Buffer): Promise<SettingRow> {
    if (!filename.trim()) {
      throw validationError('No logo was selected', 'logo');
    }
    if (!isAllowedExtension(filename, LOGO_EXTENSIONS)) {
      throw unsupportedType(
        `Logo type not allowed: ${extractExtension(filename) ?? 'none'}`,
        'logo',
      );
    }

    const logoFilename = buildStorageName(filename, LOGO_PREFIX);
    await this.logos.store(logoFilename, content);

    try {
      const [row] = await this.db.insert(settings).values({ logoFilename }).returning();
      if (!row) {
        throw internalError('Failed to record logo');
      }
      logger.info({ logoFilename }, 'Logo updated');
      return row;
    } catch (err) {
      await this.logos.delete(logoFilename).catch((cleanupErr: unknown) => {
        logger.error({ logoFilename, err: cleanupErr }, 'Failed to remove logo after aborted update');
      });
      throw err;
    }
  }

  /** Only names this service could have issued are served. */
  async readLogo(filename: string): Promise<LogoContent> {
    if (!filename.startsWith(`${LOGO_PREFIX}_`) || sanitizeFilename(filename) !== filename) {
      throw notFound('Logo not found');
    }
    return { filename, content: await this.logos.retrieve(filename) };
  }
}
