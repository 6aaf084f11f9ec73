import type {
  BundleContext,
  BundleDetail,
  BundleView,
  FileView,
  LogoSetting,
  UserProfile,
  Visibility,
} from '@sharebox/shared';
import type { BundleRow, FileRow, SettingRow, User } from '../db/schema/index.js';

// ---------------------------------------------------------------------------
// Row → view dictionaries. Storage names and password hashes stop here.
// ---------------------------------------------------------------------------

function visibilityOf(isPublic: boolean): Visibility {
  return isPublic ? 'public' : 'private';
}

export class PresenterService {
  toUserProfile(row: Pick<User, 'id' | 'username' | 'email' | 'createdAt'>): UserProfile {
    return {
      id: row.id,
      username: row.username,
      email: row.email,
      createdAt: row.createdAt.toISOString(),
    };
  }

  toFileView(row: FileRow): FileView {
    return {
      id: row.id,
      originalFilename: row.originalFilename,
      ownerId: row.userId,
      visibility: visibilityOf(row.isPublic),
      shareToken: row.shareToken,
      uploadedAt: row.uploadedAt.toISOString(),
      sizeBytes: row.sizeBytes,
      fileType: row.fileType,
      downloadCount: row.downloadCount,
      transactionNumber: row.transactionNumber,
    };
  }

  toBundleView(row: BundleRow, fileCount: number): BundleView {
    return {
      id: row.id,
      name: row.name,
      transactionNumber: row.transactionNumber,
      ownerId: row.userId,
      visibility: visibilityOf(row.isPublic),
      shareToken: row.shareToken,
      createdAt: row.createdAt.toISOString(),
      downloadCount: row.downloadCount,
      fileCount,
    };
  }

  toBundleDetail(row: BundleRow, members: FileRow[]): BundleDetail {
    return {
      ...this.toBundleView(row, members.length),
      files: members.map((file) => this.toFileView(file)),
    };
  }

  toBundleContext(row: BundleRow): BundleContext {
    return {
      id: row.id,
      name: row.name,
      transactionNumber: row.transactionNumber,
      shareToken: row.shareToken,
    };
  }

  toLogoSetting(row: SettingRow): LogoSetting {
    return {
      filename: row.logoFilename,
      updatedAt: row.updatedAt.toISOString(),
    };
  }
}

export const presenterService = new PresenterService();
