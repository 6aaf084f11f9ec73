export type Visibility = 'public' | 'private';

/**
 * A file as shown to its owner and to anyone holding its share token.
 * The internal storage name is never part of this shape.
 */
export interface FileView {
  id: string;
  originalFilename: string;
  ownerId: string;
  visibility: Visibility;
  shareToken: string;
  uploadedAt: string;
  sizeBytes: number;
  fileType: string;
  downloadCount: number;
  transactionNumber: string | null;
}

export interface SharedFileView {
  file: FileView;
  /** Set only when the file was opened from a bundle it actually belongs to. */
  bundle: BundleContext | null;
}

export interface BundleContext {
  id: string;
  name: string;
  transactionNumber: string;
  shareToken: string;
}

export interface UserStats {
  totalFiles: number;
  publicFiles: number;
  totalSizeBytes: number;
  totalDownloads: number;
}

export interface RenameFileRequest {
  name: string;
}

export interface VisibilityResult {
  id: string;
  visibility: Visibility;
}
