import type { FileView, Visibility } from './file.js';

export interface BundleView {
  id: string;
  name: string;
  transactionNumber: string;
  ownerId: string;
  visibility: Visibility;
  shareToken: string;
  createdAt: string;
  downloadCount: number;
  fileCount: number;
}

export interface BundleDetail extends BundleView {
  files: FileView[];
}

export interface CreateBundleRequest {
  name: string;
  transactionNumber: string;
  fileIds: string[];
  isPublic?: boolean;
}

export interface UpdateBundleRequest {
  name: string;
  transactionNumber: string;
  fileIds: string[];
  isPublic?: boolean;
}
