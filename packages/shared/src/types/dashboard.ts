import type { BundleView } from './bundle.js';
import type { FileView, UserStats } from './file.js';

export interface Dashboard {
  files: FileView[];
  bundles: BundleView[];
  stats: UserStats;
}
