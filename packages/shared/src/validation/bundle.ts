import { z } from 'zod';

const bundleFields = {
  name: z.string().trim().min(1, 'Bundle name is required').max(255),
  transactionNumber: z.string().trim().min(1, 'Transaction number is required').max(255),
  fileIds: z
    .array(z.string().uuid('Invalid file id'))
    .min(1, 'Select at least one file'),
  isPublic: z.boolean().optional(),
};

export const createBundleSchema = z.object(bundleFields);

// Edits replace the whole bundle, so the same fields are required.
export const updateBundleSchema = z.object(bundleFields);

export type CreateBundleInput = z.infer<typeof createBundleSchema>;
export type UpdateBundleInput = z.infer<typeof updateBundleSchema>;
