import { z } from 'zod';

export const renameFileSchema = z.object({
  name: z.string().trim().min(1, 'File name cannot be empty').max(255),
});

// Multipart text fields arrive as strings; checkboxes post "on".
export const uploadFieldsSchema = z.object({
  transactionNumber: z.string().trim().min(1, 'Transaction number is required').max(255),
  isPublic: z
    .enum(['true', 'false', 'on', 'off'])
    .optional()
    .transform((value) => value === 'true' || value === 'on'),
});

export const shareTokenParamsSchema = z.object({
  token: z.string().min(1).max(128),
});

export const sharedFileQuerySchema = z.object({
  bundle: z.string().min(1).max(128).optional(),
});

export const entityIdParamsSchema = z.object({
  id: z.string().min(1).max(64),
});

export type RenameFileInput = z.infer<typeof renameFileSchema>;
export type UploadFieldsInput = z.infer<typeof uploadFieldsSchema>;
