import { z } from 'zod';

export const DocumentTypeSchema = z.enum([
  'drawing',
  'specification',
  'submittal',
  'report',
  'contract',
  'photo',
  'other',
]);

export const DocumentStatusSchema = z.enum(['draft', 'issued_for_review', 'approved', 'superseded']);

export const DocumentCreateSchema = z.object({
  title: z.string().min(1),
  documentType: DocumentTypeSchema,
  discipline: z.string().optional(),
  csiSection: z.string().optional(),
  revision: z.string().min(1).default('0'),
  status: DocumentStatusSchema.exclude(['superseded']).default('draft'),
  fileName: z.string().min(1),
  mimeType: z.string().min(1),
  sizeBytes: z.number().int().nonnegative(),
  uploadedBy: z.string().min(1),
});

export const DocumentRevisionSchema = DocumentCreateSchema.pick({
  revision: true,
  fileName: true,
  mimeType: true,
  sizeBytes: true,
  uploadedBy: true,
}).extend({ revision: z.string().min(1) });

export const DocumentStatusUpdateSchema = z.object({
  status: DocumentStatusSchema.exclude(['superseded']),
});

export const DocumentListQuerySchema = z.object({
  documentType: DocumentTypeSchema.optional(),
  status: DocumentStatusSchema.optional(),
  includeSuperseded: z.enum(['true', 'false']).optional(),
});

export type DocumentCreateInput = z.infer<typeof DocumentCreateSchema>;
export type DocumentRevisionInput = z.infer<typeof DocumentRevisionSchema>;
export type DocumentListQuery = z.infer<typeof DocumentListQuerySchema>;
