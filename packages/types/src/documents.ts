import type { TenantRecord } from './common';

export type DocumentType =
  | 'drawing'
  | 'specification'
  | 'submittal'
  | 'report'
  | 'contract'
  | 'photo'
  | 'other';

export type DocumentStatus = 'draft' | 'issued_for_review' | 'approved' | 'superseded';

export const DOCUMENT_STATUSES: readonly DocumentStatus[] = [
  'draft',
  'issued_for_review',
  'approved',
  'superseded',
];

export interface ProjectDocument extends TenantRecord {
  projectId: string;
  title: string;
  documentType: DocumentType;
  discipline?: string;
  csiSection?: string;
  revision: string;
  status: DocumentStatus;
  fileName: string;
  mimeType: string;
  sizeBytes: number;
  uploadedBy: string;
  supersedesId?: string;
  createdAt: string;
  updatedAt: string;
}
