/**
 * @fileoverview zod schemas for the JSON documents changekeep persists.
 *
 * @module state/schemas
 */

import { z } from 'zod';
import type {
    CategorizedChanges,
    ChangeEntry,
    PendingDocument,
    ReleaseRecord,
} from '../types/changelog.js';

export const ChangeEntrySchema: z.ZodType<ChangeEntry, z.ZodTypeDef, unknown> = z.object({
    id: z.string().min(1),
    description: z.string().min(1),
    timestamp: z.string(),
    author: z.string().nullable().default(null),
    status: z.literal('pending'),
});

const entries = z.array(ChangeEntrySchema).optional();

/**
 * Unknown category keys are stripped rather than kept as new sections.
 */
export const CategorizedChangesSchema: z.ZodType<CategorizedChanges, z.ZodTypeDef, unknown> = z.object({
    added: entries,
    changed: entries,
    deprecated: entries,
    removed: entries,
    fixed: entries,
    security: entries,
});

const MetadataSchema = z.object({
    total_changes: z.number().int().nonnegative(),
});

/**
 * The stored counter is recomputed on load, so a missing one is tolerated.
 */
const PendingMetadataSchema = MetadataSchema.default({ total_changes: 0 });

export const PendingDocumentSchema: z.ZodType<PendingDocument, z.ZodTypeDef, unknown> = z.object({
    project: z.string(),
    created: z.string(),
    last_modified: z.string(),
    changes: CategorizedChangesSchema,
    metadata: PendingMetadataSchema,
});

export const ReleaseRecordSchema: z.ZodType<ReleaseRecord, z.ZodTypeDef, unknown> = z.object({
    version: z.string().min(1),
    date: z.string(),
    timestamp: z.string(),
    release_notes: z.string(),
    changes: CategorizedChangesSchema,
    metadata: MetadataSchema,
});
