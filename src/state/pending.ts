/**
 * @fileoverview Persistence for the pending-changes document.
 * Reads are self-healing: a missing or corrupt file is replaced by an empty
 * document before being returned.
 *
 * @module state/pending
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Loaded } from '../types/base.js';
import type { PendingDocument } from '../types/changelog.js';
import { createEmptyDocument, recount } from '../core/changelog/pending.js';
import { PendingDocumentSchema } from './schemas.js';

/**
 * Parses pending document text; null when it is not valid JSON or does
 * not match the document shape. The counter is recomputed so a
 * hand-edited file cannot carry a stale total.
 */
export function parsePending(text: string): PendingDocument | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        return null;
    }
    const result = PendingDocumentSchema.safeParse(parsed);
    return result.success ? recount(result.data) : null;
}

/**
 * Loads the pending document at `file`.
 *
 * @param project - Project name used when a fresh document is created
 */
export function loadPending(file: string, project: string, now: Date): Loaded<PendingDocument> {
    if (!fs.existsSync(file)) {
        return { value: resetPending(file, project, now), recovered: false };
    }

    const document = parsePending(fs.readFileSync(file, 'utf-8'));
    if (document === null) {
        return { value: resetPending(file, project, now), recovered: true };
    }
    return { value: document, recovered: false };
}

/**
 * Writes the document with `last_modified` set to `now`. Returns the
 * document as written.
 */
export function savePending(file: string, document: PendingDocument, now: Date): PendingDocument {
    const stamped: PendingDocument = { ...document, last_modified: now.toISOString() };
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, `${JSON.stringify(stamped, null, 2)}\n`, 'utf-8');
    return stamped;
}

/**
 * Replaces the stored document with an empty one.
 */
export function resetPending(file: string, project: string, now: Date): PendingDocument {
    return savePending(file, createEmptyDocument(project, now), now);
}
