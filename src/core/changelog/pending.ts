/**
 * @fileoverview Pure operations on the pending-changes document.
 * Every function takes a document value and returns a new one; loading and
 * saving is left to state/pending.ts so callers sequence load-mutate-persist
 * explicitly.
 *
 * @module core/changelog/pending
 */

import type { Result } from '../../types/base.js';
import type {
    Category,
    CategorizedChanges,
    ChangeEntry,
    ChangelogError,
    PendingDocument,
    RemovalCandidate,
    RemovalTarget,
} from '../../types/changelog.js';
import { ok, err } from '../../utils/result.js';
import { formatDate } from '../../utils/time.js';
import { CATEGORIES, isCategory } from './categories.js';

// ============================================================
// Types
// ============================================================

/**
 * Outcome of adding an entry.
 */
export interface AddOutcome {
    readonly document: PendingDocument;
    readonly entry: ChangeEntry;
}

/**
 * Outcome of removing entries.
 */
export interface RemoveOutcome {
    readonly document: PendingDocument;
    /** Removed entries in global order */
    readonly removed: readonly ChangeEntry[];
}

const ID_PREFIX = 'chg_';

// ============================================================
// Construction
// ============================================================

/**
 * Creates a document with every category present and empty.
 *
 * @example
 * const doc = createEmptyDocument('demo', new Date());
 * doc.metadata.total_changes; // 0
 */
export function createEmptyDocument(project: string, now: Date): PendingDocument {
    const stamp = now.toISOString();
    return {
        project,
        created: stamp,
        last_modified: stamp,
        changes: {
            added: [],
            changed: [],
            deprecated: [],
            removed: [],
            fixed: [],
            security: [],
        },
        metadata: { total_changes: 0 },
    };
}

// ============================================================
// Counting
// ============================================================

/**
 * Sum of all category list lengths.
 */
export function countChanges(changes: CategorizedChanges): number {
    return CATEGORIES.reduce((sum, category) => sum + (changes[category]?.length ?? 0), 0);
}

/**
 * Returns the document with `metadata.total_changes` recomputed.
 */
export function recount(document: PendingDocument): PendingDocument {
    return {
        ...document,
        metadata: { ...document.metadata, total_changes: countChanges(document.changes) },
    };
}

/**
 * All entries in global order: categories concatenated in fixed order.
 * `position` is the 1-based global index used by `remove --index`.
 */
export function orderedEntries(changes: CategorizedChanges): RemovalCandidate[] {
    const result: RemovalCandidate[] = [];
    let position = 1;
    for (const category of CATEGORIES) {
        const entries = changes[category] ?? [];
        entries.forEach((entry, index) => {
            result.push({ category, index, position, entry });
            position++;
        });
    }
    return result;
}

// ============================================================
// Adding
// ============================================================

/**
 * Generates an entry id from the instant, to the millisecond. When the
 * document already holds that id, a numeric suffix keeps it unique.
 *
 * @example
 * generateEntryId(doc, new Date(2024, 0, 15, 10, 30, 0, 123));
 * // 'chg_20240115103000123', or 'chg_20240115103000123_1' on collision
 */
export function generateEntryId(document: PendingDocument, now: Date): string {
    const taken = new Set(orderedEntries(document.changes).map(c => c.entry.id));
    const base = `${ID_PREFIX}${formatDate(now, '%Y%m%d%H%M%S%f')}`;
    let candidate = base;
    let suffix = 1;
    while (taken.has(candidate)) {
        candidate = `${base}_${suffix}`;
        suffix++;
    }
    return candidate;
}

/**
 * Appends a new pending entry to a category.
 *
 * @param category - Raw category name; anything outside the six fixed
 *   categories is rejected
 * @param author - Optional author; blank values are stored as null
 */
export function addEntry(
    document: PendingDocument,
    category: string,
    description: string,
    author: string | null | undefined,
    now: Date
): Result<AddOutcome, ChangelogError> {
    if (!isCategory(category)) {
        return err({
            type: 'invalid-category',
            message: `Unsupported change type: ${category}`,
            valid: CATEGORIES,
        });
    }

    const text = description.trim();
    if (text.length === 0) {
        return err({ type: 'invalid-description', message: 'Description must not be empty' });
    }

    const name = author?.trim() ?? '';
    const entry: ChangeEntry = {
        id: generateEntryId(document, now),
        description: text,
        timestamp: now.toISOString(),
        author: name.length > 0 ? name : null,
        status: 'pending',
    };

    const changes: CategorizedChanges = {
        ...document.changes,
        [category]: [...(document.changes[category] ?? []), entry],
    };

    return ok({ document: recount({ ...document, changes }), entry });
}

// ============================================================
// Removing
// ============================================================

/**
 * Deletes entries by category and index, highest index first within each
 * category. A category whose list becomes empty loses its key.
 */
export function removeEntries(
    document: PendingDocument,
    targets: readonly RemovalTarget[]
): RemoveOutcome {
    const byCategory = new Map<Category, Set<number>>();
    for (const target of targets) {
        const indices = byCategory.get(target.category) ?? new Set<number>();
        indices.add(target.index);
        byCategory.set(target.category, indices);
    }

    const changes: CategorizedChanges = { ...document.changes };
    const removed: ChangeEntry[] = [];

    for (const category of CATEGORIES) {
        const indices = byCategory.get(category);
        const current = changes[category];
        if (!indices || !current) continue;

        const remaining = [...current];
        const descending = [...indices].sort((a, b) => b - a);
        const taken: ChangeEntry[] = [];
        for (const index of descending) {
            const [entry] = remaining.splice(index, 1);
            if (entry) taken.unshift(entry);
        }
        removed.push(...taken);

        if (remaining.length === 0) {
            delete changes[category];
        } else {
            changes[category] = remaining;
        }
    }

    return { document: recount({ ...document, changes }), removed };
}
