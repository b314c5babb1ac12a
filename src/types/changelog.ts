/**
 * @fileoverview Changelog types for changekeep.
 * Defines change entries, the pending document, release records and the
 * error union shared by the changelog operations.
 * Imports only from types/base.ts - Layer 1 of the type system.
 *
 * @module types/changelog
 */

// ============================================================
// Category Types
// ============================================================

/**
 * Kind of change, following the Keep a Changelog section names.
 * The set is closed; unknown categories are rejected rather than
 * creating new sections.
 */
export type Category =
    | 'added'
    | 'changed'
    | 'deprecated'
    | 'removed'
    | 'fixed'
    | 'security';

/**
 * Output mode for the pending-changes view.
 * - structured: the full pending document as JSON
 * - pretty: numbered console listing
 * - markdown: bullet list under `### Category` headings
 */
export type PendingFormat = 'structured' | 'pretty' | 'markdown';

// ============================================================
// Entry Types
// ============================================================

/**
 * A single recorded change.
 *
 * @example
 * const entry: ChangeEntry = {
 *   id: 'chg_20240115103000123',
 *   description: 'Fix crash on startup',
 *   timestamp: '2024-01-15T10:30:00.123Z',
 *   author: 'Ana',
 *   status: 'pending'
 * };
 */
export interface ChangeEntry {
    /** Unique id derived from the creation instant */
    readonly id: string;
    /** Human-readable description, never empty */
    readonly description: string;
    /** ISO 8601 creation instant */
    readonly timestamp: string;
    /** Optional author name */
    readonly author: string | null;
    readonly status: 'pending';
}

/**
 * Entries grouped by category. A key may be absent once its last entry
 * has been removed.
 */
export type CategorizedChanges = Partial<Record<Category, readonly ChangeEntry[]>>;

/**
 * Counters kept alongside the changes.
 */
export interface ChangeMetadata {
    /** Always equal to the sum of all category list lengths */
    readonly total_changes: number;
}

// ============================================================
// Document Types
// ============================================================

/**
 * The pending ("unreleased") document persisted as unreleased.json.
 * Field names follow the on-disk format.
 */
export interface PendingDocument {
    /** Project name at the time the document was created */
    readonly project: string;
    /** ISO 8601 instant the document was created */
    readonly created: string;
    /** ISO 8601 instant of the last save */
    readonly last_modified: string;
    readonly changes: CategorizedChanges;
    readonly metadata: ChangeMetadata;
}

/**
 * Immutable record written once per release.
 *
 * @example
 * const record: ReleaseRecord = {
 *   version: 'v2.0.0',
 *   date: '2024-01-15',
 *   timestamp: '2024-01-15T10:30:00.000Z',
 *   release_notes: 'Major rewrite',
 *   changes: { added: [...] },
 *   metadata: { total_changes: 1 }
 * };
 */
export interface ReleaseRecord {
    /** Version as supplied by the user, "v" prefix preserved */
    readonly version: string;
    /** Release date formatted with the configured date format */
    readonly date: string;
    /** ISO 8601 release instant */
    readonly timestamp: string;
    readonly release_notes: string;
    readonly changes: CategorizedChanges;
    readonly metadata: ChangeMetadata;
}

// ============================================================
// Selection Types
// ============================================================

/**
 * Filters for picking entries to remove. All given filters must agree.
 */
export interface RemovalFilter {
    /** Restrict to one category */
    readonly category?: Category;
    /** Case-insensitive substring of the description */
    readonly pattern?: string;
    /** 1-based position across all categories in fixed order */
    readonly index?: number;
}

/**
 * An entry matched by a removal filter.
 */
export interface RemovalCandidate {
    readonly category: Category;
    /** Zero-based index inside the category list */
    readonly index: number;
    /** 1-based global position */
    readonly position: number;
    readonly entry: ChangeEntry;
}

/**
 * Location of an entry to delete.
 */
export interface RemovalTarget {
    readonly category: Category;
    readonly index: number;
}

// ============================================================
// Statistics Types
// ============================================================

export interface CategoryCount {
    readonly category: Category;
    readonly count: number;
}

export interface AuthorCount {
    readonly author: string;
    readonly count: number;
}

/**
 * Summary of the pending document.
 */
export interface StatsReport {
    /** Non-zero categories in fixed order */
    readonly categories: readonly CategoryCount[];
    readonly total: number;
    /** Sorted by count, descending */
    readonly authors: readonly AuthorCount[];
}

// ============================================================
// Error Types
// ============================================================

/**
 * Error types for changelog operations. Each is reported to the user and
 * aborts the operation without touching any file.
 */
export type ChangelogError =
    | { readonly type: 'unknown-key'; readonly message: string }
    | { readonly type: 'invalid-value'; readonly message: string }
    | { readonly type: 'invalid-category'; readonly message: string; readonly valid: readonly Category[] }
    | { readonly type: 'invalid-description'; readonly message: string }
    | { readonly type: 'no-pending-changes'; readonly message: string }
    | { readonly type: 'release-exists'; readonly message: string; readonly path: string }
    | { readonly type: 'no-match'; readonly message: string };
