/**
 * @fileoverview Changelog module exports.
 * Re-exports the pending-document operations, selection, statistics and
 * the release engine.
 *
 * @module core/changelog
 */

// Categories
export { CATEGORIES, isCategory, categoryTitle } from './categories.js';

// Pending document operations
export {
    createEmptyDocument,
    countChanges,
    recount,
    orderedEntries,
    generateEntryId,
    addEntry,
    removeEntries,
} from './pending.js';

export type { AddOutcome, RemoveOutcome } from './pending.js';

// Removal selection
export { selectCandidates, parsePositions, toTargets } from './selection.js';

// Statistics
export { computeStats } from './stats.js';

// Release engine
export { buildReleaseRecord, releaseVersion } from './release.js';

export type { ReleaseContext, ReleaseRequest, ReleaseSummary } from './release.js';
