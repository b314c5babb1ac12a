/**
 * @fileoverview Candidate selection for removing pending entries.
 * Pure matching logic; the confirmation step lives in commands/remove.ts.
 *
 * @module core/changelog/selection
 */

import type {
    PendingDocument,
    RemovalCandidate,
    RemovalFilter,
    RemovalTarget,
} from '../../types/changelog.js';
import { orderedEntries } from './pending.js';

/**
 * Returns the entries matching every given filter, in global order.
 * With no filters at all, every entry is a candidate.
 *
 * @example
 * // added: ["A", "B"], fixed: ["C"]
 * selectCandidates(doc, { index: 3 });          // [C]
 * selectCandidates(doc, { pattern: 'a' });       // [A]
 * selectCandidates(doc, { category: 'added' });  // [A, B]
 */
export function selectCandidates(
    document: PendingDocument,
    filter: RemovalFilter
): RemovalCandidate[] {
    const needle = filter.pattern?.toLowerCase();

    return orderedEntries(document.changes).filter(candidate => {
        if (filter.category !== undefined && candidate.category !== filter.category) {
            return false;
        }
        if (needle !== undefined && !candidate.entry.description.toLowerCase().includes(needle)) {
            return false;
        }
        if (filter.index !== undefined && candidate.position !== filter.index) {
            return false;
        }
        return true;
    });
}

/**
 * Parses a comma-separated list of 1-based positions into the candidate
 * list. Tokens that are not plain digits or fall outside `1..count` are
 * dropped; duplicates keep their first occurrence.
 *
 * @example
 * parsePositions('3, 1, x, 9, 1', 3); // [3, 1]
 */
export function parsePositions(input: string, count: number): number[] {
    const positions: number[] = [];
    for (const token of input.split(',')) {
        const trimmed = token.trim();
        if (!/^\d+$/.test(trimmed)) continue;
        const value = Number(trimmed);
        if (value < 1 || value > count || positions.includes(value)) continue;
        positions.push(value);
    }
    return positions;
}

/**
 * Maps chosen candidates to removal targets.
 */
export function toTargets(candidates: readonly RemovalCandidate[]): RemovalTarget[] {
    return candidates.map(({ category, index }) => ({ category, index }));
}
