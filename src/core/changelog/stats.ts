/**
 * @fileoverview Statistics over the pending document.
 *
 * @module core/changelog/stats
 */

import type {
    AuthorCount,
    CategoryCount,
    PendingDocument,
    StatsReport,
} from '../../types/changelog.js';
import { CATEGORIES } from './categories.js';
import { orderedEntries } from './pending.js';

/**
 * Counts entries per category and per author.
 * Zero-count categories are omitted. Authors are sorted by count,
 * descending; equal counts keep the order in which the author first appears.
 *
 * @example
 * const report = computeStats(doc);
 * console.log(`${report.total} pending, top author: ${report.authors[0]?.author}`);
 */
export function computeStats(document: PendingDocument): StatsReport {
    const categories: CategoryCount[] = [];
    for (const category of CATEGORIES) {
        const count = document.changes[category]?.length ?? 0;
        if (count > 0) {
            categories.push({ category, count });
        }
    }

    const byAuthor = new Map<string, number>();
    for (const { entry } of orderedEntries(document.changes)) {
        if (entry.author) {
            byAuthor.set(entry.author, (byAuthor.get(entry.author) ?? 0) + 1);
        }
    }

    // Array.prototype.sort is stable, so ties stay in first-appearance order
    const authors: AuthorCount[] = [...byAuthor.entries()]
        .map(([author, count]) => ({ author, count }))
        .sort((a, b) => b.count - a.count);

    return {
        categories,
        total: categories.reduce((sum, c) => sum + c.count, 0),
        authors,
    };
}
