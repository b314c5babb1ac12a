/**
 * @fileoverview Property tests for the pending counter and global numbering.
 * Whatever sequence of additions and removals is applied, the stored total
 * equals the number of entries and positions stay contiguous.
 *
 * @module test/property/count-invariant.property.test
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import type { Category, PendingDocument } from '../../src/types/changelog.js';
import { CATEGORIES } from '../../src/core/changelog/categories.js';
import {
    addEntry,
    countChanges,
    createEmptyDocument,
    orderedEntries,
    removeEntries,
} from '../../src/core/changelog/pending.js';
import { parsePositions, selectCandidates, toTargets } from '../../src/core/changelog/selection.js';
import { FIXED_DATE } from '../helpers/fixtures.js';

// ============================================================
// Arbitrary Generators
// ============================================================

const arbCategory: fc.Arbitrary<Category> = fc.constantFrom(...CATEGORIES);

const arbDescription = fc.string({ minLength: 1, maxLength: 30 }).filter(s => s.trim().length > 0);

const arbAdditions = fc.array(fc.tuple(arbCategory, arbDescription), { minLength: 0, maxLength: 25 });

function build(additions: ReadonlyArray<readonly [Category, string]>): PendingDocument {
    let doc = createEmptyDocument('demo', FIXED_DATE);
    for (const [category, description] of additions) {
        const result = addEntry(doc, category, description, null, FIXED_DATE);
        if (!result.ok) throw new Error(result.error.message);
        doc = result.value.document;
    }
    return doc;
}

// ============================================================
// Properties
// ============================================================

describe('pending counter', () => {
    it('matches the number of entries after any additions', () => {
        fc.assert(
            fc.property(arbAdditions, (additions) => {
                const doc = build(additions);
                expect(doc.metadata.total_changes).toBe(additions.length);
                expect(countChanges(doc.changes)).toBe(additions.length);
            })
        );
    });

    it('keeps ids unique', () => {
        fc.assert(
            fc.property(arbAdditions, (additions) => {
                const ids = orderedEntries(build(additions).changes).map(c => c.entry.id);
                expect(new Set(ids).size).toBe(ids.length);
            })
        );
    });

    it('drops exactly the selected entries on removal', () => {
        fc.assert(
            fc.property(arbAdditions, fc.array(fc.nat(30)), (additions, picks) => {
                const doc = build(additions);
                const all = selectCandidates(doc, {});
                const chosen = all.filter(c => picks.includes(c.position));

                const { document, removed } = removeEntries(doc, toTargets(chosen));

                expect(removed).toHaveLength(chosen.length);
                expect(document.metadata.total_changes).toBe(all.length - chosen.length);
                expect(orderedEntries(document.changes).map(c => c.entry.id)).toEqual(
                    all.filter(c => !picks.includes(c.position)).map(c => c.entry.id)
                );
            })
        );
    });

    it('numbers entries 1..n with no gaps', () => {
        fc.assert(
            fc.property(arbAdditions, (additions) => {
                const positions = orderedEntries(build(additions).changes).map(c => c.position);
                expect(positions).toEqual(additions.map((_, i) => i + 1));
            })
        );
    });
});

describe('parsePositions', () => {
    it('returns distinct positions within range', () => {
        fc.assert(
            fc.property(fc.string({ maxLength: 40 }), fc.nat(20), (input, count) => {
                const positions = parsePositions(input, count);
                expect(new Set(positions).size).toBe(positions.length);
                for (const p of positions) {
                    expect(Number.isInteger(p)).toBe(true);
                    expect(p).toBeGreaterThanOrEqual(1);
                    expect(p).toBeLessThanOrEqual(count);
                }
            })
        );
    });
});
