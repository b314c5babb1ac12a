/**
 * @fileoverview Unit tests for removal candidate selection.
 * @module test/unit/selection
 */

import { describe, it, expect } from 'vitest';
import { parsePositions, selectCandidates, toTargets } from '../../src/core/changelog/selection.js';
import { documentWith, entry } from '../helpers/fixtures.js';

const doc = documentWith({
    added: [entry('A'), entry('B')],
    fixed: [entry('C')],
});

const descriptions = (filter: Parameters<typeof selectCandidates>[1]): string[] =>
    selectCandidates(doc, filter).map(c => c.entry.description);

describe('selectCandidates', () => {
    it('matches only the entry at a global index', () => {
        expect(descriptions({ index: 3 })).toEqual(['C']);
        expect(descriptions({ index: 1 })).toEqual(['A']);
    });

    it('reports the category, local index and global position of a match', () => {
        expect(selectCandidates(doc, { index: 3 })).toEqual([
            { category: 'fixed', index: 0, position: 3, entry: entry('C') },
        ]);
    });

    it('returns every entry when no filter is given', () => {
        expect(descriptions({})).toEqual(['A', 'B', 'C']);
    });

    it('restricts to a category', () => {
        expect(descriptions({ category: 'added' })).toEqual(['A', 'B']);
    });

    it('matches patterns case-insensitively as substrings', () => {
        const mixed = documentWith({ changed: [entry('Dark Mode toggle'), entry('Light theme')] });
        expect(selectCandidates(mixed, { pattern: 'MODE' }).map(c => c.entry.description)).toEqual(['Dark Mode toggle']);
    });

    it('requires all filters to agree', () => {
        expect(descriptions({ category: 'fixed', index: 1 })).toEqual([]);
        expect(descriptions({ category: 'fixed', index: 3 })).toEqual(['C']);
        expect(descriptions({ category: 'added', pattern: 'b' })).toEqual(['B']);
        expect(descriptions({ pattern: 'c', index: 2 })).toEqual([]);
    });

    it('matches nothing for out-of-range positions', () => {
        expect(descriptions({ index: 4 })).toEqual([]);
        expect(descriptions({ index: 0 })).toEqual([]);
    });
});

describe('parsePositions', () => {
    it('keeps valid positions in the order given, without duplicates', () => {
        expect(parsePositions('3, 1, x, 9, 1', 3)).toEqual([3, 1]);
    });

    it('drops zero, fractions and blanks', () => {
        expect(parsePositions('0,2', 2)).toEqual([2]);
        expect(parsePositions('1.5', 3)).toEqual([]);
        expect(parsePositions('', 3)).toEqual([]);
        expect(parsePositions(' 2 ', 2)).toEqual([2]);
    });
});

describe('toTargets', () => {
    it('keeps only category and local index', () => {
        expect(toTargets(selectCandidates(doc, { category: 'added' }))).toEqual([
            { category: 'added', index: 0 },
            { category: 'added', index: 1 },
        ]);
    });
});
