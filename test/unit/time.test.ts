/**
 * @fileoverview Unit tests for strftime-style date formatting.
 * @module test/unit/time
 */

import { describe, it, expect } from 'vitest';
import { formatDate } from '../../src/utils/time.js';

describe('formatDate', () => {
    const date = new Date(2024, 0, 5, 9, 3, 7, 45);

    it('formats the default date and time patterns', () => {
        expect(formatDate(date, '%Y-%m-%d')).toBe('2024-01-05');
        expect(formatDate(date, '%H:%M:%S')).toBe('09:03:07');
    });

    it('supports two-digit years and milliseconds', () => {
        expect(formatDate(date, '%y/%f')).toBe('24/045');
    });

    it('emits escaped percent signs and unknown directives verbatim', () => {
        expect(formatDate(date, '100%% %Q')).toBe('100% %Q');
    });

    it('leaves text without directives untouched', () => {
        expect(formatDate(date, 'release day')).toBe('release day');
    });
});
