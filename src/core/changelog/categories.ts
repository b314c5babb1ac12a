/**
 * @fileoverview The fixed set of change categories and their display order.
 *
 * @module core/changelog/categories
 */

import type { Category } from '../../types/changelog.js';

/**
 * All categories in the order they are listed, numbered and rendered.
 */
export const CATEGORIES: readonly Category[] = [
    'added',
    'changed',
    'deprecated',
    'removed',
    'fixed',
    'security',
];

/**
 * Type guard for category names coming from user input or disk.
 */
export function isCategory(value: string): value is Category {
    return CATEGORIES.some(category => category === value);
}

/**
 * Section title used in Markdown output ("fixed" -> "Fixed").
 */
export function categoryTitle(category: Category): string {
    return category.charAt(0).toUpperCase() + category.slice(1);
}
