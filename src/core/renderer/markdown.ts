/**
 * @fileoverview Markdown renderer for changekeep.
 * Renders the initial changelog document, release sections and the pending
 * view, and splices new release sections into an existing document.
 * Layer 2 - imports only from types and core/changelog.
 *
 * @module core/renderer/markdown
 */

import type { CategorizedChanges, ChangeEntry, PendingDocument } from '../../types/changelog.js';
import { CATEGORIES, categoryTitle } from '../changelog/categories.js';

// ============================================================
// Constants
// ============================================================

/** Heading that marks the unreleased section; releases go directly below it. */
export const UNRELEASED_MARKER = '## [Unreleased]';

/** Document used when a release finds no changelog file. */
export const FALLBACK_DOCUMENT = `# Changelog\n\n${UNRELEASED_MARKER}\n`;

// ============================================================
// Types
// ============================================================

/**
 * Everything needed to render one release section.
 */
export interface ReleaseBlockInput {
    /** Version as displayed, "v" prefix preserved */
    readonly version: string;
    readonly date: string;
    readonly notes: string;
    readonly changes: CategorizedChanges;
}

// ============================================================
// Helper Functions
// ============================================================

const formatEntryLine = (entry: ChangeEntry): string =>
    entry.author ? `- ${entry.description} (${entry.author})` : `- ${entry.description}`;

/**
 * One `### Category` block per non-empty category, in fixed order.
 */
function renderCategorySections(changes: CategorizedChanges): string[] {
    const sections: string[] = [];
    for (const category of CATEGORIES) {
        const entries = changes[category] ?? [];
        if (entries.length === 0) continue;
        sections.push([`### ${categoryTitle(category)}`, ...entries.map(formatEntryLine)].join('\n'));
    }
    return sections;
}

// ============================================================
// Render Functions
// ============================================================

/**
 * Renders the starting document written by `init`.
 *
 * @example
 * renderInitialDocument('demo').split('\n')[0]; // '# Changelog - demo'
 */
export function renderInitialDocument(projectName: string): string {
    return [
        `# Changelog - ${projectName}`,
        '',
        'All notable changes to this project will be documented in this file.',
        '',
        'The format is based on [Keep a Changelog](https://keepachangelog.com/en/1.1.0/),',
        'and this project adheres to [Semantic Versioning](https://semver.org/spec/v2.0.0.html).',
        '',
        UNRELEASED_MARKER,
        '',
    ].join('\n');
}

/**
 * Renders a release section without a trailing newline.
 *
 * @example
 * renderReleaseBlock({ version: '1.2.0', date: '2024-01-15', notes: '', changes });
 * // ## [1.2.0] - 2024-01-15
 * //
 * // ### Added
 * // - Dark mode (Ana)
 */
export function renderReleaseBlock(input: ReleaseBlockInput): string {
    const parts = [`## [${input.version}] - ${input.date}`];
    const notes = input.notes.trim();
    if (notes.length > 0) {
        parts.push(notes);
    }
    parts.push(...renderCategorySections(input.changes));
    return parts.join('\n\n');
}

/**
 * Inserts a release section directly below the first `## [Unreleased]`
 * line, separated from its neighbours by single blank lines. Without a
 * marker the section is appended. The result always ends with a newline.
 */
export function insertRelease(document: string, block: string): string {
    const lines = document.split('\n');
    const markerIndex = lines.findIndex(line => line.trim() === UNRELEASED_MARKER);

    if (markerIndex === -1) {
        const body = document.trimEnd();
        return body.length === 0 ? `${block}\n` : `${body}\n\n${block}\n`;
    }

    const rest = lines.slice(markerIndex + 1);
    while (rest.length > 0 && rest[0]?.trim() === '') {
        rest.shift();
    }

    const result = [...lines.slice(0, markerIndex + 1), '', block];
    if (rest.length > 0) {
        result.push('', ...rest);
    }

    const text = result.join('\n');
    return text.endsWith('\n') ? text : `${text}\n`;
}

/**
 * Renders pending changes as Markdown bullet lists.
 */
export function renderPendingMarkdown(document: PendingDocument): string {
    const sections = renderCategorySections(document.changes);
    return sections.length === 0 ? 'No unreleased changes' : sections.join('\n\n');
}
