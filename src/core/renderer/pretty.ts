/**
 * @fileoverview Console text renderers: pending listing, statistics and
 * configuration summary.
 *
 * @module core/renderer/pretty
 */

import type { PendingDocument, StatsReport } from '../../types/changelog.js';
import type { ChangekeepConfig, SettingsConfig } from '../../types/config.js';
import { CATEGORIES, categoryTitle } from '../changelog/categories.js';
import { countChanges, orderedEntries } from '../changelog/pending.js';
import { formatDate } from '../../utils/time.js';

const RULE = '='.repeat(60);
const THIN_RULE = '-'.repeat(40);

/**
 * Absolute locations shown by `config show`.
 */
export interface ResolvedPaths {
    readonly config: string;
    readonly changelog: string;
    readonly unreleased: string;
    readonly releases: string;
}

function formatInstant(iso: string, pattern: string): string {
    const date = new Date(iso);
    return Number.isNaN(date.getTime()) ? iso : formatDate(date, pattern);
}

/**
 * Renders pending changes for the console. Entries are numbered by their
 * global position, which is the number `remove --index` expects.
 */
export function renderPendingPretty(
    document: PendingDocument,
    settings: Pick<SettingsConfig, 'date_format' | 'time_format'>
): string {
    const total = countChanges(document.changes);
    if (total === 0) {
        return '✓ No unreleased changes';
    }

    const lines = [RULE, `UNRELEASED CHANGES (${total})`, RULE];
    const entries = orderedEntries(document.changes);

    for (const category of CATEGORIES) {
        const inCategory = entries.filter(c => c.category === category);
        if (inCategory.length === 0) continue;

        lines.push('', `### ${categoryTitle(category)}`);
        for (const { position, entry } of inCategory) {
            const author = entry.author ? ` @${entry.author}` : '';
            lines.push(`  ${position}. ${entry.description}${author}`);
        }
    }

    const pattern = `${settings.date_format} ${settings.time_format}`;
    lines.push('', `Last modified: ${formatInstant(document.last_modified, pattern)}`, RULE);
    return lines.join('\n');
}

/**
 * Renders the `stats` report.
 */
export function renderStats(report: StatsReport): string {
    if (report.total === 0) {
        return 'No unreleased changes';
    }

    const lines = ['Pending change statistics:', THIN_RULE];
    for (const { category, count } of report.categories) {
        lines.push(`  ${category.padEnd(12)}: ${String(count).padStart(3)}`);
    }
    lines.push(THIN_RULE, `  ${'total'.padEnd(12)}: ${String(report.total).padStart(3)}`);

    if (report.authors.length > 0) {
        lines.push('', 'Authors:');
        for (const { author, count } of report.authors) {
            lines.push(`  ${author.padEnd(20)}: ${String(count).padStart(3)}`);
        }
    }
    return lines.join('\n');
}

/**
 * Renders the `config show` summary.
 */
export function renderConfig(config: ChangekeepConfig, paths: ResolvedPaths): string {
    const lines = [
        'Current configuration:',
        RULE,
        `Project: ${config.project.name}`,
        `Version: ${config.project.version}`,
        `Author:  ${config.project.author}`,
        `License: ${config.project.license}`,
        '',
        'Paths:',
        `  config:     ${paths.config}`,
        `  changelog:  ${paths.changelog}`,
        `  unreleased: ${paths.unreleased}`,
        `  releases:   ${paths.releases}`,
        '',
        'Settings:',
    ];
    for (const [key, value] of Object.entries(config.settings)) {
        lines.push(`  ${key}: ${String(value)}`);
    }
    lines.push(RULE);
    return lines.join('\n');
}
