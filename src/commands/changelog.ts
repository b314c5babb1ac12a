/**
 * @fileoverview Changelog commands: init, add, show, release and stats.
 * Each command loads what it needs, applies one operation, persists and
 * reports. Domain errors are printed and returned, never thrown.
 *
 * @module commands/changelog
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Result } from '../types/base.js';
import type {
    ChangeEntry,
    ChangelogError,
    PendingDocument,
    PendingFormat,
    StatsReport,
} from '../types/changelog.js';
import type { ChangekeepConfig, PathsConfig } from '../types/config.js';
import { addEntry } from '../core/changelog/pending.js';
import { releaseVersion } from '../core/changelog/release.js';
import type { ReleaseSummary } from '../core/changelog/release.js';
import { computeStats } from '../core/changelog/stats.js';
import { renderInitialDocument } from '../core/renderer/markdown.js';
import { renderPending } from '../core/renderer/pending.js';
import { renderStats } from '../core/renderer/pretty.js';
import { configFilePath, resolveAllPaths, updateProject } from '../state/config.js';
import { resetPending, savePending } from '../state/pending.js';
import { ok } from '../utils/result.js';
import { loadConfigFor, loadPendingFor } from './context.js';
import type { CommandContext } from './context.js';
import { fail } from './report.js';

const RULE = '='.repeat(60);

// ============================================================
// init
// ============================================================

export interface InitOptions {
    /** Project name; defaults to the configured one */
    readonly name?: string;
}

export interface InitOutcome {
    readonly config: ChangekeepConfig;
    readonly paths: PathsConfig;
}

/**
 * Writes a fresh changelog document and an empty pending store. Running
 * it again resets both.
 */
export function initCommand(context: CommandContext, options: InitOptions = {}): Result<InitOutcome, ChangelogError> {
    let config = loadConfigFor(context);

    const name = options.name?.trim();
    if (name) {
        const updated = updateProject(context.root, config, 'name', name);
        if (!updated.ok) return fail(context.output, updated.error);
        config = updated.value;
    }

    const paths = resolveAllPaths(context.root, config);
    fs.mkdirSync(path.dirname(paths.changelog), { recursive: true });
    fs.writeFileSync(paths.changelog, renderInitialDocument(config.project.name), 'utf-8');
    fs.mkdirSync(paths.releases, { recursive: true });
    resetPending(paths.unreleased, config.project.name, context.now());

    const { output } = context;
    output.success('Changelog project initialized');
    output.info(`Project:    ${config.project.name}`);
    output.info(`Changelog:  ${paths.changelog}`);
    output.info(`Config:     ${configFilePath(context.root)}`);
    output.info(`Unreleased: ${paths.unreleased}`);

    return ok({ config, paths });
}

// ============================================================
// add
// ============================================================

export interface AddOptions {
    readonly category: string;
    readonly description: string;
    readonly author?: string;
}

/**
 * Records a pending change.
 */
export function addCommand(context: CommandContext, options: AddOptions): Result<ChangeEntry, ChangelogError> {
    const config = loadConfigFor(context);
    const paths = resolveAllPaths(context.root, config);
    const pending = loadPendingFor(context, paths.unreleased, config.project.name);

    const now = context.now();
    const added = addEntry(pending, options.category, options.description, options.author, now);
    if (!added.ok) return fail(context.output, added.error);

    savePending(paths.unreleased, added.value.document, now);

    const { entry } = added.value;
    context.output.success(`Change added: [${options.category}] ${entry.description}`);
    if (entry.author) {
        context.output.info(`Author: ${entry.author}`);
    }
    return ok(entry);
}

// ============================================================
// show
// ============================================================

export interface ShowOptions {
    /** Print the changelog document before the pending view */
    readonly all?: boolean;
    readonly format?: PendingFormat;
}

/**
 * Prints pending changes, optionally preceded by the whole changelog.
 * The structured view is the stored file as it is on disk.
 */
export function showCommand(context: CommandContext, options: ShowOptions = {}): Result<PendingDocument, ChangelogError> {
    const config = loadConfigFor(context);
    const paths = resolveAllPaths(context.root, config);
    const { output } = context;

    if (options.all && fs.existsSync(paths.changelog)) {
        output.print(RULE);
        output.print(`ALL CHANGES (${path.basename(paths.changelog)}):`);
        output.print(RULE);
        output.print(fs.readFileSync(paths.changelog, 'utf-8'));
        output.print(RULE);
    }

    const pending = loadPendingFor(context, paths.unreleased, config.project.name);
    const format = options.format ?? 'pretty';
    output.print(format === 'structured'
        ? fs.readFileSync(paths.unreleased, 'utf-8').trimEnd()
        : renderPending(pending, format, config.settings));
    return ok(pending);
}

// ============================================================
// release
// ============================================================

export interface ReleaseOptions {
    readonly version: string;
    readonly notes?: string;
    readonly tag?: boolean;
}

/**
 * Releases all pending changes under a version.
 */
export function releaseCommand(context: CommandContext, options: ReleaseOptions): Result<ReleaseSummary, ChangelogError> {
    const config = loadConfigFor(context);
    const paths = resolveAllPaths(context.root, config);
    const pending = loadPendingFor(context, paths.unreleased, config.project.name);
    const result = releaseVersion(
        { root: context.root, config, now: context.now, tagger: context.tagger, pending },
        options
    );
    if (!result.ok) return fail(context.output, result.error);

    const summary = result.value;
    const { output } = context;

    switch (summary.tag.status) {
        case 'created':
            output.success(`Git tag created: ${summary.tag.tag}`);
            break;
        case 'failed':
            output.warn(`Could not create git tag ${summary.tag.tag}: ${summary.tag.message}`);
            break;
        case 'skipped':
            break;
    }

    output.success(`Release ${summary.version} created`);
    output.info(`Date:    ${summary.date}`);
    output.info(`Changes: ${summary.totalChanges}`);
    output.info(`Record:  ${summary.recordPath}`);
    if (summary.backupPath) {
        output.info(`Backup:  ${summary.backupPath}`);
    }
    return result;
}

// ============================================================
// stats
// ============================================================

/**
 * Prints per-category and per-author counts.
 */
export function statsCommand(context: CommandContext): Result<StatsReport, ChangelogError> {
    const config = loadConfigFor(context);
    const paths = resolveAllPaths(context.root, config);
    const report = computeStats(loadPendingFor(context, paths.unreleased, config.project.name));
    context.output.print(renderStats(report));
    return ok(report);
}
