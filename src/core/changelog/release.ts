/**
 * @fileoverview Release engine.
 * Freezes the pending changes under a version: writes the immutable
 * release record, splices a section into the changelog document, clears
 * the pending store and optionally tags the release in git.
 *
 * @module core/changelog/release
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Clock, Result } from '../../types/base.js';
import type { ChangelogError, PendingDocument, ReleaseRecord } from '../../types/changelog.js';
import type { ChangekeepConfig } from '../../types/config.js';
import { ok, err } from '../../utils/result.js';
import { formatDate } from '../../utils/time.js';
import { resolveAllPaths, saveConfig } from '../../state/config.js';
import { loadPending, resetPending } from '../../state/pending.js';
import {
    normalizeVersion,
    releaseExists,
    releaseFilePath,
    writeReleaseRecord,
} from '../../state/releases.js';
import { tagMessage } from '../../vcs/git.js';
import type { TagOutcome, Tagger } from '../../vcs/git.js';
import { FALLBACK_DOCUMENT, insertRelease, renderReleaseBlock } from '../renderer/markdown.js';
import { countChanges } from './pending.js';

// ============================================================
// Types
// ============================================================

/**
 * What a release needs from its surroundings.
 */
export interface ReleaseContext {
    readonly root: string;
    readonly config: ChangekeepConfig;
    readonly now: Clock;
    readonly tagger: Tagger;
    /** Pending document already loaded by the caller; read from disk when absent */
    readonly pending?: PendingDocument;
}

export interface ReleaseRequest {
    /** Version as typed; a leading "v" is kept for display */
    readonly version: string;
    readonly notes?: string;
    /** Tag in git even when `git_integration` is off */
    readonly tag?: boolean;
}

/**
 * What happened during a successful release.
 */
export interface ReleaseSummary {
    readonly version: string;
    readonly date: string;
    readonly totalChanges: number;
    readonly recordPath: string;
    readonly changelogPath: string;
    /** Copy of the previous changelog, when `auto_backup` made one */
    readonly backupPath: string | null;
    readonly tag: TagOutcome;
    /** Configuration with `project.version` advanced */
    readonly config: ChangekeepConfig;
}

// ============================================================
// Record Construction
// ============================================================

/**
 * Builds the record for a release from the pending document. The changes
 * are deep-copied so the record shares nothing with the pending state.
 */
export function buildReleaseRecord(
    pending: PendingDocument,
    version: string,
    notes: string,
    dateFormat: string,
    now: Date
): ReleaseRecord {
    return {
        version,
        date: formatDate(now, dateFormat),
        timestamp: now.toISOString(),
        release_notes: notes,
        changes: structuredClone(pending.changes),
        metadata: { total_changes: countChanges(pending.changes) },
    };
}

// ============================================================
// Release
// ============================================================

/**
 * Performs a release. Nothing is written when there are no pending
 * changes or a record for the version already exists; the latter also
 * stops a retried release from recording the same changes twice.
 *
 * A failed git tag does not undo the release; it is reported in
 * `summary.tag`.
 *
 * @example
 * const result = releaseVersion(context, { version: 'v1.2.0', notes: 'Spring cleanup' });
 * if (result.ok) {
 *   console.log(`Released ${result.value.totalChanges} changes`);
 * }
 */
export function releaseVersion(
    context: ReleaseContext,
    request: ReleaseRequest
): Result<ReleaseSummary, ChangelogError> {
    const { root, config } = context;
    const version = request.version.trim();
    const notes = request.notes?.trim() ?? '';

    if (version.length === 0 || normalizeVersion(version).length === 0) {
        return err({ type: 'invalid-value', message: 'Version must not be empty' });
    }
    if (/[\\/]/.test(version)) {
        return err({ type: 'invalid-value', message: `Version must not contain path separators: ${version}` });
    }

    const now = context.now();
    const paths = resolveAllPaths(root, config);
    const pending = context.pending ?? loadPending(paths.unreleased, config.project.name, now).value;

    if (countChanges(pending.changes) === 0) {
        return err({ type: 'no-pending-changes', message: 'No unreleased changes to release' });
    }

    if (releaseExists(paths.releases, version)) {
        const existing = releaseFilePath(paths.releases, version);
        return err({
            type: 'release-exists',
            message: `Release ${version} has already been recorded`,
            path: existing,
        });
    }

    const record = buildReleaseRecord(pending, version, notes, config.settings.date_format, now);
    const recordPath = writeReleaseRecord(paths.releases, record);

    const current = fs.existsSync(paths.changelog) ? fs.readFileSync(paths.changelog, 'utf-8') : null;
    let backupPath: string | null = null;
    if (current !== null && config.settings.auto_backup) {
        backupPath = `${paths.changelog}.bak`;
        fs.copyFileSync(paths.changelog, backupPath);
    }

    const block = renderReleaseBlock({ version, date: record.date, notes, changes: record.changes });
    fs.mkdirSync(path.dirname(paths.changelog), { recursive: true });
    fs.writeFileSync(paths.changelog, insertRelease(current ?? FALLBACK_DOCUMENT, block), 'utf-8');

    resetPending(paths.unreleased, config.project.name, now);

    const updatedConfig: ChangekeepConfig = {
        ...config,
        project: { ...config.project, version: normalizeVersion(version) },
    };
    saveConfig(root, updatedConfig);

    const tag: TagOutcome = request.tag === true || config.settings.git_integration
        ? context.tagger(root, version, tagMessage(version, notes))
        : { status: 'skipped' };

    return ok({
        version,
        date: record.date,
        totalChanges: record.metadata.total_changes,
        recordPath,
        changelogPath: paths.changelog,
        backupPath,
        tag,
        config: updatedConfig,
    });
}
