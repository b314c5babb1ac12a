/**
 * @fileoverview The remove command.
 * Matching is done by selectCandidates; this module only adds the
 * confirmation step around it.
 *
 * @module commands/remove
 */

import type { Result } from '../types/base.js';
import type {
    ChangeEntry,
    ChangelogError,
    RemovalCandidate,
    RemovalFilter,
} from '../types/changelog.js';
import { removeEntries } from '../core/changelog/pending.js';
import { parsePositions, selectCandidates, toTargets } from '../core/changelog/selection.js';
import { resolveAllPaths } from '../state/config.js';
import { savePending } from '../state/pending.js';
import { ok } from '../utils/result.js';
import { loadConfigFor, loadPendingFor } from './context.js';
import type { CommandContext } from './context.js';
import { fail } from './report.js';

export interface RemoveOutcome {
    /** Removed entries; empty when the user cancelled */
    readonly removed: readonly ChangeEntry[];
    readonly aborted: boolean;
}

const ABORTED: RemoveOutcome = { removed: [], aborted: true };

/**
 * Asks which of the candidates to delete. Null means cancel.
 */
async function chooseCandidates(
    context: CommandContext,
    candidates: readonly RemovalCandidate[]
): Promise<readonly RemovalCandidate[] | null> {
    const { prompter, output } = context;
    const [only] = candidates;

    if (only && candidates.length === 1) {
        return (await prompter.confirmRemoval(only)) ? [only] : null;
    }

    const choice = await prompter.chooseAction(candidates);
    switch (choice) {
        case 'all':
            return candidates;
        case 'abort':
            return null;
        case 'pick': {
            const positions = parsePositions(await prompter.pickPositions(candidates), candidates.length);
            if (positions.length === 0) {
                output.warn('No valid numbers given');
                return null;
            }
            return candidates.filter((_, i) => positions.includes(i + 1));
        }
    }
}

/**
 * Removes pending entries matching the filter after confirmation.
 * Cancelling is a successful no-op.
 */
export async function removeCommand(
    context: CommandContext,
    filter: RemovalFilter
): Promise<Result<RemoveOutcome, ChangelogError>> {
    const { output } = context;
    const config = loadConfigFor(context);
    const paths = resolveAllPaths(context.root, config);
    const pending = loadPendingFor(context, paths.unreleased, config.project.name);

    const candidates = selectCandidates(pending, filter);
    if (candidates.length === 0) {
        return fail(output, { type: 'no-match', message: 'No matching changes found' });
    }

    output.print('Matching changes:');
    candidates.forEach((candidate, i) => {
        output.print(`  [${i + 1}] [${candidate.category}] ${candidate.entry.description}`);
    });

    const chosen = await chooseCandidates(context, candidates);
    if (chosen === null) {
        output.info('Cancelled');
        return ok(ABORTED);
    }

    const outcome = removeEntries(pending, toTargets(chosen));
    savePending(paths.unreleased, outcome.document, context.now());

    output.success(`Removed ${outcome.removed.length} change(s)`);
    return ok({ removed: outcome.removed, aborted: false });
}
