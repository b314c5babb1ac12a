/**
 * @fileoverview Interactive confirmation for `remove`.
 * The removal command only talks to the RemovalPrompter interface; this
 * module provides the terminal implementation.
 *
 * @module ui/prompts
 */

import { confirm, input, select } from '@inquirer/prompts';
import type { RemovalCandidate } from '../types/changelog.js';

/**
 * What to do with several matched entries.
 */
export type RemovalChoice = 'all' | 'pick' | 'abort';

export interface RemovalPrompter {
    /** Asks whether to delete the single matched entry. */
    confirmRemoval(candidate: RemovalCandidate): Promise<boolean>;
    /** Asks what to do with several matched entries. */
    chooseAction(candidates: readonly RemovalCandidate[]): Promise<RemovalChoice>;
    /** Asks for comma-separated 1-based positions into the candidate list. */
    pickPositions(candidates: readonly RemovalCandidate[]): Promise<string>;
}

/**
 * Ctrl+C inside a prompt rejects with ExitPromptError; that counts as
 * declining.
 */
function isPromptExit(error: unknown): boolean {
    return error instanceof Error && error.name === 'ExitPromptError';
}

async function orAbort<T>(question: Promise<T>, aborted: T): Promise<T> {
    try {
        return await question;
    } catch (e) {
        if (isPromptExit(e)) return aborted;
        throw e;
    }
}

export const terminalPrompter: RemovalPrompter = {
    confirmRemoval: (candidate) =>
        orAbort(confirm({ message: `Remove "${candidate.entry.description}"?`, default: false }), false),

    chooseAction: (candidates) =>
        orAbort(
            select<RemovalChoice>({
                message: `${candidates.length} entries matched. What should be removed?`,
                choices: [
                    { name: 'Remove all matched entries', value: 'all' },
                    { name: 'Pick entries by number', value: 'pick' },
                    { name: 'Cancel', value: 'abort' },
                ],
            }),
            'abort'
        ),

    pickPositions: (candidates) =>
        orAbort(input({ message: `Numbers to remove (1-${candidates.length}, comma-separated):` }), ''),
};
