/**
 * @fileoverview Annotated git tags for releases.
 * The only subprocess changekeep starts; failures are reported as an
 * outcome, never thrown.
 *
 * @module vcs/git
 */

import { execFileSync } from 'child_process';

/**
 * Outcome of a tagging attempt.
 */
export type TagOutcome =
    | { readonly status: 'skipped' }
    | { readonly status: 'created'; readonly tag: string }
    | { readonly status: 'failed'; readonly tag: string; readonly message: string };

/**
 * Creates an annotated tag in the repository at `cwd`.
 */
export type Tagger = (cwd: string, tag: string, message: string) => TagOutcome;

/**
 * Message stored with a release tag.
 *
 * @example
 * tagMessage('v1.0.0', 'First release'); // 'Release v1.0.0: First release'
 * tagMessage('v1.0.0', '');              // 'Release v1.0.0'
 */
export function tagMessage(version: string, notes: string): string {
    return notes.length > 0 ? `Release ${version}: ${notes}` : `Release ${version}`;
}

/**
 * Runs `git tag -a <tag> -m <message>`. A missing git binary or a non-zero
 * exit yields a `failed` outcome carrying git's stderr when available.
 */
export const gitTagger: Tagger = (cwd, tag, message) => {
    try {
        execFileSync('git', ['tag', '-a', tag, '-m', message], {
            cwd,
            stdio: ['ignore', 'pipe', 'pipe'],
        });
        return { status: 'created', tag };
    } catch (e) {
        return { status: 'failed', tag, message: describeGitFailure(e) };
    }
};

function describeGitFailure(error: unknown): string {
    if (typeof error === 'object' && error !== null) {
        if ('code' in error && error.code === 'ENOENT') {
            return 'git not found';
        }
        if ('stderr' in error) {
            const stderr = String(error.stderr).trim();
            if (stderr.length > 0) return stderr;
        }
    }
    return error instanceof Error ? error.message : String(error);
}
