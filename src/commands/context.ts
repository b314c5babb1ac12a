/**
 * @fileoverview Everything a command needs from its surroundings.
 *
 * @module commands/context
 */

import type { Clock } from '../types/base.js';
import type { PendingDocument } from '../types/changelog.js';
import type { ChangekeepConfig } from '../types/config.js';
import { loadConfig } from '../state/config.js';
import { loadPending } from '../state/pending.js';
import { consoleOutput } from '../ui/output.js';
import type { Output } from '../ui/output.js';
import { terminalPrompter } from '../ui/prompts.js';
import type { RemovalPrompter } from '../ui/prompts.js';
import { systemClock } from '../utils/time.js';
import { gitTagger } from '../vcs/git.js';
import type { Tagger } from '../vcs/git.js';

export interface CommandContext {
    /** Project root all configured paths resolve against */
    readonly root: string;
    readonly output: Output;
    readonly now: Clock;
    readonly tagger: Tagger;
    readonly prompter: RemovalPrompter;
}

/**
 * Context wired to the console, the system clock, git and the terminal.
 */
export function createContext(root: string, overrides: Partial<Omit<CommandContext, 'root'>> = {}): CommandContext {
    return {
        root,
        output: overrides.output ?? consoleOutput,
        now: overrides.now ?? systemClock,
        tagger: overrides.tagger ?? gitTagger,
        prompter: overrides.prompter ?? terminalPrompter,
    };
}

/**
 * Loads the configuration, warning when a corrupt file had to be replaced.
 */
export function loadConfigFor(context: CommandContext): ChangekeepConfig {
    const { value, recovered } = loadConfig(context.root);
    if (recovered) {
        context.output.warn('Configuration file was unreadable; restored defaults');
    }
    return value;
}

/**
 * Loads the pending document, warning when a corrupt file had to be replaced.
 */
export function loadPendingFor(context: CommandContext, file: string, project: string): PendingDocument {
    const { value, recovered } = loadPending(file, project, context.now());
    if (recovered) {
        context.output.warn('Pending changes file was unreadable; started an empty one');
    }
    return value;
}
