/**
 * @fileoverview Command-line surface for changekeep.
 * Maps subcommands and flags onto the command functions.
 *
 * @module cli/program
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { PendingFormat } from '../types/changelog.js';
import { CATEGORIES, isCategory } from '../core/changelog/categories.js';
import { addCommand, initCommand, releaseCommand, showCommand, statsCommand } from '../commands/changelog.js';
import { configShowCommand, configUpdateCommand } from '../commands/config.js';
import { createContext } from '../commands/context.js';
import type { CommandContext } from '../commands/context.js';
import { removeCommand } from '../commands/remove.js';
import { findProjectRoot, rootFromConfigOption } from '../state/config.js';

// ============================================================
// Program Configuration
// ============================================================

const PROGRAM_NAME = 'changekeep';
const PROGRAM_VERSION = '0.1.0';

const EXAMPLES = `
Examples:
  $ changekeep init --name "My Project"
  $ changekeep add added "Dark mode"
  $ changekeep add fixed "Crash on startup" --author Ana
  $ changekeep show --format markdown
  $ changekeep release v1.0.0 --notes "First release" --tag
  $ changekeep remove --type added --pattern dark
  $ changekeep remove --index 3
  $ changekeep config update paths.changelog docs/CHANGELOG.md
  $ changekeep config update settings.auto_backup false
  $ changekeep stats`;

export interface ProgramEnvironment {
    /** Directory the root is discovered from when --config is absent */
    readonly cwd: string;
    /** Replacements for the console, clock, git and prompts */
    readonly overrides?: Partial<Omit<CommandContext, 'root'>>;
}

// ============================================================
// Option Parsing
// ============================================================

function parseIndex(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new InvalidArgumentError('Index must be a positive integer.');
    }
    return Number(value);
}

const FORMATS: Readonly<Record<string, PendingFormat>> = {
    pretty: 'pretty',
    json: 'structured',
    markdown: 'markdown',
};

// ============================================================
// Program
// ============================================================

/**
 * Builds the commander program. Domain errors are printed by the commands
 * and leave the exit code at 0; anything thrown propagates to the caller
 * of `parseAsync`.
 *
 * @example
 * await createProgram({ cwd: process.cwd() }).parseAsync(process.argv);
 */
export function createProgram(environment: ProgramEnvironment): Command {
    const program = new Command();

    /**
     * Context for a subcommand. `--config` wins; otherwise the root is
     * discovered upward from the working directory, except for `init`,
     * which bootstraps the working directory itself.
     */
    const contextFor = (command: Command, discover: boolean = true): CommandContext => {
        const { config } = command.optsWithGlobals<{ config?: string }>();
        const root = config
            ? rootFromConfigOption(config)
            : discover ? findProjectRoot(environment.cwd) : environment.cwd;
        return createContext(root, environment.overrides);
    };

    program
        .name(PROGRAM_NAME)
        .description('Keep unreleased changes by category and roll them into CHANGELOG.md on release')
        .version(PROGRAM_VERSION)
        .option('-c, --config <path>', 'project root, or path to its .changelog/config.json')
        .addHelpText('after', EXAMPLES)
        .showHelpAfterError();

    program
        .command('init')
        .description('create the changelog document and an empty pending store')
        .option('--name <name>', 'project name')
        .action((options: { name?: string }, command: Command) => {
            initCommand(contextFor(command, false), { name: options.name });
        });

    program
        .command('add')
        .description('record a pending change')
        .argument('<category>', `change type: ${CATEGORIES.join(', ')}`)
        .argument('<description>', 'what changed')
        .option('--author <name>', 'who made the change')
        .action((category: string, description: string, options: { author?: string }, command: Command) => {
            addCommand(contextFor(command), { category, description, author: options.author });
        });

    program
        .command('show')
        .description('show pending changes')
        .option('--all', 'print the whole changelog document first', false)
        .addOption(new Option('--format <format>', 'output format').choices(Object.keys(FORMATS)).default('pretty'))
        .action((options: { all: boolean; format: string }, command: Command) => {
            showCommand(contextFor(command), { all: options.all, format: FORMATS[options.format] ?? 'pretty' });
        });

    program
        .command('release')
        .description('release all pending changes under a version')
        .argument('<version>', 'version, e.g. 1.2.0 or v1.2.0')
        .option('--notes <text>', 'release notes', '')
        .option('--tag', 'create an annotated git tag', false)
        .action((version: string, options: { notes: string; tag: boolean }, command: Command) => {
            releaseCommand(contextFor(command), { version, notes: options.notes, tag: options.tag });
        });

    program
        .command('remove')
        .description('remove pending changes')
        .addOption(new Option('--type <category>', 'only this category').choices(CATEGORIES))
        .option('--pattern <text>', 'description contains text (case-insensitive)')
        .option('--index <n>', 'global position as numbered by show', parseIndex)
        .action(async (options: { type?: string; pattern?: string; index?: number }, command: Command) => {
            const category = options.type !== undefined && isCategory(options.type) ? options.type : undefined;
            await removeCommand(contextFor(command), { category, pattern: options.pattern, index: options.index });
        });

    program
        .command('stats')
        .description('count pending changes by category and author')
        .action((_options: unknown, command: Command) => {
            statsCommand(contextFor(command));
        });

    const config = program
        .command('config')
        .description('show or change the configuration');

    config
        .command('show')
        .description('print the configuration')
        .action((_options: unknown, command: Command) => {
            configShowCommand(contextFor(command));
        });

    config
        .command('update')
        .description('set <section.key> to <value>')
        .argument('<key>', 'e.g. paths.changelog or settings.auto_backup')
        .argument('<value>', 'new value; true/false and digits are converted for settings')
        .action((key: string, value: string, _options: unknown, command: Command) => {
            configUpdateCommand(contextFor(command), key, value);
        });

    return program;
}
