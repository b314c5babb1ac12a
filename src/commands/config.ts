/**
 * @fileoverview Configuration commands: show and update.
 *
 * @module commands/config
 */

import type { Result } from '../types/base.js';
import type { ChangelogError } from '../types/changelog.js';
import type { ChangekeepConfig } from '../types/config.js';
import { renderConfig } from '../core/renderer/pretty.js';
import { configFilePath, resolveAllPaths, updateConfigKey } from '../state/config.js';
import type { ConfigUpdate } from '../state/config.js';
import { ok } from '../utils/result.js';
import { loadConfigFor } from './context.js';
import type { CommandContext } from './context.js';
import { fail } from './report.js';

/**
 * Prints the configuration with absolute paths.
 */
export function configShowCommand(context: CommandContext): Result<ChangekeepConfig, ChangelogError> {
    const config = loadConfigFor(context);
    const paths = resolveAllPaths(context.root, config);
    context.output.print(renderConfig(config, { config: configFilePath(context.root), ...paths }));
    return ok(config);
}

/**
 * Applies `config update <section.key> <value>`.
 */
export function configUpdateCommand(
    context: CommandContext,
    key: string,
    value: string
): Result<ConfigUpdate, ChangelogError> {
    const config = loadConfigFor(context);
    const result = updateConfigKey(context.root, config, key, value);
    if (!result.ok) return fail(context.output, result.error);

    context.output.success(`Configuration updated: ${key} = ${String(result.value.value)}`);
    return result;
}
