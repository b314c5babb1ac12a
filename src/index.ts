/**
 * @fileoverview Programmatic API for changekeep.
 *
 * @module changekeep
 */

export type * from './types/index.js';

export { ok, err, mapResult, formatDate, systemClock } from './utils/index.js';

export * from './core/changelog/index.js';

export {
    UNRELEASED_MARKER,
    renderInitialDocument,
    renderReleaseBlock,
    insertRelease,
    renderPendingMarkdown,
} from './core/renderer/markdown.js';
export { renderPendingPretty, renderStats, renderConfig } from './core/renderer/pretty.js';
export { renderPending } from './core/renderer/pending.js';

export {
    getDefault,
    loadConfig,
    saveConfig,
    resolvePath,
    updatePath,
    updateSetting,
    updateProject,
    updateConfigKey,
    coerceValue,
    findProjectRoot,
    rootFromConfigOption,
} from './state/config.js';
export { loadPending, savePending, resetPending } from './state/pending.js';
export { normalizeVersion, releaseFilePath, readReleaseRecord } from './state/releases.js';

export { gitTagger, tagMessage } from './vcs/git.js';
export type { Tagger, TagOutcome } from './vcs/git.js';

export { createProgram } from './cli/program.js';
