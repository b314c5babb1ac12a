/**
 * @fileoverview Configuration management for changekeep.
 * Handles loading, saving, validation, merging and keyed updates of
 * .changelog/config.json. A missing or corrupt file is replaced by defaults.
 *
 * @module state/config
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { Loaded, Result } from '../types/base.js';
import type { ChangelogError } from '../types/changelog.js';
import type {
    ChangekeepConfig,
    ConfigSection,
    ConfigValue,
    PathKey,
    PathsConfig,
    ProjectConfig,
    ProjectKey,
    SettingKey,
    SettingsConfig,
} from '../types/config.js';
import { ok, err, mapResult } from '../utils/result.js';

// ============================================================
// Types
// ============================================================

/**
 * Error types for reading the configuration file.
 */
export type ConfigError =
    | { readonly type: 'parse'; readonly message: string }
    | { readonly type: 'validation'; readonly message: string };

/**
 * Configuration file contents before defaults are merged in.
 */
export interface PartialConfig {
    readonly project?: Partial<ProjectConfig>;
    readonly paths?: Partial<PathsConfig>;
    readonly settings?: Partial<SettingsConfig>;
}

/**
 * Result of `config update`.
 */
export interface ConfigUpdate {
    readonly config: ChangekeepConfig;
    /** Value as stored, after coercion */
    readonly value: ConfigValue;
}

// ============================================================
// Constants
// ============================================================

/** Directory under the project root holding all changekeep state. */
export const STATE_DIR = '.changelog';

const CONFIG_FILE = 'config.json';

const DEFAULT_PROJECT: Omit<ProjectConfig, 'name'> = {
    version: '0.0.0',
    author: '',
    license: 'MIT',
};

const DEFAULT_PATHS: PathsConfig = {
    changelog: 'CHANGELOG.md',
    unreleased: `${STATE_DIR}/unreleased.json`,
    releases: `${STATE_DIR}/releases`,
};

const DEFAULT_SETTINGS: SettingsConfig = {
    auto_backup: true,
    date_format: '%Y-%m-%d',
    time_format: '%H:%M:%S',
    git_integration: false,
};

const PATH_KEYS: readonly PathKey[] = ['changelog', 'unreleased', 'releases'];
const SETTING_KEYS: readonly SettingKey[] = ['auto_backup', 'date_format', 'time_format', 'git_integration'];
const PROJECT_KEYS: readonly ProjectKey[] = ['name', 'version', 'author', 'license'];
const SECTIONS: readonly ConfigSection[] = ['project', 'paths', 'settings'];

// ============================================================
// Schemas
// ============================================================

const ProjectSchema = z.object({
    name: z.string(),
    version: z.string(),
    author: z.string(),
    license: z.string(),
});

const PathsSchema = z.object({
    changelog: z.string().min(1),
    unreleased: z.string().min(1),
    releases: z.string().min(1),
});

const SettingsSchema = z.object({
    auto_backup: z.boolean(),
    date_format: z.string(),
    time_format: z.string(),
    git_integration: z.boolean(),
});

const ConfigFileSchema = z.object({
    project: ProjectSchema.partial().optional(),
    paths: PathsSchema.partial().optional(),
    settings: SettingsSchema.partial().optional(),
});

// ============================================================
// Key Guards
// ============================================================

const isPathKey = (key: string): key is PathKey => PATH_KEYS.some(candidate => candidate === key);
const isSettingKey = (key: string): key is SettingKey => SETTING_KEYS.some(candidate => candidate === key);
const isProjectKey = (key: string): key is ProjectKey => PROJECT_KEYS.some(candidate => candidate === key);
const isSection = (key: string): key is ConfigSection => SECTIONS.some(candidate => candidate === key);

// ============================================================
// Default Configuration
// ============================================================

/**
 * Returns the default configuration for a project root. The project name
 * defaults to the root directory's name.
 *
 * @example
 * getDefault('/work/demo').project.name; // 'demo'
 */
export function getDefault(root: string): ChangekeepConfig {
    return {
        project: { name: path.basename(path.resolve(root)), ...DEFAULT_PROJECT },
        paths: DEFAULT_PATHS,
        settings: DEFAULT_SETTINGS,
    };
}

/**
 * Merges a partial configuration over a complete one, section by section.
 */
export function mergeConfigs(base: ChangekeepConfig, override: PartialConfig): ChangekeepConfig {
    return {
        project: { ...base.project, ...override.project },
        paths: { ...base.paths, ...override.paths },
        settings: { ...base.settings, ...override.settings },
    };
}

/**
 * Path of the configuration file for a root.
 */
export function configFilePath(root: string): string {
    return path.join(root, STATE_DIR, CONFIG_FILE);
}

// ============================================================
// Parsing
// ============================================================

/**
 * Parses configuration file text. Missing sections and fields are allowed;
 * fields of the wrong type are a validation error.
 */
export function parseConfig(text: string): Result<PartialConfig, ConfigError> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        return err({ type: 'parse', message: `Invalid JSON in ${CONFIG_FILE}: ${message}` });
    }

    const result = ConfigFileSchema.safeParse(parsed);
    if (!result.success) {
        return err({ type: 'validation', message: result.error.issues.map(i => i.message).join('; ') });
    }
    return ok(result.data);
}

// ============================================================
// Loading and Saving
// ============================================================

/**
 * Loads the configuration for a root. A missing file is created with
 * defaults; an unreadable one is overwritten with defaults and reported
 * through `recovered`.
 *
 * @example
 * const { value: config, recovered } = loadConfig(root);
 * if (recovered) output.warn('Configuration was unreadable, defaults restored');
 */
export function loadConfig(root: string): Loaded<ChangekeepConfig> {
    const file = configFilePath(root);

    if (!fs.existsSync(file)) {
        const defaults = getDefault(root);
        saveConfig(root, defaults);
        return { value: defaults, recovered: false };
    }

    const parsed = parseConfig(fs.readFileSync(file, 'utf-8'));
    if (!parsed.ok) {
        const defaults = getDefault(root);
        saveConfig(root, defaults);
        return { value: defaults, recovered: true };
    }

    return { value: mergeConfigs(getDefault(root), parsed.value), recovered: false };
}

/**
 * Writes the whole configuration file, creating the state directory.
 */
export function saveConfig(root: string, config: ChangekeepConfig): void {
    const file = configFilePath(root);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
}

// ============================================================
// Path Resolution
// ============================================================

/**
 * Resolves one of the configured paths against the project root.
 */
export function resolvePath(
    root: string,
    config: ChangekeepConfig,
    key: string
): Result<string, ChangelogError> {
    if (!isPathKey(key)) {
        return err({ type: 'unknown-key', message: `Unknown path key: ${key}` });
    }
    return ok(path.resolve(root, config.paths[key]));
}

/**
 * Resolves every configured path. Used where all three are needed and the
 * keys are known to be valid.
 */
export function resolveAllPaths(root: string, config: ChangekeepConfig): PathsConfig {
    return {
        changelog: path.resolve(root, config.paths.changelog),
        unreleased: path.resolve(root, config.paths.unreleased),
        releases: path.resolve(root, config.paths.releases),
    };
}

// ============================================================
// Updates
// ============================================================

/**
 * Changes a path and persists the configuration.
 */
export function updatePath(
    root: string,
    config: ChangekeepConfig,
    key: string,
    value: string
): Result<ChangekeepConfig, ChangelogError> {
    if (!isPathKey(key)) {
        return err({ type: 'unknown-key', message: `Unknown path key: ${key}` });
    }
    if (value.trim().length === 0) {
        return err({ type: 'invalid-value', message: `Path ${key} must not be empty` });
    }

    const updated: ChangekeepConfig = { ...config, paths: { ...config.paths, [key]: value } };
    saveConfig(root, updated);
    return ok(updated);
}

/**
 * Changes a setting and persists the configuration. Boolean settings only
 * accept booleans; text settings store the value's string form.
 */
export function updateSetting(
    root: string,
    config: ChangekeepConfig,
    key: string,
    value: ConfigValue
): Result<ChangekeepConfig, ChangelogError> {
    if (!isSettingKey(key)) {
        return err({ type: 'unknown-key', message: `Unknown setting: ${key}` });
    }

    const current = config.settings[key];
    let stored: ConfigValue;
    if (typeof current === 'boolean') {
        if (typeof value !== 'boolean') {
            return err({ type: 'invalid-value', message: `Setting ${key} expects true or false, got ${String(value)}` });
        }
        stored = value;
    } else {
        stored = String(value);
    }

    const updated: ChangekeepConfig = { ...config, settings: { ...config.settings, [key]: stored } };
    saveConfig(root, updated);
    return ok(updated);
}

/**
 * Changes a project field and persists the configuration.
 */
export function updateProject(
    root: string,
    config: ChangekeepConfig,
    key: string,
    value: string
): Result<ChangekeepConfig, ChangelogError> {
    if (!isProjectKey(key)) {
        return err({ type: 'unknown-key', message: `Unknown project key: ${key}` });
    }

    const updated: ChangekeepConfig = { ...config, project: { ...config.project, [key]: value } };
    saveConfig(root, updated);
    return ok(updated);
}

/**
 * Coerces a command-line value: `true`/`false` in any case become
 * booleans, all-digit strings become integers, anything else stays text.
 *
 * @example
 * coerceValue('FALSE'); // false
 * coerceValue('42');    // 42
 * coerceValue('v1');    // 'v1'
 */
export function coerceValue(raw: string): ConfigValue {
    const lower = raw.toLowerCase();
    if (lower === 'true' || lower === 'false') {
        return lower === 'true';
    }
    if (/^\d+$/.test(raw)) {
        return Number(raw);
    }
    return raw;
}

/**
 * Applies `config update <section.key> <value>`. A key without a dot
 * addresses the project section. Values are coerced for settings only;
 * project fields and paths keep the raw text.
 */
export function updateConfigKey(
    root: string,
    config: ChangekeepConfig,
    dottedKey: string,
    raw: string
): Result<ConfigUpdate, ChangelogError> {
    const dot = dottedKey.indexOf('.');
    const section = dot === -1 ? 'project' : dottedKey.slice(0, dot);
    const key = dot === -1 ? dottedKey : dottedKey.slice(dot + 1);

    if (!isSection(section)) {
        return err({ type: 'unknown-key', message: `Unknown section: ${section}` });
    }

    switch (section) {
        case 'paths': {
            return mapResult(updatePath(root, config, key, raw), updated => ({ config: updated, value: raw }));
        }
        case 'settings': {
            if (!isSettingKey(key)) {
                return err({ type: 'unknown-key', message: `Unknown setting: ${key}` });
            }
            return mapResult(
                updateSetting(root, config, key, coerceValue(raw)),
                updated => ({ config: updated, value: updated.settings[key] })
            );
        }
        case 'project': {
            return mapResult(updateProject(root, config, key, raw), updated => ({ config: updated, value: raw }));
        }
    }
}

// ============================================================
// Root Discovery
// ============================================================

/**
 * Walks up from `start` to the first directory holding a changekeep
 * configuration file. Falls back to `start` itself.
 */
export function findProjectRoot(start: string): string {
    let current = path.resolve(start);
    for (;;) {
        if (fs.existsSync(configFilePath(current))) {
            return current;
        }
        const parent = path.dirname(current);
        if (parent === current) {
            return path.resolve(start);
        }
        current = parent;
    }
}

/**
 * Interprets the global `--config` option. A directory is taken as the
 * project root. A file path resolves to its directory, or to that
 * directory's parent when it is the `.changelog` state directory.
 *
 * @example
 * rootFromConfigOption('/work/demo/.changelog/config.json'); // '/work/demo'
 * rootFromConfigOption('/work/demo');                        // '/work/demo'
 */
export function rootFromConfigOption(value: string): string {
    const resolved = path.resolve(value);
    if (fs.existsSync(resolved) && fs.statSync(resolved).isDirectory()) {
        return resolved;
    }
    const directory = path.dirname(resolved);
    return path.basename(directory) === STATE_DIR ? path.dirname(directory) : directory;
}
