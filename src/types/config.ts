/**
 * @fileoverview Configuration types for changekeep.
 * Defines the shape of .changelog/config.json.
 * Zero imports from other project files - this is Layer 0.
 *
 * @module types/config
 */

/**
 * Project metadata.
 */
export interface ProjectConfig {
    readonly name: string;
    /** Last released version, without a "v" prefix */
    readonly version: string;
    readonly author: string;
    readonly license: string;
}

/**
 * File locations, relative to the project root.
 */
export interface PathsConfig {
    /** Human-readable changelog document */
    readonly changelog: string;
    /** Pending changes document */
    readonly unreleased: string;
    /** Directory holding one record per release */
    readonly releases: string;
}

/**
 * Behavioral flags.
 */
export interface SettingsConfig {
    /** Copy the changelog to `<changelog>.bak` before a release rewrites it */
    readonly auto_backup: boolean;
    /** strftime-style pattern for release dates */
    readonly date_format: string;
    /** strftime-style pattern for times shown in listings */
    readonly time_format: string;
    /** Tag every release in git, as if --tag were given */
    readonly git_integration: boolean;
}

/**
 * Complete configuration file.
 *
 * @example
 * const config: ChangekeepConfig = {
 *   project: { name: 'demo', version: '0.0.0', author: '', license: 'MIT' },
 *   paths: { changelog: 'CHANGELOG.md', unreleased: '.changelog/unreleased.json', releases: '.changelog/releases' },
 *   settings: { auto_backup: true, date_format: '%Y-%m-%d', time_format: '%H:%M:%S', git_integration: false }
 * };
 */
export interface ChangekeepConfig {
    readonly project: ProjectConfig;
    readonly paths: PathsConfig;
    readonly settings: SettingsConfig;
}

export type ConfigSection = keyof ChangekeepConfig;

export type PathKey = keyof PathsConfig;

export type SettingKey = keyof SettingsConfig;

export type ProjectKey = keyof ProjectConfig;

/**
 * Value accepted by `config update` after coercion.
 */
export type ConfigValue = string | number | boolean;
