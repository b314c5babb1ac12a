/**
 * @fileoverview Barrel file for changekeep type definitions.
 *
 * @module types
 */

// Base types (foundational, no dependencies)
export type { Result, Loaded, Clock } from './base.js';

// Config types (no dependencies)
export type {
    ProjectConfig,
    PathsConfig,
    SettingsConfig,
    ChangekeepConfig,
    ConfigSection,
    PathKey,
    SettingKey,
    ProjectKey,
    ConfigValue,
} from './config.js';

// Changelog types
export type {
    Category,
    PendingFormat,
    ChangeEntry,
    CategorizedChanges,
    ChangeMetadata,
    PendingDocument,
    ReleaseRecord,
    RemovalFilter,
    RemovalCandidate,
    RemovalTarget,
    CategoryCount,
    AuthorCount,
    StatsReport,
    ChangelogError,
} from './changelog.js';
