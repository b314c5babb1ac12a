/**
 * @fileoverview Component tests for the configuration store against a real
 * temporary directory.
 *
 * @module test/component/config-store
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import {
    configFilePath,
    findProjectRoot,
    getDefault,
    loadConfig,
    resolvePath,
    rootFromConfigOption,
    saveConfig,
    updateConfigKey,
} from '../../src/state/config.js';
import type { ChangekeepConfig } from '../../src/types/config.js';
import { cleanupRoots, makeRoot, readJson } from '../helpers/fixtures.js';

afterEach(cleanupRoots);

function updated(root: string, config: ChangekeepConfig, key: string, raw: string): ChangekeepConfig {
    const result = updateConfigKey(root, config, key, raw);
    if (!result.ok) throw new Error(`expected success, got ${result.error.message}`);
    return result.value.config;
}

describe('loadConfig', () => {
    it('writes defaults on first use', () => {
        const root = makeRoot('widget');
        const { value, recovered } = loadConfig(root);

        expect(recovered).toBe(false);
        expect(value).toEqual(getDefault(root));
        expect(value.project.name).toBe('widget');
        expect(readJson(configFilePath(root))).toEqual(value);
    });

    it('fills missing fields from defaults', () => {
        const root = makeRoot();
        fs.mkdirSync(path.join(root, '.changelog'));
        fs.writeFileSync(configFilePath(root), JSON.stringify({ project: { author: 'Ana' }, settings: { auto_backup: false } }));

        const { value, recovered } = loadConfig(root);

        expect(recovered).toBe(false);
        expect(value.project).toEqual({ name: 'demo', version: '0.0.0', author: 'Ana', license: 'MIT' });
        expect(value.settings.auto_backup).toBe(false);
        expect(value.settings.date_format).toBe('%Y-%m-%d');
        expect(value.paths.changelog).toBe('CHANGELOG.md');
    });

    it('restores defaults over an unparseable file', () => {
        const root = makeRoot();
        fs.mkdirSync(path.join(root, '.changelog'));
        fs.writeFileSync(configFilePath(root), '{ not json');

        const { value, recovered } = loadConfig(root);

        expect(recovered).toBe(true);
        expect(value).toEqual(getDefault(root));
        expect(readJson(configFilePath(root))).toEqual(getDefault(root));
    });

    it('restores defaults when a field has the wrong type', () => {
        const root = makeRoot();
        fs.mkdirSync(path.join(root, '.changelog'));
        fs.writeFileSync(configFilePath(root), JSON.stringify({ settings: { auto_backup: 'yes' } }));

        expect(loadConfig(root).recovered).toBe(true);
    });
});

describe('resolvePath', () => {
    it('resolves configured paths against the root', () => {
        const root = makeRoot();
        const config = getDefault(root);

        expect(resolvePath(root, config, 'unreleased')).toEqual({
            ok: true,
            value: path.join(root, '.changelog', 'unreleased.json'),
        });
    });

    it('rejects unknown keys', () => {
        const root = makeRoot();
        expect(resolvePath(root, getDefault(root), 'archive')).toEqual({
            ok: false,
            error: { type: 'unknown-key', message: 'Unknown path key: archive' },
        });
    });
});

describe('updateConfigKey', () => {
    it('coerces boolean settings and persists them', () => {
        const root = makeRoot();
        const config = updated(root, loadConfig(root).value, 'settings.auto_backup', 'FALSE');

        expect(config.settings.auto_backup).toBe(false);
        expect(loadConfig(root).value.settings.auto_backup).toBe(false);
    });

    it('reports the stored value', () => {
        const root = makeRoot();
        const result = updateConfigKey(root, loadConfig(root).value, 'settings.git_integration', 'true');
        expect(result.ok && result.value.value).toBe(true);
    });

    it('stores text settings as text even when they look numeric', () => {
        const root = makeRoot();
        const config = updated(root, loadConfig(root).value, 'settings.date_format', '2024');
        expect(config.settings.date_format).toBe('2024');
    });

    it('rejects a non-boolean for a boolean setting', () => {
        const root = makeRoot();
        expect(updateConfigKey(root, loadConfig(root).value, 'settings.auto_backup', 'maybe')).toEqual({
            ok: false,
            error: { type: 'invalid-value', message: 'Setting auto_backup expects true or false, got maybe' },
        });
    });

    it('keeps path and project values as typed', () => {
        const root = makeRoot();
        let config = updated(root, loadConfig(root).value, 'paths.changelog', 'docs/HISTORY.md');
        config = updated(root, config, 'project.version', '1.10');

        expect(config.paths.changelog).toBe('docs/HISTORY.md');
        expect(config.project.version).toBe('1.10');
    });

    it('addresses the project section without a dot', () => {
        const root = makeRoot();
        expect(updated(root, loadConfig(root).value, 'author', 'Bo').project.author).toBe('Bo');
    });

    it('rejects unknown sections and keys', () => {
        const root = makeRoot();
        const config = loadConfig(root).value;

        expect(updateConfigKey(root, config, 'extras.color', 'red')).toEqual({
            ok: false,
            error: { type: 'unknown-key', message: 'Unknown section: extras' },
        });
        expect(updateConfigKey(root, config, 'settings.colour', 'red')).toEqual({
            ok: false,
            error: { type: 'unknown-key', message: 'Unknown setting: colour' },
        });
        expect(updateConfigKey(root, config, 'homepage', 'x')).toEqual({
            ok: false,
            error: { type: 'unknown-key', message: 'Unknown project key: homepage' },
        });
    });

    it('rejects an empty path', () => {
        const root = makeRoot();
        const result = updateConfigKey(root, loadConfig(root).value, 'paths.releases', '  ');
        expect(result.ok).toBe(false);
        expect(!result.ok && result.error.type).toBe('invalid-value');
    });
});

describe('root discovery', () => {
    it('walks up to the directory holding the configuration', () => {
        const root = makeRoot();
        saveConfig(root, getDefault(root));
        const nested = path.join(root, 'src', 'lib');
        fs.mkdirSync(nested, { recursive: true });

        expect(findProjectRoot(nested)).toBe(root);
    });

    it('falls back to the starting directory', () => {
        const root = makeRoot();
        expect(findProjectRoot(root)).toBe(root);
    });

    it('interprets --config as a directory or a file path', () => {
        const root = makeRoot();
        saveConfig(root, getDefault(root));

        expect(rootFromConfigOption(root)).toBe(root);
        expect(rootFromConfigOption(configFilePath(root))).toBe(root);
        expect(rootFromConfigOption(path.join(root, 'changekeep.json'))).toBe(root);
    });
});
