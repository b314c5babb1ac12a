/**
 * @fileoverview Storage for immutable release records.
 * One JSON file per release, named after the version without its "v"
 * prefix. Records are written once and never rewritten.
 *
 * @module state/releases
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ReleaseRecord } from '../types/changelog.js';
import { ReleaseRecordSchema } from './schemas.js';

/**
 * Strips a single leading "v" for use in file names.
 *
 * @example
 * normalizeVersion('v2.0.0'); // '2.0.0'
 * normalizeVersion('2.0.0');  // '2.0.0'
 */
export function normalizeVersion(version: string): string {
    return version.startsWith('v') ? version.slice(1) : version;
}

/**
 * Location of the record for a version.
 *
 * @example
 * releaseFilePath('/p/.changelog/releases', 'v2.0.0');
 * // '/p/.changelog/releases/release_2.0.0.json'
 */
export function releaseFilePath(directory: string, version: string): string {
    return path.join(directory, `release_${normalizeVersion(version)}.json`);
}

/**
 * Whether a record for this version has already been written.
 */
export function releaseExists(directory: string, version: string): boolean {
    return fs.existsSync(releaseFilePath(directory, version));
}

/**
 * Writes a new record. Fails if one already exists for the version, so a
 * record is never overwritten.
 *
 * @returns Path of the written file
 */
export function writeReleaseRecord(directory: string, record: ReleaseRecord): string {
    const file = releaseFilePath(directory, record.version);
    fs.mkdirSync(directory, { recursive: true });
    fs.writeFileSync(file, `${JSON.stringify(record, null, 2)}\n`, { encoding: 'utf-8', flag: 'wx' });
    return file;
}

/**
 * Reads a record back; null when missing or malformed.
 */
export function readReleaseRecord(directory: string, version: string): ReleaseRecord | null {
    const file = releaseFilePath(directory, version);
    if (!fs.existsSync(file)) {
        return null;
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch {
        return null;
    }
    const result = ReleaseRecordSchema.safeParse(parsed);
    return result.success ? result.data : null;
}
