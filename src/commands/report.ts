/**
 * @fileoverview Reporting of domain errors to the user.
 *
 * @module commands/report
 */

import type { Result } from '../types/base.js';
import type { ChangelogError } from '../types/changelog.js';
import type { Output } from '../ui/output.js';
import { err } from '../utils/result.js';

/**
 * Prints an error with the hint that goes with its type.
 */
export function reportError(output: Output, error: ChangelogError): void {
    output.error(error.message);
    switch (error.type) {
        case 'invalid-category':
            output.info(`Available types: ${error.valid.join(', ')}`);
            break;
        case 'no-pending-changes':
            output.info('Use: changekeep add <category> <description>');
            break;
        case 'release-exists':
            output.info(`Record: ${error.path}`);
            break;
        default:
            break;
    }
}

/**
 * Reports an error and returns it as a failed Result.
 */
export function fail(output: Output, error: ChangelogError): Result<never, ChangelogError> {
    reportError(output, error);
    return err(error);
}
