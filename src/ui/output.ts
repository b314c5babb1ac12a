/**
 * @fileoverview Console output for commands.
 * Commands write through this interface so tests can capture what would
 * have been printed.
 *
 * @module ui/output
 */

export interface Output {
    /** Plain text, printed as-is */
    print(text: string): void;
    success(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * Output that writes to stdout, with warnings and errors on stderr.
 */
export const consoleOutput: Output = {
    print: (text) => console.log(text),
    success: (message) => console.log(`✓ ${message}`),
    info: (message) => console.log(`  ${message}`),
    warn: (message) => console.warn(`⚠ ${message}`),
    error: (message) => console.error(`✗ ${message}`),
};
