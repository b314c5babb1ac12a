#!/usr/bin/env node
/**
 * @fileoverview changekeep CLI entry point.
 * Run with: npx changekeep <command>
 *
 * @module cli
 */

import { createProgram } from './program.js';

createProgram({ cwd: process.cwd() })
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`✗ Error: ${message}`);
        process.exit(1);
    });
