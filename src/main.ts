#!/usr/bin/env node
/**
 * Main entry point for the complex-calc command.
 */

import { runCli } from './cli.js';

runCli(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error('Fatal error:', error);
        process.exitCode = 1;
    });
