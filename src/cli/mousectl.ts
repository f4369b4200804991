#!/usr/bin/env node
/**
 * @file mousectl entry point
 *
 * Usage:
 *   mousectl [--verbose[=raw]] <command...> /dev/input/eventX
 *
 * @module
 */

import { cli_run } from './run.js';

process.exitCode = cli_run(process.argv.slice(2), {
    env: process.env,
    out: (line: string): void => {
        process.stdout.write(`${line}\n`);
    },
    err: (line: string): void => {
        process.stderr.write(`${line}\n`);
    },
    colorDefault: process.stderr.isTTY === true,
});
