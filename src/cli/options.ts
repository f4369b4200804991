/**
 * @file Global Option Parsing
 *
 * Options are only recognized before the command; the first token that
 * does not start with `-` ends option parsing.
 *
 * @module cli
 */

import type { LogPriority } from '../device/types.js';

export type OptionsParse =
    | { kind: 'run'; verbosity: LogPriority; tokens: string[] }
    | { kind: 'help' }
    | { kind: 'invalid'; option: string };

/**
 * Split argv (program name removed) into global options and command tokens.
 */
export function globalOptions_parse(args: readonly string[]): OptionsParse {
    let verbosity: LogPriority = 'info';
    let i = 0;

    for (; i < args.length; i++) {
        const arg: string = args[i];
        if (arg === '--') {
            i++;
            break;
        }
        if (!arg.startsWith('-')) break;

        if (arg === '--help' || arg === '-h') {
            return { kind: 'help' };
        } else if (arg === '--verbose=raw') {
            verbosity = 'raw';
        } else if (arg === '--verbose' || arg.startsWith('--verbose=')) {
            if (verbosity !== 'raw') verbosity = 'debug';
        } else {
            return { kind: 'invalid', option: arg };
        }
    }

    return { kind: 'run', verbosity, tokens: args.slice(i) };
}
