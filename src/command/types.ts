/**
 * @file Command Type Definitions
 *
 * Static command-tree nodes, handler signature, exit codes and the
 * per-invocation environment threaded through dispatch.
 *
 * @module command
 */

import type { DeviceLibrary } from '../device/types.js';
import type { Logger } from '../log/Logger.js';
import type { ResolvedContext } from './ResolvedContext.js';

/**
 * Result codes returned by every handler and by the process.
 */
export const ExitCode = {
    Success: 0,
    /** Device lacks the capability, or an index is outside the valid range. */
    Unsupported: 1,
    /** Malformed or unknown command shape. */
    Usage: 2,
    /** Missing or invalid device, or a failed device operation. */
    Device: 3,
} as const;

export type ExitCode = typeof ExitCode[keyof typeof ExitCode];

/** Context a command needs resolved before its handler runs. */
export type Prerequisite = 'device' | 'profile' | 'resolution';

/** Line-oriented sink for command output (stdout in the CLI). */
export type OutputSink = (line: string) => void;

/**
 * Everything a handler can reach during one invocation.
 */
export interface CommandEnv {
    library: DeviceLibrary;
    context: ResolvedContext;
    out: OutputSink;
    log: Logger;
    /** Names of the entries in the input device directory. */
    deviceNodes_list: () => string[];
    /** Directory the names from `deviceNodes_list` live in. */
    inputDir: string;
}

/**
 * Command handler.
 *
 * @param node - The node being invoked.
 * @param env - Invocation environment.
 * @param tokens - Tokens after the node's own name, device path already removed.
 */
export type CommandHandler = (node: CommandNode, env: CommandEnv, tokens: readonly string[]) => ExitCode;

/**
 * Immutable description of one command in the tree.
 */
export interface CommandNode {
    readonly name: string;
    readonly argsHint: string | null;
    readonly help: string | null;
    readonly prerequisites: ReadonlySet<Prerequisite>;
    /** Null routes to the child named by the next token. */
    readonly handler: CommandHandler | null;
    readonly children: readonly CommandNode[];
}
