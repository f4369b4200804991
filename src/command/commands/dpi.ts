/**
 * `dpi get|set`: value of the context resolution.
 */

import type { OpResult } from '../../device/types.js';
import { node_create } from '../node.js';
import { safeInteger_tryParse } from '../tokens.js';
import { ExitCode, type CommandEnv, type CommandNode } from '../types.js';
import { capability_require, context_missing } from './_shared.js';

function dpiGet_run(_node: CommandNode, env: CommandEnv): ExitCode {
    const { resolution } = env.context;
    if (!resolution) return context_missing(env, 'resolution');
    env.out(`${resolution.dpi_get()}`);
    return ExitCode.Success;
}

function dpiSet_run(_node: CommandNode, env: CommandEnv, tokens: readonly string[]): ExitCode {
    const { device, resolution } = env.context;
    if (!device) return context_missing(env, 'device');
    if (!resolution) return context_missing(env, 'resolution');

    const dpi: number | null = tokens.length === 1 ? safeInteger_tryParse(tokens[0]) : null;
    if (dpi === null) {
        env.log.error('dpi set needs exactly one numeric resolution');
        return ExitCode.Usage;
    }
    if (!capability_require(env, device, 'switchable-resolution')) return ExitCode.Unsupported;

    const result: OpResult = resolution.dpi_set(dpi);
    if (!result.ok) {
        env.log.error(`Failed to change the dpi: ${result.error}`);
        return ExitCode.Device;
    }
    env.log.debug(`resolution ${resolution.index} set to ${dpi}dpi`);
    return ExitCode.Success;
}

export const command: CommandNode = node_create({
    name: 'dpi',
    needs: ['resolution'],
    children: [
        node_create({
            name: 'get',
            help: 'Get the resolution in dpi of the active profile',
            needs: ['resolution'],
            handler: dpiGet_run,
        }),
        node_create({
            name: 'set',
            argsHint: 'N',
            help: 'Set the resolution in dpi of the active profile',
            needs: ['resolution'],
            handler: dpiSet_run,
        }),
    ],
});
