/**
 * `rate get|set`: report rate of the context resolution.
 */

import type { OpResult } from '../../device/types.js';
import { node_create } from '../node.js';
import { safeInteger_tryParse } from '../tokens.js';
import { ExitCode, type CommandEnv, type CommandNode } from '../types.js';
import { context_missing } from './_shared.js';

function rateGet_run(_node: CommandNode, env: CommandEnv): ExitCode {
    const { resolution } = env.context;
    if (!resolution) return context_missing(env, 'resolution');
    env.out(`${resolution.reportRate_get()}`);
    return ExitCode.Success;
}

function rateSet_run(_node: CommandNode, env: CommandEnv, tokens: readonly string[]): ExitCode {
    const { resolution } = env.context;
    if (!resolution) return context_missing(env, 'resolution');

    const hz: number | null = tokens.length === 1 ? safeInteger_tryParse(tokens[0]) : null;
    if (hz === null) {
        env.log.error('rate set needs exactly one numeric report rate');
        return ExitCode.Usage;
    }

    const result: OpResult = resolution.reportRate_set(hz);
    if (!result.ok) {
        env.log.error(`Failed to change the report rate: ${result.error}`);
        return ExitCode.Device;
    }
    return ExitCode.Success;
}

export const command: CommandNode = node_create({
    name: 'rate',
    needs: ['resolution'],
    children: [
        node_create({
            name: 'get',
            help: 'Get the report rate in Hz',
            needs: ['resolution'],
            handler: rateGet_run,
        }),
        node_create({
            name: 'set',
            argsHint: 'N',
            help: 'Set the report rate in Hz',
            needs: ['resolution'],
            handler: rateSet_run,
        }),
    ],
});
