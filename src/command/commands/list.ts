/**
 * `list` command implementation.
 *
 * Prints each `event*` node of the input directory that the device library
 * can open.
 */

import type { DeviceHandle } from '../../device/types.js';
import { node_create } from '../node.js';
import { ExitCode, type CommandEnv, type CommandNode } from '../types.js';
import { errorMessage_get } from './_shared.js';

function list_run(_node: CommandNode, env: CommandEnv, tokens: readonly string[]): ExitCode {
    if (tokens.length !== 0) {
        env.log.error(`list: unexpected argument '${tokens[0]}'`);
        return ExitCode.Usage;
    }

    let names: string[] = [];
    try {
        names = env.deviceNodes_list();
    } catch (error: unknown) {
        env.log.debug(`cannot read '${env.inputDir}': ${errorMessage_get(error)}`);
    }

    let supported = 0;
    for (const name of names.filter(n => n.startsWith('event')).sort()) {
        const path: string = `${env.inputDir}/${name}`;
        const device: DeviceHandle | null = env.library.device_open(path);
        if (!device) continue;
        try {
            env.out(`${path}:\t${device.name_get()}`);
            supported++;
        } finally {
            device.release();
        }
    }

    if (supported === 0) {
        env.out('No supported devices found');
    }
    return ExitCode.Success;
}

export const command: CommandNode = node_create({
    name: 'list',
    help: 'List the available devices',
    handler: list_run,
});
