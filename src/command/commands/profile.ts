/**
 * `profile [N] active get|set`, `profile [N] resolution …`, `profile [N] button …`
 */

import type { DeviceHandle, OpResult, ProfileHandle } from '../../device/types.js';
import { activeProfile_find } from '../ContextResolver.js';
import { indexedNode_handler, type IndexSelector } from '../Dispatcher.js';
import { node_create } from '../node.js';
import { integer_tryParse } from '../tokens.js';
import { ExitCode, type CommandEnv, type CommandNode } from '../types.js';
import { capability_require, context_missing } from './_shared.js';
import { command as button } from './button.js';
import { command as resolution } from './resolution.js';

const profileSelector: IndexSelector = {
    explicit_select(index: number, env: CommandEnv): ExitCode {
        const { device } = env.context;
        if (!device) return context_missing(env, 'device');
        const profile: ProfileHandle | null = index >= 0 && index < device.profileCount_get()
            ? device.profile_get(index)
            : null;
        if (!profile) {
            env.log.error(`Unable to find profile ${index}`);
            return ExitCode.Unsupported;
        }
        env.context.profile_adopt(profile);
        return ExitCode.Success;
    },

    active_select(env: CommandEnv): ExitCode {
        const { device } = env.context;
        if (!device) return context_missing(env, 'device');
        if (env.context.profile) return ExitCode.Success;
        const profile: ProfileHandle | null = activeProfile_find(device, env.log);
        if (!profile) return ExitCode.Device;
        env.context.profile_adopt(profile);
        return ExitCode.Success;
    },
};

function activeGet_run(_node: CommandNode, env: CommandEnv): ExitCode {
    const device: DeviceHandle | null = env.context.device;
    if (!device) return context_missing(env, 'device');

    const count: number = device.profileCount_get();
    if (!device.capability_has('switchable-profile') || count <= 1) {
        env.out('0');
        return ExitCode.Success;
    }

    for (let i = 0; i < count; i++) {
        const profile: ProfileHandle | null = device.profile_get(i);
        if (!profile) continue;
        try {
            if (profile.isActive()) {
                env.out(`${i}`);
                return ExitCode.Success;
            }
        } finally {
            profile.release();
        }
    }
    env.log.error('Failed to retrieve the active profile');
    return ExitCode.Device;
}

function activeSet_run(_node: CommandNode, env: CommandEnv, tokens: readonly string[]): ExitCode {
    const device: DeviceHandle | null = env.context.device;
    if (!device) return context_missing(env, 'device');

    const index: number | null = tokens.length === 1 ? integer_tryParse(tokens[0]) : null;
    if (index === null) {
        env.log.error('profile active set needs exactly one profile number');
        return ExitCode.Usage;
    }
    if (!capability_require(env, device, 'switchable-profile')) return ExitCode.Unsupported;

    const name: string = device.name_get();
    const count: number = device.profileCount_get();
    const profile: ProfileHandle | null = index >= 0 && index < count ? device.profile_get(index) : null;
    if (!profile) {
        env.log.error(`'${index}' is not a valid profile ('${name}' has ${count})`);
        return ExitCode.Unsupported;
    }

    try {
        if (profile.isActive()) {
            env.out(`'${name}' is already in profile '${index}'`);
            return ExitCode.Success;
        }
        const result: OpResult = profile.active_set();
        if (!result.ok) {
            env.log.error(`Unable to switch '${name}' to profile ${index}: ${result.error}`);
            return ExitCode.Device;
        }
        env.out(`Switched '${name}' to profile '${index}'`);
        return ExitCode.Success;
    } finally {
        profile.release();
    }
}

const active: CommandNode = node_create({
    name: 'active',
    needs: ['device'],
    children: [
        node_create({
            name: 'get',
            help: 'Get the active profile number',
            needs: ['device'],
            handler: activeGet_run,
        }),
        node_create({
            name: 'set',
            argsHint: 'N',
            help: 'Set the active profile number',
            needs: ['device'],
            handler: activeSet_run,
        }),
    ],
});

export const command: CommandNode = node_create({
    name: 'profile',
    argsHint: '<idx>',
    needs: ['device'],
    handler: indexedNode_handler(profileSelector),
    children: [active, resolution, button],
});
