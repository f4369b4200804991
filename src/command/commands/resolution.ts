/**
 * `resolution [N] active get|set`, `resolution [N] dpi …`, `resolution [N] rate …`
 */

import type { OpResult, ProfileHandle, ResolutionHandle } from '../../device/types.js';
import { activeResolution_find } from '../ContextResolver.js';
import { indexedNode_handler, type IndexSelector } from '../Dispatcher.js';
import { node_create } from '../node.js';
import { integer_tryParse } from '../tokens.js';
import { ExitCode, type CommandEnv, type CommandNode } from '../types.js';
import { capability_require, context_missing } from './_shared.js';
import { command as dpi } from './dpi.js';
import { command as rate } from './rate.js';

const resolutionSelector: IndexSelector = {
    explicit_select(index: number, env: CommandEnv): ExitCode {
        const { profile } = env.context;
        if (!profile) return context_missing(env, 'profile');
        const resolution: ResolutionHandle | null = index >= 0 && index < profile.resolutionCount_get()
            ? profile.resolution_get(index)
            : null;
        if (!resolution) {
            env.log.error(`Unable to find resolution ${index}`);
            return ExitCode.Unsupported;
        }
        env.context.resolution_adopt(resolution);
        return ExitCode.Success;
    },

    active_select(env: CommandEnv): ExitCode {
        const { profile } = env.context;
        if (!profile) return context_missing(env, 'profile');
        if (env.context.resolution) return ExitCode.Success;
        const resolution: ResolutionHandle | null = activeResolution_find(profile, env.log);
        if (!resolution) return ExitCode.Device;
        env.context.resolution_adopt(resolution);
        return ExitCode.Success;
    },
};

function activeIndex_find(profile: ProfileHandle): number | null {
    for (let i = 0; i < profile.resolutionCount_get(); i++) {
        const resolution: ResolutionHandle | null = profile.resolution_get(i);
        if (!resolution) continue;
        try {
            if (resolution.isActive()) return i;
        } finally {
            resolution.release();
        }
    }
    return null;
}

function activeGet_run(_node: CommandNode, env: CommandEnv): ExitCode {
    const { profile } = env.context;
    if (!profile) return context_missing(env, 'profile');
    const index: number | null = activeIndex_find(profile);
    if (index === null) {
        env.log.error('Failed to retrieve the active resolution');
        return ExitCode.Device;
    }
    env.out(`${index}`);
    return ExitCode.Success;
}

function activeSet_run(_node: CommandNode, env: CommandEnv, tokens: readonly string[]): ExitCode {
    const { device, profile } = env.context;
    if (!device) return context_missing(env, 'device');
    if (!profile) return context_missing(env, 'profile');

    const index: number | null = tokens.length === 1 ? integer_tryParse(tokens[0]) : null;
    if (index === null) {
        env.log.error('resolution active set needs exactly one resolution number');
        return ExitCode.Usage;
    }
    if (!capability_require(env, device, 'switchable-resolution')) return ExitCode.Unsupported;

    const count: number = profile.resolutionCount_get();
    const resolution: ResolutionHandle | null = index >= 0 && index < count ? profile.resolution_get(index) : null;
    if (!resolution) {
        env.log.error(`'${index}' is not a valid resolution (profile ${profile.index} has ${count})`);
        return ExitCode.Unsupported;
    }

    try {
        const result: OpResult = resolution.active_set();
        if (!result.ok) {
            env.log.error(`Unable to switch profile ${profile.index} to resolution ${index}: ${result.error}`);
            return ExitCode.Device;
        }
        env.out(`Switched profile ${profile.index} to resolution ${index}`);
        return ExitCode.Success;
    } finally {
        resolution.release();
    }
}

const active: CommandNode = node_create({
    name: 'active',
    needs: ['profile'],
    children: [
        node_create({
            name: 'get',
            help: 'Get the active resolution number',
            needs: ['profile'],
            handler: activeGet_run,
        }),
        node_create({
            name: 'set',
            argsHint: 'N',
            help: 'Set the active resolution number',
            needs: ['profile'],
            handler: activeSet_run,
        }),
    ],
});

export const command: CommandNode = node_create({
    name: 'resolution',
    argsHint: 'N',
    needs: ['profile'],
    handler: indexedNode_handler(resolutionSelector),
    children: [active, dpi, rate],
});
