/**
 * @file Context Resolver
 *
 * Lazily resolves the device, profile and resolution a command needs,
 * in that order, caching each in the invocation's `ResolvedContext`.
 *
 * @module command
 */

import type { DeviceHandle, ProfileHandle, ResolutionHandle } from '../device/types.js';
import type { Logger } from '../log/Logger.js';
import { ExitCode, type CommandEnv, type Prerequisite } from './types.js';

export type EnsureResult =
    | { ok: true; tokens: readonly string[] }
    | { ok: false; exitCode: ExitCode };

/**
 * Make sure every prerequisite in `needs` is resolved in `env.context`.
 *
 * When a device is needed and none is cached, the last token after the
 * command token (`tokens[0]`) is taken as the device path and removed from
 * the returned token list.
 *
 * @param needs - Prerequisites of the command about to run.
 * @param env - Invocation environment; `env.context` is mutated in place.
 * @param tokens - Visible tokens, starting with the command's own name.
 */
export function context_ensure(needs: ReadonlySet<Prerequisite>, env: CommandEnv, tokens: readonly string[]): EnsureResult {
    const { context, library, log } = env;
    let remaining: readonly string[] = tokens;

    const wantsDevice: boolean = needs.has('device') || needs.has('profile') || needs.has('resolution');
    const wantsProfile: boolean = needs.has('profile') || needs.has('resolution');
    const wantsResolution: boolean = needs.has('resolution');

    if (wantsDevice && !context.device) {
        if (remaining.length < 2) {
            log.error('Missing device path.');
            return { ok: false, exitCode: ExitCode.Device };
        }
        const path: string = remaining[remaining.length - 1];
        const device: DeviceHandle | null = library.device_open(path);
        if (!device) {
            log.error(`Device '${path}' is not supported`);
            return { ok: false, exitCode: ExitCode.Device };
        }
        log.debug(`resolved device '${path}'`);
        context.device_adopt(device);
        remaining = remaining.slice(0, -1);
    }

    if (wantsProfile && !context.profile) {
        const device: DeviceHandle | null = context.device;
        const profile: ProfileHandle | null = device ? activeProfile_find(device, log) : null;
        if (!profile) return { ok: false, exitCode: ExitCode.Device };
        log.debug(`resolved active profile ${profile.index}`);
        context.profile_adopt(profile);
    }

    if (wantsResolution && !context.resolution) {
        const profile: ProfileHandle | null = context.profile;
        const resolution: ResolutionHandle | null = profile ? activeResolution_find(profile, log) : null;
        if (!resolution) return { ok: false, exitCode: ExitCode.Device };
        log.debug(`resolved active resolution ${resolution.index}`);
        context.resolution_adopt(resolution);
    }

    return { ok: true, tokens: remaining };
}

/**
 * Find the first profile flagged active. Non-matching profiles are released.
 *
 * @returns An owned profile handle, or null (logged) when none is active.
 */
export function activeProfile_find(device: DeviceHandle, log: Logger): ProfileHandle | null {
    const count: number = device.profileCount_get();
    for (let i = 0; i < count; i++) {
        const profile: ProfileHandle | null = device.profile_get(i);
        if (!profile) continue;
        if (profile.isActive()) return profile;
        profile.release();
    }
    log.error('Failed to retrieve the active profile');
    return null;
}

/**
 * Find the first resolution flagged active. Non-matching resolutions are released.
 *
 * @returns An owned resolution handle, or null (logged) when none is active.
 */
export function activeResolution_find(profile: ProfileHandle, log: Logger): ResolutionHandle | null {
    const count: number = profile.resolutionCount_get();
    for (let i = 0; i < count; i++) {
        const resolution: ResolutionHandle | null = profile.resolution_get(i);
        if (!resolution) continue;
        if (resolution.isActive()) return resolution;
        resolution.release();
    }
    log.error('Failed to retrieve the active resolution');
    return null;
}
