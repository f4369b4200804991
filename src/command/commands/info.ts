/**
 * `info` command implementation.
 *
 * Prints the capabilities of a device, then every profile with its
 * resolutions and button mappings.
 */

import type { ButtonHandle, DeviceCapability, DeviceHandle, ProfileHandle, ResolutionHandle } from '../../device/types.js';
import { action_describe } from '../../button/ActionEncoder.js';
import { node_create } from '../node.js';
import { ExitCode, type CommandEnv, type CommandNode, type OutputSink } from '../types.js';
import { context_missing } from './_shared.js';

const CAPABILITY_TAGS: ReadonlyArray<[DeviceCapability, string]> = [
    ['switchable-resolution', 'res'],
    ['switchable-profile', 'profile'],
    ['button-key', 'btn-key'],
    ['button-macros', 'btn-macros'],
];

function flags_describe(item: { isActive(): boolean; isDefault(): boolean }): string {
    return `${item.isActive() ? ' (active)' : ''}${item.isDefault() ? ' (default)' : ''}`;
}

function resolution_describe(resolution: ResolutionHandle): string {
    const dpi: number = resolution.dpi_get();
    if (dpi === 0) return `${resolution.index}: <disabled>`;

    const rate: number = resolution.reportRate_get();
    const value: string = resolution.capability_has('separate-xy-resolution')
        ? `${resolution.dpiX_get()}x${resolution.dpiY_get()}`
        : `${dpi}`;
    return `${resolution.index}: ${value}dpi @ ${rate}Hz${flags_describe(resolution)}`;
}

function profile_print(out: OutputSink, profile: ProfileHandle, buttonCount: number): void {
    out(`  Profile ${profile.index}${flags_describe(profile)}`);
    out('    Resolutions:');
    for (let j = 0; j < profile.resolutionCount_get(); j++) {
        const resolution: ResolutionHandle | null = profile.resolution_get(j);
        if (!resolution) continue;
        try {
            out(`      ${resolution_describe(resolution)}`);
        } finally {
            resolution.release();
        }
    }

    for (let b = 0; b < buttonCount; b++) {
        const button: ButtonHandle | null = profile.button_get(b);
        if (!button) continue;
        try {
            out(`    Button: ${b} type ${button.type_get()} is mapped to '${action_describe(button.action_get())}'`);
        } finally {
            button.release();
        }
    }
}

function info_run(_node: CommandNode, env: CommandEnv): ExitCode {
    const device: DeviceHandle | null = env.context.device;
    if (!device) return context_missing(env, 'device');
    const { out } = env;

    out(`Device '${device.name_get()}'`);
    const tags: string = CAPABILITY_TAGS
        .filter(([capability]) => device.capability_has(capability))
        .map(([, tag]) => ` ${tag}`)
        .join('');
    out(`Capabilities:${tags}`);

    const buttonCount: number = device.buttonCount_get();
    out(`Number of buttons: ${buttonCount}`);
    const profileCount: number = device.profileCount_get();
    out(`Profiles supported: ${profileCount}`);

    for (let i = 0; i < profileCount; i++) {
        const profile: ProfileHandle | null = device.profile_get(i);
        if (!profile) continue;
        try {
            profile_print(out, profile, buttonCount);
        } finally {
            profile.release();
        }
    }

    return ExitCode.Success;
}

export const command: CommandNode = node_create({
    name: 'info',
    help: "Show information about the device's capabilities",
    needs: ['device'],
    handler: info_run,
});
