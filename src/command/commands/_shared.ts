/**
 * Shared helpers for command handler modules.
 */

import type { ButtonAction } from '../../button/types.js';
import { action_apply } from '../../button/ActionEncoder.js';
import type { ButtonHandle, DeviceCapability, DeviceHandle, OpResult } from '../../device/types.js';
import { ExitCode, type CommandEnv, type Prerequisite } from '../types.js';

/**
 * Convert unknown thrown values into display-safe messages.
 */
export function errorMessage_get(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Report a prerequisite that should have been resolved before the handler ran.
 */
export function context_missing(env: CommandEnv, what: Prerequisite): ExitCode {
    env.log.error(`No ${what} resolved for this command`);
    return ExitCode.Device;
}

const CAPABILITY_LABELS: Record<DeviceCapability, string> = {
    'switchable-resolution': 'has no switchable resolution',
    'switchable-profile': 'has no switchable profiles',
    'button-key': 'has no programmable buttons',
    'button-macros': 'does not support button macros',
};

/**
 * Check a device capability, logging when it is missing.
 *
 * @returns True when the device has the capability.
 */
export function capability_require(env: CommandEnv, device: DeviceHandle, capability: DeviceCapability): boolean {
    if (device.capability_has(capability)) return true;
    env.log.error(`Device '${device.name_get()}' ${CAPABILITY_LABELS[capability]}`);
    return false;
}

/**
 * Map an encoded action onto button `buttonIndex` of the context profile.
 *
 * @param description - `<kind> <argument>` as typed, for diagnostics.
 */
export function buttonAction_assign(
    env: CommandEnv,
    buttonIndex: number,
    action: ButtonAction,
    description: string,
): ExitCode {
    const { device, profile } = env.context;
    if (!device) return context_missing(env, 'device');
    if (!profile) return context_missing(env, 'profile');

    if (!capability_require(env, device, 'button-key')) return ExitCode.Unsupported;
    if (action.type === 'macro' && !capability_require(env, device, 'button-macros')) {
        return ExitCode.Unsupported;
    }

    const button: ButtonHandle | null = profile.button_get(buttonIndex);
    if (!button) {
        env.log.error(`Invalid button number ${buttonIndex}`);
        return ExitCode.Unsupported;
    }

    try {
        const result: OpResult = action_apply(button, action);
        if (!result.ok) {
            env.log.error(`Unable to perform button ${buttonIndex} mapping ${description}: ${result.error}`);
            return ExitCode.Unsupported;
        }
        env.log.debug(`button ${buttonIndex} mapped to ${description}`);
        return ExitCode.Success;
    } finally {
        button.release();
    }
}
