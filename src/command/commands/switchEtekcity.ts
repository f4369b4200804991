/**
 * `switch-etekcity` command implementation.
 *
 * Toggles whether buttons 6 and 7 of the active profile report the volume
 * keys. Any mapping other than both-volume or both-unmapped is left alone.
 */

import { action_describe } from '../../button/ActionEncoder.js';
import { keycode_fromName } from '../../button/keycodes.js';
import type { ButtonActionState } from '../../button/types.js';
import type { ButtonHandle, OpResult } from '../../device/types.js';
import { node_create } from '../node.js';
import { ExitCode, type CommandEnv, type CommandNode } from '../types.js';
import { capability_require, context_missing } from './_shared.js';

const VOLUME_UP_BUTTON = 6;
const VOLUME_DOWN_BUTTON = 7;

export type VolumeKeyState = 'reporting' | 'unmapped' | 'other';

function isKey(state: ButtonActionState, keyName: string): boolean {
    return state.type === 'key' && state.keyCode === keycode_fromName(keyName);
}

/**
 * Classify the current mapping of the two volume buttons.
 */
export function volumeKeys_classify(up: ButtonActionState, down: ButtonActionState): VolumeKeyState {
    if (isKey(up, 'KEY_VOLUMEUP') && isKey(down, 'KEY_VOLUMEDOWN')) return 'reporting';
    if (up.type === 'none' && down.type === 'none') return 'unmapped';
    return 'other';
}

/**
 * Flip both volume buttons. A failure on the second button leaves the first
 * one already remapped, and the error says so.
 */
export function volumeKeys_toggle(up: ButtonHandle, down: ButtonHandle, state: 'reporting' | 'unmapped'): OpResult {
    const first: OpResult = state === 'reporting'
        ? up.disable()
        : up.key_set(keycode_fromName('KEY_VOLUMEUP'), []);
    if (!first.ok) return first;

    const second: OpResult = state === 'reporting'
        ? down.disable()
        : down.key_set(keycode_fromName('KEY_VOLUMEDOWN'), []);
    if (!second.ok) {
        return { ok: false, error: `${second.error} (button ${VOLUME_UP_BUTTON} already remapped)` };
    }
    return second;
}

function switchEtekcity_run(_node: CommandNode, env: CommandEnv): ExitCode {
    const { device, profile } = env.context;
    if (!device) return context_missing(env, 'device');
    if (!profile) return context_missing(env, 'profile');
    if (!capability_require(env, device, 'switchable-profile')) return ExitCode.Unsupported;

    const name: string = device.name_get();
    const up: ButtonHandle | null = profile.button_get(VOLUME_UP_BUTTON);
    const down: ButtonHandle | null = profile.button_get(VOLUME_DOWN_BUTTON);
    try {
        if (!up || !down) {
            env.log.error(`Device '${name}' has no buttons ${VOLUME_UP_BUTTON} and ${VOLUME_DOWN_BUTTON}`);
            return ExitCode.Unsupported;
        }

        const upState: ButtonActionState = up.action_get();
        const downState: ButtonActionState = down.action_get();
        const state: VolumeKeyState = volumeKeys_classify(upState, downState);
        if (state === 'other') {
            env.log.error(
                `Buttons ${VOLUME_UP_BUTTON} and ${VOLUME_DOWN_BUTTON} of '${name}' are mapped to ` +
                `'${action_describe(upState)}' and '${action_describe(downState)}', leaving them unchanged`,
            );
            return ExitCode.Unsupported;
        }

        const toggled: OpResult = volumeKeys_toggle(up, down, state);
        if (!toggled.ok) {
            env.log.error(`Unable to remap the volume buttons: ${toggled.error}`);
            return ExitCode.Device;
        }
        env.out(state === 'reporting'
            ? `Switched the current profile of '${name}' to not report the volume keys`
            : `Switched the current profile of '${name}' to report the volume keys`);
        return ExitCode.Success;
    } finally {
        up?.release();
        down?.release();
    }
}

export const command: CommandNode = node_create({
    name: 'switch-etekcity',
    help: 'Switch the Etekcity mouse active profile',
    needs: ['profile'],
    handler: switchEtekcity_run,
});
