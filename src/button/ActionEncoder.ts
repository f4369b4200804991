/**
 * @file Button Action Encoder
 *
 * Turns a command-line `(kind, argument)` pair into a tagged
 * `ButtonAction`, and moves an encoded action onto a button handle.
 *
 * Macros are not parsed from the argument: its first character picks one of
 * the canned demonstration macros (`f` → "foo", `b` → "bar").
 *
 * @module button
 */

import type { ButtonHandle, OpResult } from '../device/types.js';
import { safeInteger_tryParse } from '../command/tokens.js';
import { KEY_RESERVED, keycode_fromName, keycode_name } from './keycodes.js';
import { specialAction_parse, type SpecialAction } from './special.js';
import {
    MACRO_CAPACITY,
    type ButtonAction,
    type ButtonActionState,
    type Macro,
    type MacroEvent,
} from './types.js';

export type EncodeResult =
    | { ok: true; action: ButtonAction }
    | { ok: false; error: string };

// ─── Canned macros ────────────────────────────────────────────────────────────

function keystrokes_build(keys: readonly string[]): MacroEvent[] {
    const events: MacroEvent[] = [];
    for (const key of keys) {
        const keyCode: number = keycode_fromName(key);
        events.push({ type: 'pressed', keyCode }, { type: 'released', keyCode });
    }
    return events;
}

const CANNED_MACROS: Record<string, { name: string; keys: readonly string[] }> = {
    f: { name: 'foo', keys: ['KEY_F', 'KEY_O', 'KEY_O'] },
    b: { name: 'bar', keys: ['KEY_B', 'KEY_A', 'KEY_R'] },
};

/**
 * Build the canned macro selected by the argument's first character.
 *
 * @returns The macro, or an empty macro (no name, no events) when the
 *   character selects nothing.
 */
export function macro_encode(argument: string): Macro {
    const canned = CANNED_MACROS[argument.charAt(0)];
    if (!canned) return { name: '', events: [] };
    return { name: canned.name, events: keystrokes_build(canned.keys) };
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

/**
 * Encode a button action from its kind and argument.
 *
 * Range checks on button numbers are left to the device.
 */
export function action_encode(kind: string, argument: string): EncodeResult {
    switch (kind) {
        case 'button': {
            const button: number | null = safeInteger_tryParse(argument);
            if (button === null) {
                return { ok: false, error: `Invalid button number '${argument}'` };
            }
            return { ok: true, action: { type: 'button', button } };
        }
        case 'key': {
            const keyCode: number = keycode_fromName(argument);
            if (keyCode === KEY_RESERVED) {
                return { ok: false, error: `Failed to resolve key ${argument}` };
            }
            return { ok: true, action: { type: 'key', keyCode, modifiers: [] } };
        }
        case 'special': {
            const special: SpecialAction | null = specialAction_parse(argument);
            if (!special) {
                return { ok: false, error: `Invalid special command '${argument}'` };
            }
            return { ok: true, action: { type: 'special', special } };
        }
        case 'macro': {
            const macro: Macro = macro_encode(argument);
            if (macro.events.length === 0) {
                return { ok: false, error: `Invalid macro '${argument}'` };
            }
            return { ok: true, action: { type: 'macro', ...macro } };
        }
        default:
            return { ok: false, error: `Invalid action type '${kind}'` };
    }
}

// ─── Transfer ─────────────────────────────────────────────────────────────────

/**
 * Write a macro to a button: start it, write each event by index, commit.
 *
 * Stops at the first `'none'` event or at `MACRO_CAPACITY`. The first
 * failing step aborts the transfer and is returned.
 */
export function macro_transfer(button: ButtonHandle, macro: Macro): OpResult {
    const started: OpResult = button.macro_set(macro.name);
    if (!started.ok) return started;

    const limit: number = Math.min(macro.events.length, MACRO_CAPACITY);
    for (let i = 0; i < limit; i++) {
        const event: MacroEvent = macro.events[i];
        if (event.type === 'none') break;
        const written: OpResult = button.macroEvent_set(i, event.type, event.keyCode);
        if (!written.ok) return written;
    }

    return button.macro_write();
}

/**
 * Apply an encoded action to a button through the matching setter.
 */
export function action_apply(button: ButtonHandle, action: ButtonAction): OpResult {
    switch (action.type) {
        case 'button':
            return button.button_set(action.button);
        case 'key':
            return button.key_set(action.keyCode, action.modifiers);
        case 'special':
            return button.special_set(action.special);
        case 'macro':
            return macro_transfer(button, action);
    }
}

// ─── Description ──────────────────────────────────────────────────────────────

function keyName_describe(code: number): string {
    return keycode_name(code) ?? `${code}`;
}

/**
 * Human-readable form of a button's action, as shown by `info`.
 */
export function action_describe(state: ButtonActionState): string {
    switch (state.type) {
        case 'none':
            return 'none';
        case 'button':
            return `button ${state.button}`;
        case 'key':
            return `key ${[...state.modifiers, state.keyCode].map(keyName_describe).join('+')}`;
        case 'special':
            return `special ${state.special}`;
        case 'macro':
            return `macro ${state.name}`;
    }
}
