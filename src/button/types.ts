/**
 * @file Button Action Types
 *
 * Tagged representation of what a mouse button does when pressed. Exactly
 * one variant is active at a time; the `type` field is the discriminator.
 *
 * @module button
 */

import type { SpecialAction } from './special.js';

/** Maximum number of events a macro can carry. */
export const MACRO_CAPACITY = 64;

export type MacroEventType = 'pressed' | 'released' | 'none';

export interface MacroEvent {
    type: MacroEventType;
    keyCode: number;
}

export interface Macro {
    name: string;
    /** At most `MACRO_CAPACITY` entries; the first `'none'` entry ends the sequence. */
    events: readonly MacroEvent[];
}

export type ButtonAction =
    | { type: 'button'; button: number }
    | { type: 'key'; keyCode: number; modifiers: readonly number[] }
    | { type: 'special'; special: SpecialAction }
    | ({ type: 'macro' } & Macro);

/** What a button reports back: an action, or nothing mapped at all. */
export type ButtonActionState = ButtonAction | { type: 'none' };
