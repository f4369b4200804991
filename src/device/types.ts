/**
 * @file Device Library Contract
 *
 * The interface the command layer consumes from the device-abstraction
 * library. The command layer never talks to hardware itself: it opens
 * devices by path, walks profiles / resolutions / buttons by index, and asks
 * for capability flags before deciding whether to invoke an operation.
 *
 * Every handle is reference counted. Whoever acquires a handle (by
 * `device_open`, `profile_get`, `resolution_get` or `button_get`) owns it
 * and must call `release()` on it exactly once.
 *
 * Methods follow the project's RPN naming convention (subject_verb).
 *
 * @module device
 */

import type { ButtonActionState, MacroEventType } from '../button/types.js';
import type { SpecialAction } from '../button/special.js';

export const DEVICE_CAPABILITIES = [
    'switchable-resolution',
    'switchable-profile',
    'button-key',
    'button-macros',
] as const;

export type DeviceCapability = typeof DEVICE_CAPABILITIES[number];

export type ResolutionCapability = 'separate-xy-resolution';

export const BUTTON_TYPES = [
    'unknown',
    'left',
    'middle',
    'right',
    'thumb',
    'thumb2',
    'wheel-left',
    'wheel-right',
    'wheel-click',
    'extra',
    'side',
    'pinkie',
    'resolution-cycle-up',
    'profile-cycle-up',
] as const;

export type ButtonType = typeof BUTTON_TYPES[number];

/** Library log verbosity. `raw` adds protocol traffic. */
export type LogPriority = 'info' | 'debug' | 'raw';

/** Outcome of a mutating device operation. */
export type OpResult = { ok: true } | { ok: false; error: string };

export interface Releasable {
    /** Drop this reference. Calling it twice on the same handle is a bug. */
    release(): void;
}

export interface DeviceLibrary {
    /** Open the device behind a device node path; null when unsupported or absent. */
    device_open(path: string): DeviceHandle | null;
    logPriority_set(priority: LogPriority): void;
}

export interface DeviceHandle extends Releasable {
    readonly path: string;
    name_get(): string;
    capability_has(capability: DeviceCapability): boolean;
    buttonCount_get(): number;
    profileCount_get(): number;
    /** Profile at `index`, or null when out of range. */
    profile_get(index: number): ProfileHandle | null;
}

export interface ProfileHandle extends Releasable {
    readonly index: number;
    isActive(): boolean;
    isDefault(): boolean;
    /** Make this the device's active profile and commit it. */
    active_set(): OpResult;
    resolutionCount_get(): number;
    resolution_get(index: number): ResolutionHandle | null;
    button_get(index: number): ButtonHandle | null;
}

export interface ResolutionHandle extends Releasable {
    readonly index: number;
    isActive(): boolean;
    isDefault(): boolean;
    capability_has(capability: ResolutionCapability): boolean;
    /** 0 means the resolution slot is disabled. */
    dpi_get(): number;
    dpiX_get(): number;
    dpiY_get(): number;
    dpi_set(dpi: number): OpResult;
    reportRate_get(): number;
    reportRate_set(hz: number): OpResult;
    active_set(): OpResult;
}

export interface ButtonHandle extends Releasable {
    readonly index: number;
    type_get(): ButtonType;
    action_get(): ButtonActionState;
    button_set(target: number): OpResult;
    key_set(keyCode: number, modifiers: readonly number[]): OpResult;
    special_set(special: SpecialAction): OpResult;
    /** Start a macro; events follow through `macroEvent_set`, then `macro_write` commits. */
    macro_set(name: string): OpResult;
    macroEvent_set(index: number, type: MacroEventType, keyCode: number): OpResult;
    macro_write(): OpResult;
    disable(): OpResult;
}
