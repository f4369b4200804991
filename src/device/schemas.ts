/**
 * @file Device Database Schemas
 *
 * Zod runtime schemas for the YAML device database consumed by
 * `MemoryDeviceLibrary`. Each schema corresponds to one level of the
 * document: device, profile, resolution, button.
 *
 * Optional fields default so that a database only needs to declare what is
 * not default. Key names are resolved to key codes at the boundary, so a
 * typo in `KEY_*` is reported as a schema issue rather than a silent 0.
 *
 * @module device/schemas
 */

import { z } from 'zod';
import { MACRO_CAPACITY, type ButtonActionState } from '../button/types.js';
import { SPECIAL_ACTIONS } from '../button/special.js';
import { KEY_RESERVED, keycode_fromName } from '../button/keycodes.js';
import { BUTTON_TYPES, DEVICE_CAPABILITIES } from './types.js';

/** Operations a database entry can mark as failing (test hooks). */
export const DEVICE_FAULTS = ['profile-activate', 'resolution-write', 'button-write'] as const;

export type DeviceFault = typeof DEVICE_FAULTS[number];

// ─── Actions ──────────────────────────────────────────────────────────────────

const KeyNameSchema = z.string().transform((name: string, ctx: z.RefinementCtx): number => {
    const code: number = keycode_fromName(name);
    if (code === KEY_RESERVED) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown key name '${name}'` });
        return z.NEVER;
    }
    return code;
});

const RawActionSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('none') }),
    z.object({ type: z.literal('button'), button: z.number().int().positive() }),
    z.object({
        type:      z.literal('key'),
        key:       KeyNameSchema,
        modifiers: z.array(KeyNameSchema).default([]),
    }),
    z.object({ type: z.literal('special'), special: z.enum(SPECIAL_ACTIONS) }),
    z.object({
        type:   z.literal('macro'),
        name:   z.string(),
        events: z.array(z.object({
            type: z.enum(['pressed', 'released']),
            key:  KeyNameSchema,
        })).max(MACRO_CAPACITY).default([]),
    }),
]);

type RawAction = z.output<typeof RawActionSchema>;

function action_fromRaw(raw: RawAction): ButtonActionState {
    switch (raw.type) {
        case 'none':
            return { type: 'none' };
        case 'button':
            return { type: 'button', button: raw.button };
        case 'key':
            return { type: 'key', keyCode: raw.key, modifiers: raw.modifiers };
        case 'special':
            return { type: 'special', special: raw.special };
        case 'macro':
            return {
                type: 'macro',
                name: raw.name,
                events: raw.events.map(e => ({ type: e.type, keyCode: e.key })),
            };
    }
}

export const ActionSchema = RawActionSchema.transform(action_fromRaw);

// ─── Device tree ──────────────────────────────────────────────────────────────

export const ButtonSchema = z.object({
    type:   z.enum(BUTTON_TYPES).default('unknown'),
    action: ActionSchema.default({ type: 'none' }),
});

/** `dpi` is either one value or an `[x, y]` pair for separate-axis sensors. */
export const ResolutionSchema = z.object({
    dpi:     z.union([
        z.number().int().nonnegative(),
        z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]),
    ]),
    rate:    z.number().int().positive().default(1000),
    active:  z.boolean().default(false),
    default: z.boolean().default(false),
});

export const ProfileSchema = z.object({
    active:      z.boolean().default(false),
    default:     z.boolean().default(false),
    resolutions: z.array(ResolutionSchema).default([]),
    buttons:     z.array(ButtonSchema).default([]),
});

export const DeviceSchema = z.object({
    path:         z.string().min(1, 'device path is required'),
    name:         z.string().min(1, 'device name is required'),
    capabilities: z.array(z.enum(DEVICE_CAPABILITIES)).default([]),
    buttons:      z.number().int().nonnegative().default(0),
    profiles:     z.array(ProfileSchema).default([]),
    faults:       z.array(z.enum(DEVICE_FAULTS)).default([]),
}).refine(
    d => d.profiles.every(p => p.buttons.length <= d.buttons),
    { message: 'a profile declares more buttons than the device has' },
);

export const DatabaseSchema = z.object({
    devices: z.array(DeviceSchema).default([]),
});

export type DeviceSpec = z.output<typeof DeviceSchema>;
export type DeviceSpecInput = z.input<typeof DeviceSchema>;
