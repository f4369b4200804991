/**
 * @file Key Code Table
 *
 * Name ⇄ code lookup for Linux input key codes (`KEY_*` and `BTN_*`).
 * The table lives in `data/keycodes.json` and is validated on first use.
 *
 * @module button
 */

import fs from 'fs';
import { z } from 'zod';

const KeycodeTableSchema = z.record(z.string(), z.number().int().nonnegative());

/** Code 0 is the reserved key: "no key". */
export const KEY_RESERVED = 0;

interface KeycodeTable {
    byName: Map<string, number>;
    byCode: Map<number, string>;
}

let table: KeycodeTable | null = null;

function table_load(): KeycodeTable {
    if (table) return table;

    const url: URL = new URL('../../data/keycodes.json', import.meta.url);
    const result = KeycodeTableSchema.safeParse(JSON.parse(fs.readFileSync(url, 'utf-8')));
    if (!result.success) {
        throw new Error(`Invalid key code table: ${result.error.issues.map(i => i.message).join('; ')}`);
    }

    const byName: Map<string, number> = new Map();
    const byCode: Map<number, string> = new Map();
    for (const [name, code] of Object.entries(result.data)) {
        byName.set(name, code);
        // first name wins for codes with aliases
        if (!byCode.has(code)) byCode.set(code, name);
    }
    table = { byName, byCode };
    return table;
}

/**
 * Resolve a key name such as `KEY_A` or `BTN_LEFT`.
 *
 * @returns The key code, or `KEY_RESERVED` (0) for unknown names.
 */
export function keycode_fromName(name: string): number {
    return table_load().byName.get(name) ?? KEY_RESERVED;
}

/**
 * Resolve a key code back to its name.
 */
export function keycode_name(code: number): string | null {
    return table_load().byCode.get(code) ?? null;
}
