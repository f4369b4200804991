import { describe, it, expect } from 'vitest';
import { KEY_RESERVED, keycode_fromName, keycode_name } from './keycodes.js';
import { SPECIAL_ACTIONS, specialAction_parse } from './special.js';

describe('keycodes', () => {
    it('resolves key and button names to Linux input codes', () => {
        expect(keycode_fromName('KEY_A')).toBe(30);
        expect(keycode_fromName('KEY_VOLUMEUP')).toBe(115);
        expect(keycode_fromName('BTN_LEFT')).toBe(272);
    });

    it('returns the reserved code for unknown names', () => {
        expect(keycode_fromName('KEY_DOES_NOT_EXIST')).toBe(KEY_RESERVED);
        expect(keycode_fromName('key_a')).toBe(KEY_RESERVED);
    });

    it('maps codes back to names', () => {
        expect(keycode_name(29)).toBe('KEY_LEFTCTRL');
        expect(keycode_name(114)).toBe('KEY_VOLUMEDOWN');
        expect(keycode_name(99999)).toBeNull();
    });
});

describe('specialAction_parse', () => {
    it('accepts every name in the vocabulary', () => {
        for (const name of SPECIAL_ACTIONS) {
            expect(specialAction_parse(name)).toBe(name);
        }
    });

    it('rejects names outside the vocabulary', () => {
        expect(specialAction_parse('wheel_up')).toBeNull();
        expect(specialAction_parse('DOUBLECLICK')).toBeNull();
        expect(specialAction_parse('')).toBeNull();
    });
});
