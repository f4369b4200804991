import { describe, it, expect } from 'vitest';
import { context_ensure, type EnsureResult } from './ContextResolver.js';
import type { Prerequisite } from './types.js';
import { GAMING_PATH, gamingMouse_spec, harness_create, library_build, type Harness } from '../testing/devices.js';

function needs(...items: Prerequisite[]): ReadonlySet<Prerequisite> {
    return new Set(items);
}

function harness_gaming(overrides: Parameters<typeof gamingMouse_spec>[0] = {}): Harness {
    return harness_create(library_build(gamingMouse_spec(overrides)));
}

describe('context_ensure', () => {
    it('leaves tokens alone when nothing is needed', () => {
        const { env } = harness_gaming();
        expect(context_ensure(needs(), env, ['list', 'x'])).toEqual({ ok: true, tokens: ['list', 'x'] });
    });

    it('needs a token after the command to open a device', () => {
        const { env, stderr } = harness_gaming();
        expect(context_ensure(needs('device'), env, ['info'])).toEqual({ ok: false, exitCode: 3 });
        expect(stderr).toEqual(['error: Missing device path.']);
    });

    it('reports devices the library does not support', () => {
        const { env, stderr } = harness_gaming();
        expect(context_ensure(needs('device'), env, ['info', '/dev/input/event99'])).toEqual({ ok: false, exitCode: 3 });
        expect(stderr).toEqual(["error: Device '/dev/input/event99' is not supported"]);
    });

    it('takes the device path from the last token and resolves the active chain', () => {
        const { env, library } = harness_gaming();
        const result: EnsureResult = context_ensure(needs('resolution'), env, ['dpi', 'get', GAMING_PATH]);

        expect(result).toEqual({ ok: true, tokens: ['dpi', 'get'] });
        expect(env.context.device?.path).toBe(GAMING_PATH);
        expect(env.context.profile?.index).toBe(0);
        expect(env.context.resolution?.index).toBe(0);

        env.context.release();
        expect(library.ledger.outstanding()).toBe(0);
    });

    it('reuses a cached device without consuming a token', () => {
        const { env } = harness_gaming();
        context_ensure(needs('device'), env, ['profile', GAMING_PATH]);
        const device = env.context.device;

        expect(context_ensure(needs('profile'), env, ['active', 'get'])).toEqual({ ok: true, tokens: ['active', 'get'] });
        expect(env.context.device).toBe(device);
        env.context.release();
    });

    it('fails when no profile is active', () => {
        const { env, stderr, library } = harness_gaming({ profiles: [{ resolutions: [{ dpi: 800 }] }, {}] });
        expect(context_ensure(needs('profile'), env, ['button', GAMING_PATH])).toEqual({ ok: false, exitCode: 3 });
        expect(stderr).toEqual(['error: Failed to retrieve the active profile']);

        env.context.release();
        expect(library.ledger.counts_get('profile')).toEqual({ acquired: 2, released: 2 });
    });

    it('fails when no resolution is active', () => {
        const { env, stderr, library } = harness_gaming({ profiles: [{ active: true, resolutions: [{ dpi: 800 }] }] });
        expect(context_ensure(needs('resolution'), env, ['dpi', 'get', GAMING_PATH])).toEqual({ ok: false, exitCode: 3 });
        expect(stderr).toEqual(['error: Failed to retrieve the active resolution']);

        env.context.release();
        expect(library.ledger.outstanding()).toBe(0);
    });
});
