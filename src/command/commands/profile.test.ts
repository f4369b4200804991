import { describe, it, expect } from 'vitest';
import { command_dispatch } from '../Dispatcher.js';
import { COMMAND_TREE } from './index.js';
import { ExitCode } from '../types.js';
import type { MemoryDeviceLibrary } from '../../device/MemoryDeviceLibrary.js';
import {
    GAMING_PATH,
    OFFICE_PATH,
    gamingMouse_spec,
    harness_create,
    library_build,
    officeMouse_spec,
    type Harness,
} from '../../testing/devices.js';

function profile_run(library: MemoryDeviceLibrary, ...args: string[]): Harness & { rc: number } {
    const harness: Harness = harness_create(library);
    const rc: number = command_dispatch(COMMAND_TREE, harness.env, ['profile', ...args]);
    harness.env.context.release();
    expect(library.ledger.outstanding()).toBe(0);
    return { ...harness, rc };
}

describe('profile active get', () => {
    it('prints the active profile', () => {
        const result = profile_run(library_build(gamingMouse_spec()), 'active', 'get', GAMING_PATH);
        expect(result.rc).toBe(ExitCode.Success);
        expect(result.stdout).toEqual(['0']);
    });

    it('prints 0 for devices without switchable profiles', () => {
        const result = profile_run(library_build(officeMouse_spec()), 'active', 'get', OFFICE_PATH);
        expect(result.stdout).toEqual(['0']);
    });

    it('fails when no profile is active', () => {
        const library = library_build(gamingMouse_spec({ profiles: [{}, {}] }));
        const result = profile_run(library, 'active', 'get', GAMING_PATH);
        expect(result.rc).toBe(ExitCode.Device);
        expect(result.stderr).toEqual(['error: Failed to retrieve the active profile']);
    });
});

describe('profile active set', () => {
    it('switches to another profile', () => {
        const library = library_build(gamingMouse_spec());
        const result = profile_run(library, 'active', 'set', '1', GAMING_PATH);
        expect(result.rc).toBe(ExitCode.Success);
        expect(result.stdout).toEqual(["Switched 'Test Gaming Mouse' to profile '1'"]);

        expect(profile_run(library, 'active', 'get', GAMING_PATH).stdout).toEqual(['1']);
    });

    it('reports a profile that is already active', () => {
        const result = profile_run(library_build(gamingMouse_spec()), 'active', 'set', '0', GAMING_PATH);
        expect(result.rc).toBe(ExitCode.Success);
        expect(result.stdout).toEqual(["'Test Gaming Mouse' is already in profile '0'"]);
    });

    it('rejects an index equal to the profile count', () => {
        const result = profile_run(library_build(gamingMouse_spec()), 'active', 'set', '3', GAMING_PATH);
        expect(result.rc).toBe(ExitCode.Unsupported);
        expect(result.stderr).toEqual(["error: '3' is not a valid profile ('Test Gaming Mouse' has 3)"]);
    });

    it('needs one numeric argument', () => {
        expect(profile_run(library_build(gamingMouse_spec()), 'active', 'set', 'one', GAMING_PATH).rc).toBe(ExitCode.Usage);
        expect(profile_run(library_build(gamingMouse_spec()), 'active', 'set', GAMING_PATH).rc).toBe(ExitCode.Usage);
    });

    it('needs switchable profiles', () => {
        const result = profile_run(library_build(officeMouse_spec()), 'active', 'set', '0', OFFICE_PATH);
        expect(result.rc).toBe(ExitCode.Unsupported);
        expect(result.stderr).toEqual(["error: Device 'Test Office Mouse' has no switchable profiles"]);
    });

    it('reports a device that refuses the switch', () => {
        const library = library_build(gamingMouse_spec({ faults: ['profile-activate'] }));
        const result = profile_run(library, 'active', 'set', '2', GAMING_PATH);
        expect(result.rc).toBe(ExitCode.Device);
        expect(result.stderr).toEqual([
            "error: Unable to switch 'Test Gaming Mouse' to profile 2: device rejected the profile switch",
        ]);
    });
});

describe('profile N', () => {
    it('runs resolution commands against the selected profile', () => {
        const result = profile_run(library_build(gamingMouse_spec()), '1', 'resolution', 'dpi', 'get', GAMING_PATH);
        expect(result.rc).toBe(ExitCode.Success);
        expect(result.stdout).toEqual(['400']);
    });

    it('runs button commands against the selected profile', () => {
        const result = profile_run(library_build(gamingMouse_spec()), '2', 'button', '0', 'get', GAMING_PATH);
        expect(result.stdout).toEqual(["Button 0 is mapped to 'none'"]);
    });

    it('rejects profiles the device does not have', () => {
        const result = profile_run(library_build(gamingMouse_spec()), '5', 'active', 'get', GAMING_PATH);
        expect(result.rc).toBe(ExitCode.Unsupported);
        expect(result.stderr).toEqual(['error: Unable to find profile 5']);
    });
});
