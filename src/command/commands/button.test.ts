import { describe, it, expect } from 'vitest';
import { command_dispatch } from '../Dispatcher.js';
import { COMMAND_TREE } from './index.js';
import { ExitCode } from '../types.js';
import type { MemoryDeviceLibrary } from '../../device/MemoryDeviceLibrary.js';
import {
    GAMING_PATH,
    buttonAction_read,
    gamingMouse_spec,
    harness_create,
    library_build,
    type Harness,
} from '../../testing/devices.js';

function button_run(library: MemoryDeviceLibrary, ...args: string[]): Harness & { rc: number } {
    const harness: Harness = harness_create(library);
    const rc: number = command_dispatch(COMMAND_TREE, harness.env, ['button', ...args, GAMING_PATH]);
    harness.env.context.release();
    expect(library.ledger.outstanding()).toBe(0);
    return { ...harness, rc };
}

describe('button N get', () => {
    it('prints the mapping of the button', () => {
        const result = button_run(library_build(gamingMouse_spec()), '5', 'get');
        expect(result.rc).toBe(ExitCode.Success);
        expect(result.stdout).toEqual(["Button 5 is mapped to 'key KEY_LEFTCTRL+KEY_C'"]);
    });

    it('needs a button number', () => {
        const result = button_run(library_build(gamingMouse_spec()), 'get');
        expect(result.rc).toBe(ExitCode.Usage);
        expect(result.stderr).toEqual(["error: 'button get' needs a button number"]);
    });

    it('rejects buttons the device does not have', () => {
        const result = button_run(library_build(gamingMouse_spec()), '8', 'get');
        expect(result.rc).toBe(ExitCode.Unsupported);
        expect(result.stderr).toEqual(['error: Invalid button number 8']);
    });
});

describe('button N set', () => {
    it('maps the button without re-activating the profile', () => {
        const library = library_build(gamingMouse_spec({ faults: ['profile-activate'] }));
        expect(button_run(library, '1', 'set', 'special', 'doubleclick').rc).toBe(ExitCode.Success);
        expect(buttonAction_read(library, GAMING_PATH, 0, 1)).toEqual({ type: 'special', special: 'doubleclick' });
        expect(button_run(library, '1', 'get').stdout).toEqual(["Button 1 is mapped to 'special doubleclick'"]);
    });

    it('rejects actions that do not encode', () => {
        const result = button_run(library_build(gamingMouse_spec()), '1', 'set', 'macro', 'z');
        expect(result.rc).toBe(ExitCode.Usage);
        expect(result.stderr).toEqual(["error: Invalid macro 'z'"]);
    });

    it('needs an action type and an argument', () => {
        expect(button_run(library_build(gamingMouse_spec()), '1', 'set', 'key').rc).toBe(ExitCode.Usage);
    });
});
