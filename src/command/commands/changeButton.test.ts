import { describe, it, expect } from 'vitest';
import { command_dispatch } from '../Dispatcher.js';
import { COMMAND_TREE } from './index.js';
import { ExitCode } from '../types.js';
import { MemoryDeviceLibrary } from '../../device/MemoryDeviceLibrary.js';
import { Logger } from '../../log/Logger.js';
import {
    GAMING_PATH,
    OFFICE_PATH,
    buttonAction_read,
    gamingMouse_spec,
    harness_create,
    library_build,
    officeMouse_spec,
    type Harness,
} from '../../testing/devices.js';

function changeButton_run(harness: Harness, ...args: string[]): number {
    const rc: number = command_dispatch(COMMAND_TREE, harness.env, ['change-button', ...args]);
    harness.env.context.release();
    expect(harness.library.ledger.outstanding()).toBe(0);
    return rc;
}

describe('change-button', () => {
    it('maps a key and re-activates the profile', () => {
        const traffic: string[] = [];
        const logger = new Logger({ level: 'raw', sink: (line: string): void => { traffic.push(line); } });
        const library = MemoryDeviceLibrary.fromInputs([gamingMouse_spec()], logger);
        library.logPriority_set('raw');
        const harness = harness_create(library);

        expect(changeButton_run(harness, '3', 'key', 'KEY_A', GAMING_PATH)).toBe(ExitCode.Success);
        expect(buttonAction_read(library, GAMING_PATH, 0, 3)).toEqual({ type: 'key', keyCode: 30, modifiers: [] });
        expect(traffic).toContain(`raw: ${GAMING_PATH}#0/3: action <- key`);
        expect(traffic).toContain(`raw: ${GAMING_PATH}: profile 0 <- active`);
        expect(harness.stdout).toEqual([]);
    });

    it('writes a canned macro', () => {
        const harness = harness_create(library_build(gamingMouse_spec()));
        expect(changeButton_run(harness, '4', 'macro', 'bar', GAMING_PATH)).toBe(ExitCode.Success);

        const action = buttonAction_read(harness.library, GAMING_PATH, 0, 4);
        expect(action?.type === 'macro' ? [action.name, action.events.length] : null).toEqual(['bar', 6]);
    });

    it('needs exactly three arguments', () => {
        const harness = harness_create(library_build(gamingMouse_spec()));
        expect(changeButton_run(harness, '3', 'key', GAMING_PATH)).toBe(ExitCode.Usage);
        expect(harness.stderr).toEqual(['error: change-button needs a button number, an action type and an argument']);
    });

    it('needs a numeric button', () => {
        const harness = harness_create(library_build(gamingMouse_spec()));
        expect(changeButton_run(harness, 'x', 'key', 'KEY_A', GAMING_PATH)).toBe(ExitCode.Usage);
        expect(harness.stderr).toEqual(["error: Invalid button number 'x'"]);
    });

    it('rejects an unknown key without touching the button', () => {
        const harness = harness_create(library_build(gamingMouse_spec()));
        expect(changeButton_run(harness, '3', 'key', 'BOGUS', GAMING_PATH)).toBe(ExitCode.Usage);
        expect(harness.stderr).toEqual(['error: Failed to resolve key BOGUS']);
        expect(buttonAction_read(harness.library, GAMING_PATH, 0, 3)).toEqual({ type: 'special', special: 'wheel-left' });
    });

    it('needs programmable buttons', () => {
        const harness = harness_create(library_build(officeMouse_spec()));
        expect(changeButton_run(harness, '0', 'button', '2', OFFICE_PATH)).toBe(ExitCode.Unsupported);
        expect(harness.stderr).toEqual(["error: Device 'Test Office Mouse' has no programmable buttons"]);
    });

    it('needs macro support for macros', () => {
        const harness = harness_create(library_build(gamingMouse_spec({ capabilities: ['button-key'] })));
        expect(changeButton_run(harness, '0', 'macro', 'f', GAMING_PATH)).toBe(ExitCode.Unsupported);
        expect(harness.stderr).toEqual(["error: Device 'Test Gaming Mouse' does not support button macros"]);
    });

    it('rejects buttons the profile does not have', () => {
        const harness = harness_create(library_build(gamingMouse_spec()));
        expect(changeButton_run(harness, '8', 'button', '1', GAMING_PATH)).toBe(ExitCode.Unsupported);
        expect(harness.stderr).toEqual(['error: Invalid button number 8']);
    });

    it('reports a mapping the device refuses', () => {
        const harness = harness_create(library_build(gamingMouse_spec()));
        expect(changeButton_run(harness, '0', 'button', '9', GAMING_PATH)).toBe(ExitCode.Unsupported);
        expect(harness.stderr).toEqual([
            'error: Unable to perform button 0 mapping button 9: button 9 does not exist on this device',
        ]);
    });

    it('reports a profile that cannot be re-activated', () => {
        const harness = harness_create(library_build(gamingMouse_spec({ faults: ['profile-activate'] })));
        expect(changeButton_run(harness, '0', 'special', 'doubleclick', GAMING_PATH)).toBe(ExitCode.Device);
        expect(harness.stderr).toEqual(['error: Unable to apply the current profile: device rejected the profile switch']);
    });
});
