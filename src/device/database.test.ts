import { describe, it, expect } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { database_parse, library_load } from './database.js';
import { Logger } from '../log/Logger.js';

const YAML_MOUSE: string = `
devices:
  - path: /dev/input/event7
    name: Yaml Mouse
    capabilities: [button-key]
    buttons: 2
    profiles:
      - active: true
        resolutions:
          - { dpi: [1600, 800], rate: 500, active: true }
        buttons:
          - { type: left, action: { type: key, key: KEY_A, modifiers: [KEY_LEFTCTRL] } }
`;

describe('database_parse', () => {
    it('treats an empty document as no devices', () => {
        expect(database_parse('')).toEqual([]);
    });

    it('fills defaults and resolves key names', () => {
        expect(database_parse(YAML_MOUSE)).toEqual([
            {
                path: '/dev/input/event7',
                name: 'Yaml Mouse',
                capabilities: ['button-key'],
                buttons: 2,
                faults: [],
                profiles: [
                    {
                        active: true,
                        default: false,
                        resolutions: [{ dpi: [1600, 800], rate: 500, active: true, default: false }],
                        buttons: [{ type: 'left', action: { type: 'key', keyCode: 30, modifiers: [29] } }],
                    },
                ],
            },
        ]);
    });

    it('reports unknown key names with their location', () => {
        const broken: string = YAML_MOUSE.replace('key: KEY_A', 'key: KEY_NOPE');
        expect(() => database_parse(broken)).toThrow(
            "Invalid device database: [devices.0.profiles.0.buttons.0.action.key] unknown key name 'KEY_NOPE'",
        );
    });

    it('reports missing required fields', () => {
        expect(() => database_parse('devices:\n  - path: /dev/input/event7\n')).toThrow('[devices.0.name] Required');
    });

    it('rejects profiles with more buttons than the device', () => {
        const broken: string = YAML_MOUSE.replace('buttons: 2', 'buttons: 0');
        expect(() => database_parse(broken)).toThrow('[devices.0] a profile declares more buttons than the device has');
    });

    it('rejects duplicate device paths', () => {
        const doubled: string = `${YAML_MOUSE}${YAML_MOUSE.replace('devices:\n', '')}`;
        expect(() => database_parse(doubled)).toThrow("duplicate device path '/dev/input/event7'");
    });

    it('rejects malformed YAML', () => {
        expect(() => database_parse('devices: [')).toThrow();
    });

    it('parses the example database shipped with the project', () => {
        const example: string = fs.readFileSync(new URL('../../devices.example.yaml', import.meta.url), 'utf-8');
        expect(database_parse(example).map(d => d.path)).toEqual(['/dev/input/event5', '/dev/input/event6']);
    });
});

describe('library_load', () => {
    it('yields an empty library when the database file is missing', () => {
        const lines: string[] = [];
        const logger = new Logger({ level: 'debug', sink: (line: string): void => { lines.push(line); } });
        const missing: string = path.join(os.tmpdir(), 'mousectl-missing-database.yaml');

        const library = library_load(missing, logger);
        expect(library.device_open('/dev/input/event7')).toBeNull();
        expect(lines).toEqual([`debug: device database '${missing}' not found, no devices available`]);
    });

    it('loads devices from a file', () => {
        const dir: string = fs.mkdtempSync(path.join(os.tmpdir(), 'mousectl-'));
        const file: string = path.join(dir, 'devices.yaml');
        try {
            fs.writeFileSync(file, YAML_MOUSE);
            const library = library_load(file, new Logger());
            const device = library.device_open('/dev/input/event7');
            expect(device?.name_get()).toBe('Yaml Mouse');
            device?.release();
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });
});
