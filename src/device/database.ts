/**
 * @file Device Database Loader
 *
 * Parses the YAML device database into validated device descriptions and
 * builds the in-memory device library from them.
 *
 * The YAML is validated against `DatabaseSchema` (Zod) at the boundary
 * before any field access.
 *
 * @module device
 */

import fs from 'fs';
import yaml from 'js-yaml';
import type { Logger } from '../log/Logger.js';
import { DatabaseSchema, type DeviceSpec } from './schemas.js';
import { MemoryDeviceLibrary } from './MemoryDeviceLibrary.js';

/**
 * Parse a device database YAML string.
 *
 * @throws On YAML syntax errors, schema violations or duplicate device paths.
 */
export function database_parse(yamlStr: string): DeviceSpec[] {
    const raw: unknown = yaml.load(yamlStr);

    // empty document
    if (raw === undefined || raw === null) return [];

    const result = DatabaseSchema.safeParse(raw);
    if (!result.success) {
        const issues: string = result.error.issues
            .map(i => `[${i.path.join('.')}] ${i.message}`)
            .join('; ');
        throw new Error(`Invalid device database: ${issues}`);
    }

    const seen: Set<string> = new Set();
    for (const device of result.data.devices) {
        if (seen.has(device.path)) {
            throw new Error(`Invalid device database: duplicate device path '${device.path}'`);
        }
        seen.add(device.path);
    }

    return result.data.devices;
}

/**
 * Load the device database at `filePath` into a device library.
 *
 * A missing file yields a library with no devices.
 */
export function library_load(filePath: string, logger: Logger): MemoryDeviceLibrary {
    if (!fs.existsSync(filePath)) {
        logger.debug(`device database '${filePath}' not found, no devices available`);
        return new MemoryDeviceLibrary([], logger);
    }
    const specs: DeviceSpec[] = database_parse(fs.readFileSync(filePath, 'utf-8'));
    logger.debug(`loaded ${specs.length} device(s) from '${filePath}'`);
    return new MemoryDeviceLibrary(specs, logger);
}
