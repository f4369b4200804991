/**
 * @file Resolved Context
 *
 * The device, profile and resolution resolved so far in one invocation,
 * plus the button index selected by `button N`.
 *
 * The context owns every handle adopted into it, including handles later
 * replaced by an explicit index, and releases each exactly once in
 * `release()`. The dependency chain is enforced on adoption:
 * a profile needs a device, a resolution needs a profile.
 *
 * @module command
 */

import type { DeviceHandle, ProfileHandle, Releasable, ResolutionHandle } from '../device/types.js';

export class ResolvedContext {
    private deviceHandle: DeviceHandle | null = null;
    private profileHandle: ProfileHandle | null = null;
    private resolutionHandle: ResolutionHandle | null = null;
    private readonly owned: Releasable[] = [];
    private released = false;

    /** Button selected by a positional index, or null when none was given. */
    public selectedButtonIndex: number | null = null;

    public get device(): DeviceHandle | null {
        return this.deviceHandle;
    }

    public get profile(): ProfileHandle | null {
        return this.profileHandle;
    }

    public get resolution(): ResolutionHandle | null {
        return this.resolutionHandle;
    }

    public device_adopt(device: DeviceHandle): void {
        this.ownership_take(device);
        this.deviceHandle = device;
    }

    /**
     * Cache a profile. Replacing a profile drops the cached resolution,
     * which belonged to the previous one.
     */
    public profile_adopt(profile: ProfileHandle): void {
        if (!this.deviceHandle) {
            throw new Error('cannot adopt a profile before a device is resolved');
        }
        this.ownership_take(profile);
        if (this.profileHandle !== profile) {
            this.resolutionHandle = null;
        }
        this.profileHandle = profile;
    }

    public resolution_adopt(resolution: ResolutionHandle): void {
        if (!this.profileHandle) {
            throw new Error('cannot adopt a resolution before a profile is resolved');
        }
        this.ownership_take(resolution);
        this.resolutionHandle = resolution;
    }

    /** Number of handles currently owned. */
    public ownedCount_get(): number {
        return this.released ? 0 : this.owned.length;
    }

    /**
     * Release every owned handle, most recently adopted first. Later calls do nothing.
     */
    public release(): void {
        if (this.released) return;
        this.released = true;
        this.resolutionHandle = null;
        this.profileHandle = null;
        this.deviceHandle = null;
        const handles: Releasable[] = this.owned.splice(0).reverse();
        let failure: unknown = null;
        for (const handle of handles) {
            try {
                handle.release();
            } catch (error: unknown) {
                // keep releasing the rest, report the first failure
                if (failure === null) failure = error;
            }
        }
        if (failure !== null) throw failure;
    }

    private ownership_take(handle: Releasable): void {
        if (this.released) {
            throw new Error('context already released');
        }
        if (!this.owned.includes(handle)) {
            this.owned.push(handle);
        }
    }
}
