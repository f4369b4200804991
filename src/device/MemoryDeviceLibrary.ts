/**
 * @file In-Memory Device Library
 *
 * Implements the `DeviceLibrary` contract against device descriptions held
 * in memory (built from the YAML device database, or directly by tests).
 * Mutations change the in-memory state only; nothing is written back.
 *
 * Every handle handed out is recorded in a `HandleLedger`, so callers can
 * check that each acquisition was matched by exactly one release. Releasing
 * the same handle twice throws.
 *
 * @module device
 */

import type { Logger } from '../log/Logger.js';
import { MACRO_CAPACITY, type ButtonActionState, type MacroEvent, type MacroEventType } from '../button/types.js';
import type { SpecialAction } from '../button/special.js';
import type {
    ButtonHandle,
    ButtonType,
    DeviceCapability,
    DeviceHandle,
    DeviceLibrary,
    LogPriority,
    OpResult,
    ProfileHandle,
    ResolutionCapability,
    ResolutionHandle,
} from './types.js';
import { DeviceSchema, type DeviceFault, type DeviceSpec, type DeviceSpecInput } from './schemas.js';

export type HandleKind = 'device' | 'profile' | 'resolution' | 'button';

const OK: OpResult = { ok: true };

// ─── Ledger ───────────────────────────────────────────────────────────────────

export interface HandleCounts {
    acquired: number;
    released: number;
}

/**
 * Acquire/release accounting per handle kind.
 */
export class HandleLedger {
    private readonly counts: Record<HandleKind, HandleCounts> = {
        device: { acquired: 0, released: 0 },
        profile: { acquired: 0, released: 0 },
        resolution: { acquired: 0, released: 0 },
        button: { acquired: 0, released: 0 },
    };

    public acquire(kind: HandleKind): void {
        this.counts[kind].acquired++;
    }

    public release(kind: HandleKind): void {
        this.counts[kind].released++;
    }

    public counts_get(kind: HandleKind): HandleCounts {
        return { ...this.counts[kind] };
    }

    /** Handles acquired but not yet released, across all kinds. */
    public outstanding(): number {
        let total = 0;
        for (const counts of Object.values(this.counts)) {
            total += counts.acquired - counts.released;
        }
        return total;
    }
}

// ─── State ────────────────────────────────────────────────────────────────────

interface ResolutionState {
    dpiX: number;
    dpiY: number;
    rate: number;
    active: boolean;
    isDefault: boolean;
    separateXY: boolean;
}

interface PendingMacro {
    name: string;
    events: MacroEvent[];
}

interface ButtonState {
    type: ButtonType;
    action: ButtonActionState;
    pending: PendingMacro | null;
}

interface ProfileState {
    active: boolean;
    isDefault: boolean;
    resolutions: ResolutionState[];
    buttons: ButtonState[];
}

interface DeviceState {
    path: string;
    name: string;
    capabilities: Set<DeviceCapability>;
    buttonCount: number;
    profiles: ProfileState[];
    faults: Set<DeviceFault>;
}

function deviceState_build(spec: DeviceSpec): DeviceState {
    return {
        path: spec.path,
        name: spec.name,
        capabilities: new Set(spec.capabilities),
        buttonCount: spec.buttons,
        faults: new Set(spec.faults),
        profiles: spec.profiles.map((profile): ProfileState => ({
            active: profile.active,
            isDefault: profile.default,
            resolutions: profile.resolutions.map((res): ResolutionState => {
                const [dpiX, dpiY] = typeof res.dpi === 'number' ? [res.dpi, res.dpi] : res.dpi;
                return {
                    dpiX,
                    dpiY,
                    rate: res.rate,
                    active: res.active,
                    isDefault: res.default,
                    separateXY: typeof res.dpi !== 'number',
                };
            }),
            buttons: Array.from({ length: spec.buttons }, (_unused: unknown, i: number): ButtonState => {
                const declared = profile.buttons[i];
                return {
                    type: declared ? declared.type : 'unknown',
                    action: declared ? declared.action : { type: 'none' },
                    pending: null,
                };
            }),
        })),
    };
}

// ─── Library ──────────────────────────────────────────────────────────────────

export class MemoryDeviceLibrary implements DeviceLibrary {
    public readonly ledger: HandleLedger = new HandleLedger();
    private readonly devices: Map<string, DeviceState> = new Map();
    private priority: LogPriority = 'info';

    constructor(specs: readonly DeviceSpec[], private readonly logger: Logger | null = null) {
        for (const spec of specs) {
            this.devices.set(spec.path, deviceState_build(spec));
        }
    }

    /**
     * Build a library from loosely-typed device descriptions, filling
     * defaults through the database schema.
     */
    public static fromInputs(inputs: readonly DeviceSpecInput[], logger: Logger | null = null): MemoryDeviceLibrary {
        return new MemoryDeviceLibrary(inputs.map(input => DeviceSchema.parse(input)), logger);
    }

    public device_open(path: string): DeviceHandle | null {
        const state: DeviceState | undefined = this.devices.get(path);
        this.debug(`${path}: ${state ? `opened '${state.name}'` : 'no such device'}`);
        if (!state) return null;
        return new MemoryDevice(this, state);
    }

    public logPriority_set(priority: LogPriority): void {
        this.priority = priority;
    }

    /** @internal */
    public debug(message: string): void {
        if (this.priority !== 'info') this.logger?.debug(message);
    }

    /** @internal */
    public traffic(message: string): void {
        if (this.priority === 'raw') this.logger?.raw(message);
    }
}

// ─── Handles ──────────────────────────────────────────────────────────────────

abstract class MemoryHandle {
    private released = false;

    protected constructor(
        protected readonly library: MemoryDeviceLibrary,
        private readonly kind: HandleKind,
    ) {
        library.ledger.acquire(kind);
    }

    protected abstract label(): string;

    public release(): void {
        if (this.released) {
            throw new Error(`double release of ${this.kind} ${this.label()}`);
        }
        this.released = true;
        this.library.ledger.release(this.kind);
    }
}

class MemoryDevice extends MemoryHandle implements DeviceHandle {
    public readonly path: string;

    constructor(library: MemoryDeviceLibrary, private readonly state: DeviceState) {
        super(library, 'device');
        this.path = state.path;
    }

    protected label(): string {
        return this.state.path;
    }

    public name_get(): string {
        return this.state.name;
    }

    public capability_has(capability: DeviceCapability): boolean {
        return this.state.capabilities.has(capability);
    }

    public buttonCount_get(): number {
        return this.state.buttonCount;
    }

    public profileCount_get(): number {
        return this.state.profiles.length;
    }

    public profile_get(index: number): ProfileHandle | null {
        if (!Number.isInteger(index) || index < 0 || index >= this.state.profiles.length) return null;
        return new MemoryProfile(this.library, this.state, index);
    }
}

class MemoryProfile extends MemoryHandle implements ProfileHandle {
    private readonly profile: ProfileState;

    constructor(library: MemoryDeviceLibrary, private readonly device: DeviceState, public readonly index: number) {
        super(library, 'profile');
        this.profile = device.profiles[index];
    }

    protected label(): string {
        return `${this.device.path}#${this.index}`;
    }

    public isActive(): boolean {
        return this.profile.active;
    }

    public isDefault(): boolean {
        return this.profile.isDefault;
    }

    public active_set(): OpResult {
        if (this.device.faults.has('profile-activate')) {
            return { ok: false, error: 'device rejected the profile switch' };
        }
        for (const profile of this.device.profiles) {
            profile.active = profile === this.profile;
        }
        this.library.traffic(`${this.device.path}: profile ${this.index} <- active`);
        return OK;
    }

    public resolutionCount_get(): number {
        return this.profile.resolutions.length;
    }

    public resolution_get(index: number): ResolutionHandle | null {
        if (!Number.isInteger(index) || index < 0 || index >= this.profile.resolutions.length) return null;
        return new MemoryResolution(this.library, this.device, this.profile, this.index, index);
    }

    public button_get(index: number): ButtonHandle | null {
        if (!Number.isInteger(index) || index < 0 || index >= this.profile.buttons.length) return null;
        return new MemoryButton(this.library, this.device, this.profile.buttons[index], this.index, index);
    }
}

class MemoryResolution extends MemoryHandle implements ResolutionHandle {
    private readonly resolution: ResolutionState;

    constructor(
        library: MemoryDeviceLibrary,
        private readonly device: DeviceState,
        private readonly profile: ProfileState,
        private readonly profileIndex: number,
        public readonly index: number,
    ) {
        super(library, 'resolution');
        this.resolution = profile.resolutions[index];
    }

    protected label(): string {
        return `${this.device.path}#${this.profileIndex}.${this.index}`;
    }

    public isActive(): boolean {
        return this.resolution.active;
    }

    public isDefault(): boolean {
        return this.resolution.isDefault;
    }

    public capability_has(capability: ResolutionCapability): boolean {
        return capability === 'separate-xy-resolution' && this.resolution.separateXY;
    }

    public dpi_get(): number {
        return this.resolution.dpiX;
    }

    public dpiX_get(): number {
        return this.resolution.dpiX;
    }

    public dpiY_get(): number {
        return this.resolution.dpiY;
    }

    public dpi_set(dpi: number): OpResult {
        if (this.device.faults.has('resolution-write')) {
            return { ok: false, error: 'device rejected the resolution write' };
        }
        if (!Number.isInteger(dpi) || dpi < 0) {
            return { ok: false, error: `invalid dpi ${dpi}` };
        }
        this.resolution.dpiX = dpi;
        this.resolution.dpiY = dpi;
        this.library.traffic(`${this.label()}: dpi <- ${dpi}`);
        return OK;
    }

    public reportRate_get(): number {
        return this.resolution.rate;
    }

    public reportRate_set(hz: number): OpResult {
        if (this.device.faults.has('resolution-write')) {
            return { ok: false, error: 'device rejected the resolution write' };
        }
        if (!Number.isInteger(hz) || hz <= 0) {
            return { ok: false, error: `invalid report rate ${hz}` };
        }
        this.resolution.rate = hz;
        this.library.traffic(`${this.label()}: rate <- ${hz}`);
        return OK;
    }

    public active_set(): OpResult {
        if (this.device.faults.has('resolution-write')) {
            return { ok: false, error: 'device rejected the resolution write' };
        }
        for (const resolution of this.profile.resolutions) {
            resolution.active = resolution === this.resolution;
        }
        this.library.traffic(`${this.label()}: active`);
        return OK;
    }
}

class MemoryButton extends MemoryHandle implements ButtonHandle {
    constructor(
        library: MemoryDeviceLibrary,
        private readonly device: DeviceState,
        private readonly button: ButtonState,
        private readonly profileIndex: number,
        public readonly index: number,
    ) {
        super(library, 'button');
    }

    protected label(): string {
        return `${this.device.path}#${this.profileIndex}/${this.index}`;
    }

    public type_get(): ButtonType {
        return this.button.type;
    }

    public action_get(): ButtonActionState {
        return this.button.action;
    }

    public button_set(target: number): OpResult {
        const blocked: OpResult | null = this.write_check();
        if (blocked) return blocked;
        if (!Number.isInteger(target) || target < 1 || target > this.device.buttonCount) {
            return { ok: false, error: `button ${target} does not exist on this device` };
        }
        return this.action_store({ type: 'button', button: target });
    }

    public key_set(keyCode: number, modifiers: readonly number[]): OpResult {
        const blocked: OpResult | null = this.write_check();
        if (blocked) return blocked;
        if (!Number.isInteger(keyCode) || keyCode <= 0) {
            return { ok: false, error: `invalid key code ${keyCode}` };
        }
        return this.action_store({ type: 'key', keyCode, modifiers: [...modifiers] });
    }

    public special_set(special: SpecialAction): OpResult {
        const blocked: OpResult | null = this.write_check();
        if (blocked) return blocked;
        return this.action_store({ type: 'special', special });
    }

    public macro_set(name: string): OpResult {
        const blocked: OpResult | null = this.write_check();
        if (blocked) return blocked;
        this.button.pending = {
            name,
            events: Array.from({ length: MACRO_CAPACITY }, (): MacroEvent => ({ type: 'none', keyCode: 0 })),
        };
        return OK;
    }

    public macroEvent_set(index: number, type: MacroEventType, keyCode: number): OpResult {
        const pending: PendingMacro | null = this.button.pending;
        if (!pending) {
            return { ok: false, error: 'no macro in progress' };
        }
        if (!Number.isInteger(index) || index < 0 || index >= MACRO_CAPACITY) {
            return { ok: false, error: `macro event ${index} out of range` };
        }
        pending.events[index] = { type, keyCode };
        this.library.traffic(`${this.label()}: macro[${index}] <- ${type} ${keyCode}`);
        return OK;
    }

    public macro_write(): OpResult {
        const blocked: OpResult | null = this.write_check();
        if (blocked) return blocked;
        const pending: PendingMacro | null = this.button.pending;
        if (!pending) {
            return { ok: false, error: 'no macro in progress' };
        }
        const end: number = pending.events.findIndex(e => e.type === 'none');
        const events: MacroEvent[] = end === -1 ? pending.events : pending.events.slice(0, end);
        this.button.pending = null;
        return this.action_store({ type: 'macro', name: pending.name, events });
    }

    public disable(): OpResult {
        const blocked: OpResult | null = this.write_check();
        if (blocked) return blocked;
        return this.action_store({ type: 'none' });
    }

    private write_check(): OpResult | null {
        if (this.device.faults.has('button-write')) {
            return { ok: false, error: 'device rejected the button write' };
        }
        return null;
    }

    private action_store(action: ButtonActionState): OpResult {
        this.button.action = action;
        this.library.traffic(`${this.label()}: action <- ${action.type}`);
        return OK;
    }
}
