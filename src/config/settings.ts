/**
 * @file Runtime Settings Service
 *
 * Runtime settings for the command-line tool with deterministic
 * precedence (env > defaults).
 *
 * @module
 */

export interface Settings {
    /** YAML device database backing the device library. */
    deviceDb: string;
    /** Directory scanned by `list` for `event*` device nodes. */
    inputDir: string;
    /** Colorize diagnostic output. */
    color: boolean;
}

export type SettingsKey = keyof Settings;

export type Environment = Record<string, string | undefined>;

const ENV_KEYS: Record<SettingsKey, string> = {
    deviceDb: 'MOUSECTL_DEVICE_DB',
    inputDir: 'MOUSECTL_INPUT_DIR',
    color: 'MOUSECTL_COLOR',
};

export class SettingsService {
    private readonly defaults: Settings;

    /**
     * @param env - Environment to read from.
     * @param colorDefault - Color default when the env does not decide (usually: stderr is a TTY).
     */
    constructor(private readonly env: Environment = {}, colorDefault: boolean = false) {
        this.defaults = {
            deviceDb: '/etc/mousectl/devices.yaml',
            inputDir: '/dev/input',
            color: colorDefault,
        };
    }

    /**
     * Return effective settings.
     */
    public snapshot(): Settings {
        return {
            deviceDb: this.deviceDb_resolve(),
            inputDir: this.inputDir_resolve(),
            color: this.color_resolve(),
        };
    }

    public deviceDb_resolve(): string {
        return this.envString_resolve('deviceDb') ?? this.defaults.deviceDb;
    }

    public inputDir_resolve(): string {
        return this.envString_resolve('inputDir') ?? this.defaults.inputDir;
    }

    public color_resolve(): boolean {
        const envRaw: string | undefined = this.envString_resolve('color');
        const envFlag: boolean | null = envRaw === undefined ? null : this.flag_parse(envRaw);
        return envFlag ?? this.defaults.color;
    }

    private envString_resolve(key: SettingsKey): string | undefined {
        const envRaw: string | undefined = this.env[ENV_KEYS[key]];
        if (!envRaw || !envRaw.trim()) return undefined;
        return envRaw.trim();
    }

    private flag_parse(raw: string): boolean | null {
        const normalized: string = raw.trim().toLowerCase();
        if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
        if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
        return null;
    }
}
