/**
 * @file CLI Runner
 *
 * One invocation of the tool: parse global options, build the logger and
 * device library, dispatch the command line and release every handle the
 * invocation acquired. All process I/O goes through `CliDeps`, so tests run
 * the whole path in process.
 *
 * @module cli
 */

import fs from 'fs';
import { COMMAND_TREE } from '../command/commands/index.js';
import { errorMessage_get } from '../command/commands/_shared.js';
import { command_dispatch } from '../command/Dispatcher.js';
import { ResolvedContext } from '../command/ResolvedContext.js';
import { usageText_render } from '../command/usage.js';
import { ExitCode, type CommandEnv, type OutputSink } from '../command/types.js';
import { SettingsService, type Environment, type Settings } from '../config/settings.js';
import { library_load } from '../device/database.js';
import type { DeviceLibrary } from '../device/types.js';
import { Logger, type LogSink } from '../log/Logger.js';
import { globalOptions_parse, type OptionsParse } from './options.js';

export interface CliDeps {
    env: Environment;
    /** Command output (stdout). */
    out: OutputSink;
    /** Diagnostics (stderr). */
    err: LogSink;
    /** Color when the environment does not decide. */
    colorDefault?: boolean;
    /** Defaults to loading the configured device database. */
    library_create?: (settings: Settings, log: Logger) => DeviceLibrary;
    /** Defaults to reading the directory from disk. */
    deviceNodes_list?: (dir: string) => string[];
}

function deviceNodes_read(dir: string): string[] {
    return fs.readdirSync(dir);
}

/**
 * Run one command line.
 *
 * @param argv - Arguments after the program name.
 * @returns The process exit code.
 */
export function cli_run(argv: readonly string[], deps: CliDeps): ExitCode {
    const settings: SettingsService = new SettingsService(deps.env, deps.colorDefault ?? false);
    const log: Logger = new Logger({ color: settings.color_resolve(), sink: deps.err });
    const usage = (): void => deps.out(usageText_render(COMMAND_TREE));

    const parsed: OptionsParse = globalOptions_parse(argv);
    if (parsed.kind === 'help') {
        usage();
        return ExitCode.Success;
    }
    if (parsed.kind === 'invalid') {
        log.error(`Unknown option '${parsed.option}'`);
        usage();
        return ExitCode.Usage;
    }
    log.level_set(parsed.verbosity);

    const context: ResolvedContext = new ResolvedContext();
    let rc: ExitCode = ExitCode.Device;
    try {
        try {
            const snapshot: Settings = settings.snapshot();
            const library: DeviceLibrary = deps.library_create
                ? deps.library_create(snapshot, log)
                : library_load(snapshot.deviceDb, log);
            library.logPriority_set(parsed.verbosity);

            const listNodes: (dir: string) => string[] = deps.deviceNodes_list ?? deviceNodes_read;
            const env: CommandEnv = {
                library,
                context,
                out: deps.out,
                log,
                deviceNodes_list: (): string[] => listNodes(snapshot.inputDir),
                inputDir: snapshot.inputDir,
            };
            rc = command_dispatch(COMMAND_TREE, env, parsed.tokens);
        } finally {
            context.release();
        }
    } catch (error: unknown) {
        log.error(errorMessage_get(error));
        rc = ExitCode.Device;
    }

    if (rc === ExitCode.Usage) usage();
    return rc;
}
