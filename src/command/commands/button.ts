/**
 * `button N get` and `button N set <kind> <argument>`.
 */

import { action_describe, action_encode, type EncodeResult } from '../../button/ActionEncoder.js';
import type { ButtonHandle } from '../../device/types.js';
import { indexedNode_handler, type IndexSelector } from '../Dispatcher.js';
import { node_create } from '../node.js';
import { ExitCode, type CommandEnv, type CommandNode } from '../types.js';
import { buttonAction_assign, context_missing } from './_shared.js';

const buttonSelector: IndexSelector = {
    explicit_select(index: number, env: CommandEnv): ExitCode {
        const { device } = env.context;
        if (!device) return context_missing(env, 'device');
        if (index < 0 || index >= device.buttonCount_get()) {
            env.log.error(`Invalid button number ${index}`);
            return ExitCode.Unsupported;
        }
        env.context.selectedButtonIndex = index;
        return ExitCode.Success;
    },

    // Buttons have no active member; the subcommand reports the missing index.
    active_select(): ExitCode {
        return ExitCode.Success;
    },
};

function selectedIndex_get(env: CommandEnv, node: CommandNode): number | null {
    const index: number | null = env.context.selectedButtonIndex;
    if (index === null) {
        env.log.error(`'button ${node.name}' needs a button number`);
    }
    return index;
}

function buttonGet_run(node: CommandNode, env: CommandEnv, tokens: readonly string[]): ExitCode {
    const index: number | null = selectedIndex_get(env, node);
    if (index === null) return ExitCode.Usage;
    if (tokens.length !== 0) {
        env.log.error(`button get: unexpected argument '${tokens[0]}'`);
        return ExitCode.Usage;
    }

    const { profile } = env.context;
    if (!profile) return context_missing(env, 'profile');
    const button: ButtonHandle | null = profile.button_get(index);
    if (!button) {
        env.log.error(`Invalid button number ${index}`);
        return ExitCode.Unsupported;
    }
    try {
        env.out(`Button ${index} is mapped to '${action_describe(button.action_get())}'`);
        return ExitCode.Success;
    } finally {
        button.release();
    }
}

function buttonSet_run(node: CommandNode, env: CommandEnv, tokens: readonly string[]): ExitCode {
    const index: number | null = selectedIndex_get(env, node);
    if (index === null) return ExitCode.Usage;
    if (tokens.length !== 2) {
        env.log.error('button set needs an action type and an argument');
        return ExitCode.Usage;
    }
    const [kind, argument] = tokens;

    const encoded: EncodeResult = action_encode(kind, argument);
    if (!encoded.ok) {
        env.log.error(encoded.error);
        return ExitCode.Usage;
    }
    return buttonAction_assign(env, index, encoded.action, `${kind} ${argument}`);
}

export const command: CommandNode = node_create({
    name: 'button',
    argsHint: 'N',
    help: 'Modify a button',
    needs: ['profile'],
    handler: indexedNode_handler(buttonSelector),
    children: [
        node_create({
            name: 'get',
            help: 'Show the action mapped to the button',
            needs: ['profile'],
            handler: buttonGet_run,
        }),
        node_create({
            name: 'set',
            argsHint: '<button|key|special|macro> <argument>',
            help: 'Map the button to the given action',
            needs: ['profile'],
            handler: buttonSet_run,
        }),
    ],
});
