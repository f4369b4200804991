/**
 * `change-button` command implementation.
 *
 * Usage: `change-button X <button|key|special|macro> <argument>`. Remaps a
 * button of the active profile, then re-commits the profile.
 */

import { action_encode, type EncodeResult } from '../../button/ActionEncoder.js';
import type { OpResult, ProfileHandle } from '../../device/types.js';
import { node_create } from '../node.js';
import { integer_tryParse } from '../tokens.js';
import { ExitCode, type CommandEnv, type CommandNode } from '../types.js';
import { buttonAction_assign, context_missing } from './_shared.js';

function changeButton_run(_node: CommandNode, env: CommandEnv, tokens: readonly string[]): ExitCode {
    if (tokens.length !== 3) {
        env.log.error('change-button needs a button number, an action type and an argument');
        return ExitCode.Usage;
    }
    const [indexToken, kind, argument] = tokens;

    const buttonIndex: number | null = integer_tryParse(indexToken);
    if (buttonIndex === null) {
        env.log.error(`Invalid button number '${indexToken}'`);
        return ExitCode.Usage;
    }

    const encoded: EncodeResult = action_encode(kind, argument);
    if (!encoded.ok) {
        env.log.error(encoded.error);
        return ExitCode.Usage;
    }

    const assigned: ExitCode = buttonAction_assign(env, buttonIndex, encoded.action, `${kind} ${argument}`);
    if (assigned !== ExitCode.Success) return assigned;

    const profile: ProfileHandle | null = env.context.profile;
    if (!profile) return context_missing(env, 'profile');
    const committed: OpResult = profile.active_set();
    if (!committed.ok) {
        env.log.error(`Unable to apply the current profile: ${committed.error}`);
        return ExitCode.Device;
    }
    return ExitCode.Success;
}

export const command: CommandNode = node_create({
    name: 'change-button',
    argsHint: 'X <button|key|special|macro> <number|KEY_FOO|special|macro name:KEY_FOO,KEY_BAR,...>',
    help: 'Change the button X to the given action',
    needs: ['profile'],
    handler: changeButton_run,
});
