/**
 * @file Command Dispatcher
 *
 * Walks the command tree left to right over the token stream. At each
 * level the next token names a child; the child's prerequisites are
 * resolved, the token is consumed and the child runs with what remains.
 *
 * Nodes without a handler route to the child named by the next token.
 * Nodes that accept a positional index (`profile N`, `resolution N`,
 * `button N`) are built with `indexedNode_handler`.
 *
 * @module command
 */

import { context_ensure, type EnsureResult } from './ContextResolver.js';
import { integer_tryParse } from './tokens.js';
import { ExitCode, type CommandEnv, type CommandHandler, type CommandNode } from './types.js';

/**
 * Dispatch a full command line (global options already stripped).
 *
 * @returns The exit code of the command path.
 */
export function command_dispatch(root: CommandNode, env: CommandEnv, tokens: readonly string[]): ExitCode {
    if (tokens.length < 1) {
        env.log.error('Missing command');
        return ExitCode.Usage;
    }
    return subcommand_run(tokens[0], root, env, tokens);
}

/**
 * Run the child of `parent` named `command`.
 *
 * @param tokens - Visible tokens; `tokens[0]` is `command`.
 */
export function subcommand_run(
    command: string,
    parent: CommandNode,
    env: CommandEnv,
    tokens: readonly string[],
): ExitCode {
    const child: CommandNode | undefined = parent.children.find(
        (candidate: CommandNode): boolean => candidate.name === command,
    );
    if (!child) {
        env.log.error(`Invalid subcommand '${command}'`);
        return ExitCode.Usage;
    }
    env.log.debug(`dispatch ${parent.name} -> ${child.name}`);

    const ensured: EnsureResult = context_ensure(child.prerequisites, env, tokens);
    if (!ensured.ok) return ensured.exitCode;

    return node_invoke(child, env, ensured.tokens.slice(1));
}

/**
 * Invoke a node with the tokens that follow its name.
 */
export function node_invoke(node: CommandNode, env: CommandEnv, tokens: readonly string[]): ExitCode {
    return node.handler ? node.handler(node, env, tokens) : subcommand_route(node, env, tokens);
}

/**
 * Route to the child named by the next token.
 */
export function subcommand_route(node: CommandNode, env: CommandEnv, tokens: readonly string[]): ExitCode {
    if (tokens.length < 1) {
        env.log.error(`'${node.name}' needs a subcommand`);
        return ExitCode.Usage;
    }
    return subcommand_run(tokens[0], node, env, tokens);
}

/**
 * How an indexed node puts its item into the context.
 */
export interface IndexSelector {
    /** Resolve the item at `index`. Out of range must yield `Unsupported`. */
    explicit_select(index: number, env: CommandEnv): ExitCode;
    /** Resolve the item used when no index is given. */
    active_select(env: CommandEnv): ExitCode;
}

/**
 * Build the handler of a node that takes an optional positional index.
 *
 * A next token that is entirely an integer selects that item explicitly
 * and is consumed; any other token leaves the active item selected and
 * names the subcommand.
 */
export function indexedNode_handler(selector: IndexSelector): CommandHandler {
    return (node: CommandNode, env: CommandEnv, tokens: readonly string[]): ExitCode => {
        if (tokens.length < 1) {
            env.log.error(`'${node.name}' needs a subcommand`);
            return ExitCode.Usage;
        }

        const index: number | null = integer_tryParse(tokens[0]);
        const selected: ExitCode = index !== null
            ? selector.explicit_select(index, env)
            : selector.active_select(env);
        if (selected !== ExitCode.Success) return selected;

        return subcommand_route(node, env, index !== null ? tokens.slice(1) : tokens);
    };
}
