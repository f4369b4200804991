/**
 * @file Command Node Construction
 *
 * @module command
 */

import type { CommandHandler, CommandNode, Prerequisite } from './types.js';

export interface CommandNodeInit {
    name: string;
    argsHint?: string;
    help?: string;
    needs?: readonly Prerequisite[];
    handler?: CommandHandler;
    children?: readonly CommandNode[];
}

/**
 * Build a frozen command node.
 *
 * A node needing `resolution` also needs `profile` and `device`; a node
 * needing `profile` also needs `device`. The implied prerequisites are
 * added here so the set always reflects the full dependency chain.
 */
export function node_create(init: CommandNodeInit): CommandNode {
    const needs: Set<Prerequisite> = new Set(init.needs ?? []);
    if (needs.has('resolution')) needs.add('profile');
    if (needs.has('profile')) needs.add('device');

    return Object.freeze({
        name: init.name,
        argsHint: init.argsHint ?? null,
        help: init.help ?? null,
        prerequisites: needs,
        handler: init.handler ?? null,
        children: Object.freeze([...(init.children ?? [])]),
    });
}
