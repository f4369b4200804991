/**
 * @file Usage Formatter
 *
 * Renders the command tree as dot-aligned help text:
 *
 *     mousectl info ........................ Show information about the device's capabilities
 *     mousectl profile <idx> active get .... Get the active profile number
 *
 * @module command
 */

import type { CommandNode } from './types.js';

const COLUMN_WIDTH = 40;
const MIN_DOTS = 4;

/**
 * Render the help lines for every descendant of `node`.
 *
 * @param node - Node whose children are listed.
 * @param prefix - Command path leading up to `node`.
 */
export function usage_render(node: CommandNode, prefix: string = ''): string[] {
    const lines: string[] = [];
    const childPrefix: string = `${prefix}${node.name}${node.argsHint ? ` ${node.argsHint}` : ''} `;

    for (const child of node.children) {
        const label: string = `${child.name}${child.argsHint ? ` ${child.argsHint}` : ''}`;
        if (child.help) {
            const dots: number = Math.max(MIN_DOTS, COLUMN_WIDTH - label.length - childPrefix.length);
            lines.push(`    ${childPrefix}${label} ${'.'.repeat(dots)} ${child.help}`);
        }
        lines.push(...usage_render(child, childPrefix));
    }

    return lines;
}

/**
 * Render the complete usage text for the program rooted at `root`.
 */
export function usageText_render(root: CommandNode): string {
    return [
        `Usage: ${root.name} [options] [command] /dev/input/eventX`,
        '/path/to/device ..... Open the given device only',
        '',
        'Commands:',
        ...usage_render(root),
        '',
        'Options:',
        '    --verbose[=raw] ....... Print debugging output, with protocol output if requested.',
        '    --help .......... Print this help.',
    ].join('\n');
}
