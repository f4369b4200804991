/**
 * @file Command Tree
 *
 * Root of the static command tree. Children are listed in help order.
 *
 * @module command
 */

import { node_create } from '../node.js';
import type { CommandNode } from '../types.js';
import { command as button } from './button.js';
import { command as changeButton } from './changeButton.js';
import { command as dpi } from './dpi.js';
import { command as info } from './info.js';
import { command as list } from './list.js';
import { command as profile } from './profile.js';
import { command as resolution } from './resolution.js';
import { command as switchEtekcity } from './switchEtekcity.js';

export const COMMAND_TREE: CommandNode = node_create({
    name: 'mousectl',
    children: [info, list, changeButton, switchEtekcity, button, resolution, profile, dpi],
});
