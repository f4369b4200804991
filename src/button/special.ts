/**
 * @file Special Actions
 *
 * Fixed vocabulary of non-keycode device functions a button can trigger.
 *
 * @module button
 */

export const SPECIAL_ACTIONS = [
    'doubleclick',
    'wheel-left',
    'wheel-right',
    'wheel-up',
    'wheel-down',
    'ratchet-mode-switch',
    'resolution-cycle-up',
    'resolution-cycle-down',
    'resolution-up',
    'resolution-down',
    'resolution-alternate',
    'resolution-default',
    'profile-cycle-up',
    'profile-cycle-down',
    'profile-up',
    'profile-down',
    'second-mode',
    'battery-level',
] as const;

export type SpecialAction = typeof SPECIAL_ACTIONS[number];

/**
 * Match a name against the special-action vocabulary.
 *
 * @returns The matching action, or null for an unknown name.
 */
export function specialAction_parse(name: string): SpecialAction | null {
    for (const action of SPECIAL_ACTIONS) {
        if (action === name) return action;
    }
    return null;
}
