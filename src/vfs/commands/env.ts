/**
 * `env` builtin implementation.
 *
 * Prints the session environment as `KEY=VALUE` lines sorted by key.
 */

import type { BuiltinCommand } from './types.js';
import { result_ok } from './_shared.js';

export const command: BuiltinCommand = {
    spec: {
        name: 'env',
        summary: 'print the environment',
        flags: [],
        args: []
    },
    create: () => async (_invocation, shell) => {
        const lines: string[] = Object.entries(shell.env_snapshot())
            .sort(([a], [b]): number => (a < b ? -1 : a > b ? 1 : 0))
            .map(([key, value]: [string, string]): string => `${key}=${value}`);
        return result_ok(lines.join('\n'));
    }
};
