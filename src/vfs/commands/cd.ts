/**
 * `cd` builtin implementation.
 *
 * With no operand the working directory becomes the root.
 */

import type { BuiltinCommand } from './types.js';
import { result_ok } from './_shared.js';

export const command: BuiltinCommand = {
    spec: {
        name: 'cd',
        summary: 'change the working directory',
        flags: [],
        args: [{ name: 'PATH', required: false }]
    },
    create: () => async (invocation, shell) => {
        shell.cwd_set(invocation.args[0] ?? '/');
        return result_ok();
    }
};
