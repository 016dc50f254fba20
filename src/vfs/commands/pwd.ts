/**
 * `pwd` builtin implementation.
 */

import type { BuiltinCommand } from './types.js';
import { result_ok } from './_shared.js';

export const command: BuiltinCommand = {
    spec: {
        name: 'pwd',
        summary: 'print the working directory',
        flags: [],
        args: []
    },
    create: () => async (_invocation, shell) => result_ok(shell.cwd_get().path_absolute())
};
