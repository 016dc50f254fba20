/**
 * `touch` builtin implementation.
 *
 * Creates an empty file; an existing node at the path is left as it is.
 */

import type { BuiltinCommand } from './types.js';
import { result_ok } from './_shared.js';

export const command: BuiltinCommand = {
    spec: {
        name: 'touch',
        summary: 'create an empty file',
        flags: [],
        args: [{ name: 'PATH', required: true }]
    },
    create: () => async (invocation, shell) => {
        shell.tree.file_create(invocation.args[0], shell.cwd_get());
        return result_ok();
    }
};
