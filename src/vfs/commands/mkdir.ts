/**
 * `mkdir` builtin implementation.
 *
 * Supported flags:
 * - `-p`, `--parents`: create missing parents; an existing directory is not an error.
 */

import type { BuiltinCommand } from './types.js';
import { flag_isSet, result_ok } from './_shared.js';

export const command: BuiltinCommand = {
    spec: {
        name: 'mkdir',
        summary: 'create a directory',
        flags: [{ id: '-p', long: '--parents', takesValue: false, description: 'create missing parent directories' }],
        args: [{ name: 'PATH', required: true }]
    },
    create: () => async (invocation, shell) => {
        shell.tree.dir_create(invocation.args[0], shell.cwd_get(), flag_isSet(invocation, '-p'));
        return result_ok();
    }
};
