/**
 * `cat` builtin implementation.
 *
 * Prints the text of one file.
 */

import type { VfsFile } from '../nodes.js';
import type { BuiltinCommand } from './types.js';
import { result_ok } from './_shared.js';

export const command: BuiltinCommand = {
    spec: {
        name: 'cat',
        summary: 'print file contents',
        flags: [],
        args: [{ name: 'FILE', required: true }]
    },
    create: () => async (invocation, shell) => {
        const file: VfsFile = shell.tree.file_resolve(invocation.args[0], shell.cwd_get());
        return result_ok(file.text_read());
    }
};
