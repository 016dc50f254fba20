/**
 * `tree` builtin implementation.
 *
 * Directories first, then files, each group sorted by name.
 */

import type { VfsDirectory } from '../nodes.js';
import type { BuiltinCommand } from './types.js';
import { result_ok } from './_shared.js';

export const command: BuiltinCommand = {
    spec: {
        name: 'tree',
        summary: 'print a directory subtree',
        flags: [],
        args: [{ name: 'PATH', required: false }]
    },
    create: () => async (invocation, shell) => {
        const dir: VfsDirectory = shell.tree.dir_change(invocation.args[0] ?? '.', shell.cwd_get());
        return result_ok(shell.tree.tree_render(dir));
    }
};
