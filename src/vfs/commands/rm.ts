/**
 * `rm` builtin implementation.
 *
 * Removes files and directories (directories with their whole subtree).
 * Every operand is resolved before anything is detached, so a missing
 * operand leaves the tree untouched.
 */

import type { VfsNode } from '../nodes.js';
import type { BuiltinCommand } from './types.js';
import { invalidOperation_error } from '../errors.js';
import { result_ok } from './_shared.js';

export const command: BuiltinCommand = {
    spec: {
        name: 'rm',
        summary: 'remove files and directories',
        flags: [],
        args: [{ name: 'PATH', required: true, variadic: true }]
    },
    create: () => async (invocation, shell) => {
        const targets: VfsNode[] = invocation.args.map(
            (path: string): VfsNode => shell.tree.node_resolve(path, shell.cwd_get())
        );
        if (targets.includes(shell.tree.root)) {
            throw invalidOperation_error("cannot remove root directory '/'");
        }
        for (const node of targets) {
            // Already gone with an earlier operand's subtree, or named twice.
            if (!shell.tree.node_isAttached(node)) continue;
            shell.tree.node_detach(node);
        }
        return result_ok();
    }
};
