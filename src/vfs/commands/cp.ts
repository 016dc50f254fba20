/**
 * `cp` builtin implementation.
 *
 * Deep-copies SRC into DEST when DEST is an existing directory, otherwise
 * as DEST. Directories are copied with their whole subtree. The root has
 * no name to copy under, so it can only be copied to a new DEST.
 */

import type { VfsNode } from '../nodes.js';
import type { BuiltinCommand } from './types.js';
import { destination_resolve } from './mv.js';
import type { Destination } from './mv.js';
import { invalidOperation_error } from '../errors.js';
import { result_ok } from './_shared.js';

export const command: BuiltinCommand = {
    spec: {
        name: 'cp',
        summary: 'copy a file or directory',
        flags: [],
        args: [
            { name: 'SRC', required: true },
            { name: 'DEST', required: true }
        ]
    },
    create: () => async (invocation, shell) => {
        const [src, dest] = invocation.args;
        const node: VfsNode = shell.tree.node_resolve(src, shell.cwd_get());
        const existing: VfsNode | null = shell.tree.node_find(dest, shell.cwd_get());
        if (!node.parent && existing?.isDirectory()) {
            throw invalidOperation_error(`cannot copy '/' into existing directory '${existing.path_absolute()}'`);
        }
        const target: Destination = destination_resolve(shell.tree, node, dest, shell.cwd_get());
        shell.tree.node_clone(node, target.parent, target.name);
        return result_ok();
    }
};
