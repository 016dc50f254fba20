/**
 * `mv` builtin implementation.
 *
 * `mv SRC DEST` moves SRC into DEST when DEST is an existing directory;
 * otherwise DEST names the new location (parent must exist).
 */

import type { FileSystemTree } from '../FileSystemTree.js';
import type { VfsDirectory, VfsNode } from '../nodes.js';
import type { BuiltinCommand } from './types.js';
import { nameCollision_error } from '../errors.js';
import { result_ok } from './_shared.js';

/**
 * Where a `SRC DEST` pair lands: a parent directory and the final name.
 */
export interface Destination {
    parent: VfsDirectory;
    name: string;
}

export const command: BuiltinCommand = {
    spec: {
        name: 'mv',
        summary: 'move or rename a file or directory',
        flags: [],
        args: [
            { name: 'SRC', required: true },
            { name: 'DEST', required: true }
        ]
    },
    create: () => async (invocation, shell) => {
        const [src, dest] = invocation.args;
        const node: VfsNode = shell.tree.node_resolve(src, shell.cwd_get());
        const target: Destination = destination_resolve(shell.tree, node, dest, shell.cwd_get());
        shell.tree.node_move(node, target.parent, target.name);
        return result_ok();
    }
};

/**
 * Resolve DEST for `mv` and `cp`.
 *
 * @throws VfsError(NameCollision) if DEST names an existing file.
 */
export function destination_resolve(
    tree: FileSystemTree,
    source: VfsNode,
    dest: string,
    cwd: VfsDirectory
): Destination {
    const existing: VfsNode | null = tree.node_find(dest, cwd);
    if (existing?.isDirectory()) {
        return { parent: existing, name: source.name };
    }
    if (existing) {
        throw nameCollision_error(existing.name, existing.parent?.path_absolute() ?? '/');
    }
    return tree.target_resolve(dest, cwd);
}
