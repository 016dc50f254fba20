/**
 * `ls` builtin implementation.
 *
 * Lists the children of a directory (default: the working directory), one
 * name per line, in insertion order.
 */

import type { VfsNode } from '../nodes.js';
import type { BuiltinCommand } from './types.js';
import { notADirectory_error } from '../errors.js';
import { result_ok } from './_shared.js';

/**
 * Register the `ls` builtin handler.
 */
export const command: BuiltinCommand = {
    spec: {
        name: 'ls',
        summary: 'list directory contents',
        flags: [],
        args: [{ name: 'PATH', required: false }]
    },
    create: () => async (invocation, shell) => {
        const target: string = invocation.args[0] ?? '.';
        const node: VfsNode = shell.tree.node_resolve(target, shell.cwd_get());
        if (!node.isDirectory()) {
            throw notADirectory_error(target);
        }
        const names: string[] = shell.tree.dir_list(node).map((child: VfsNode): string => child.name);
        return result_ok(names.join('\n'));
    }
};
