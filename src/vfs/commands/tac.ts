/**
 * `tac` builtin implementation.
 *
 * Prints the lines of a file in reverse order. A trailing newline
 * terminates the last line rather than opening an empty one, so it stays
 * at the end of the output.
 */

import type { VfsFile } from '../nodes.js';
import type { BuiltinCommand } from './types.js';
import { result_ok } from './_shared.js';

export const command: BuiltinCommand = {
    spec: {
        name: 'tac',
        summary: 'print a file with its lines reversed',
        flags: [],
        args: [{ name: 'FILE', required: true }]
    },
    create: () => async (invocation, shell) => {
        const file: VfsFile = shell.tree.file_resolve(invocation.args[0], shell.cwd_get());
        return result_ok(lines_reverse(file.text_read()));
    }
};

export function lines_reverse(text: string): string {
    if (text === '') return '';
    const terminated: boolean = text.endsWith('\n');
    const body: string = terminated ? text.slice(0, -1) : text;
    const reversed: string = body.split('\n').reverse().join('\n');
    return terminated ? `${reversed}\n` : reversed;
}
