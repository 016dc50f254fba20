/**
 * `head` builtin implementation.
 *
 * Supported flags:
 * - `-n N`, `--lines N`: number of leading lines to print (default 5).
 *
 * Lines are split on `\n`. A count of zero or less prints nothing; a count
 * at or beyond the number of lines prints the whole file.
 */

import type { VfsFile } from '../nodes.js';
import type { BuiltinCommand } from './types.js';
import { invalidArgument_error } from '../errors.js';
import { flagValue_get, result_ok } from './_shared.js';

export const HEAD_DEFAULT_LINES: number = 5;

export const command: BuiltinCommand = {
    spec: {
        name: 'head',
        summary: 'print the first lines of a file',
        flags: [{ id: '-n', long: '--lines', takesValue: true, description: 'number of lines to print' }],
        args: [{ name: 'FILE', required: true }]
    },
    create: () => async (invocation, shell) => {
        const rawCount: string | null = flagValue_get(invocation, '-n');
        const count: number = rawCount === null ? HEAD_DEFAULT_LINES : lineCount_parse(rawCount);
        const file: VfsFile = shell.tree.file_resolve(invocation.args[0], shell.cwd_get());
        return result_ok(lines_head(file.text_read(), count));
    }
};

/**
 * First `count` lines of `text`, joined back with `\n`.
 */
export function lines_head(text: string, count: number): string {
    if (count <= 0 || text === '') return '';
    const lines: string[] = text.split('\n');
    if (count >= lines.length) return text;
    return lines.slice(0, count).join('\n');
}

function lineCount_parse(raw: string): number {
    if (!/^[+-]?\d+$/.test(raw.trim())) {
        throw invalidArgument_error(`invalid number of lines: '${raw}'`);
    }
    return parseInt(raw, 10);
}
