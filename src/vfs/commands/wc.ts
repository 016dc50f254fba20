/**
 * `wc` builtin implementation.
 *
 * Supported flags:
 * - `-l`, `--lines`: newline count.
 * - `-w`, `--words`: word count.
 * - `-m`, `--chars`: character count.
 * - `-L`, `--max-line-length`: length of the longest line.
 *
 * Selected counts print in the order above, followed by the operand. With
 * no flags all four are printed. `-l` counts `\n` characters, so a final
 * line without a trailing newline is not counted.
 */

import type { VfsFile } from '../nodes.js';
import type { BuiltinCommand } from './types.js';
import { flag_isSet, result_ok } from './_shared.js';

export interface WcCounts {
    lines: number;
    words: number;
    chars: number;
    maxLineLength: number;
}

const WC_FIELDS: ReadonlyArray<{ flag: string; field: keyof WcCounts }> = [
    { flag: '-l', field: 'lines' },
    { flag: '-w', field: 'words' },
    { flag: '-m', field: 'chars' },
    { flag: '-L', field: 'maxLineLength' }
];

export const command: BuiltinCommand = {
    spec: {
        name: 'wc',
        summary: 'print newline, word and character counts',
        flags: [
            { id: '-l', long: '--lines', takesValue: false, description: 'print the newline count' },
            { id: '-w', long: '--words', takesValue: false, description: 'print the word count' },
            { id: '-m', long: '--chars', takesValue: false, description: 'print the character count' },
            { id: '-L', long: '--max-line-length', takesValue: false, description: 'print the longest line length' }
        ],
        args: [{ name: 'FILE', required: true }]
    },
    create: () => async (invocation, shell) => {
        const operand: string = invocation.args[0];
        const file: VfsFile = shell.tree.file_resolve(operand, shell.cwd_get());
        const counts: WcCounts = wcCounts_compute(file.text_read());

        const selected = WC_FIELDS.filter(({ flag }): boolean => flag_isSet(invocation, flag));
        const fields = selected.length > 0 ? selected : WC_FIELDS;
        const values: string[] = fields.map(({ field }): string => String(counts[field]));
        return result_ok(`${values.join(' ')} ${operand}`);
    }
};

/**
 * Compute all four counts for a text.
 */
export function wcCounts_compute(text: string): WcCounts {
    const lines: string[] = text.split('\n');
    return {
        lines: lines.length - 1,
        words: text.split(/\s+/).filter(Boolean).length,
        chars: Array.from(text).length,
        maxLineLength: lines.reduce((max: number, line: string): number => Math.max(max, Array.from(line).length), 0)
    };
}
