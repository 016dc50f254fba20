/**
 * `export` builtin implementation.
 *
 * Assignment syntax:
 * - `export KEY=VALUE [KEY2=VALUE2 ...]`
 *
 * All assignments are validated before any is applied.
 */

import type { BuiltinCommand } from './types.js';
import { invalidArgument_error } from '../errors.js';
import { result_ok } from './_shared.js';

interface Assignment {
    key: string;
    value: string;
}

const ASSIGNMENT_PATTERN: RegExp = /^([A-Za-z_][A-Za-z0-9_]*)=([\s\S]*)$/;

export const command: BuiltinCommand = {
    spec: {
        name: 'export',
        summary: 'set environment variables',
        flags: [],
        args: [{ name: 'KEY=VALUE', required: true, variadic: true }]
    },
    create: () => async (invocation, shell) => {
        const assignments: Assignment[] = invocation.args.map(assignment_parse);
        for (const { key, value } of assignments) {
            shell.env_set(key, value);
        }
        return result_ok();
    }
};

function assignment_parse(arg: string): Assignment {
    const match: RegExpMatchArray | null = arg.match(ASSIGNMENT_PATTERN);
    if (!match) {
        throw invalidArgument_error(`'${arg}': not a valid identifier`);
    }
    return { key: match[1], value: match[2] };
}
