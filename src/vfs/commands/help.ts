/**
 * `help` builtin implementation.
 *
 * Without an operand, lists every command with its summary. With a
 * command name, prints that command's usage and flags.
 */

import type { BuiltinCommand, CommandSpec, FlagSpec } from './types.js';
import { unknownCommand_error } from '../errors.js';
import { usage_render } from '../invocation.js';
import { result_ok } from './_shared.js';

export const command: BuiltinCommand = {
    spec: {
        name: 'help',
        summary: 'describe the available commands',
        flags: [],
        args: [{ name: 'COMMAND', required: false }]
    },
    create: ({ specs_list }) => async (invocation) => {
        const specs: CommandSpec[] = specs_list();
        const topic: string | undefined = invocation.args[0];
        if (topic === undefined) {
            const width: number = Math.max(...specs.map((spec: CommandSpec): number => spec.name.length));
            return result_ok(
                specs.map((spec: CommandSpec): string => `${spec.name.padEnd(width)}  ${spec.summary}`).join('\n')
            );
        }

        const spec: CommandSpec | undefined = specs.find((candidate: CommandSpec): boolean => candidate.name === topic);
        if (!spec) {
            throw unknownCommand_error(topic);
        }
        return result_ok(commandHelp_render(spec));
    }
};

/**
 * Usage line, summary, and one line per flag.
 */
export function commandHelp_render(spec: CommandSpec): string {
    const lines: string[] = [`usage: ${usage_render(spec)}`, spec.summary];
    for (const flag of spec.flags) {
        const names: string = flag.long ? `${flag.id}, ${flag.long}` : flag.id;
        lines.push(`  ${flagLabel_render(flag, names)}  ${flag.description}`);
    }
    return lines.join('\n');
}

function flagLabel_render(flag: FlagSpec, names: string): string {
    return flag.takesValue ? `${names} VALUE` : names;
}
