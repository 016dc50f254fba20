/**
 * @file Command Line Tokenizer and Parser
 *
 * `line_tokenize` splits a raw line into words honoring quotes and
 * backslash escapes; `invocation_parse` binds those words to a command's
 * declared flags and positional slots.
 *
 * @module
 */

import type { ArgSpec, CommandSpec, FlagSpec } from './commands/types.js';
import type { FlagValue, Invocation } from './types.js';
import {
    invalidArgument_error,
    missingArgument_error,
    missingValue_error,
    unknownFlag_error
} from './errors.js';

type QuoteChar = '"' | "'";

/**
 * Split a command line into tokens.
 *
 * Whitespace separates tokens; single and double quotes group a token and
 * are removed (`""` yields an empty token); a backslash escapes the next
 * character except inside single quotes.
 *
 * @throws VfsError(InvalidArgument) on an unterminated quote.
 */
export function line_tokenize(line: string): string[] {
    const tokens: string[] = [];
    let current: string = '';
    let inToken: boolean = false;
    let quote: QuoteChar | null = null;

    for (let i = 0; i < line.length; i++) {
        const ch: string = line[i];

        if (quote) {
            if (ch === quote) {
                quote = null;
            } else if (ch === '\\' && quote === '"' && i + 1 < line.length) {
                current += line[++i];
            } else {
                current += ch;
            }
            continue;
        }

        if (ch === '"' || ch === "'") {
            quote = ch;
            inToken = true;
        } else if (ch === '\\') {
            current += i + 1 < line.length ? line[++i] : ch;
            inToken = true;
        } else if (/\s/.test(ch)) {
            if (inToken) {
                tokens.push(current);
                current = '';
                inToken = false;
            }
        } else {
            current += ch;
            inToken = true;
        }
    }

    if (quote) {
        throw invalidArgument_error(`unterminated ${quote === '"' ? 'double' : 'single'} quote`);
    }
    if (inToken) {
        tokens.push(current);
    }
    return tokens;
}

/**
 * Bind argument tokens to a command spec.
 *
 * @param spec - Declared interface of the command.
 * @param argv - Tokens after the command name.
 * @param raw - Original line, kept on the invocation.
 * @throws VfsError(UnknownFlag | MissingValue | MissingArgument | InvalidArgument)
 */
export function invocation_parse(spec: CommandSpec, argv: string[], raw: string = ''): Invocation {
    const flags: Map<string, FlagValue> = new Map();
    const args: string[] = [];
    let parseOptions: boolean = true;

    for (let i = 0; i < argv.length; i++) {
        const token: string = argv[i];

        if (parseOptions && token === '--') {
            parseOptions = false;
            continue;
        }
        if (!parseOptions || token === '-' || !token.startsWith('-')) {
            args.push(token);
            continue;
        }

        if (token.startsWith('--')) {
            const eq: number = token.indexOf('=');
            const name: string = eq === -1 ? token : token.slice(0, eq);
            const flag: FlagSpec = flag_find(spec, name);
            if (!flag.takesValue) {
                if (eq !== -1) {
                    throw invalidArgument_error(`option '${name}' doesn't allow an argument`);
                }
                flags.set(flag.id, true);
                continue;
            }
            if (eq !== -1) {
                flags.set(flag.id, token.slice(eq + 1));
                continue;
            }
            if (i + 1 >= argv.length) {
                throw missingValue_error(name);
            }
            flags.set(flag.id, argv[++i]);
            continue;
        }

        // Short flags: `-n 5`, `-n5`, or a cluster of switches such as `-lw`.
        const cluster: string = token.slice(1);
        for (let j = 0; j < cluster.length; j++) {
            const name: string = `-${cluster[j]}`;
            const flag: FlagSpec = flag_find(spec, name);
            if (!flag.takesValue) {
                flags.set(flag.id, true);
                continue;
            }
            const attached: string = cluster.slice(j + 1);
            if (attached) {
                flags.set(flag.id, attached);
            } else if (i + 1 < argv.length) {
                flags.set(flag.id, argv[++i]);
            } else {
                throw missingValue_error(name);
            }
            break;
        }
    }

    args_check(spec, args);
    return { name: spec.name, flags, args, raw };
}

/**
 * Render the one-line usage string of a command, e.g. `head [-n N] FILE`.
 */
export function usage_render(spec: CommandSpec): string {
    const parts: string[] = [spec.name];
    for (const flag of spec.flags) {
        parts.push(flag.takesValue ? `[${flag.id} VALUE]` : `[${flag.id}]`);
    }
    for (const slot of spec.args) {
        const label: string = slot.variadic ? `${slot.name}...` : slot.name;
        parts.push(slot.required ? label : `[${label}]`);
    }
    return parts.join(' ');
}

// ─── Internal Helpers ───────────────────────────────────────────

function flag_find(spec: CommandSpec, name: string): FlagSpec {
    const flag: FlagSpec | undefined = spec.flags.find(
        (candidate: FlagSpec): boolean => candidate.id === name || candidate.long === name
    );
    if (!flag) {
        throw unknownFlag_error(name);
    }
    return flag;
}

function args_check(spec: CommandSpec, args: string[]): void {
    const slots: readonly ArgSpec[] = spec.args;
    for (let i = 0; i < slots.length; i++) {
        if (slots[i].required && args.length <= i) {
            throw missingArgument_error(slots[i].name);
        }
    }
    const last: ArgSpec | undefined = slots[slots.length - 1];
    if (last?.variadic) return;
    if (args.length > slots.length) {
        throw invalidArgument_error(`extra operand '${args[slots.length]}'`);
    }
}
