/**
 * @file Dispatcher: Command Line Execution
 *
 * Turns a raw line into a ShellResult: tokenize, resolve the command in
 * the registry, parse against its spec, run the handler. Every thrown
 * value is converted here; a `VfsError` becomes a failure result of its
 * own kind and anything else becomes an `InternalError`.
 *
 * The dispatcher holds no session state of its own.
 *
 * @module
 */

import type { Logger } from '../core/logger.js';
import type { CommandRegistry, RegisteredCommand } from './commands/registry.js';
import type { Shell } from './Shell.js';
import type { Invocation, ShellResult } from './types.js';
import {
    VfsError,
    invalidArgument_error,
    unknownCommand_error,
    variableNotFound_error,
    vfsError_is
} from './errors.js';
import { errorMessage_get, result_fail, result_ok } from './commands/_shared.js';
import { invocation_parse, line_tokenize } from './invocation.js';

/** Name used as the stderr prefix for failures not owned by a command. */
export const SHELL_NAME: string = 'vfs-shell';

const VARIABLE_PATTERN: RegExp = /^\$([A-Za-z_][A-Za-z0-9_]*)$/;

export class Dispatcher {
    constructor(
        private readonly registry: CommandRegistry,
        private readonly logger: Logger
    ) {}

    /**
     * Execute one raw command line against a shell.
     *
     * Never rejects: all failures are reported through the result.
     */
    public async line_dispatch(line: string, shell: Shell): Promise<ShellResult> {
        let owner: string = SHELL_NAME;
        try {
            const tokens: string[] = line_tokenize(line);
            if (tokens.length === 0) {
                return result_ok();
            }

            const [name, ...argv] = tokens;
            const variable: RegExpMatchArray | null = name.match(VARIABLE_PATTERN);
            if (variable) {
                return this.variable_print(variable[1], argv, shell);
            }

            const command: RegisteredCommand | null = this.registry.command_get(name);
            if (!command) {
                throw unknownCommand_error(name);
            }

            owner = name;
            const invocation: Invocation = invocation_parse(command.spec, argv, line);
            this.logger.debug(`dispatch ${name} args=${JSON.stringify(invocation.args)}`);
            return await command.handler(invocation, shell);
        } catch (error: unknown) {
            const failure: VfsError = vfsError_is(error)
                ? error
                : new VfsError('InternalError', `internal error: ${errorMessage_get(error)}`);
            this.logger.debug(`${owner} failed with ${failure.kind}: ${failure.message}`);
            if (failure.kind === 'InternalError') {
                this.logger.error(`${owner}: ${failure.message}`);
            }
            return result_fail(owner, failure);
        }
    }

    private variable_print(name: string, argv: string[], shell: Shell): ShellResult {
        if (argv.length > 0) {
            throw invalidArgument_error(`extra operand '${argv[0]}'`);
        }
        const value: string | undefined = shell.env_get(name);
        if (value === undefined) {
            throw variableNotFound_error(name);
        }
        return result_ok(value);
    }
}
