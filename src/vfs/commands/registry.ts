/**
 * @file Command Registry
 *
 * Name-keyed table of registered builtins. Populated once when the shell
 * is constructed; specs are frozen on registration.
 *
 * @module
 */

import type { BuiltinCommand, BuiltinDeps, BuiltinHandler, CommandSpec, HostDeps } from './types.js';
import { duplicateCommand_error } from '../errors.js';

/**
 * A registered command: its frozen spec and the handler bound to deps.
 */
export interface RegisteredCommand {
    spec: CommandSpec;
    handler: BuiltinHandler;
}

/**
 * Registry of shell commands.
 */
export class CommandRegistry {
    private readonly commands: Map<string, RegisteredCommand> = new Map();
    private readonly deps: BuiltinDeps;

    constructor(host: HostDeps) {
        this.deps = { ...host, specs_list: (): CommandSpec[] => this.specs_list() };
    }

    /**
     * Register a builtin under its spec name.
     *
     * @throws VfsError(DuplicateCommand) if the name is already taken.
     */
    public command_register(command: BuiltinCommand): void {
        const name: string = command.spec.name;
        if (this.commands.has(name)) {
            throw duplicateCommand_error(name);
        }
        const spec: CommandSpec = Object.freeze({
            ...command.spec,
            flags: Object.freeze(command.spec.flags.map((flag) => Object.freeze({ ...flag }))),
            args: Object.freeze(command.spec.args.map((slot) => Object.freeze({ ...slot })))
        });
        this.commands.set(name, { spec, handler: command.create(this.deps) });
    }

    public command_get(name: string): RegisteredCommand | null {
        return this.commands.get(name) ?? null;
    }

    /**
     * Names of all registered commands, in registration order.
     */
    public commands_list(): string[] {
        return Array.from(this.commands.keys());
    }

    public specs_list(): CommandSpec[] {
        return Array.from(this.commands.values()).map((entry: RegisteredCommand): CommandSpec => entry.spec);
    }
}
