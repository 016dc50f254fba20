import type { FileSystemTree } from '../FileSystemTree.js';
import type { Shell } from '../Shell.js';
import type { Invocation, ShellResult } from '../types.js';

/**
 * Declared flag of a command.
 */
export interface FlagSpec {
    /** Canonical id, also the short form when it has a single dash (`-n`). */
    id: string;
    /** Optional long alias (`--lines`). */
    long?: string;
    takesValue: boolean;
    description: string;
}

/**
 * Declared positional slot of a command.
 */
export interface ArgSpec {
    name: string;
    required: boolean;
    /** Only the last slot may be variadic. */
    variadic?: boolean;
}

/**
 * Declarative description of a command's interface.
 */
export interface CommandSpec {
    name: string;
    summary: string;
    flags: readonly FlagSpec[];
    args: readonly ArgSpec[];
}

/**
 * Async builtin command handler signature.
 *
 * @param invocation - Parsed command line, already validated against the spec.
 * @param shell - Active shell instance.
 * @returns Shell command result payload.
 */
export type BuiltinHandler = (invocation: Invocation, shell: Shell) => Promise<ShellResult>;

/**
 * Shared dependency bag injected into builtin factories.
 */
export interface BuiltinDeps {
    /** Specs of every registered command, in registration order. */
    specs_list: () => CommandSpec[];
    /** Builds a tree from a source document on the host. */
    source_load: (path: string) => Promise<FileSystemTree>;
    /** Reads the lines of a script file on the host. */
    script_read: (path: string) => Promise<string[]>;
}

/**
 * Host-side dependencies; the registry adds `specs_list` itself.
 */
export type HostDeps = Omit<BuiltinDeps, 'specs_list'>;

/**
 * Declarative builtin descriptor consumed by the command registry.
 */
export interface BuiltinCommand {
    spec: CommandSpec;
    /**
     * Create a callable builtin handler bound to shared dependencies.
     *
     * @param deps - Shared dependency bag.
     * @returns Runnable builtin handler.
     */
    create: (deps: BuiltinDeps) => BuiltinHandler;
}
