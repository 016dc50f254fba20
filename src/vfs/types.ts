/**
 * @file Shell Type Definitions
 *
 * Result and invocation shapes shared by the dispatcher, the session and
 * every builtin command.
 *
 * @module
 */

import type { VfsErrorKind } from './errors.js';

/**
 * Structured failure attached to a ShellResult.
 */
export interface ShellFailure {
    kind: VfsErrorKind;
    message: string;
}

/**
 * Result of a shell command execution.
 */
export interface ShellResult {
    stdout: string;
    stderr: string;
    exitCode: number;
    failure: ShellFailure | null;
    /** Set by `exit`; drivers end their loop when they see it. */
    terminate: boolean;
}

/**
 * Value bound to a parsed flag: the consumed value, or `true` for a switch.
 */
export type FlagValue = string | true;

/**
 * A parsed command line, produced once per execution.
 */
export interface Invocation {
    name: string;
    /** Keyed by canonical flag id (e.g. `-n`, `--vfs`). */
    flags: Map<string, FlagValue>;
    args: string[];
    raw: string;
}
