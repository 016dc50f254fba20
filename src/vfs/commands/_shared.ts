/**
 * Result builders and flag readers shared by the builtin command modules.
 */

import type { VfsError } from '../errors.js';
import { exitCode_forKind } from '../errors.js';
import type { FlagValue, Invocation, ShellResult } from '../types.js';

/**
 * Convert unknown thrown values into display-safe messages.
 */
export function errorMessage_get(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Successful result carrying `stdout`.
 */
export function result_ok(stdout: string = ''): ShellResult {
    return { stdout, stderr: '', exitCode: 0, failure: null, terminate: false };
}

/**
 * Failure result for `command`, rendered as `<command>: <message>`.
 */
export function result_fail(command: string, error: VfsError): ShellResult {
    return {
        stdout: '',
        stderr: `${command}: ${error.message}`,
        exitCode: exitCode_forKind(error.kind),
        failure: { kind: error.kind, message: error.message },
        terminate: false
    };
}

/**
 * Whether a switch flag was given.
 */
export function flag_isSet(invocation: Invocation, id: string): boolean {
    return invocation.flags.has(id);
}

/**
 * String value of a value flag, or `null` when absent.
 */
export function flagValue_get(invocation: Invocation, id: string): string | null {
    const value: FlagValue | undefined = invocation.flags.get(id);
    return typeof value === 'string' ? value : null;
}
