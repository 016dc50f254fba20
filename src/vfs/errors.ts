/**
 * @file VFS Error Taxonomy
 *
 * Every recoverable failure raised by the tree, the parser, or a builtin is
 * a `VfsError` carrying a discriminating `kind`. The Dispatcher converts
 * these into failure ShellResults; nothing else is allowed to escape.
 *
 * @module
 */

export type VfsErrorKind =
    | 'PathNotFound'
    | 'NotADirectory'
    | 'IsADirectory'
    | 'NameCollision'
    | 'InvalidOperation'
    | 'UnknownCommand'
    | 'DuplicateCommand'
    | 'UnknownFlag'
    | 'MissingValue'
    | 'MissingArgument'
    | 'InvalidArgument'
    | 'VariableNotFound'
    | 'LoadFailure'
    | 'InternalError';

/**
 * Typed error raised anywhere inside the shell core.
 */
export class VfsError extends Error {
    constructor(
        public readonly kind: VfsErrorKind,
        message: string
    ) {
        super(message);
        this.name = 'VfsError';
    }
}

const USAGE_KINDS: ReadonlySet<VfsErrorKind> = new Set<VfsErrorKind>([
    'UnknownFlag',
    'MissingValue',
    'MissingArgument',
    'InvalidArgument'
]);

/**
 * Map an error kind to the process-style exit code reported in ShellResult.
 */
export function exitCode_forKind(kind: VfsErrorKind): number {
    if (kind === 'UnknownCommand') return 127;
    if (USAGE_KINDS.has(kind)) return 2;
    return 1;
}

export function vfsError_is(error: unknown): error is VfsError {
    return error instanceof VfsError;
}

// ─── Factories ──────────────────────────────────────────────────

export function pathNotFound_error(path: string): VfsError {
    return new VfsError('PathNotFound', `'${path}': No such file or directory`);
}

export function notADirectory_error(path: string): VfsError {
    return new VfsError('NotADirectory', `'${path}': Not a directory`);
}

export function isADirectory_error(path: string): VfsError {
    return new VfsError('IsADirectory', `'${path}': Is a directory`);
}

export function nameCollision_error(name: string, parentPath: string): VfsError {
    return new VfsError('NameCollision', `'${name}' already exists in '${parentPath}'`);
}

export function invalidOperation_error(message: string): VfsError {
    return new VfsError('InvalidOperation', message);
}

export function unknownCommand_error(name: string): VfsError {
    return new VfsError('UnknownCommand', `${name}: command not found`);
}

export function duplicateCommand_error(name: string): VfsError {
    return new VfsError('DuplicateCommand', `command '${name}' is already registered`);
}

export function unknownFlag_error(flag: string): VfsError {
    return new VfsError('UnknownFlag', `unrecognized option '${flag}'`);
}

export function missingValue_error(flag: string): VfsError {
    return new VfsError('MissingValue', `option '${flag}' requires a value`);
}

export function missingArgument_error(slot: string): VfsError {
    return new VfsError('MissingArgument', `missing operand ${slot}`);
}

export function invalidArgument_error(message: string): VfsError {
    return new VfsError('InvalidArgument', message);
}

export function variableNotFound_error(name: string): VfsError {
    return new VfsError('VariableNotFound', `${name}: variable not set`);
}

export function loadFailure_error(message: string): VfsError {
    return new VfsError('LoadFailure', message);
}
