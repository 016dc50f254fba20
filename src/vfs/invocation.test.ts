import { describe, it, expect } from 'vitest';
import { invocation_parse, line_tokenize, usage_render } from './invocation.js';
import type { CommandSpec } from './commands/types.js';
import type { Invocation } from './types.js';
import { VfsError } from './errors.js';

const HEAD_SPEC: CommandSpec = {
    name: 'head',
    summary: 'print the first lines of a file',
    flags: [{ id: '-n', long: '--lines', takesValue: true, description: 'number of lines' }],
    args: [{ name: 'FILE', required: true }]
};

const WC_SPEC: CommandSpec = {
    name: 'wc',
    summary: 'count',
    flags: [
        { id: '-l', long: '--lines', takesValue: false, description: 'lines' },
        { id: '-w', takesValue: false, description: 'words' }
    ],
    args: [{ name: 'FILE', required: false }]
};

const RM_SPEC: CommandSpec = {
    name: 'rm',
    summary: 'remove',
    flags: [],
    args: [{ name: 'PATH', required: true, variadic: true }]
};

function failure_get(fn: () => unknown): { kind: string; message: string } | null {
    try {
        fn();
    } catch (error: unknown) {
        if (error instanceof VfsError) return { kind: error.kind, message: error.message };
        throw error;
    }
    return null;
}

describe('line_tokenize', (): void => {
    it('splits on runs of whitespace', (): void => {
        expect(line_tokenize('  ls   -l\tdocs  ')).toEqual(['ls', '-l', 'docs']);
        expect(line_tokenize('')).toEqual([]);
        expect(line_tokenize('   ')).toEqual([]);
    });

    it('groups quoted text and drops the quotes', (): void => {
        expect(line_tokenize('cat "my file.txt"')).toEqual(['cat', 'my file.txt']);
        expect(line_tokenize("echo 'a \"b\" c'")).toEqual(['echo', 'a "b" c']);
        expect(line_tokenize('export GREETING="hello world"')).toEqual(['export', 'GREETING=hello world']);
    });

    it('keeps an empty quoted token', (): void => {
        expect(line_tokenize('touch ""')).toEqual(['touch', '']);
    });

    it('applies backslash escapes outside single quotes', (): void => {
        expect(line_tokenize('cat my\\ file')).toEqual(['cat', 'my file']);
        expect(line_tokenize('cat "a\\"b"')).toEqual(['cat', 'a"b']);
        expect(line_tokenize("cat 'a\\b'")).toEqual(['cat', 'a\\b']);
    });

    it('rejects unterminated quotes', (): void => {
        expect(failure_get(() => line_tokenize('cat "oops'))).toEqual({
            kind: 'InvalidArgument',
            message: 'unterminated double quote'
        });
        expect(failure_get(() => line_tokenize("cat 'oops"))?.message).toBe('unterminated single quote');
    });
});

describe('invocation_parse', (): void => {
    it('binds short, attached and long value forms', (): void => {
        const forms: string[][] = [
            ['-n', '3', 'f'],
            ['-n3', 'f'],
            ['--lines', '3', 'f'],
            ['--lines=3', 'f'],
            ['f', '-n', '3']
        ];
        for (const argv of forms) {
            const invocation: Invocation = invocation_parse(HEAD_SPEC, argv);
            expect(invocation.flags.get('-n')).toBe('3');
            expect(invocation.args).toEqual(['f']);
        }
    });

    it('accepts a negative number as a flag value', (): void => {
        expect(invocation_parse(HEAD_SPEC, ['-n', '-2', 'f']).flags.get('-n')).toBe('-2');
    });

    it('expands clustered switches', (): void => {
        const invocation: Invocation = invocation_parse(WC_SPEC, ['-lw', 'f']);
        expect(Array.from(invocation.flags.entries())).toEqual([
            ['-l', true],
            ['-w', true]
        ]);
    });

    it('treats everything after `--` and a lone `-` as operands', (): void => {
        expect(invocation_parse(RM_SPEC, ['--', '-n', '-']).args).toEqual(['-n', '-']);
        expect(invocation_parse(WC_SPEC, ['-']).args).toEqual(['-']);
    });

    it('keeps the command name and raw line', (): void => {
        const invocation: Invocation = invocation_parse(HEAD_SPEC, ['f'], 'head f');
        expect(invocation.name).toBe('head');
        expect(invocation.raw).toBe('head f');
    });

    it('reports undeclared flags', (): void => {
        expect(failure_get(() => invocation_parse(HEAD_SPEC, ['-x', 'f']))).toEqual({
            kind: 'UnknownFlag',
            message: "unrecognized option '-x'"
        });
        expect(failure_get(() => invocation_parse(HEAD_SPEC, ['--count=1', 'f']))?.message).toBe(
            "unrecognized option '--count'"
        );
    });

    it('reports a value flag without its value', (): void => {
        expect(failure_get(() => invocation_parse(HEAD_SPEC, ['f', '-n']))).toEqual({
            kind: 'MissingValue',
            message: "option '-n' requires a value"
        });
        expect(failure_get(() => invocation_parse(HEAD_SPEC, ['f', '--lines']))?.kind).toBe('MissingValue');
    });

    it('rejects a value attached to a switch', (): void => {
        expect(failure_get(() => invocation_parse(WC_SPEC, ['--lines=2']))).toEqual({
            kind: 'InvalidArgument',
            message: "option '--lines' doesn't allow an argument"
        });
    });

    it('checks positional arity', (): void => {
        expect(failure_get(() => invocation_parse(HEAD_SPEC, ['-n', '1']))).toEqual({
            kind: 'MissingArgument',
            message: 'missing operand FILE'
        });
        expect(failure_get(() => invocation_parse(HEAD_SPEC, ['a', 'b']))).toEqual({
            kind: 'InvalidArgument',
            message: "extra operand 'b'"
        });
        expect(failure_get(() => invocation_parse(RM_SPEC, []))?.kind).toBe('MissingArgument');
        expect(invocation_parse(RM_SPEC, ['a', 'b', 'c']).args).toEqual(['a', 'b', 'c']);
    });
});

describe('usage_render', (): void => {
    it('lists flags, then operands', (): void => {
        expect(usage_render(HEAD_SPEC)).toBe('head [-n VALUE] FILE');
        expect(usage_render(WC_SPEC)).toBe('wc [-l] [-w] [FILE]');
        expect(usage_render(RM_SPEC)).toBe('rm PATH...');
    });
});
