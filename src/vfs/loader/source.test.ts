import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { scriptLines_read, source_load, sourceFormat_detect, sourceText_parse } from './source.js';
import type { FileSystemTree } from '../FileSystemTree.js';
import { VfsError } from '../errors.js';
import { Logger } from '../../core/logger.js';

const quietLogger: Logger = Logger.create('test', 'silent');

function fixture_path(name: string): string {
    return fileURLToPath(new URL(`../../../fixtures/${name}`, import.meta.url));
}

async function failure_get(promise: Promise<unknown>): Promise<string | null> {
    try {
        await promise;
    } catch (error: unknown) {
        if (error instanceof VfsError) return `${error.kind}: ${error.message}`;
        throw error;
    }
    return null;
}

describe('sourceFormat_detect', (): void => {
    it('chooses the format by extension', (): void => {
        expect(sourceFormat_detect('tree.json')).toBe('json');
        expect(sourceFormat_detect('tree.YAML')).toBe('yaml');
        expect(sourceFormat_detect('tree.yml')).toBe('yaml');
        expect(sourceFormat_detect('tree.xml')).toBe('xml');
        expect(sourceFormat_detect('tree')).toBe('xml');
    });
});

describe('sourceText_parse', (): void => {
    it('reports malformed JSON', (): void => {
        expect((): unknown => sourceText_parse('{', 'json')).toThrowError(/^malformed JSON: /);
    });

    it('reports malformed YAML', (): void => {
        expect((): unknown => sourceText_parse('a: [', 'yaml')).toThrowError(/^malformed YAML: /);
    });
});

describe('source_load', (): void => {
    it('loads the XML fixture', async (): Promise<void> => {
        const tree: FileSystemTree = await source_load(fixture_path('sample.xml'), quietLogger);
        expect(tree.tree_render(tree.root)).toBe(['/', '  home/', '    empty/', '    hello.txt', '  LICENSE'].join('\n'));
        expect(tree.file_resolve('/home/hello.txt').text_read()).toBe('Hello World!');
    });

    it('loads the YAML fixture', async (): Promise<void> => {
        const tree: FileSystemTree = await source_load(fixture_path('sample.yaml'), quietLogger);
        expect(tree.file_resolve('/notes/todo.txt').text_read()).toBe('hi');
    });

    it('loads the JSON fixture, keeping non-base64 text', async (): Promise<void> => {
        const tree: FileSystemTree = await source_load(fixture_path('sample.json'), quietLogger);
        expect(tree.file_resolve('/plain.txt').text_read()).toBe('not base64!');
    });

    it('reports unreadable files as LoadFailure', async (): Promise<void> => {
        const failure: string | null = await failure_get(source_load(fixture_path('missing.xml'), quietLogger));
        expect(failure).toMatch(/^LoadFailure: cannot read '.*missing\.xml': /);
    });
});

describe('scriptLines_read', (): void => {
    it('splits a script into lines', async (): Promise<void> => {
        expect(await scriptLines_read(fixture_path('session.txt'))).toEqual([
            '# walk into home and read the greeting',
            'cd home',
            'cat hello.txt',
            '',
            'exit',
            ''
        ]);
    });
});
