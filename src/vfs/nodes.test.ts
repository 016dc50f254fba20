/**
 * @file VFS Node Model Unit Tests
 *
 * Covers name validation, parent links, rename order, and deep copies.
 *
 * @module
 */

import { describe, it, expect } from 'vitest';
import { VfsDirectory, VfsFile, nodeName_validate } from './nodes.js';
import { VfsError } from './errors.js';

function errorKind_get(fn: () => unknown): string | null {
    try {
        fn();
    } catch (error: unknown) {
        return error instanceof VfsError ? error.kind : 'not-a-vfs-error';
    }
    return null;
}

describe('nodeName_validate', (): void => {
    it('accepts ordinary names', (): void => {
        expect(errorKind_get(() => nodeName_validate('notes.txt'))).toBeNull();
        expect(errorKind_get(() => nodeName_validate('.hidden'))).toBeNull();
    });

    it('rejects empty, blank, reserved and slash-bearing names', (): void => {
        expect(errorKind_get(() => nodeName_validate(''))).toBe('InvalidArgument');
        expect(errorKind_get(() => nodeName_validate('   '))).toBe('InvalidArgument');
        expect(errorKind_get(() => nodeName_validate('..'))).toBe('InvalidArgument');
        expect(errorKind_get(() => nodeName_validate('a/b'))).toBe('InvalidArgument');
    });
});

describe('VfsDirectory', (): void => {
    it('sets and clears the parent link', (): void => {
        const dir: VfsDirectory = new VfsDirectory('docs');
        const file: VfsFile = new VfsFile('a.txt');
        dir.child_add(file);
        expect(file.parent).toBe(dir);

        const removed = dir.child_remove('a.txt');
        expect(removed).toBe(file);
        expect(file.parent).toBeNull();
        expect(dir.child_count()).toBe(0);
    });

    it('rejects a sibling name clash', (): void => {
        const dir: VfsDirectory = new VfsDirectory('docs');
        dir.child_add(new VfsFile('a.txt'));
        expect(errorKind_get(() => dir.child_add(new VfsFile('a.txt')))).toBe('NameCollision');
    });

    it('rejects adding a node that is still attached elsewhere', (): void => {
        const first: VfsDirectory = new VfsDirectory('first');
        const second: VfsDirectory = new VfsDirectory('second');
        const file: VfsFile = new VfsFile('a.txt');
        first.child_add(file);
        expect(errorKind_get(() => second.child_add(file))).toBe('InvalidOperation');
    });

    it('fails to remove a missing child', (): void => {
        expect(errorKind_get(() => new VfsDirectory('docs').child_remove('nope'))).toBe('PathNotFound');
    });

    it('keeps listing order across a rename', (): void => {
        const dir: VfsDirectory = new VfsDirectory('docs');
        dir.child_add(new VfsFile('a'));
        dir.child_add(new VfsFile('b'));
        dir.child_add(new VfsFile('c'));
        dir.child_rename('b', 'z');
        expect(dir.children_list().map((node) => node.name)).toEqual(['a', 'z', 'c']);
        expect(dir.child_get('b')).toBeNull();
        expect(dir.child_get('z')?.name).toBe('z');
    });

    it('refuses a rename onto an existing sibling', (): void => {
        const dir: VfsDirectory = new VfsDirectory('docs');
        dir.child_add(new VfsFile('a'));
        dir.child_add(new VfsFile('b'));
        expect(errorKind_get(() => dir.child_rename('a', 'b'))).toBe('NameCollision');
    });

    it('builds absolute paths from parent links', (): void => {
        const root: VfsDirectory = new VfsDirectory('/');
        const home: VfsDirectory = new VfsDirectory('home');
        const file: VfsFile = new VfsFile('hello.txt');
        root.child_add(home);
        home.child_add(file);
        expect(root.path_absolute()).toBe('/');
        expect(home.path_absolute()).toBe('/home');
        expect(file.path_absolute()).toBe('/home/hello.txt');
    });

    it('deep-copies a subtree', (): void => {
        const dir: VfsDirectory = new VfsDirectory('docs');
        const file: VfsFile = new VfsFile('a.txt', 'original');
        dir.child_add(file);

        const copy: VfsDirectory = dir.clone();
        const copiedFile = copy.child_get('a.txt');
        expect(copy.parent).toBeNull();
        expect(copiedFile).not.toBe(file);
        if (!copiedFile?.isFile()) throw new Error('expected a file');

        copiedFile.content_write('changed');
        expect(file.text_read()).toBe('original');
        expect(copiedFile.text_read()).toBe('changed');
    });

    it('names a copy without touching the source', (): void => {
        const root: VfsDirectory = new VfsDirectory('/');
        root.child_add(new VfsFile('a.txt'));
        const copy: VfsDirectory = root.clone('backup');
        expect(copy.name).toBe('backup');
        expect(root.name).toBe('/');
        expect(copy.child_get('a.txt')?.name).toBe('a.txt');
    });

    it('renames detached nodes only', (): void => {
        const parent: VfsDirectory = new VfsDirectory('docs');
        const file: VfsFile = new VfsFile('a.txt');
        file.detached_rename('b.txt');
        expect(file.name).toBe('b.txt');
        parent.child_add(file);
        expect(errorKind_get(() => file.detached_rename('c.txt'))).toBe('InvalidOperation');
        expect(errorKind_get(() => new VfsFile('x').detached_rename('a/b'))).toBe('InvalidArgument');
        expect(parent.child_get('b.txt')).toBe(file);
    });
});

describe('VfsFile', (): void => {
    it('stores bytes and hands out copies', (): void => {
        const file: VfsFile = new VfsFile('bin', new Uint8Array([1, 2, 3]));
        const bytes: Uint8Array = file.content_read();
        bytes[0] = 9;
        expect(Array.from(file.content_read())).toEqual([1, 2, 3]);
        expect(file.size_get()).toBe(3);
    });

    it('decodes text and clears content', (): void => {
        const file: VfsFile = new VfsFile('note', 'héllo');
        expect(file.text_read()).toBe('héllo');
        expect(file.size_get()).toBe(6);
        file.content_clear();
        expect(file.text_read()).toBe('');
    });
});
