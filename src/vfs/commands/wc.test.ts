import { describe, it, expect, beforeEach } from 'vitest';
import { FileSystemTree } from '../FileSystemTree.js';
import { VfsFile } from '../nodes.js';
import { Shell } from '../Shell.js';
import type { ShellResult } from '../types.js';
import { wcCounts_compute } from './wc.js';
import { Logger } from '../../core/logger.js';

describe('VFS Commands: wc', (): void => {
    let shell: Shell;

    beforeEach((): void => {
        const tree: FileSystemTree = new FileSystemTree();
        tree.root.child_add(new VfsFile('f.txt', 'a\nb\nc'));
        tree.root.child_add(new VfsFile('g.txt', 'a\nb\nc\n'));
        tree.root.child_add(new VfsFile('prose.txt', 'the quick  brown\nfox jumps'));
        tree.dir_create('/docs');
        shell = new Shell({ tree, logger: Logger.create('test', 'silent') });
    });

    it('should count newlines, not line fragments', async (): Promise<void> => {
        expect((await shell.command_execute('wc -l f.txt')).stdout).toBe('2 f.txt');
        expect((await shell.command_execute('wc -l g.txt')).stdout).toBe('3 g.txt');
    });

    it('should print all four counts without flags', async (): Promise<void> => {
        expect((await shell.command_execute('wc prose.txt')).stdout).toBe('1 5 26 16 prose.txt');
    });

    it('should print selected counts in fixed order', async (): Promise<void> => {
        expect((await shell.command_execute('wc -lw f.txt')).stdout).toBe('2 3 f.txt');
        expect((await shell.command_execute('wc -L -m f.txt')).stdout).toBe('5 1 f.txt');
        expect((await shell.command_execute('wc --words prose.txt')).stdout).toBe('5 prose.txt');
    });

    it('should echo the operand as given', async (): Promise<void> => {
        await shell.command_execute('cd docs');
        expect((await shell.command_execute('wc -l ../f.txt')).stdout).toBe('2 ../f.txt');
    });

    it('should refuse directories', async (): Promise<void> => {
        const result: ShellResult = await shell.command_execute('wc docs');
        expect(result.failure?.kind).toBe('IsADirectory');
    });

    it('should count characters rather than bytes', (): void => {
        expect(wcCounts_compute('héllo\n')).toEqual({ lines: 1, words: 1, chars: 6, maxLineLength: 5 });
        expect(wcCounts_compute('')).toEqual({ lines: 0, words: 0, chars: 0, maxLineLength: 0 });
    });
});
