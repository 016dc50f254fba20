import { describe, it, expect, beforeEach, vi } from 'vitest';
import { FileSystemTree } from '../FileSystemTree.js';
import { VfsFile } from '../nodes.js';
import { Shell } from '../Shell.js';
import type { ShellResult } from '../types.js';
import type { HostDeps } from './types.js';
import { tree_build } from '../loader/description.js';
import type { TreeDescription } from '../loader/description.js';
import { loadFailure_error } from '../errors.js';
import { Logger } from '../../core/logger.js';

const SAMPLE: TreeDescription = {
    type: 'directory',
    name: '/',
    children: [
        {
            type: 'directory',
            name: 'home',
            children: [{ type: 'file', name: 'hello.txt', content: 'SGVsbG8gV29ybGQh' }]
        }
    ]
};

describe('VFS Commands: sc', (): void => {
    let scripts: Record<string, string[]>;
    let shell: Shell;

    beforeEach((): void => {
        scripts = {};
        const host: HostDeps = {
            source_load: async (path: string): Promise<FileSystemTree> => {
                if (path === 'sample.xml') return tree_build(SAMPLE);
                if (path === 'broken.xml') throw loadFailure_error('malformed XML at line 1: bad');
                throw new Error(`ENOENT: no such file or directory, open '${path}'`);
            },
            script_read: async (path: string): Promise<string[]> => {
                const lines: string[] | undefined = scripts[path];
                if (!lines) throw new Error(`ENOENT: no such file or directory, open '${path}'`);
                return lines;
            }
        };
        const tree: FileSystemTree = new FileSystemTree();
        tree.dir_create('/old').child_add(new VfsFile('keep.txt'));
        shell = new Shell({ tree, host, logger: Logger.create('test', 'silent') });
    });

    it('should replace the tree and return the script transcript', async (): Promise<void> => {
        scripts['run.txt'] = ['# walk the tree', 'cd home', '', 'ls', 'cat nope', 'cat hello.txt'];
        await shell.command_execute('cd old');

        const result: ShellResult = await shell.command_execute('sc --vfs sample.xml --script run.txt');
        expect(result.exitCode).toBe(0);
        expect(result.terminate).toBe(false);
        expect(result.stdout).toBe(
            [
                'user@vfs:/$ cd home',
                'user@vfs:/home$ ls',
                'hello.txt',
                'user@vfs:/home$ cat nope',
                "Error on line 5: cat: 'nope': No such file or directory",
                'user@vfs:/home$ cat hello.txt',
                'Hello World!'
            ].join('\n')
        );
        expect(shell.tree.node_find('/old')).toBeNull();
        expect(shell.env_get('PWD')).toBe('/home');
    });

    it('should end the session when the script exits', async (): Promise<void> => {
        scripts['quit.txt'] = ['pwd', 'exit', 'ls'];
        const result: ShellResult = await shell.command_execute('sc --script quit.txt --vfs sample.xml');
        expect(result.terminate).toBe(true);
        expect(result.stdout).toBe('user@vfs:/$ pwd\n/\nuser@vfs:/$ exit');
    });

    it('should require both sources', async (): Promise<void> => {
        const result: ShellResult = await shell.command_execute('sc --vfs sample.xml');
        expect(result.failure?.kind).toBe('MissingArgument');
        expect(result.stderr).toBe('sc: missing operand --script');
        expect(result.exitCode).toBe(2);
    });

    it('should keep the current tree when a source cannot be read', async (): Promise<void> => {
        scripts['run.txt'] = ['ls'];
        const missing: ShellResult = await shell.command_execute('sc --vfs missing.xml --script run.txt');
        expect(missing.failure?.kind).toBe('LoadFailure');
        expect(missing.stderr).toBe(
            "sc: cannot read 'missing.xml': ENOENT: no such file or directory, open 'missing.xml'"
        );

        const broken: ShellResult = await shell.command_execute('sc --vfs broken.xml --script run.txt');
        expect(broken.stderr).toBe('sc: malformed XML at line 1: bad');

        const noScript: ShellResult = await shell.command_execute('sc --vfs sample.xml --script none.txt');
        expect(noScript.failure?.kind).toBe('LoadFailure');

        expect(shell.tree.node_find('/old/keep.txt')).not.toBeNull();
    });

    it('should stop runaway nesting', async (): Promise<void> => {
        scripts['loop.txt'] = ['sc --vfs sample.xml --script loop.txt'];
        const result: ShellResult = await shell.command_execute('sc --vfs sample.xml --script loop.txt');
        expect(result.exitCode).toBe(0);
        expect(result.stdout).toContain('Error on line 1: sc: scripts nested deeper than 16 levels');
    });

    it('should not swap the tree when nesting is refused', async (): Promise<void> => {
        scripts['loop.txt'] = ['sc --vfs sample.xml --script loop.txt'];
        const replace = vi.spyOn(shell, 'tree_replace');
        await shell.command_execute('sc --vfs sample.xml --script loop.txt');
        expect(replace).toHaveBeenCalledTimes(16);
    });
});
