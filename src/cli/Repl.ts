/**
 * @file Interactive REPL
 *
 * readline loop over a Shell: prints the colored `$PS1` prompt, sends each
 * line to the shell, renders the result. `exit` or end of input ends it.
 *
 * @module
 */

import * as readline from 'readline';
import type { Shell } from '../vfs/Shell.js';
import type { VfsNode } from '../vfs/nodes.js';
import type { ShellResult } from '../vfs/types.js';
import { vfsError_is } from '../vfs/errors.js';
import { errorMessage_get } from '../vfs/commands/_shared.js';
import { processSink, prompt_colorize, result_write } from './render.js';
import type { OutputSink } from './render.js';

export type ReplCompletionResult = [string[], string];

export type ReplCompleter = (line: string) => ReplCompletionResult;

export interface ReplOptions {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
    sink?: OutputSink;
    /** Whether readline treats the streams as a terminal. */
    terminal?: boolean;
}

/**
 * Tab completion: command names for the first word, tree entries for the
 * rest (directories suffixed with '/').
 */
export function replCompleter_create(shell: Shell): ReplCompleter {
    return (line: string): ReplCompletionResult => {
        const words: string[] = line.split(/\s+/);
        const partial: string = words[words.length - 1] ?? '';
        if (words.length === 1) {
            const names: string[] = shell.commands_list().filter((name: string): boolean => name.startsWith(partial));
            return [names, partial];
        }

        const slash: number = partial.lastIndexOf('/');
        const dirPart: string = slash === -1 ? '' : partial.slice(0, slash + 1);
        const prefix: string = partial.slice(slash + 1);
        let dir: VfsNode | null;
        try {
            dir = shell.tree.node_find(dirPart || '.', shell.cwd_get());
        } catch (error: unknown) {
            // A file in the middle of the path: nothing to offer.
            if (vfsError_is(error)) return [[], partial];
            throw error;
        }
        if (!dir?.isDirectory()) {
            return [[], partial];
        }
        const matches: string[] = shell.tree
            .dir_list(dir)
            .filter((child: VfsNode): boolean => child.name.startsWith(prefix))
            .map((child: VfsNode): string => `${dirPart}${child.name}${child.isDirectory() ? '/' : ''}`);
        return [matches, partial];
    };
}

/**
 * State container for the interactive REPL.
 */
export class VfsRepl {
    private rl: readline.Interface | null = null;
    private readonly sink: OutputSink;
    private pending: Promise<void> = Promise.resolve();
    private terminated: boolean = false;

    constructor(
        private readonly shell: Shell,
        private readonly options: ReplOptions = {}
    ) {
        this.sink = options.sink ?? processSink;
    }

    /**
     * Run the loop. Resolves once the session ends and every line already
     * read has been handled.
     */
    public async start(): Promise<void> {
        await new Promise<void>((resolve: () => void): void => {
            const rl: readline.Interface = readline.createInterface({
                input: this.options.input ?? process.stdin,
                output: this.options.output ?? process.stdout,
                prompt: this.prompt_get(),
                completer: replCompleter_create(this.shell),
                terminal: this.options.terminal
            });
            this.rl = rl;

            rl.on('line', (line: string): void => {
                this.pending = this.pending
                    .then((): Promise<void> => this.line_handle(line))
                    .catch((error: unknown): void => {
                        this.sink.stderr(`vfs-shell: ${errorMessage_get(error)}\n`);
                        this.rl?.prompt();
                    });
            });
            rl.on('close', (): void => {
                this.rl = null;
                resolve();
            });
            rl.prompt();
        });
        await this.pending;
    }

    private async line_handle(line: string): Promise<void> {
        // Lines buffered behind `exit` are dropped.
        if (this.terminated) return;
        const result: ShellResult = await this.shell.command_execute(line);
        result_write(result, this.sink);
        if (result.terminate) {
            this.terminated = true;
            this.rl?.close();
            return;
        }
        this.rl?.setPrompt(this.prompt_get());
        this.rl?.prompt();
    }

    private prompt_get(): string {
        return prompt_colorize(this.shell.prompt_render());
    }
}

/**
 * Start the interactive REPL on a shell.
 */
export async function repl_start(shell: Shell, options: ReplOptions = {}): Promise<void> {
    await new VfsRepl(shell, options).start();
}
