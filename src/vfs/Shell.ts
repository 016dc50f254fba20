/**
 * @file Shell: Session and Command Interpreter
 *
 * The Shell is the session layer between the drivers (REPL, script
 * runner) and the FileSystemTree. It owns the working directory, the
 * environment, prompt generation, command history and the dispatcher.
 *
 * Drivers send raw lines to `command_execute` and render whatever
 * ShellResult comes back; they never touch the tree directly.
 *
 * All methods follow the RPN naming convention: <subject>_<verb>.
 *
 * @module
 */

import { FileSystemTree } from './FileSystemTree.js';
import { Dispatcher } from './Dispatcher.js';
import { Events } from './events.js';
import type { VfsChangeEvent } from './events.js';
import type { VfsDirectory } from './nodes.js';
import type { ShellResult } from './types.js';
import { scriptLine_isCommand } from './transcript.js';
import type { LineOutcome, LinesRunSummary } from './transcript.js';
import type { BuiltinCommand, HostDeps } from './commands/types.js';
import type { CommandRegistry } from './commands/registry.js';
import { BUILTIN_COMMANDS, registry_create } from './commands/index.js';
import { invalidOperation_error } from './errors.js';
import { scriptLines_read, source_load } from './loader/source.js';
import { rootLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';

export const DEFAULT_PS1: string = '$USER@$HOSTNAME:$PWD$ ';

const MAX_SCRIPT_DEPTH: number = 16;

/**
 * Construction options for a Shell.
 */
export interface ShellOptions {
    tree?: FileSystemTree;
    user?: string;
    hostname?: string;
    /** Extra variables; applied after the defaults. */
    env?: Record<string, string>;
    /** Host I/O used by `sc`; defaults read from the local disk. */
    host?: Partial<HostDeps>;
    commands?: readonly BuiltinCommand[];
    logger?: Logger;
}

/**
 * The VFS Shell: one interactive session over one tree at a time.
 */
export class Shell {
    private currentTree: FileSystemTree;
    private cwd: VfsDirectory;
    private readonly env: Map<string, string> = new Map();
    private commandHistory: string[] = [];
    private readonly registry: CommandRegistry;
    private readonly dispatcher: Dispatcher;
    private readonly logger: Logger;
    private treeUnsubscribe: () => void;
    private queueTail: Promise<void> = Promise.resolve();
    private scriptDepth: number = 0;

    constructor(options: ShellOptions = {}) {
        this.logger = options.logger ?? rootLogger.child('shell');
        this.currentTree = options.tree ?? new FileSystemTree();
        this.cwd = this.currentTree.root;
        this.treeUnsubscribe = this.tree_subscribe(this.currentTree);

        this.env.set('USER', options.user ?? 'user');
        this.env.set('HOSTNAME', options.hostname ?? 'vfs');
        this.env.set('PS1', DEFAULT_PS1);
        for (const [key, value] of Object.entries(options.env ?? {})) {
            this.env.set(key, value);
        }
        this.env.set('PWD', this.cwd.path_absolute());

        this.registry = registry_create(
            {
                source_load: options.host?.source_load ?? ((path: string): Promise<FileSystemTree> => source_load(path, this.logger)),
                script_read: options.host?.script_read ?? scriptLines_read
            },
            options.commands ?? BUILTIN_COMMANDS
        );
        this.dispatcher = new Dispatcher(this.registry, this.logger.child('dispatch'));
    }

    // ─── Tree ───────────────────────────────────────────────────

    public get tree(): FileSystemTree {
        return this.currentTree;
    }

    /**
     * Swap in a new tree and move the working directory to its root.
     */
    public tree_replace(tree: FileSystemTree): void {
        this.treeUnsubscribe();
        this.currentTree = tree;
        this.treeUnsubscribe = this.tree_subscribe(tree);
        this.cwd_move(tree.root);
        this.logger.info(`tree replaced (${tree.node_count()} nodes)`);
    }

    // ─── Working Directory ──────────────────────────────────────

    public cwd_get(): VfsDirectory {
        return this.cwd;
    }

    /**
     * Change the working directory.
     *
     * @param path - Absolute or relative (to the current cwd) path.
     * @throws VfsError(PathNotFound | NotADirectory)
     */
    public cwd_set(path: string): VfsDirectory {
        const target: VfsDirectory = this.currentTree.dir_change(path, this.cwd);
        this.cwd_move(target);
        return target;
    }

    // ─── Command Execution ──────────────────────────────────────

    /**
     * Execute one raw line. Calls are serialized: a line starts only after
     * the previous one has produced its result.
     */
    public command_execute(line: string): Promise<ShellResult> {
        return this.serial_run((): Promise<ShellResult> => this.line_run(line));
    }

    /**
     * Run script lines as one serialized unit.
     *
     * @param observer - Called after each executed line, in order.
     */
    public script_execute(lines: string[], observer?: (outcome: LineOutcome) => void): Promise<LinesRunSummary> {
        return this.serial_run((): Promise<LinesRunSummary> => this.lines_run(lines, observer));
    }

    /**
     * Run script lines in the caller's execution slot. Used by `sc`, which
     * already holds the slot; drivers call `script_execute` instead.
     */
    public async lines_run(lines: string[], observer?: (outcome: LineOutcome) => void): Promise<LinesRunSummary> {
        this.scriptDepth_check();
        this.scriptDepth++;
        try {
            const outcomes: LineOutcome[] = [];
            for (let i = 0; i < lines.length; i++) {
                if (!scriptLine_isCommand(lines[i])) continue;
                const line: string = lines[i].trim();
                const prompt: string = this.prompt_render();
                const result: ShellResult = await this.line_run(line);
                const outcome: LineOutcome = { lineNumber: i + 1, line, prompt, result };
                outcomes.push(outcome);
                observer?.(outcome);
                if (result.terminate) {
                    return { outcomes, terminated: true };
                }
            }
            return { outcomes, terminated: false };
        } finally {
            this.scriptDepth--;
        }
    }

    /**
     * Fails when one more nested script would exceed the nesting cap.
     *
     * @throws VfsError(InvalidOperation)
     */
    public scriptDepth_check(): void {
        if (this.scriptDepth >= MAX_SCRIPT_DEPTH) {
            throw invalidOperation_error(`scripts nested deeper than ${MAX_SCRIPT_DEPTH} levels`);
        }
    }

    /**
     * Names of all registered commands.
     */
    public commands_list(): string[] {
        return this.registry.commands_list();
    }

    // ─── Environment Variables ──────────────────────────────────

    public env_get(key: string): string | undefined {
        return this.env.get(key);
    }

    public env_set(key: string, value: string): void {
        this.env.set(key, value);
    }

    /**
     * Return all environment variables as a plain object snapshot.
     */
    public env_snapshot(): Record<string, string> {
        return Object.fromEntries(this.env);
    }

    // ─── Prompt Generation ──────────────────────────────────────

    /**
     * Evaluates the $PS1 format string. Unknown variables are left as written.
     */
    public prompt_render(): string {
        const ps1: string = this.env.get('PS1') ?? DEFAULT_PS1;
        return ps1.replace(/\$([A-Za-z_][A-Za-z0-9_]*)/g, (match: string, name: string): string => this.env.get(name) ?? match);
    }

    // ─── History ────────────────────────────────────────────────

    public history_get(): string[] {
        return [...this.commandHistory];
    }

    public history_clear(): void {
        this.commandHistory = [];
    }

    // ─── Internal Helpers ───────────────────────────────────────

    private async line_run(line: string): Promise<ShellResult> {
        const trimmed: string = line.trim();
        if (trimmed) {
            this.commandHistory.push(trimmed);
        }
        return this.dispatcher.line_dispatch(trimmed, this);
    }

    private serial_run<T>(task: () => Promise<T>): Promise<T> {
        const run: Promise<T> = this.queueTail.then(task);
        // The caller observes the outcome through `run`; the tail only orders.
        this.queueTail = run.then(
            (): void => undefined,
            (): void => undefined
        );
        return run;
    }

    private cwd_move(target: VfsDirectory): void {
        const oldPath: string = this.env.get('PWD') ?? '/';
        this.cwd = target;
        const newPath: string = target.path_absolute();
        this.env.set('PWD', newPath);
        if (oldPath !== newPath) {
            this.currentTree.events.emit(Events.CWD_CHANGED, { oldPath, newPath });
        }
    }

    private tree_subscribe(tree: FileSystemTree): () => void {
        return tree.events.on(Events.VFS_CHANGED, (event: VfsChangeEvent): void => this.treeChange_handle(event));
    }

    /**
     * Keeps the cwd attached and `PWD` in step with renames and moves.
     */
    private treeChange_handle(event: VfsChangeEvent): void {
        if (event.operation === 'remove' && !this.currentTree.node_isAttached(this.cwd)) {
            this.logger.debug(`cwd detached by removal of ${event.path}; moving to ${event.parent.path_absolute()}`);
            this.cwd_move(event.parent);
            return;
        }
        this.cwd_move(this.cwd);
    }
}
