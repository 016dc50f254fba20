#!/usr/bin/env node
/**
 * @file vfs-shell CLI Entry Point
 *
 * Resolves settings, loads the tree, runs the startup script (if any) and
 * then the interactive REPL, unless the script ended the session.
 *
 * Usage:
 *   vfs-shell
 *   vfs-shell --vfs tree.xml
 *   vfs-shell --vfs tree.xml --script setup.txt --log-level info
 *
 * @module
 */

import fs from 'fs';
import { pathToFileURL } from 'url';
import chalk from 'chalk';
import { SettingsService } from '../config/settings.js';
import type { CliOverrides, ResolvedSettings } from '../config/settings.js';
import { rootLogger } from '../core/logger.js';
import { FileSystemTree } from '../vfs/FileSystemTree.js';
import { Shell } from '../vfs/Shell.js';
import { source_load } from '../vfs/loader/source.js';
import type { LinesRunSummary } from '../vfs/transcript.js';
import { errorMessage_get } from '../vfs/commands/_shared.js';
import { script_run } from './ScriptRunner.js';
import { repl_start } from './Repl.js';
import { processSink } from './render.js';
import type { OutputSink } from './render.js';

export const USAGE: string = [
    'usage: vfs-shell [--vfs PATH] [--script PATH] [--config PATH]',
    '                 [--user NAME] [--host NAME] [--log-level LEVEL]'
].join('\n');

const VALUE_FLAGS: Record<string, keyof CliOverrides> = {
    '--vfs': 'vfs',
    '--script': 'script',
    '--config': 'config',
    '--user': 'user',
    '--host': 'host',
    '--log-level': 'logLevel'
};

export type CliParseResult =
    | { ok: true; overrides: CliOverrides; help: boolean }
    | { ok: false; error: string };

/**
 * Parse command-line arguments. Accepts `--flag value` and `--flag=value`.
 */
export function cliArgs_parse(args: string[]): CliParseResult {
    const overrides: CliOverrides = {};
    for (let i = 0; i < args.length; i++) {
        const arg: string = args[i];
        if (arg === '--help' || arg === '-h') {
            return { ok: true, overrides, help: true };
        }
        const eq: number = arg.indexOf('=');
        const flag: string = eq === -1 ? arg : arg.slice(0, eq);
        const key: keyof CliOverrides | undefined = Object.hasOwn(VALUE_FLAGS, flag) ? VALUE_FLAGS[flag] : undefined;
        if (!key) {
            return { ok: false, error: `unrecognized argument '${arg}'` };
        }
        if (eq !== -1) {
            overrides[key] = arg.slice(eq + 1);
        } else if (i + 1 < args.length) {
            overrides[key] = args[++i];
        } else {
            return { ok: false, error: `option '${flag}' requires a value` };
        }
    }
    return { ok: true, overrides, help: false };
}

/**
 * Run the CLI and return the process exit code.
 */
export async function main(args: string[] = process.argv.slice(2), sink: OutputSink = processSink): Promise<number> {
    const parsed: CliParseResult = cliArgs_parse(args);
    if (!parsed.ok) {
        sink.stderr(`${chalk.red(`vfs-shell: ${parsed.error}`)}\n${USAGE}\n`);
        return 1;
    }
    if (parsed.help) {
        sink.stdout(`${USAGE}\n`);
        return 0;
    }

    let shell: Shell;
    let settings: ResolvedSettings;
    try {
        settings = (await SettingsService.create(parsed.overrides)).snapshot();
        rootLogger.level_set(settings.logLevel);
        const tree: FileSystemTree = settings.vfs ? await source_load(settings.vfs) : new FileSystemTree();
        shell = new Shell({ tree, user: settings.user, hostname: settings.host, env: settings.env });
    } catch (error: unknown) {
        sink.stderr(`${chalk.red(`vfs-shell: ${errorMessage_get(error)}`)}\n`);
        return 1;
    }

    if (settings.script) {
        let summary: LinesRunSummary;
        try {
            summary = await script_run(shell, settings.script, sink);
        } catch (error: unknown) {
            sink.stderr(`${chalk.red(`vfs-shell: ${errorMessage_get(error)}`)}\n`);
            return 1;
        }
        if (summary.terminated) {
            return 0;
        }
    }

    await repl_start(shell, { sink });
    return 0;
}

/**
 * Whether this module is the process entry point (also through an npm bin link).
 */
function entry_isMain(): boolean {
    const entryPath: string | undefined = process.argv[1];
    if (!entryPath || !fs.existsSync(entryPath)) return false;
    return import.meta.url === pathToFileURL(fs.realpathSync(entryPath)).href;
}

if (entry_isMain()) {
    main().then(
        (code: number): void => {
            process.exitCode = code;
        },
        (error: unknown): void => {
            console.error(`Fatal error: ${errorMessage_get(error)}`);
            process.exitCode = 1;
        }
    );
}
