/**
 * `sc` builtin implementation.
 *
 * Supported flags:
 * - `--vfs PATH`: source document for the new tree.
 * - `--script PATH`: script whose lines run against the new tree.
 *
 * Both sources are read and the nesting cap checked before the session is
 * touched. The tree is then replaced, the working directory reset to the
 * root, and the script lines run through the session one after another. A failing line is reported
 * and the script continues; `exit` stops it and ends the session.
 */

import type { FileSystemTree } from '../FileSystemTree.js';
import type { LineOutcome, LinesRunSummary } from '../transcript.js';
import type { BuiltinCommand } from './types.js';
import { loadFailure_error, missingArgument_error, vfsError_is } from '../errors.js';
import { lineOutcome_render } from '../transcript.js';
import { errorMessage_get, flagValue_get, result_ok } from './_shared.js';

export const command: BuiltinCommand = {
    spec: {
        name: 'sc',
        summary: 'load a filesystem and run a script against it',
        flags: [
            { id: '--vfs', takesValue: true, description: 'filesystem source document' },
            { id: '--script', takesValue: true, description: 'script file to run' }
        ],
        args: []
    },
    create: ({ source_load, script_read }) => async (invocation, shell) => {
        const vfsPath: string | null = flagValue_get(invocation, '--vfs');
        const scriptPath: string | null = flagValue_get(invocation, '--script');
        if (vfsPath === null) throw missingArgument_error('--vfs');
        if (scriptPath === null) throw missingArgument_error('--script');

        const tree: FileSystemTree = await hostRead_wrap(vfsPath, () => source_load(vfsPath));
        const lines: string[] = await hostRead_wrap(scriptPath, () => script_read(scriptPath));

        shell.scriptDepth_check();
        shell.tree_replace(tree);
        const summary: LinesRunSummary = await shell.lines_run(lines);
        const transcript: string = summary.outcomes
            .flatMap((outcome: LineOutcome): string[] => lineOutcome_render(outcome))
            .join('\n');
        return { ...result_ok(transcript), terminate: summary.terminated };
    }
};

async function hostRead_wrap<T>(path: string, read: () => Promise<T>): Promise<T> {
    try {
        return await read();
    } catch (error: unknown) {
        if (vfsError_is(error)) throw error;
        throw loadFailure_error(`cannot read '${path}': ${errorMessage_get(error)}`);
    }
}
