/**
 * @file Script Runner
 *
 * Batch driver: reads a script file and runs it through a Shell. Blank
 * lines and `#` comments are skipped; each executed line is echoed after
 * the prompt, followed by its output. A failing line is reported as
 * `Error on line N: ...` and the script goes on; `exit` stops it.
 *
 * @module
 */

import type { Shell } from '../vfs/Shell.js';
import type { LineOutcome, LinesRunSummary, TranscriptStyle } from '../vfs/transcript.js';
import { lineOutcome_render } from '../vfs/transcript.js';
import { scriptLines_read } from '../vfs/loader/source.js';
import { loadFailure_error } from '../vfs/errors.js';
import { errorMessage_get } from '../vfs/commands/_shared.js';
import { processSink, TRANSCRIPT_STYLE } from './render.js';
import type { OutputSink } from './render.js';

/**
 * Run already-read script lines, writing the transcript as it is produced.
 */
export async function scriptLines_run(
    shell: Shell,
    lines: string[],
    sink: OutputSink = processSink,
    style: TranscriptStyle = TRANSCRIPT_STYLE
): Promise<LinesRunSummary> {
    return shell.script_execute(lines, (outcome: LineOutcome): void => {
        for (const line of lineOutcome_render(outcome, style)) {
            sink.stdout(`${line}\n`);
        }
    });
}

/**
 * Run the script at `scriptPath`.
 *
 * @throws VfsError(LoadFailure) if the script file cannot be read.
 */
export async function script_run(
    shell: Shell,
    scriptPath: string,
    sink: OutputSink = processSink
): Promise<LinesRunSummary> {
    let lines: string[];
    try {
        lines = await scriptLines_read(scriptPath);
    } catch (error: unknown) {
        throw loadFailure_error(`cannot read script '${scriptPath}': ${errorMessage_get(error)}`);
    }
    return scriptLines_run(shell, lines, sink);
}
