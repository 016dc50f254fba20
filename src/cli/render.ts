/**
 * @file Terminal Rendering
 *
 * chalk styling for the prompt, command results and script transcripts,
 * plus the output sink the drivers write through.
 *
 * @module
 */

import chalk from 'chalk';
import type { ShellResult } from '../vfs/types.js';
import type { TranscriptStyle } from '../vfs/transcript.js';

/**
 * Where drivers write. Tests substitute an in-memory sink.
 */
export interface OutputSink {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
}

export const processSink: OutputSink = {
    stdout: (text: string): void => {
        process.stdout.write(text);
    },
    stderr: (text: string): void => {
        process.stderr.write(text);
    }
};

export const TRANSCRIPT_STYLE: TranscriptStyle = {
    echo: (text: string): string => chalk.dim(text),
    error: (text: string): string => chalk.red(text)
};

/**
 * Apply colors to a rendered `user@host:path$ ` prompt; other shapes are
 * colored as a whole.
 */
export function prompt_colorize(rawPrompt: string): string {
    const match: RegExpMatchArray | null = rawPrompt.match(/^([^@\s]+)@([^:\s]+):(.*?)(\$\s*)$/);
    if (match) {
        const [, user, host, promptPath, tail] = match;
        return `${chalk.green(user)}@${chalk.cyan(host)}:${chalk.magenta(promptPath)}${tail}`;
    }
    return chalk.cyan(rawPrompt);
}

/**
 * Write a result: stdout as-is with a closing newline, stderr in red.
 */
export function result_write(result: ShellResult, sink: OutputSink): void {
    if (result.stdout) {
        sink.stdout(line_terminate(result.stdout));
    }
    if (result.stderr) {
        sink.stderr(line_terminate(chalk.red(result.stderr)));
    }
}

function line_terminate(text: string): string {
    return text.endsWith('\n') ? text : `${text}\n`;
}
