/**
 * @file Script Transcript
 *
 * Shapes shared by everything that runs script lines through a Shell, and
 * the plain-text rendering of each executed line.
 *
 * @module
 */

import type { ShellResult } from './types.js';

/**
 * One executed script line.
 */
export interface LineOutcome {
    /** 1-based position in the source, counting skipped lines. */
    lineNumber: number;
    line: string;
    /** Prompt as it read before the line ran. */
    prompt: string;
    result: ShellResult;
}

export interface LinesRunSummary {
    outcomes: LineOutcome[];
    /** Whether an `exit` stopped the run. */
    terminated: boolean;
}

/**
 * Text decorators used when rendering a transcript.
 */
export interface TranscriptStyle {
    echo: (text: string) => string;
    error: (text: string) => string;
}

const PLAIN_STYLE: TranscriptStyle = {
    echo: (text: string): string => text,
    error: (text: string): string => text
};

/**
 * Whether a script line is executed (blank lines and `#` comments are not).
 */
export function scriptLine_isCommand(line: string): boolean {
    const trimmed: string = line.trim();
    return trimmed.length > 0 && !trimmed.startsWith('#');
}

/**
 * Transcript lines for one script line: the echoed prompt and command,
 * the command's output, and an `Error on line N` report for failures.
 */
export function lineOutcome_render(outcome: LineOutcome, style: TranscriptStyle = PLAIN_STYLE): string[] {
    const lines: string[] = [style.echo(`${outcome.prompt}${outcome.line}`)];
    const stdout: string = outcome.result.stdout.replace(/\n$/, '');
    if (stdout) {
        lines.push(stdout);
    }
    if (outcome.result.failure) {
        lines.push(style.error(`Error on line ${outcome.lineNumber}: ${outcome.result.stderr}`));
    }
    return lines;
}
