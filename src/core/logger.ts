/**
 * @file Leveled Logger
 *
 * Scoped logger writing chalk-styled lines to stderr. Child loggers share
 * their parent's level and sink, so one `level_set` call on the root
 * affects every scope.
 *
 * @module
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

type MessageLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_STYLE: Record<MessageLevel, (text: string) => string> = {
    debug: (text: string): string => chalk.gray(text),
    info: (text: string): string => chalk.cyan(text),
    warn: (text: string): string => chalk.yellow(text),
    error: (text: string): string => chalk.red(text)
};

/**
 * Destination for formatted log lines.
 */
export type LogSink = (line: string) => void;

interface LoggerConfig {
    level: LogLevel;
    sink: LogSink;
}

/**
 * Type guard for level names coming from flags, env or config files.
 */
export function logLevel_is(value: unknown): value is LogLevel {
    return typeof value === 'string' && LOG_LEVELS.some((level: LogLevel): boolean => level === value);
}

function stderr_write(line: string): void {
    process.stderr.write(`${line}\n`);
}

/**
 * Scoped, leveled logger.
 */
export class Logger {
    private constructor(
        private readonly scope: string,
        private readonly config: LoggerConfig
    ) {}

    /**
     * Create a root logger.
     */
    public static create(scope: string, level: LogLevel = 'warn', sink: LogSink = stderr_write): Logger {
        return new Logger(scope, { level, sink });
    }

    /**
     * Logger for a nested scope sharing this logger's level and sink.
     */
    public child(scope: string): Logger {
        return new Logger(`${this.scope}:${scope}`, this.config);
    }

    public level_set(level: LogLevel): void {
        this.config.level = level;
    }

    public level_get(): LogLevel {
        return this.config.level;
    }

    public debug(message: string): void {
        this.line_write('debug', message);
    }

    public info(message: string): void {
        this.line_write('info', message);
    }

    public warn(message: string): void {
        this.line_write('warn', message);
    }

    public error(message: string): void {
        this.line_write('error', message);
    }

    private line_write(level: MessageLevel, message: string): void {
        if (LEVEL_RANK[level] < LEVEL_RANK[this.config.level]) return;
        const tag: string = LEVEL_STYLE[level](level.toUpperCase().padEnd(5));
        this.config.sink(`${tag} ${chalk.dim(`[${this.scope}]`)} ${message}`);
    }
}

/** Process-wide root logger; the CLI sets its level from settings. */
export const rootLogger: Logger = Logger.create('vfs-shell');
