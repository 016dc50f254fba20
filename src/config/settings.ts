/**
 * @file Runtime Settings Service
 *
 * Startup settings with central validation and deterministic precedence
 * (command-line flag > environment > YAML config file > defaults).
 *
 * @module
 */

import fs from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { LOG_LEVELS, logLevel_is } from '../core/logger.js';
import type { LogLevel } from '../core/logger.js';
import { loadFailure_error } from '../vfs/errors.js';
import { errorMessage_get } from '../vfs/commands/_shared.js';

export type SettingsKey = 'vfs' | 'script' | 'user' | 'host' | 'logLevel';

export type SettingSource = 'cli' | 'env' | 'config' | 'default';

/**
 * Values given on the command line. All optional; `config` only locates the file.
 */
export interface CliOverrides {
    vfs?: string;
    script?: string;
    config?: string;
    user?: string;
    host?: string;
    logLevel?: string;
}

export interface ResolvedSettings {
    vfs: string | null;
    script: string | null;
    user: string;
    host: string;
    logLevel: LogLevel;
    /** Variables seeded into the shell environment. */
    env: Record<string, string>;
}

export const configFileSchema = z
    .object({
        vfs: z.string().optional(),
        script: z.string().optional(),
        user: z.string().min(1).optional(),
        host: z.string().min(1).optional(),
        logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
        env: z.record(z.string()).optional()
    })
    .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export type EnvSource = Record<string, string | undefined>;

export const ENV_KEYS: Record<SettingsKey, string> = {
    vfs: 'VFS_SHELL_VFS',
    script: 'VFS_SHELL_SCRIPT',
    user: 'VFS_SHELL_USER',
    host: 'VFS_SHELL_HOST',
    logLevel: 'VFS_SHELL_LOG_LEVEL'
};

export const CONFIG_ENV_KEY: string = 'VFS_SHELL_CONFIG';

const DEFAULTS: Omit<ResolvedSettings, 'env'> = {
    vfs: null,
    script: null,
    user: 'user',
    host: 'vfs',
    logLevel: 'warn'
};

/**
 * Parse YAML config text.
 *
 * @throws VfsError(LoadFailure) for malformed YAML or unknown keys.
 */
export function configText_parse(text: string, origin: string = 'config'): ConfigFile {
    let value: unknown;
    try {
        value = yaml.load(text);
    } catch (error: unknown) {
        throw loadFailure_error(`${origin}: malformed YAML: ${errorMessage_get(error)}`);
    }
    if (value === undefined || value === null) {
        return {};
    }
    const parsed = configFileSchema.safeParse(value);
    if (!parsed.success) {
        const issue: z.ZodIssue = parsed.error.issues[0];
        throw loadFailure_error(`${origin}: ${issue.path.join('.') || '<root>'}: ${issue.message}`);
    }
    return parsed.data;
}

/**
 * Read and parse a YAML config file.
 */
export async function configFile_load(filePath: string): Promise<ConfigFile> {
    let text: string;
    try {
        text = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
        throw loadFailure_error(`cannot read config '${filePath}': ${errorMessage_get(error)}`);
    }
    return configText_parse(text, filePath);
}

export class SettingsService {
    constructor(
        private readonly cli: CliOverrides = {},
        private readonly envVars: EnvSource = process.env,
        private readonly configFile: ConfigFile = {}
    ) {}

    /**
     * Build a service, loading the config file named by `--config` or
     * `VFS_SHELL_CONFIG` when one is given.
     */
    public static async create(cli: CliOverrides = {}, envVars: EnvSource = process.env): Promise<SettingsService> {
        const configPath: string | undefined = cli.config ?? nonEmpty_get(envVars[CONFIG_ENV_KEY]);
        const configFile: ConfigFile = configPath ? await configFile_load(configPath) : {};
        return new SettingsService(cli, envVars, configFile);
    }

    /**
     * Return effective settings.
     */
    public snapshot(): ResolvedSettings {
        return {
            vfs: this.value_resolve('vfs'),
            script: this.value_resolve('script'),
            user: this.value_resolve('user') ?? DEFAULTS.user,
            host: this.value_resolve('host') ?? DEFAULTS.host,
            logLevel: this.logLevel_resolve(),
            env: { ...(this.configFile.env ?? {}) }
        };
    }

    /**
     * Which layer supplied the effective value of `key`.
     */
    public source_get(key: SettingsKey): SettingSource {
        return this.layer_find(key)?.source ?? 'default';
    }

    private value_resolve(key: Exclude<SettingsKey, 'logLevel'>): string | null {
        return this.layer_find(key)?.value ?? DEFAULTS[key];
    }

    private logLevel_resolve(): LogLevel {
        const found: { value: string } | null = this.layer_find('logLevel');
        return found && logLevel_is(found.value) ? found.value : DEFAULTS.logLevel;
    }

    /**
     * First layer holding a usable value. A log level outside
     * `LOG_LEVELS` is not usable and falls through to the next layer.
     */
    private layer_find(key: SettingsKey): { value: string; source: SettingSource } | null {
        const layers: Array<[SettingSource, string | undefined]> = [
            ['cli', nonEmpty_get(this.cli[key])],
            ['env', nonEmpty_get(this.envVars[ENV_KEYS[key]])],
            ['config', nonEmpty_get(this.configFile[key])]
        ];
        for (const [source, value] of layers) {
            if (value === undefined) continue;
            if (key === 'logLevel' && !LOG_LEVELS.some((level: LogLevel): boolean => level === value)) continue;
            return { value, source };
        }
        return null;
    }
}

function nonEmpty_get(value: string | undefined): string | undefined {
    return value && value.trim() ? value : undefined;
}
