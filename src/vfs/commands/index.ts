import type { BuiltinCommand, HostDeps } from './types.js';
import { CommandRegistry } from './registry.js';
import { command as ls } from './ls.js';
import { command as cd } from './cd.js';
import { command as pwd } from './pwd.js';
import { command as cat } from './cat.js';
import { command as head } from './head.js';
import { command as tac } from './tac.js';
import { command as wc } from './wc.js';
import { command as rm } from './rm.js';
import { command as mkdir } from './mkdir.js';
import { command as touch } from './touch.js';
import { command as mv } from './mv.js';
import { command as cp } from './cp.js';
import { command as tree } from './tree.js';
import { command as env } from './env.js';
import { command as exportCommand } from './export.js';
import { command as help } from './help.js';
import { command as sc } from './sc.js';
import { command as exit } from './exit.js';

export const BUILTIN_COMMANDS: readonly BuiltinCommand[] = [
    ls,
    cd,
    pwd,
    cat,
    head,
    tac,
    wc,
    rm,
    mkdir,
    touch,
    mv,
    cp,
    tree,
    env,
    exportCommand,
    help,
    sc,
    exit
];

/**
 * Build the builtin command registry for shell dispatch.
 *
 * @param host - Host-side dependencies injected into each builtin factory.
 * @param commands - Builtins to register, in listing order.
 * @returns Populated registry.
 */
export function registry_create(
    host: HostDeps,
    commands: readonly BuiltinCommand[] = BUILTIN_COMMANDS
): CommandRegistry {
    const registry: CommandRegistry = new CommandRegistry(host);
    for (const command of commands) {
        registry.command_register(command);
    }
    return registry;
}
