/**
 * `exit` builtin implementation.
 *
 * Signals the driver to end the session; the tree is not touched.
 */

import type { BuiltinCommand } from './types.js';
import { result_ok } from './_shared.js';

export const command: BuiltinCommand = {
    spec: {
        name: 'exit',
        summary: 'end the session',
        flags: [],
        args: []
    },
    create: () => async () => ({ ...result_ok(), terminate: true })
};
