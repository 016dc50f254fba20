/**
 * @file Source Loading
 *
 * Host-side reads: the filesystem source document (XML, JSON or YAML,
 * chosen by extension) and script files.
 *
 * @module
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import type { FileSystemTree } from '../FileSystemTree.js';
import type { TreeDescription } from './description.js';
import { tree_build, treeDescription_parse } from './description.js';
import { xml_parse } from './xml.js';
import { loadFailure_error } from '../errors.js';
import { errorMessage_get } from '../commands/_shared.js';
import { rootLogger } from '../../core/logger.js';
import type { Logger } from '../../core/logger.js';

export type SourceFormat = 'xml' | 'json' | 'yaml';

/**
 * Source format implied by a file extension; XML unless JSON or YAML.
 */
export function sourceFormat_detect(filePath: string): SourceFormat {
    const ext: string = path.extname(filePath).toLowerCase();
    if (ext === '.json') return 'json';
    if (ext === '.yaml' || ext === '.yml') return 'yaml';
    return 'xml';
}

/**
 * Parse source text of a given format into a tree description.
 *
 * @throws VfsError(LoadFailure)
 */
export function sourceText_parse(text: string, format: SourceFormat): TreeDescription {
    if (format === 'xml') {
        return xml_parse(text);
    }
    let value: unknown;
    try {
        value = format === 'json' ? JSON.parse(text) : yaml.load(text);
    } catch (error: unknown) {
        throw loadFailure_error(`malformed ${format.toUpperCase()}: ${errorMessage_get(error)}`);
    }
    return treeDescription_parse(value);
}

/**
 * Read and build the tree stored at `filePath`.
 *
 * @throws VfsError(LoadFailure) if the file cannot be read or parsed.
 */
export async function source_load(filePath: string, logger: Logger = rootLogger.child('loader')): Promise<FileSystemTree> {
    let text: string;
    try {
        text = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
        throw loadFailure_error(`cannot read '${filePath}': ${errorMessage_get(error)}`);
    }
    const format: SourceFormat = sourceFormat_detect(filePath);
    const tree: FileSystemTree = tree_build(sourceText_parse(text, format));
    logger.info(`loaded ${format} source ${filePath} (${tree.node_count()} nodes)`);
    return tree;
}

/**
 * Read a script file as lines. Read errors propagate unchanged.
 */
export async function scriptLines_read(filePath: string): Promise<string[]> {
    const text: string = await fs.promises.readFile(filePath, 'utf-8');
    return text.split(/\r?\n/);
}
