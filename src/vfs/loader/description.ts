/**
 * @file Tree Description
 *
 * Format-neutral description of a filesystem tree, its zod schema, and
 * the builder that turns a description into a FileSystemTree. File
 * content travels as base64; text that is not valid base64 is kept as its
 * raw UTF-8 bytes. Files hold opaque bytes, so text that happens to be
 * valid base64 (`test`, `abcd`) is decoded even when the result is not
 * UTF-8; write such content base64-encoded.
 *
 * @module
 */

import { z } from 'zod';
import { FileSystemTree } from '../FileSystemTree.js';
import { VfsDirectory, VfsFile } from '../nodes.js';
import { loadFailure_error, vfsError_is } from '../errors.js';
import { errorMessage_get } from '../commands/_shared.js';

export interface FileDescription {
    type: 'file';
    name: string;
    /** Base64-encoded bytes. */
    content: string;
}

export interface DirectoryDescription {
    type: 'directory';
    name: string;
    children: TreeDescription[];
}

export type TreeDescription = FileDescription | DirectoryDescription;

const fileDescriptionSchema = z.object({
    type: z.literal('file'),
    name: z.string(),
    content: z.string()
});

export const treeDescriptionSchema: z.ZodType<TreeDescription> = z.lazy(() =>
    z.discriminatedUnion('type', [
        fileDescriptionSchema,
        z.object({
            type: z.literal('directory'),
            name: z.string(),
            children: z.array(treeDescriptionSchema)
        })
    ])
);

const BASE64_PATTERN: RegExp = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Validate an untyped value (parsed JSON or YAML) as a tree description.
 *
 * @throws VfsError(LoadFailure) listing the first schema issues.
 */
export function treeDescription_parse(value: unknown): TreeDescription {
    const parsed = treeDescriptionSchema.safeParse(value);
    if (!parsed.success) {
        const issues: string = parsed.error.issues
            .slice(0, 3)
            .map((issue: z.ZodIssue): string => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw loadFailure_error(`invalid tree description: ${issues}`);
    }
    return parsed.data;
}

/**
 * Decode base64 file content; anything that is not strict base64 is kept
 * as its UTF-8 bytes. Decoded bytes are not checked for UTF-8.
 */
export function content_decode(content: string): Uint8Array {
    const compact: string = content.replace(/\s+/g, '');
    if (compact.length % 4 === 0 && BASE64_PATTERN.test(compact)) {
        return new Uint8Array(Buffer.from(compact, 'base64'));
    }
    return new TextEncoder().encode(content);
}

/**
 * Encode bytes for a description's `content` field.
 */
export function content_encode(content: Uint8Array | string): string {
    return Buffer.from(typeof content === 'string' ? new TextEncoder().encode(content) : content).toString('base64');
}

/**
 * Build a tree from a description. The top-level entry must be a
 * directory; it becomes the root and its own name is ignored.
 *
 * @throws VfsError(LoadFailure) for a file at the top, duplicate sibling
 *   names, or names that cannot be used in the tree.
 */
export function tree_build(description: TreeDescription): FileSystemTree {
    if (description.type !== 'directory') {
        throw loadFailure_error(`top-level entry '${description.name}' must be a directory`);
    }
    const tree: FileSystemTree = new FileSystemTree();
    children_attach(tree.root, description.children);
    return tree;
}

function children_attach(dir: VfsDirectory, children: TreeDescription[]): void {
    for (const entry of children) {
        if (dir.child_has(entry.name)) {
            throw loadFailure_error(`duplicate entry '${entry.name}' in '${dir.path_absolute()}'`);
        }
        let node: VfsDirectory | VfsFile;
        try {
            node = entry.type === 'directory' ? new VfsDirectory(entry.name) : new VfsFile(entry.name, content_decode(entry.content));
            dir.child_add(node);
        } catch (error: unknown) {
            if (!vfsError_is(error)) throw error;
            throw loadFailure_error(`bad entry in '${dir.path_absolute()}': ${errorMessage_get(error)}`);
        }
        if (node.isDirectory() && entry.type === 'directory') {
            children_attach(node, entry.children);
        }
    }
}
