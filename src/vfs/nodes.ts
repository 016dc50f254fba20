/**
 * @file VFS Node Model
 *
 * Tree elements of the virtual filesystem. A directory owns its children
 * through an insertion-ordered Map; the `parent` field is only a
 * back-reference for upward navigation and is managed exclusively by
 * `VfsDirectory.child_add` / `child_remove`.
 *
 * @module
 */

import {
    VfsError,
    invalidArgument_error,
    invalidOperation_error,
    nameCollision_error
} from './errors.js';

const textDecoder = new TextDecoder('utf-8');
const textEncoder = new TextEncoder();

export type VfsNodeType = 'file' | 'directory';

/**
 * Validate a sibling-unique node name.
 *
 * @param name - Candidate name.
 * @throws VfsError(InvalidArgument) for empty, whitespace-only, `.`/`..` or slash-bearing names.
 */
export function nodeName_validate(name: string): void {
    if (!name || !name.trim()) {
        throw invalidArgument_error('name cannot be empty');
    }
    if (name === '.' || name === '..') {
        throw invalidArgument_error(`'${name}' is a reserved name`);
    }
    if (name.includes('/')) {
        throw invalidArgument_error(`'${name}': name cannot contain '/'`);
    }
}

/**
 * Common capability set of files and directories.
 */
export abstract class VfsNode {
    public abstract readonly type: VfsNodeType;
    private nodeParent: VfsDirectory | null = null;

    protected constructor(private nodeName: string) {}

    public get name(): string {
        return this.nodeName;
    }

    public get parent(): VfsDirectory | null {
        return this.nodeParent;
    }

    /**
     * Absolute path built by walking parent links. The topmost ancestor
     * (the root, or the head of a detached subtree) contributes no segment.
     */
    public path_absolute(): string {
        const segments: string[] = [];
        let current: VfsNode = this;
        while (current.nodeParent) {
            segments.unshift(current.nodeName);
            current = current.nodeParent;
        }
        return '/' + segments.join('/');
    }

    public isDirectory(): this is VfsDirectory {
        return this.type === 'directory';
    }

    public isFile(): this is VfsFile {
        return this.type === 'file';
    }

    /**
     * Deep copy with no parent. The copy shares nothing mutable with the source.
     * `name` replaces the top-level name; descendants keep theirs.
     */
    public abstract clone(name?: string): VfsNode;

    /**
     * Rename a detached node. Attached nodes are renamed through their parent's
     * `child_rename` so the parent's key stays in step.
     *
     * @throws VfsError(InvalidOperation) if the node still has a parent.
     */
    public detached_rename(name: string): void {
        nodeName_validate(name);
        if (this.nodeParent) {
            throw invalidOperation_error(`'${this.nodeName}' is attached to '${this.nodeParent.path_absolute()}'`);
        }
        this.nodeName = name;
    }

    /** @internal used by VfsDirectory to maintain the back-reference. */
    protected static parent_set(node: VfsNode, parent: VfsDirectory | null): void {
        node.nodeParent = parent;
    }

    /** @internal used by VfsDirectory when re-keying a renamed child. */
    protected static name_set(node: VfsNode, name: string): void {
        node.nodeName = name;
    }
}

/**
 * Leaf node holding opaque bytes.
 */
export class VfsFile extends VfsNode {
    public readonly type = 'file' as const;
    private content: Uint8Array;

    constructor(name: string, content: Uint8Array | string = new Uint8Array(0)) {
        super(name);
        this.content = typeof content === 'string' ? textEncoder.encode(content) : content.slice();
    }

    /** Returns a copy of the stored bytes. */
    public content_read(): Uint8Array {
        return this.content.slice();
    }

    /** Replaces the full content. */
    public content_write(content: Uint8Array | string): void {
        this.content = typeof content === 'string' ? textEncoder.encode(content) : content.slice();
    }

    public content_clear(): void {
        this.content = new Uint8Array(0);
    }

    /** UTF-8 view of the content, for the text-oriented builtins. */
    public text_read(): string {
        return textDecoder.decode(this.content);
    }

    public size_get(): number {
        return this.content.byteLength;
    }

    public clone(name: string = this.name): VfsFile {
        return new VfsFile(name, this.content);
    }
}

/**
 * Container node. Children are kept in insertion order for deterministic listing.
 */
export class VfsDirectory extends VfsNode {
    public readonly type = 'directory' as const;
    private readonly children: Map<string, VfsNode> = new Map();

    constructor(name: string) {
        super(name);
    }

    /**
     * Attach a parentless node under its own name.
     *
     * @throws VfsError(NameCollision) if a sibling already uses the name.
     * @throws VfsError(InvalidOperation) if the node is still attached elsewhere.
     */
    public child_add(node: VfsNode): void {
        nodeName_validate(node.name);
        if (node.parent) {
            throw invalidOperation_error(`'${node.name}' is already attached to '${node.parent.path_absolute()}'`);
        }
        if (this.children.has(node.name)) {
            throw nameCollision_error(node.name, this.path_absolute());
        }
        this.children.set(node.name, node);
        VfsNode.parent_set(node, this);
    }

    /**
     * Detach a child and return it. The detached node has no parent afterwards.
     *
     * @throws VfsError(PathNotFound) if no child has that name.
     */
    public child_remove(name: string): VfsNode {
        const child: VfsNode | undefined = this.children.get(name);
        if (!child) {
            throw new VfsError('PathNotFound', `'${name}': No such file or directory in '${this.path_absolute()}'`);
        }
        this.children.delete(name);
        VfsNode.parent_set(child, null);
        return child;
    }

    /**
     * Rename a child in place, keeping its position in the listing order.
     *
     * @throws VfsError(NameCollision) if another child already holds `newName`.
     */
    public child_rename(oldName: string, newName: string): void {
        nodeName_validate(newName);
        const child: VfsNode | undefined = this.children.get(oldName);
        if (!child) {
            throw new VfsError('PathNotFound', `'${oldName}': No such file or directory in '${this.path_absolute()}'`);
        }
        if (oldName === newName) return;
        if (this.children.has(newName)) {
            throw nameCollision_error(newName, this.path_absolute());
        }
        const reordered: Array<[string, VfsNode]> = Array.from(this.children.entries()).map(
            ([key, value]: [string, VfsNode]): [string, VfsNode] => (key === oldName ? [newName, value] : [key, value])
        );
        this.children.clear();
        for (const [key, value] of reordered) {
            this.children.set(key, value);
        }
        VfsNode.name_set(child, newName);
    }

    public child_get(name: string): VfsNode | null {
        return this.children.get(name) ?? null;
    }

    public child_has(name: string): boolean {
        return this.children.has(name);
    }

    public children_list(): VfsNode[] {
        return Array.from(this.children.values());
    }

    public child_count(): number {
        return this.children.size;
    }

    public clone(name: string = this.name): VfsDirectory {
        const copy: VfsDirectory = new VfsDirectory(name);
        for (const child of this.children.values()) {
            copy.child_add(child.clone());
        }
        return copy;
    }
}
