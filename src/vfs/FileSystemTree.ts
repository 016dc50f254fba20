/**
 * @file FileSystemTree: Core VFS Component
 *
 * Owns the root directory of an in-memory filesystem and implements path
 * resolution, lookup, insertion, removal, rename, move and deep clone.
 * The tree never tracks a working directory: callers pass the directory
 * relative paths start from, which is how the Shell keeps `cwd` as
 * session state.
 *
 * All methods follow the RPN naming convention: <subject>_<verb>.
 *
 * @module
 */

import { EventBus, Events } from './events.js';
import type { VfsChangeEvent } from './events.js';
import { VfsDirectory, VfsFile, nodeName_validate } from './nodes.js';
import type { VfsNode } from './nodes.js';
import {
    invalidOperation_error,
    isADirectory_error,
    nameCollision_error,
    notADirectory_error,
    pathNotFound_error,
    vfsError_is
} from './errors.js';

/**
 * Result of splitting a path into its existing parent and final name.
 */
export interface PathTarget {
    parent: VfsDirectory;
    name: string;
}

/**
 * In-memory tree with a single root.
 *
 * @example
 * ```typescript
 * const tree = new FileSystemTree();
 * const home = tree.dir_create('/home', tree.root);
 * tree.file_create('notes.txt', home);
 * tree.dir_list(home).map((n) => n.name); // ['notes.txt']
 * ```
 */
export class FileSystemTree {
    public readonly root: VfsDirectory;
    public readonly events: EventBus = new EventBus();

    constructor(root: VfsDirectory = new VfsDirectory('/')) {
        if (root.parent) {
            throw invalidOperation_error('tree root cannot have a parent');
        }
        this.root = root;
    }

    // ─── Path Resolution ────────────────────────────────────────

    /**
     * Resolves a path to a node.
     *
     * @param path - Absolute (leading `/`) or relative path; `.` and `..` allowed.
     * @param from - Directory that relative paths start from.
     * @throws VfsError(PathNotFound) if any segment is missing.
     * @throws VfsError(NotADirectory) if a non-terminal segment is a file,
     *   or the path ends in `/` and names a file.
     */
    public node_resolve(path: string, from: VfsDirectory = this.root): VfsNode {
        let current: VfsNode = path.startsWith('/') ? this.root : from;
        const segments: string[] = path.split('/').filter(Boolean);

        for (let i = 0; i < segments.length; i++) {
            const seg: string = segments[i];
            if (!current.isDirectory()) {
                throw notADirectory_error(path_join(segments.slice(0, i), path.startsWith('/')));
            }
            if (seg === '.') continue;
            if (seg === '..') {
                current = current.parent ?? current;
                continue;
            }
            const child: VfsNode | null = current.child_get(seg);
            if (!child) {
                throw pathNotFound_error(path);
            }
            current = child;
        }

        if (path.endsWith('/') && !current.isDirectory()) {
            throw notADirectory_error(path);
        }
        return current;
    }

    /**
     * Like `node_resolve`, but a missing target yields `null`.
     * Other resolution failures still throw.
     */
    public node_find(path: string, from: VfsDirectory = this.root): VfsNode | null {
        try {
            return this.node_resolve(path, from);
        } catch (error: unknown) {
            if (vfsError_is(error) && error.kind === 'PathNotFound') {
                return null;
            }
            throw error;
        }
    }

    /**
     * Resolves a path that must name a directory.
     *
     * @throws VfsError(NotADirectory) if the target is a file.
     */
    public dir_change(path: string, from: VfsDirectory = this.root): VfsDirectory {
        const node: VfsNode = this.node_resolve(path, from);
        if (!node.isDirectory()) {
            throw notADirectory_error(path);
        }
        return node;
    }

    /**
     * Resolves a path that must name a file.
     *
     * @throws VfsError(IsADirectory) if the target is a directory.
     */
    public file_resolve(path: string, from: VfsDirectory = this.root): VfsFile {
        const node: VfsNode = this.node_resolve(path, from);
        if (!node.isFile()) {
            throw isADirectory_error(path);
        }
        return node;
    }

    /**
     * Splits a path into its (existing) parent directory and final segment.
     * The final segment itself does not need to exist.
     */
    public target_resolve(path: string, from: VfsDirectory = this.root): PathTarget {
        const trimmed: string = path.replace(/\/+$/, '');
        const slash: number = trimmed.lastIndexOf('/');
        const name: string = slash === -1 ? trimmed : trimmed.slice(slash + 1);
        const parentPath: string = slash === -1 ? '.' : slash === 0 ? '/' : trimmed.slice(0, slash);
        nodeName_validate(name);
        return { parent: this.dir_change(parentPath, from), name };
    }

    // ─── Queries ────────────────────────────────────────────────

    /**
     * Children of a directory in insertion order. Empty directory → [].
     */
    public dir_list(dir: VfsDirectory): VfsNode[] {
        return dir.children_list();
    }

    /**
     * Whether a node is still reachable from this tree's root.
     */
    public node_isAttached(node: VfsNode): boolean {
        let current: VfsNode = node;
        while (current.parent) {
            current = current.parent;
        }
        return current === this.root;
    }

    /**
     * Counts every node in the tree, root included.
     */
    public node_count(): number {
        const count_walk = (dir: VfsDirectory): number =>
            dir.children_list().reduce(
                (total: number, child: VfsNode): number => total + (child.isDirectory() ? count_walk(child) : 1),
                1
            );
        return count_walk(this.root);
    }

    // ─── Mutation ───────────────────────────────────────────────

    /**
     * Creates a directory. With `parents`, missing intermediate directories
     * are created and an existing directory at the target is accepted.
     *
     * @throws VfsError(NameCollision) if the name is already taken.
     */
    public dir_create(path: string, from: VfsDirectory = this.root, parents: boolean = false): VfsDirectory {
        if (parents) {
            return this.dirChain_create(path, from);
        }
        const target: PathTarget = this.target_resolve(path, from);
        if (target.parent.child_has(target.name)) {
            throw nameCollision_error(target.name, target.parent.path_absolute());
        }
        const dir: VfsDirectory = new VfsDirectory(target.name);
        target.parent.child_add(dir);
        this.event_emit(dir.path_absolute(), 'mkdir', target.parent);
        return dir;
    }

    /**
     * Creates an empty file, or returns the existing node at that path.
     */
    public file_create(path: string, from: VfsDirectory = this.root): VfsNode {
        const target: PathTarget = this.target_resolve(path, from);
        const existing: VfsNode | null = target.parent.child_get(target.name);
        if (existing) {
            return existing;
        }
        const file: VfsFile = new VfsFile(target.name);
        target.parent.child_add(file);
        this.event_emit(file.path_absolute(), 'touch', target.parent);
        return file;
    }

    /**
     * Detaches the node at `path` together with its subtree.
     *
     * @throws VfsError(PathNotFound) if the path does not resolve.
     * @throws VfsError(InvalidOperation) if the path resolves to the root.
     */
    public node_remove(path: string, from: VfsDirectory = this.root): VfsNode {
        const node: VfsNode = this.node_resolve(path, from);
        return this.node_detach(node);
    }

    /**
     * Detaches an already-resolved node.
     */
    public node_detach(node: VfsNode): VfsNode {
        const parent: VfsDirectory | null = node.parent;
        if (node === this.root || !parent) {
            throw invalidOperation_error('cannot remove root directory');
        }
        const removedPath: string = node.path_absolute();
        parent.child_remove(node.name);
        this.event_emit(removedPath, 'remove', parent);
        return node;
    }

    /**
     * Renames a node within its parent.
     *
     * @throws VfsError(NameCollision) if a sibling already has `newName`.
     */
    public node_rename(node: VfsNode, newName: string): void {
        const parent: VfsDirectory | null = node.parent;
        if (!parent) {
            throw invalidOperation_error('cannot rename root directory');
        }
        parent.child_rename(node.name, newName);
        this.event_emit(node.path_absolute(), 'rename', parent);
    }

    /**
     * Moves a node under `newParent`, optionally renaming it.
     *
     * @throws VfsError(InvalidOperation) for the root, or a directory moved into its own subtree.
     * @throws VfsError(NameCollision) if the destination name is taken.
     */
    public node_move(node: VfsNode, newParent: VfsDirectory, newName: string = node.name): void {
        if (!node.parent) {
            throw invalidOperation_error('cannot move root directory');
        }
        if (node.isDirectory() && subtree_contains(node, newParent)) {
            throw invalidOperation_error(`cannot move '${node.path_absolute()}' into itself`);
        }
        nodeName_validate(newName);
        if (newParent === node.parent && newName === node.name) {
            return;
        }
        if (newParent.child_has(newName)) {
            throw nameCollision_error(newName, newParent.path_absolute());
        }

        node.parent.child_remove(node.name);
        node.detached_rename(newName);
        newParent.child_add(node);
        this.event_emit(node.path_absolute(), 'move', newParent);
    }

    /**
     * Deep-copies a node and inserts the copy under `newParent`.
     * The copy is fully built before insertion, so copying a directory
     * into its own subtree terminates.
     *
     * @throws VfsError(NameCollision) if the destination name is taken.
     */
    public node_clone(node: VfsNode, newParent: VfsDirectory, newName: string = node.name): VfsNode {
        nodeName_validate(newName);
        if (newParent.child_has(newName)) {
            throw nameCollision_error(newName, newParent.path_absolute());
        }
        const copy: VfsNode = node.clone(newName);
        newParent.child_add(copy);
        this.event_emit(copy.path_absolute(), 'copy', newParent);
        return copy;
    }

    // ─── Rendering ──────────────────────────────────────────────

    /**
     * Renders a subtree: directories first, then files, each sorted by name,
     * two spaces of indentation per level, directories suffixed with '/'.
     */
    public tree_render(dir: VfsDirectory, indent: number = 2): string {
        const lines: string[] = [];
        const subtree_render = (current: VfsDirectory, level: number): void => {
            const prefix: string = ' '.repeat(indent * level);
            lines.push(current === this.root ? '/' : `${prefix}${current.name}/`);
            const sorted: VfsNode[] = current.children_list().slice().sort((a: VfsNode, b: VfsNode): number => {
                if (a.type !== b.type) return a.isDirectory() ? -1 : 1;
                return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
            });
            for (const child of sorted) {
                if (child.isDirectory()) {
                    subtree_render(child, level + 1);
                } else {
                    lines.push(`${' '.repeat(indent * (level + 1))}${child.name}`);
                }
            }
        };
        subtree_render(dir, 0);
        return lines.join('\n');
    }

    // ─── Internal Helpers ───────────────────────────────────────

    private dirChain_create(path: string, from: VfsDirectory): VfsDirectory {
        let current: VfsDirectory = path.startsWith('/') ? this.root : from;
        for (const seg of path.split('/').filter(Boolean)) {
            if (seg === '.') continue;
            if (seg === '..') {
                current = current.parent ?? current;
                continue;
            }
            const existing: VfsNode | null = current.child_get(seg);
            if (existing) {
                if (!existing.isDirectory()) {
                    throw notADirectory_error(existing.path_absolute());
                }
                current = existing;
                continue;
            }
            const created: VfsDirectory = new VfsDirectory(seg);
            current.child_add(created);
            this.event_emit(created.path_absolute(), 'mkdir', current);
            current = created;
        }
        return current;
    }

    private event_emit(path: string, operation: VfsChangeEvent['operation'], parent: VfsDirectory): void {
        this.events.emit(Events.VFS_CHANGED, { path, operation, parent });
    }
}

// ─── Pure Helper Functions ──────────────────────────────────────

/**
 * Whether `candidate` is `dir` itself or lies anywhere below it.
 */
function subtree_contains(dir: VfsDirectory, candidate: VfsNode): boolean {
    let current: VfsNode | null = candidate;
    while (current) {
        if (current === dir) return true;
        current = current.parent;
    }
    return false;
}

function path_join(segments: string[], absolute: boolean): string {
    const joined: string = segments.join('/');
    return absolute ? `/${joined}` : joined;
}
