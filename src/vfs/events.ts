/**
 * @file VFS Event Bus
 *
 * Lightweight, type-safe event emitter. Each FileSystemTree owns one bus;
 * the Shell publishes working-directory changes on the same bus so that
 * drivers can observe both through a single subscription point.
 *
 * @module
 */

import type { VfsDirectory } from './nodes.js';

/** All VFS event types. */
export enum Events {
    VFS_CHANGED = 'VFS_CHANGED',
    CWD_CHANGED = 'CWD_CHANGED'
}

/**
 * Payload for VFS_CHANGED events.
 */
export interface VfsChangeEvent {
    path: string;
    operation: 'mkdir' | 'touch' | 'remove' | 'rename' | 'move' | 'copy';
    /** Directory that held (or now holds) the affected node. */
    parent: VfsDirectory;
}

/**
 * Payload for CWD_CHANGED events.
 */
export interface CwdChangeEvent {
    oldPath: string;
    newPath: string;
}

/** Maps each event type to its payload type. */
export interface EventPayloads {
    [Events.VFS_CHANGED]: VfsChangeEvent;
    [Events.CWD_CHANGED]: CwdChangeEvent;
}

type Callback<T> = (payload: T) => void;

type ListenerTable = { [K in Events]: Array<Callback<EventPayloads[K]>> };

/**
 * Simple typed event emitter for publish/subscribe communication
 * between the tree, the shell, and the drivers.
 */
export class EventBus {
    private listeners: ListenerTable = {
        [Events.VFS_CHANGED]: [],
        [Events.CWD_CHANGED]: []
    };

    /**
     * Subscribes a callback to an event.
     *
     * @returns A function that removes the subscription.
     */
    public on<K extends Events>(event: K, callback: Callback<EventPayloads[K]>): () => void {
        const list: Array<Callback<EventPayloads[K]>> = this.listeners[event];
        list.push(callback);
        return (): void => this.off(event, callback);
    }

    /**
     * Unsubscribes a callback from an event.
     */
    public off<K extends Events>(event: K, callback: Callback<EventPayloads[K]>): void {
        const list: Array<Callback<EventPayloads[K]>> = this.listeners[event];
        const index: number = list.indexOf(callback);
        if (index !== -1) {
            list.splice(index, 1);
        }
    }

    /**
     * Emits an event to all registered listeners, in subscription order.
     */
    public emit<K extends Events>(event: K, payload: EventPayloads[K]): void {
        const list: Array<Callback<EventPayloads[K]>> = this.listeners[event];
        for (const callback of [...list]) {
            callback(payload);
        }
    }
}
