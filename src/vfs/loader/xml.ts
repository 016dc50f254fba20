/**
 * @file XML Source Parser
 *
 * Reads the XML filesystem format into a TreeDescription:
 *
 * ```xml
 * <filesystem>
 *   <folder name="home">
 *     <file name="hello.txt" content="SGVsbG8gV29ybGQh"/>
 *   </folder>
 * </filesystem>
 * ```
 *
 * Document order is kept. Entries without a usable `name` are skipped;
 * every element other than `folder` is read as a file.
 *
 * @module
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { TreeDescription } from './description.js';
import { loadFailure_error } from '../errors.js';

interface XmlElement {
    tag: string;
    attributes: Record<string, unknown>;
    children: unknown[];
}

const ATTRIBUTES_KEY: string = ':@';

const parser: XMLParser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseAttributeValue: false
});

/**
 * Parse an XML document into a description rooted at `/`.
 *
 * @throws VfsError(LoadFailure) for malformed XML or a document without a root element.
 */
export function xml_parse(text: string): TreeDescription {
    const validation = XMLValidator.validate(text);
    if (validation !== true) {
        throw loadFailure_error(`malformed XML at line ${validation.err.line}: ${validation.err.msg}`);
    }

    const parsed: unknown = parser.parse(text);
    const root: XmlElement | undefined = elements_read(parsed)[0];
    if (!root) {
        throw loadFailure_error('XML document has no root element');
    }
    return { type: 'directory', name: '/', children: entries_read(root.children) };
}

function entries_read(nodes: unknown[]): TreeDescription[] {
    const entries: TreeDescription[] = [];
    for (const element of elements_read(nodes)) {
        const name: unknown = element.attributes.name;
        if (typeof name !== 'string' || !name.trim()) continue;
        if (element.tag === 'folder') {
            entries.push({ type: 'directory', name, children: entries_read(element.children) });
        } else {
            const content: unknown = element.attributes.content;
            entries.push({ type: 'file', name, content: typeof content === 'string' ? content : '' });
        }
    }
    return entries;
}

function elements_read(value: unknown): XmlElement[] {
    if (!Array.isArray(value)) return [];
    const elements: XmlElement[] = [];
    for (const node of value) {
        const element: XmlElement | null = element_read(node);
        if (element) elements.push(element);
    }
    return elements;
}

function element_read(node: unknown): XmlElement | null {
    if (!record_is(node)) return null;
    const tag: string | undefined = Object.keys(node).find((key: string): boolean => key !== ATTRIBUTES_KEY);
    if (!tag || tag.startsWith('#') || tag.startsWith('?')) return null;
    const attributes: unknown = node[ATTRIBUTES_KEY];
    const children: unknown = node[tag];
    return {
        tag,
        attributes: record_is(attributes) ? attributes : {},
        children: Array.isArray(children) ? children : []
    };
}

function record_is(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
