import { stringifyEntities } from 'stringify-entities';
import { is } from 'unist-util-is';
import type { Element, ElementContent, Nodes, Text } from 'xast';
import { toXml } from 'xast-util-to-xml';

import { VIDEO_CONTAINER_NAME } from '../video/fields';

/**
 * `raw` node registered into xast by `xast-util-to-xml`.
 */
export type RawNode = Extract<ElementContent, { type: 'raw' }>;

/**
 * Text node: the serializer escapes `value` on output.
 */
export function createText(value: string): Text {
  return { type: 'text', value };
}

/**
 * Pre-escaped text node.
 *
 * Only markup characters are encoded, as the references XML predefines
 * (`&` → `&amp;`, `<` → `&lt;`, ...); everything else, non-ASCII included,
 * is written as UTF-8. The result is stored in a `raw` node, which
 * `serializeXml` writes verbatim. The serializer does not escape it a
 * second time.
 */
export function createPreEscapedText(value: string): RawNode {
  return {
    type: 'raw',
    value: stringifyEntities(value, {
      escapeOnly: true,
      useNamedReferences: true
    })
  };
}

/**
 * Wraps a single content node in a new element: `<name>{node}</name>`.
 */
export function wrapIn(name: string, node: ElementContent): Element {
  return { type: 'element', name, attributes: {}, children: [node] };
}

/**
 * Type guard: `<video:video>` container element.
 */
export function isVideoContainer(node: unknown): node is Element {
  return is(node, { type: 'element', name: VIDEO_CONTAINER_NAME });
}

/**
 * Serializes a xast tree (or a list of nodes) to XML.
 *
 * `raw` nodes are written as-is: they only ever hold text that was
 * entity-encoded by `createPreEscapedText`.
 */
export function serializeXml(tree: Nodes | Array<Nodes>): string {
  return toXml(tree, { allowDangerousXml: true });
}
