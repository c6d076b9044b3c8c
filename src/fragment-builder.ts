import { DateTime } from 'luxon';
import type { Element, ElementContent } from 'xast';

import { VideoTransformError } from './errors';
import {
  createVideoTransformRegistry,
  resolveVideoTransform
} from './transform-registry';
import type {
  RenderedEntry,
  RenderedValue,
  VideoAttributeValues,
  VideoFieldName,
  VideoFragmentOptions,
  VideoTransformRegistry
} from './types';
import type { VideoAttributes } from './video/attributes';
import { isVideoFieldName, videoElementName } from './video/fields';
import { createText, wrapIn } from './xml/nodes';

/**
 * Builds the `<video:*>` children for one attribute store.
 */
export type VideoFragmentBuilder = (attributes: VideoAttributes) => Element[];

/**
 * Default transform: the stored value itself, as text.
 *
 * Strings, numbers and string lists pass through unchanged. The two stored
 * types without a natural text form only reach this path when their built-in
 * rule was removed by an override:
 * - booleans render as `true` / `false`,
 * - `DateTime`s render as their ISO string.
 */
function renderDefault(
  value: VideoAttributeValues[VideoFieldName]
): RenderedValue {
  if (typeof value === 'boolean') return String(value);
  if (DateTime.isDateTime(value)) return value.toString();
  return value;
}

/**
 * Resolves the rendered value of one set field.
 *
 * Generic over `Field` so the stored value and the field's transform stay
 * correlated (`VideoFieldTransform<Field>` receives
 * `VideoAttributeValues[Field]`).
 *
 * Failure mode:
 * - A throwing custom transform is rethrown as `VideoTransformError` naming
 *   the field; a fragment is never emitted partially.
 */
function renderField<Field extends VideoFieldName>(
  attributes: VideoAttributes,
  registry: VideoTransformRegistry,
  field: Field
): RenderedValue | null | undefined {
  const stored = attributes.get(field);
  if (stored === undefined) return undefined;

  const transform = resolveVideoTransform(registry, field);
  if (!transform) return renderDefault(stored);

  try {
    return transform(stored);
  } catch (error) {
    throw new VideoTransformError(field, error);
  }
}

function isEntryList(
  value: RenderedValue
): value is ReadonlyArray<RenderedEntry> {
  return Array.isArray(value);
}

/**
 * List normalization: scalars become one-element lists, lists are used as-is.
 */
function toEntries(value: RenderedValue): ReadonlyArray<RenderedEntry> {
  return isEntryList(value) ? value : [value];
}

/**
 * Strings and numbers become text nodes (escaped by the serializer);
 * pre-built nodes (e.g. pre-escaped `raw`) are kept.
 */
function toContentNode(entry: RenderedEntry): ElementContent {
  if (typeof entry === 'string') return createText(entry);
  if (typeof entry === 'number') return createText(String(entry));
  return entry;
}

/**
 * Produces the ordered `<video:*>` elements for an attribute store.
 *
 * Algorithm, per name in the field order:
 * 1) Skip names outside the video vocabulary.
 * 2) Skip fields that are not set. Only *unset* suppresses output: `''`,
 *    `0` and `false` are set values and are emitted.
 * 3) Render through the field's custom transform, or the default transform.
 * 4) Skip when the transform declines (`undefined` / `null`).
 * 5) Normalize to a list; an empty list emits nothing.
 * 6) Wrap every entry as `<video:{field}>`.
 *
 * Output order is field order first, then list order within a field.
 * The store is only read: calling this repeatedly on an unchanged store
 * yields structurally identical trees.
 *
 * @param attributes - The store to project.
 * @param registry - Resolved transform registry.
 * @param fieldOrder - Emission order (defaults to the store's own).
 */
export function buildVideoElementsWith(
  attributes: VideoAttributes,
  registry: VideoTransformRegistry,
  fieldOrder: ReadonlyArray<string> = attributes.fieldOrder
): Element[] {
  const elements: Element[] = [];

  for (const name of fieldOrder) {
    // (1) Unknown names degrade to "no element".
    if (!isVideoFieldName(name)) continue;

    // (2) Presence gate.
    if (!attributes.has(name)) continue;

    // (3) + (4)
    const rendered = renderField(attributes, registry, name);
    if (rendered === undefined || rendered === null) continue;

    // (5) + (6)
    const elementName = videoElementName(name);
    for (const entry of toEntries(rendered)) {
      elements.push(wrapIn(elementName, toContentNode(entry)));
    }
  }

  return elements;
}

/**
 * Builder factory: resolves the transform registry once and returns a
 * reusable `build(attributes)` function.
 *
 * Example:
 * ```ts
 * const build = createVideoFragmentBuilder({
 *   transforms: { title: title => title.toUpperCase() }
 * });
 * build(attributes); // [<video:player_loc>…, <video:title>…, …]
 * ```
 */
export function createVideoFragmentBuilder(
  options: VideoFragmentOptions = {}
): VideoFragmentBuilder {
  const registry = createVideoTransformRegistry(options.transforms);
  const { fieldOrder } = options;

  return attributes => buildVideoElementsWith(attributes, registry, fieldOrder);
}

/**
 * One-shot form of `createVideoFragmentBuilder(options)(attributes)`.
 */
export function buildVideoElements(
  attributes: VideoAttributes,
  options: VideoFragmentOptions = {}
): Element[] {
  return createVideoFragmentBuilder(options)(attributes);
}
