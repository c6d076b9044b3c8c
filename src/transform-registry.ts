import type { DateTime } from 'luxon';

import type {
  VideoFieldName,
  VideoFieldTransform,
  VideoTransformOverrides,
  VideoTransformRegistry
} from './types';
import { createPreEscapedText } from './xml/nodes';

/**
 * Formats a date-time as `YYYY-MM-DDTHH:MM:SS±HHMM`.
 *
 * - No fractional seconds.
 * - The offset is always numeric, including `+0000` for UTC (never `Z`).
 * - Latin digits and the Gregorian calendar, whatever the locale settings of
 *   `dateTime` or luxon's defaults.
 */
export function formatW3cDateTime(dateTime: DateTime): string {
  return dateTime
    .reconfigure({
      locale: 'en-US',
      numberingSystem: 'latn',
      outputCalendar: 'gregory'
    })
    .toFormat("yyyy-MM-dd'T'HH:mm:ssZZZ");
}

const renderLocation = (location: string) => createPreEscapedText(location);

/**
 * Built-in field transforms.
 *
 * Only fields whose stored value needs more than "use it as text" appear
 * here; everything else (title, duration, tag lists, ...) goes through the
 * default transform in the fragment builder.
 *
 * - `player_loc` / `content_loc`: entity-encoded up front and emitted as a
 *   pre-escaped `raw` node.
 * - `expiration_date` / `publication_date`: W3C date-time with numeric offset.
 * - `family_friendly`: `Yes` / `No` tokens.
 */
export const builtinVideoTransforms: VideoTransformRegistry = Object.freeze({
  player_loc: renderLocation,
  content_loc: renderLocation,
  expiration_date: formatW3cDateTime,
  publication_date: formatW3cDateTime,
  family_friendly: (familyFriendly: boolean) => (familyFriendly ? 'Yes' : 'No')
});

/**
 * Resolves the field → transform mapping once.
 *
 * Merge rules:
 * - Overrides win over built-ins for the same field.
 * - A key present with value `undefined` removes the built-in rule (the field
 *   then renders through the default transform).
 * - Missing keys leave the built-in rule in place.
 *
 * The result is frozen: builders created from it share it safely.
 *
 * @param overrides - Authored transforms (see `defineVideoTransforms`).
 * @returns The registry consulted by `buildVideoElements`.
 */
export function createVideoTransformRegistry(
  overrides: VideoTransformOverrides = {}
): VideoTransformRegistry {
  return Object.freeze({ ...builtinVideoTransforms, ...overrides });
}

/**
 * Looks up the custom transform for a field.
 *
 * @returns The transform, or `undefined` meaning "use the default transform".
 */
export function resolveVideoTransform<Field extends VideoFieldName>(
  registry: VideoTransformRegistry,
  field: Field
): VideoFieldTransform<Field> | undefined {
  return registry[field];
}
