import type { DateTime } from 'luxon';
import type { Simplify } from 'type-fest';
import type { ElementContent } from 'xast';

import type { VIDEO_FIELD_NAMES } from './video/fields';

/**
 * Video sitemap metadata model.
 *
 * These types describe the optional `<video:video>` block attached to a
 * sitemap `<url>` entry (Google video sitemap extension).
 *
 * Field names are the XML vocabulary itself: `player_loc` is emitted as
 * `<video:player_loc>`, `view_count` as `<video:view_count>`, and so on.
 */
export type VideoFieldName = (typeof VIDEO_FIELD_NAMES)[number];

/**
 * Stored (validated) value per field.
 *
 * Notes:
 * - Locations are stored as the validated URL string the caller supplied,
 *   not a normalized `URL#href` (normalization is not this package's job).
 * - Dates keep their own UTC offset; that offset is what gets rendered.
 * - `tag` / `category` are list-valued: each entry becomes its own element.
 */
export type VideoAttributeValues = {
  player_loc: string;
  content_loc: string;
  thumbnail_loc: string;
  title: string;
  description: string;
  expiration_date: DateTime;
  duration: number;
  rating: number;
  view_count: number;
  publication_date: DateTime;
  tag: ReadonlyArray<string>;
  category: ReadonlyArray<string>;
  family_friendly: boolean;
};

/**
 * Accepted setter input per field.
 *
 * Inputs are wider than stored values where a conversion is unambiguous:
 * - locations accept `URL` instances (stored by `href`),
 * - dates accept a JS `Date` (read in UTC) or an ISO-8601 string (its
 *   offset is kept; no offset means UTC).
 */
export type VideoAttributeInput = {
  player_loc: string | URL;
  content_loc: string | URL;
  thumbnail_loc: string | URL;
  title: string;
  description: string;
  expiration_date: DateInput;
  duration: number;
  rating: number;
  view_count: number;
  publication_date: DateInput;
  tag: ReadonlyArray<string>;
  category: ReadonlyArray<string>;
  family_friendly: boolean;
};

export type DateInput = DateTime | Date | string;

/**
 * Initializer accepted by `new VideoAttributes(...)` and by the `video`
 * option of `VideoSitemapUrl`. Every field is optional.
 */
export type VideoAttributeInit = Simplify<Partial<VideoAttributeInput>>;

/**
 * A single rendered entry.
 *
 * - `string` / `number`: emitted as a text node and escaped by the XML
 *   serializer.
 * - `ElementContent`: a pre-built xast node used as-is (e.g. a `raw` node
 *   holding pre-escaped text).
 */
export type RenderedEntry = string | number | ElementContent;

/**
 * What a field transform hands back to the fragment builder.
 * A list produces one `<video:field>` element per entry, in list order.
 */
export type RenderedValue = RenderedEntry | ReadonlyArray<RenderedEntry>;

/**
 * Custom encoding rule for one field.
 *
 * Returning `undefined` (or `null`) declines to render: no element is emitted
 * for the field even though it is set.
 */
export type VideoFieldTransform<Field extends VideoFieldName> = (
  value: VideoAttributeValues[Field]
) => RenderedValue | null | undefined;

/**
 * Authored transform map: field name → custom rule.
 *
 * - Missing keys mean “no change” when merged over the built-ins.
 * - An explicit `undefined` removes a built-in rule, so the field falls back
 *   to the default transform.
 */
export type VideoTransformOverrides = {
  [Field in VideoFieldName]?: VideoFieldTransform<Field> | undefined;
};

/**
 * Resolved registry: the built-in rules merged with overrides, frozen once at
 * construction time.
 */
export type VideoTransformRegistry = {
  readonly [Field in VideoFieldName]?: VideoFieldTransform<Field> | undefined;
};

/**
 * Builder configuration.
 */
export type VideoFragmentOptions = {
  /**
   * Overrides the attribute store's own `fieldOrder` for this builder.
   * Unknown names are ignored.
   */
  fieldOrder?: ReadonlyArray<string>;
  /**
   * Field transforms merged over the built-in rules.
   */
  transforms?: VideoTransformOverrides;
};
