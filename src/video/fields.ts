import type { VideoFieldName } from '../types';

/**
 * Video sitemap field vocabulary, in default emission order.
 *
 * The order matters: it is the default `fieldOrder` of every attribute store
 * and therefore the order of the `<video:*>` children in the output.
 */
export const VIDEO_FIELD_NAMES = [
  'player_loc',
  'content_loc',
  'thumbnail_loc',
  'title',
  'description',
  'expiration_date',
  'duration',
  'rating',
  'view_count',
  'publication_date',
  'tag',
  'category',
  'family_friendly'
] as const;

export const DEFAULT_VIDEO_FIELD_ORDER: ReadonlyArray<VideoFieldName> =
  VIDEO_FIELD_NAMES;

/**
 * Namespace prefix reserved by the video sitemap schema.
 */
export const VIDEO_PREFIX = 'video';

export const VIDEO_CONTAINER_NAME = `${VIDEO_PREFIX}:video`;

const knownFieldNames: ReadonlySet<string> = new Set(VIDEO_FIELD_NAMES);

/**
 * Type guard: narrows an arbitrary (configured) field name to the vocabulary.
 */
export function isVideoFieldName(name: string): name is VideoFieldName {
  return knownFieldNames.has(name);
}

export function videoElementName(field: VideoFieldName): string {
  return `${VIDEO_PREFIX}:${field}`;
}
