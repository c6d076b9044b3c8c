export type {
  DateInput,
  RenderedEntry,
  RenderedValue,
  VideoAttributeInit,
  VideoAttributeInput,
  VideoAttributeValues,
  VideoFieldName,
  VideoFieldTransform,
  VideoFragmentOptions,
  VideoTransformOverrides,
  VideoTransformRegistry
} from './types';

export {
  DEFAULT_VIDEO_FIELD_ORDER,
  VIDEO_CONTAINER_NAME,
  VIDEO_FIELD_NAMES,
  isVideoFieldName,
  videoElementName
} from './video/fields';
export { VideoAttributes, type VideoAttributesOptions } from './video/attributes';

export {
  builtinVideoTransforms,
  createVideoTransformRegistry,
  formatW3cDateTime,
  resolveVideoTransform
} from './transform-registry';
export {
  buildVideoElements,
  buildVideoElementsWith,
  createVideoFragmentBuilder,
  type VideoFragmentBuilder
} from './fragment-builder';
export { defineVideoTransforms } from './authoring/operations';

export {
  CHANGE_FREQUENCIES,
  SitemapUrl,
  type ChangeFrequency,
  type SitemapUrlInit
} from './sitemap/url';
export { VideoSitemapUrl, type VideoSitemapUrlInit } from './sitemap/video-url';
export {
  SITEMAP_NAMESPACE,
  VIDEO_SITEMAP_NAMESPACE,
  buildUrlset,
  containsVideo,
  toSitemapXml
} from './sitemap/urlset';

export {
  createPreEscapedText,
  isVideoContainer,
  serializeXml,
  type RawNode
} from './xml/nodes';

export {
  InvalidSitemapUrlError,
  InvalidVideoValueError,
  SitemapError,
  VideoTransformError,
  isSitemapError
} from './errors';
