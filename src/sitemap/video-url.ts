import type { Simplify } from 'type-fest';
import type { Element } from 'xast';
import { x } from 'xastscript';

import {
  createVideoFragmentBuilder,
  type VideoFragmentBuilder
} from '../fragment-builder';
import type {
  VideoAttributeInit,
  VideoAttributeInput,
  VideoAttributeValues,
  VideoFieldName,
  VideoTransformOverrides
} from '../types';
import { VideoAttributes } from '../video/attributes';
import { VIDEO_CONTAINER_NAME } from '../video/fields';
import { SitemapUrl, type SitemapUrlInit } from './url';

export type VideoSitemapUrlInit = Simplify<
  SitemapUrlInit & {
    /** Initial video metadata. Omit to create the store lazily on first set. */
    video?: VideoAttributeInit;
    /** Emission order of the `<video:*>` children. */
    fieldOrder?: ReadonlyArray<string>;
    /** Field transforms merged over the built-in rules. */
    transforms?: VideoTransformOverrides;
  }
>;

/**
 * Sitemap `<url>` entry that may advertise a video.
 *
 * Serialization extends the base entry:
 * 1) the base `<url>` element is built unchanged,
 * 2) if `hasVideo()` holds, one `<video:video>` container (no attributes)
 *    holding the fragment builder's output is appended as its last child.
 *
 * Without `content_loc` or `player_loc` the output is exactly the base
 * entry; an empty `<video:video>` is never emitted.
 *
 * Example:
 * ```ts
 * const url = new VideoSitemapUrl({
 *   loc: 'http://example.com/watch',
 *   video: {
 *     content_loc: 'http://example.com/video.flv',
 *     player_loc: 'http://example.com/player.swf'
 *   }
 * });
 * url.toElement();
 * ```
 */
export class VideoSitemapUrl extends SitemapUrl {
  private attributes: VideoAttributes | undefined;
  private readonly fieldOrder: ReadonlyArray<string> | undefined;
  private readonly buildVideo: VideoFragmentBuilder;

  constructor({ video, fieldOrder, transforms, ...init }: VideoSitemapUrlInit) {
    super(init);
    this.fieldOrder = fieldOrder;
    this.buildVideo = createVideoFragmentBuilder({ transforms });

    if (video) {
      this.attributes = new VideoAttributes(video, { fieldOrder });
    }
  }

  /**
   * The video metadata store, created on first access.
   */
  get video(): VideoAttributes {
    if (!this.attributes) {
      this.attributes = new VideoAttributes({}, { fieldOrder: this.fieldOrder });
    }
    return this.attributes;
  }

  getVideo<Field extends VideoFieldName>(
    field: Field
  ): VideoAttributeValues[Field] | undefined {
    return this.attributes?.get(field);
  }

  setVideo<Field extends VideoFieldName>(
    field: Field,
    value: VideoAttributeInput[Field]
  ): this {
    this.video.set(field, value);
    return this;
  }

  clearVideo(field: VideoFieldName): this {
    this.attributes?.clear(field);
    return this;
  }

  hasVideo(): boolean {
    return this.attributes?.hasVideo() ?? false;
  }

  /**
   * The `<video:video>` children for the current metadata (empty when the
   * entry has no video).
   */
  buildVideoElements(): Element[] {
    const attributes = this.attributes;
    if (!attributes?.hasVideo()) return [];

    return this.buildVideo(attributes);
  }

  override toElement(): Element {
    const element = super.toElement();
    if (!this.hasVideo()) return element;

    element.children.push(
      x(VIDEO_CONTAINER_NAME, {}, this.buildVideoElements())
    );
    return element;
  }
}
