import { visit, EXIT } from 'unist-util-visit';
import type { Element, Root } from 'xast';
import { x } from 'xastscript';

import { isVideoContainer, serializeXml } from '../xml/nodes';
import type { SitemapUrl } from './url';

export const SITEMAP_NAMESPACE = 'http://www.sitemaps.org/schemas/sitemap/0.9';

export const VIDEO_SITEMAP_NAMESPACE =
  'http://www.google.com/schemas/sitemap-video/1.1';

/**
 * True when any `<video:video>` container occurs below `tree`.
 */
export function containsVideo(tree: Element | Root): boolean {
  let found = false;

  visit(tree, isVideoContainer, () => {
    found = true;
    return EXIT;
  });

  return found;
}

/**
 * Assembles a `<urlset>` document for the given entries.
 *
 * - Entries keep their order.
 * - `xmlns:video` is declared only when some entry emitted a
 *   `<video:video>` container.
 */
export function buildUrlset(urls: ReadonlyArray<SitemapUrl>): Root {
  const urlset = x(
    'urlset',
    { xmlns: SITEMAP_NAMESPACE },
    urls.map(url => url.toElement())
  );

  if (containsVideo(urlset)) {
    urlset.attributes['xmlns:video'] = VIDEO_SITEMAP_NAMESPACE;
  }

  return {
    type: 'root',
    children: [
      { type: 'instruction', name: 'xml', value: 'version="1.0" encoding="UTF-8"' },
      urlset
    ]
  };
}

/**
 * Serializes a complete sitemap document.
 */
export function toSitemapXml(urls: ReadonlyArray<SitemapUrl>): string {
  return serializeXml(buildUrlset(urls));
}
