import { DateTime } from 'luxon';
import { describe, expect, it } from 'vitest';

import { InvalidSitemapUrlError } from '../errors';
import { serializeXml } from '../xml/nodes';
import { SitemapUrl } from './url';

describe('SitemapUrl', () => {
  it('renders only loc by default', () => {
    const url = new SitemapUrl({ loc: 'http://example.com/page' });

    expect(serializeXml(url.toElement())).toBe(
      '<url><loc>http://example.com/page</loc></url>'
    );
  });

  it('renders optional children in schema order', () => {
    const url = new SitemapUrl({
      loc: new URL('http://example.com/page'),
      priority: 0.5,
      changefreq: 'weekly',
      lastmod: '2024-01-15T08:30:00Z'
    });

    expect(serializeXml(url.toElement())).toBe(
      '<url>' +
        '<loc>http://example.com/page</loc>' +
        '<lastmod>2024-01-15T08:30:00+0000</lastmod>' +
        '<changefreq>weekly</changefreq>' +
        '<priority>0.5</priority>' +
        '</url>'
    );
  });

  it('renders a zero priority', () => {
    const url = new SitemapUrl({ loc: 'http://example.com/', priority: 0 });

    expect(serializeXml(url.toElement())).toBe(
      '<url><loc>http://example.com/</loc><priority>0.0</priority></url>'
    );
  });

  it('builds a fresh element on every call', () => {
    const url = new SitemapUrl({ loc: 'http://example.com/page' });

    expect(url.toElement()).not.toBe(url.toElement());
    expect(url.toElement()).toEqual(url.toElement());
  });

  it('renders lastmod independently of the value locale', () => {
    const url = new SitemapUrl({
      loc: 'http://example.com/page',
      lastmod: DateTime.fromISO('2024-01-02T03:04:05+00:00', {
        setZone: true
      }).setLocale('ar-EG')
    });

    expect(serializeXml(url.toElement())).toBe(
      '<url><loc>http://example.com/page</loc>' +
        '<lastmod>2024-01-02T03:04:05+0000</lastmod></url>'
    );
  });

  it('rejects relative locations', () => {
    expect(() => new SitemapUrl({ loc: '/page' })).toThrow(InvalidSitemapUrlError);
  });

  it('rejects priorities outside 0 to 1', () => {
    expect(
      () => new SitemapUrl({ loc: 'http://example.com/', priority: 1.5 })
    ).toThrow('Invalid sitemap URL entry: priority:');
  });
});
