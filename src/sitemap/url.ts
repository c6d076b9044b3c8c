import type { DateTime } from 'luxon';
import type { Element } from 'xast';
import { x } from 'xastscript';
import { z } from 'zod';

import { InvalidSitemapUrlError } from '../errors';
import { formatW3cDateTime } from '../transform-registry';
import type { DateInput } from '../types';
import { dateTimeSchema, describeIssues, locationSchema } from '../validation';

export const CHANGE_FREQUENCIES = [
  'always',
  'hourly',
  'daily',
  'weekly',
  'monthly',
  'yearly',
  'never'
] as const;

export type ChangeFrequency = (typeof CHANGE_FREQUENCIES)[number];

export type SitemapUrlInit = {
  loc: string | URL;
  lastmod?: DateInput;
  changefreq?: ChangeFrequency;
  /** Relative priority in `[0, 1]`. */
  priority?: number;
};

const sitemapUrlSchema = z.object({
  loc: locationSchema,
  lastmod: dateTimeSchema.optional(),
  changefreq: z.enum(CHANGE_FREQUENCIES).optional(),
  priority: z.number().min(0).max(1).optional()
});

/**
 * A single `<url>` entry of a sitemap.
 *
 * Subclasses extend `toElement()` (call `super.toElement()` and add children)
 * rather than replacing it.
 */
export class SitemapUrl {
  readonly loc: string;
  readonly lastmod?: DateTime;
  readonly changefreq?: ChangeFrequency;
  readonly priority?: number;

  constructor(init: SitemapUrlInit) {
    const result = sitemapUrlSchema.safeParse(init);
    if (!result.success) {
      throw new InvalidSitemapUrlError(describeIssues(result.error));
    }

    const { loc, lastmod, changefreq, priority } = result.data;
    this.loc = loc;
    this.lastmod = lastmod;
    this.changefreq = changefreq;
    this.priority = priority;
  }

  /**
   * `<url><loc/>[<lastmod/>][<changefreq/>][<priority/>]</url>`
   */
  toElement(): Element {
    const children: Element[] = [x('loc', {}, this.loc)];

    if (this.lastmod) {
      children.push(x('lastmod', {}, formatW3cDateTime(this.lastmod)));
    }
    if (this.changefreq) {
      children.push(x('changefreq', {}, this.changefreq));
    }
    if (this.priority !== undefined) {
      children.push(x('priority', {}, this.priority.toFixed(1)));
    }

    return x('url', {}, children);
  }
}
