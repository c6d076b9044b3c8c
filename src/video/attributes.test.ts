import { DateTime } from 'luxon';
import { describe, expect, it } from 'vitest';

import { InvalidVideoValueError } from '../errors';
import { VideoAttributes } from './attributes';
import { DEFAULT_VIDEO_FIELD_ORDER } from './fields';

describe('VideoAttributes', () => {
  it('starts with only family_friendly present', () => {
    const attributes = new VideoAttributes();

    expect(attributes.has('title')).toBe(false);
    expect(attributes.has('player_loc')).toBe(false);
    expect(attributes.has('family_friendly')).toBe(true);
    expect(attributes.get('family_friendly')).toBe(true);
    expect(attributes.get('title')).toBeUndefined();
  });

  it('uses the default field order', () => {
    expect(new VideoAttributes().fieldOrder).toEqual([
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
    ]);
    expect(DEFAULT_VIDEO_FIELD_ORDER).toHaveLength(13);
  });

  it('tracks presence separately from falsy values', () => {
    const attributes = new VideoAttributes({ title: '', view_count: 0, tag: [] });

    expect(attributes.has('title')).toBe(true);
    expect(attributes.get('title')).toBe('');
    expect(attributes.has('view_count')).toBe(true);
    expect(attributes.get('view_count')).toBe(0);
    expect(attributes.has('tag')).toBe(true);
    expect(attributes.get('tag')).toEqual([]);
  });

  it('skips undefined initializer values', () => {
    const attributes = new VideoAttributes({ title: undefined });

    expect(attributes.has('title')).toBe(false);
  });

  it('clears individual fields', () => {
    const attributes = new VideoAttributes({
      title: 'Grilling steaks',
      duration: 600
    });

    attributes.clear('title');

    expect(attributes.has('title')).toBe(false);
    expect(attributes.get('duration')).toBe(600);
  });

  it('restores the family_friendly default on clear', () => {
    const attributes = new VideoAttributes({ family_friendly: false });
    expect(attributes.get('family_friendly')).toBe(false);

    attributes.clear('family_friendly');

    expect(attributes.has('family_friendly')).toBe(true);
    expect(attributes.get('family_friendly')).toBe(true);
  });

  describe('hasVideo', () => {
    it('is false without content_loc and player_loc', () => {
      const attributes = new VideoAttributes({
        title: 'Grilling steaks',
        thumbnail_loc: 'http://example.com/thumb.jpg'
      });

      expect(attributes.hasVideo()).toBe(false);
    });

    it('is true with only content_loc', () => {
      const attributes = new VideoAttributes({
        content_loc: 'http://example.com/video.flv'
      });

      expect(attributes.hasVideo()).toBe(true);
    });

    it('is true with only player_loc', () => {
      const attributes = new VideoAttributes().set(
        'player_loc',
        'http://example.com/player.swf'
      );

      expect(attributes.hasVideo()).toBe(true);
    });

    it('turns false again once both locations are cleared', () => {
      const attributes = new VideoAttributes({
        content_loc: 'http://example.com/video.flv',
        player_loc: 'http://example.com/player.swf'
      });

      attributes.clear('content_loc').clear('player_loc');

      expect(attributes.hasVideo()).toBe(false);
    });
  });

  describe('setters', () => {
    it('stores URL instances by href', () => {
      const attributes = new VideoAttributes().set(
        'content_loc',
        new URL('http://example.com/video.flv')
      );

      expect(attributes.get('content_loc')).toBe('http://example.com/video.flv');
    });

    it('keeps location strings as given', () => {
      const attributes = new VideoAttributes().set(
        'player_loc',
        'http://example.com'
      );

      expect(attributes.get('player_loc')).toBe('http://example.com');
    });

    it('rejects relative locations', () => {
      const attributes = new VideoAttributes();

      expect(() => attributes.set('player_loc', '/player.swf')).toThrow(
        InvalidVideoValueError
      );
      expect(() => attributes.set('player_loc', '/player.swf')).toThrow(
        'Invalid value for video field "player_loc"'
      );
      expect(attributes.has('player_loc')).toBe(false);
    });

    it('rejects negative and fractional counts', () => {
      const attributes = new VideoAttributes();

      expect(() => attributes.set('duration', -1)).toThrow(InvalidVideoValueError);
      expect(() => attributes.set('view_count', 1.5)).toThrow(
        InvalidVideoValueError
      );
    });

    it('rejects counts beyond the safe integer range', () => {
      const attributes = new VideoAttributes();

      expect(() => attributes.set('view_count', 1e21)).toThrow(
        'Invalid value for video field "view_count"'
      );
      expect(attributes.has('view_count')).toBe(false);
    });

    it('accepts ratings within 0 to 5 only', () => {
      const attributes = new VideoAttributes().set('rating', 5);

      expect(attributes.get('rating')).toBe(5);
      expect(() => attributes.set('rating', 5.1)).toThrow(InvalidVideoValueError);
      expect(() => attributes.set('rating', -0.5)).toThrow(InvalidVideoValueError);
      expect(attributes.get('rating')).toBe(5);
    });

    it('parses ISO strings keeping their offset', () => {
      const attributes = new VideoAttributes().set(
        'publication_date',
        '2009-11-05T19:20:30+08:00'
      );

      const publicationDate = attributes.get('publication_date');
      expect(publicationDate?.offset).toBe(480);
      expect(publicationDate?.hour).toBe(19);
    });

    it('reads JS dates in UTC', () => {
      const attributes = new VideoAttributes().set(
        'expiration_date',
        new Date(Date.UTC(2024, 0, 15, 8, 30, 5))
      );

      const expirationDate = attributes.get('expiration_date');
      expect(expirationDate?.offset).toBe(0);
      expect(expirationDate?.hour).toBe(8);
    });

    it('keeps luxon DateTime values', () => {
      const dateTime = DateTime.fromObject(
        { year: 2024, month: 3, day: 1, hour: 12 },
        { zone: 'utc' }
      );
      const attributes = new VideoAttributes({ expiration_date: dateTime });

      expect(attributes.get('expiration_date')).toBe(dateTime);
    });

    it('rejects unparseable dates', () => {
      expect(
        () => new VideoAttributes({ expiration_date: 'next tuesday' })
      ).toThrow('Invalid value for video field "expiration_date"');
    });

    it('copies tag lists on assignment', () => {
      const tags = ['steak', 'grill'];
      const attributes = new VideoAttributes({ tag: tags });

      tags.push('summer');

      expect(attributes.get('tag')).toEqual(['steak', 'grill']);
    });
  });

  it('rejects extra keys on a typed initializer', () => {
    const meta = { title: 'Grilling steaks', slug: 'grilling-steaks' };

    expect(() => new VideoAttributes(meta)).toThrow(
      'Invalid value for video field "slug": Unknown video field'
    );
  });

  describe('fromRecord', () => {
    it('validates untyped input like the typed setters', () => {
      const attributes = VideoAttributes.fromRecord({
        title: 'Grilling steaks',
        duration: 600,
        category: ['cooking']
      });

      expect(attributes.get('title')).toBe('Grilling steaks');
      expect(attributes.get('duration')).toBe(600);
      expect(attributes.get('category')).toEqual(['cooking']);
    });

    it('rejects a list for a scalar field', () => {
      expect(() => VideoAttributes.fromRecord({ title: ['a', 'b'] })).toThrow(
        'Invalid value for video field "title"'
      );
    });

    it('rejects a scalar for a list field', () => {
      expect(() => VideoAttributes.fromRecord({ tag: 'steak' })).toThrow(
        'Invalid value for video field "tag"'
      );
    });

    it('rejects unknown fields', () => {
      expect(() => VideoAttributes.fromRecord({ resolution: '1080p' })).toThrow(
        'Invalid value for video field "resolution": Unknown video field'
      );
    });

    it('carries the offending field on the error', () => {
      try {
        VideoAttributes.fromRecord({ duration: 'long' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidVideoValueError);
        if (error instanceof InvalidVideoValueError) {
          expect(error.field).toBe('duration');
          expect(error.code).toBe('INVALID_VIDEO_VALUE');
        }
      }
    });
  });

  it('clones into an independent store', () => {
    const original = new VideoAttributes(
      { title: 'Grilling steaks' },
      { fieldOrder: ['title'] }
    );
    const copy = original.clone();

    copy.set('title', 'Smoking brisket');

    expect(original.get('title')).toBe('Grilling steaks');
    expect(copy.get('title')).toBe('Smoking brisket');
    expect(copy.fieldOrder).toEqual(['title']);
  });
});
