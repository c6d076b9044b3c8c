import { DateTime } from 'luxon';
import { z } from 'zod';

import type { VideoAttributeValues, VideoFieldName } from './types';

/**
 * Absolute location.
 *
 * - `URL` instances are accepted and stored by `href`.
 * - Strings must parse as absolute URLs and are stored exactly as given.
 */
export const locationSchema = z.union([
  z.instanceof(URL).transform(url => url.href),
  z.string().url({ message: 'Expected an absolute URL' })
]);

/**
 * Date-time with a UTC offset.
 *
 * - luxon `DateTime`: kept as-is (must be valid).
 * - JS `Date`: read in UTC, since a `Date` carries no offset of its own.
 * - ISO-8601 string: parsed keeping the offset written in the string; a
 *   string without an offset is read as UTC.
 */
export const dateTimeSchema = z
  .union([
    z.custom<DateTime>(value => DateTime.isDateTime(value), {
      message: 'Expected a luxon DateTime'
    }),
    z.date(),
    z.string()
  ])
  .transform((value, ctx) => {
    const dateTime = toDateTime(value);
    if (!dateTime.isValid) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid date-time (${dateTime.invalidExplanation ?? 'unparseable'})`
      });
      return z.NEVER;
    }
    return dateTime;
  });

function toDateTime(value: DateTime | Date | string): DateTime {
  if (typeof value === 'string') {
    return DateTime.fromISO(value, { setZone: true, zone: 'utc' });
  }
  if (value instanceof Date) {
    return DateTime.fromJSDate(value, { zone: 'utc' });
  }
  return value;
}

/**
 * Bounded to safe integers: larger numbers would be written in exponent form.
 */
const countSchema = z
  .number()
  .int()
  .nonnegative()
  .max(Number.MAX_SAFE_INTEGER);

const stringListSchema = z.array(z.string());

/**
 * One schema per video field.
 *
 * The mapped annotation ties each schema's output to the stored value type of
 * its field, so `videoFieldSchemas[field]` stays correlated with `field` in
 * generic code.
 *
 * Scalar schemas reject lists and list schemas reject scalars: a shape
 * mismatch is a configuration error, not something to coerce.
 */
export const videoFieldSchemas: {
  [Field in VideoFieldName]: z.ZodType<
    VideoAttributeValues[Field],
    z.ZodTypeDef,
    unknown
  >;
} = {
  player_loc: locationSchema,
  content_loc: locationSchema,
  thumbnail_loc: locationSchema,
  title: z.string(),
  description: z.string(),
  expiration_date: dateTimeSchema,
  duration: countSchema,
  rating: z.number().finite().min(0).max(5),
  view_count: countSchema,
  publication_date: dateTimeSchema,
  tag: stringListSchema,
  category: stringListSchema,
  family_friendly: z.boolean()
};

/**
 * Joins zod issues into a single line for error messages.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}
