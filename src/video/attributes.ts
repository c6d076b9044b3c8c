import { InvalidVideoValueError } from '../errors';
import type {
  VideoAttributeInit,
  VideoAttributeInput,
  VideoAttributeValues,
  VideoFieldName
} from '../types';
import { describeIssues, videoFieldSchemas } from '../validation';
import { DEFAULT_VIDEO_FIELD_ORDER, isVideoFieldName } from './fields';

export type VideoAttributesOptions = {
  /**
   * Field names in emission order. Defaults to `DEFAULT_VIDEO_FIELD_ORDER`.
   * Names outside the vocabulary are kept but never produce an element.
   */
  fieldOrder?: ReadonlyArray<string>;
};

const FAMILY_FRIENDLY_DEFAULT = true;

/**
 * Video metadata attached to one sitemap URL entry.
 *
 * Presence is tracked separately from the value:
 * - an unset field has no own entry in the backing record (`has` is false),
 * - a field set to `''`, `0`, `[]` or `false` is present and will be emitted.
 *
 * `family_friendly` is the exception: it always holds a value (default
 * `true`), so `has('family_friendly')` is always true and `clear` restores
 * the default instead of removing it.
 *
 * Every setter validates its input (see `videoFieldSchemas`) and throws
 * `InvalidVideoValueError` immediately; serialization never sees an invalid
 * value.
 */
export class VideoAttributes {
  /**
   * Emission order used by the fragment builder.
   */
  fieldOrder: ReadonlyArray<string>;

  private readonly values: Partial<VideoAttributeValues> = {
    family_friendly: FAMILY_FRIENDLY_DEFAULT
  };

  constructor(
    init: VideoAttributeInit = {},
    options: VideoAttributesOptions = {}
  ) {
    this.fieldOrder = [...(options.fieldOrder ?? DEFAULT_VIDEO_FIELD_ORDER)];

    this.assignAll(init);
  }

  /**
   * Builds a store from untyped input (parsed JSON, CMS records, ...).
   *
   * - Keys outside the video vocabulary are rejected.
   * - `undefined` values are skipped, like in the typed constructor.
   * - Every value goes through the same validation as `set`.
   */
  static fromRecord(
    record: Readonly<Record<string, unknown>>,
    options: VideoAttributesOptions = {}
  ): VideoAttributes {
    const attributes = new VideoAttributes({}, options);
    attributes.assignAll(record);
    return attributes;
  }

  get<Field extends VideoFieldName>(
    field: Field
  ): VideoAttributeValues[Field] | undefined {
    return this.values[field];
  }

  set<Field extends VideoFieldName>(
    field: Field,
    value: VideoAttributeInput[Field]
  ): this {
    this.assign(field, value);
    return this;
  }

  has(field: VideoFieldName): boolean {
    return Object.hasOwn(this.values, field);
  }

  clear(field: VideoFieldName): this {
    if (field === 'family_friendly') {
      this.values.family_friendly = FAMILY_FRIENDLY_DEFAULT;
      return this;
    }

    delete this.values[field];
    return this;
  }

  /**
   * The video sitemap schema requires at least one of `content_loc` /
   * `player_loc`. This is the only combination checked here; everything else
   * the schema expects is up to the caller.
   */
  hasVideo(): boolean {
    return this.has('content_loc') || this.has('player_loc');
  }

  /**
   * Independent copy with the same values and field order.
   * Stored values are immutable (strings, numbers, luxon `DateTime`s, lists
   * copied on assignment), so a shallow copy of the record is enough.
   */
  clone(): VideoAttributes {
    const copy = new VideoAttributes({}, { fieldOrder: this.fieldOrder });
    Object.assign(copy.values, this.values);
    return copy;
  }

  /**
   * Object typing lets extra keys through (`{ title, slug }` is assignable to
   * the initializer type), so every key is checked against the vocabulary.
   */
  private assignAll(record: Readonly<Record<string, unknown>>): void {
    for (const [key, value] of Object.entries(record)) {
      if (!isVideoFieldName(key)) {
        throw new InvalidVideoValueError(key, 'Unknown video field');
      }
      // `undefined` means "leave unset".
      if (value === undefined) continue;

      this.assign(key, value);
    }
  }

  private assign<Field extends VideoFieldName>(
    field: Field,
    value: unknown
  ): void {
    const result = videoFieldSchemas[field].safeParse(value);
    if (!result.success) {
      throw new InvalidVideoValueError(field, describeIssues(result.error), {
        value
      });
    }

    this.values[field] = result.data;
  }
}
