import type { VideoTransformOverrides } from '../types';

/**
 * Typed checkpoint for authored field transforms.
 *
 * Compile-time:
 * - Keys must be video field names, so `{ titel: ... }` is an error.
 * - Each transform's parameter is inferred from its field:
 *   `duration` receives a `number`, `tag` a `ReadonlyArray<string>`,
 *   `publication_date` a luxon `DateTime`.
 * - Return values must be renderable (`RenderedValue`, or `undefined` /
 *   `null` to emit nothing).
 *
 * Runtime: no-op (returns the input unchanged). Merging over the built-in
 * rules happens in `createVideoTransformRegistry`.
 *
 * Example:
 * ```ts
 * const transforms = defineVideoTransforms({
 *   duration: seconds => Math.round(seconds),
 *   tag: tags => tags.map(tag => tag.toLowerCase()),
 *   // Drop the built-in rule: render `true` / `false` instead of `Yes` / `No`.
 *   family_friendly: undefined
 * });
 * ```
 */
export function defineVideoTransforms(
  transforms: VideoTransformOverrides
): VideoTransformOverrides {
  return transforms;
}
