/**
 * Fragments are the two halves of a game state, each carried in the data
 * half of one community tagged with the marker AS.
 *
 * @example
 * ```ts
 * import { CounterFragment, PositionFragment, readFragmentType, FragmentType } from './protocol/fragment';
 *
 * const word = CounterFragment.codec.encode({ moveCounter: 7 });
 * readFragmentType(word) === FragmentType.Counter; // true
 * CounterFragment.codec.decode(word); // { moveCounter: 7 }
 * ```
 */

export {
  defineFragment,
  readFragmentType,
  FragmentType,
  TYPE_TAG_BITS,
} from "./define-fragment";
export type {
  DefinedFragment,
  EncodeOptions,
  FragmentCodec,
  FragmentDefinition,
  InferFragment,
  OverflowPolicy,
} from "./define-fragment";
export { CounterFragment, PositionFragment } from "./fragments";
export type { CounterFields, PositionFields } from "./fragments";
