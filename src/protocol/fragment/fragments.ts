import { BitCodec } from "../../core/bit-codec";
import { defineFragment, FragmentType, type InferFragment } from "./define-fragment";

/**
 * Move counter, bumped by the announcing peer on every move.
 *
 * Bits: `tag:2 | moveCounter:14`
 */
export const CounterFragment = defineFragment({
  type: FragmentType.Counter,
  layout: {
    moveCounter: BitCodec.uint(14),
  },
});

/**
 * Coordinates of the last attack and the outcome of the one before it.
 *
 * Bits: `tag:2 | x:4 | pad:2 | y:4 | outcome:2 | pad:2`
 */
export const PositionFragment = defineFragment({
  type: FragmentType.Position,
  layout: {
    x: BitCodec.uint(4),
    padAfterX: BitCodec.pad(2),
    y: BitCodec.uint(4),
    outcome: BitCodec.uint(2),
    padAfterOutcome: BitCodec.pad(2),
  },
});

export type CounterFields = InferFragment<typeof CounterFragment>;
export type PositionFields = InferFragment<typeof PositionFragment>;
