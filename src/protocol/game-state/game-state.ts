import { filterByMarker, type Community } from "../community";
import {
  CounterFragment,
  FragmentType,
  PositionFragment,
  readFragmentType,
  type CounterFields,
  type EncodeOptions,
  type PositionFields,
} from "../fragment";
import {
  DuplicateFragmentError,
  IncompleteStateError,
  InvalidTypeError,
} from "../errors";

/**
 * Result code for the previous move.
 */
export enum Outcome {
  Unknown = 0,
  Miss = 1,
  Hit = 2,
  Reserved = 3,
}

/**
 * The opponent's last announced move, rebuilt from scratch on every read.
 */
export interface GameState {
  /** 14-bit counter, bumped by the announcing peer on every move */
  moveCounter: number;
  /** 4-bit column of the last attack */
  x: number;
  /** 4-bit row of the last attack */
  y: number;
  /** 2-bit result of the previous move, usually an {@link Outcome} */
  outcome: number;
}

/**
 * The two community payloads that carry a game state.
 */
export interface CommunityPair {
  counter: number;
  position: number;
}

export const MOVE_COUNTER_MASK = 0x3fff;

/**
 * Decodes the game state advertised on `markerAS`.
 *
 * Communities on other ASes are ignored. The counter and position fragments
 * may arrive in either order and interleaved with unrelated communities.
 *
 * @throws InvalidTypeError on the first marker community with tag 0 or 3
 * @throws DuplicateFragmentError when a fragment type appears twice
 * @throws IncompleteStateError when either fragment is missing after the scan
 */
export function decodeGameState(
  communities: Iterable<Community>,
  markerAS: number
): GameState {
  let counter: CounterFields | undefined;
  let position: PositionFields | undefined;

  for (const c of filterByMarker(communities, markerAS)) {
    const type = readFragmentType(c.data);

    switch (type) {
      case FragmentType.Counter:
        if (counter) {
          throw new DuplicateFragmentError("counter", c);
        }
        counter = CounterFragment.codec.decode(c.data);
        break;

      case FragmentType.Position:
        if (position) {
          throw new DuplicateFragmentError("position", c);
        }
        position = PositionFragment.codec.decode(c.data);
        break;

      default:
        throw new InvalidTypeError(type, c);
    }
  }

  if (!counter || !position) {
    const missing: Array<"counter" | "position"> = [];
    if (!counter) missing.push("counter");
    if (!position) missing.push("position");
    throw new IncompleteStateError(missing);
  }

  return {
    moveCounter: counter.moveCounter,
    x: position.x,
    y: position.y,
    outcome: position.outcome,
  };
}

/**
 * Encodes a game state into its counter and position payloads.
 *
 * Total under the default `truncate` policy: out-of-range fields keep their
 * low bits. With `{ overflow: "reject" }` they throw FieldOutOfRangeError.
 */
export function encodeGameState(
  state: GameState,
  options?: EncodeOptions
): CommunityPair {
  const counter = CounterFragment.codec.encode(
    { moveCounter: state.moveCounter },
    options
  );
  const position = PositionFragment.codec.encode(
    { x: state.x, y: state.y, outcome: state.outcome },
    options
  );
  return { counter, position };
}

/**
 * Tags an encoded pair with the marker AS.
 */
export function toCommunities(
  pair: CommunityPair,
  markerAS: number
): [counter: Community, position: Community] {
  return [
    { asn: markerAS, data: pair.counter },
    { asn: markerAS, data: pair.position },
  ];
}

/**
 * The counter value that follows `moveCounter`, wrapping at 14 bits.
 */
export function nextMoveCounter(moveCounter: number): number {
  return (moveCounter + 1) & MOVE_COUNTER_MASK;
}

/**
 * Whether `current` is a later move than `previous`.
 *
 * Compares in 14-bit serial number space, so 0 follows 16383. A distance of
 * half the space or more counts as older.
 */
export function isNewerMove(previous: number, current: number): boolean {
  const distance = (current - previous) & MOVE_COUNTER_MASK;
  return distance !== 0 && distance < (MOVE_COUNTER_MASK + 1) / 2;
}
