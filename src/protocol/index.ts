/**
 * Protocol Layer - game state carried in BGP communities
 *
 * A game state travels as two standard communities on a shared marker AS:
 * - a counter fragment (type 1): the 14-bit move counter
 * - a position fragment (type 2): attack coordinates and last outcome
 *
 * Every other community on the route is ignored on read and left alone on
 * write.
 *
 * @example
 * ```ts
 * import { encodeGameState, decodeGameState, toCommunities } from './protocol';
 *
 * const pair = encodeGameState({ moveCounter: 1, x: 3, y: 7, outcome: 0 });
 * // pair.counter === 0x4001, pair.position === 0x8c70
 *
 * const state = decodeGameState(
 *   [...toCommunities(pair, 23456), { asn: 65000, data: 0 }],
 *   23456,
 * );
 * ```
 */

export * from "./community";
export * from "./fragment";
export * from "./game-state";
export * from "./errors";
