import type { AdvertisementGateway } from "../net/types";
import {
  decodeGameState,
  encodeGameState,
  isNewerMove,
  type CommunityPair,
  type GameState,
} from "../protocol/game-state";
import type { OverflowPolicy } from "../protocol/fragment";
import { IncompleteStateError } from "../protocol/errors";

/**
 * Configuration for CommunityChannel
 */
export interface CommunityChannelConfig {
  /** Where communities are fetched from and published to */
  gateway: AdvertisementGateway;

  /** Marker AS shared with the opponent */
  markerAS: number;

  /** Prefix the opponent announces */
  prefix: string;

  /** Handling of out-of-range fields on write (default: truncate) */
  overflow?: OverflowPolicy;

  /** Enable debug logging */
  debug?: boolean;
}

/**
 * One peer's view of the game: reads the opponent's state from the routing
 * table and announces its own.
 *
 * Holds no game state between calls; every read re-fetches and re-decodes
 * the full community set, every write re-publishes unconditionally.
 *
 * @example
 * ```ts
 * const channel = new CommunityChannel({ gateway, markerAS: 23456, prefix: '1.1.1.0/24' });
 *
 * const theirs = await channel.readIfNewer(lastSeen);
 * if (theirs) {
 *   await channel.write({ moveCounter: nextMoveCounter(mine), x: 4, y: 2, outcome: Outcome.Miss });
 * }
 * ```
 */
export class CommunityChannel {
  private gateway: AdvertisementGateway;
  private markerAS: number;
  private prefix: string;
  private overflow: OverflowPolicy;
  private debug: boolean;

  constructor(config: CommunityChannelConfig) {
    this.gateway = config.gateway;
    this.markerAS = config.markerAS;
    this.prefix = config.prefix;
    this.overflow = config.overflow ?? "truncate";
    this.debug = config.debug ?? false;
  }

  /**
   * Fetch and decode the opponent's current state.
   *
   * @throws TransportError when the gateway fails
   * @throws DuplicateFragmentError, InvalidTypeError or IncompleteStateError
   * when the advertisement does not decode
   */
  async read(): Promise<GameState> {
    const communities = await this.gateway.fetchCommunities(this.prefix);
    const state = decodeGameState(communities, this.markerAS);
    this.log(`Read move ${state.moveCounter} at (${state.x},${state.y}), outcome ${state.outcome}`);
    return state;
  }

  /**
   * Encode and announce our state. Returns the published payloads.
   */
  async write(state: GameState): Promise<CommunityPair> {
    const pair = encodeGameState(state, { overflow: this.overflow });
    await this.gateway.publish(this.markerAS, pair.counter, pair.position);
    this.log(`Wrote move ${state.moveCounter} as (${pair.counter}, ${pair.position})`);
    return pair;
  }

  /**
   * Withdraw our game-state communities.
   */
  async reset(): Promise<void> {
    await this.gateway.reset();
    this.log("Reset");
  }

  /**
   * Read the opponent's state if it carries a move newer than `lastCounter`.
   *
   * Resolves to null when the counter has not advanced or when the opponent
   * has not advertised a complete state yet. Pass null to accept any state.
   * Every other failure is thrown as from {@link read}.
   */
  async readIfNewer(lastCounter: number | null): Promise<GameState | null> {
    let state: GameState;
    try {
      state = await this.read();
    } catch (error) {
      if (error instanceof IncompleteStateError) {
        this.log(`Waiting for opponent: ${error.message}`);
        return null;
      }
      throw error;
    }

    if (lastCounter !== null && !isNewerMove(lastCounter, state.moveCounter)) {
      return null;
    }
    return state;
  }

  /**
   * Debug logging
   */
  private log(message: string): void {
    if (this.debug) {
      console.log(`[CommunityChannel] ${message}`);
    }
  }
}
