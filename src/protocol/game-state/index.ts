export {
  decodeGameState,
  encodeGameState,
  toCommunities,
  nextMoveCounter,
  isNewerMove,
  MOVE_COUNTER_MASK,
  Outcome,
} from "./game-state";
export type { GameState, CommunityPair } from "./game-state";
