export type { Community } from "./community";
export { community, filterByMarker, formatCommunity, isUint16 } from "./community";
