/**
 * Community Channel
 *
 * Two-player game state carried in BGP communities, with a routing daemon
 * as the transport:
 * - Bit codec for MSB-first field packing into 16-bit words
 * - Community protocol: fragment layouts, decode with validation, encode
 * - Advertisement gateway over the BIRD control socket
 * - Channel tying the two together for one peer
 */

// Core utilities
export * from "./core";

// Community protocol
export * from "./protocol";

// Daemon gateway
export * from "./net";

// Configuration
export * from "./config";

// Peer channel
export * from "./channel";
