/**
 * @module net
 *
 * Daemon-facing side of the community channel
 *
 * The protocol layer only sees the {@link AdvertisementGateway} interface;
 * this module provides the BIRD implementation of it and the pieces it is
 * built from.
 *
 * Key features:
 * - Pluggable line transports (Unix socket by default)
 * - Reply framing for the daemon's control protocol
 * - Scoped sessions that always close their connection
 * - Configuration rendering from a template and daemon reload
 *
 * @example
 * ```typescript
 * import { BirdGateway } from './net';
 *
 * const gateway = new BirdGateway({
 *   socketPath: '/run/bird/bird.ctl',
 *   templatePath: '/etc/bird/conf.orig',
 *   configPath: '/etc/bird/bird.conf',
 *   debug: true,
 * });
 *
 * const communities = await gateway.fetchCommunities('1.1.1.0/24');
 * ```
 */

export * from "./types";
export * from "./errors";
export * from "./prefix";
export * from "./adapters/unix-socket";
export * from "./bird";
