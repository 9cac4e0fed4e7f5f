/**
 * Core types for talking to the local routing daemon
 */

import type { Community } from "../protocol/community";

/**
 * Line-oriented transport to a daemon control channel - implement this to
 * talk over anything that carries text lines (Unix socket, TCP, a test fake)
 */
export interface LineTransport {
	/**
	 * Send one line; the newline is appended by the transport
	 */
	writeLine(line: string): Promise<void>;

	/**
	 * Resolve with the next received line, without its newline.
	 * Rejects once the connection has closed or failed.
	 */
	readLine(): Promise<string>;

	/**
	 * Close the connection
	 */
	close(): Promise<void>;
}

/**
 * Opens a fresh transport. Called once per command round trip.
 */
export type TransportFactory = () => Promise<LineTransport>;

/**
 * Where the game-state communities are read from and announced to.
 *
 * Every method fails only with TransportError. Nothing is retried and there
 * is no internal timeout; wrap calls to add either.
 */
export interface AdvertisementGateway {
	/**
	 * All communities on routes matching `prefix`, in encounter order.
	 * Duplicates are kept.
	 */
	fetchCommunities(prefix: string): Promise<Community[]>;

	/**
	 * Re-announce the monitored prefix carrying exactly these two communities
	 * on `markerAS`, keeping every unrelated community.
	 */
	publish(markerAS: number, counterCommunity: number, positionCommunity: number): Promise<void>;

	/**
	 * Remove the game-state communities, restoring the baseline announcement
	 */
	reset(): Promise<void>;
}
