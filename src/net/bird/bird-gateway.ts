import { community, type Community } from "../../protocol/community";
import { UnixSocketTransport } from "../adapters/unix-socket";
import { TransportError } from "../errors";
import { isCidrPrefix } from "../prefix";
import type { AdvertisementGateway, TransportFactory } from "../types";
import {
	DEFAULT_PLACEHOLDER,
	renderCommunityBlock,
	writeConfigFromTemplate,
	type TemplatePaths,
} from "./config-template";
import { isErrorCode, ReplyCode, replyText, type BirdReply } from "./reply";
import { parseRouteCommunities } from "./routes";
import { withBirdSession } from "./session";

/**
 * Configuration for BirdGateway
 */
export interface BirdGatewayConfig {
	/** Control socket of the running daemon */
	socketPath: string;

	/** Configuration template containing the placeholder */
	templatePath: string;

	/** Configuration file the daemon loads on `configure` */
	configPath: string;

	/** Placeholder replaced by the community statements (default: ###COMMUNITY###) */
	placeholder?: string;

	/** Enable debug logging */
	debug?: boolean;

	/** Opens the control connection (default: Unix socket at socketPath) */
	connect?: TransportFactory;
}

/**
 * Advertisement gateway backed by a BIRD routing daemon.
 *
 * Reads go through `show route all`; writes render the configuration
 * template with the community statements and ask the daemon to reload it.
 * Each call opens its own control connection and closes it before returning.
 *
 * @example
 * ```ts
 * const gateway = new BirdGateway({
 *   socketPath: '/run/bird/bird.ctl',
 *   templatePath: '/etc/bird/conf.orig',
 *   configPath: '/etc/bird/bird.conf',
 * });
 *
 * const communities = await gateway.fetchCommunities('1.1.1.0/24');
 * await gateway.publish(23456, 0x4001, 0x8c70);
 * ```
 */
export class BirdGateway implements AdvertisementGateway {
	private paths: TemplatePaths;
	private connect: TransportFactory;
	private debug: boolean;

	constructor(config: BirdGatewayConfig) {
		this.paths = {
			templatePath: config.templatePath,
			configPath: config.configPath,
			placeholder: config.placeholder ?? DEFAULT_PLACEHOLDER,
		};
		this.debug = config.debug ?? false;

		const socketPath = config.socketPath;
		this.connect = config.connect ?? (() => UnixSocketTransport.connect(socketPath));
	}

	async fetchCommunities(prefix: string): Promise<Community[]> {
		if (!isCidrPrefix(prefix)) {
			throw new TransportError(`Invalid prefix: ${JSON.stringify(prefix)}`);
		}

		try {
			const reply = await withBirdSession(this.connect, (session) =>
				session.command(`show route all ${prefix}`)
			);

			if (reply.code === ReplyCode.RouteNotFound) {
				this.log(`No route for ${prefix}`);
				return [];
			}
			this.assertSuccess(reply, "show route");

			const communities = parseRouteCommunities(reply.lines.map((line) => line.text));
			this.log(`Fetched ${communities.length} communities for ${prefix}`);
			return communities;
		} catch (error) {
			throw TransportError.from(error, `Failed to fetch communities for ${prefix}`);
		}
	}

	async publish(markerAS: number, counterCommunity: number, positionCommunity: number): Promise<void> {
		let block: string;
		try {
			const counter = community(markerAS, counterCommunity);
			const position = community(markerAS, positionCommunity);
			block = renderCommunityBlock(markerAS, counter.data, position.data);
		} catch (error) {
			throw TransportError.from(error, "Failed to publish");
		}

		await this.apply(block, "publish");
		this.log(`Published (${markerAS},${counterCommunity}) (${markerAS},${positionCommunity})`);
	}

	async reset(): Promise<void> {
		await this.apply("", "reset");
		this.log("Reset announcement to template baseline");
	}

	/**
	 * Write the rendered configuration and reload the daemon
	 */
	private async apply(block: string, action: string): Promise<void> {
		try {
			await writeConfigFromTemplate(this.paths, block);
			const reply = await withBirdSession(this.connect, (session) => session.command("configure"));
			this.assertSuccess(reply, "configure");
		} catch (error) {
			throw TransportError.from(error, `Failed to ${action}`);
		}
	}

	private assertSuccess(reply: BirdReply, command: string): void {
		if (isErrorCode(reply.code)) {
			throw new TransportError(`${command} failed with ${reply.code}: ${replyText(reply)}`);
		}
	}

	/**
	 * Debug logging
	 */
	private log(message: string): void {
		if (this.debug) {
			console.log(`[BirdGateway] ${message}`);
		}
	}
}
