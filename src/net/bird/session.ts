import type { LineTransport, TransportFactory } from "../types";
import { ReplyCode, ReplyReader, replyText, type BirdReply } from "./reply";

/**
 * One connection to the daemon's control socket.
 *
 * Opening a session consumes the welcome banner; after that each
 * {@link command} is a single request/response round trip.
 */
export class BirdSession {
	private constructor(
		private readonly transport: LineTransport,
		private readonly reader: ReplyReader,
		/** The welcome reply, e.g. `0001 BIRD 2.0.12 ready.` */
		readonly banner: BirdReply
	) {}

	/**
	 * Connect and read the banner. The transport is closed again if the
	 * banner is missing or unexpected.
	 */
	static async open(connect: TransportFactory): Promise<BirdSession> {
		const transport = await connect();
		try {
			const reader = new ReplyReader(transport);
			const banner = await reader.read();
			if (banner.code !== ReplyCode.Welcome) {
				throw new Error(`Unexpected greeting ${banner.code}: ${replyText(banner)}`);
			}
			return new BirdSession(transport, reader, banner);
		} catch (error) {
			await transport.close();
			throw error;
		}
	}

	/**
	 * Send one command and read its full reply. Error replies are returned,
	 * not thrown; see {@link isErrorCode}.
	 */
	async command(command: string): Promise<BirdReply> {
		if (/[\r\n]/.test(command)) {
			throw new Error("Command must be a single line");
		}
		await this.transport.writeLine(command);
		return this.reader.read();
	}

	close(): Promise<void> {
		return this.transport.close();
	}
}

/**
 * Runs `fn` against a fresh session and closes it afterwards, whether `fn`
 * resolves or throws.
 */
export async function withBirdSession<T>(
	connect: TransportFactory,
	fn: (session: BirdSession) => Promise<T>
): Promise<T> {
	const session = await BirdSession.open(connect);
	try {
		return await fn(session);
	} finally {
		await session.close();
	}
}
