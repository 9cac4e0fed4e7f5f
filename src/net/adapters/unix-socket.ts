import { createConnection, type Socket } from "node:net";
import type { LineTransport } from "../types";

type PendingRead = {
	resolve: (line: string) => void;
	reject: (error: Error) => void;
};

/**
 * Unix-domain socket transport with newline framing.
 *
 * Incoming bytes are split on `\n` (a trailing `\r` is dropped). Lines that
 * arrive before anyone asks for them are queued; reads issued before a line
 * arrives wait for it. Once the socket errors or closes, queued lines can
 * still be read and every further read rejects.
 */
export class UnixSocketTransport implements LineTransport {
	private socket: Socket;
	private partial = "";
	private lines: string[] = [];
	private readers: PendingRead[] = [];
	private failure: Error | null = null;

	constructor(socket: Socket) {
		this.socket = socket;
		this.setupHandlers();
	}

	writeLine(line: string): Promise<void> {
		if (this.failure) {
			return Promise.reject(this.failure);
		}
		return new Promise((resolve, reject) => {
			this.socket.write(`${line}\n`, (error) => {
				if (error) {
					reject(error);
				} else {
					resolve();
				}
			});
		});
	}

	readLine(): Promise<string> {
		const line = this.lines.shift();
		if (line !== undefined) {
			return Promise.resolve(line);
		}
		if (this.failure) {
			return Promise.reject(this.failure);
		}
		return new Promise((resolve, reject) => {
			this.readers.push({ resolve, reject });
		});
	}

	close(): Promise<void> {
		if (this.socket.destroyed) {
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			this.socket.once("close", () => resolve());
			this.socket.destroy();
		});
	}

	private setupHandlers(): void {
		this.socket.setEncoding("utf8");

		this.socket.on("data", (chunk: string) => {
			this.partial += chunk;
			const parts = this.partial.split("\n");
			this.partial = parts.pop() ?? "";
			for (const part of parts) {
				this.deliver(part.endsWith("\r") ? part.slice(0, -1) : part);
			}
		});

		this.socket.on("end", () => {
			if (this.partial.length > 0) {
				this.deliver(this.partial);
				this.partial = "";
			}
		});

		this.socket.on("error", (error) => {
			this.fail(error);
		});

		this.socket.on("close", () => {
			this.fail(new Error("Connection closed"));
		});
	}

	private deliver(line: string): void {
		const reader = this.readers.shift();
		if (reader) {
			reader.resolve(line);
		} else {
			this.lines.push(line);
		}
	}

	private fail(error: Error): void {
		this.failure ??= error;
		const waiting = this.readers;
		this.readers = [];
		for (const reader of waiting) {
			reader.reject(this.failure);
		}
	}

	/**
	 * Static factory method to connect to a socket path
	 */
	static connect(path: string): Promise<UnixSocketTransport> {
		return new Promise((resolve, reject) => {
			const socket = createConnection({ path });

			const onError = (error: Error) => {
				reject(error);
			};

			socket.once("error", onError);
			socket.once("connect", () => {
				socket.off("error", onError);
				resolve(new UnixSocketTransport(socket));
			});
		});
	}
}
