import type { LineTransport } from "../types";

/**
 * Reply codes the gateway cares about. Codes 8000-8999 are runtime errors,
 * 9000-9999 are command parse errors.
 */
export enum ReplyCode {
	Ok = 0,
	Welcome = 1,
	ReadingConfiguration = 2,
	Reconfigured = 3,
	ReconfigurationInProgress = 4,
	RouteNotFound = 8001,
	ConfigurationError = 8002,
	ParseError = 9001,
}

export interface ReplyLine {
	code: number;
	text: string;
}

/**
 * A complete reply: every line up to and including the final one.
 * `code` is the final line's code.
 */
export interface BirdReply {
	code: number;
	lines: ReplyLine[];
}

export type ParsedLine =
	| { kind: "coded"; code: number; text: string; final: boolean }
	| { kind: "continuation"; text: string }
	| { kind: "unsolicited"; code: number; text: string; final: boolean };

const CODED_LINE = /^(\+?)(\d{4})(?:([ -])(.*))?$/;

/**
 * Classifies one line of control-socket output.
 *
 * - `1007-text`  coded line, more follows
 * - `0000 text`  coded line, last of the reply
 * - ` text`      continuation of the previous code
 * - `+0000 text` unsolicited notice, not part of any reply
 *
 * @throws Error on anything else
 */
export function parseReplyLine(raw: string): ParsedLine {
	if (raw.startsWith(" ")) {
		return { kind: "continuation", text: raw.slice(1) };
	}

	const match = CODED_LINE.exec(raw);
	if (!match) {
		throw new Error(`Malformed reply line: ${JSON.stringify(raw)}`);
	}

	const [, plus, digits, separator, text] = match;
	const code = parseInt(digits, 10);
	const final = separator !== "-";

	return {
		kind: plus ? "unsolicited" : "coded",
		code,
		text: text ?? "",
		final,
	};
}

export function isErrorCode(code: number): boolean {
	return code >= 8000 && code <= 9999;
}

/**
 * Joins the text of every line in a reply.
 */
export function replyText(reply: BirdReply): string {
	return reply.lines.map((line) => line.text).join("\n");
}

/**
 * Reads whole replies off a line transport.
 */
export class ReplyReader {
	constructor(private readonly transport: LineTransport) {}

	async read(): Promise<BirdReply> {
		const lines: ReplyLine[] = [];
		let currentCode: number | null = null;
		let inUnsolicited = false;

		for (;;) {
			const parsed = parseReplyLine(await this.transport.readLine());

			if (parsed.kind === "unsolicited") {
				inUnsolicited = !parsed.final;
				continue;
			}

			if (parsed.kind === "continuation") {
				if (inUnsolicited) continue;
				if (currentCode === null) {
					throw new Error("Continuation line before any reply code");
				}
				lines.push({ code: currentCode, text: parsed.text });
				continue;
			}

			inUnsolicited = false;
			currentCode = parsed.code;
			lines.push({ code: parsed.code, text: parsed.text });

			if (parsed.final) {
				return { code: parsed.code, lines };
			}
		}
	}
}
