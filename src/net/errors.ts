import { ProtocolError } from "../protocol/errors";

/**
 * The daemon could not be reached, refused a command, or its configuration
 * could not be written. The original failure is kept as `cause`.
 */
export class TransportError extends ProtocolError {
	readonly code = "TRANSPORT";
	readonly retryable = true;

	constructor(message: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
	}

	/**
	 * Wraps any failure in a TransportError, leaving existing ones untouched.
	 */
	static from(error: unknown, context: string): TransportError {
		if (error instanceof TransportError) {
			return error;
		}
		const detail = error instanceof Error ? error.message : String(error);
		return new TransportError(`${context}: ${detail}`, error);
	}
}
