import type { Community } from "./community/community";

export type ProtocolErrorCode =
  | "DUPLICATE_FRAGMENT"
  | "INVALID_TYPE"
  | "INCOMPLETE_STATE"
  | "FIELD_OUT_OF_RANGE"
  | "TRANSPORT";

/**
 * Base class for every failure the community protocol reports.
 *
 * `retryable` tells the caller whether fetching again may succeed
 * (the peer has not finished advertising, or the daemon was unreachable)
 * or whether the advertisement itself is broken.
 */
export abstract class ProtocolError extends Error {
  abstract readonly code: ProtocolErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The same fragment type appeared twice on the marker AS in one read.
 */
export class DuplicateFragmentError extends ProtocolError {
  readonly code = "DUPLICATE_FRAGMENT";
  readonly retryable = false;

  constructor(
    readonly fragment: "counter" | "position",
    readonly community: Community
  ) {
    super(
      `Duplicate ${fragment} fragment in community (${community.asn},${community.data})`
    );
  }
}

/**
 * A community on the marker AS carries an unknown 2-bit type tag.
 */
export class InvalidTypeError extends ProtocolError {
  readonly code = "INVALID_TYPE";
  readonly retryable = false;

  constructor(
    readonly type: number,
    readonly community: Community
  ) {
    super(
      `Invalid fragment type ${type} in community (${community.asn},${community.data})`
    );
  }
}

/**
 * The scan finished without seeing both fragments.
 */
export class IncompleteStateError extends ProtocolError {
  readonly code = "INCOMPLETE_STATE";
  readonly retryable = true;

  constructor(readonly missing: ReadonlyArray<"counter" | "position">) {
    super(`Incomplete game state: missing ${missing.join(" and ")} fragment`);
  }
}

/**
 * A field value does not fit its bit width and the encoder was asked to
 * reject rather than truncate.
 */
export class FieldOutOfRangeError extends ProtocolError {
  readonly code = "FIELD_OUT_OF_RANGE";
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly value: number,
    readonly bits: number
  ) {
    super(
      `Field "${field}" value ${value} does not fit in ${bits} bits (0-${2 ** bits - 1})`
    );
  }
}

/**
 * True when the error is a protocol failure the caller may retry.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof ProtocolError && error.retryable;
}
