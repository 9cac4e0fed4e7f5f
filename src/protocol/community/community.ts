import { WORD_MAX } from "../../core/bit-codec";

/**
 * A standard BGP community: a 16-bit AS number and 16 bits of data,
 * written `(asn,data)`.
 */
export interface Community {
  asn: number;
  data: number;
}

export function isUint16(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= WORD_MAX;
}

/**
 * Builds a community, rejecting halves that are not 16-bit unsigned.
 */
export function community(asn: number, data: number): Community {
  if (!isUint16(asn) || !isUint16(data)) {
    throw new RangeError(`Invalid community (${asn},${data})`);
  }
  return { asn, data };
}

export function formatCommunity(c: Community): string {
  return `(${c.asn},${c.data})`;
}

/**
 * Yields the communities tagged with `markerAS`, in their original order.
 * Every match is yielded, duplicates included.
 */
export function* filterByMarker(
  communities: Iterable<Community>,
  markerAS: number
): Generator<Community> {
  for (const c of communities) {
    if (c.asn === markerAS) {
      yield c;
    }
  }
}
