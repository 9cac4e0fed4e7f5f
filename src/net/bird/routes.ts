import { isUint16, type Community } from "../../protocol/community";

const COMMUNITY_ATTRIBUTE = /^\s*BGP\.community:(.*)$/;
const ATTRIBUTE_HEADER = /^\s*[A-Za-z][\w.]*:/;
const COMMUNITY_PAIR = /\((\d+),\s*(\d+)\)/g;

function collectPairs(text: string, into: Community[]): void {
	for (const match of text.matchAll(COMMUNITY_PAIR)) {
		const asn = parseInt(match[1], 10);
		const data = parseInt(match[2], 10);
		if (isUint16(asn) && isUint16(data)) {
			into.push({ asn, data });
		}
	}
}

/**
 * Extracts standard communities from `show route all` output.
 *
 * Only `BGP.community` attributes are read (including any indented lines
 * that wrap the attribute); large and extended communities never match.
 * Pairs are returned in the order they appear, across every listed route.
 */
export function parseRouteCommunities(lines: Iterable<string>): Community[] {
	const communities: Community[] = [];
	let inAttribute = false;

	for (const line of lines) {
		const attribute = COMMUNITY_ATTRIBUTE.exec(line);
		if (attribute) {
			inAttribute = true;
			collectPairs(attribute[1], communities);
		} else if (ATTRIBUTE_HEADER.test(line) || !/^\s/.test(line)) {
			inAttribute = false;
		} else if (inAttribute) {
			collectPairs(line, communities);
		}
	}

	return communities;
}
