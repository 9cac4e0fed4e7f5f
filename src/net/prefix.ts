import { isIPv4, isIPv6 } from "node:net";

/**
 * Whether `prefix` is an IPv4 or IPv6 network in CIDR notation,
 * e.g. `1.1.1.0/24` or `2001:db8::/32`.
 */
export function isCidrPrefix(prefix: string): boolean {
	const slash = prefix.indexOf("/");
	if (slash === -1) return false;

	const address = prefix.slice(0, slash);
	const length = prefix.slice(slash + 1);
	if (!/^\d{1,3}$/.test(length)) return false;

	const bits = parseInt(length, 10);
	if (isIPv4(address)) return bits <= 32;
	if (isIPv6(address)) return bits <= 128;
	return false;
}
