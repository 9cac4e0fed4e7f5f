import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BirdGateway } from "./bird-gateway";
import { TransportError } from "../errors";
import type { LineTransport } from "../types";

const TEMPLATE = "protocol bgp peer {\n export filter { ###COMMUNITY### accept; };\n}\n";

const SHOW_ROUTE_REPLY = [
	"1007-1.1.1.0/24          unicast [peer1 10:00:00.000] * (100) [AS65001i]",
	"1008-\tType: BGP univ",
	"1012-\tBGP.origin: IGP",
	" \tBGP.as_path: 65001",
	" \tBGP.community: (65000,1) (23456,16385) (23456,35952)",
	" \tBGP.large_community: (65000, 1, 2)",
	"0000 ",
];

// In-process stand-in for the daemon's control socket
class MockDaemon {
	public commands: string[] = [];
	public connections = 0;
	public closed = 0;
	public banner = ["0001 BIRD 2.0.12 ready."];

	constructor(private respond: (command: string) => string[]) {}

	connect = async (): Promise<LineTransport> => {
		this.connections++;
		const queue = [...this.banner];
		return {
			writeLine: async (line) => {
				this.commands.push(line);
				queue.push(...this.respond(line));
			},
			readLine: async () => {
				const line = queue.shift();
				if (line === undefined) {
					throw new Error("Connection closed");
				}
				return line;
			},
			close: async () => {
				this.closed++;
			},
		};
	};
}

describe("BirdGateway", () => {
	let dir: string;
	let templatePath: string;
	let configPath: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "bird-gateway-"));
		templatePath = join(dir, "conf.orig");
		configPath = join(dir, "bird.conf");
		await writeFile(templatePath, TEMPLATE);
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	function createGateway(daemon: MockDaemon): BirdGateway {
		return new BirdGateway({
			socketPath: join(dir, "unused.ctl"),
			templatePath,
			configPath,
			connect: daemon.connect,
		});
	}

	describe("fetchCommunities", () => {
		it("should return the route's communities in order", async () => {
			const daemon = new MockDaemon(() => SHOW_ROUTE_REPLY);
			const gateway = createGateway(daemon);

			const communities = await gateway.fetchCommunities("1.1.1.0/24");

			expect(communities).toEqual([
				{ asn: 65000, data: 1 },
				{ asn: 23456, data: 16385 },
				{ asn: 23456, data: 35952 },
			]);
			expect(daemon.commands).toEqual(["show route all 1.1.1.0/24"]);
		});

		it("should open and close one connection per call", async () => {
			const daemon = new MockDaemon(() => SHOW_ROUTE_REPLY);
			const gateway = createGateway(daemon);

			await gateway.fetchCommunities("1.1.1.0/24");
			await gateway.fetchCommunities("1.1.1.0/24");

			expect(daemon.connections).toBe(2);
			expect(daemon.closed).toBe(2);
		});

		it("should return nothing when the route is missing", async () => {
			const daemon = new MockDaemon(() => ["8001 Network not found"]);
			const gateway = createGateway(daemon);

			expect(await gateway.fetchCommunities("1.1.1.0/24")).toEqual([]);
		});

		it("should fail on an error reply", async () => {
			const daemon = new MockDaemon(() => ["9001 syntax error"]);
			const gateway = createGateway(daemon);

			await expect(gateway.fetchCommunities("1.1.1.0/24")).rejects.toThrow(
				"show route failed with 9001: syntax error"
			);
		});

		it("should reject a malformed prefix without connecting", async () => {
			const daemon = new MockDaemon(() => SHOW_ROUTE_REPLY);
			const gateway = createGateway(daemon);

			await expect(gateway.fetchCommunities("1.1.1.0/24\nconfigure")).rejects.toThrow(
				TransportError
			);
			expect(daemon.connections).toBe(0);
		});

		it("should wrap connection failures and keep the cause", async () => {
			const refused = new Error("connect ENOENT /run/bird/bird.ctl");
			const gateway = new BirdGateway({
				socketPath: "/run/bird/bird.ctl",
				templatePath,
				configPath,
				connect: () => Promise.reject(refused),
			});

			const error = await gateway.fetchCommunities("1.1.1.0/24").catch((e: unknown) => e);

			expect(error).toBeInstanceOf(TransportError);
			expect(error).toMatchObject({
				message: "Failed to fetch communities for 1.1.1.0/24: connect ENOENT /run/bird/bird.ctl",
				code: "TRANSPORT",
				retryable: true,
				cause: refused,
			});
		});

		it("should close the connection after an unexpected greeting", async () => {
			const daemon = new MockDaemon(() => SHOW_ROUTE_REPLY);
			daemon.banner = ["0000 not bird"];
			const gateway = createGateway(daemon);

			await expect(gateway.fetchCommunities("1.1.1.0/24")).rejects.toThrow(
				"Failed to fetch communities for 1.1.1.0/24: Unexpected greeting 0: not bird"
			);
			expect(daemon.closed).toBe(1);
			expect(daemon.commands).toEqual([]);
		});
	});

	describe("publish", () => {
		it("should render both communities into the config and reload", async () => {
			const daemon = new MockDaemon(() => [
				`0002-Reading configuration from ${configPath}`,
				"0003 Reconfigured",
			]);
			const gateway = createGateway(daemon);

			await gateway.publish(23456, 16385, 35952);

			expect(await readFile(configPath, "utf8")).toBe(
				"protocol bgp peer {\n export filter { " +
					"\nbgp_community.add((23456,35952));\nbgp_community.add((23456,16385));\n" +
					" accept; };\n}\n"
			);
			expect(daemon.commands).toEqual(["configure"]);
		});

		it("should fail when the daemon rejects the new config", async () => {
			const daemon = new MockDaemon(() => ["8002 bird.conf:3:1 syntax error"]);
			const gateway = createGateway(daemon);

			await expect(gateway.publish(23456, 16385, 35952)).rejects.toThrow(
				"configure failed with 8002: bird.conf:3:1 syntax error"
			);
		});

		it("should fail without reloading when the template is missing", async () => {
			const daemon = new MockDaemon(() => ["0003 Reconfigured"]);
			const gateway = new BirdGateway({
				socketPath: join(dir, "unused.ctl"),
				templatePath: join(dir, "missing.orig"),
				configPath,
				connect: daemon.connect,
			});

			await expect(gateway.publish(23456, 16385, 35952)).rejects.toThrow(
				/^Failed to publish: ENOENT/
			);
			expect(daemon.connections).toBe(0);
		});

		it("should fail when the template has no placeholder", async () => {
			await writeFile(templatePath, "protocol bgp peer {}\n");
			const daemon = new MockDaemon(() => ["0003 Reconfigured"]);
			const gateway = createGateway(daemon);

			await expect(gateway.publish(23456, 16385, 35952)).rejects.toThrow(
				"Failed to publish: Template does not contain placeholder ###COMMUNITY###"
			);
		});

		it("should use a custom placeholder", async () => {
			await writeFile(templatePath, "filter { @COMMUNITIES@ accept; }");
			const daemon = new MockDaemon(() => ["0003 Reconfigured"]);
			const gateway = new BirdGateway({
				socketPath: join(dir, "unused.ctl"),
				templatePath,
				configPath,
				placeholder: "@COMMUNITIES@",
				connect: daemon.connect,
			});

			await gateway.publish(1, 2, 3);

			expect(await readFile(configPath, "utf8")).toBe(
				"filter { \nbgp_community.add((1,3));\nbgp_community.add((1,2));\n accept; }"
			);
		});

		it("should refuse values that are not 16-bit", async () => {
			const daemon = new MockDaemon(() => ["0003 Reconfigured"]);
			const gateway = createGateway(daemon);

			await expect(gateway.publish(23456, 70000, 35952)).rejects.toThrow(
				"Failed to publish: Invalid community (23456,70000)"
			);
			expect(daemon.connections).toBe(0);
		});
	});

	describe("reset", () => {
		it("should render the template without communities and reload", async () => {
			const daemon = new MockDaemon(() => ["0003 Reconfigured"]);
			const gateway = createGateway(daemon);

			await gateway.reset();

			expect(await readFile(configPath, "utf8")).toBe(
				"protocol bgp peer {\n export filter {  accept; };\n}\n"
			);
			expect(daemon.commands).toEqual(["configure"]);
		});
	});
});
