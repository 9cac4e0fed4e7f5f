import {
    BirdGateway,
    CommunityChannel,
    Outcome,
    isRetryable,
    loadConfig,
    nextMoveCounter,
    type GameState,
} from "../../src";

const BOARD_SIZE = 16;
const POLL_INTERVAL_MS = 2000;

// Fixed fleet; each entry is "x,y"
const SHIPS = new Set(["2,3", "2,4", "2,5", "9,9", "10,9", "11,9", "12,9", "5,14"]);

class BattleshipPeer {
    channel: CommunityChannel;
    moveCounter = 0;
    lastSeen: number | null = null;
    hitsTaken = 0;
    shots: Array<{ x: number; y: number }> = [];

    constructor(private goesFirst: boolean) {
        const config = loadConfig();
        const gateway = new BirdGateway({
            socketPath: config.socketPath,
            templatePath: config.templatePath,
            configPath: config.configPath,
            placeholder: config.placeholder,
            debug: config.debug,
        });

        this.channel = new CommunityChannel({
            gateway,
            markerAS: config.markerAS,
            prefix: config.prefix,
            overflow: "reject",
            debug: config.debug,
        });

        // Sweep the board row by row
        for (let y = 0; y < BOARD_SIZE; y++) {
            for (let x = 0; x < BOARD_SIZE; x++) {
                this.shots.push({ x, y });
            }
        }
    }

    async start() {
        await this.channel.reset();
        console.log("🚢 Peer ready, fleet of", SHIPS.size, "cells");

        if (this.goesFirst) {
            await this.fire(Outcome.Unknown);
        }

        while (this.hitsTaken < SHIPS.size) {
            try {
                const theirs = await this.channel.readIfNewer(this.lastSeen);
                if (theirs) {
                    await this.answer(theirs);
                }
            } catch (error) {
                if (!isRetryable(error)) {
                    throw error;
                }
                console.warn("⚠️  Retrying:", error instanceof Error ? error.message : error);
            }
            await sleep(POLL_INTERVAL_MS);
        }

        console.log("💥 Fleet sunk, game over");
        await this.channel.reset();
    }

    async answer(theirs: GameState) {
        this.lastSeen = theirs.moveCounter;

        const hit = SHIPS.has(`${theirs.x},${theirs.y}`);
        if (hit) this.hitsTaken++;
        console.log(
            `🎯 Opponent fired at (${theirs.x},${theirs.y}): ${hit ? "hit" : "miss"}; ` +
                `their previous shot was ${Outcome[theirs.outcome]}`
        );

        await this.fire(hit ? Outcome.Hit : Outcome.Miss);
    }

    async fire(outcome: Outcome) {
        const target = this.shots.shift();
        if (!target) {
            console.log("Out of targets");
            return;
        }

        this.moveCounter = nextMoveCounter(this.moveCounter);
        const pair = await this.channel.write({ moveCounter: this.moveCounter, ...target, outcome });
        console.log(`🔫 Move ${this.moveCounter}: firing at (${target.x},${target.y})`, pair);
    }
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

const peer = new BattleshipPeer(process.argv.includes("--first"));
peer.start().catch((error) => {
    console.error("Fatal:", error);
    process.exitCode = 1;
});
