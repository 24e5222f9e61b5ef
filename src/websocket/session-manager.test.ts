import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FeedDispatcher } from "../events/event-dispatcher.js";
import { ValidationError } from "../lib/validation/index.js";
import { CredentialError, HandshakeRejectedError, TransportError } from "../shared/errors.js";
import { instrumentId } from "../shared/identifiers.js";
import { type SessionConfig, SessionManager } from "./session-manager.js";
import { StubClientFactory, StubSigner, type StubWsClient } from "./testing.js";
import type { StateChange } from "./types.js";

const A = instrumentId("KXA");
const B = instrumentId("KXB");
const C = instrumentId("KXC");

const baseConfig: SessionConfig = {
	wsUrl: "wss://venue.test/trade-api/ws/v2",
	signPath: "/trade-api/ws/v2",
	authMode: "handshake",
	subscriptionIdMode: "preserve",
	baseDelayMs: 1_000,
	maxDelayMs: 8_000,
	jitterFactor: 0.2,
	pingIntervalMs: 20_000,
	pongTimeoutMs: 10_000,
	readTimeoutMs: 60_000,
	handshakeTimeoutMs: 10_000,
	authTimeoutMs: 5_000,
};

interface Harness {
	readonly session: SessionManager;
	readonly factory: StubClientFactory;
	readonly signer: StubSigner;
	readonly dispatcher: FeedDispatcher;
	readonly changes: StateChange[];
}

function setup(config: Partial<SessionConfig> = {}, factory = new StubClientFactory()): Harness {
	const signer = new StubSigner();
	const dispatcher = new FeedDispatcher({ malformedThreshold: 3 });
	const session = new SessionManager({
		config: { ...baseConfig, ...config },
		signer,
		sink: dispatcher,
		clientFactory: factory.create,
		random: () => 0,
	});
	const changes: StateChange[] = [];
	session.on("state_change", (c) => changes.push(c));
	return { session, factory, signer, dispatcher, changes };
}

/** Let pending connect promises settle. */
async function settle(): Promise<void> {
	await vi.advanceTimersByTimeAsync(0);
}

function ackSubscribed(client: StubWsClient, commandId: number, sid: number, channel = "ticker"): void {
	client.receive({ type: "subscribed", id: commandId, msg: { channel, sid } });
}

describe("SessionManager", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	describe("connecting", () => {
		it("reaches ready with signed headers on the upgrade request", async () => {
			const { session, factory, signer, changes } = setup();

			session.start();
			expect(session.state).toBe("connecting");
			await settle();

			expect(session.state).toBe("ready");
			expect(changes.map((c) => c.to)).toEqual(["connecting", "authenticating", "ready"]);
			expect(signer.requests).toEqual([{ method: "GET", path: "/trade-api/ws/v2" }]);
			expect(factory.latest().config.headers?.["KALSHI-ACCESS-KEY"]).toBe("test-key");
			expect(factory.latest().config.url).toBe(baseConfig.wsUrl);
		});

		it("ignores start while already running", async () => {
			const { session, factory } = setup();
			session.start();
			session.start();
			await settle();
			expect(factory.clients).toHaveLength(1);
		});

		it("fails without retrying when the credentials cannot be used", async () => {
			const { session, factory, signer } = setup();
			signer.failure = new CredentialError("Invalid credentials object");

			session.start();
			await vi.advanceTimersByTimeAsync(60_000);

			expect(session.state).toBe("failed");
			expect(factory.clients).toHaveLength(0);
			expect(session.stats().lastError?.code).toBe("CREDENTIAL_ERROR");
		});
	});

	describe("subscriptions", () => {
		it("holds subscriptions until ready, then sends them", async () => {
			const { session, factory } = setup();
			const id = session.subscribe("ticker", [A]);
			session.start();
			await settle();

			expect(factory.latest().commands()).toEqual([
				{ id, cmd: "subscribe", params: { channels: ["ticker"], market_tickers: ["KXA"] } },
			]);
		});

		it("sends immediately when already ready", async () => {
			const { session, factory } = setup();
			session.start();
			await settle();

			session.subscribe("fill", []);

			expect(factory.latest().commands()).toEqual([
				{ id: 1, cmd: "subscribe", params: { channels: ["fill"] } },
			]);
		});

		it("returns the same id for an equal channel and instrument set", async () => {
			const { session, factory } = setup();
			session.start();
			await settle();

			const first = session.subscribe("trade", [B, A]);
			const second = session.subscribe("trade", [A, B, A]);

			expect(second).toBe(first);
			expect(session.subscriptions()).toHaveLength(1);
			expect(factory.latest().commands()).toHaveLength(1);
			expect(factory.latest().commands()[0]?.params).toEqual({
				channels: ["trade"],
				market_tickers: ["KXA", "KXB"],
			});
		});

		it("takes exactly one instrument per orderbook subscription", () => {
			const { session } = setup();
			expect(() => session.subscribe("orderbook_delta", [])).toThrow(ValidationError);
			expect(() => session.subscribe("orderbook_delta", [A, B])).toThrow(ValidationError);
			expect(session.subscriptions()).toEqual([]);

			const id = session.subscribe("orderbook_delta", [A, A]);
			expect(session.subscriptions()).toEqual([{ id, channel: "orderbook_delta", instruments: [A] }]);
		});

		it("unsubscribes by server sid once known", async () => {
			const { session, factory } = setup();
			session.start();
			await settle();
			const id = session.subscribe("trade", [C]);
			ackSubscribed(factory.latest(), id, 77, "trade");

			expect(session.unsubscribe(id)).toBe(true);
			expect(session.unsubscribe(id)).toBe(false);

			const cmds = factory.latest().commands();
			expect(cmds[1]).toMatchObject({ cmd: "unsubscribe", params: { sids: [77] } });
			expect(session.subscriptions()).toEqual([]);
		});

		it("unsubscribes a subscription removed before its ack once the ack arrives", async () => {
			const { session, factory } = setup();
			session.start();
			await settle();
			const id = session.subscribe("trade", [C]);

			session.unsubscribe(id);
			expect(factory.latest().commands()).toHaveLength(1);

			ackSubscribed(factory.latest(), id, 91, "trade");
			expect(factory.latest().commands()[1]).toMatchObject({
				cmd: "unsubscribe",
				params: { sids: [91] },
			});
		});
	});

	describe("reconnecting", () => {
		it("re-sends all three subscriptions after an unexpected close", async () => {
			const { session, factory } = setup();
			const ids = [
				session.subscribe("ticker", [A]),
				session.subscribe("orderbook_delta", [B]),
				session.subscribe("trade", [C]),
			];
			session.start();
			await settle();
			const first = factory.latest();
			ids.forEach((id, i) => ackSubscribed(first, id, 100 + i));

			first.dropConnection();
			expect(session.state).toBe("degraded");
			expect(first.closed).toBe(true);

			await vi.advanceTimersByTimeAsync(1_000);

			expect(session.state).toBe("ready");
			expect(factory.clients).toHaveLength(2);
			const resent = factory.latest().commands();
			expect(resent.map((c) => c.id)).toEqual(ids);
			expect(resent.map((c) => c.params)).toEqual([
				{ channels: ["ticker"], market_tickers: ["KXA"] },
				{ channels: ["orderbook_delta"], market_tickers: ["KXB"] },
				{ channels: ["trade"], market_tickers: ["KXC"] },
			]);
			expect(session.stats().reconnects).toBe(1);
		});

		it("uses new command ids per send in fresh mode while public ids stay", async () => {
			const { session, factory } = setup({ subscriptionIdMode: "fresh" });
			const id = session.subscribe("ticker", [A]);
			session.start();
			await settle();
			const firstCommandId = factory.latest().commands()[0]?.id;

			factory.latest().dropConnection();
			await vi.advanceTimersByTimeAsync(1_000);
			const secondCommandId = factory.latest().commands()[0]?.id;

			expect(firstCommandId).not.toBe(id);
			expect(secondCommandId).not.toBe(firstCommandId);
			expect(session.subscriptions().map((s) => s.id)).toEqual([id]);
		});

		it("signs every connect attempt afresh", async () => {
			const { session, factory, signer } = setup();
			session.start();
			await settle();
			factory.latest().dropConnection();
			await vi.advanceTimersByTimeAsync(1_000);

			expect(signer.requests).toHaveLength(2);
			expect(factory.clients[0]?.config.headers?.["KALSHI-ACCESS-SIGNATURE"]).toBe("test-signature-1");
			expect(factory.clients[1]?.config.headers?.["KALSHI-ACCESS-SIGNATURE"]).toBe("test-signature-2");
		});

		it("backs off exponentially while connects keep failing, then resets", async () => {
			const factory = new StubClientFactory(
				new TransportError("ECONNREFUSED"),
				new TransportError("ECONNREFUSED"),
				new TransportError("ECONNREFUSED"),
			);
			const { session } = setup({}, factory);

			session.start();
			await settle();
			expect(session.state).toBe("degraded");

			await vi.advanceTimersByTimeAsync(999);
			expect(factory.clients).toHaveLength(1);
			await vi.advanceTimersByTimeAsync(1);
			expect(factory.clients).toHaveLength(2);

			await vi.advanceTimersByTimeAsync(1_999);
			expect(factory.clients).toHaveLength(2);
			await vi.advanceTimersByTimeAsync(1);
			expect(factory.clients).toHaveLength(3);

			await vi.advanceTimersByTimeAsync(4_000);
			expect(factory.clients).toHaveLength(4);
			expect(session.state).toBe("ready");
			expect(session.stats().attempt).toBe(0);

			factory.latest().dropConnection();
			await vi.advanceTimersByTimeAsync(1_000);
			expect(factory.clients).toHaveLength(5);
		});

		it("ignores frames and closes from a replaced connection", async () => {
			const { session, factory } = setup();
			session.start();
			await settle();
			const stale = factory.latest();
			stale.dropConnection();
			await vi.advanceTimersByTimeAsync(1_000);
			const before = session.stats().framesReceived;

			stale.receive({ type: "ticker", sid: 1, seq: 1, msg: { market_ticker: "KXA" } });
			stale.dropConnection();

			expect(session.stats().framesReceived).toBe(before);
			expect(session.state).toBe("ready");
		});

		it("recycles the connection when the malformed-frame breaker trips", async () => {
			const { session, factory } = setup();
			session.start();
			await settle();

			factory.latest().receive("{bad");
			factory.latest().receive("{bad");
			expect(session.state).toBe("ready");
			factory.latest().receive("{bad");

			expect(session.state).toBe("degraded");
			expect(session.stats().lastError?.message).toBe("Malformed frame threshold exceeded");
		});

		it("forceDegraded recycles a live connection", async () => {
			const { session, factory } = setup();
			session.start();
			await settle();

			session.forceDegraded("venue reported a session-fatal error");

			expect(session.state).toBe("degraded");
			expect(factory.latest().closed).toBe(true);
			await vi.advanceTimersByTimeAsync(1_000);
			expect(session.state).toBe("ready");
		});
	});

	describe("rejection", () => {
		it("an unauthorized handshake ends in failed with no retries until start()", async () => {
			const factory = new StubClientFactory(new HandshakeRejectedError("Handshake rejected with HTTP 401", 401));
			const { session, changes } = setup({}, factory);

			session.start();
			await settle();
			expect(session.state).toBe("failed");
			expect(changes.at(-1)?.error).toBeInstanceOf(HandshakeRejectedError);

			await vi.advanceTimersByTimeAsync(10 * 60_000);
			expect(factory.clients).toHaveLength(1);

			session.start();
			await settle();
			expect(factory.clients).toHaveLength(2);
			expect(session.state).toBe("ready");
		});
	});

	describe("stopping", () => {
		it("stop during degraded ends in closed with no further attempts", async () => {
			const { session, factory } = setup();
			session.start();
			await settle();
			factory.latest().dropConnection();
			expect(session.state).toBe("degraded");

			session.stop();
			await vi.advanceTimersByTimeAsync(60_000);

			expect(session.state).toBe("closed");
			expect(factory.clients).toHaveLength(1);
		});

		it("unsubscribes known sids and closes the socket", async () => {
			const { session, factory } = setup();
			const id = session.subscribe("ticker", [A]);
			session.start();
			await settle();
			ackSubscribed(factory.latest(), id, 5);

			session.stop();
			session.stop();

			const client = factory.latest();
			expect(client.commands().at(-1)).toMatchObject({ cmd: "unsubscribe", params: { sids: [5] } });
			expect(client.closed).toBe(true);
			expect(session.state).toBe("closed");
		});

		it("closes a connection that opens after stop", async () => {
			const factory = new StubClientFactory("pending");
			const { session } = setup({}, factory);
			session.start();
			await settle();
			const client = factory.latest();

			session.stop();
			expect(client.closed).toBe(true);
			client.closed = false;
			client.open();
			await settle();

			expect(client.closed).toBe(true);
			expect(session.state).toBe("closed");
		});
	});

	describe("snapshot resync", () => {
		it("resubscribes the covering orderbook subscription once per resync", async () => {
			const { session, factory } = setup();
			const book = session.subscribe("orderbook_delta", [A]);
			session.subscribe("ticker", [A]);
			session.start();
			await settle();
			const client = factory.latest();
			ackSubscribed(client, book, 40, "orderbook_delta");

			expect(session.requestSnapshot(A)).toBe(1);
			expect(session.requestSnapshot(A)).toBe(0);
			expect(session.requestSnapshot(B)).toBe(0);
			expect(session.stats().resyncsInFlight).toBe(1);

			const cmds = client.commands().slice(2);
			expect(cmds[0]).toMatchObject({ cmd: "unsubscribe", params: { sids: [40] } });
			expect(cmds[1]).toEqual({
				id: book,
				cmd: "subscribe",
				params: { channels: ["orderbook_delta"], market_tickers: ["KXA"] },
			});

			ackSubscribed(client, book, 41, "orderbook_delta");
			expect(session.stats().resyncsInFlight).toBe(0);
			expect(session.requestSnapshot(A)).toBe(1);
			expect(client.commands().at(-2)).toMatchObject({ cmd: "unsubscribe", params: { sids: [41] } });
		});

		it("does nothing while not ready", () => {
			const { session } = setup();
			session.subscribe("orderbook_delta", [A]);
			expect(session.requestSnapshot(A)).toBe(0);
		});
	});

	describe("message authentication", () => {
		it("authenticates with a command and becomes ready on the ack", async () => {
			const { session, factory } = setup({ authMode: "message" });
			const id = session.subscribe("ticker", [A]);
			session.start();
			await settle();

			const client = factory.latest();
			expect(session.state).toBe("authenticating");
			expect(client.config.headers).toBeUndefined();
			const [auth] = client.commands();
			expect(auth).toMatchObject({
				cmd: "authenticate",
				params: { "KALSHI-ACCESS-KEY": "test-key" },
			});

			client.receive({ type: "authenticated", id: auth?.id });

			expect(session.state).toBe("ready");
			expect(client.commands()[1]).toMatchObject({ id, cmd: "subscribe" });
		});

		it("fails when the venue rejects the credentials", async () => {
			const { session, factory } = setup({ authMode: "message" });
			session.start();
			await settle();
			const client = factory.latest();
			const authId = client.commands()[0]?.id;

			client.receive({ type: "error", id: authId, msg: { code: 9, msg: "Authentication failed" } });

			expect(session.state).toBe("failed");
			expect(session.stats().lastError).toBeInstanceOf(HandshakeRejectedError);
			expect(session.stats().lastError?.message).toBe("Authentication rejected: Authentication failed");
		});

		it("treats a missing reply as a lost connection", async () => {
			const { session } = setup({ authMode: "message" });
			session.start();
			await settle();

			await vi.advanceTimersByTimeAsync(5_000);

			expect(session.state).toBe("degraded");
			expect(session.stats().lastError?.message).toBe("Authentication timed out");
		});
	});
});
