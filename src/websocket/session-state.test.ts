import { describe, expect, it } from "vitest";
import { HandshakeRejectedError, TransportError } from "../shared/errors.js";
import { FakeClock } from "../shared/time.js";
import { SessionStateMachine } from "./session-state.js";
import { SessionState, StateErrorKind } from "./types.js";

const lost = { type: "connection_lost", error: new TransportError("socket closed") } as const;
const rejected = {
	type: "rejected",
	error: new HandshakeRejectedError("Handshake rejected", 401),
} as const;

function readyMachine(clock = new FakeClock(0)): SessionStateMachine {
	const fsm = new SessionStateMachine(clock);
	fsm.transition({ type: "start" });
	fsm.transition({ type: "socket_open" });
	fsm.transition({ type: "authenticated" });
	return fsm;
}

describe("SessionStateMachine", () => {
	it("starts idle", () => {
		expect(new SessionStateMachine().state()).toBe(SessionState.Idle);
	});

	it("walks the happy path to ready", () => {
		const fsm = readyMachine();
		expect(fsm.state()).toBe(SessionState.Ready);
		expect(fsm.history().map((c) => c.to)).toEqual(["connecting", "authenticating", "ready"]);
	});

	it("cycles ready → degraded → connecting on a lost connection", () => {
		const fsm = readyMachine();

		const change = fsm.transition(lost);
		expect(change.ok && change.value).toMatchObject({
			from: "ready",
			to: "degraded",
			transition: "connection_lost",
		});
		expect(fsm.error()?.message).toBe("socket closed");

		expect(fsm.transition({ type: "retry" }).ok).toBe(true);
		expect(fsm.state()).toBe(SessionState.Connecting);
	});

	it("refuses a retry unless degraded", () => {
		const fsm = readyMachine();
		const r = fsm.transition({ type: "retry" });
		expect(r.ok).toBe(false);
		if (!r.ok) {
			expect(r.error.kind).toBe(StateErrorKind.InvalidTransition);
			expect(r.error.message).toBe("Cannot transition from ready via retry");
		}
	});

	it("moves to failed on rejection and only start leaves it", () => {
		const fsm = new SessionStateMachine();
		fsm.transition({ type: "start" });
		fsm.transition(rejected);
		expect(fsm.state()).toBe(SessionState.Failed);

		expect(fsm.transition({ type: "retry" }).ok).toBe(false);
		expect(fsm.transition(lost).ok).toBe(false);
		expect(fsm.transition({ type: "start" }).ok).toBe(true);
		expect(fsm.state()).toBe(SessionState.Connecting);
	});

	it("cannot reject a ready session", () => {
		expect(readyMachine().transition(rejected).ok).toBe(false);
	});

	it("stops from any state, once", () => {
		const fsm = readyMachine();
		fsm.transition(lost);
		expect(fsm.transition({ type: "stop" }).ok).toBe(true);
		expect(fsm.state()).toBe(SessionState.Closed);

		const again = fsm.transition({ type: "stop" });
		expect(!again.ok && again.error.kind).toBe(StateErrorKind.AlreadyClosed);
	});

	it("can be restarted after close", () => {
		const fsm = new SessionStateMachine();
		fsm.transition({ type: "stop" });
		expect(fsm.transition({ type: "start" }).ok).toBe(true);
	});

	it("tracks time in state with the injected clock", () => {
		const clock = new FakeClock(1_000);
		const fsm = readyMachine(clock);
		clock.advance(250);
		expect(fsm.timeInState()).toBe(250);
	});

	it("keeps a bounded history", () => {
		const fsm = readyMachine();
		for (let i = 0; i < 60; i++) {
			fsm.transition(lost);
			fsm.transition({ type: "retry" });
		}
		expect(fsm.history()).toHaveLength(100);
		expect(fsm.history().at(-1)?.transition).toBe("retry");
	});
});
