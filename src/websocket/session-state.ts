/**
 * SessionStateMachine — validated connection lifecycle.
 *
 * All moves go through transition(), which checks them against the table
 * below. History is bounded (last N transitions) for debugging.
 *
 * | transition        | from                               | to             |
 * |-------------------|------------------------------------|----------------|
 * | start             | idle, closed, failed               | connecting     |
 * | socket_open       | connecting                         | authenticating |
 * | authenticated     | authenticating                     | ready          |
 * | rejected          | connecting, authenticating         | failed         |
 * | connection_lost   | connecting, authenticating, ready  | degraded       |
 * | retry             | degraded                           | connecting     |
 * | stop              | any but closed                     | closed         |
 */

import type { FeedError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import {
	type SessionTransition,
	SessionState,
	type StateChange,
	type StateError,
	StateErrorKind,
} from "./types.js";

const MAX_HISTORY = 100;

export class SessionStateMachine {
	private current: SessionState = SessionState.Idle;
	private enteredAt: number;
	private lastError: FeedError | null = null;
	private readonly transitions: StateChange[] = [];
	private readonly clock: Clock;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
		this.enteredAt = clock.now();
	}

	// ── Queries ────────────────────────────────────────────────────

	state(): SessionState {
		return this.current;
	}

	is(...states: SessionState[]): boolean {
		return states.includes(this.current);
	}

	/** A live or pending connection exists */
	isActive(): boolean {
		return this.is(SessionState.Connecting, SessionState.Authenticating, SessionState.Ready);
	}

	timeInState(): number {
		return this.clock.now() - this.enteredAt;
	}

	/** Error carried by the most recent `rejected` or `connection_lost` */
	error(): FeedError | null {
		return this.lastError;
	}

	/** Bounded transition history (most recent last) */
	history(): readonly StateChange[] {
		return this.transitions;
	}

	// ── Transitions ────────────────────────────────────────────────

	transition(t: SessionTransition): Result<StateChange, StateError> {
		const from = this.current;

		if (from === SessionState.Closed && t.type !== "start") {
			return err({
				kind: StateErrorKind.AlreadyClosed,
				message: "Session is closed",
				from,
				transition: t.type,
			});
		}

		const to = nextState(from, t);
		if (to === null) {
			return err({
				kind: StateErrorKind.InvalidTransition,
				message: `Cannot transition from ${from} via ${t.type}`,
				from,
				transition: t.type,
			});
		}

		const error = t.type === "rejected" || t.type === "connection_lost" ? t.error : null;
		const change: StateChange = { from, to, transition: t.type, error, at: this.clock.now() };

		if (this.transitions.length >= MAX_HISTORY) {
			this.transitions.shift();
		}
		this.transitions.push(change);
		this.current = to;
		this.enteredAt = change.at;
		if (error !== null) this.lastError = error;

		return ok(change);
	}
}

function nextState(from: SessionState, t: SessionTransition): SessionState | null {
	switch (t.type) {
		case "start":
			return from === SessionState.Idle || from === SessionState.Closed || from === SessionState.Failed
				? SessionState.Connecting
				: null;
		case "socket_open":
			return from === SessionState.Connecting ? SessionState.Authenticating : null;
		case "authenticated":
			return from === SessionState.Authenticating ? SessionState.Ready : null;
		case "rejected":
			return from === SessionState.Connecting || from === SessionState.Authenticating
				? SessionState.Failed
				: null;
		case "connection_lost":
			return from === SessionState.Connecting ||
				from === SessionState.Authenticating ||
				from === SessionState.Ready
				? SessionState.Degraded
				: null;
		case "retry":
			return from === SessionState.Degraded ? SessionState.Connecting : null;
		case "stop":
			return SessionState.Closed;
	}
}
