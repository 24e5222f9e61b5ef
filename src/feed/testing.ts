/**
 * Handler-test collaborators.
 */

import { silentLogger } from "../lib/logger/index.js";
import { EventStore } from "../persistence/event-store.js";
import { MemoryStorageBackend } from "../persistence/memory-backend.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { MarketState } from "./market-state.js";
import type { HandlerContext, SessionControl } from "./types.js";

export class RecordingSession implements SessionControl {
	readonly snapshotRequests: InstrumentId[] = [];
	readonly degradedReasons: string[] = [];

	requestSnapshot(instrument: InstrumentId): number {
		this.snapshotRequests.push(instrument);
		return 1;
	}

	forceDegraded(reason: string): void {
		this.degradedReasons.push(reason);
	}
}

export interface HandlerHarness extends HandlerContext {
	readonly state: MarketState;
	readonly store: EventStore;
	readonly session: RecordingSession;
	readonly backend: MemoryStorageBackend;
}

export function handlerHarness(recentLimit = 3): HandlerHarness {
	const backend = new MemoryStorageBackend();
	return {
		state: new MarketState({ recentLimit }),
		store: new EventStore({ backend, retryDelayMs: 0 }),
		session: new RecordingSession(),
		backend,
		logger: silentLogger(),
	};
}
