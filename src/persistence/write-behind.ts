/**
 * WriteBehindQueue — decouples the handlers from backend latency.
 *
 * Appends are buffered and written in batches; latest-view writes are
 * coalesced per (kind, instrument) so only the newest payload reaches the
 * backend. A single drain loop runs at a time, which keeps every stream in
 * submission order. A batch is handed to the backend one stream at a time,
 * so a retry never rewrites a stream that already succeeded. Failed writes
 * are retried with exponential delay and then dropped with a StoreWriteError
 * logged; callers never see the failure.
 */

import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { StoreWriteError } from "../shared/errors.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { sleep } from "../shared/time.js";
import type { LatestKind, LatestPayloadMap, StorageBackend, StoredRecord } from "./types.js";

export interface WriteBehindOptions {
	readonly backend: StorageBackend;
	/** Attempts per write, including the first */
	readonly maxAttempts: number;
	/** Delay before the first retry; doubles per further attempt */
	readonly retryDelayMs: number;
	readonly batchSize?: number | undefined;
	readonly logger?: Logger | undefined;
}

export interface WriteBehindStats {
	/** Records and latest views acknowledged by the backend */
	readonly written: number;
	/** Records and latest views given up on, including those rejected after close */
	readonly dropped: number;
	readonly retries: number;
	readonly pending: number;
}

const DEFAULT_BATCH_SIZE = 500;

export class WriteBehindQueue {
	private readonly backend: StorageBackend;
	private readonly maxAttempts: number;
	private readonly retryDelayMs: number;
	private readonly batchSize: number;
	private readonly log: Logger;

	private records: StoredRecord[] = [];
	private readonly latest = new Map<string, () => Promise<void>>();
	private running: Promise<void> | null = null;
	private closed = false;

	private written = 0;
	private dropped = 0;
	private retries = 0;

	constructor(options: WriteBehindOptions) {
		this.backend = options.backend;
		this.maxAttempts = Math.max(1, options.maxAttempts);
		this.retryDelayMs = options.retryDelayMs;
		this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
		this.log = (options.logger ?? silentLogger()).child({ component: "write-behind" });
	}

	append(record: StoredRecord): void {
		if (this.rejectWhenClosed(1)) return;
		this.records.push(record);
		this.schedule();
	}

	/** Replace the latest view; a write still queued for the same key is superseded. */
	putLatest<K extends LatestKind>(kind: K, instrumentId: InstrumentId, payload: LatestPayloadMap[K]): void {
		if (this.rejectWhenClosed(1)) return;
		this.latest.set(`${kind}:${instrumentId}`, () =>
			this.backend.putLatest(kind, instrumentId, payload),
		);
		this.schedule();
	}

	get pending(): number {
		return this.records.length + this.latest.size;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	stats(): WriteBehindStats {
		return {
			written: this.written,
			dropped: this.dropped,
			retries: this.retries,
			pending: this.pending,
		};
	}

	/** Resolves once everything queued before (and during) the call has been written or dropped. */
	async flush(): Promise<void> {
		while (this.running !== null) {
			await this.running;
		}
	}

	/** Refuse further writes and drain what is queued. */
	async close(): Promise<void> {
		this.closed = true;
		await this.flush();
	}

	private rejectWhenClosed(count: number): boolean {
		if (!this.closed) return false;
		this.dropped += count;
		this.log.warn({ dropped: this.dropped }, "Store is closed, write dropped");
		return true;
	}

	private schedule(): void {
		if (this.running !== null) return;
		this.running = this.drain()
			.catch((error: unknown) => {
				this.log.error({ err: error }, "Write-behind drain failed");
			})
			.finally(() => {
				this.running = null;
				if (this.pending > 0) this.schedule();
			});
	}

	private async drain(): Promise<void> {
		// let writes submitted in the same tick join the first batch
		await Promise.resolve();
		while (this.pending > 0) {
			if (this.records.length > 0) {
				const batch = this.records.slice(0, this.batchSize);
				this.records = this.records.slice(this.batchSize);
				for (const [stream, records] of groupByStream(batch)) {
					await this.attempt("append", records.length, () => this.backend.appendBatch(records), {
						stream,
					});
				}
			}
			if (this.latest.size > 0) {
				const writes = [...this.latest.entries()];
				this.latest.clear();
				for (const [key, write] of writes) {
					await this.attempt("latest", 1, write, { stream: key });
				}
			}
		}
	}

	private async attempt(
		operation: string,
		size: number,
		write: () => Promise<void>,
		details: { readonly stream: string },
	): Promise<void> {
		for (let attempt = 1; ; attempt++) {
			try {
				await write();
				this.written += size;
				return;
			} catch (cause) {
				if (attempt >= this.maxAttempts) {
					this.dropped += size;
					const error = new StoreWriteError(
						`Store ${operation} failed after ${attempt} attempts`,
						{ cause, records: size, stream: details.stream },
					);
					this.log.error({ err: error, dropped: this.dropped }, "Store write dropped");
					return;
				}
				this.retries++;
				this.log.warn(
					{
						operation,
						stream: details.stream,
						attempt,
						error: cause instanceof Error ? cause.message : String(cause),
					},
					"Store write failed, retrying",
				);
				await sleep(this.retryDelayMs * 2 ** (attempt - 1));
			}
		}
	}
}

/** Records keyed by `kind:instrument`, each group in submission order. */
function groupByStream(records: readonly StoredRecord[]): Map<string, StoredRecord[]> {
	const groups = new Map<string, StoredRecord[]>();
	for (const record of records) {
		const key = `${record.kind}:${record.instrumentId}`;
		const group = groups.get(key);
		if (group === undefined) groups.set(key, [record]);
		else group.push(record);
	}
	return groups;
}
