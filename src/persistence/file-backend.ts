/**
 * FileStorageBackend — JSONL streams plus atomically replaced latest views.
 *
 * Layout under `dir`:
 *   <kind>/<instrument>.jsonl   one StoredRecord per line, append-only
 *   latest/<kind>.json          { [instrument]: payload }, rewritten via temp file + rename
 *
 * Lines that fail to parse or decode are skipped on read and counted once.
 */

import { appendFile, mkdir, open, readFile, rename, writeFile } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { z } from "../lib/validation/index.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { tryCatch } from "../shared/result.js";
import { LATEST_SCHEMAS, RECORD_SCHEMAS } from "./record-schemas.js";
import type {
	LatestKind,
	LatestPayloadMap,
	RecordKind,
	StorageBackend,
	StoredRecord,
	StoredRecordOf,
} from "./types.js";

export interface FileStorageConfig {
	readonly dir: string;
	readonly logger?: Logger | undefined;
}

type LatestTable<K extends LatestKind> = Map<InstrumentId, LatestPayloadMap[K]>;
type LatestLoads = { [K in LatestKind]?: Promise<LatestTable<K>> };
type LatestWrites = { [K in LatestKind]: Promise<void> };

export class FileStorageBackend implements StorageBackend {
	private readonly dir: string;
	private readonly log: Logger;
	private readonly createdDirs = new Set<string>();
	private readonly corrupt = new Set<string>();
	private readonly loads: LatestLoads = {};
	private readonly writes: LatestWrites = {
		ticker: Promise.resolve(),
		orderbook: Promise.resolve(),
	};

	private constructor(config: FileStorageConfig) {
		this.dir = config.dir;
		this.log = (config.logger ?? silentLogger()).child({ component: "file-store" });
	}

	static create(config: FileStorageConfig): FileStorageBackend {
		return new FileStorageBackend(config);
	}

	get corruptLines(): number {
		return this.corrupt.size;
	}

	/** Path of the JSONL stream for one (kind, instrument). */
	streamPath(kind: RecordKind, instrumentId: InstrumentId): string {
		return join(this.dir, kind, `${encodeURIComponent(instrumentId)}.jsonl`);
	}

	latestPath(kind: LatestKind): string {
		return join(this.dir, "latest", `${kind}.json`);
	}

	async appendBatch(records: readonly StoredRecord[]): Promise<void> {
		const byPath = new Map<string, string[]>();
		const dirs = new Set<string>();
		for (const record of records) {
			dirs.add(join(this.dir, record.kind));
			const path = this.streamPath(record.kind, record.instrumentId);
			const line = `${JSON.stringify(record)}\n`;
			const lines = byPath.get(path);
			if (lines === undefined) byPath.set(path, [line]);
			else lines.push(line);
		}
		for (const dir of dirs) await this.ensureDir(dir);
		for (const [path, lines] of byPath) {
			await appendFile(path, lines.join(""), "utf-8");
		}
	}

	async putLatest<K extends LatestKind>(
		kind: K,
		instrumentId: InstrumentId,
		payload: LatestPayloadMap[K],
	): Promise<void> {
		const table = await this.latestTable(kind);
		table.set(instrumentId, payload);
		const write = (): Promise<void> => this.writeLatest(kind, table);
		// writes of one kind share a temp file, so they run one after another
		const next = this.writes[kind].then(write, write);
		this.writes[kind] = next;
		await next;
	}

	async getLatest<K extends LatestKind>(
		kind: K,
		instrumentId: InstrumentId,
	): Promise<LatestPayloadMap[K] | undefined> {
		const table = await this.latestTable(kind);
		return table.get(instrumentId);
	}

	async *scan<K extends RecordKind>(kind: K, instrumentId: InstrumentId): AsyncIterable<StoredRecordOf<K>> {
		const path = this.streamPath(kind, instrumentId);
		const schema: z.ZodType<StoredRecordOf<K>, z.ZodTypeDef, unknown> = RECORD_SCHEMAS[kind];

		let handle: FileHandle;
		try {
			handle = await open(path, "r");
		} catch (error: unknown) {
			if (isNodeError(error) && error.code === "ENOENT") return;
			throw error;
		}

		try {
			let lineNumber = 0;
			for await (const line of handle.readLines({ encoding: "utf8" })) {
				lineNumber++;
				const trimmed = line.trim();
				if (trimmed.length === 0) continue;
				const decoded = schema.safeParse(parseJson(trimmed));
				if (decoded.success) {
					yield decoded.data;
				} else {
					this.markCorrupt(path, lineNumber, trimmed);
				}
			}
		} finally {
			await handle.close();
		}
	}

	async close(): Promise<void> {
		await Promise.allSettled([this.writes.ticker, this.writes.orderbook]);
	}

	private async latestTable<K extends LatestKind>(kind: K): Promise<LatestTable<K>> {
		const loads: { [P in K]?: Promise<LatestTable<P>> } = this.loads;
		const loading: Promise<LatestTable<K>> | undefined = loads[kind];
		if (loading !== undefined) return loading;
		// a failed load is forgotten so the next call reads the file again
		const load = this.loadLatest(kind).catch((error: unknown) => {
			delete loads[kind];
			throw error;
		});
		loads[kind] = load;
		return load;
	}

	private async loadLatest<K extends LatestKind>(kind: K): Promise<LatestTable<K>> {
		const path = this.latestPath(kind);
		const table: LatestTable<K> = new Map();

		let content: string;
		try {
			content = await readFile(path, "utf-8");
		} catch (error: unknown) {
			if (isNodeError(error) && error.code === "ENOENT") return table;
			throw error;
		}

		const parsed = parseJson(content);
		if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
			this.markCorrupt(path, 0, content);
			return table;
		}

		const schema: z.ZodType<LatestPayloadMap[K], z.ZodTypeDef, unknown> = LATEST_SCHEMAS[kind];
		for (const [key, value] of Object.entries(parsed)) {
			const decoded = schema.safeParse(value);
			if (decoded.success) {
				table.set(decoded.data.instrumentId, decoded.data);
			} else {
				this.markCorrupt(path, key, JSON.stringify(value));
			}
		}
		return table;
	}

	private async writeLatest<K extends LatestKind>(kind: K, table: LatestTable<K>): Promise<void> {
		const path = this.latestPath(kind);
		const temp = `${path}.tmp`;
		await this.ensureDir(join(this.dir, "latest"));
		await writeFile(temp, JSON.stringify(Object.fromEntries(table)), "utf-8");
		await rename(temp, path);
	}

	private async ensureDir(dir: string): Promise<void> {
		if (this.createdDirs.has(dir)) return;
		await mkdir(dir, { recursive: true });
		this.createdDirs.add(dir);
	}

	private markCorrupt(path: string, location: number | string, raw: string): void {
		const key = `${path}:${location}`;
		if (this.corrupt.has(key)) return;
		this.corrupt.add(key);
		this.log.warn({ path, location, raw: raw.slice(0, 200) }, "Skipping corrupt stored line");
	}
}

/** JSON.parse that yields `undefined` for invalid input; the schemas reject it. */
function parseJson(text: string): unknown {
	const parsed = tryCatch((): unknown => JSON.parse(text));
	return parsed.ok ? parsed.value : undefined;
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
