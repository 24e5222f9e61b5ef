export type {
	BookSide,
	DeltaOutcome,
	LevelChange,
	OrderbookSnapshotState,
	OrderbookStatus,
	OrderbookView,
	PriceLevel,
	PublishedOrderbook,
	StaleOrderbookView,
} from "./types.js";
export {
	OrderbookRegistry,
	OrderbookState,
	applyLevelChange,
	bestBid,
	impliedYesAsk,
	normalizeLevels,
	spread,
} from "./orderbook.js";
