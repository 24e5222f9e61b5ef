export type {
	HeaderSigner,
	SessionEvents,
	SessionStats,
	SessionTransition,
	SessionTransitionType,
	StateChange,
	StateError,
	Subscription,
	WsClientFactory,
	WsClientLike,
} from "./types.js";
export { ChannelKind, SessionState, StateErrorKind } from "./types.js";

export { SessionManager } from "./session-manager.js";
export type { SessionConfig, SessionManagerOptions } from "./session-manager.js";
export { SessionStateMachine } from "./session-state.js";
export { BackoffPolicy } from "./reconnection.js";
export type { BackoffConfig } from "./reconnection.js";
export { SubscriptionRegistry } from "./subscriptions.js";
export type { AckResolution, AddResult, ErrorResolution } from "./subscriptions.js";
export { OutboundQueue } from "./outbound-queue.js";
export {
	authenticateCommand,
	encodeCommand,
	subscribeCommand,
	unsubscribeCommand,
} from "./protocol.js";
export type {
	AuthenticateCommand,
	Command,
	SubscribeCommand,
	UnsubscribeCommand,
} from "./protocol.js";
