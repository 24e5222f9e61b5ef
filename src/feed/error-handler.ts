import type { FeedHandler } from "../events/event-dispatcher.js";
import type { HandlerContext } from "./types.js";

/** Logs venue errors; a session-fatal one recycles the connection. */
export function createErrorHandler(ctx: Pick<HandlerContext, "session" | "logger">): FeedHandler<"error"> {
	const log = ctx.logger.child({ component: "venue-errors" });
	return (event) => {
		const fields = {
			code: event.code,
			message: event.message,
			commandId: event.commandId,
			sid: event.sid,
		};
		if (!event.fatal) {
			log.warn(fields, "Venue error");
			return;
		}
		log.error(fields, "Session-fatal venue error");
		ctx.session.forceDegraded(`Venue error ${event.code ?? "without code"}: ${event.message}`);
	};
}
