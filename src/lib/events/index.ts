import { EventEmitter } from "eventemitter3";

/**
 * Event map constraint: every key maps to a handler signature.
 * `...args: never` accepts handlers of any parameter list.
 */
export type EventMap<T> = { [K in keyof T]: (...args: never) => void };

type Listener = (...args: unknown[]) => void;

/**
 * Type-safe event emitter over eventemitter3.
 *
 * @example
 * ```ts
 * interface Events { state_change: (s: SessionState) => void }
 * const emitter = new TypedEmitter<Events>();
 * const off = emitter.subscribe("state_change", (s) => log(s));
 * off();
 * ```
 */
export class TypedEmitter<TEvents extends EventMap<TEvents>> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler as Listener);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler as Listener);
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler as Listener);
		return this;
	}

	/** Register a handler and get back the function that removes it. */
	subscribe<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): () => void {
		this.on(event, handler);
		return () => {
			this.off(event, handler);
		};
	}

	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
