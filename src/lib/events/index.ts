import EventEmitter from "eventemitter3";

/**
 * Type-safe single-payload event emitter wrapping eventemitter3.
 *
 * `TEvents` maps each event name to the payload its handlers receive.
 *
 * @example
 * ```ts
 * type Events = { staged: { strategyId: string }; failed: Error };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("staged", (e) => console.log(e.strategyId));
 * emitter.emit("staged", { strategyId: "STRAT-1" });
 * ```
 */
export class TypedEmitter<TEvents extends object> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: (payload: TEvents[K]) => void): this {
		this.ee.on(event, handler);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: (payload: TEvents[K]) => void): this {
		this.ee.off(event, handler);
		return this;
	}

	/** Registers a handler that is removed after its first invocation. */
	once<K extends keyof TEvents & string>(event: K, handler: (payload: TEvents[K]) => void): this {
		this.ee.once(event, handler);
		return this;
	}

	/**
	 * Invokes every handler registered for the event.
	 * @returns true if at least one handler was registered
	 */
	emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
		return this.ee.emit(event, payload);
	}

	/** Removes all listeners for one event, or for every event when none is given. */
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
