import { EventEmitter } from "eventemitter3";

/**
 * Event name to handler signature.
 * Example: `{ position: (event: PositionEvent) => void; rejected: (trade: Trade, reason: string) => void }`
 */
export type EventMap = Record<string, (...args: never[]) => void>;

type AnyHandler = (...args: unknown[]) => void;

/**
 * Type-safe event emitter over eventemitter3.
 *
 * A handler that throws propagates out of `emit`; the copy engine relies on
 * this to surface listener bugs in tests instead of hiding them.
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler as AnyHandler);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler as AnyHandler);
		return this;
	}

	/** Handler is removed after its first invocation. */
	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler as AnyHandler);
		return this;
	}

	/** @returns whether any listener was registered */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	/** Removes listeners for one event, or for all events when none is given. */
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
