/**
 * EventBus Service
 *
 * Typed pub/sub channel through which the deck engine tells observers
 * that something changed. One instance is created per engine and passed
 * to the services that emit.
 *
 * Usage:
 *   const unsubscribe = bus.on("card:updated", (event) => {
 *       console.log("Card changed:", event.cardId, event.changes);
 *   });
 *
 *   bus.emit({ type: "card:removed", cardIds: ["123"], timestamp: Date.now() });
 *
 *   unsubscribe();
 */
import type {
	AnyDeckEvent,
	DeckEventListener,
	DeckEventOf,
	DeckEventType,
} from "../../types/events.types";

function isEventOfType<K extends DeckEventType>(
	event: AnyDeckEvent,
	type: K
): event is DeckEventOf<K> {
	return event.type === type;
}

/** Key under which a typed listener is stored, so off() can find its wrapper */
type ListenerKey = (event: never) => void;

export class EventBusService {
	private listeners: Map<DeckEventType, Map<ListenerKey, DeckEventListener>> = new Map();
	private globalListeners: Set<DeckEventListener> = new Set();

	/**
	 * Subscribe to a specific event type
	 * @returns Unsubscribe function
	 */
	on<K extends DeckEventType>(
		eventType: K,
		listener: DeckEventListener<DeckEventOf<K>>
	): () => void {
		let typeListeners = this.listeners.get(eventType);
		if (!typeListeners) {
			typeListeners = new Map();
			this.listeners.set(eventType, typeListeners);
		}
		typeListeners.set(listener, (event) => {
			if (isEventOfType(event, eventType)) {
				listener(event);
			}
		});

		return () => this.off(eventType, listener);
	}

	/**
	 * Subscribe to ALL events (useful for logging/debugging)
	 * @returns Unsubscribe function
	 */
	onAll(listener: DeckEventListener): () => void {
		this.globalListeners.add(listener);
		return () => this.globalListeners.delete(listener);
	}

	/**
	 * Unsubscribe from a specific event type
	 */
	off<K extends DeckEventType>(
		eventType: K,
		listener: DeckEventListener<DeckEventOf<K>>
	): void {
		this.listeners.get(eventType)?.delete(listener);
	}

	/**
	 * Emit an event to all subscribers
	 * A throwing listener is logged and does not stop the others
	 */
	emit(event: AnyDeckEvent): void {
		const listeners = this.listeners.get(event.type);
		if (listeners) {
			for (const listener of [...listeners.values()]) {
				try {
					listener(event);
				} catch (error) {
					console.error(`[HanziDeck] Error in listener for ${event.type}:`, error);
				}
			}
		}

		for (const listener of [...this.globalListeners]) {
			try {
				listener(event);
			} catch (error) {
				console.error("[HanziDeck] Error in global listener:", error);
			}
		}
	}

	/**
	 * Remove every listener (engine shutdown)
	 */
	clear(): void {
		this.listeners.clear();
		this.globalListeners.clear();
	}

	/**
	 * Get listener count for debugging
	 */
	getListenerCount(eventType?: DeckEventType): number {
		if (eventType) {
			return this.listeners.get(eventType)?.size ?? 0;
		}
		let total = this.globalListeners.size;
		this.listeners.forEach((typeListeners) => (total += typeListeners.size));
		return total;
	}
}
