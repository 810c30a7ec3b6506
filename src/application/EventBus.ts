import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import type { Logger } from '../domain/ports/Logger.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Typed event bus for upload events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly handlers = new Map<EventType, Set<WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();
  private readonly wrapped = new Map<EventType, WeakMap<object, WildcardHandler>>();

  constructor(private readonly logger?: Logger) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Set<WildcardHandler>();
    existing.add(this.wrap(type, handler));
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const wrapper = this.wrapped.get(type)?.get(handler);
    if (wrapper) {
      this.handlers.get(type)?.delete(wrapper);
    }
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit an event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    for (const handler of this.handlers.get(event.type) ?? []) {
      this.invoke(handler, event);
    }
    for (const handler of this.wildcardHandlers) {
      this.invoke(handler, event);
    }
  }

  private wrap<T extends EventType>(type: T, handler: EventHandler<T>): WildcardHandler {
    const byHandler = this.wrapped.get(type) ?? new WeakMap<object, WildcardHandler>();
    this.wrapped.set(type, byHandler);

    const existing = byHandler.get(handler);
    if (existing) return existing;

    const wrapper: WildcardHandler = (event) => {
      if (isEventOf(type, event)) handler(event);
    };
    byHandler.set(handler, wrapper);
    return wrapper;
  }

  private invoke(handler: WildcardHandler, event: DomainEvent): void {
    try {
      handler(event);
    } catch (error) {
      // One broken subscriber must not stop the upload.
      this.logger?.warn(
        { event: event.type, error: error instanceof Error ? error.message : String(error) },
        'Event handler threw',
      );
    }
  }
}

function isEventOf<T extends EventType>(type: T, event: DomainEvent): event is EventPayload<T> {
  return event.type === type;
}
