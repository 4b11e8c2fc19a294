import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;
type Listener = (event: DomainEvent) => void;

/** Called when a subscriber throws. Default: a process warning. */
export type HandlerErrorCallback = (error: unknown, event: DomainEvent) => void;

function isEventOfType<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}

function warnHandlerError(error: unknown, event: DomainEvent): void {
  const message = error instanceof Error ? error.message : String(error);
  process.emitWarning(`Handler for '${event.type}' threw: ${message}`, 'EventHandlerWarning');
}

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly handlers = new Map<EventType, Map<unknown, Listener>>();

  constructor(private readonly onHandlerError: HandlerErrorCallback = warnHandlerError) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, Listener>();
    existing.set(handler, (event) => {
      if (isEventOfType(event, type)) handler(event);
    });
    this.handlers.set(type, existing);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const listeners = this.handlers.get(event.type);
    if (!listeners) return;

    for (const listener of listeners.values()) {
      try {
        listener(event);
      } catch (error) {
        this.onHandlerError(error, event);
      }
    }
  }
}
