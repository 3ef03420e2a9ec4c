import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type AnyHandler = (event: DomainEvent) => void;

/** Receives errors thrown by subscribers. */
export type HandlerErrorCallback = (error: unknown, event: DomainEvent) => void;

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly handlers = new Map<EventType, Set<AnyHandler>>();
  private readonly registered = new Map<EventType, Map<(event: never) => void, AnyHandler>>();

  constructor(private readonly onHandlerError?: HandlerErrorCallback) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    // handlers are kept per type, so only events of `type` reach this wrapper
    const wrapped: AnyHandler = (event) => handler(event as EventPayload<T>);
    const byHandler = this.registered.get(type) ?? new Map<(event: never) => void, AnyHandler>();
    if (byHandler.has(handler)) return;
    byHandler.set(handler, wrapped);
    this.registered.set(type, byHandler);

    const existing = this.handlers.get(type) ?? new Set<AnyHandler>();
    existing.add(wrapped);
    this.handlers.set(type, existing);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const wrapped = this.registered.get(type)?.get(handler);
    if (!wrapped) return;
    this.registered.get(type)?.delete(handler);
    this.handlers.get(type)?.delete(wrapped);
  }

  /** Emit a domain event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        handler(event);
      } catch (error) {
        this.onHandlerError?.(error, event);
      }
    }
  }
}
