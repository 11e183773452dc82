/**
 * @fileoverview EventBus Contract
 *
 * Engine and entity lifecycle events. Dispatch is synchronous and in
 * process; a bus never queues, retries or persists events. Handlers of
 * one event type see events in emission order.
 *
 * @module @maritime-triage/engine/contracts/EventBus
 */

/**
 * Events about the engine itself, in the order a start/stop cycle emits them.
 */
export const ENGINE_EVENT_TYPES = [
    "engine:starting",
    "engine:started",
    "engine:stopping",
    "engine:stopped",
    "engine:error",
] as const;

/**
 * Events about one entity moving through analysis and actions.
 */
export const ENTITY_EVENT_TYPES = [
    "entity:received",
    "entity:analyzing",
    "entity:analyzed",
    "entity:actionExecuting",
    "entity:actionExecuted",
    "entity:actionError",
    "entity:processed",
    "entity:error",
] as const;

export type LifecycleEventType = typeof ENGINE_EVENT_TYPES[number];
export type ProcessingEventType = typeof ENTITY_EVENT_TYPES[number];
export type EventType = LifecycleEventType | ProcessingEventType;

/**
 * One emitted event.
 */
export interface EventPayload {
    readonly type: EventType;

    /** ISO-8601 emission time */
    readonly timestamp: string;

    /** Trace ID of the entity being processed, for entity events */
    readonly traceId?: string;
    readonly data?: Readonly<Record<string, unknown>>;
}

export type EventHandler = (event: EventPayload) => void;

export interface Subscription {
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * "*" subscribes to every event type.
 *
 * @example
 * ```typescript
 * const subscription = bus.subscribe("entity:analyzed", (event) => {
 *     logger.info("Document analyzed", event.data);
 * });
 *
 * bus.emit(createEvent("entity:analyzed", { entityId: "report-7" }, "tr_abc"));
 * subscription.unsubscribe();
 * ```
 */
export interface EventBus {
    emit(event: EventPayload): void;
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /** Like subscribe, but only for the next matching event */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /** Drop the handlers of one type, or of every type when omitted or "*" */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Build an event stamped with the current time. Absent data and trace
 * ID are left off the payload.
 */
export function createEvent(
    type: EventType,
    data?: Readonly<Record<string, unknown>>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        ...(traceId !== undefined && { traceId }),
        ...(data !== undefined && { data }),
    };
}
