/**
 * @fileoverview Process-local event bus
 *
 * @module @maritime-triage/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import { describeError, type Logger } from "../contracts/Logger.js";
import { createConsoleLogger } from "./ConsoleLogger.js";

/**
 * Dispatches synchronously, in subscription order. "*" handlers see every
 * event after the typed ones. A handler that throws is logged and the
 * rest still run.
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("entity:analyzed", (event) => {
 *     logger.info("Analyzed", event.data);
 * });
 *
 * bus.emit(createEvent("entity:analyzed", { entityId: "report-7" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger: Logger;

    constructor(logger: Logger = createConsoleLogger({ prefix: "EventBus" })) {
        this.logger = logger;
    }

    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event);
        this.dispatch(this.handlers.get("*"), event);
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        const handlers = this.handlers.get(eventType) ?? new Set<EventHandler>();
        handlers.add(handler);
        this.handlers.set(eventType, handlers);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current?.delete(handler) && current.size === 0) {
                    this.handlers.delete(eventType);
                }
            },
        };
    }

    /** Handler runs for the next matching event only */
    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            handler(event);
        });

        return subscription;
    }

    /** No argument, or "*", drops every subscription */
    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        if (!handlers) {
            return;
        }

        // Copy first: once() handlers unsubscribe while we iterate.
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                this.logger.error("Event handler failed", {
                    eventType: event.type,
                    error    : describeError(error),
                });
            }
        }
    }
}
