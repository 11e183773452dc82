/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @maritime-triage/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export {
    createConsoleLogger,
    silentLogger,
    type ConsoleLoggerOptions,
} from "./ConsoleLogger.js";
