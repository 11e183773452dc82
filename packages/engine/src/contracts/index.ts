/**
 * @fileoverview Contract barrel exports
 *
 * Grouped in pipeline order: what flows in, how it is scored and
 * analyzed, what runs afterwards, and what the engine reports.
 *
 * @module @maritime-triage/engine/contracts
 */

// Input
export type { Entity } from "./Entity.js";
export type { EntityProvider, FetchOptions, FetchResult } from "./EntityProvider.js";

// Scoring and analysis
export type { CategoryId, CategoryScore, ClassificationOutput } from "./ClassificationOutput.js";
export { getEffectiveConfidence } from "./ClassificationOutput.js";
export type { AnalysisOutput, EntityAnalyzer, PluginContext } from "./EntityAnalyzer.js";

// Actions
export type { ActionBinding, ActionContext, ActionPlugin, ActionResult } from "./ActionPlugin.js";
export { isActionPlugin, shouldActionExecute } from "./ActionPlugin.js";

// Observability
export type { Logger, LogLevel } from "./Logger.js";
export { LOG_LEVELS, describeError, isLogLevel } from "./Logger.js";
export type {
    EventBus,
    EventHandler,
    EventPayload,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./EventBus.js";
export { ENGINE_EVENT_TYPES, ENTITY_EVENT_TYPES, createEvent } from "./EventBus.js";
