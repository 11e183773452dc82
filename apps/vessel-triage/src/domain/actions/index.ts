/**
 * @fileoverview Actions barrel exports
 *
 * @module domain/actions
 */

export { PersistResultAction, type PersistResultActionConfig } from "./PersistResultAction.js";
export { CriticalAlertAction, type CriticalAlertActionConfig } from "./CriticalAlertAction.js";
