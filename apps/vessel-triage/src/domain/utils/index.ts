/**
 * @fileoverview Utils barrel exports
 *
 * @module domain/utils
 */

export { attempt, type Result } from "./result.js";
