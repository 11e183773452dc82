/**
 * @fileoverview Analyzers barrel exports
 *
 * @module domain/analyzers
 */

export { MaritimeDocumentAnalyzer } from "./MaritimeDocumentAnalyzer.js";
