/**
 * @fileoverview Result helper
 *
 * Steps that may degrade (summary, keywords) report failure as a value
 * so the caller decides on the fallback.
 *
 * @module domain/utils/result
 */

import { describeError } from "@maritime-triage/engine";

export type Result<T> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: string };

/**
 * Run a step and capture a thrown error as a failed Result.
 */
export function attempt<T>(step: () => T): Result<T> {
    try {
        return { ok: true, value: step() };
    }
    catch (error) {
        return { ok: false, error: describeError(error) };
    }
}
