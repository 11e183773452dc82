/**
 * @fileoverview EntityProvider Contract
 *
 * Providers are pulled, never pushed: the engine asks each registered
 * provider for a batch on every poll. A provider remembers what it has
 * already handed out, so one document is analyzed once.
 *
 * @module @maritime-triage/engine/contracts/EntityProvider
 */

import type { Entity } from "./Entity.js";

export interface FetchOptions {
    /** Batch size; providers choose their own default */
    readonly limit?: number;
}

export interface FetchResult<T extends Entity<object> = Entity> {
    readonly entities: readonly T[];

    /** True when the provider held back entities to honor the limit */
    readonly hasMore: boolean;
}

/**
 * EntityProvider interface.
 *
 * @example
 * ```typescript
 * class MailboxProvider implements EntityProvider<ReportEntity> {
 *     readonly id   = "mailbox";
 *     readonly name = "Report Mailbox";
 *
 *     async getEntities(options: FetchOptions = {}) {
 *         const batch = await this.mailbox.take(options.limit ?? 10);
 *         return { entities: batch.map(toReportEntity), hasMore: this.mailbox.size > 0 };
 *     }
 * }
 * ```
 */
export interface EntityProvider<T extends Entity<object> = Entity> {
    readonly id: string;
    readonly name: string;
    readonly description?: string;

    /** Runs once on engine start, before the first poll */
    initialize?(): Promise<void>;

    /** Next batch of entities not delivered before */
    getEntities(options?: FetchOptions): Promise<FetchResult<T>>;

    /** Runs once on engine stop, after the last poll has finished */
    shutdown?(): Promise<void>;
}
