/**
 * @fileoverview TriageEngine
 *
 * Each tick pulls a batch from every registered provider. An entity goes
 * to its domain's analyzer, then to each action whose binding accepts the
 * resulting category. Every stage is announced on the event bus.
 *
 * @module @maritime-triage/engine/engine/TriageEngine
 */

import type { Entity } from "../contracts/Entity.js";
import { getEffectiveConfidence } from "../contracts/ClassificationOutput.js";
import type { AnalysisOutput, EntityAnalyzer, PluginContext } from "../contracts/EntityAnalyzer.js";
import { shouldActionExecute, type ActionContext, type ActionPlugin, type ActionResult } from "../contracts/ActionPlugin.js";
import type { EntityProvider } from "../contracts/EntityProvider.js";
import { createEvent, type EventBus, type EventPayload } from "../contracts/EventBus.js";
import { describeError, type Logger } from "../contracts/Logger.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { createConsoleLogger } from "../impl/ConsoleLogger.js";

/**
 * What a domain plugs into the engine. The provider's entity type and the
 * analyzer's report type flow through to the actions.
 */
export interface DomainRegistration<TEntity extends Entity<object>, TReport> {
    readonly id: string;
    readonly name: string;
    readonly provider: EntityProvider<TEntity>;
    readonly analyzer: EntityAnalyzer<TEntity, TReport>;

    /** Tried in this order */
    readonly actions: readonly ActionPlugin<TEntity, TReport>[];

    /** Passed to the analyzer and actions as `context.config` */
    readonly config?: Readonly<Record<string, unknown>>;
}

export interface EngineConfig {
    /** Milliseconds between polls; 30000 */
    readonly pollingInterval?: number;

    /** Entities requested from each provider per poll; 10 */
    readonly batchSize?: number;
    readonly eventBus?: EventBus;
    readonly logger?: Logger;

    /** Trace ID source (default: time + random, prefixed "tr_") */
    readonly generateTraceId?: () => string;
}

/**
 * What happened to one entity.
 */
export interface ProcessingOutcome<TReport> {
    readonly traceId: string;
    readonly entityId: string;

    /** Present unless the analyzer threw */
    readonly analysis?: AnalysisOutput<TReport>;

    /** One result per executed action, in registration order */
    readonly actionResults: readonly ActionResult[];

    /** Analyzer failure message */
    readonly error?: string;
}

/**
 * A registered domain with its entity and report types erased.
 */
interface RegisteredDomain {
    readonly id: string;
    readonly name: string;
    readonly providerId: string;
    initialize(): Promise<void>;
    shutdown(): Promise<void>;
    pollOnce(limit: number): Promise<number>;
}

function defaultTraceId(): string {
    const stamp  = Date.now().toString(36);
    const suffix = Math.random().toString(36).slice(2, 8);
    return `tr_${stamp}_${suffix}`;
}

/**
 * @example
 * ```typescript
 * const engine = new TriageEngine({ pollingInterval: 10000 });
 *
 * engine.registerDomain({
 *     id      : "vessel",
 *     name    : "Vessel Document Triage",
 *     provider: new InboxDirectoryProvider({ inboxDir: "./inbox" }),
 *     analyzer: new MaritimeDocumentAnalyzer(processor),
 *     actions : [persistAction, alertAction],
 * });
 *
 * engine.eventBus.subscribe("entity:analyzed", (event) => {
 *     logger.info("Analyzed", event.data);
 * });
 *
 * await engine.start();
 * ```
 */
export class TriageEngine {
    private readonly pollingInterval: number;
    private readonly batchSize: number;
    private readonly logger: Logger;
    private readonly nextTraceId: () => string;

    private readonly domains: Map<string, RegisteredDomain> = new Map();
    private running = false;
    /** In-flight scheduled poll, awaited by stop() */
    private currentPoll: Promise<void> | null = null;
    private pollTimer: ReturnType<typeof setInterval> | null = null;

    /** Subscribe here to follow processing */
    public readonly eventBus: EventBus;

    constructor(config: EngineConfig = {}) {
        this.logger          = config.logger ?? createConsoleLogger({ prefix: "TriageEngine" });
        this.eventBus        = config.eventBus ?? new InMemoryEventBus(this.logger);
        this.pollingInterval = config.pollingInterval ?? 30000;
        this.batchSize       = config.batchSize ?? 10;
        this.nextTraceId     = config.generateTraceId ?? defaultTraceId;
    }

    /**
     * @throws Error when the id is taken
     */
    registerDomain<TEntity extends Entity<object>, TReport>(domain: DomainRegistration<TEntity, TReport>): void {
        if (this.domains.has(domain.id)) {
            throw new Error(`Domain already registered: ${domain.id}`);
        }

        const provider = domain.provider;

        this.domains.set(domain.id, {
            id        : domain.id,
            name      : domain.name,
            providerId: provider.id,
            initialize: async () => {
                if (provider.initialize) {
                    await provider.initialize();
                }
            },
            shutdown: async () => {
                if (provider.shutdown) {
                    await provider.shutdown();
                }
            },
            pollOnce: async (limit) => {
                const result = await provider.getEntities({ limit });

                for (const entity of result.entities) {
                    await this.processEntity(domain, entity);
                }
                return result.entities.length;
            },
        });

        this.logger.info("Domain registered", {
            domainId: domain.id,
            name    : domain.name,
            analyzer: domain.analyzer.id,
            actions : domain.actions.length,
        });
    }

    unregisterDomain(domainId: string): void {
        if (this.domains.delete(domainId)) {
            this.logger.info("Domain unregistered", { domainId });
        }
    }

    /**
     * Initialize every provider, poll once straight away, then on the
     * interval. A provider that fails to initialize aborts the start.
     */
    async start(): Promise<void> {
        if (this.running) {
            this.logger.warn("Engine already running");
            return;
        }

        this.emit(createEvent("engine:starting"));
        this.logger.info("Engine starting...");

        for (const domain of this.domains.values()) {
            try {
                await domain.initialize();
                this.logger.info("Provider initialized", {
                    domainId  : domain.id,
                    providerId: domain.providerId,
                });
            }
            catch (error) {
                this.logger.error("Provider initialization failed", {
                    domainId: domain.id,
                    error   : describeError(error),
                });
                this.emit(createEvent("engine:error", {
                    domainId: domain.id,
                    error   : describeError(error),
                }));
                throw error;
            }
        }

        this.running = true;

        this.schedulePoll();
        this.pollTimer = setInterval(() => this.schedulePoll(), this.pollingInterval);

        this.emit(createEvent("engine:started", {
            domains        : Array.from(this.domains.keys()),
            pollingInterval: this.pollingInterval,
        }));

        this.logger.info("Engine started", {
            domains        : this.domains.size,
            pollingInterval: this.pollingInterval,
        });
    }

    /**
     * Stop polling, let a poll already under way finish, then shut the
     * providers down. Shutdown errors are logged, not thrown.
     */
    async stop(): Promise<void> {
        if (!this.running) {
            return;
        }

        this.emit(createEvent("engine:stopping"));
        this.logger.info("Engine stopping...");

        this.running = false;

        if (this.pollTimer) {
            clearInterval(this.pollTimer);
            this.pollTimer = null;
        }

        if (this.currentPoll) {
            await this.currentPoll;
        }

        for (const domain of this.domains.values()) {
            try {
                await domain.shutdown();
            }
            catch (error) {
                this.logger.error("Provider shutdown error", {
                    domainId: domain.id,
                    error   : describeError(error),
                });
            }
        }

        this.emit(createEvent("engine:stopped"));
        this.logger.info("Engine stopped");
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Poll every domain once and process what comes back.
     *
     * @returns Number of entities fetched across all domains
     */
    async pollOnce(): Promise<number> {
        let fetched = 0;

        for (const domain of this.domains.values()) {
            try {
                fetched += await domain.pollOnce(this.batchSize);
            }
            catch (error) {
                this.logger.error("Domain poll error", {
                    domainId: domain.id,
                    error   : describeError(error),
                });
                this.emit(createEvent("engine:error", {
                    domainId: domain.id,
                    error   : describeError(error),
                }));
            }
        }

        if (fetched > 0) {
            this.logger.debug("Poll complete", { fetched });
        }
        return fetched;
    }

    /**
     * Analyze one entity and run its matching actions. Plugins see a copy
     * stamped with the trace id. Never throws; an analyzer failure comes
     * back in `error` and as an entity:error event.
     */
    async processEntity<TEntity extends Entity<object>, TReport>(
        domain: DomainRegistration<TEntity, TReport>,
        entity: TEntity
    ): Promise<ProcessingOutcome<TReport>> {
        const traceId   = this.nextTraceId();
        const startedAt = Date.now();
        const traced: TEntity = { ...entity, traceId };

        this.emit(createEvent("entity:received", {
            domainId: domain.id,
            entityId: entity.id,
        }, traceId));

        let analysis: AnalysisOutput<TReport>;
        try {
            this.emit(createEvent("entity:analyzing", {
                domainId  : domain.id,
                entityId  : entity.id,
                analyzerId: domain.analyzer.id,
            }, traceId));

            const context: PluginContext = {
                config: domain.config ?? {},
                logger: this.createPluginLogger(domain.id, domain.analyzer.id, traceId),
                traceId,
            };

            analysis = await domain.analyzer.analyze(traced, context);
        }
        catch (error) {
            this.emit(createEvent("entity:error", {
                domainId: domain.id,
                entityId: entity.id,
                error   : describeError(error),
            }, traceId));

            this.logger.error("Entity processing error", {
                domainId: domain.id,
                entityId: entity.id,
                traceId,
                error   : describeError(error),
            });

            return { traceId, entityId: entity.id, actionResults: [], error: describeError(error) };
        }

        this.emit(createEvent("entity:analyzed", {
            domainId  : domain.id,
            entityId  : entity.id,
            type      : analysis.type,
            confidence: getEffectiveConfidence(analysis),
            tags      : analysis.tags,
        }, traceId));

        const actionResults = await this.executeActions(domain, traced, analysis, traceId);

        const duration = Date.now() - startedAt;
        this.emit(createEvent("entity:processed", {
            domainId: domain.id,
            entityId: entity.id,
            type    : analysis.type,
            duration,
        }, traceId));

        this.logger.debug("Entity processed", {
            domainId: domain.id,
            entityId: entity.id,
            type    : analysis.type,
            traceId,
            duration,
        });

        return { traceId, entityId: entity.id, analysis, actionResults };
    }

    /**
     * Kick off a poll unless one is still running.
     */
    private schedulePoll(): void {
        if (this.currentPoll) {
            this.logger.debug("Previous poll still running; skipping tick");
            return;
        }

        this.currentPoll = this.pollOnce()
            .then(() => undefined)
            .catch((error: unknown) => {
                this.logger.error("Poll failed", { error: describeError(error) });
            })
            .finally(() => {
                this.currentPoll = null;
            });
    }

    /** A throwing action becomes a failed result; the rest still run. */
    private async executeActions<TEntity extends Entity<object>, TReport>(
        domain: DomainRegistration<TEntity, TReport>,
        entity: TEntity,
        analysis: AnalysisOutput<TReport>,
        traceId: string
    ): Promise<ActionResult[]> {
        const results: ActionResult[] = [];

        for (const action of domain.actions) {
            if (!shouldActionExecute(action, analysis)) {
                continue;
            }

            this.emit(createEvent("entity:actionExecuting", {
                domainId: domain.id,
                entityId: entity.id,
                actionId: action.id,
                type    : analysis.type,
            }, traceId));

            try {
                const context: ActionContext<TEntity, TReport> = {
                    entity,
                    analysis,
                    config: domain.config ?? {},
                    logger: this.createPluginLogger(domain.id, action.id, traceId),
                    traceId,
                };

                const result = await action.handle(context);
                results.push(result);

                this.emit(createEvent("entity:actionExecuted", {
                    domainId: domain.id,
                    entityId: entity.id,
                    actionId: action.id,
                    success : result.success,
                    error   : result.error,
                }, traceId));

                if (!result.success) {
                    this.logger.warn("Action failed", {
                        domainId: domain.id,
                        actionId: action.id,
                        entityId: entity.id,
                        error   : result.error,
                    });
                }
            }
            catch (error) {
                results.push({ actionId: action.id, success: false, error: describeError(error) });

                this.logger.error("Action execution error", {
                    domainId: domain.id,
                    actionId: action.id,
                    entityId: entity.id,
                    error   : describeError(error),
                });

                this.emit(createEvent("entity:actionError", {
                    domainId: domain.id,
                    entityId: entity.id,
                    actionId: action.id,
                    error   : describeError(error),
                }, traceId));
            }
        }

        return results;
    }

    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }

    private createPluginLogger(domainId: string, pluginId: string, traceId: string): Logger {
        const tag = `[${domainId}:${pluginId}]`;
        return {
            debug: (msg, data) => this.logger.debug(`${tag} ${msg}`, { ...data, traceId }),
            info : (msg, data) => this.logger.info(`${tag} ${msg}`, { ...data, traceId }),
            warn : (msg, data) => this.logger.warn(`${tag} ${msg}`, { ...data, traceId }),
            error: (msg, data) => this.logger.error(`${tag} ${msg}`, { ...data, traceId }),
        };
    }
}
