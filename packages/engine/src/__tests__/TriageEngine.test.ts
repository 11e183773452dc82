/**
 * @fileoverview Unit tests for TriageEngine
 *
 * Tests cover:
 * - Domain registration
 * - Engine lifecycle (start/stop)
 * - Entity processing pipeline
 * - Action execution via bindings
 * - Event emission
 * - Error handling
 *
 * @module @maritime-triage/engine/__tests__/TriageEngine
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TriageEngine, type DomainRegistration } from "../engine/TriageEngine.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { Entity } from "../contracts/Entity.js";
import type { AnalysisOutput, EntityAnalyzer } from "../contracts/EntityAnalyzer.js";
import type { ActionPlugin, ActionBinding, ActionResult } from "../contracts/ActionPlugin.js";
import type { EntityProvider, FetchResult } from "../contracts/EntityProvider.js";
import type { Logger } from "../contracts/Logger.js";

interface TestReport {
    readonly summary: string;
}

type TestEntity = Entity<{ source: string }>;

function createMockEntity(id: string, content: string): TestEntity {
    return { id, content, metadata: { source: "test" } };
}

function createMockLogger(): Logger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

/**
 * Provider that returns its entities on the first call only
 */
function createMockProvider(entities: TestEntity[] = []): EntityProvider<TestEntity> {
    let called = false;

    return {
        id         : "mock-provider",
        name       : "Mock Provider",
        initialize : vi.fn().mockResolvedValue(undefined),
        shutdown   : vi.fn().mockResolvedValue(undefined),
        getEntities: vi.fn().mockImplementation(async (): Promise<FetchResult<TestEntity>> => {
            if (called) {
                return { entities: [], hasMore: false };
            }
            called = true;
            return { entities, hasMore: false };
        }),
    };
}

function createMockAnalyzer(
    output: AnalysisOutput<TestReport> = { type: "hazard", confidence: 0.9, report: { summary: "ok" } },
    shouldThrow = false
): EntityAnalyzer<TestEntity, TestReport> {
    return {
        id     : "mock-analyzer",
        analyze: vi.fn().mockImplementation(async () => {
            if (shouldThrow) {
                throw new Error("Analyzer exploded");
            }
            return output;
        }),
    };
}

function createMockAction(
    id: string,
    bindings: Record<string, ActionBinding>,
    executeResult: ActionResult | null = null,
    shouldThrow = false
): ActionPlugin<TestEntity, TestReport> {
    return {
        id,
        bindings,
        handle: vi.fn().mockImplementation(async () => {
            if (shouldThrow) {
                throw new Error(`Action ${id} error`);
            }
            return executeResult ?? { actionId: id, success: true };
        }),
    };
}

function createDomain(
    overrides: Partial<DomainRegistration<TestEntity, TestReport>> = {}
): DomainRegistration<TestEntity, TestReport> {
    return {
        id      : "test-domain",
        name    : "Test Domain",
        provider: createMockProvider(),
        analyzer: createMockAnalyzer(),
        actions : [],
        ...overrides,
    };
}

describe("TriageEngine", () => {
    let engine: TriageEngine;
    let eventBus: InMemoryEventBus;
    let logger: Logger;

    beforeEach(() => {
        vi.useFakeTimers();
        logger   = createMockLogger();
        eventBus = new InMemoryEventBus(logger);
        engine   = new TriageEngine({
            pollingInterval: 1000,
            batchSize      : 10,
            eventBus,
            logger,
            generateTraceId: () => "tr_fixed",
        });
    });

    afterEach(async () => {
        if (engine.isRunning) {
            await engine.stop();
        }
        vi.useRealTimers();
    });

    describe("domain registration", () => {
        // Scenario: Duplicate domain registration throws
        it("should throw when registering duplicate domain ID", () => {
            const domain = createDomain();
            engine.registerDomain(domain);

            expect(() => engine.registerDomain(domain)).toThrow("Domain already registered: test-domain");
        });

        // Scenario: Unregister a domain
        it("should allow re-registering after unregister", () => {
            const domain = createDomain();

            engine.registerDomain(domain);
            engine.unregisterDomain("test-domain");

            expect(() => engine.registerDomain(domain)).not.toThrow();
        });
    });

    describe("lifecycle", () => {
        // Scenario: Engine starts and stops correctly
        it("should initialize and shut down providers", async () => {
            const provider = createMockProvider();
            engine.registerDomain(createDomain({ provider }));

            await engine.start();
            expect(engine.isRunning).toBe(true);
            expect(provider.initialize).toHaveBeenCalledTimes(1);

            await engine.stop();
            expect(engine.isRunning).toBe(false);
            expect(provider.shutdown).toHaveBeenCalledTimes(1);
        });

        // Scenario: Lifecycle events in order
        it("should emit lifecycle events in order", async () => {
            const seen: string[] = [];
            eventBus.subscribe("*", (event) => {
                if (event.type.startsWith("engine:")) {
                    seen.push(event.type);
                }
            });
            engine.registerDomain(createDomain());

            await engine.start();
            await engine.stop();

            expect(seen).toEqual(["engine:starting", "engine:started", "engine:stopping", "engine:stopped"]);
        });

        // Scenario: Provider initialization failure
        it("should reject start when a provider fails to initialize", async () => {
            const provider: EntityProvider<TestEntity> = {
                ...createMockProvider(),
                initialize: vi.fn().mockRejectedValue(new Error("Init failed")),
            };
            engine.registerDomain(createDomain({ provider }));

            await expect(engine.start()).rejects.toThrow("Init failed");
            expect(engine.isRunning).toBe(false);
        });

        // Scenario: Stop during a poll
        it("should finish a running poll before shutting down", async () => {
            const order: string[] = [];
            let release: () => void = () => undefined;
            const gate = new Promise<void>(resolve => {
                release = resolve;
            });

            const provider: EntityProvider<TestEntity> = {
                id         : "slow",
                name       : "Slow",
                shutdown   : vi.fn().mockImplementation(async () => {
                    order.push("shutdown");
                }),
                getEntities: vi.fn().mockImplementation(async (): Promise<FetchResult<TestEntity>> => {
                    await gate;
                    order.push("fetched");
                    return { entities: [], hasMore: false };
                }),
            };
            engine.registerDomain(createDomain({ provider }));

            await engine.start();
            const stopping = engine.stop();
            release();
            await stopping;

            expect(order).toEqual(["fetched", "shutdown"]);
        });

        // Scenario: Polling runs on start and on every interval
        it("should poll immediately and then on each interval", async () => {
            const provider = createMockProvider([createMockEntity("doc-1", "fog ahead")]);
            const analyzer = createMockAnalyzer();
            engine.registerDomain(createDomain({ provider, analyzer }));

            await engine.start();
            await vi.advanceTimersByTimeAsync(10);
            expect(provider.getEntities).toHaveBeenCalledTimes(1);
            expect(analyzer.analyze).toHaveBeenCalledTimes(1);

            await vi.advanceTimersByTimeAsync(1000);
            expect(provider.getEntities).toHaveBeenCalledTimes(2);
            expect(analyzer.analyze).toHaveBeenCalledTimes(1);
        });
    });

    describe("entity processing", () => {
        // Scenario: Full pipeline
        it("should analyze and run bound actions", async () => {
            const action = createMockAction("alert", { hazard: { minConfidence: 0.5 } });
            const domain = createDomain({ actions: [action] });

            const outcome = await engine.processEntity(domain, createMockEntity("doc-1", "fog ahead"));

            expect(outcome.traceId).toBe("tr_fixed");
            expect(outcome.analysis?.report).toEqual({ summary: "ok" });
            expect(outcome.actionResults).toEqual([{ actionId: "alert", success: true }]);
            expect(action.handle).toHaveBeenCalledWith(expect.objectContaining({
                traceId : "tr_fixed",
                entity  : expect.objectContaining({ id: "doc-1" }),
                analysis: expect.objectContaining({ type: "hazard" }),
            }));
        });

        // Scenario: Plugins see the trace ID on the entity
        it("should stamp the trace ID on the entity handed to plugins", async () => {
            const analyzer = createMockAnalyzer();
            const action   = createMockAction("alert", { hazard: {} });
            const entity   = createMockEntity("doc-1", "fog ahead");

            await engine.processEntity(createDomain({ analyzer, actions: [action] }), entity);

            expect(analyzer.analyze).toHaveBeenCalledWith(
                { id: "doc-1", content: "fog ahead", metadata: { source: "test" }, traceId: "tr_fixed" },
                expect.objectContaining({ traceId: "tr_fixed" })
            );
            expect(action.handle).toHaveBeenCalledWith(expect.objectContaining({
                entity: expect.objectContaining({ id: "doc-1", traceId: "tr_fixed" }),
            }));
            expect(entity).not.toHaveProperty("traceId");
        });

        // Scenario: Unbound or under-threshold actions are skipped
        it("should skip actions whose bindings do not match", async () => {
            const other   = createMockAction("other", { routine: {} });
            const strict  = createMockAction("strict", { hazard: { minConfidence: 0.95 } });
            const outcome = await engine.processEntity(
                createDomain({ actions: [other, strict] }),
                createMockEntity("doc-1", "fog ahead")
            );

            expect(other.handle).not.toHaveBeenCalled();
            expect(strict.handle).not.toHaveBeenCalled();
            expect(outcome.actionResults).toEqual([]);
        });

        // Scenario: Events carry the analysis
        it("should emit entity events with the trace ID", async () => {
            const seen: string[] = [];
            const analyzed = vi.fn();
            eventBus.subscribe("*", (event) => seen.push(event.type));
            eventBus.subscribe("entity:analyzed", analyzed);

            await engine.processEntity(
                createDomain({ actions: [createMockAction("alert", { hazard: {} })] }),
                createMockEntity("doc-1", "fog ahead")
            );

            expect(seen).toEqual([
                "entity:received",
                "entity:analyzing",
                "entity:analyzed",
                "entity:actionExecuting",
                "entity:actionExecuted",
                "entity:processed",
            ]);
            expect(analyzed).toHaveBeenCalledWith(expect.objectContaining({
                traceId: "tr_fixed",
                data   : expect.objectContaining({ entityId: "doc-1", type: "hazard", confidence: 0.9 }),
            }));
        });

        // Scenario: Analyzer throws
        it("should report analyzer failures without throwing", async () => {
            const errorHandler = vi.fn();
            eventBus.subscribe("entity:error", errorHandler);
            const action = createMockAction("alert", { hazard: {} });

            const outcome = await engine.processEntity(
                createDomain({ analyzer: createMockAnalyzer(undefined, true), actions: [action] }),
                createMockEntity("doc-1", "fog ahead")
            );

            expect(outcome.error).toBe("Analyzer exploded");
            expect(outcome.analysis).toBeUndefined();
            expect(action.handle).not.toHaveBeenCalled();
            expect(errorHandler).toHaveBeenCalledTimes(1);
        });

        // Scenario: Action throws, later actions still run
        it("should record a throwing action and continue", async () => {
            const failing = createMockAction("failing", { hazard: {} }, null, true);
            const after   = createMockAction("after", { hazard: {} });

            const outcome = await engine.processEntity(
                createDomain({ actions: [failing, after] }),
                createMockEntity("doc-1", "fog ahead")
            );

            expect(outcome.actionResults).toEqual([
                { actionId: "failing", success: false, error: "Action failing error" },
                { actionId: "after", success: true },
            ]);
            expect(logger.error).toHaveBeenCalledWith("Action execution error", expect.objectContaining({
                actionId: "failing",
            }));
        });

        // Scenario: Action reports failure
        it("should warn when an action returns success false", async () => {
            const action = createMockAction("store", { hazard: {} }, {
                actionId: "store",
                success : false,
                error   : "disk full",
            });

            await engine.processEntity(createDomain({ actions: [action] }), createMockEntity("doc-1", "x"));

            expect(logger.warn).toHaveBeenCalledWith("Action failed", {
                domainId: "test-domain",
                actionId: "store",
                entityId: "doc-1",
                error   : "disk full",
            });
        });
    });

    describe("pollOnce", () => {
        // Scenario: Provider failure becomes an engine:error event
        it("should report provider errors and keep going", async () => {
            const errorHandler = vi.fn();
            eventBus.subscribe("engine:error", errorHandler);

            const provider: EntityProvider<TestEntity> = {
                id         : "broken",
                name       : "Broken",
                getEntities: vi.fn().mockRejectedValue(new Error("inbox unreadable")),
            };
            engine.registerDomain(createDomain({ provider }));

            const fetched = await engine.pollOnce();

            expect(fetched).toBe(0);
            expect(errorHandler).toHaveBeenCalledWith(expect.objectContaining({
                data: { domainId: "test-domain", error: "inbox unreadable" },
            }));
        });

        // Scenario: Count of fetched entities
        it("should return how many entities were fetched", async () => {
            engine.registerDomain(createDomain({
                provider: createMockProvider([createMockEntity("a", "x"), createMockEntity("b", "y")]),
            }));

            expect(await engine.pollOnce()).toBe(2);
            expect(await engine.pollOnce()).toBe(0);
        });
    });
});
