import { EventBus } from "./events/bus.js";
import { StructuredLogger, type LoggerOptions } from "./logger.js";
import type { DevCapability } from "./proximity/capability.js";
import { bootstrapProximityGraph, type ProximityGraph } from "./proximity/graph.js";
import { FileOperationJournal, NOOP_JOURNAL } from "./proximity/journal.js";
import type { Clock } from "./proximity/types.js";
import type { ProximityRuntimeOptions } from "./config/runtimeOptions.js";

/** Fully wired deployment plus the shared collaborators. */
export interface ProximityRuntime {
  options: ProximityRuntimeOptions;
  logger: StructuredLogger;
  events: EventBus;
  graph: ProximityGraph;
  capability: DevCapability;
}

/** Overrides mostly useful in tests. */
export interface ProximityRuntimeOverrides {
  clock?: Clock;
  logger?: LoggerOptions;
}

/**
 * Composition root: builds the logger, the bus and the journal from the
 * resolved options, then bootstraps the deployment.
 */
export async function createProximityRuntime(
  options: ProximityRuntimeOptions,
  overrides: ProximityRuntimeOverrides = {},
): Promise<ProximityRuntime> {
  const clock = overrides.clock ?? (() => Date.now());
  const logger = new StructuredLogger({
    logFile: options.logFile,
    ...(options.logRedact !== null ? { redactDirective: options.logRedact } : {}),
    ...overrides.logger,
  });
  const events = new EventBus({ historyLimit: options.eventHistoryLimit, now: clock });
  const journal = options.journalDir ? new FileOperationJournal(options.journalDir, logger) : NOOP_JOURNAL;

  const { graph, capability } = await bootstrapProximityGraph({
    deployer: options.deployer,
    clock,
    events,
    logger,
    journal,
    syntheticBypassesGate: options.syntheticBypassesGate,
  });

  return { options, logger, events, graph, capability };
}
