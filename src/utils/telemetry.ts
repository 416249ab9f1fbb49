import { env } from "node:process";
import pino from "pino";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with redaction.
 *
 * Writes to stderr so that CLI output on stdout (tables, --json) stays
 * machine-readable. Level comes from LOG_LEVEL; entry points may lower it.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"), pino.destination(2));

export type Event = Record<string, unknown>;

/**
 * Test sink for capturing telemetry events in tests.
 * Only installable when NODE_ENV=test or under Vitest.
 */
let testSink: ((eventName: string, data: Event) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: Event) => void) | null): void {
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating dashboards that filter on them
 */
export const TelemetryEvents = {
  GraphLoaded: "graph.load.completed",
  GraphLoadFailed: "graph.load.failed",

  ValidationCompleted: "graph.validate.completed",
  CascadeComputed: "graph.cascade.computed",
  FrontierComputed: "graph.frontier.computed",

  MutationRejected: "decision.mutation.rejected",
  MutationApplied: "decision.mutation.applied",
  EditApplied: "decision.edit.applied",

  ScratchpadEntryAdded: "scratchpad.entry.added",
  ScratchpadEntryMatured: "scratchpad.entry.matured",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Emit a telemetry event: structured log line plus the test sink when installed.
 */
export function emit(event: TelemetryEventName, data: Event): void {
  if (testSink) {
    testSink(event, data);
  }
  log.info({ event, ...data });
}
