import { describe, it, expect, afterEach } from "vitest";
import { createLoggerConfig, REDACT_CENSOR } from "../../src/utils/logger-config.js";
import { emit, setTestSink, TelemetryEvents, type Event } from "../../src/utils/telemetry.js";

/**
 * Telemetry event names are matched by log queries; renaming one silently
 * breaks them. Add new events instead of renaming.
 */
describe("Telemetry Events", () => {
  afterEach(() => {
    setTestSink(null);
  });

  it("keeps event names stable", () => {
    expect(TelemetryEvents).toEqual({
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
    });
  });

  it("uses lowercase dotted names", () => {
    for (const name of Object.values(TelemetryEvents)) {
      expect(name).toMatch(/^[a-z]+(\.[a-z_]+)+$/);
    }
  });

  it("delivers events to the test sink", () => {
    const seen: Array<[string, Event]> = [];
    setTestSink((name, data) => seen.push([name, data]));

    emit(TelemetryEvents.CascadeComputed, { id: "DEC-001", waveCount: 2 });

    expect(seen).toEqual([["graph.cascade.computed", { id: "DEC-001", waveCount: 2 }]]);
  });

  it("redacts body text in log output", () => {
    const config = createLoggerConfig("warn");

    expect(config.level).toBe("warn");
    expect(config.redact.censor).toBe(REDACT_CENSOR);
    expect(config.redact.paths).toEqual(["*.body", "*.old_text", "*.new_text", "*.headers.authorization", "*.headers.cookie"]);
  });
});
