import { describe, it, expect } from "vitest";
import { TOPICS, eventTypeToTopic, resolveTopicName } from "./topics.js";

describe("topics", () => {
  it("prefixes topic names", () => {
    expect(resolveTopicName("zonekeeper", TOPICS.ZONE_STATES)).toBe("zonekeeper.zone-states");
  });

  it("routes event types", () => {
    expect(eventTypeToTopic("reconcile.started")).toBe("reconciles");
    expect(eventTypeToTopic("reconcile.completed")).toBe("reconciles");
    expect(eventTypeToTopic("reconcile.failed")).toBe("diagnostics");
    expect(eventTypeToTopic("zone.state_observed")).toBe("zone-states");
  });
});
