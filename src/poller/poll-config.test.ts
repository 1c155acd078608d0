import { describe, it, expect } from "vitest";
import {
  createPollConfig,
  activePollConfig,
  deletedPollConfig,
  DEFAULT_MAX_INTERVAL_MS,
} from "./poll-config.js";
import { InvalidPollConfigError } from "../errors/errors.js";
import type { LifecycleState } from "../types/index.js";

describe("createPollConfig", () => {
  const base = {
    targets: ["ACTIVE"] as const,
    pendings: ["PENDING"] as const,
    timeoutMs: 50,
    delayMs: 10,
    minIntervalMs: 10,
  };

  it("accepts a valid config and fills defaults", () => {
    const config = createPollConfig(base);

    expect([...config.targets]).toEqual(["ACTIVE"]);
    expect([...config.pendings]).toEqual(["PENDING"]);
    expect(config.maxIntervalMs).toBe(DEFAULT_MAX_INTERVAL_MS);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("is unaffected by later changes to the input", () => {
    const targets: LifecycleState[] = ["ACTIVE"];
    const pendings: LifecycleState[] = ["PENDING"];
    const config = createPollConfig({ ...base, targets, pendings });

    targets.push("DELETED");
    pendings.length = 0;

    expect(config.targets).toEqual(["ACTIVE"]);
    expect(config.pendings).toEqual(["PENDING"]);
  });

  it("freezes the state lists", () => {
    const config = createPollConfig(base);

    expect(Object.isFrozen(config.targets)).toBe(true);
    expect(Object.isFrozen(config.pendings)).toBe(true);
  });

  it("defaults the delay to zero", () => {
    const config = createPollConfig({
      targets: ["ACTIVE"],
      pendings: ["PENDING"],
      timeoutMs: 50,
      minIntervalMs: 10,
    });
    expect(config.delayMs).toBe(0);
  });

  it("rejects a timeout shorter than the delay", () => {
    expect(() => createPollConfig({ ...base, timeoutMs: 5, delayMs: 10 })).toThrow(
      InvalidPollConfigError,
    );
    expect(() => createPollConfig({ ...base, timeoutMs: 5, delayMs: 10 })).toThrow(
      "invalid poll config: timeoutMs (5) must not be shorter than delayMs (10)",
    );
  });

  it("accepts a timeout equal to the delay", () => {
    expect(createPollConfig({ ...base, timeoutMs: 10, delayMs: 10 }).timeoutMs).toBe(10);
  });

  it("rejects a zero or negative minimum interval", () => {
    expect(() => createPollConfig({ ...base, minIntervalMs: 0 })).toThrow(
      "minIntervalMs must be greater than zero",
    );
    expect(() => createPollConfig({ ...base, minIntervalMs: -1 })).toThrow(
      InvalidPollConfigError,
    );
  });

  it("rejects non-finite durations", () => {
    expect(() => createPollConfig({ ...base, timeoutMs: Number.NaN })).toThrow(
      "timeoutMs must be a non-negative number, got NaN",
    );
  });

  it("rejects a maximum interval below the minimum", () => {
    expect(() => createPollConfig({ ...base, maxIntervalMs: 5 })).toThrow(
      "maxIntervalMs (5) must not be shorter than minIntervalMs (10)",
    );
  });

  it("rejects empty, pending-only and overlapping target sets", () => {
    expect(() => createPollConfig({ ...base, targets: [] })).toThrow(
      "at least one target state is required",
    );
    expect(() => createPollConfig({ ...base, targets: ["PENDING"], pendings: [] })).toThrow(
      "PENDING cannot be a target state",
    );
    expect(() =>
      createPollConfig({ ...base, targets: ["ACTIVE"], pendings: ["ACTIVE", "PENDING"] }),
    ).toThrow("ACTIVE is both a target and a pending state");
  });
});

describe("phase presets", () => {
  const timing = { timeoutMs: 1000, delayMs: 0, minIntervalMs: 100 };

  it("waits for ACTIVE after create or update", () => {
    const config = activePollConfig(timing);
    expect([...config.targets]).toEqual(["ACTIVE"]);
    expect([...config.pendings]).toEqual(["PENDING"]);
  });

  it("waits for DELETED after delete", () => {
    const config = deletedPollConfig(timing);
    expect([...config.targets]).toEqual(["DELETED"]);
    expect([...config.pendings]).toEqual(["ACTIVE", "PENDING"]);
  });
});
