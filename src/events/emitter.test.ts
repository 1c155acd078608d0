import { describe, it, expect, vi } from "vitest";
import { trace } from "@opentelemetry/api";
import { LifecycleEmitter } from "./emitter.js";
import type { ReconcileEvent } from "./types.js";

describe("LifecycleEmitter", () => {
  it("does nothing without a sink", () => {
    const emitter = new LifecycleEmitter(null);

    expect(emitter.enabled).toBe(false);
    expect(emitter.emit("reconcile.started", "create", undefined, {})).toBeNull();
  });

  it("builds and delivers an event", () => {
    const received: ReconcileEvent[] = [];
    const emitter = new LifecycleEmitter({ emit: (event) => received.push(event) });

    const event = emitter.emit("reconcile.completed", "delete", "z1", { durationMs: 12 });

    expect(received).toHaveLength(1);
    expect(received[0]).toBe(event);
    expect(event).toMatchObject({
      type: "reconcile.completed",
      source: "controller",
      resourceId: "z1",
      phase: "delete",
      payload: { durationMs: 12 },
    });
    expect(event?.id).toMatch(/^[A-Za-z0-9_-]{21}$/);
    expect(event?.traceContext).toBeUndefined();
  });

  it("attaches the span's trace context", () => {
    const received: ReconcileEvent[] = [];
    const emitter = new LifecycleEmitter({ emit: (event) => received.push(event) });
    const span = trace.getTracer("test").startSpan("reconcile.create");

    emitter.emit("reconcile.started", "create", undefined, {}, span);
    span.end();

    expect(received[0].traceContext).toEqual({
      traceId: span.spanContext().traceId,
      spanId: span.spanContext().spanId,
    });
    expect(received[0].resourceId).toBe("");
  });

  it("counts events per topic", () => {
    const metrics = {
      reconcileCount: vi.fn(),
      reconcileDuration: vi.fn(),
      pollReads: vi.fn(),
      pollRetries: vi.fn(),
      eventsEmitted: vi.fn(),
    };
    const emitter = new LifecycleEmitter({ emit: () => undefined }, metrics);

    emitter.emit("reconcile.failed", "update", "z1", {});
    emitter.emit("zone.state_observed", "update", "z1", {});

    expect(metrics.eventsEmitted.mock.calls).toEqual([
      [{ topic: "diagnostics" }],
      [{ topic: "zone-states" }],
    ]);
  });
});
