import { describe, it, expect, beforeEach } from "vitest";
import pino from "pino";
import { Zonekeeper } from "./zonekeeper.js";
import { loadConfig } from "../config/default.js";
import { ResourceNotFoundError } from "./client/errors.js";
import { isGone } from "./errors/diagnostic.js";
import type { ReconcileEvent } from "./events/types.js";
import type { ZonekeeperConfig } from "./types/index.js";
import { ManualClock } from "../test/helpers/manual-clock.js";
import { mockClient, type MockClient } from "../test/helpers/mock-client.js";
import { zone } from "../test/helpers/zones.js";
import { expectFailure, expectOk } from "../test/helpers/results.js";

const logger = pino({ level: "silent" });

const fastPolling = {
  ZONEKEEPER_CREATE_TIMEOUT_MS: "50",
  ZONEKEEPER_UPDATE_TIMEOUT_MS: "50",
  ZONEKEEPER_DELETE_TIMEOUT_MS: "50",
  ZONEKEEPER_POLL_DELAY_MS: "10",
  ZONEKEEPER_POLL_MIN_INTERVAL_MS: "10",
  ZONEKEEPER_POLL_MAX_INTERVAL_MS: "100",
};

describe("Zonekeeper", () => {
  let client: MockClient;
  let clock: ManualClock;
  let events: ReconcileEvent[];

  beforeEach(() => {
    client = mockClient();
    clock = new ManualClock();
    events = [];
  });

  function keeper(env: Record<string, string> = {}): Zonekeeper {
    const config: ZonekeeperConfig = loadConfig({ ...fastPolling, ...env });
    return new Zonekeeper(config, client, {
      logger,
      clock,
      events: { emit: (event) => events.push(event) },
    });
  }

  describe("createZone", () => {
    it("polls until the configured create timeout", async () => {
      client.create.mockResolvedValueOnce(zone("z1", "PENDING"));
      client.read.mockResolvedValue(zone("z1", "PENDING"));

      const diagnostic = expectFailure(await keeper().createZone({ name: "zone1.example." }));

      expect(diagnostic).toMatchObject({ kind: "poll_timeout", elapsedMs: 50, partial: true });
      expect(client.read).toHaveBeenCalledTimes(4);
    });

    it("takes a per-call timeout", async () => {
      client.create.mockResolvedValueOnce(zone("z1", "PENDING"));
      client.read.mockResolvedValue(zone("z1", "PENDING"));

      const diagnostic = expectFailure(
        await keeper().createZone({ name: "zone1.example." }, { timeoutMs: 30 }),
      );

      expect(diagnostic.elapsedMs).toBe(30);
      expect(client.read).toHaveBeenCalledTimes(2);
    });

    it("shortens the initial delay to a timeout below it", async () => {
      client.create.mockResolvedValueOnce(zone("z1", "PENDING"));
      client.read.mockResolvedValue(zone("z1", "PENDING"));

      const diagnostic = expectFailure(
        await keeper().createZone({ name: "zone1.example." }, { timeoutMs: 5 }),
      );

      expect(diagnostic.elapsedMs).toBe(5);
      expect(clock.sleeps).toEqual([5]);
      expect(client.read).toHaveBeenCalledTimes(1);
    });

    it("raises the backoff ceiling to a larger minimum interval", async () => {
      client.create.mockResolvedValueOnce(zone("z1", "PENDING"));
      client.read.mockResolvedValue(zone("z1", "PENDING"));

      const diagnostic = expectFailure(
        await keeper({ ZONEKEEPER_POLL_MIN_INTERVAL_MS: "15000" }).createZone({
          name: "zone1.example.",
        }),
      );

      expect(diagnostic.kind).toBe("poll_timeout");
      expect(clock.sleeps).toEqual([10, 40]);
      expect(client.read).toHaveBeenCalledTimes(1);
    });

    it("skips the status check when configured to", async () => {
      client.create.mockResolvedValueOnce(zone("z1", "PENDING"));
      client.read.mockResolvedValueOnce(zone("z1", "PENDING"));

      const result = await keeper({ ZONEKEEPER_SKIP_STATUS_CHECK: "true" }).createZone({
        name: "zone1.example.",
      });

      expect(expectOk(result).status).toBe("PENDING");
      expect(client.read).toHaveBeenCalledTimes(1);
    });

    it("lets a call override the configured skip flag", async () => {
      client.create.mockResolvedValueOnce(zone("z1", "PENDING"));
      client.read
        .mockResolvedValueOnce(zone("z1", "PENDING"))
        .mockResolvedValueOnce(zone("z1", "ACTIVE"));

      const result = await keeper({ ZONEKEEPER_SKIP_STATUS_CHECK: "true" }).createZone(
        { name: "zone1.example." },
        { skipStatusCheck: false, projectId: "proj-2" },
      );

      expect(expectOk(result).status).toBe("ACTIVE");
      expect(client.create.mock.calls[0][1]).toEqual({ projectId: "proj-2" });
    });

    it("publishes lifecycle events to the injected sink", async () => {
      client.create.mockResolvedValueOnce(zone("z1", "ACTIVE"));
      client.read.mockResolvedValueOnce(zone("z1", "ACTIVE"));

      await keeper().createZone({ name: "zone1.example." });

      expect(events.map((e) => e.type)).toEqual([
        "reconcile.started",
        "zone.state_observed",
        "reconcile.completed",
      ]);
    });
  });

  describe("updateZone and deleteZone", () => {
    it("reads without updating for an empty delta", async () => {
      client.read.mockResolvedValueOnce(zone("z1", "ACTIVE"));

      const result = await keeper().updateZone("z1", {});

      expect(expectOk(result).id).toBe("z1");
      expect(client.update).not.toHaveBeenCalled();
    });

    it("treats an already deleted zone as deleted", async () => {
      client.delete.mockRejectedValueOnce(new ResourceNotFoundError("z1"));

      const result = await keeper().deleteZone("z1");

      expect(expectOk(result).alreadyAbsent).toBe(true);
    });
  });

  describe("readZone", () => {
    it("reads under the given project", async () => {
      client.read.mockResolvedValueOnce(zone("z1", "ACTIVE"));

      await keeper().readZone("z1", { projectId: "proj-2" });

      expect(client.read).toHaveBeenCalledWith("z1", { projectId: "proj-2" });
    });
  });

  describe("importZone", () => {
    it("imports a zone owned by another project", async () => {
      client.read.mockResolvedValueOnce(zone("z1", "ACTIVE"));

      const result = await keeper().importZone("z1:proj-2");

      expect(client.read).toHaveBeenCalledWith("z1", { projectId: "proj-2" });
      expect(expectOk(result).projectId).toBe("proj-2");
    });

    it("keeps the project the backend reports", async () => {
      client.read.mockResolvedValueOnce(zone("z1", "ACTIVE", { projectId: "proj-1" }));

      const result = await keeper().importZone("z1");

      expect(expectOk(result).projectId).toBe("proj-1");
    });

    it("rejects a malformed id without calling the backend", async () => {
      const diagnostic = expectFailure(await keeper().importZone("a:b:c"));

      expect(diagnostic).toMatchObject({
        code: "MalformedImportId",
        kind: "malformed_import_id",
        phase: "import",
        message: "unexpected format of ID (a:b:c), expected zone <id> or <id>:<project_id>",
      });
      expect(client.read).not.toHaveBeenCalled();
    });

    it("reports a missing zone as gone", async () => {
      client.read.mockRejectedValueOnce(new ResourceNotFoundError("z1"));

      const result = await keeper().importZone("z1");

      expect(isGone(result)).toBe(true);
      expect(expectFailure(result).phase).toBe("import");
    });
  });

  it("starts and shuts down without a broker when events are disabled", async () => {
    const config = loadConfig(fastPolling);
    const standalone = new Zonekeeper(config, client, { logger, clock });

    await standalone.start();
    await standalone.shutdown();

    expect(config.events.enabled).toBe(false);
  });
});
