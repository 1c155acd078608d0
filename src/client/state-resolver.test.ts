import { describe, it, expect } from "vitest";
import { resolveZoneState } from "./state-resolver.js";
import { ResourceClientError, ResourceNotFoundError, isNotFound } from "./errors.js";
import { zone } from "../../test/helpers/zones.js";

describe("resolveZoneState", () => {
  it("maps known tags", () => {
    expect(resolveZoneState(zone("z1", "ACTIVE"))).toBe("ACTIVE");
    expect(resolveZoneState(zone("z1", "PENDING"))).toBe("PENDING");
    expect(resolveZoneState(zone("z1", "DELETED"))).toBe("DELETED");
    expect(resolveZoneState(zone("z1", "ERROR"))).toBe("ERROR");
  });

  it("ignores case and surrounding whitespace", () => {
    expect(resolveZoneState(zone("z1", " active "))).toBe("ACTIVE");
  });

  it("returns undefined for unknown tags", () => {
    expect(resolveZoneState(zone("z1", "BUILDING"))).toBeUndefined();
    expect(resolveZoneState(zone("z1", ""))).toBeUndefined();
  });
});

describe("client errors", () => {
  it("describes a missing zone", () => {
    const err = new ResourceNotFoundError("z1");

    expect(err.message).toBe("zone z1 not found");
    expect(err.code).toBe("not_found");
    expect(err.statusCode).toBe(404);
    expect(err.name).toBe("ResourceNotFoundError");
  });

  it("recognises not-found by class or by code", () => {
    expect(isNotFound(new ResourceNotFoundError("z1"))).toBe(true);
    expect(isNotFound(new ResourceClientError("not_found", "gone"))).toBe(true);
    expect(isNotFound(new ResourceClientError("conflict", "busy"))).toBe(false);
    expect(isNotFound({ code: "not_found" })).toBe(false);
  });
});
