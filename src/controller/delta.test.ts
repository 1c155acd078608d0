import { describe, it, expect } from "vitest";
import {
  compactDelta,
  diffZone,
  isEmptyDelta,
  replacementFields,
  type ZoneSnapshot,
} from "./delta.js";

const current: ZoneSnapshot = {
  name: "example.org.",
  email: "admin@example.org",
  ttl: 300,
  description: "primary zone",
  masters: ["10.0.0.1", "10.0.0.2"],
  type: "PRIMARY",
  attributes: { tier: "gold" },
  projectId: "proj-1",
};

describe("diffZone", () => {
  it("is empty when nothing changed", () => {
    const delta = diffZone(current, {
      name: "example.org.",
      email: "admin@example.org",
      ttl: 300,
      description: "primary zone",
      masters: ["10.0.0.2", "10.0.0.1"],
    });

    expect(delta).toEqual({});
    expect(isEmptyDelta(delta)).toBe(true);
  });

  it("carries only the changed fields", () => {
    const delta = diffZone(current, {
      name: "example.org.",
      email: "admin@example.org",
      ttl: 600,
      description: "primary zone",
      masters: ["10.0.0.1", "10.0.0.2"],
    });

    expect(delta).toEqual({ ttl: 600 });
  });

  it("leaves the ttl alone when none is desired", () => {
    const delta = diffZone(current, {
      name: "example.org.",
      email: "admin@example.org",
      description: "primary zone",
      masters: ["10.0.0.1", "10.0.0.2"],
    });

    expect(delta).toEqual({});
  });

  it("clears the description with an empty string", () => {
    const delta = diffZone(current, {
      name: "example.org.",
      email: "admin@example.org",
      ttl: 300,
      masters: ["10.0.0.1", "10.0.0.2"],
    });

    expect(delta).toEqual({ description: "" });
  });

  it("sends deduplicated masters when the set changes", () => {
    const delta = diffZone(current, {
      name: "example.org.",
      email: "admin@example.org",
      ttl: 300,
      description: "primary zone",
      masters: ["10.0.0.3", "10.0.0.3", "10.0.0.1"],
    });

    expect(delta).toEqual({ masters: ["10.0.0.3", "10.0.0.1"] });
  });
});

describe("replacementFields", () => {
  it("is empty for in-place changes", () => {
    expect(
      replacementFields(current, {
        name: "example.org.",
        ttl: 900,
        attributes: { tier: "gold" },
      }),
    ).toEqual([]);
  });

  it("lists fields the backend cannot update", () => {
    expect(
      replacementFields(current, {
        name: "example.net.",
        type: "SECONDARY",
        attributes: { tier: "silver" },
        projectId: "proj-2",
      }),
    ).toEqual(["name", "type", "attributes", "projectId"]);
  });

  it("treats missing attributes as an empty map", () => {
    expect(
      replacementFields({ ...current, attributes: {} }, { name: "example.org." }),
    ).toEqual([]);
  });
});

describe("compactDelta", () => {
  it("drops undefined keys", () => {
    expect(compactDelta({ ttl: undefined, email: "ops@example.org" })).toEqual({
      email: "ops@example.org",
    });
    expect(isEmptyDelta(compactDelta({ ttl: undefined }))).toBe(true);
  });

  it("keeps an empty masters list", () => {
    expect(compactDelta({ masters: [] })).toEqual({ masters: [] });
  });
});
