import { describe, expect, test } from "vitest";
import { generateId } from "./generate-id";

describe("generateId", () => {
  test("should produce 16 hex characters by default", () => {
    expect(generateId()).toMatch(/^[0-9a-f]{16}$/);
  });

  test("should count the prefix in the total size", () => {
    const id = generateId({ prefix: "peer_", size: 20 });

    expect(id).toMatch(/^peer_[0-9a-f]{15}$/);
  });

  test("should keep at least 8 hex characters after a long prefix", () => {
    expect(generateId({ prefix: "observer_", size: 10 })).toMatch(/^observer_[0-9a-f]{8}$/);
  });

  test("should not repeat", () => {
    const ids = new Set(Array.from({ length: 100 }, () => generateId()));

    expect(ids.size).toBe(100);
  });
});
