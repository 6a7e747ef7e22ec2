import { describe, expect, it } from "vitest";
import { ConnectionRegistry } from "../../src/connection/registry.ts";
import { MemoryConnection } from "../../src/memory/memory-connection.ts";

describe("ConnectionRegistry", () => {
  it("keeps connections in attachment order", () => {
    const registry = new ConnectionRegistry();
    const work = new MemoryConnection("work");
    const home = new MemoryConnection("home");

    expect(registry.add(work)).toBe(true);
    expect(registry.add(home)).toBe(true);
    expect(registry.add(work)).toBe(false);

    expect(registry.connections).toEqual([work, home]);
    expect(registry.size).toBe(2);
    expect(registry.has(home)).toBe(true);
  });

  it("removes connections", () => {
    const registry = new ConnectionRegistry();
    const work = new MemoryConnection("work");
    registry.add(work);

    expect(registry.remove(work)).toBe(true);
    expect(registry.remove(work)).toBe(false);
    expect(registry.size).toBe(0);
  });

  it("walks the rooms of every connection", () => {
    const registry = new ConnectionRegistry();
    const work = new MemoryConnection("work");
    const home = new MemoryConnection("home");
    work.createRoom({ id: "!a" });
    work.createRoom({ id: "!b" });
    home.createRoom({ id: "!c" });
    registry.add(home);
    registry.add(work);

    expect([...registry.rooms()].map((room) => room.id)).toEqual(["!c", "!a", "!b"]);
    expect(registry.totalRooms()).toBe(3);
  });
});
