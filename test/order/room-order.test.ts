import { beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryConnection } from "../../src/memory/memory-connection.ts";
import {
  compareRoomIdentity,
  roomLessThanFactory,
  tagRoomOrder,
} from "../../src/order/room-order.ts";
import { DefaultTagsOrder } from "../../src/order/tags-order.ts";
import { logWarning } from "../../src/util/log.ts";

vi.mock("../../src/util/log.ts", () => ({
  log: vi.fn(),
  logWarning: vi.fn(),
  logError: vi.fn(),
}));

describe("roomLessThanFactory", () => {
  const lessThan = roomLessThanFactory("u.work");
  let connection: MemoryConnection;

  beforeEach(() => {
    vi.clearAllMocks();
    connection = new MemoryConnection("work");
  });

  it("orders by the tag's order weight", () => {
    const light = connection.createRoom({ id: "!z", tags: { "u.work": { order: 0.2 } } });
    const heavy = connection.createRoom({ id: "!a", tags: { "u.work": { order: 0.5 } } });

    expect(lessThan(light, heavy)).toBe(true);
    expect(lessThan(heavy, light)).toBe(false);
  });

  it("puts rooms with a weight before rooms without one", () => {
    const weighted = connection.createRoom({ id: "!z", tags: { "u.work": { order: 9 } } });
    const plain = connection.createRoom({ id: "!a", tags: { "u.work": {} } });

    expect(lessThan(weighted, plain)).toBe(true);
    expect(lessThan(plain, weighted)).toBe(false);
  });

  it("orders rooms without a weight by id", () => {
    const a = connection.createRoom({ id: "!a", tags: { "u.work": {} } });
    const b = connection.createRoom({ id: "!b", tags: { "u.work": {} } });

    expect(lessThan(a, b)).toBe(true);
    expect(lessThan(b, a)).toBe(false);
  });

  it("treats a non-finite weight as omitted", () => {
    const one = connection.createRoom({ id: "!a", tags: { "u.work": { order: 1 } } });
    const broken = connection.createRoom({ id: "!b", tags: { "u.work": { order: NaN } } });
    const zero = connection.createRoom({ id: "!d", tags: { "u.work": { order: 0 } } });
    const plain = connection.createRoom({ id: "!c", tags: { "u.work": {} } });

    expect(lessThan(zero, one)).toBe(true);
    expect(lessThan(one, broken)).toBe(true);
    expect(lessThan(broken, one)).toBe(false);
    expect(lessThan(broken, plain)).toBe(true);
    expect(lessThan(plain, broken)).toBe(false);
    expect(logWarning).not.toHaveBeenCalled();
  });

  it("is irreflexive", () => {
    const a = connection.createRoom({ id: "!a", tags: { "u.work": { order: 1 } } });
    const b = connection.createRoom({ id: "!b" });

    expect(lessThan(a, a)).toBe(false);
    expect(lessThan(b, b)).toBe(false);
  });

  it("reports equal weights and falls back to identity", () => {
    const a = connection.createRoom({ id: "!a", tags: { "u.work": { order: 1 } } });
    const b = connection.createRoom({ id: "!b", tags: { "u.work": { order: 1 } } });

    expect(lessThan(a, b)).toBe(true);
    expect(logWarning).toHaveBeenCalledWith(
      "RoomOrder",
      "u.work order values aren't strongly ordered",
      { left: "!a", right: "!b", order: 1 },
    );
    expect(lessThan(b, a)).toBe(false);
  });
});

describe("compareRoomIdentity", () => {
  it("orders by room id, then connection id", () => {
    const work = new MemoryConnection("work");
    const home = new MemoryConnection("home");
    const a = work.createRoom({ id: "!a" });
    const b = home.createRoom({ id: "!b" });
    const shared = home.createRoom({ id: "!a" });

    expect(compareRoomIdentity(a, b)).toBeLessThan(0);
    expect(compareRoomIdentity(shared, a)).toBeLessThan(0);
    expect(compareRoomIdentity(a, shared)).toBeGreaterThan(0);
    expect(compareRoomIdentity(a, a)).toBe(0);
  });

  it("orders distinct rooms with the same identity consistently", () => {
    const connection = new MemoryConnection("work");
    const invite = connection.createRoom({ id: "!a", joinState: "invite" });
    const joined = connection.createRoom({ id: "!a" });

    const first = compareRoomIdentity(invite, joined);
    expect(first).toBeLessThan(0);
    expect(compareRoomIdentity(joined, invite)).toBeGreaterThan(0);
    expect(compareRoomIdentity(invite, joined)).toBe(first);
  });
});

describe("tagRoomOrder", () => {
  it("uses the default tags order", () => {
    const order = tagRoomOrder();

    expect(order.grouping).toBe("tag");
    expect(order.sorting).toBe("order");
    expect(order.tagsOrder).toEqual(DefaultTagsOrder);
    expect(order.groupLessThan("m.favourite", "u.work")).toBe(true);
  });

  it("uses a custom tags order", () => {
    const order = tagRoomOrder(["u.*", "m.favourite"]);

    expect(order.groupLessThan("u.work", "m.favourite")).toBe(true);
    expect(order.groupLessThan("m.favourite", "u.work")).toBe(false);
  });
});
