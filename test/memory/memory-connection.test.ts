import { describe, expect, it } from "vitest";
import { MemoryConnection } from "../../src/memory/memory-connection.ts";
import type { Room } from "../../src/room.ts";

describe("MemoryConnection", () => {
  it("announces added, replaced and removed rooms", () => {
    const connection = new MemoryConnection("work");
    const events: string[] = [];
    connection.on("roomAdded", (room) => events.push(`added ${room.id}`));
    connection.on("roomReplaced", (room, prev) =>
      events.push(`replaced ${prev.joinState()} by ${room.joinState()}`),
    );
    connection.on("roomRemoved", (room) => {
      const listed: ReadonlyArray<Room> = connection.rooms();
      events.push(`removed ${room.id}, listed: ${listed.includes(room)}`);
    });

    const invite = connection.addRoom({ id: "!a", joinState: "invite" });
    const joined = connection.replaceRoom(invite, {});
    connection.deleteRoom(joined);

    expect(events).toEqual([
      "added !a",
      "replaced invite by join",
      "removed !a, listed: true",
    ]);
    expect(connection.rooms()).toEqual([]);
  });

  it("finds rooms by id and join state, and by tag", () => {
    const connection = new MemoryConnection("work");
    const invite = connection.createRoom({ id: "!a", joinState: "invite" });
    const tagged = connection.createRoom({ id: "!b", tags: { "u.work": {} } });

    expect(connection.room("!a", "invite")).toBe(invite);
    expect(connection.room("!a", "join")).toBeUndefined();
    expect(connection.roomsWithTag("u.work")).toEqual([tagged]);
  });
});

describe("MemoryRoom", () => {
  it("wraps tag changes in about-to-change and changed events", () => {
    const room = new MemoryConnection("work").createRoom({ id: "!a" });
    const events: string[] = [];
    room.on("tagsAboutToChange", () => events.push(`before ${[...room.tags().keys()]}`));
    room.on("tagsChanged", () => events.push(`after ${[...room.tags().keys()]}`));

    room.addTag("u.work");
    room.removeTag("u.home");
    room.removeTag("u.work");

    expect(events).toEqual(["before ", "after u.work", "before u.work", "after "]);
  });

  it("reports changed display aspects", () => {
    const room = new MemoryConnection("work").createRoom({ id: "!a" });
    const aspects: string[][] = [];
    room.on("displayAttributeChanged", (changed) => aspects.push([...changed]));

    room.setUnreadCount(2, true);
    room.setDisplayName("Standup");

    expect(aspects).toEqual([["display", "unread"], []]);
    expect(room.unreadCount()).toBe(2);
    expect(room.unreadCountIsLowerBound()).toBe(true);
    expect(room.displayName()).toBe("Standup");
  });
});
