import { describe, expect, it } from "@effect/vitest";
import * as Effect from "effect/Effect";
import { loadSnapshot, parseSnapshot } from "../../src/memory/snapshot.ts";
import { memoryFileSystem } from "../memory-fs.ts";

const text = `
connections:
  - id: work
    userId: "@me:work.example"
    rooms:
      - id: "!a"
        name: Standup
        unreadCount: 3
        tags:
          m.favourite:
          u.work: { order: 0.5 }
      - id: "!b"
        directChat: true
        joinState: invite
  - id: home
`;

describe("parseSnapshot", () => {
  it.effect("creates the described connections and rooms", () =>
    Effect.gen(function* () {
      const [work, home] = yield* parseSnapshot(text);

      expect(work.id).toBe("work");
      expect(work.userId).toBe("@me:work.example");
      expect(work.rooms().map((room) => room.id)).toEqual(["!a", "!b"]);
      expect(home.userId).toBe("home");
      expect(home.rooms()).toEqual([]);

      const [standup, invite] = work.rooms();
      expect(standup.displayName()).toBe("Standup");
      expect(standup.unreadCount()).toBe(3);
      expect([...standup.tags()]).toEqual([
        ["m.favourite", {}],
        ["u.work", { order: 0.5 }],
      ]);
      expect(invite.isDirectChat()).toBe(true);
      expect(invite.joinState()).toBe("invite");
      expect(invite.displayName()).toBe("!b");
    }),
  );

  it.effect("fails on invalid YAML", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(parseSnapshot("connections: [\n", "rooms.yaml"));

      expect(error._tag).toBe("SnapshotError");
      expect(error.message).toBe("Invalid YAML in rooms.yaml");
    }),
  );

  it.effect("rejects non-finite tag weights", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        parseSnapshot(
          "connections:\n  - id: work\n    rooms:\n      - id: \"!a\"\n        tags:\n          u.work: { order: .nan }\n",
          "rooms.yaml",
        ),
      );

      expect(error._tag).toBe("SnapshotError");
      expect(error.message).toBe("Unexpected snapshot content in rooms.yaml");
    }),
  );

  it.effect("fails on content of the wrong shape", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(parseSnapshot("rooms: []\n"));

      expect(error.message).toBe("Unexpected snapshot content in <snapshot>");
      expect(error.path).toBe("<snapshot>");
    }),
  );
});

describe("loadSnapshot", () => {
  it.effect("reads the snapshot from a file", () =>
    Effect.gen(function* () {
      const connections = yield* loadSnapshot("rooms.yaml");

      expect(connections.map((connection) => connection.id)).toEqual(["work", "home"]);
    }).pipe(Effect.provide(memoryFileSystem(new Map([["rooms.yaml", text]])))),
  );
});
