import { describe, expect, it } from "@effect/vitest";
import * as Chunk from "effect/Chunk";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Stream from "effect/Stream";
import { RoomListConfigLive } from "../src/config.ts";
import { MemoryConnection } from "../src/memory/memory-connection.ts";
import { RoomList, RoomListLive } from "../src/room-list.ts";

const TestRoomList = RoomListLive.pipe(Layer.provide(RoomListConfigLive()));

describe("RoomList", () => {
  it.scoped("streams the model's changes", () =>
    Effect.gen(function* () {
      const roomList = yield* RoomList;
      const changes = yield* roomList.subscribe;
      const connection = new MemoryConnection("work");
      const room = connection.createRoom({ id: "!a" });

      yield* roomList.attach(connection);
      room.addTag("u.work");

      const received = yield* changes.pipe(Stream.take(5), Stream.runCollect);
      expect(Chunk.toReadonlyArray(received)).toEqual([
        { type: "reset" },
        { type: "room-removed", group: 0, room: 0 },
        { type: "group-removed", group: 0 },
        { type: "group-inserted", group: 0 },
        { type: "room-inserted", group: 0, room: 0 },
      ]);
    }).pipe(Effect.provide(TestRoomList)),
  );

  it.effect("builds the model from the configuration", () =>
    Effect.gen(function* () {
      const roomList = yield* RoomList;
      const connection = new MemoryConnection("work");
      connection.createRoom({ id: "!a", tags: { "m.favourite": {}, "u.work": {} } });

      yield* roomList.attach(connection);
      const groups = yield* roomList.snapshot;
      expect(groups.map((group) => group.caption)).toEqual(["u.work", "m.favourite"]);

      yield* roomList.detach(connection);
      expect(roomList.model.groupCount).toBe(0);
    }).pipe(
      Effect.provide(
        RoomListLive.pipe(
          Layer.provide(RoomListConfigLive({ tagsOrder: ["u.*", "m.favourite"] })),
        ),
      ),
    ),
  );

  it.effect("fails on integrity errors in strict mode", () =>
    Effect.gen(function* () {
      const roomList = yield* RoomList;

      const exit = yield* Effect.exit(roomList.detach(new MemoryConnection("stranger")));
      expect(exit._tag).toBe("Failure");
    }).pipe(
      Effect.provide(RoomListLive.pipe(Layer.provide(RoomListConfigLive({ strict: true })))),
    ),
  );
});
