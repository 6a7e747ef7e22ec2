/**
 * Room list snapshots: YAML descriptions of connections and their rooms,
 * turned into in-memory connections.
 *
 * ```yaml
 * connections:
 *   - id: work
 *     userId: "@me:example.org"
 *     rooms:
 *       - id: "!standup:example.org"
 *         name: Standup
 *         tags:
 *           u.work: { order: 0.1 }
 *           m.favourite:
 * ```
 */
import * as FileSystem from "@effect/platform/FileSystem";
import * as Effect from "effect/Effect";
import * as S from "effect/Schema";
import * as yaml from "yaml";
import { SnapshotError } from "../errors.ts";
import { MemoryConnection } from "./memory-connection.ts";

const TagSnapshot = S.NullOr(
  S.Struct({
    order: S.optional(S.Finite),
  }),
);

const RoomSnapshot = S.Struct({
  id: S.String,
  name: S.optional(S.String),
  tags: S.optional(S.Record({ key: S.String, value: TagSnapshot })),
  directChat: S.optional(S.Boolean),
  joinState: S.optional(S.Literal("join", "invite", "leave")),
  unreadCount: S.optional(S.Number),
  unreadCountIsLowerBound: S.optional(S.Boolean),
  highlightCount: S.optional(S.Number),
});

const ConnectionSnapshot = S.Struct({
  id: S.String,
  userId: S.optional(S.String),
  rooms: S.optional(S.Array(RoomSnapshot)),
});

export const RoomListSnapshot = S.Struct({
  connections: S.Array(ConnectionSnapshot),
});

export type RoomListSnapshot = typeof RoomListSnapshot.Type;

/**
 * Create the connections a snapshot describes. Rooms are created silently;
 * attach the connections to a room list afterwards.
 */
export const connectionsFromSnapshot = (
  snapshot: RoomListSnapshot,
): MemoryConnection[] =>
  snapshot.connections.map((entry) => {
    const connection = new MemoryConnection(entry.id, entry.userId);
    for (const { tags, ...room } of entry.rooms ?? []) {
      connection.createRoom({
        ...room,
        tags: Object.entries(tags ?? {}).map(
          ([name, tag]) => [name, tag ?? {}] as const,
        ),
      });
    }
    return connection;
  });

/**
 * Parse snapshot YAML. `source` names the origin in errors.
 */
export const parseSnapshot = (text: string, source = "<snapshot>") =>
  Effect.gen(function* () {
    const document = yaml.parseDocument(text);
    if (document.errors.length > 0) {
      return yield* Effect.fail(
        new SnapshotError({
          message: `Invalid YAML in ${source}`,
          path: source,
          cause: document.errors[0],
        }),
      );
    }
    const snapshot = yield* S.decodeUnknown(RoomListSnapshot)(
      document.toJS(),
    ).pipe(
      Effect.mapError(
        (cause) =>
          new SnapshotError({
            message: `Unexpected snapshot content in ${source}`,
            path: source,
            cause,
          }),
      ),
    );
    return connectionsFromSnapshot(snapshot);
  });

export const loadSnapshot = (path: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const text = yield* fs.readFileString(path).pipe(
      Effect.mapError(
        (cause) =>
          new SnapshotError({ message: `Cannot read ${path}`, path, cause }),
      ),
    );
    return yield* parseSnapshot(text, path);
  });
