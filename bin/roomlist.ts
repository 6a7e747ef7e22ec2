#!/usr/bin/env -S npx tsx
/**
 * roomlist CLI
 *
 * Prints the grouped room list for a YAML snapshot of connections and rooms.
 *
 * Usage:
 *   roomlist rooms.yaml                       # order from ./room-list.yaml
 *   roomlist rooms.yaml --settings my.yaml    # order from another file
 *   roomlist rooms.yaml --verbose             # debug logging
 *
 * ROOM_LIST_SETTINGS names the default settings file and ROOM_LIST_STRICT
 * turns integrity problems into failures.
 */
import { Args, Command, Options } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import * as Console from "effect/Console";
import * as Effect from "effect/Effect";
import * as Logger from "effect/Logger";
import * as LogLevel from "effect/LogLevel";
import * as Option from "effect/Option";
import { SettingsPath, StrictMode } from "../src/config.ts";
import { loadSnapshot } from "../src/memory/snapshot.ts";
import { RoomListModel } from "../src/model/room-list-model.ts";
import { tagRoomOrder } from "../src/order/room-order.ts";
import { renderRoomList } from "../src/render.ts";
import { loadTagsOrder } from "../src/settings.ts";
import { logError } from "../src/util/log.ts";

const mainCommand = Command.make(
  "roomlist",
  {
    snapshot: Args.file({ name: "snapshot", exists: "yes" }).pipe(
      Args.withDescription("YAML file describing connections and rooms"),
    ),
    settings: Options.file("settings").pipe(
      Options.withAlias("s"),
      Options.withDescription("Settings file holding roomsDock.tagsOrder"),
      Options.optional,
    ),
    verbose: Options.boolean("verbose").pipe(
      Options.withAlias("v"),
      Options.withDescription("Log debug messages"),
    ),
  },
  ({ snapshot, settings, verbose }) =>
    Effect.gen(function* () {
      const settingsPath = Option.isSome(settings)
        ? settings.value
        : yield* SettingsPath;
      const tagsOrder = yield* loadTagsOrder(settingsPath);
      const strict = yield* StrictMode;
      const connections = yield* loadSnapshot(snapshot);

      const model = new RoomListModel({
        order: tagRoomOrder(tagsOrder),
        strict,
      });
      yield* Effect.try({
        try: () => connections.forEach((c) => model.addConnection(c)),
        catch: (error) => error,
      });
      yield* Effect.logDebug(
        `[roomlist] ${model.totalRooms()} rooms in ${model.groupCount} groups`,
      );
      yield* Console.log(renderRoomList(model));
    }).pipe(
      Effect.tapError((err) =>
        Effect.sync(() => logError("CLI", "Failed to list rooms", err)),
      ),
      Logger.withMinimumLogLevel(verbose ? LogLevel.Debug : LogLevel.Info),
    ),
);

const cli = Command.run(mainCommand, {
  name: "roomlist",
  version: "0.1.0",
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
