/**
 * Room list configuration.
 *
 * Provides:
 * - `RoomListConfig` Context.Tag for Effect-based access
 * - `RoomListConfigLive` for a configuration known up front
 * - `RoomListConfigFromSettings` reading the settings file and environment
 */
import * as Config from "effect/Config";
import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import { DefaultTagsOrder } from "./order/tags-order.ts";
import { loadTagsOrder } from "./settings.ts";

/**
 * RoomListConfig service interface.
 */
export interface RoomListConfigService {
  /**
   * Group priority list; exact captions or namespace wildcards like "u.*".
   */
  readonly tagsOrder: readonly string[];

  /**
   * Throw on integrity errors instead of logging and skipping them.
   */
  readonly strict: boolean;
}

export class RoomListConfig extends Context.Tag("RoomListConfig")<
  RoomListConfig,
  RoomListConfigService
>() {}

/**
 * Path of the YAML settings file.
 */
export const SettingsPath = Config.string("ROOM_LIST_SETTINGS").pipe(
  Config.withDefault("room-list.yaml"),
);

export const StrictMode = Config.boolean("ROOM_LIST_STRICT").pipe(
  Config.withDefault(false),
);

/**
 * Create a RoomListConfig layer with the given configuration.
 */
export const RoomListConfigLive = (
  config: Partial<RoomListConfigService> = {},
) =>
  Layer.succeed(RoomListConfig, {
    tagsOrder: config.tagsOrder ?? DefaultTagsOrder,
    strict: config.strict ?? false,
  });

/**
 * Build the configuration from ROOM_LIST_SETTINGS and ROOM_LIST_STRICT.
 */
export const RoomListConfigFromSettings = Layer.effect(
  RoomListConfig,
  Effect.gen(function* () {
    const path = yield* SettingsPath;
    const strict = yield* StrictMode;
    const tagsOrder = yield* loadTagsOrder(path);
    return { tagsOrder, strict };
  }),
);
