/**
 * Persisted room list settings.
 *
 * Settings live in a YAML file:
 *
 * ```yaml
 * roomsDock:
 *   tagsOrder:
 *     - m.favourite
 *     - u.*
 * ```
 *
 * When the file or the order is missing, the default order is written back
 * so users have something to edit.
 */
import type { PlatformError } from "@effect/platform/Error";
import * as FileSystem from "@effect/platform/FileSystem";
import * as Effect from "effect/Effect";
import * as S from "effect/Schema";
import * as yaml from "yaml";
import { SettingsError } from "./errors.ts";
import { DefaultTagsOrder } from "./order/tags-order.ts";

export const Settings = S.Struct({
  roomsDock: S.optional(
    S.Struct({
      tagsOrder: S.optional(S.Array(S.String)),
    }),
  ),
});

export type Settings = typeof Settings.Type;

const TagsOrderPath = ["roomsDock", "tagsOrder"];

const fileError = (path: string, message: string) => (cause: PlatformError) =>
  new SettingsError({ message, path, cause });

const readSettingsDocument = (path: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const exists = yield* fs
      .exists(path)
      .pipe(Effect.mapError(fileError(path, `Cannot access ${path}`)));
    if (!exists) {
      return new yaml.Document({});
    }
    const text = yield* fs
      .readFileString(path)
      .pipe(Effect.mapError(fileError(path, `Cannot read ${path}`)));
    const document: yaml.Document = yaml.parseDocument(text);
    if (document.errors.length > 0) {
      return yield* Effect.fail(
        new SettingsError({
          message: `Invalid YAML in ${path}`,
          path,
          cause: document.errors[0],
        }),
      );
    }
    return document;
  });

/**
 * Load the group priority list, writing the default one when none is saved.
 */
export const loadTagsOrder = (path: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const document = yield* readSettingsDocument(path);
    const settings = yield* S.decodeUnknown(Settings)(document.toJS() ?? {}).pipe(
      Effect.mapError(
        (cause) =>
          new SettingsError({
            message: `Unexpected settings in ${path}`,
            path,
            cause,
          }),
      ),
    );

    const saved = settings.roomsDock?.tagsOrder ?? [];
    if (saved.length > 0) {
      yield* Effect.logDebug(`[settings] Loaded tags order from ${path}`);
      return saved;
    }

    yield* Effect.logInfo(`[settings] Writing default tags order to ${path}`);
    document.setIn(TagsOrderPath, document.createNode([...DefaultTagsOrder]));
    yield* fs
      .writeFileString(path, document.toString())
      .pipe(Effect.mapError(fileError(path, `Cannot write ${path}`)));
    return DefaultTagsOrder;
  });
