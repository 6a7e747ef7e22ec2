import * as FileSystem from "@effect/platform/FileSystem";
import * as Effect from "effect/Effect";

/**
 * FileSystem backed by a map of path to contents.
 */
export const memoryFileSystem = (files: Map<string, string>) =>
  FileSystem.layerNoop({
    exists: (path) => Effect.sync(() => files.has(path)),
    readFileString: (path) => Effect.sync(() => files.get(path) ?? ""),
    writeFileString: (path, data) =>
      Effect.sync(() => {
        files.set(path, data);
      }),
  });
