import { Effect } from "effect";
import { join, resolve } from "node:path";
import { FileSystemService, XmlService } from "../effect/services.ts";
import { ContainerError } from "../utils/errors.ts";

export const CONTAINER_PATH = "META-INF/container.xml";

/**
 * Finds the package document of an extracted archive through the
 * `full-path` of the first `rootfile` in `META-INF/container.xml`.
 * Resolves to the absolute path of the package document.
 */
export const locatePackageDocument = (
  directory: string,
): Effect.Effect<string, ContainerError, FileSystemService | XmlService> =>
  Effect.gen(function* () {
    const fs = yield* FileSystemService;
    const xml = yield* XmlService;
    const containerPath = join(directory, CONTAINER_PATH);

    const bytes = yield* fs
      .readFile(containerPath)
      .pipe(Effect.mapError((e) => new ContainerError(containerPath, "file is missing", e)));

    const container = yield* xml
      .parse(bytes, containerPath)
      .pipe(Effect.mapError((e) => new ContainerError(containerPath, "file is not well-formed", e)));

    const fullPath = container.find("rootfiles", "rootfile")?.attr("full-path");
    if (!fullPath) {
      return yield* Effect.fail(new ContainerError(containerPath, "rootfile has no full-path attribute"));
    }

    return resolve(directory, fullPath);
  });
