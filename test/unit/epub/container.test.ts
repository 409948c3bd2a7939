import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { Effect, Either, Layer } from "effect";
import { join } from "node:path";
import { CONTAINER_PATH, locatePackageDocument } from "../../../src/epub/container.ts";
import { LiveFileSystemService, LiveXmlService } from "../../../src/effect/services.ts";
import { ContainerError } from "../../../src/utils/errors.ts";
import { containerXml } from "../../helpers/epub-fixtures.ts";
import { cleanupTempDir, createFileStructure, createTempDir } from "../../helpers/fs-helpers.ts";

const TestLayer = Layer.mergeAll(LiveFileSystemService, LiveXmlService);

function locate(directory: string) {
  return Effect.runSync(locatePackageDocument(directory).pipe(Effect.either, Effect.provide(TestLayer)));
}

describe("locatePackageDocument", () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir("epub-container");
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  test("resolves the full-path of the first rootfile", () => {
    createFileStructure(dir, { [CONTAINER_PATH]: containerXml("OPS/package.opf") });

    const result = locate(dir);

    expect(Either.isRight(result) && result.right).toBe(join(dir, "OPS/package.opf"));
  });

  test("uses the first of several rootfiles", () => {
    createFileStructure(dir, {
      [CONTAINER_PATH]: `<container><rootfiles>
        <rootfile full-path="first.opf" media-type="application/oebps-package+xml"/>
        <rootfile full-path="second.opf" media-type="application/oebps-package+xml"/>
      </rootfiles></container>`,
    });

    const result = locate(dir);

    expect(Either.isRight(result) && result.right).toBe(join(dir, "first.opf"));
  });

  test("fails with ContainerError when the pointer file is missing", () => {
    const result = locate(dir);

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(ContainerError);
      expect(result.left.message).toBe("Container descriptor unusable: file is missing");
      expect(result.left.filePath).toBe(join(dir, CONTAINER_PATH));
    }
  });

  test("fails with ContainerError when the pointer file is malformed", () => {
    createFileStructure(dir, { [CONTAINER_PATH]: "<container><rootfiles></container>" });

    const result = locate(dir);

    expect(Either.isLeft(result) && result.left.message).toBe("Container descriptor unusable: file is not well-formed");
  });

  test("fails with ContainerError when full-path is absent", () => {
    createFileStructure(dir, {
      [CONTAINER_PATH]: `<container><rootfiles><rootfile media-type="application/oebps-package+xml"/></rootfiles></container>`,
    });

    const result = locate(dir);

    expect(Either.isLeft(result) && result.left.message).toBe(
      "Container descriptor unusable: rootfile has no full-path attribute",
    );
  });
});
