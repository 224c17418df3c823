import { delimiter, join, parse } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { makeTree } from "../testing/fixtures.js";
import { systemPlaces } from "./places.js";

describe("systemPlaces", () => {
  let root: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ root, cleanup } = makeTree({ "Desktop/": "", "Music/": "", "usb/": "" }));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    cleanup();
  });

  it.runIf(process.platform !== "win32")("lists the user directories that exist under home", () => {
    vi.stubEnv("HOME", root);

    expect(systemPlaces.userDirectories()).toEqual({
      home: root,
      desktop: join(root, "Desktop"),
      documents: null,
      downloads: null,
      audio: join(root, "Music"),
      pictures: null,
      videos: null,
    });
  });

  it("lists the working directory's root plus configured mount points", () => {
    const top = parse(process.cwd()).root;
    vi.stubEnv("FILE_DIALOG_DEVICES", [join(root, "usb"), join(root, "missing"), top].join(delimiter));

    expect(systemPlaces.devices()).toEqual([
      { name: top, mountPoint: top },
      { name: join(root, "usb"), mountPoint: join(root, "usb") },
    ]);
  });
});
