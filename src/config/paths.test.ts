import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { resolveDataHome, resolveEnvPassword, resolveSessionRoot, resolveVaultPaths } from "./paths.js";

describe("vault paths", () => {
  it("lays out the vault under the data home", () => {
    const paths = resolveVaultPaths({ dataHome: "/data", sessionRoot: "/run/sealbox", env: {} });

    expect(paths).toEqual({
      dataHome: "/data",
      root: "/data/sealbox",
      itemsDir: "/data/sealbox/items",
      spawnedDir: "/data/sealbox/.spawned",
      manifestFile: "/data/sealbox/links.json",
      verifyFile: "/data/sealbox/.sealbox-key",
      lockFile: "/data/sealbox/.lock",
      gitignoreFile: "/data/sealbox/.gitignore",
      trashFilesDir: "/data/Trash/files",
      trashInfoDir: "/data/Trash/info",
      sessionRoot: "/run/sealbox",
    });
  });

  it("prefers SEALBOX_HOME over XDG_DATA_HOME", () => {
    expect(resolveDataHome({ SEALBOX_HOME: "/custom", XDG_DATA_HOME: "/xdg" })).toBe("/custom");
    expect(resolveDataHome({ SEALBOX_HOME: " ", XDG_DATA_HOME: "/xdg" })).toBe("/xdg");
  });

  it("falls back to ~/.local/share", () => {
    expect(resolveDataHome({})).toBe(path.join(os.homedir(), ".local", "share"));
  });

  it("resolves the session root", () => {
    expect(resolveSessionRoot({ SEALBOX_SESSION_DIR: "/run/user/sealbox" })).toBe("/run/user/sealbox");
    expect(resolveSessionRoot({})).toBe(path.join(os.tmpdir(), "sealbox"));
  });

  it("reads the password from the environment", () => {
    expect(resolveEnvPassword({ SEALBOX_PASSWORD: "test-secret" })).toBe("test-secret");
    expect(resolveEnvPassword({ SEALBOX_PASSWORD: "" })).toBeUndefined();
    expect(resolveEnvPassword({})).toBeUndefined();
  });
});
