import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadConfig } from "./index.js";

describe("loadConfig", () => {
  let dir: string;
  let yamlPath: string;

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "webnote-config-"));
    yamlPath = path.join(dir, "app.yaml");
    fs.writeFileSync(
      yamlPath,
      [
        "server:",
        "  port: 9090",
        "storage:",
        "  save_path: /srv/notes",
        "  file_limit: 50",
        "  single_file_size_limit: 2048",
        "assets:",
        "  static_root: /srv/public",
        "",
      ].join("\n"),
    );
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to defaults without yaml or env", () => {
    const cfg = loadConfig({}, [path.join(dir, "missing.yaml")]);
    assert.deepEqual(cfg, {
      server: { port: 8080 },
      storage: { save_path: "_tmp", file_limit: 100000, single_file_size_limit: 10240 },
      assets: { static_root: "public", vendor_root: "node_modules" },
    });
  });

  it("reads values from the first yaml candidate found", () => {
    const cfg = loadConfig({}, [path.join(dir, "missing.yaml"), yamlPath]);
    assert.equal(cfg.server.port, 9090);
    assert.equal(cfg.storage.save_path, "/srv/notes");
    assert.equal(cfg.storage.file_limit, 50);
    assert.equal(cfg.storage.single_file_size_limit, 2048);
    assert.equal(cfg.assets.static_root, "/srv/public");
    assert.equal(cfg.assets.vendor_root, "node_modules");
  });

  it("lets environment variables override yaml", () => {
    const cfg = loadConfig(
      {
        PORT: "3000",
        SAVE_PATH: "./data",
        FILE_LIMIT: "7",
        SINGLE_FILE_SIZE_LIMIT: "512",
        STATIC_ROOT: "./web",
        VENDOR_ROOT: "./vendor",
      },
      [yamlPath],
    );
    assert.deepEqual(cfg, {
      server: { port: 3000 },
      storage: { save_path: "./data", file_limit: 7, single_file_size_limit: 512 },
      assets: { static_root: "./web", vendor_root: "./vendor" },
    });
  });

  it("ignores numeric env values that are not non-negative integers", () => {
    const cfg = loadConfig({ PORT: "abc", FILE_LIMIT: "-5", SINGLE_FILE_SIZE_LIMIT: "1.5" }, [yamlPath]);
    assert.equal(cfg.server.port, 9090);
    assert.equal(cfg.storage.file_limit, 50);
    assert.equal(cfg.storage.single_file_size_limit, 2048);
  });

  it("treats a yaml document that is not a mapping as empty", () => {
    const scalar = path.join(dir, "scalar.yaml");
    fs.writeFileSync(scalar, "just a string\n");
    const cfg = loadConfig({}, [scalar]);
    assert.equal(cfg.server.port, 8080);
    assert.equal(cfg.storage.save_path, "_tmp");
  });
});
