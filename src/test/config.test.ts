import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { existsSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { defaultConfig, loadConfig, resolveConfig } from "../core/config.js";
import { makeTempDir } from "./helpers.js";

describe("config", () => {
  const defaults = defaultConfig("/tmp/parley-home");

  describe("defaultConfig", () => {
    it("places conversations under the home directory", () => {
      assert.equal(defaults.conversation.saveDirectory, join("/tmp/parley-home", "conversations"));
      assert.equal(defaults.conversation.maxContextMessages, 10);
      assert.equal(defaults.redis.keyTtlDays, 30);
      assert.equal(defaults.responder.kind, "echo");
    });
  });

  describe("resolveConfig", () => {
    it("merges a partial section over the defaults", () => {
      const { config, warnings } = resolveConfig({ redis: { port: 6380, password: "test-secret" } }, defaults);
      assert.deepEqual(warnings, []);
      assert.equal(config.redis.port, 6380);
      assert.equal(config.redis.password, "test-secret");
      assert.equal(config.redis.host, "localhost");
      assert.deepEqual(config.ui, defaults.ui);
    });

    it("reads top-level switches", () => {
      const { config } = resolveConfig({ useRedis: false, logLevel: "debug" }, defaults);
      assert.equal(config.useRedis, false);
      assert.equal(config.logLevel, "debug");
    });

    it("ignores an invalid section with a warning", () => {
      const { config, warnings } = resolveConfig({ ui: { wordWrap: "yes", showTimestamps: false } }, defaults);
      assert.deepEqual(config.ui, defaults.ui);
      assert.equal(warnings.length, 1);
      assert.match(warnings[0], /^Invalid "ui\.wordWrap" in config/);
      assert.match(warnings[0], /using defaults for "ui"$/);
    });

    it("warns about bad top-level values", () => {
      const { config, warnings } = resolveConfig({ useRedis: "no", logLevel: "loud" }, defaults);
      assert.equal(config.useRedis, true);
      assert.equal(config.logLevel, "info");
      assert.deepEqual(warnings, [
        'Invalid "useRedis" in config; using true',
        'Invalid "logLevel" in config; expected one of debug, info, warn, error',
      ]);
    });

    it("lists unknown keys and strips unknown section fields", () => {
      const { config, warnings } = resolveConfig(
        { extra: 1, another: true, conversation: { cleanupDays: 7, colour: "red" } },
        defaults
      );
      assert.deepEqual(warnings, ["Ignoring unknown config key(s): extra, another"]);
      assert.deepEqual(config.conversation, { ...defaults.conversation, cleanupDays: 7 });
    });

    it("rejects a non-object document", () => {
      const { config, warnings } = resolveConfig([1, 2], defaults);
      assert.deepEqual(config, defaults);
      assert.deepEqual(warnings, ["Config file is not a JSON object; using defaults"]);
    });

    it("validates the responder section", () => {
      const ok = resolveConfig({ responder: { kind: "ollama", model: "mistral" } }, defaults);
      assert.equal(ok.config.responder.kind, "ollama");
      assert.equal(ok.config.responder.model, "mistral");
      assert.equal(ok.config.responder.host, "http://localhost:11434");

      const bad = resolveConfig({ responder: { kind: "gpt" } }, defaults);
      assert.equal(bad.config.responder.kind, "echo");
      assert.equal(bad.warnings.length, 1);
    });
  });

  describe("loadConfig", () => {
    let dir: string;
    let cleanupDir: () => void;

    beforeEach(() => {
      ({ dir, cleanup: cleanupDir } = makeTempDir());
    });

    afterEach(() => cleanupDir());

    it("writes the defaults when the file is missing", () => {
      const path = join(dir, "nested", "config.json");
      const { config, warnings } = loadConfig(path);

      assert.deepEqual(warnings, []);
      assert.equal(existsSync(path), true);
      assert.deepEqual(JSON.parse(readFileSync(path, "utf-8")), config);
      assert.deepEqual(config, defaultConfig());
    });

    it("reads an existing file", () => {
      const path = join(dir, "config.json");
      writeFileSync(path, JSON.stringify({ useRedis: false, ui: { colorsEnabled: false } }));

      const { config } = loadConfig(path);
      assert.equal(config.useRedis, false);
      assert.equal(config.ui.colorsEnabled, false);
      assert.equal(config.ui.wordWrap, true);
    });

    it("falls back to defaults for unreadable JSON", () => {
      const path = join(dir, "config.json");
      writeFileSync(path, "{ nope");

      const { config, warnings } = loadConfig(path);
      assert.deepEqual(config, defaultConfig());
      assert.equal(warnings.length, 1);
      assert.match(warnings[0], /^Could not read config /);
    });
  });
});
