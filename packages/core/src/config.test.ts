/**
 * Tests for configuration resolution.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { DEFAULT_CONFIG, loadConfig, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("Config", () => {
  let tmpDir: string;
  let projectDir: string;
  let homeDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "mathterm-config-test-"));
    projectDir = path.join(tmpDir, "project");
    homeDir = path.join(tmpDir, "home");
    fs.mkdirSync(projectDir);
    fs.mkdirSync(path.join(homeDir, ".mathterm"), { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeProject(data: unknown): void {
    fs.writeFileSync(path.join(projectDir, ".mathtermrc.json"), JSON.stringify(data));
  }

  function writeUser(data: unknown): void {
    fs.writeFileSync(path.join(homeDir, ".mathterm", "config.json"), JSON.stringify(data));
  }

  it("falls back to defaults when no file exists", () => {
    const resolved = resolveConfig(projectDir, homeDir);
    assert.equal(resolved.source, "default");
    assert.equal(resolved.path, null);
    assert.deepEqual(resolved.config, {
      version: 1,
      grammar: "auto",
      fallback: ["term", "bool", "list"],
      notation: "mathml",
      indent: 2,
    });
  });

  it("prefers the project file over the user file", () => {
    writeProject({ notation: "prefix" });
    writeUser({ notation: "postfix" });
    const resolved = resolveConfig(projectDir, homeDir);
    assert.equal(resolved.source, "project");
    assert.equal(resolved.path, path.join(projectDir, ".mathtermrc.json"));
    assert.equal(resolved.config.notation, "prefix");
  });

  it("uses the user file when there is no project file", () => {
    writeUser({ indent: 0, grammar: "bool" });
    const resolved = resolveConfig(projectDir, homeDir);
    assert.equal(resolved.source, "user");
    assert.equal(resolved.config.indent, 0);
    assert.equal(resolved.config.grammar, "bool");
    assert.deepEqual(resolved.config.fallback, DEFAULT_CONFIG.fallback);
  });

  it("loadConfig returns the effective configuration", () => {
    writeProject({ fallback: ["bool"] });
    assert.deepEqual(loadConfig(projectDir, homeDir).fallback, ["bool"]);
  });

  it("rejects malformed JSON", () => {
    fs.writeFileSync(path.join(projectDir, ".mathtermrc.json"), "{ not json");
    assert.throws(() => resolveConfig(projectDir, homeDir), ConfigError);
  });

  it("rejects values outside the schema", () => {
    writeProject({ indent: 12 });
    assert.throws(
      () => resolveConfig(projectDir, homeDir),
      (e: unknown) => e instanceof ConfigError && e.message.startsWith("Invalid configuration in ") && e.message.includes("indent: ")
    );
  });

  it("rejects unknown keys", () => {
    writeProject({ notations: "prefix" });
    assert.throws(() => resolveConfig(projectDir, homeDir), ConfigError);
  });

  it("rejects an empty fallback list", () => {
    writeProject({ fallback: [] });
    assert.throws(
      () => resolveConfig(projectDir, homeDir),
      (e: unknown) => e instanceof ConfigError && e.message.endsWith("fallback: fallback needs at least one grammar")
    );
  });
});
