import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import test from "node:test";

import {
  describeBuildConfig,
  parseBuildConfig,
  resolveBuildConfig,
  serializeBuildConfig,
  validateBuildConfig,
} from "../src/build-config";
import { makeTempDir } from "./fakes";

test("build config: empty input resolves to the defaults", () => {
  const config = resolveBuildConfig({});
  assert.equal(config.type, "alpine");
  assert.equal(config.targetSize, 30);
  assert.equal(config.outputDir, "./build");
  assert.equal(config.stripModules, true);
  assert.equal(config.compression, "xz");
  assert.equal(config.appPath, undefined);
  assert.deepEqual(config.packages, []);
  assert.deepEqual(config.retention, { ssh: false, ssl: false, http: false, mnesia: false, devTools: false });
  assert.equal(config.vmOptions.memoryMb, 256);
  assert.equal(config.vmOptions.cpus, 1);
});

test("build config: resolved configs are frozen", () => {
  const config = resolveBuildConfig({ type: "custom", packages: ["curl"] });
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.retention));
  assert.ok(Object.isFrozen(config.vmOptions));
  assert.ok(Object.isFrozen(config.packages));
});

test("build config: rejects unknown build types", () => {
  assert.throws(() => resolveBuildConfig({ type: "debian" }), {
    name: "ConfigurationError",
    field: "type",
  });
});

test("build config: rejects non-positive size targets", () => {
  for (const targetSize of [0, -5, Number.NaN, "30"]) {
    assert.throws(() => resolveBuildConfig({ targetSize }), {
      name: "ConfigurationError",
      field: "targetSize",
      message: "invalid targetSize: must be a positive number of mb",
    });
  }
});

test("build config: application directory must exist", () => {
  assert.throws(() => resolveBuildConfig({ appPath: "/nonexistent/leanvm-app" }), {
    name: "ConfigurationError",
    field: "appPath",
  });

  const dir = makeTempDir();
  try {
    const config = resolveBuildConfig({ appPath: dir });
    assert.equal(config.appPath, path.resolve(dir));
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("build config: trims and dedupes name lists", () => {
  const config = resolveBuildConfig({ packages: ["curl", " curl ", "", "git"], applications: ["ssl", "ssl"] });
  assert.deepEqual(config.packages, ["curl", "git"]);
  assert.deepEqual(config.applications, ["ssl"]);
});

test("build config: partial retention flags merge over the defaults", () => {
  const config = resolveBuildConfig({ retention: { ssl: true, gopher: true } });
  assert.deepEqual(config.retention, { ssh: false, ssl: true, http: false, mnesia: false, devTools: false });

  assert.throws(() => resolveBuildConfig({ retention: { ssh: "yes" } }), {
    name: "ConfigurationError",
    field: "retention.ssh",
  });
});

test("build config: validates vm options", () => {
  assert.throws(() => resolveBuildConfig({ vmOptions: { memoryMb: 0 } }), { field: "vmOptions.memoryMb" });
  assert.throws(() => resolveBuildConfig({ vmOptions: { cpus: 1.5 } }), { field: "vmOptions.cpus" });
  assert.throws(() => resolveBuildConfig({ vmOptions: { arch: "mips" } }), { field: "vmOptions.arch" });
  assert.throws(() => resolveBuildConfig({ vmOptions: { kernelVersion: " " } }), {
    field: "vmOptions.kernelVersion",
  });

  const config = resolveBuildConfig({ vmOptions: { arch: "aarch64", kernelVersion: "6.1.100" } });
  assert.equal(config.vmOptions.arch, "aarch64");
  assert.equal(config.vmOptions.kernelVersion, "6.1.100");
  assert.equal(config.vmOptions.memoryMb, 256);
});

test("build config: rejects unknown compression", () => {
  assert.throws(() => resolveBuildConfig({ compression: "zstd" }), { field: "compression" });
});

test("build config: parse reports invalid json as a configuration error", () => {
  assert.throws(() => parseBuildConfig("{"), (err: unknown) => {
    assert.ok(err instanceof Error);
    assert.equal(err.name, "ConfigurationError");
    assert.match(err.message, /^invalid json: /);
    return true;
  });
});

test("build config: serialized configs parse back to the same value", () => {
  const config = resolveBuildConfig({ type: "buildroot", targetSize: 40, retention: { mnesia: true } });
  assert.deepEqual(parseBuildConfig(serializeBuildConfig(config)), config);
});

test("build config: validateBuildConfig does not throw", () => {
  assert.equal(validateBuildConfig({ type: "custom" }), true);
  assert.equal(validateBuildConfig({ targetSize: "big" }), false);
  assert.equal(validateBuildConfig("custom"), false);
});

test("build config: describe names the build method", () => {
  const summary = describeBuildConfig(resolveBuildConfig({ type: "custom", compression: "gzip" }));
  assert.equal(summary.build.method, "custom-kernel");
  assert.equal(summary.architecture.compression, "gzip");
  assert.equal(summary.runtime.appPath, null);
  assert.equal(describeBuildConfig(resolveBuildConfig({ type: "nerves" })).build.method, "nerves-mix");
});
