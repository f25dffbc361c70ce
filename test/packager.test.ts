import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import test from "node:test";

import { bundleFileName, extractBundle, firmwareFileName, packageArtifacts } from "../src/packager";
import { makeTempDir } from "./fakes";

function withDir(fn: (dir: string) => Promise<void>) {
  return async () => {
    const dir = makeTempDir();
    try {
      await fn(dir);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  };
}

test("packager: bundle names", () => {
  assert.equal(bundleFileName("custom", "gzip"), "custom-vm.tar.gz");
  assert.equal(bundleFileName("alpine", "none"), "alpine-vm.tar");
  assert.equal(bundleFileName("buildroot", "xz"), "buildroot-vm.tar.xz");
  assert.equal(firmwareFileName("rpi0"), "nerves-rpi0.fw");
});

test(
  "packager: kernel builds bundle exactly the boot image and initramfs",
  withDir(async (dir) => {
    const kernel = path.join(dir, "bzImage");
    const initramfs = path.join(dir, "initramfs.cpio.gz");
    fs.writeFileSync(kernel, "kernel");
    fs.writeFileSync(initramfs, "initramfs");
    const outputDir = path.join(dir, "out");

    const result = await packageArtifacts(
      { kind: "kernel-initramfs", kernel, initramfs },
      { type: "custom", outputDir, workDir: path.join(dir, "work"), compression: "gzip" }
    );

    assert.equal(result.path, path.join(outputDir, "custom-vm.tar.gz"));
    assert.deepEqual(result.entries, ["bzImage", "initramfs.cpio.gz"]);
    assert.equal(result.sizeMb, 0);
    assert.ok(Object.isFrozen(result));
    assert.deepEqual(fs.readdirSync(outputDir), ["custom-vm.tar.gz"]);

    const extractDir = path.join(dir, "extract");
    fs.mkdirSync(extractDir);
    const files = await extractBundle(result.path, extractDir);
    assert.deepEqual(Object.keys(files).sort(), ["bzImage", "initramfs.cpio.gz"]);
    assert.equal(fs.readFileSync(files["bzImage"], "utf8"), "kernel");
    assert.equal(fs.readFileSync(files["initramfs.cpio.gz"], "utf8"), "initramfs");
    assert.ok(fs.existsSync(result.path));
  })
);

test(
  "packager: container images replace an earlier bundle",
  withDir(async (dir) => {
    const tarball = path.join(dir, "image.tar");
    fs.writeFileSync(tarball, "new-image");
    const outputDir = path.join(dir, "out");
    fs.mkdirSync(outputDir);
    fs.writeFileSync(path.join(outputDir, "alpine-vm.tar"), "old-image");

    const result = await packageArtifacts(
      { kind: "container-image", tarball },
      { type: "alpine", outputDir, workDir: path.join(dir, "work"), compression: "none" }
    );

    assert.equal(result.path, path.join(outputDir, "alpine-vm.tar"));
    assert.deepEqual(result.entries, ["image.tar"]);
    assert.equal(fs.readFileSync(result.path, "utf8"), "new-image");
    assert.ok(fs.existsSync(tarball));
  })
);

test(
  "packager: firmware is copied under its target name",
  withDir(async (dir) => {
    const firmware = path.join(dir, "app.fw");
    fs.writeFileSync(firmware, "fw");
    const outputDir = path.join(dir, "out");

    const result = await packageArtifacts(
      { kind: "firmware", firmware, target: "rpi0" },
      { type: "nerves", outputDir, workDir: path.join(dir, "work"), compression: "xz" }
    );

    assert.equal(result.path, path.join(outputDir, "nerves-rpi0.fw"));
    assert.deepEqual(result.entries, ["app.fw"]);
    assert.equal(fs.readFileSync(result.path, "utf8"), "fw");
  })
);
