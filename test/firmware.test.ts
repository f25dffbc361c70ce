import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import test from "node:test";

import {
  FwupTool,
  missingFirmwareKeys,
  parseFwupMetadata,
  parseMbrPartitions,
  rootfsPartitionOffset,
} from "../src/firmware";
import { FakeToolRunner, makeTempDir } from "./fakes";

function mbrWithPartitions() {
  const mbr = Buffer.alloc(512);
  mbr[446 + 4] = 0x0c;
  mbr.writeUInt32LE(2048, 446 + 8);
  mbr[462 + 4] = 0x83;
  mbr.writeUInt32LE(4096, 462 + 8);
  mbr.writeUInt16LE(0xaa55, 510);
  return mbr;
}

test("firmware: fwup metadata parsing", () => {
  const metadata = parseFwupMetadata(
    'meta-product="leanvm"\nmeta-version="0.1.0"\nmeta-platform=rpi0\ngarbage line\n'
  );
  assert.deepEqual(metadata, {
    "meta-product": "leanvm",
    "meta-version": "0.1.0",
    "meta-platform": "rpi0",
  });
  assert.deepEqual(missingFirmwareKeys(metadata), []);
  assert.deepEqual(missingFirmwareKeys({ "meta-product": "leanvm", "meta-version": "" }), ["meta-version"]);
});

test("firmware: fwup is asked for metadata only", async () => {
  const runner = new FakeToolRunner(() => ({ stdout: 'meta-product="leanvm"\n' }));
  const tool = new FwupTool(runner, 1000);
  assert.deepEqual(await tool.introspect("/out/nerves-rpi0.fw"), { "meta-product": "leanvm" });
  assert.deepEqual(runner.calls[0].argv, ["fwup", "-m", "-i", "/out/nerves-rpi0.fw"]);
  assert.equal(runner.calls[0].timeoutMs, 1000);

  const broken = new FwupTool(new FakeToolRunner(() => ({ exitCode: 1, stderr: "not a firmware file\n" })));
  await assert.rejects(broken.introspect("/out/x.fw"), { message: "fwup exited with code 1: not a firmware file" });
});

test("firmware: MBR partition offsets", () => {
  assert.deepEqual(parseMbrPartitions(mbrWithPartitions()), [1048576, 2097152]);
  assert.deepEqual(parseMbrPartitions(Buffer.alloc(512)), []);
  assert.deepEqual(parseMbrPartitions(Buffer.alloc(100)), []);

  const dir = makeTempDir();
  try {
    const image = path.join(dir, "disk.img");
    fs.writeFileSync(image, Buffer.concat([mbrWithPartitions(), Buffer.alloc(512)]));
    assert.equal(rootfsPartitionOffset(image), 2097152);

    const blank = path.join(dir, "blank.img");
    fs.writeFileSync(blank, Buffer.alloc(1024));
    assert.equal(rootfsPartitionOffset(blank), null);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
