import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import test from "node:test";

import { withLoopMount, withTempDir } from "../src/scope";
import { FakeToolRunner, makeTempDir } from "./fakes";

test("scope: temp dirs are removed after success and failure", async () => {
  const parent = makeTempDir();
  try {
    let seen = "";
    const value = await withTempDir(
      async (dir) => {
        seen = dir;
        fs.writeFileSync(path.join(dir, "file"), "x");
        return 7;
      },
      { parent }
    );
    assert.equal(value, 7);
    assert.ok(path.basename(seen).startsWith("leanvm-build-"));
    assert.ok(!fs.existsSync(seen));

    await assert.rejects(
      withTempDir(
        async (dir) => {
          seen = dir;
          throw new Error("stage broke");
        },
        { parent }
      ),
      /stage broke/
    );
    assert.ok(!fs.existsSync(seen));
    assert.deepEqual(fs.readdirSync(parent), []);
  } finally {
    fs.rmSync(parent, { recursive: true, force: true });
  }
});

test("scope: temp dirs can be kept", async () => {
  const parent = makeTempDir();
  try {
    const dir = await withTempDir(async (d) => d, { parent, keep: true, prefix: "keep-" });
    assert.ok(fs.existsSync(dir));
    assert.ok(path.basename(dir).startsWith("keep-"));
  } finally {
    fs.rmSync(parent, { recursive: true, force: true });
  }
});

test("scope: loop mounts are released after use", async () => {
  const runner = new FakeToolRunner();
  let mountPoint = "";
  const value = await withLoopMount(
    runner,
    "/images/rootfs.img",
    async (mnt) => {
      mountPoint = mnt;
      return "inside";
    },
    { offset: 1048576 }
  );

  assert.equal(value, "inside");
  assert.deepEqual(
    runner.calls.map((call) => call.argv),
    [
      ["mount", "-o", "loop,ro,offset=1048576", "/images/rootfs.img", mountPoint],
      ["umount", mountPoint],
    ]
  );
  assert.ok(!fs.existsSync(mountPoint));
});

test("scope: loop mounts are released when the body fails", async () => {
  const runner = new FakeToolRunner();
  await assert.rejects(
    withLoopMount(runner, "/images/rootfs.img", async () => {
      throw new Error("probe failed");
    }),
    /probe failed/
  );
  assert.equal(runner.calls.length, 2);
  assert.equal(runner.calls[0].argv[2], "loop,ro");
  assert.equal(runner.calls[1].argv[0], "umount");
});

test("scope: mount points that fail to unmount are left in place", async () => {
  const runner = new FakeToolRunner((invocation) =>
    invocation.argv[0] === "umount" ? { exitCode: 32, stderr: "target is busy\n" } : {}
  );
  const mountPoints: string[] = [];
  try {
    await assert.rejects(
      withLoopMount(runner, "/images/rootfs.img", async (mnt) => {
        mountPoints.push(mnt);
        throw new Error("probe failed");
      }),
      /probe failed/
    );

    await assert.rejects(
      withLoopMount(runner, "/images/rootfs.img", async (mnt) => {
        mountPoints.push(mnt);
        return "ok";
      }),
      (err: unknown) => {
        assert.ok(err instanceof Error);
        assert.equal(err.message, `umount exited with code 32: target is busy (${mountPoints[1]} is still mounted)`);
        return true;
      }
    );

    assert.equal(mountPoints.length, 2);
    for (const mnt of mountPoints) assert.ok(fs.existsSync(mnt), mnt);
  } finally {
    for (const mnt of mountPoints) fs.rmSync(mnt, { recursive: true, force: true });
  }
});

test("scope: failed mounts never unmount", async () => {
  const runner = new FakeToolRunner(() => ({ exitCode: 32, stderr: "permission denied" }));
  let called = false;
  await assert.rejects(
    withLoopMount(runner, "/images/rootfs.img", async () => {
      called = true;
    }),
    { message: "mount exited with code 32: permission denied" }
  );
  assert.equal(called, false);
  assert.deepEqual(runner.commands().map((command) => command.split(" ")[0]), ["mount"]);
});
