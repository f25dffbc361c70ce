import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import test from "node:test";

import { StageFailure } from "../src/errors";
import {
  LocalToolRunner,
  describeToolFailure,
  findExecutable,
  missingTools,
  runStep,
} from "../src/exec";
import type { ToolResult } from "../src/exec";
import { FakeToolRunner, makeTempDir } from "./fakes";

const node = process.execPath;

function result(overrides: Partial<ToolResult>): ToolResult {
  return {
    exitCode: 0,
    signal: null,
    stdout: "",
    stderr: "",
    timedOut: false,
    durationMs: 5,
    ...overrides,
  };
}

test("exec: captures output and exit code", async () => {
  const runner = new LocalToolRunner();
  const res = await runner.run({
    argv: [node, "-e", "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"],
    timeoutMs: 10_000,
  });
  assert.equal(res.exitCode, 3);
  assert.equal(res.signal, null);
  assert.equal(res.stdout, "out");
  assert.equal(res.stderr, "err");
  assert.equal(res.timedOut, false);
});

test("exec: passes stdin and environment", async () => {
  const runner = new LocalToolRunner();
  const piped = await runner.run({
    argv: [node, "-e", "process.stdin.pipe(process.stdout)"],
    input: "piped",
    timeoutMs: 10_000,
  });
  assert.equal(piped.stdout, "piped");

  const env = await runner.run({
    argv: [node, "-e", "process.stdout.write(process.env.LEANVM_TEST_VALUE ?? '')"],
    env: { LEANVM_TEST_VALUE: "placeholder" },
    timeoutMs: 10_000,
  });
  assert.equal(env.stdout, "placeholder");
});

test("exec: kills the process when the timeout fires", async () => {
  const runner = new LocalToolRunner();
  const res = await runner.run({
    argv: [node, "-e", "setInterval(() => {}, 1000)"],
    timeoutMs: 200,
  });
  assert.equal(res.timedOut, true);
  assert.equal(res.exitCode, null);
  assert.equal(res.signal, "SIGTERM");
});

test("exec: spawn errors reject", async () => {
  const runner = new LocalToolRunner();
  await assert.rejects(runner.run({ argv: ["/nonexistent/leanvm-tool"], timeoutMs: 1000 }), {
    code: "ENOENT",
  });
  await assert.rejects(runner.run({ argv: [], timeoutMs: 1000 }), /empty argument vector/);
});

test("exec: describes failures", () => {
  assert.equal(describeToolFailure(["/usr/bin/make"], result({ exitCode: 2 })), "make exited with code 2");
  assert.equal(
    describeToolFailure(["qemu-system-x86_64"], result({ exitCode: null, signal: "SIGKILL" })),
    "qemu-system-x86_64 killed by SIGKILL"
  );
  assert.equal(
    describeToolFailure(["xz"], result({ exitCode: null, signal: "SIGTERM", timedOut: true, durationMs: 50 })),
    "xz timed out after 50ms"
  );
});

test("exec: runStep turns failures into stage failures", async () => {
  const failing = new FakeToolRunner(() => ({ exitCode: 2, stdout: "partial ", stderr: "boom" }));
  await assert.rejects(runStep(failing, "kernel", { argv: ["make", "tinyconfig"], timeoutMs: 1000 }), (err: unknown) => {
    assert.ok(err instanceof StageFailure);
    assert.equal(err.stage, "kernel");
    assert.equal(err.message, "kernel stage failed: make exited with code 2");
    assert.equal(err.output, "partial boom");
    return true;
  });

  const slow = new FakeToolRunner(() => ({ exitCode: null, signal: "SIGTERM", timedOut: true, durationMs: 5 }));
  await assert.rejects(runStep(slow, "archive", { argv: ["xz", "-9"], timeoutMs: 5 }), {
    name: "StageFailure",
    detail: "xz timed out after 5ms",
  });

  const missing = new FakeToolRunner(() => {
    throw new Error("spawn make ENOENT");
  });
  await assert.rejects(runStep(missing, "userland", { argv: ["make"], timeoutMs: 1000 }), {
    name: "StageFailure",
    detail: "failed to start make: spawn make ENOENT",
  });

  const ok = await runStep(new FakeToolRunner(() => ({ stdout: "done" })), "kernel", {
    argv: ["make"],
    timeoutMs: 1000,
  });
  assert.equal(ok.stdout, "done");
});

test("exec: finds executables on PATH", () => {
  const dir = makeTempDir();
  try {
    fs.writeFileSync(path.join(dir, "tool"), "#!/bin/sh\n", { mode: 0o755 });
    fs.chmodSync(path.join(dir, "tool"), 0o755);
    fs.writeFileSync(path.join(dir, "plain"), "data");
    fs.chmodSync(path.join(dir, "plain"), 0o644);
    fs.mkdirSync(path.join(dir, "folder"));

    assert.equal(findExecutable("tool", dir), path.join(dir, "tool"));
    assert.equal(findExecutable("plain", dir), null);
    assert.equal(findExecutable("folder", dir), null);
    assert.equal(findExecutable(path.join(dir, "tool"), ""), path.join(dir, "tool"));
    assert.deepEqual(missingTools(["tool", "plain", "nope"], dir), ["plain", "nope"]);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
