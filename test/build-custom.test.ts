import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import test from "node:test";
import zlib from "node:zlib";

import { parseCpio } from "../src/archive";
import type { BuildConfigInput } from "../src/build-config";
import { buildImage } from "../src/builder";
import { enableStaticBusybox, kernelSourceUrl, pruneSharedLibraries } from "../src/build-custom";
import { DependencyMissingError, StageFailure } from "../src/errors";
import { extractBundle } from "../src/packager";
import { FakeContainerEngine, FakeToolRunner, makeTempDir, makeToolDir, recordingLogger } from "./fakes";

const HOST_TOOLS = ["make", "gcc", "flex", "bison", "bc", "tar", "xz", "bzip2", "strip", "docker"];

type Toolchain = {
  runner: FakeToolRunner;
  /** kernel and busybox .config contents as the build left them */
  seen: { kernelConfig: string; busyboxConfig: string };
};

function fakeToolchain(options: { failKernel?: boolean } = {}): Toolchain {
  const seen = { kernelConfig: "", busyboxConfig: "" };
  const runner = new FakeToolRunner((invocation) => {
    const [tool, ...args] = invocation.argv;
    const cwd = invocation.cwd ?? "";

    if (tool === "tar") {
      const name = path.basename(args[1]).replace(/\.tar\.\w+$/, "");
      fs.mkdirSync(path.join(args[3], name), { recursive: true });
      return {};
    }
    if (tool !== "make") return {};

    if (args.includes("tinyconfig")) {
      fs.writeFileSync(path.join(cwd, ".config"), "# tiny\n");
    } else if (args.includes("olddefconfig")) {
      seen.kernelConfig = fs.readFileSync(path.join(cwd, ".config"), "utf8");
    } else if (args.includes("bzImage")) {
      if (options.failKernel) return { exitCode: 2, stderr: "cc1: out of memory\n" };
      fs.mkdirSync(path.join(cwd, "arch", "x86", "boot"), { recursive: true });
      fs.writeFileSync(path.join(cwd, "arch", "x86", "boot", "bzImage"), "kernel");
    } else if (args[0] === "defconfig") {
      fs.writeFileSync(path.join(cwd, ".config"), "CONFIG_ASH=y\n# CONFIG_STATIC is not set\n");
    } else if (args.length === 1 && args[0].startsWith("-j")) {
      seen.busyboxConfig = fs.readFileSync(path.join(cwd, ".config"), "utf8");
    } else {
      const prefix = args.find((arg) => arg.startsWith("CONFIG_PREFIX="));
      if (prefix) {
        const root = prefix.slice("CONFIG_PREFIX=".length);
        fs.mkdirSync(path.join(root, "bin"), { recursive: true });
        fs.writeFileSync(path.join(root, "bin", "busybox"), "busybox");
      }
    }
    return {};
  });
  return { runner, seen };
}

function write(file: string, content: string) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
}

function runtimeImage() {
  return new FakeContainerEngine({
    copyFrom: (source, dest) => {
      fs.mkdirSync(dest, { recursive: true });
      if (source === "/usr/local/lib/erlang") {
        write(path.join(dest, "bin", "erl"), "#!/bin/sh\n");
        write(path.join(dest, "erts-14.2", "bin", "beam.smp"), "\x7fELF-binary");
        write(path.join(dest, "lib", "ssh-5.1", "ebin", "ssh.beam"), "beam");
        write(path.join(dest, "lib", "ssl-11.0", "ebin", "ssl.beam"), "beam");
        write(path.join(dest, "lib", "stdlib-5.2", "ebin", "lists.beam"), "beam");
        write(path.join(dest, "lib", "stdlib-5.2", "doc", "index.html"), "docs");
      } else if (source === "/lib") {
        write(path.join(dest, "ld-musl-x86_64.so.1"), "ld");
        write(path.join(dest, "apk", "db", "installed"), "db");
      }
    },
  });
}

type Harness = {
  dir: string;
  outputDir: string;
  workParent: string;
  envPath: string;
  urls: string[];
};

function withHarness(fn: (h: Harness) => Promise<void>) {
  return async () => {
    const dir = makeTempDir();
    const envPath = makeToolDir(HOST_TOOLS);
    try {
      await fn({
        dir,
        outputDir: path.join(dir, "out"),
        workParent: path.join(dir, "work"),
        envPath,
        urls: [],
      });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
      fs.rmSync(envPath, { recursive: true, force: true });
    }
  };
}

function build(h: Harness, toolchain: Toolchain, containers: FakeContainerEngine, input: BuildConfigInput = {}) {
  const logger = recordingLogger();
  const result = buildImage(
    { type: "custom", outputDir: h.outputDir, compression: "gzip", vmOptions: { arch: "x86_64" }, ...input },
    {
      runner: toolchain.runner,
      containers,
      logger,
      fetcher: async (url, dest) => {
        h.urls.push(url);
        fs.writeFileSync(dest, "source");
      },
      cacheDir: path.join(h.dir, "cache"),
      workParent: h.workParent,
      envPath: h.envPath,
      jobs: 2,
    }
  );
  return { result, logger };
}

async function initramfsNames(bundle: string, dir: string): Promise<string[]> {
  const extractDir = path.join(dir, "extract");
  fs.mkdirSync(extractDir, { recursive: true });
  const files = await extractBundle(bundle, extractDir);
  return parseCpio(zlib.gunzipSync(fs.readFileSync(files["initramfs.cpio.gz"]))).map((entry) => entry.name);
}

test("custom build: busybox configs become static", () => {
  assert.equal(enableStaticBusybox("A=y\n# CONFIG_STATIC is not set\n"), "A=y\nCONFIG_STATIC=y\n");
  assert.equal(enableStaticBusybox("CONFIG_STATIC=y\n"), "CONFIG_STATIC=y\n");
  assert.equal(enableStaticBusybox("A=y\n\n"), "A=y\nCONFIG_STATIC=y\n");
  assert.equal(kernelSourceUrl("6.6.58"), "https://cdn.kernel.org/pub/linux/kernel/v6.x/linux-6.6.58.tar.xz");
});

test("custom build: only shared objects survive library pruning", () => {
  const dir = makeTempDir();
  try {
    write(path.join(dir, "ld-musl-x86_64.so.1"), "");
    write(path.join(dir, "libz.so.1.3"), "");
    write(path.join(dir, "libcrypto.a"), "");
    write(path.join(dir, "apk", "db"), "");
    pruneSharedLibraries(dir);
    assert.deepEqual(fs.readdirSync(dir).sort(), ["ld-musl-x86_64.so.1", "libz.so.1.3"]);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test(
  "custom build: produces a kernel and initramfs bundle",
  withHarness(async (h) => {
    const toolchain = fakeToolchain();
    const containers = runtimeImage();
    const { result, logger } = build(h, toolchain, containers);
    const artifact = await result;

    assert.equal(artifact.imagePath, path.join(h.outputDir, "custom-vm.tar.gz"));
    assert.equal(artifact.type, "custom");
    assert.deepEqual(artifact.estimate, { low: 11, high: 16 });
    assert.deepEqual(artifact.metadata.entries, ["bzImage", "initramfs.cpio.gz"]);
    assert.deepEqual(Object.keys(artifact.metadata.stageDurations), [
      "kernel",
      "userland",
      "runtime",
      "application",
      "init",
      "archive",
      "package",
    ]);
    assert.deepEqual(logger.warnings, []);

    assert.deepEqual(h.urls, [
      "https://cdn.kernel.org/pub/linux/kernel/v6.x/linux-6.6.58.tar.xz",
      "https://busybox.net/downloads/busybox-1.36.1.tar.bz2",
    ]);
    assert.ok(toolchain.seen.kernelConfig.startsWith("# tiny\n"));
    assert.ok(toolchain.seen.kernelConfig.includes("\nCONFIG_BLK_DEV_INITRD=y\n"));
    assert.ok(toolchain.seen.busyboxConfig.includes("CONFIG_STATIC=y"));
    assert.ok(!toolchain.seen.busyboxConfig.includes("# CONFIG_STATIC is not set"));
    assert.ok(toolchain.runner.commands().includes("make ARCH=x86_64 -j2 bzImage"));
    const stripped = toolchain.runner.calls.filter((call) => call.argv[0] === "strip");
    assert.equal(stripped.length, 1);
    assert.ok(stripped[0].argv[stripped[0].argv.length - 1].endsWith("/usr/local/lib/erlang/erts-14.2/bin/beam.smp"));
    assert.ok(logger.lines.includes("Stripped 0 BEAM files (0.0 MB) and 1 binaries (0.0 MB)"));

    assert.deepEqual(containers.created, ["elixir:1.15-alpine"]);
    assert.deepEqual(containers.removedContainers, ["ctr1"]);
    assert.deepEqual(fs.readdirSync(h.workParent), []);

    const names = await initramfsNames(artifact.imagePath, h.dir);
    for (const expected of [
      "init",
      "bin/busybox",
      "bin/elixir",
      "bin/iex",
      "proc",
      "lib/ld-musl-x86_64.so.1",
      "usr/local/lib/erlang/bin/erl",
      "usr/local/lib/erlang/lib/stdlib-5.2/ebin/lists.beam",
    ]) {
      assert.ok(names.includes(expected), expected);
    }
    for (const gone of [
      "lib/apk",
      "usr/local/lib/erlang/lib/ssh-5.1",
      "usr/local/lib/erlang/lib/ssl-11.0",
      "usr/local/lib/erlang/lib/stdlib-5.2/doc",
    ]) {
      assert.ok(!names.includes(gone), gone);
    }

    // the second build reuses the download cache
    h.urls.length = 0;
    await build(h, fakeToolchain(), runtimeImage()).result;
    assert.deepEqual(h.urls, []);
  })
);

test(
  "custom build: applications are baked in and keep what they need",
  withHarness(async (h) => {
    const appPath = path.join(h.dir, "app");
    write(
      path.join(appPath, "mix.exs"),
      "def application do\n  [extra_applications: [:logger, :ssl]]\nend\n"
    );

    const { result, logger } = build(h, fakeToolchain(), runtimeImage(), { appPath });
    const artifact = await result;

    assert.deepEqual(logger.warnings, [
      "keeping ssl: required by the application",
      "keeping public_key: required by the application",
    ]);
    assert.deepEqual(artifact.estimate, { low: 18.3, high: 23.3 });
    assert.deepEqual(artifact.metadata.retention.promoted, ["ssl", "public_key"]);

    const names = await initramfsNames(artifact.imagePath, h.dir);
    assert.ok(names.includes("opt/app/start"));
    assert.ok(names.includes("opt/app/mix.exs"));
    assert.ok(names.includes("usr/local/lib/erlang/lib/ssl-11.0/ebin/ssl.beam"));
    assert.ok(names.includes("bin/elixir"));
  })
);

test(
  "custom build: a failed kernel compile aborts the build",
  withHarness(async (h) => {
    const containers = runtimeImage();
    await assert.rejects(build(h, fakeToolchain({ failKernel: true }), containers).result, (err: unknown) => {
      assert.ok(err instanceof StageFailure);
      assert.equal(err.stage, "kernel");
      assert.equal(err.message, "kernel stage failed: make exited with code 2");
      assert.equal(err.output, "cc1: out of memory\n");
      return true;
    });
    assert.ok(!fs.existsSync(h.outputDir));
    assert.deepEqual(fs.readdirSync(h.workParent), []);
    assert.deepEqual(containers.created, []);
  })
);

test(
  "custom build: a failed runtime copy removes the container and leaves no output",
  withHarness(async (h) => {
    const containers = new FakeContainerEngine({
      copyFrom: (source, dest) => {
        if (source === "/lib") throw new Error("docker cp: no space left on device");
        fs.mkdirSync(dest, { recursive: true });
      },
    });

    await assert.rejects(build(h, fakeToolchain(), containers).result, (err: unknown) => {
      assert.ok(err instanceof StageFailure);
      assert.equal(err.stage, "runtime");
      assert.equal(err.message, "runtime stage failed: docker cp: no space left on device");
      return true;
    });
    assert.deepEqual(containers.created, ["elixir:1.15-alpine"]);
    assert.deepEqual(containers.removedContainers, ["ctr1"]);
    assert.ok(!fs.existsSync(h.outputDir));
    assert.deepEqual(fs.readdirSync(h.workParent), []);
  })
);

test(
  "custom build: missing host tools are reported before any work",
  withHarness(async (h) => {
    const empty = makeTempDir();
    try {
      const toolchain = fakeToolchain();
      await assert.rejects(
        build({ ...h, envPath: empty }, toolchain, runtimeImage()).result,
        (err: unknown) => {
          assert.ok(err instanceof DependencyMissingError);
          assert.deepEqual(err.missing, [...HOST_TOOLS.slice(0, -1), "docker|podman"]);
          return true;
        }
      );
      assert.deepEqual(toolchain.runner.calls, []);
      assert.ok(!fs.existsSync(h.workParent));
    } finally {
      fs.rmSync(empty, { recursive: true, force: true });
    }
  })
);
