import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import test from "node:test";

import type { RetentionFlags } from "../src/build-config";
import { RETENTION_FLAGS } from "../src/build-config";
import {
  ALWAYS_REMOVE,
  NEVER_REMOVE,
  applicationsToRemove,
  decideRetention,
  detectAppApplications,
  dockerfileStripCommands,
  estimateSavings,
  parseRetentionFlags,
  beamStripCommand,
  pruneRuntime,
  stripBeamChunks,
  stripBeamFiles,
  stripElfBinaries,
} from "../src/otp-stripper";
import { FakeToolRunner, makeTempDir } from "./fakes";

function beamFile(chunks: [string, string][]): Buffer {
  const parts = chunks.map(([id, data]) => {
    const header = Buffer.alloc(8);
    header.write(id, 0, "latin1");
    header.writeUInt32BE(data.length, 4);
    return Buffer.concat([header, Buffer.from(data, "latin1"), Buffer.alloc((4 - (data.length % 4)) % 4)]);
  });
  const body = Buffer.concat(parts);
  const header = Buffer.alloc(12);
  header.write("FOR1", 0, "latin1");
  header.writeUInt32BE(4 + body.length, 4);
  header.write("BEAM", 8, "latin1");
  return Buffer.concat([header, body]);
}

function allFlagCombinations(): Partial<RetentionFlags>[] {
  const out: Partial<RetentionFlags>[] = [];
  for (let mask = 0; mask < 1 << RETENTION_FLAGS.length; mask++) {
    const flags: Partial<RetentionFlags> = {};
    RETENTION_FLAGS.forEach((flag, index) => {
      flags[flag] = (mask & (1 << index)) !== 0;
    });
    out.push(flags);
  }
  return out;
}

test("otp stripper: default removal list covers every optional group", () => {
  const removed = applicationsToRemove({});
  assert.equal(removed.length, ALWAYS_REMOVE.length + 8);
  assert.deepEqual(removed.slice(ALWAYS_REMOVE.length), [
    "ssh",
    "ssl",
    "public_key",
    "inets",
    "mnesia",
    "runtime_tools",
    "sasl",
    "syntax_tools",
  ]);
});

test("otp stripper: retention flags keep their group", () => {
  const removed = applicationsToRemove({ ssl: true, devTools: true });
  assert.ok(!removed.includes("ssl"));
  assert.ok(!removed.includes("public_key"));
  assert.ok(!removed.includes("sasl"));
  assert.ok(removed.includes("ssh"));
  assert.ok(removed.includes("wx"));
});

test("otp stripper: protected components are never removed", () => {
  for (const flags of allFlagCombinations()) {
    const decision = decideRetention(flags, { declaredApplications: ["ssl", "kernel"] });
    for (const name of NEVER_REMOVE) {
      assert.ok(!decision.removed.includes(name), `${name} removed with ${JSON.stringify(flags)}`);
      assert.ok(decision.required.includes(name));
    }
  }
});

test("otp stripper: retained and removed partition the optional components", () => {
  const known = new Set(applicationsToRemove({}));
  for (const flags of allFlagCombinations()) {
    const decision = decideRetention(flags);
    const retained = new Set(decision.retained);
    for (const name of decision.removed) {
      assert.ok(!retained.has(name));
    }
    assert.equal(decision.retained.length + decision.removed.length, known.size);
  }
});

test("otp stripper: stripModules=false removes nothing", () => {
  const decision = decideRetention({}, { stripModules: false, declaredApplications: ["ssl"] });
  assert.deepEqual(decision.removed, []);
  assert.deepEqual(decision.promoted, []);
  assert.deepEqual(decision.warnings, []);
  assert.equal(decision.retained.length, applicationsToRemove({}).length);
});

test("otp stripper: declared applications are promoted with one warning each", () => {
  const warned: string[] = [];
  const decision = decideRetention({}, {
    declaredApplications: ["ssl"],
    warn: (message) => warned.push(message),
  });

  assert.deepEqual(decision.promoted, ["ssl", "public_key"]);
  assert.deepEqual(decision.retained, ["ssl", "public_key"]);
  assert.deepEqual(warned, [
    "keeping ssl: required by the application",
    "keeping public_key: required by the application",
  ]);
  assert.deepEqual(decision.warnings, warned);
  assert.ok(!decision.removed.includes("ssl"));
  assert.equal(decision.removed.length, applicationsToRemove({}).length - 2);
});

test("otp stripper: declaring a protected or already retained application warns nothing", () => {
  const decision = decideRetention({ ssl: true }, { declaredApplications: ["logger", "ssl"] });
  assert.deepEqual(decision.promoted, []);
  assert.deepEqual(decision.warnings, []);
});

test("otp stripper: decisions are frozen", () => {
  const decision = decideRetention({});
  assert.ok(Object.isFrozen(decision));
  assert.ok(Object.isFrozen(decision.removed));
});

test("otp stripper: retention flags accept several spellings", () => {
  assert.deepEqual(
    parseRetentionFlags({ keep_ssh: true, keepMnesia: true, dev_tools: true, http: "yes", gopher: true }),
    { ssh: true, mnesia: true, devTools: true }
  );
  assert.deepEqual(parseRetentionFlags({ keep_dev_tools: false }), { devTools: false });
});

test("otp stripper: savings sum the removed component sizes", () => {
  assert.deepEqual(estimateSavings({}), { savedMb: 63.5, removedCount: 30 });
  assert.deepEqual(
    estimateSavings({ ssh: true, ssl: true, http: true, mnesia: true, devTools: true }),
    { savedMb: 51.3, removedCount: 22 }
  );
});

test("otp stripper: reads applications from mix.exs", () => {
  const dir = makeTempDir();
  try {
    assert.deepEqual(detectAppApplications(dir), []);

    fs.writeFileSync(
      path.join(dir, "mix.exs"),
      `defmodule Demo.MixProject do
  use Mix.Project

  def application do
    [extra_applications: [:logger, :ssl], mod: {Demo, []}]
  end

  defp deps do
    [{:jason, "~> 1.4"}]
  end
end
`
    );
    assert.deepEqual(detectAppApplications(dir), ["logger", "ssl"]);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("otp stripper: prunes removed applications and documentation", () => {
  const root = makeTempDir();
  const write = (rel: string, content: string) => {
    const file = path.join(root, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  };

  try {
    write("lib/ssh-5.1/ebin/ssh.beam", "x".repeat(10));
    write("lib/stdlib-5.2/ebin/lists.beam", "x".repeat(20));
    write("lib/stdlib-5.2/src/lists.erl", "x".repeat(30));
    write("lib/stdlib-5.2/doc/overview.txt", "x".repeat(7));
    write("README.md", "x".repeat(5));

    const result = pruneRuntime(root, decideRetention({}));

    assert.deepEqual([...result.removedPaths].sort(), [
      "README.md",
      "lib/ssh-5.1",
      "lib/stdlib-5.2/doc",
      "lib/stdlib-5.2/src",
    ]);
    assert.equal(result.bytesFreed, 52);
    assert.ok(fs.existsSync(path.join(root, "lib/stdlib-5.2/ebin/lists.beam")));
    assert.ok(!fs.existsSync(path.join(root, "lib/ssh-5.1")));
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("otp stripper: dockerfile commands follow the decision", () => {
  assert.deepEqual(dockerfileStripCommands(decideRetention({}, { stripModules: false })), []);

  const commands = dockerfileStripCommands(decideRetention({}));
  assert.equal(commands.length, 6);
  assert.equal(
    commands[4],
    "    (find /usr/local/lib/erlang -type f \\( -perm -u+x -o -name '*.so' \\) " +
      "-exec strip --strip-all --remove-section=.comment --remove-section=.note {} + 2>/dev/null || true)"
  );
  assert.ok(commands[0].startsWith("RUN rm -rf /usr/local/lib/erlang/lib/diameter-* /usr/local/lib/erlang/lib/eldap-* "));
  assert.ok(commands[0].endsWith("/usr/local/lib/erlang/lib/syntax_tools-*"));
});

test("otp stripper: beam stripping keeps only the chunks the loader needs", () => {
  const original = beamFile([
    ["AtU8", "atoms"],
    ["Code", "code"],
    ["Dbgi", "debug-info-xx"],
    ["Docs", "docs"],
    ["ExpT", "exports!"],
  ]);
  const stripped = stripBeamChunks(original);
  assert.ok(stripped);
  assert.deepEqual(stripped, beamFile([
    ["AtU8", "atoms"],
    ["Code", "code"],
    ["ExpT", "exports!"],
  ]));
  assert.equal(original.length - stripped.length, 36);

  assert.equal(stripBeamChunks(Buffer.from("not a beam file")), null);
  assert.equal(stripBeamChunks(original.subarray(0, original.length - 4)), null);
});

test("otp stripper: beam files are rewritten only when they shrink", () => {
  const root = makeTempDir();
  try {
    fs.mkdirSync(path.join(root, "lib/stdlib-5.2/ebin"), { recursive: true });
    const lists = path.join(root, "lib/stdlib-5.2/ebin/lists.beam");
    const maps = path.join(root, "lib/stdlib-5.2/ebin/maps.beam");
    fs.writeFileSync(lists, beamFile([["Code", "code"], ["Dbgi", "debug-info-xx"], ["Docs", "docs"]]));
    fs.writeFileSync(maps, beamFile([["Code", "code"]]));
    fs.writeFileSync(path.join(root, "lib/stdlib-5.2/ebin/broken.beam"), "garbage");

    const result = stripBeamFiles(root);

    assert.deepEqual(result, { files: ["lib/stdlib-5.2/ebin/lists.beam"], bytesFreed: 36 });
    assert.deepEqual(fs.readFileSync(lists), beamFile([["Code", "code"]]));
    assert.equal(fs.readFileSync(path.join(root, "lib/stdlib-5.2/ebin/broken.beam"), "utf8"), "garbage");
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("otp stripper: elf binaries are stripped and rejected ones reported", async () => {
  const root = makeTempDir();
  const elf = (size: number) => Buffer.concat([Buffer.from([0x7f, 0x45, 0x4c, 0x46]), Buffer.alloc(size - 4)]);
  try {
    fs.mkdirSync(path.join(root, "bin"));
    fs.mkdirSync(path.join(root, "lib"));
    fs.writeFileSync(path.join(root, "bin/beam.smp"), elf(100));
    fs.writeFileSync(path.join(root, "bin/erl"), "#!/bin/sh\n");
    fs.writeFileSync(path.join(root, "lib/crypto.so"), elf(58));
    fs.writeFileSync(path.join(root, "lib/foreign.so"), elf(40));

    const runner = new FakeToolRunner(({ argv }) => {
      const file = argv[argv.length - 1];
      if (file.endsWith("foreign.so")) {
        return { exitCode: 1, stderr: "Unable to recognise the format of the input file\n" };
      }
      fs.truncateSync(file, 10);
      return {};
    });

    const result = await stripElfBinaries(root, runner, { timeoutMs: 500 });

    assert.deepEqual(result, {
      files: ["bin/beam.smp", "lib/crypto.so"],
      bytesFreed: 138,
      failed: ["lib/foreign.so: strip exited with code 1: Unable to recognise the format of the input file"],
    });
    assert.deepEqual(runner.calls[0].argv, [
      "strip",
      "--strip-all",
      "--remove-section=.comment",
      "--remove-section=.note",
      path.join(root, "bin/beam.smp"),
    ]);
    assert.equal(runner.calls[0].timeoutMs, 500);
    assert.equal(runner.calls.length, 3);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("otp stripper: beam strip command for container images", () => {
  assert.equal(
    beamStripCommand("/app/_build/prod/lib/*/ebin/*.beam"),
    "RUN erl -noshell -eval '{ok, _} = beam_lib:strip_files(filelib:wildcard(\"/app/_build/prod/lib/*/ebin/*.beam\")), halt().'"
  );
  assert.equal(
    beamStripCommand("/e/lib/*/ebin/*.beam", "/r"),
    "RUN erl -noshell -eval '{ok, _} = beam_lib:strip_release(\"/r\"), " +
      "{ok, _} = beam_lib:strip_files(filelib:wildcard(\"/e/lib/*/ebin/*.beam\")), halt().'"
  );
});
