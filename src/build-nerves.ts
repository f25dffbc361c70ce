/**
 * Nerves firmware builder.
 *
 * Builds a `.fw` firmware bundle with `mix firmware` for one Nerves target.
 * When no application is given a minimal Nerves project is generated.
 */

import fs from "fs";
import path from "path";

import type { BuildConfig } from "./build-config";
import { ConfigurationError, StageFailure } from "./errors";
import { runStep } from "./exec";
import { BOOT_MARKER } from "./init-script";
import type { AssemblyOutput, BuildContext, BuildStrategy, ToolRequirement } from "./strategy";
import { runStage } from "./strategy";

export const NERVES_TARGETS: ReadonlyArray<string> = ["qemu_arm", "rpi0", "bbb", "x86_64"];

/** target used when none is configured; the only one bootable without hardware */
export const RECOMMENDED_NERVES_TARGET = "qemu_arm";

const SYSTEM_PACKAGES: Readonly<Record<string, string>> = {
  qemu_arm: '{:nerves_system_qemu_arm, "~> 0.1", runtime: false, targets: :qemu_arm}',
  rpi0: '{:nerves_system_rpi0, "~> 1.24", runtime: false, targets: :rpi0}',
  bbb: '{:nerves_system_bbb, "~> 2.19", runtime: false, targets: :bbb}',
  x86_64: '{:nerves_system_x86_64, "~> 1.24", runtime: false, targets: :x86_64}',
};

const PROJECT_APP = "leanvm_firmware";

export function resolveNervesTarget(config: Pick<BuildConfig, "vmOptions">): string {
  const target = config.vmOptions.nervesTarget ?? RECOMMENDED_NERVES_TARGET;
  if (!NERVES_TARGETS.includes(target)) {
    throw new ConfigurationError(
      `unsupported nerves target ${JSON.stringify(target)} (expected one of ${NERVES_TARGETS.join(", ")})`,
      "vmOptions.nervesTarget"
    );
  }
  return target;
}

/**
 * Files of the minimal Nerves project, keyed by relative path.
 */
export function generateNervesProject(target: string): Record<string, string> {
  const system = SYSTEM_PACKAGES[target] ?? SYSTEM_PACKAGES[RECOMMENDED_NERVES_TARGET];
  const mix = `defmodule LeanvmFirmware.MixProject do
  use Mix.Project

  @app :${PROJECT_APP}
  @all_targets [${NERVES_TARGETS.map((name) => `:${name}`).join(", ")}]

  def project do
    [
      app: @app,
      version: "0.1.0",
      elixir: "~> 1.15",
      archives: [nerves_bootstrap: "~> 1.13"],
      start_permanent: Mix.env() == :prod,
      deps: deps(),
      releases: [{@app, release()}],
      preferred_cli_target: [run: :host, test: :host]
    ]
  end

  def application do
    [extra_applications: [:logger], mod: {LeanvmFirmware, []}]
  end

  defp deps do
    [
      {:nerves, "~> 1.10", runtime: false},
      {:shoehorn, "~> 0.9"},
      {:nerves_runtime, "~> 0.13", targets: @all_targets},
      ${system}
    ]
  end

  def release do
    [
      overwrite: true,
      cookie: "#{@app}_cookie",
      include_erts: &Nerves.Release.erts/0,
      steps: [&Nerves.Release.init/1, :assemble],
      strip_beams: Mix.env() == :prod
    ]
  end
end
`;

  const app = `defmodule LeanvmFirmware do
  use Application

  def start(_type, _args) do
    IO.puts("${BOOT_MARKER}")
    Supervisor.start_link([], strategy: :one_for_one, name: LeanvmFirmware.Supervisor)
  end
end
`;

  const config = `import Config

config :shoehorn, init: [:nerves_runtime], app: Mix.Project.config()[:app]

if Mix.target() != :host do
  config :nerves, :firmware, rootfs_overlay: "rootfs_overlay"
end
`;

  const vmArgs = `-noshell
-user elixir
-run elixir start_cli
-extra --no-halt
`;

  return {
    "mix.exs": mix,
    "lib/leanvm_firmware.ex": app,
    "config/config.exs": config,
    "rel/vm.args.eex": vmArgs,
    "rootfs_overlay/.keep": "",
  };
}

function prepareProject(ctx: BuildContext, target: string): string {
  const projectDir = path.join(ctx.workDir, "project");

  if (ctx.config.appPath) {
    const mixFile = path.join(ctx.config.appPath, "mix.exs");
    if (!fs.existsSync(mixFile) || !fs.readFileSync(mixFile, "utf8").includes(":nerves")) {
      throw new StageFailure("application", `${ctx.config.appPath} is not a Nerves project`);
    }
    fs.cpSync(ctx.config.appPath, projectDir, {
      recursive: true,
      filter: (source) => ![".git", "_build", "deps"].includes(path.basename(source)),
    });
    return projectDir;
  }

  for (const [name, content] of Object.entries(generateNervesProject(target))) {
    const file = path.join(projectDir, name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }
  return projectDir;
}

function findFirmware(projectDir: string, target: string): string | null {
  const imagesDir = path.join(projectDir, "_build", `${target}_prod`, "nerves", "images");
  if (!fs.existsSync(imagesDir)) return null;
  const firmware = fs.readdirSync(imagesDir).filter((name) => name.endsWith(".fw")).sort();
  return firmware.length > 0 ? path.join(imagesDir, firmware[0]) : null;
}

export const nervesStrategy: BuildStrategy = {
  type: "nerves",

  validateConfig(config) {
    resolveNervesTarget(config);
  },

  requiredTools(): ToolRequirement[] {
    return ["mix", "elixir", "erl", "fwup"];
  },

  async assemble(ctx: BuildContext): Promise<AssemblyOutput> {
    const target = resolveNervesTarget(ctx.config);
    const projectDir = await runStage(ctx, "application", async () => prepareProject(ctx, target));

    return runStage<AssemblyOutput>(ctx, "firmware", async () => {
      const env = { MIX_TARGET: target, MIX_ENV: "prod" };
      const mix = (...args: string[]) => ({
        argv: ["mix", ...args],
        cwd: projectDir,
        env,
      });

      await runStep(ctx.runner, "firmware", {
        ...mix("archive.install", "hex", "nerves_bootstrap", "--force"),
        timeoutMs: ctx.timeouts.downloadMs,
      });
      await runStep(ctx.runner, "firmware", { ...mix("deps.get"), timeoutMs: ctx.timeouts.downloadMs });
      await runStep(ctx.runner, "firmware", { ...mix("firmware"), timeoutMs: ctx.timeouts.compileMs });

      const firmware = findFirmware(projectDir, target);
      if (!firmware) {
        throw new StageFailure("firmware", `mix firmware produced no .fw for ${target}`);
      }
      return { kind: "firmware", firmware, target };
    });
  },
};
