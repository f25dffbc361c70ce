/**
 * Alpine container image builder.
 *
 * Generates a multi-stage Dockerfile: the runtime is stripped inside the
 * upstream runtime image, then copied onto a bare Alpine base. The result is
 * exported with `docker save` (or podman) as the build artifact.
 */

import fs from "fs";
import path from "path";

import type { BuildConfig } from "./build-config";
import { ELIXIR_ROOT, ERLANG_ROOT } from "./init-script";
import type { RetentionDecision } from "./otp-stripper";
import { beamStripCommand, dockerfileStripCommands } from "./otp-stripper";
import type { AssemblyOutput, BuildContext, BuildStrategy, ToolRequirement } from "./strategy";
import { runStage } from "./strategy";
import { DEFAULT_RUNTIME_IMAGE } from "./build-custom";
import { errorMessage } from "./errors";

export const ALPINE_BASE_IMAGE = "alpine:3.19";

/** shared libraries the runtime links against */
export const BASE_PACKAGES: ReadonlyArray<string> = ["libstdc++", "openssl", "ncurses-libs", "zlib"];

const RUNTIME_BINARIES = ["erl", "erlc", "escript", "elixir", "elixirc", "iex", "mix"];

/** directory name of the application inside the build context */
const CONTEXT_APP_DIR = "app";

/**
 * Dockerfile for the container strategy.
 */
export function generateDockerfile(config: BuildConfig, decision: RetentionDecision): string {
  const runtimeImage = config.vmOptions.runtimeImage ?? DEFAULT_RUNTIME_IMAGE;
  const packages = [...BASE_PACKAGES, ...config.packages];
  const lines: string[] = [
    "# generated by leanvm",
    `FROM ${runtimeImage} AS builder`,
  ];

  if (config.stripModules) {
    lines.push(...dockerfileStripCommands(decision, ERLANG_ROOT, ELIXIR_ROOT));
  }

  if (config.appPath) {
    lines.push(
      "WORKDIR /app",
      `COPY ${CONTEXT_APP_DIR}/ /app/`,
      "ENV MIX_ENV=prod",
      "RUN mix local.hex --force && mix local.rebar --force && \\",
      "    mix deps.get --only prod && mix compile"
    );
    if (config.stripModules) {
      lines.push(beamStripCommand("/app/_build/prod/lib/*/ebin/*.beam"));
    }
  }

  lines.push(
    "",
    `FROM ${ALPINE_BASE_IMAGE}`,
    `RUN apk add --no-cache ${packages.join(" ")}`,
    `COPY --from=builder ${ERLANG_ROOT} ${ERLANG_ROOT}`,
    `COPY --from=builder ${ELIXIR_ROOT} ${ELIXIR_ROOT}`,
    `RUN for bin in ${RUNTIME_BINARIES.slice(0, 3).join(" ")}; do ln -s ${ERLANG_ROOT}/bin/$bin /usr/local/bin/$bin; done && \\`,
    `    for bin in ${RUNTIME_BINARIES.slice(3).join(" ")}; do ln -s ${ELIXIR_ROOT}/bin/$bin /usr/local/bin/$bin; done`,
    "RUN rm -rf /sbin/apk /etc/apk /lib/apk /usr/share/apk /var/cache/apk",
    "ENV LANG=C.UTF-8",
    `ENV ERL_LIBS=${ELIXIR_ROOT}/lib`
  );

  if (config.appPath) {
    lines.push(
      "COPY --from=builder /app /app",
      "WORKDIR /app",
      "ENV MIX_ENV=prod",
      'CMD ["elixir", "--no-halt", "-S", "mix", "run"]'
    );
  } else {
    lines.push('CMD ["iex"]');
  }

  return lines.join("\n") + "\n";
}

function prepareContext(ctx: BuildContext): string {
  const contextDir = path.join(ctx.workDir, "context");
  fs.mkdirSync(contextDir, { recursive: true });
  fs.writeFileSync(path.join(contextDir, "Dockerfile"), generateDockerfile(ctx.config, ctx.decision));

  if (ctx.config.appPath) {
    const skipped = new Set([".git", "_build", "deps"]);
    fs.cpSync(ctx.config.appPath, path.join(contextDir, CONTEXT_APP_DIR), {
      recursive: true,
      filter: (source) => !skipped.has(path.basename(source)),
    });
  }
  return contextDir;
}

export const alpineStrategy: BuildStrategy = {
  type: "alpine",

  requiredTools(): ToolRequirement[] {
    return [["docker", "podman"]];
  },

  async assemble(ctx: BuildContext): Promise<AssemblyOutput> {
    const engine = ctx.containers();
    // mkdtemp suffixes are unique per build
    const tag = `leanvm-alpine:${path.basename(ctx.workDir).toLowerCase()}`;
    const tarball = path.join(ctx.workDir, "out", "image.tar");
    fs.mkdirSync(path.dirname(tarball), { recursive: true });

    const contextDir = prepareContext(ctx);
    await runStage(ctx, "image", () => engine.build(contextDir, tag, ctx.timeouts.containerMs));

    try {
      await runStage(ctx, "export", () => engine.save(tag, tarball));
    } finally {
      try {
        await engine.removeImage(tag);
      } catch (err) {
        ctx.logger.warn(`failed to remove build image ${tag}: ${errorMessage(err)}`);
      }
    }

    return { kind: "container-image", tarball };
  },
};
