import fs from "fs";
import path from "path";

/** printed by init once userspace is up */
export const BOOT_MARKER = "LEANVM_BOOT_OK";
/** prefix of the functional probe result line */
export const FUNCTIONAL_RESULT = "LEANVM_FUNCTIONAL_OK";
export const FUNCTIONAL_FAILED = "LEANVM_FUNCTIONAL_FAILED";
/** printed after the functional probe finished */
export const FUNCTIONAL_DONE = "LEANVM_FUNCTIONAL_DONE";

/** kernel command line switch selecting a probe run */
export const PROBE_PARAM = "leanvm.probe";

export const APP_DIR = "/opt/app";
export const ERLANG_ROOT = "/usr/local/lib/erlang";
export const ELIXIR_ROOT = "/usr/local/lib/elixir";

/** expression whose output proves the runtime works */
export const VERSION_EXPRESSION = "IO.puts(System.version())";

export type InitScriptOptions = {
  /** the image carries an application under `/opt/app` */
  hasApp: boolean;
  hostname?: string;
};

export function shSingleQuote(value: string): string {
  // POSIX shell-safe single-quoted string
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/**
 * `/init` for the guest: mounts the pseudo filesystems, prints the boot
 * marker, runs a probe when `leanvm.probe=` is on the kernel command line,
 * and otherwise hands over to the application or an interactive shell.
 */
export function generateInitScript(options: InitScriptOptions): string {
  const finalExec = options.hasApp
    ? `cd ${APP_DIR} && exec ./start`
    : "exec iex";

  return `#!/bin/sh
# generated by leanvm

export PATH=/bin:/sbin:/usr/bin:/usr/sbin:/usr/local/bin:${ERLANG_ROOT}/bin
export HOME=/root
export TMPDIR=/tmp
export LANG=C.UTF-8
export ERL_LIBS=${ELIXIR_ROOT}/lib

mount -t proc proc /proc
mount -t sysfs sysfs /sys
mount -t devtmpfs devtmpfs /dev

mkdir -p /dev/pts /dev/shm /run /tmp /root
mount -t devpts devpts /dev/pts
mount -t tmpfs tmpfs /run
mount -t tmpfs tmpfs /tmp

hostname ${shSingleQuote(options.hostname ?? "leanvm")}
ip link set lo up 2>/dev/null || true

echo "${BOOT_MARKER}"

probe=""
for arg in $(cat /proc/cmdline); do
  case "$arg" in
    ${PROBE_PARAM}=*) probe="\${arg#${PROBE_PARAM}=}" ;;
  esac
done

case "$probe" in
  boot)
    poweroff -f
    ;;
  functional)
    if version=$(elixir -e ${shSingleQuote(VERSION_EXPRESSION)} 2>&1); then
      echo "${FUNCTIONAL_RESULT} $version"
    else
      echo "${FUNCTIONAL_FAILED} $version"
    fi
    echo "${FUNCTIONAL_DONE}"
    poweroff -f
    ;;
esac

${finalExec}
`;
}

/**
 * `/bin/elixir` and `/bin/iex` entry points. Application start scripts and
 * the functional probe both go through them.
 */
export function generateRuntimeWrappers(erlangRoot = ERLANG_ROOT): Record<string, string> {
  const wrapper = (binary: string) => `#!/bin/sh
export PATH=${erlangRoot}/bin:$PATH
export ERL_LIBS=${ELIXIR_ROOT}/lib
exec ${ELIXIR_ROOT}/bin/${binary} "$@"
`;
  return {
    "bin/elixir": wrapper("elixir"),
    "bin/iex": wrapper("iex"),
  };
}

/** start script for applications that ship none */
export function generateAppStartScript(): string {
  return `#!/bin/sh
cd ${APP_DIR}
exec elixir -S mix run --no-halt
`;
}

export function writeExecutable(dest: string, content: string): void {
  fs.mkdirSync(path.dirname(dest), { recursive: true });
  fs.writeFileSync(dest, content, { mode: 0o755 });
  // mode is masked by the umask on create
  fs.chmodSync(dest, 0o755);
}
