import { spawn } from "child_process";

import type { Architecture } from "./build-config";
import type { Logger } from "./debug";
import { trackChild } from "./exec";

/** characters of console output kept for reports */
const MAX_CONSOLE_CHARS = 64 * 1024;

export type BootOptions = {
  kernelPath: string;
  /** initramfs (custom builds) */
  initrdPath?: string;
  /** raw root disk (buildroot builds) */
  drivePath?: string;
  /** kernel command line */
  append: string;
  memoryMb: number;
  cpus: number;
  arch: Architecture;
  /** line the guest prints once it reached the expected point */
  marker: string;
  timeoutMs: number;
  /** qemu binary (default: qemu-system-<arch>) */
  qemuPath?: string;
  /** accelerator (default: host dependent) */
  accel?: string;
};

export type ConsoleWatchResult = {
  /** marker seen before the deadline */
  matched: boolean;
  timedOut: boolean;
  /** exit code when the process exited on its own before the marker */
  exitCode: number | null;
  output: string;
  durationMs: number;
  pid: number | undefined;
};

/**
 * Boots kernel images. Implementations must guarantee the emulator process
 * is gone when `boot` settles.
 */
export interface Emulator {
  boot(options: BootOptions): Promise<ConsoleWatchResult>;
}

export function qemuBinary(arch: Architecture) {
  return `qemu-system-${arch}`;
}

/** kernel console device for the default machine of `arch` */
export function consoleDevice(arch: Architecture) {
  return arch === "aarch64" ? "ttyAMA0" : "ttyS0";
}

export function buildQemuArgs(options: BootOptions): string[] {
  const args: string[] = [
    "-nodefaults",
    "-no-reboot",
    "-m",
    `${options.memoryMb}M`,
    "-smp",
    String(options.cpus),
    "-kernel",
    options.kernelPath,
  ];

  if (options.initrdPath) {
    args.push("-initrd", options.initrdPath);
  }

  args.push("-append", options.append, "-nographic");

  if (options.drivePath) {
    args.push("-drive", `file=${options.drivePath},format=raw,if=none,id=drive0,snapshot=on`);
    args.push("-device", "virtio-blk-pci,drive=drive0");
  }

  args.push("-machine", selectMachineType(options.arch));

  const accel = options.accel ?? selectAccel(options.arch);
  args.push("-accel", accel);

  args.push("-cpu", accel === "tcg" ? "max" : "host");

  args.push("-serial", "stdio");
  args.push("-object", "rng-random,filename=/dev/urandom,id=rng0");
  args.push("-device", "virtio-rng-pci,rng=rng0");

  return args;
}

function selectMachineType(arch: Architecture) {
  return arch === "aarch64" ? "virt" : "q35";
}

function hostArch(): Architecture {
  return process.arch === "arm64" ? "aarch64" : "x86_64";
}

function selectAccel(arch: Architecture) {
  // hardware acceleration only works for the host architecture
  if (arch !== hostArch()) return "tcg";
  if (process.platform === "linux") return "kvm";
  if (process.platform === "darwin") return "hvf";
  return "tcg";
}

/**
 * Start `command` and watch its combined output for `marker`.
 *
 * The process is killed as soon as the marker appears or the deadline
 * passes, and the returned promise settles only after it has exited.
 */
export function watchConsole(
  command: string,
  args: readonly string[],
  options: { marker: string; timeoutMs: number; logger?: Logger }
): Promise<ConsoleWatchResult> {
  const started = Date.now();

  return new Promise<ConsoleWatchResult>((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ["ignore", "pipe", "pipe"] });
    trackChild(child);

    let output = "";
    let matched = false;
    let timedOut = false;
    let stopping = false;

    const stop = () => {
      if (stopping) return;
      stopping = true;
      child.kill("SIGKILL");
    };

    const onData = (chunk: string) => {
      output += chunk;
      if (output.length > MAX_CONSOLE_CHARS) {
        output = output.slice(output.length - MAX_CONSOLE_CHARS);
      }
      options.logger?.debug("qemu", chunk);
      if (!matched && output.includes(options.marker)) {
        matched = true;
        stop();
      }
    };

    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", onData);
    child.stderr?.on("data", onData);

    const timer = setTimeout(() => {
      if (matched) return;
      timedOut = true;
      options.logger?.debug("qemu", `no marker after ${options.timeoutMs}ms, killing pid ${child.pid}`);
      stop();
    }, options.timeoutMs);

    child.once("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.once("close", (exitCode) => {
      clearTimeout(timer);
      resolve({
        matched,
        timedOut,
        exitCode: stopping ? null : exitCode,
        output,
        durationMs: Date.now() - started,
        pid: child.pid,
      });
    });
  });
}

/**
 * Boots images with the local qemu installation.
 */
export class QemuEmulator implements Emulator {
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  boot(options: BootOptions): Promise<ConsoleWatchResult> {
    const command = options.qemuPath ?? qemuBinary(options.arch);
    const args = buildQemuArgs(options);
    this.logger?.debug("qemu", `${command} ${args.join(" ")}`);
    return watchConsole(command, args, {
      marker: options.marker,
      timeoutMs: options.timeoutMs,
      logger: this.logger,
    });
  }
}
