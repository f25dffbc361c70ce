import type { Architecture } from "./build-config";

/**
 * Kernel option sets. Option names carry the `CONFIG_` prefix.
 */
export type KernelProfile = Readonly<{
  enable: ReadonlySet<string>;
  disable: ReadonlySet<string>;
}>;

/**
 * - `qemu`: smallest kernel able to boot the runtime under qemu
 * - `container`: adds namespaces and cgroups for running containers inside the guest
 */
export type KernelVariant = "qemu" | "container";

export type KernelProfileOptions = {
  arch?: Architecture;
  variant?: KernelVariant;
  /** extra options to enable */
  enable?: Iterable<string>;
  /** extra options to disable (boot-essential options are never disabled) */
  disable?: Iterable<string>;
};

const SERIAL_CONSOLE: Record<Architecture, string[]> = {
  x86_64: ["CONFIG_SERIAL_8250", "CONFIG_SERIAL_8250_CONSOLE"],
  aarch64: ["CONFIG_SERIAL_AMBA_PL011", "CONFIG_SERIAL_AMBA_PL011_CONSOLE"],
};

const BOOT_ESSENTIAL_COMMON = [
  "CONFIG_TTY",
  "CONFIG_PRINTK",
  "CONFIG_BINFMT_ELF",
  "CONFIG_BINFMT_SCRIPT",
  "CONFIG_BLK_DEV_INITRD",
  "CONFIG_RD_XZ",
  "CONFIG_RD_GZIP",
  "CONFIG_DEVTMPFS",
];

const VIRTUALIZATION_ESSENTIAL = [
  "CONFIG_VIRTIO",
  "CONFIG_VIRTIO_PCI",
  "CONFIG_VIRTIO_BLK",
  "CONFIG_VIRTIO_NET",
  "CONFIG_VIRTIO_CONSOLE",
  "CONFIG_HW_RANDOM",
  "CONFIG_HW_RANDOM_VIRTIO",
];

// what the runtime needs on top of tinyconfig
const RUNTIME_BASELINE = [
  "CONFIG_64BIT",
  "CONFIG_SMP",
  "CONFIG_FUTEX",
  "CONFIG_EPOLL",
  "CONFIG_EVENTFD",
  "CONFIG_SHMEM",
  "CONFIG_AIO",
  "CONFIG_MULTIUSER",
  "CONFIG_SGETMASK_SYSCALL",
  "CONFIG_SYSFS_SYSCALL",
  "CONFIG_HIGH_RES_TIMERS",
  "CONFIG_NO_HZ_IDLE",
  "CONFIG_PREEMPT_NONE",
  "CONFIG_NET",
  "CONFIG_INET",
  "CONFIG_PACKET",
  "CONFIG_UNIX",
  "CONFIG_PCI",
  "CONFIG_EXT4_FS",
  "CONFIG_TMPFS",
  "CONFIG_PROC_FS",
  "CONFIG_SYSFS",
  "CONFIG_DEVTMPFS_MOUNT",
  "CONFIG_CC_OPTIMIZE_FOR_SIZE",
  "CONFIG_KERNEL_XZ",
];

const CONTAINER_EXTRAS = [
  "CONFIG_NAMESPACES",
  "CONFIG_UTS_NS",
  "CONFIG_IPC_NS",
  "CONFIG_PID_NS",
  "CONFIG_NET_NS",
  "CONFIG_CGROUPS",
  "CONFIG_MEMCG",
  "CONFIG_CGROUP_PIDS",
  "CONFIG_VETH",
  "CONFIG_BRIDGE",
  "CONFIG_NETFILTER",
  "CONFIG_OVERLAY_FS",
];

export const DISABLED_HARDWARE: ReadonlyArray<string> = Object.freeze([
  "CONFIG_SOUND",
  "CONFIG_USB_SUPPORT",
  "CONFIG_INPUT_MOUSE",
  "CONFIG_INPUT_KEYBOARD",
  "CONFIG_GPIOLIB",
  "CONFIG_I2C",
  "CONFIG_SPI",
  "CONFIG_WLAN",
  "CONFIG_WIRELESS",
  "CONFIG_HWMON",
  "CONFIG_THERMAL",
  "CONFIG_WATCHDOG",
  "CONFIG_DRM",
  "CONFIG_VGA_CONSOLE",
]);

export const DISABLED_FEATURES: ReadonlyArray<string> = Object.freeze([
  "CONFIG_SWAP",
  "CONFIG_MODULES",
  "CONFIG_KALLSYMS",
  "CONFIG_DEBUG_KERNEL",
  "CONFIG_DEBUG_INFO",
  "CONFIG_FTRACE",
  "CONFIG_KPROBES",
  "CONFIG_PROFILING",
]);

function normalizeOption(name: string) {
  const trimmed = name.trim();
  return trimmed.startsWith("CONFIG_") ? trimmed : `CONFIG_${trimmed}`;
}

/**
 * Options the guest cannot boot without on `arch`.
 */
export function bootEssentialOptions(arch: Architecture = "x86_64"): ReadonlySet<string> {
  return new Set([...BOOT_ESSENTIAL_COMMON, ...SERIAL_CONSOLE[arch]]);
}

/**
 * Minimal kernel profile for a virtual machine target.
 *
 * Disabling wins over enabling, except for boot-essential options which are
 * always enabled.
 */
export function generateKernelProfile(options: KernelProfileOptions = {}): KernelProfile {
  const arch = options.arch ?? "x86_64";
  const essential = bootEssentialOptions(arch);

  const enable = new Set<string>([...RUNTIME_BASELINE, ...essential, ...VIRTUALIZATION_ESSENTIAL]);
  if (options.variant === "container") {
    for (const name of CONTAINER_EXTRAS) enable.add(name);
  }
  if (arch === "aarch64") {
    enable.add("CONFIG_VIRTIO_MMIO");
    // x86 only
    enable.delete("CONFIG_64BIT");
  }
  for (const name of options.enable ?? []) enable.add(normalizeOption(name));

  const disable = new Set<string>([...DISABLED_HARDWARE, ...DISABLED_FEATURES]);
  for (const name of options.disable ?? []) disable.add(normalizeOption(name));
  for (const name of essential) disable.delete(name);

  for (const name of disable) enable.delete(name);

  return Object.freeze({ enable, disable });
}

export type RenderOptions = {
  /** value of `CONFIG_LOCALVERSION` (default: "-leanvm") */
  localVersion?: string;
};

/**
 * Render a profile as a `.config` fragment to merge over tinyconfig.
 */
export function renderKernelConfig(profile: KernelProfile, options: RenderOptions = {}): string {
  const lines = ["# leanvm minimal kernel profile"];
  lines.push(`CONFIG_LOCALVERSION=${JSON.stringify(options.localVersion ?? "-leanvm")}`);
  for (const name of Array.from(profile.enable).sort()) {
    lines.push(`${name}=y`);
  }
  for (const name of Array.from(profile.disable).sort()) {
    lines.push(`# ${name} is not set`);
  }
  return lines.join("\n") + "\n";
}

/** approximate compressed kernel size for a variant */
export function estimateKernelSize(variant: KernelVariant | "full"): string {
  switch (variant) {
    case "qemu":
      return "1.5-2MB";
    case "container":
      return "2-2.5MB";
    case "full":
      return "10-15MB";
  }
}

/** `make` target producing the boot image */
export function kernelMakeTarget(arch: Architecture): string {
  return arch === "aarch64" ? "Image" : "bzImage";
}

/** boot image location inside the kernel tree */
export function kernelImagePath(arch: Architecture): string {
  return arch === "aarch64" ? "arch/arm64/boot/Image" : "arch/x86/boot/bzImage";
}

/** `ARCH=` value for kbuild */
export function kbuildArch(arch: Architecture): string {
  return arch === "aarch64" ? "arm64" : "x86_64";
}
