import type { BuildConfig, BuildType } from "./build-config";
import type { RetentionDecision } from "./otp-stripper";
import { componentSizeMb, decideRetention } from "./otp-stripper";

/**
 * Expected output size range in `mb`.
 */
export type SizeEstimate = Readonly<{
  low: number;
  high: number;
}>;

/**
 * Per-strategy heuristic inputs. Figures are approximate and not calibrated
 * against real builds.
 */
export type StrategySizeTable = Readonly<{
  /** fixed parts of every image */
  base: Readonly<Record<string, number>>;
  /** width of the range above `low` */
  spread: number;
  /** added when an application is packaged */
  appOverhead: number;
  /** added per extra dependency */
  perPackage: number;
}>;

export const STRATEGY_SIZE_TABLES: Readonly<Record<BuildType, StrategySizeTable>> = Object.freeze({
  custom: { base: { kernel: 2, init: 1, runtime: 8 }, spread: 5, appOverhead: 3, perPackage: 1 },
  alpine: { base: { system: 32, runtime: 8 }, spread: 10, appOverhead: 10, perPackage: 5 },
  buildroot: { base: { kernel: 4, system: 18, runtime: 8 }, spread: 10, appOverhead: 5, perPackage: 2 },
  nerves: { base: { system: 14, runtime: 8 }, spread: 7, appOverhead: 3, perPackage: 1 },
});

function round1(value: number) {
  return Math.round(value * 10) / 10;
}

/**
 * Estimate the output size of a build before running it.
 *
 * `low` is the fixed base plus every retained optional component, extra
 * packages and the application overhead; `high` adds the strategy spread.
 */
export function estimateSize(
  config: Pick<BuildConfig, "type" | "appPath" | "packages" | "retention" | "stripModules" | "applications">,
  decision: RetentionDecision = decideRetention(config.retention, {
    stripModules: config.stripModules,
    declaredApplications: config.applications,
  })
): SizeEstimate {
  const table = STRATEGY_SIZE_TABLES[config.type];

  let low = Object.values(table.base).reduce((total, value) => total + value, 0);
  for (const name of decision.retained) {
    low += componentSizeMb(name);
  }
  low += config.packages.length * table.perPackage;
  if (config.appPath) {
    low += table.appOverhead;
  }

  low = round1(low);
  return Object.freeze({ low, high: round1(low + table.spread) });
}

function formatMb(value: number) {
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}

/** e.g. `11-16MB` */
export function formatSizeEstimate(estimate: SizeEstimate): string {
  return `${formatMb(estimate.low)}-${formatMb(estimate.high)}MB`;
}

/** actual size of a file in `mb`, one decimal */
export function bytesToMb(bytes: number): number {
  return round1(bytes / (1024 * 1024));
}
