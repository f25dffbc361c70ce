import fs from "fs";

import type { ToolRunner } from "./exec";
import { describeToolFailure, toolSucceeded } from "./exec";

export const REQUIRED_FIRMWARE_KEYS: ReadonlyArray<string> = ["meta-product", "meta-version"];

/**
 * Reads metadata out of packaged firmware without flashing it.
 */
export interface FirmwareTool {
  introspect(firmwarePath: string): Promise<Record<string, string>>;
}

/**
 * Parse `fwup -m` output (`key="value"` per line).
 */
export function parseFwupMetadata(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of text.split("\n")) {
    const match = line.trim().match(/^([A-Za-z0-9_.-]+)=(?:"(.*)"|(.*))$/);
    if (!match) continue;
    out[match[1]] = match[2] ?? match[3] ?? "";
  }
  return out;
}

/** required keys absent or empty in `metadata` */
export function missingFirmwareKeys(metadata: Record<string, string>): string[] {
  return REQUIRED_FIRMWARE_KEYS.filter((key) => !metadata[key]);
}

export class FwupTool implements FirmwareTool {
  private readonly runner: ToolRunner;
  private readonly timeoutMs: number;

  constructor(runner: ToolRunner, timeoutMs = 60_000) {
    this.runner = runner;
    this.timeoutMs = timeoutMs;
  }

  async introspect(firmwarePath: string) {
    const argv = ["fwup", "-m", "-i", firmwarePath];
    const result = await this.runner.run({ argv, timeoutMs: this.timeoutMs });
    if (!toolSucceeded(result)) {
      throw new Error(`${describeToolFailure(argv, result)}: ${result.stderr.trim()}`);
    }
    return parseFwupMetadata(result.stdout);
  }
}

const MBR_SIZE = 512;
const MBR_SIGNATURE = 0xaa55;
const SECTOR_SIZE = 512;

/**
 * Start offsets in `bytes` of the primary partitions in an MBR partition
 * table. Empty slots are omitted.
 */
export function parseMbrPartitions(mbr: Buffer): number[] {
  if (mbr.length < MBR_SIZE || mbr.readUInt16LE(510) !== MBR_SIGNATURE) return [];
  const offsets: number[] = [];
  for (let i = 0; i < 4; i++) {
    const entry = 446 + i * 16;
    const type = mbr[entry + 4];
    const lba = mbr.readUInt32LE(entry + 8);
    if (type !== 0 && lba > 0) offsets.push(lba * SECTOR_SIZE);
  }
  return offsets;
}

/**
 * Offset of the first root filesystem slot of a raw firmware image. The
 * first partition is the boot partition.
 */
export function rootfsPartitionOffset(imagePath: string): number | null {
  const fd = fs.openSync(imagePath, "r");
  const mbr = Buffer.alloc(MBR_SIZE);
  try {
    fs.readSync(fd, mbr, 0, MBR_SIZE, 0);
  } finally {
    fs.closeSync(fd);
  }
  return parseMbrPartitions(mbr)[1] ?? null;
}
