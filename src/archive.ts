/**
 * Archive formats used by the image builders.
 *
 * newc cpio for initramfs images, ustar for bundles. gzip goes through zlib,
 * xz through the external `xz` tool.
 */

import fs from "fs";
import path from "path";
import { pipeline } from "stream/promises";
import { createGunzip, createGzip } from "zlib";

import type { Compression } from "./build-config";
import type { BuildStage } from "./errors";
import type { ToolRunner } from "./exec";
import { runStep } from "./exec";

const COPY_CHUNK = 1024 * 1024;

// ---------------------------------------------------------------------------
// cpio (newc)
// ---------------------------------------------------------------------------

const CPIO_MAGIC = "070701";
const CPIO_HEADER_SIZE = 110;
const CPIO_TRAILER = "TRAILER!!!";

/** a single entry parsed from a newc cpio archive */
export interface CpioEntry {
  name: string;
  /** full st_mode including the file type bits */
  mode: number;
  uid: number;
  gid: number;
  size: number;
  /** file contents or symlink target */
  content: Buffer;
}

function hex8(value: number) {
  return value.toString(16).padStart(8, "0");
}

function pad4(length: number) {
  return (4 - (length % 4)) % 4;
}

function cpioHeader(fields: {
  ino: number;
  mode: number;
  nlink: number;
  size: number;
  nameSize: number;
}): Buffer {
  const header =
    CPIO_MAGIC +
    hex8(fields.ino) +
    hex8(fields.mode) +
    hex8(0) + // uid
    hex8(0) + // gid
    hex8(fields.nlink) +
    hex8(0) + // mtime
    hex8(fields.size) +
    hex8(0) + // devmajor
    hex8(0) + // devminor
    hex8(0) + // rdevmajor
    hex8(0) + // rdevminor
    hex8(fields.nameSize) +
    hex8(0); // check
  return Buffer.from(header, "ascii");
}

class FdWriter {
  private readonly fd: number;
  offset = 0;

  constructor(fd: number) {
    this.fd = fd;
  }

  write(buf: Buffer) {
    let written = 0;
    while (written < buf.length) {
      written += fs.writeSync(this.fd, buf, written, buf.length - written);
    }
    this.offset += buf.length;
  }

  zeros(count: number) {
    if (count > 0) this.write(Buffer.alloc(count));
  }

  copyFile(source: string) {
    const input = fs.openSync(source, "r");
    const chunk = Buffer.allocUnsafe(COPY_CHUNK);
    try {
      let bytesRead = 0;
      while ((bytesRead = fs.readSync(input, chunk, 0, chunk.length, null)) > 0) {
        this.write(chunk.subarray(0, bytesRead));
      }
    } finally {
      fs.closeSync(input);
    }
  }
}

function listTree(root: string): string[] {
  const out: string[] = [];
  const walk = (rel: string) => {
    const dir = path.join(root, rel);
    for (const name of fs.readdirSync(dir).sort()) {
      const childRel = rel ? `${rel}/${name}` : name;
      out.push(childRel);
      const stat = fs.lstatSync(path.join(root, childRel));
      if (stat.isDirectory()) walk(childRel);
    }
  };
  walk("");
  return out;
}

/**
 * Write the tree under `rootDir` as a newc cpio archive at `outPath`.
 *
 * Entries are sorted, owned by root and carry a zero mtime so identical
 * trees give identical archives. Returns the number of entries written.
 */
export function writeCpioArchive(rootDir: string, outPath: string): number {
  const names = listTree(rootDir);
  const fd = fs.openSync(outPath, "w");
  const out = new FdWriter(fd);

  try {
    let ino = 1;
    const emit = (name: string, mode: number, nlink: number, size: number) => {
      const nameBuf = Buffer.from(`${name}\0`, "utf8");
      out.write(cpioHeader({ ino: ino++, mode, nlink, size, nameSize: nameBuf.length }));
      out.write(nameBuf);
      out.zeros(pad4(CPIO_HEADER_SIZE + nameBuf.length));
    };

    for (const name of names) {
      const full = path.join(rootDir, name);
      const stat = fs.lstatSync(full);

      if (stat.isDirectory()) {
        emit(name, stat.mode, 2, 0);
      } else if (stat.isSymbolicLink()) {
        const target = Buffer.from(fs.readlinkSync(full), "utf8");
        emit(name, stat.mode, 1, target.length);
        out.write(target);
        out.zeros(pad4(target.length));
      } else if (stat.isFile()) {
        emit(name, stat.mode, 1, stat.size);
        out.copyFile(full);
        out.zeros(pad4(stat.size));
      }
      // sockets, fifos and device nodes are created by devtmpfs at boot
    }

    emit(CPIO_TRAILER, 0, 1, 0);
    // pad to a 512-byte block like cpio(1)
    out.zeros((512 - (out.offset % 512)) % 512);
  } finally {
    fs.closeSync(fd);
  }

  return names.length;
}

/**
 * Parse a newc cpio archive. The trailer entry is not returned.
 */
export function parseCpio(buf: Buffer): CpioEntry[] {
  const entries: CpioEntry[] = [];
  let offset = 0;

  while (offset + CPIO_HEADER_SIZE <= buf.length) {
    const magic = buf.toString("ascii", offset, offset + 6);
    if (magic !== CPIO_MAGIC) {
      throw new Error(`bad cpio magic at offset ${offset}`);
    }
    const field = (index: number) =>
      parseInt(buf.toString("ascii", offset + 6 + index * 8, offset + 14 + index * 8), 16);

    const mode = field(1);
    const uid = field(2);
    const gid = field(3);
    const size = field(6);
    const nameSize = field(11);

    const nameStart = offset + CPIO_HEADER_SIZE;
    const name = buf.toString("utf8", nameStart, nameStart + nameSize - 1);
    offset = nameStart + nameSize;
    offset += pad4(CPIO_HEADER_SIZE + nameSize);

    if (name === CPIO_TRAILER) break;

    const content = Buffer.from(buf.subarray(offset, offset + size));
    offset += size + pad4(size);
    entries.push({ name, mode, uid, gid, size, content });
  }

  return entries;
}

// ---------------------------------------------------------------------------
// tar (ustar)
// ---------------------------------------------------------------------------

/** a regular file read back from a bundle */
export interface TarEntry {
  name: string;
  /** permission bits */
  mode: number;
  content: Buffer;
}

/** a file placed in a bundle */
export type TarSource = {
  /** name inside the archive */
  name: string;
  /** file on disk */
  path: string;
  mode?: number;
};

function octal(value: number, width: number) {
  return value.toString(8).padStart(width - 1, "0") + "\0";
}

function tarHeader(name: string, mode: number, size: number): Buffer {
  if (Buffer.byteLength(name) > 100) {
    throw new Error(`tar entry name too long: ${name}`);
  }
  const header = Buffer.alloc(512);
  header.write(name, 0, 100, "utf8");
  header.write(octal(mode & 0o7777, 8), 100, 8, "ascii");
  header.write(octal(0, 8), 108, 8, "ascii"); // uid
  header.write(octal(0, 8), 116, 8, "ascii"); // gid
  header.write(octal(size, 12), 124, 12, "ascii");
  header.write(octal(0, 12), 136, 12, "ascii"); // mtime
  header.write("        ", 148, 8, "ascii"); // checksum placeholder
  header.write("0", 156, 1, "ascii");
  header.write("ustar\0", 257, 6, "ascii");
  header.write("00", 263, 2, "ascii");
  header.write("root", 265, 32, "ascii");
  header.write("root", 297, 32, "ascii");

  let checksum = 0;
  for (const byte of header) checksum += byte;
  header.write(`${checksum.toString(8).padStart(6, "0")}\0 `, 148, 8, "ascii");
  return header;
}

/**
 * Write regular files into an uncompressed ustar archive at `outPath`.
 */
export function writeTarArchive(sources: readonly TarSource[], outPath: string): void {
  const fd = fs.openSync(outPath, "w");
  const out = new FdWriter(fd);
  try {
    for (const source of sources) {
      const stat = fs.statSync(source.path);
      out.write(tarHeader(source.name, source.mode ?? 0o644, stat.size));
      out.copyFile(source.path);
      out.zeros((512 - (stat.size % 512)) % 512);
    }
    // two zero blocks mark the end of the archive
    out.zeros(1024);
  } finally {
    fs.closeSync(fd);
  }
}

function headerText(header: Buffer, offset: number, length: number): string {
  const field = header.subarray(offset, offset + length);
  const end = field.indexOf(0);
  return field.toString("utf8", 0, end === -1 ? length : end);
}

function headerOctal(header: Buffer, offset: number, length: number): number {
  return parseInt(headerText(header, offset, length).trim() || "0", 8);
}

/** sum of the header bytes with the checksum field read as spaces */
function headerChecksum(header: Buffer): number {
  let sum = 0;
  for (let i = 0; i < 512; i++) {
    sum += i >= 148 && i < 156 ? 0x20 : header[i];
  }
  return sum;
}

/**
 * Read back a bundle written by `writeTarArchive`: ustar headers describing
 * regular files only. Anything else is rejected rather than skipped.
 */
export function parseTar(buf: Buffer): TarEntry[] {
  const entries: TarEntry[] = [];
  let offset = 0;

  while (offset + 512 <= buf.length) {
    const header = buf.subarray(offset, offset + 512);
    if (header.every((byte) => byte === 0)) break;

    if (headerOctal(header, 148, 8) !== headerChecksum(header)) {
      throw new Error(`bad tar checksum at offset ${offset}`);
    }
    if (headerText(header, 257, 6) !== "ustar") {
      throw new Error(`not a ustar header at offset ${offset}`);
    }

    const name = headerText(header, 0, 100);
    const typeFlag = header[156];
    if (typeFlag !== 0x30 && typeFlag !== 0) {
      throw new Error(`${name}: only regular files are expected in a bundle`);
    }

    const size = headerOctal(header, 124, 12);
    const dataStart = offset + 512;
    if (dataStart + size > buf.length) {
      throw new Error(`${name}: truncated (${size} bytes declared)`);
    }

    entries.push({
      name,
      mode: headerOctal(header, 100, 8),
      content: Buffer.from(buf.subarray(dataStart, dataStart + size)),
    });
    offset = dataStart + Math.ceil(size / 512) * 512;
  }

  return entries;
}

/**
 * Write `entries` below `destDir`, skipping names that would land outside
 * it. Returns the written paths.
 */
export function extractEntries(entries: readonly TarEntry[], destDir: string): string[] {
  const absRoot = path.resolve(destDir);
  const extracted: string[] = [];

  for (const entry of entries) {
    const target = path.resolve(absRoot, entry.name);
    if (!target.startsWith(absRoot + path.sep)) continue;

    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, entry.content, { mode: entry.mode & 0o7777 });
    extracted.push(target);
  }

  return extracted;
}

// ---------------------------------------------------------------------------
// Compression
// ---------------------------------------------------------------------------

export function compressionExtension(compression: Compression): string {
  switch (compression) {
    case "xz":
      return ".xz";
    case "gzip":
      return ".gz";
    case "none":
      return "";
  }
}

export type CompressOptions = {
  /** required for xz */
  runner?: ToolRunner;
  /** stage reported when the external compressor fails */
  stage: BuildStage;
  timeoutMs?: number;
};

const DEFAULT_COMPRESS_TIMEOUT_MS = 15 * 60 * 1000;

/**
 * Compress `file` in place, returning the new path. The uncompressed file is
 * removed.
 */
export async function compressFile(
  file: string,
  compression: Compression,
  options: CompressOptions
): Promise<string> {
  if (compression === "none") return file;

  const dest = `${file}${compressionExtension(compression)}`;
  if (compression === "gzip") {
    await pipeline(fs.createReadStream(file), createGzip({ level: 9 }), fs.createWriteStream(dest));
    fs.rmSync(file);
    return dest;
  }

  if (!options.runner) {
    throw new Error("xz compression needs a tool runner");
  }
  // the kernel's xz decoder only supports crc32 checks
  await runStep(options.runner, options.stage, {
    argv: ["xz", "-9", "--check=crc32", "-T1", "-f", file],
    timeoutMs: options.timeoutMs ?? DEFAULT_COMPRESS_TIMEOUT_MS,
  });
  if (!fs.existsSync(dest)) {
    throw new Error(`xz did not produce ${dest}`);
  }
  return dest;
}

/**
 * Detect the compression of a bundle from its file name.
 */
export function compressionForPath(file: string): Compression {
  if (file.endsWith(".xz")) return "xz";
  if (file.endsWith(".gz") || file.endsWith(".tgz")) return "gzip";
  return "none";
}

/**
 * Decompress `file` into `destDir`, leaving `file` untouched. Returns the
 * path of the decompressed copy.
 */
export async function decompressInto(
  file: string,
  destDir: string,
  options: CompressOptions
): Promise<string> {
  const compression = compressionForPath(file);
  const base = path.basename(file, compressionExtension(compression));
  const dest = path.join(destDir, base);

  if (compression === "none") {
    fs.copyFileSync(file, dest);
    return dest;
  }

  if (compression === "gzip") {
    await pipeline(fs.createReadStream(file), createGunzip(), fs.createWriteStream(dest));
    return dest;
  }

  if (!options.runner) {
    throw new Error("xz decompression needs a tool runner");
  }
  const copy = path.join(destDir, path.basename(file));
  fs.copyFileSync(file, copy);
  await runStep(options.runner, options.stage, {
    argv: ["xz", "-d", "-f", copy],
    timeoutMs: options.timeoutMs ?? DEFAULT_COMPRESS_TIMEOUT_MS,
  });
  return dest;
}
