import type { Stats } from "node:fs";
import { mkdir, readdir, stat, statfs, writeFile } from "node:fs/promises";
import { basename, join, resolve, sep } from "node:path";

export type FileAccessReason = "not-found" | "not-a-directory" | "forbidden" | "invalid";

export class FileAccessError extends Error {
  constructor(
    readonly reason: FileAccessReason,
    message: string
  ) {
    super(message);
    this.name = "FileAccessError";
  }
}

export interface DirectoryEntry {
  name: string;
  type: "dir" | "file" | "unknown";
  size: number | null;
}

export interface DirectoryListing {
  path: string;
  entries: DirectoryEntry[];
}

export interface StoredFile {
  path: string;
  size: number;
}

export interface OutputFile {
  name: string;
  size: number;
}

export interface DiskUsage {
  total_gb: number;
  used_gb: number;
  free_gb: number;
}

function errnoCode(error: unknown): string | undefined {
  return (error as NodeJS.ErrnoException)?.code;
}

export async function browseDirectory(path: string): Promise<DirectoryListing> {
  const target = resolve(path);
  let info: Stats;
  try {
    info = await stat(target);
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      throw new FileAccessError("not-found", "Path not found");
    }
    throw error;
  }
  if (!info.isDirectory()) {
    throw new FileAccessError("not-a-directory", "Path is not a directory");
  }
  let names: string[];
  try {
    names = await readdir(target);
  } catch (error) {
    if (errnoCode(error) === "EACCES" || errnoCode(error) === "EPERM") {
      throw new FileAccessError("forbidden", "Permission denied");
    }
    throw error;
  }
  names.sort();
  const entries = await Promise.all(
    names.map(async (name): Promise<DirectoryEntry> => {
      try {
        const entry = await stat(join(target, name));
        return entry.isDirectory()
          ? { name, type: "dir", size: null }
          : { name, type: "file", size: entry.isFile() ? entry.size : null };
      } catch {
        // Broken symlink or unreadable entry: still listed.
        return { name, type: "unknown", size: null };
      }
    })
  );
  return { path: target, entries };
}

/** Writes an uploaded body under `destDir`, keeping only the base name of `filename`. */
export async function storeUpload(destDir: string, filename: string, body: Buffer): Promise<StoredFile> {
  const name = basename(filename);
  if (name === "" || name === "." || name === "..") {
    throw new FileAccessError("invalid", "Invalid file name");
  }
  const dest = resolve(destDir);
  await mkdir(dest, { recursive: true });
  const filePath = join(dest, name);
  await writeFile(filePath, body);
  const written = await stat(filePath);
  return { path: filePath, size: written.size };
}

export async function listOutputFiles(outputDir: string): Promise<OutputFile[]> {
  let names: string[];
  try {
    names = await readdir(outputDir);
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return [];
    }
    throw error;
  }
  const files: OutputFile[] = [];
  for (const name of names.sort()) {
    let info: Stats;
    try {
      info = await stat(join(outputDir, name));
    } catch {
      // Dangling symlink or unreadable entry: not a downloadable file.
      continue;
    }
    if (info.isFile()) {
      files.push({ name, size: info.size });
    }
  }
  return files;
}

/** Resolves a download inside `outputDir`; anything escaping it is forbidden. */
export async function resolveOutputFile(outputDir: string, filename: string): Promise<string> {
  const root = resolve(outputDir);
  const filePath = resolve(root, filename);
  const prefix = root.endsWith(sep) ? root : root + sep;
  if (!filePath.startsWith(prefix)) {
    throw new FileAccessError("forbidden", "Invalid file path");
  }
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new FileAccessError("not-found", "File not found");
    }
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      throw new FileAccessError("not-found", "File not found");
    }
    throw error;
  }
  return filePath;
}

const GIB = 1024 ** 3;

function toGb(bytes: number): number {
  return Math.round((bytes / GIB) * 100) / 100;
}

export async function diskUsage(path: string): Promise<DiskUsage> {
  const fsStats = await statfs(path);
  const total = fsStats.blocks * fsStats.bsize;
  const free = fsStats.bavail * fsStats.bsize;
  const used = (fsStats.blocks - fsStats.bfree) * fsStats.bsize;
  return {
    total_gb: toGb(total),
    used_gb: toGb(used),
    free_gb: toGb(free)
  };
}
