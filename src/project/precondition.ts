// Project precondition: runs before any child process exists.
// The manifest must sit directly inside the given directory: there is no upward
// search, so a call can never act on a parent project by accident.
import { realpathSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { CargoMcpError, ErrorKind, errnoCode } from "../errors.js";

export const MANIFEST_FILE = "Cargo.toml";

/** A directory confirmed to hold a manifest, with symlinks resolved. */
export interface ProjectRoot {
  readonly root: string;
  readonly manifest: string;
}

/** Expand a leading "~" or "~/" to the user's home directory. */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

export function checkProject(path: string, baseDir: string = process.cwd()): ProjectRoot {
  const absolute = resolve(baseDir, expandHome(path));

  let root: string;
  try {
    root = realpathSync(absolute);
  } catch (err) {
    const code = errnoCode(err);
    throw new CargoMcpError(
      ErrorKind.InvalidProject,
      code === "ENOENT" ? `Project path does not exist: ${absolute}` : `Could not resolve project path ${absolute}: ${code ?? "unknown error"}`,
      { path },
    );
  }

  const stats = statSync(root, { throwIfNoEntry: false });
  if (!stats?.isDirectory()) {
    throw new CargoMcpError(ErrorKind.InvalidProject, `Project path is not a directory: ${root}`, { path });
  }

  const manifest = join(root, MANIFEST_FILE);
  if (!statSync(manifest, { throwIfNoEntry: false })?.isFile()) {
    throw new CargoMcpError(ErrorKind.InvalidProject, `Not a Rust project: ${MANIFEST_FILE} not found in ${root}`, { path });
  }

  return { root, manifest };
}
