import fs from 'fs';
import os from 'os';
import path from 'path';

export interface DiscoveryOptions {
  /** Directory (or file inside it) the search walks up from. */
  callLocation: string;
  filename: string;
  homeDir?: string;
  env?: Record<string, string | undefined>;
  /** Environment variable whose value names one more source, applied last. */
  debugSourceVariable?: string;
  exists?: (filePath: string) => boolean;
}

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/** `start` and every ancestor, nearest first. */
export function parentDirs(start: string): string[] {
  const dirs: string[] = [];
  let current = path.resolve(start);

  for (;;) {
    dirs.push(current);
    const parent = path.dirname(current);
    if (parent === current) {
      return dirs;
    }
    current = parent;
  }
}

/**
 * Fixture files that exist, farthest first: the home directory file, then
 * one per directory from the filesystem root down to `callLocation`, then
 * the debug source. Merging them in this order lets nearer files win. A
 * file reached twice keeps its later position.
 */
export function discoverFixtureFiles(options: DiscoveryOptions): string[] {
  const exists = options.exists ?? isFile;
  const env = options.env ?? process.env;
  const start = exists(options.callLocation) ? path.dirname(options.callLocation) : options.callLocation;

  const candidates = [
    path.join(options.homeDir ?? os.homedir(), options.filename),
    ...parentDirs(start).reverse().map(dir => path.join(dir, options.filename))
  ];

  const debugSource = options.debugSourceVariable ? env[options.debugSourceVariable] : undefined;
  if (debugSource) {
    candidates.push(path.resolve(debugSource));
  }

  // a file found twice keeps its later, higher-precedence position
  const found = candidates.map(candidate => path.resolve(candidate)).filter(candidate => exists(candidate));
  return found.filter((candidate, index) => found.lastIndexOf(candidate) === index);
}
