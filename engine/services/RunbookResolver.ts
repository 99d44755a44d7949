/**
 * Child runbook resolution
 *
 * The planner asks a RunbookResolver for each `child_runbook.path`. The
 * resolved `filePath` doubles as the runbook's identity when detecting
 * inclusion cycles, so resolvers must return a stable key per runbook.
 */

import fs from "fs/promises";
import path from "path";
import type { LoadedRunbook, RunbookDocument } from "../../shared/types/runbook.js";
import { RunbookParseError, isNotFoundError } from "../utils/errorTypes.js";
import { RunbookLoader } from "./RunbookLoader.js";

export interface RunbookResolver {
  resolve(childPath: string, parent: LoadedRunbook): Promise<LoadedRunbook>;
}

function assertRelativePath(childPath: string): void {
  if (path.isAbsolute(childPath) || path.win32.isAbsolute(childPath)) {
    throw new RunbookParseError(`Child runbook path must be relative: ${childPath}`, { childPath });
  }
  if (childPath.split(/[\\/]/).includes("..")) {
    throw new RunbookParseError(`Child runbook path must not contain '..': ${childPath}`, {
      childPath,
    });
  }
}

export interface FilesystemRunbookResolverOptions {
  /** Directory used for runbooks that were not loaded from a file */
  baseDir?: string;
  loader?: RunbookLoader;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolves child paths against the parent file's directory, then each of the
 * parent's `config.template_paths` (relative entries are taken from the
 * parent's directory).
 */
export class FilesystemRunbookResolver implements RunbookResolver {
  private readonly baseDir: string;
  private readonly loader: RunbookLoader;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: FilesystemRunbookResolverOptions = {}) {
    this.baseDir = path.resolve(options.baseDir ?? process.cwd());
    this.loader = options.loader ?? new RunbookLoader();
    this.env = options.env ?? process.env;
  }

  async resolve(childPath: string, parent: LoadedRunbook): Promise<LoadedRunbook> {
    assertRelativePath(childPath);

    const parentDir = parent.filePath ? path.dirname(path.resolve(parent.filePath)) : this.baseDir;
    const searchDirs = [
      parentDir,
      ...parent.runbook.config.template_paths.map((dir) => path.resolve(parentDir, dir)),
    ];

    for (const dir of searchDirs) {
      const candidate = path.join(dir, childPath);
      if (await fileExists(candidate)) {
        return this.loader.loadFromFile(candidate, this.env);
      }
    }

    throw new RunbookParseError(`Child runbook not found: ${childPath}`, {
      childPath,
      searched: searchDirs,
    });
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (isNotFoundError(error)) return false;
    throw error;
  }
}

/**
 * Resolves child runbooks from an in-memory table keyed by POSIX-style path.
 * A child path is looked up relative to the parent's key first, then as given.
 */
export class InMemoryRunbookResolver implements RunbookResolver {
  private readonly documents = new Map<string, unknown>();
  private readonly loader: RunbookLoader;

  constructor(documents: Record<string, RunbookDocument> = {}, loader = new RunbookLoader()) {
    this.loader = loader;
    for (const [key, document] of Object.entries(documents)) {
      this.documents.set(path.posix.normalize(key), document);
    }
  }

  add(key: string, document: RunbookDocument): this {
    this.documents.set(path.posix.normalize(key), document);
    return this;
  }

  async resolve(childPath: string, parent: LoadedRunbook): Promise<LoadedRunbook> {
    assertRelativePath(childPath);

    const candidates = [path.posix.normalize(childPath)];
    if (parent.filePath) {
      candidates.unshift(path.posix.join(path.posix.dirname(parent.filePath), childPath));
    }

    for (const key of candidates) {
      if (this.documents.has(key)) {
        return {
          runbook: this.loader.parse(this.documents.get(key)),
          filePath: key,
          loadedAt: Date.now(),
        };
      }
    }

    throw new RunbookParseError(`Child runbook not found: ${childPath}`, {
      childPath,
      searched: candidates,
    });
  }
}
