/**
 * Source Fetchers
 * @module source/fetcher
 *
 * Resolve a source locator to a local directory and a concrete revision.
 * Local trees are addressed by content hash; git remotes are cloned once per
 * repository and checked out into one immutable directory per commit.
 */

import { execFile } from 'node:child_process';
import { createHash } from 'node:crypto';
import { mkdir, readFile, stat } from 'node:fs/promises';
import { isAbsolute, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { promisify } from 'node:util';
import { glob } from 'glob';
import { SourceUnreachableError, getErrorMessage } from '../errors/index.js';
import { createModuleLogger, StructuredLogger } from '../logging/logger.js';
import type { SourceLocator } from '../types/application.js';

const execFileAsync = promisify(execFile);

// ============================================================================
// Types
// ============================================================================

export interface FetchedSource {
  repoURL: string;
  /** Absolute path of the repository checkout */
  root: string;
  /** Concrete revision (commit SHA or content hash) */
  revision: string;
}

export interface SourceFetcher {
  supports(repoURL: string): boolean;
  fetch(locator: SourceLocator): Promise<FetchedSource>;
}

export const MANIFEST_PATTERN = '*.{yaml,yml,json}';

/**
 * Replace characters that are unsafe in a directory name
 */
function sanitizePath(input: string): string {
  return input.replace(/[^a-zA-Z0-9_.-]/g, '_');
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

// ============================================================================
// Local Fetcher
// ============================================================================

/**
 * Serves `file://` URLs and absolute paths straight from disk
 */
export class LocalSourceFetcher implements SourceFetcher {
  supports(repoURL: string): boolean {
    return repoURL.startsWith('file://') || isAbsolute(repoURL);
  }

  async fetch(locator: SourceLocator): Promise<FetchedSource> {
    const root = locator.repoURL.startsWith('file://')
      ? fileURLToPath(locator.repoURL)
      : resolve(locator.repoURL);

    if (!(await isDirectory(root))) {
      throw new SourceUnreachableError(`Source directory ${root} does not exist`, locator.repoURL);
    }

    return {
      repoURL: locator.repoURL,
      root,
      revision: await contentRevision(root),
    };
  }
}

/**
 * sha256 over sorted relative paths and contents of every manifest file
 */
export async function contentRevision(root: string): Promise<string> {
  const files = (await glob(`**/${MANIFEST_PATTERN}`, {
    cwd: root,
    nodir: true,
    ignore: ['**/.git/**', '**/node_modules/**'],
  }))
    .map(file => file.split('\\').join('/'))
    .sort();

  const hash = createHash('sha256');
  for (const file of files) {
    hash.update(file);
    hash.update('\0');
    hash.update(await readFile(join(root, file)));
    hash.update('\0');
  }
  return `sha256:${hash.digest('hex').slice(0, 16)}`;
}

// ============================================================================
// Git Fetcher
// ============================================================================

export interface GitSourceFetcherOptions {
  /** Clones and per-commit checkouts live here */
  workDir: string;
  gitBinary?: string;
  timeoutMs?: number;
  logger?: StructuredLogger;
}

/**
 * Fetches git remotes with the git CLI
 */
export class GitSourceFetcher implements SourceFetcher {
  private readonly workDir: string;
  private readonly gitBinary: string;
  private readonly timeoutMs: number;
  private readonly logger: StructuredLogger;
  /** Serializes fetches per repository */
  private readonly locks = new Map<string, Promise<unknown>>();

  constructor(options: GitSourceFetcherOptions) {
    this.workDir = options.workDir;
    this.gitBinary = options.gitBinary ?? 'git';
    this.timeoutMs = options.timeoutMs ?? 5 * 60 * 1000;
    this.logger = options.logger ?? createModuleLogger('git-fetcher');
  }

  supports(repoURL: string): boolean {
    return /^(https?|ssh|git):\/\//.test(repoURL) || /^[\w.-]+@[\w.-]+:/.test(repoURL);
  }

  async fetch(locator: SourceLocator): Promise<FetchedSource> {
    return this.exclusive(locator.repoURL, () => this.fetchUnlocked(locator));
  }

  private async fetchUnlocked(locator: SourceLocator): Promise<FetchedSource> {
    const repoDir = join(this.workDir, 'repos', sanitizePath(locator.repoURL));
    const startTime = Date.now();

    try {
      if (await isDirectory(join(repoDir, '.git'))) {
        await this.git(['fetch', '--prune', '--tags', 'origin'], repoDir);
      } else {
        await mkdir(join(this.workDir, 'repos'), { recursive: true });
        await this.git(['clone', '--no-checkout', locator.repoURL, repoDir], this.workDir);
      }

      const revision = await this.resolveRevision(repoDir, locator.revision);
      const checkoutDir = join(this.workDir, 'checkouts', sanitizePath(locator.repoURL), revision);

      if (!(await isDirectory(checkoutDir))) {
        await this.git(['worktree', 'add', '--detach', '--force', checkoutDir, revision], repoDir);
      }

      this.logger.sourceFetched(locator.repoURL, revision, Date.now() - startTime);
      return { repoURL: locator.repoURL, root: checkoutDir, revision };
    } catch (error) {
      if (error instanceof SourceUnreachableError) {
        throw error;
      }
      throw new SourceUnreachableError(
        `Failed to fetch ${locator.repoURL}@${locator.revision}: ${getErrorMessage(error)}`,
        locator.repoURL,
        { cause: error instanceof Error ? error : undefined }
      );
    }
  }

  private async resolveRevision(repoDir: string, revision: string): Promise<string> {
    const candidates = revision === 'HEAD'
      ? ['origin/HEAD', 'HEAD']
      : [`origin/${revision}`, revision];

    for (const candidate of candidates) {
      try {
        return await this.git(['rev-parse', '--verify', `${candidate}^{commit}`], repoDir);
      } catch (error) {
        this.logger.trace({ candidate, err: error }, 'Revision candidate did not resolve');
      }
    }

    throw new SourceUnreachableError(`Revision ${revision} not found`, repoDir);
  }

  private async git(args: string[], cwd: string): Promise<string> {
    const { stdout } = await execFileAsync(this.gitBinary, args, {
      cwd,
      timeout: this.timeoutMs,
      maxBuffer: 50 * 1024 * 1024,
    });
    return stdout.trim();
  }

  private async exclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const next = previous.then(fn, fn);
    const settled = next.catch(() => undefined);
    this.locks.set(key, settled);
    try {
      return await next;
    } finally {
      if (this.locks.get(key) === settled) {
        this.locks.delete(key);
      }
    }
  }
}

// ============================================================================
// Composite Fetcher
// ============================================================================

/**
 * Picks the first fetcher that supports the locator's URL scheme
 */
export class CompositeSourceFetcher implements SourceFetcher {
  constructor(private readonly fetchers: SourceFetcher[]) {}

  supports(repoURL: string): boolean {
    return this.fetchers.some(fetcher => fetcher.supports(repoURL));
  }

  async fetch(locator: SourceLocator): Promise<FetchedSource> {
    const fetcher = this.fetchers.find(f => f.supports(locator.repoURL));
    if (!fetcher) {
      throw new SourceUnreachableError(`Unsupported source URL ${locator.repoURL}`, locator.repoURL);
    }
    return fetcher.fetch(locator);
  }
}
