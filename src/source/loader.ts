/**
 * Source Tree Loader
 * @module source/loader
 *
 * Loads the desired resources of one Application from its source tree.
 * The scope of an Application is its source directory; a subdirectory that
 * holds Application manifests starts a nested scope whose other documents
 * belong to the child, not to the loading Application.
 */

import { readFile, stat } from 'node:fs/promises';
import { isAbsolute, join, posix, relative, resolve, sep } from 'node:path';
import { glob } from 'glob';
import {
  BaseError,
  MalformedResourceError,
  SourceUnreachableError,
  getErrorMessage,
  wrapError,
} from '../errors/index.js';
import { createModuleLogger, StructuredLogger } from '../logging/logger.js';
import type { ApplicationSpec } from '../types/application.js';
import {
  DesiredResource,
  identityKey,
  refFromManifest,
} from '../types/resource.js';
import { isApplicationManifest, parseApplicationManifest } from './application-parser.js';
import { FetchedSource, MANIFEST_PATTERN, SourceFetcher } from './fetcher.js';
import { ParsedDocument, parseManifestFile } from './manifest-parser.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A directory of the loaded scope, relative to the scope root ("." for the root)
 */
export interface SourceDirectory {
  path: string;
  files: string[];
  declaresApplications: boolean;
}

/**
 * Directory tree of one scope, built once per load
 */
export interface SourceTree {
  root: string;
  directories: Map<string, SourceDirectory>;
}

export interface LoadedChild {
  spec: ApplicationSpec;
  /** Identity key of the child's Application object */
  key: string;
}

export interface LoadResult {
  repoURL: string;
  revision: string;
  /** Resources owned by the loading Application, sorted by file and document */
  resources: DesiredResource[];
  /** Applications declared by this scope */
  children: LoadedChild[];
  /** Malformed documents and invalid Application manifests */
  errors: BaseError[];
  tree: SourceTree;
}

export interface SourceTreeLoaderOptions {
  fetcher: SourceFetcher;
  /** Namespace given to Application objects that do not declare one */
  applicationNamespace: string;
  logger?: StructuredLogger;
}

interface ClassifiedDocument extends ParsedDocument {
  /** Directory relative to the scope root */
  directory: string;
  isApplication: boolean;
}

// ============================================================================
// Path Helpers
// ============================================================================

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

function normalizeSourcePath(path: string): string {
  const normalized = posix.normalize(toPosix(path)).replace(/\/+$/, '');
  return normalized === '' ? '.' : normalized;
}

/**
 * Ancestors of a scope-relative directory, outermost first, excluding "."
 */
function ancestorsOf(directory: string): string[] {
  if (directory === '.') return [];
  const parts = directory.split('/');
  return parts.map((_, index) => parts.slice(0, index + 1).join('/'));
}

// ============================================================================
// Loader
// ============================================================================

export class SourceTreeLoader {
  private readonly fetcher: SourceFetcher;
  private readonly applicationNamespace: string;
  private readonly logger: StructuredLogger;

  constructor(options: SourceTreeLoaderOptions) {
    this.fetcher = options.fetcher;
    this.applicationNamespace = options.applicationNamespace;
    this.logger = options.logger ?? createModuleLogger('source-loader');
  }

  /**
   * Fetches the Application's source and groups its documents
   *
   * @throws SourceUnreachableError when the source cannot be fetched or the
   * path escapes the repository
   */
  async load(spec: ApplicationSpec): Promise<LoadResult> {
    const startTime = Date.now();
    let fetched: FetchedSource;
    try {
      fetched = await this.fetcher.fetch(spec.source);
    } catch (error) {
      const wrapped = error instanceof SourceUnreachableError
        ? error
        : new SourceUnreachableError(
          `Failed to fetch ${spec.source.repoURL}: ${getErrorMessage(error)}`,
          spec.source.repoURL,
          { application: spec.name, cause: error instanceof Error ? error : undefined }
        );
      this.logger.sourceFetchFailed(spec.source.repoURL, wrapped);
      throw wrapped;
    }

    const scopeRoot = resolve(fetched.root, spec.source.path);
    const scopePath = toPosix(relative(fetched.root, scopeRoot)) || '.';
    if (scopePath.startsWith('..') || isAbsolute(scopePath)) {
      throw new SourceUnreachableError(
        `Path ${spec.source.path} escapes repository ${spec.source.repoURL}`,
        spec.source.repoURL,
        { application: spec.name }
      );
    }
    if (!(await this.isDirectory(scopeRoot))) {
      throw new SourceUnreachableError(
        `Path ${spec.source.path} not found in ${spec.source.repoURL}@${fetched.revision}`,
        spec.source.repoURL,
        { application: spec.name }
      );
    }

    const files = await this.listFiles(scopeRoot, spec.source.recurse);
    const errors: BaseError[] = [];
    const documents: ClassifiedDocument[] = [];

    for (const file of files) {
      const repoPath = scopePath === '.' ? file : posix.join(scopePath, file);
      let content: string;
      try {
        content = await readFile(join(scopeRoot, file), 'utf8');
      } catch (error) {
        throw new SourceUnreachableError(
          `Failed to read ${repoPath}: ${getErrorMessage(error)}`,
          spec.source.repoURL,
          { application: spec.name, cause: error instanceof Error ? error : undefined }
        );
      }

      const parsed = parseManifestFile(content, repoPath);
      errors.push(...parsed.errors);
      const directory = posix.dirname(file);
      for (const document of parsed.documents) {
        documents.push({
          ...document,
          directory,
          isApplication: isApplicationManifest(document.manifest),
        });
      }
    }

    const tree = this.buildTree(scopeRoot, files, documents);
    const result = this.group(spec, fetched, scopePath, tree, documents);
    result.errors.unshift(...errors);

    this.logger.performanceMetric('source_load', Date.now() - startTime, {
      application: spec.name,
      revision: fetched.revision,
      files: files.length,
      resources: result.resources.length,
      children: result.children.length,
      errors: result.errors.length,
    });

    return result;
  }

  private async isDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Manifest files under the scope root, sorted lexicographically
   */
  private async listFiles(scopeRoot: string, recurse: boolean): Promise<string[]> {
    const pattern = recurse ? `**/${MANIFEST_PATTERN}` : MANIFEST_PATTERN;
    const files = await glob(pattern, {
      cwd: scopeRoot,
      nodir: true,
      ignore: ['**/.git/**'],
    });
    return files.map(toPosix).sort();
  }

  private buildTree(
    root: string,
    files: string[],
    documents: ClassifiedDocument[]
  ): SourceTree {
    const directories = new Map<string, SourceDirectory>();

    for (const file of files) {
      const path = posix.dirname(file);
      const entry = directories.get(path) ?? { path, files: [], declaresApplications: false };
      entry.files.push(file);
      directories.set(path, entry);
    }

    for (const document of documents) {
      const entry = directories.get(document.directory);
      if (entry && document.isApplication) {
        entry.declaresApplications = true;
      }
    }

    return { root, directories };
  }

  /**
   * Assigns documents to the loading Application or to nested scopes
   */
  private group(
    spec: ApplicationSpec,
    fetched: FetchedSource,
    scopePath: string,
    tree: SourceTree,
    documents: ClassifiedDocument[]
  ): LoadResult {
    const resources: DesiredResource[] = [];
    const children: LoadedChild[] = [];
    const errors: BaseError[] = [];
    const seen = new Map<string, ParsedDocument>();
    const ownPath = normalizeSourcePath(spec.source.path);

    for (const document of documents) {
      const nestedScope = ancestorsOf(document.directory)
        .find(dir => tree.directories.get(dir)?.declaresApplications === true);

      if (nestedScope !== undefined) {
        // Only the Application manifests at the top of a nested scope are ours
        if (!document.isApplication || document.directory !== nestedScope) {
          continue;
        }
      }

      let child: ApplicationSpec | null = null;
      if (document.isApplication) {
        try {
          child = parseApplicationManifest(document.manifest, { defaultRepoURL: spec.source.repoURL });
        } catch (error) {
          errors.push(wrapError(error));
          continue;
        }

        const isAnchor = document.directory === '.'
          && child.name === spec.name
          && normalizeSourcePath(child.source.path) === ownPath;
        if (isAnchor) {
          continue;
        }
      }

      const ref = refFromManifest(
        document.manifest,
        child ? this.applicationNamespace : spec.destination.namespace
      );
      const key = identityKey(ref);

      const first = seen.get(key);
      if (first) {
        errors.push(new MalformedResourceError(
          `Duplicate resource ${key}; first declared in ${first.file}#${first.documentIndex}`,
          document.file,
          document.documentIndex,
          { application: spec.name, resource: key }
        ));
        continue;
      }
      seen.set(key, document);

      resources.push({
        ref,
        key,
        manifest: document.manifest,
        provenance: {
          repoURL: fetched.repoURL,
          revision: fetched.revision,
          path: document.file,
          documentIndex: document.documentIndex,
        },
        application: spec.name,
      });

      if (child) {
        children.push({ spec: child, key });
      }
    }

    this.logger.debug(
      { application: spec.name, scope: scopePath, resources: resources.length, children: children.length },
      'Source grouped'
    );

    return {
      repoURL: fetched.repoURL,
      revision: fetched.revision,
      resources,
      children,
      errors,
      tree,
    };
  }
}
