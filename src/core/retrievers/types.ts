import type { CommandRunner } from '../command-runner.js';
import type { BuildEnvironment } from '../environment.js';

/**
 * Ordered patch set: patch file → subdirectory it applies in (undefined means
 * the source root).
 */
export type PatchMap = Map<string, string | undefined>;

export interface FetchRequest {
  commitSha?: string;
  branch?: string;
  patches?: PatchMap;
}

export interface RetrievalContext {
  runner: CommandRunner;
  env: BuildEnvironment;
}

/**
 * A source of component sources. Implementations populate `destDir` and throw
 * a download or extraction error when they cannot.
 */
export interface Retriever {
  readonly kind: 'git' | 'archive' | 'path';
  /** Where the sources come from: a repository, an archive URL or a path. */
  readonly url: string;
  fetch(destDir: string, request: FetchRequest, context: RetrievalContext): Promise<void>;
}
