import { basename, dirname, extname, join, relative } from 'path';
import { unlink } from 'fs/promises';
import { pushWithFallback, type PushContext } from './push.ts';
import { ensureDirectory, fileExists, listFiles, writeTextFile } from '../utils/files.ts';
import type { GitClient } from '../utils/git.ts';
import type { Logger } from '../utils/logger.ts';
import type { AppConfig } from '../types.ts';

const POOL_PLACEHOLDER = 'Initial setup for the activity pattern.';

export interface CleanupResult {
  removed: string[];
  pushed: boolean;
}

export const poolFileNames = (config: AppConfig): string[] =>
  Array.from({ length: config.commits.poolSize }, (_, i) => `${config.commits.filePrefix}${i}.txt`);

/**
 * Owns the local working copy: cloning, syncing with the remote, the tracked
 * file pool, and the destructive reset and cleanup operations.
 */
export class RepositoryManager {
  private readonly pushContext: PushContext;

  constructor(
    private readonly config: AppConfig,
    private readonly git: GitClient,
    private readonly logger: Logger,
  ) {
    this.pushContext = {
      git,
      logger,
      remote: config.repository.remote,
      sync: () => this.sync(),
    };
  }

  get localPath(): string {
    return this.config.repository.localPath;
  }

  poolFiles(): string[] {
    return poolFileNames(this.config);
  }

  exists(): Promise<boolean> {
    return fileExists(this.localPath);
  }

  /**
   * Detected on every call; a run may switch branches underneath us.
   */
  async currentBranch(): Promise<string> {
    const head = await this.git.currentBranch();
    if (head.ok && head.stdout.trim()) return head.stdout.trim();

    const candidates = this.config.repository.branchCandidates;
    this.logger.warn('Failed to get current branch, trying common branches...');
    for (const candidate of candidates) {
      const found = await this.git.hasLocalBranch(candidate);
      if (found.ok) {
        this.logger.info(`Detected ${candidate} branch`);
        return candidate;
      }
    }

    const fallback = candidates[0] ?? 'main';
    this.logger.warn(`Could not determine branch, defaulting to ${fallback}`);
    return fallback;
  }

  async sync(): Promise<boolean> {
    this.logger.info('Synchronizing repository with remote...');
    const remote = this.config.repository.remote;
    const branch = await this.currentBranch();
    const tracking = `${remote}/${branch}`;
    this.logger.info(`Current branch: ${branch}`);

    await this.git.stash();

    const fetched = await this.git.fetch(remote, branch);
    if (!fetched.ok) this.logger.warn(`Failed to fetch from ${tracking}`);

    const base = await this.git.mergeBase(tracking, branch);
    if (!base.ok) {
      this.logger.warn(`Failed to find merge-base with ${tracking}, pulling directly`);
      const rebased = await this.git.pull(remote, branch, { rebase: true });
      if (rebased.ok) return true;
      this.logger.warn('Failed to pull with rebase, trying normal pull');
      return (await this.git.pull(remote, branch)).ok;
    }

    const local = await this.git.revParse(branch);
    const upstream = await this.git.revParse(tracking);
    if (local.ok && upstream.ok && local.stdout.trim() === upstream.stdout.trim()) {
      this.logger.info('Local and remote branches are in sync');
      return true;
    }

    const behind = await this.git.isAncestor(branch, tracking);
    if (behind.ok) {
      this.logger.info('Fast-forwarding local branch');
      return (await this.git.mergeFastForward(tracking)).ok;
    }

    this.logger.info('Branches have diverged, attempting rebase');
    const rebased = await this.git.rebase(tracking);
    if (rebased.ok) return true;

    this.logger.warn('Rebase failed, trying merge');
    await this.git.abortRebase();
    return (await this.git.merge(tracking)).ok;
  }

  async ensureLocalCopy(): Promise<boolean> {
    const { sshUrl, remote } = this.config.repository;

    if (!(await this.exists())) {
      this.logger.info(`Cloning repository ${sshUrl} to ${this.localPath}`);
      await ensureDirectory(dirname(this.localPath));

      const cloned = await this.git.clone(sshUrl, this.localPath);
      if (!cloned.ok) {
        this.logger.error('Failed to clone repository');
        return false;
      }
      const remotes = await this.git.remotes();
      if (!remotes.ok) {
        this.logger.error('Failed to verify remote repository');
        return false;
      }
      return true;
    }

    this.logger.info(`Using existing repository at ${this.localPath}`);
    await this.git.setRemoteUrl(remote, sshUrl);
    if (!(await this.sync())) {
      this.logger.warn('Failed to sync with remote repository, will try to continue anyway');
    }
    return true;
  }

  async ensureFilePool(): Promise<void> {
    const files = this.poolFiles();
    for (const file of files) {
      const path = join(this.localPath, file);
      if (!(await fileExists(path))) {
        await writeTextFile(path, POOL_PLACEHOLDER);
      }
    }
    for (const file of files) {
      await this.git.add([file]);
    }

    const status = await this.git.status();
    if (status.ok && status.stdout.trim()) {
      const committed = await this.git.commit('Set up tracked files for activity pattern');
      if (committed.ok) {
        await this.pushChanges(await this.currentBranch());
      }
    }
  }

  /**
   * Working copy plus file pool. A false result is fatal to the run.
   */
  async prepare(): Promise<boolean> {
    if (!(await this.ensureLocalCopy())) return false;
    try {
      await this.ensureFilePool();
    } catch (error) {
      this.logger.error(`Failed to prepare tracked files: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
    return true;
  }

  pushChanges(branch: string): Promise<boolean> {
    return pushWithFallback(this.pushContext, branch);
  }

  /**
   * Hard-reset to the remote branch and drop untracked files. Local-only
   * commits are lost.
   */
  async reset(): Promise<boolean> {
    if (!(await this.exists())) {
      this.logger.error('Repository does not exist, cannot reset');
      return false;
    }
    this.logger.info('Resetting local repository to match remote...');
    const remote = this.config.repository.remote;
    const branch = await this.currentBranch();

    const fetched = await this.git.fetchAll();
    if (!fetched.ok) {
      this.logger.error('Failed to fetch from remote');
      return false;
    }

    const reset = await this.git.resetHard(`${remote}/${branch}`);
    if (!reset.ok) {
      this.logger.error(`Failed to reset to ${remote}/${branch}`);
      return false;
    }

    const cleaned = await this.git.clean();
    if (!cleaned.ok) this.logger.warn('Failed to remove untracked files');

    this.logger.info('Repository reset successfully');
    return true;
  }

  isProtected(path: string): boolean {
    const name = basename(path);
    const { essentialFiles, essentialExtensions } = this.config.commits;
    return this.poolFiles().includes(name)
      || essentialFiles.includes(name)
      || essentialExtensions.includes(extname(name));
  }

  /**
   * Delete every file that is neither in the pool nor essential, commit the
   * deletion, push, and compact the object store. `removed` holds paths
   * relative to the working copy; `pushed` is the outcome of the push.
   */
  async cleanup(): Promise<CleanupResult> {
    this.logger.info('Cleaning up repository to reduce size...');
    const removed: string[] = [];

    for (const path of await listFiles(this.localPath)) {
      if (this.isProtected(path)) continue;
      this.logger.info(`Removing file: ${path}`);
      try {
        await unlink(path);
      } catch (error) {
        this.logger.error(`Could not remove ${path}: ${error instanceof Error ? error.message : String(error)}`);
        continue;
      }
      removed.push(relative(this.localPath, path));
    }

    const staged = await this.git.addAll();
    if (!staged.ok) {
      this.logger.error('Failed to stage the cleanup');
      return { removed, pushed: false };
    }

    const committed = await this.git.commit('Clean up repository to reduce size');
    if (!committed.ok) this.logger.warn('Nothing committed during cleanup');

    const pushed = await this.pushChanges(await this.currentBranch());
    if (!pushed) this.logger.error('Failed to push the cleanup');

    const collected = await this.git.gc();
    if (!collected.ok) this.logger.warn('Garbage collection failed');

    return { removed, pushed };
  }

  async testSshConnection(): Promise<boolean> {
    const host = this.config.repository.host;
    this.logger.info(`Testing SSH connection to ${host}...`);
    const probe = await this.git.probeSsh(host);
    if (probe.ok) {
      this.logger.info(`SSH connection to ${host} successful`);
      return true;
    }
    this.logger.error(`SSH connection to ${host} failed: ${probe.stderr}`);
    return false;
  }
}
