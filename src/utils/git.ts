import { spawn } from 'child_process';
import type { Logger } from './logger.ts';

export type GitFailureReason =
  | 'non-fast-forward'
  | 'stale-info'
  | 'conflict'
  | 'not-a-repository'
  | 'auth'
  | 'network'
  | 'unknown';

export type GitResult =
  | { ok: true; stdout: string }
  | { ok: false; reason: GitFailureReason; stderr: string; code: number | null };

export type PushMode = 'plain' | 'force-with-lease' | 'force';

export type BranchScope = 'local' | 'remote' | 'all';

export interface CommitOptions {
  /** Author and committer date, formatted `YYYY-MM-DD HH:MM:SS`. */
  date?: string;
}

/**
 * Everything this project asks of version control. Bound to one working
 * copy; only `clone` and `probeSsh` run outside it.
 */
export interface GitClient {
  clone(url: string, destination: string): Promise<GitResult>;
  currentBranch(): Promise<GitResult>;
  hasLocalBranch(branch: string): Promise<GitResult>;
  stash(): Promise<GitResult>;
  fetch(remote: string, branch?: string): Promise<GitResult>;
  fetchAll(): Promise<GitResult>;
  mergeBase(a: string, b: string): Promise<GitResult>;
  revParse(ref: string): Promise<GitResult>;
  isAncestor(ancestor: string, descendant: string): Promise<GitResult>;
  mergeFastForward(ref: string): Promise<GitResult>;
  merge(ref: string): Promise<GitResult>;
  rebase(onto: string): Promise<GitResult>;
  abortRebase(): Promise<GitResult>;
  pull(remote: string, branch: string, options?: { rebase?: boolean }): Promise<GitResult>;
  add(paths: string[]): Promise<GitResult>;
  addAll(): Promise<GitResult>;
  commit(message: string, options?: CommitOptions): Promise<GitResult>;
  push(mode: PushMode, remote?: string, branch?: string): Promise<GitResult>;
  status(): Promise<GitResult>;
  resetHard(ref: string): Promise<GitResult>;
  clean(): Promise<GitResult>;
  remotes(): Promise<GitResult>;
  setRemoteUrl(remote: string, url: string): Promise<GitResult>;
  branches(scope: BranchScope): Promise<GitResult>;
  checkout(branch: string, options?: { create?: boolean; startPoint?: string }): Promise<GitResult>;
  log(count: number, options?: { oneline?: boolean }): Promise<GitResult>;
  configGet(key: string): Promise<GitResult>;
  gc(): Promise<GitResult>;
  remoteShow(remote: string): Promise<GitResult>;
  isInsideWorkTree(): Promise<GitResult>;
  probeSsh(host: string): Promise<GitResult>;
}

const FAILURE_PATTERNS: [RegExp, GitFailureReason][] = [
  [/non-fast-forward|\[rejected\].*\(fetch first\)|Updates were rejected because the tip/i, 'non-fast-forward'],
  [/stale info/i, 'stale-info'],
  [/CONFLICT|could not apply|Merge conflict/i, 'conflict'],
  [/not a git repository/i, 'not-a-repository'],
  [/Permission denied|Authentication failed|Could not read from remote repository/i, 'auth'],
  [/Could not resolve host|Connection (timed out|refused|reset)|unable to access/i, 'network'],
];

/**
 * Map git's stderr onto a failure reason so callers never match wording.
 */
export function classifyGitFailure(stderr: string): GitFailureReason {
  for (const [pattern, reason] of FAILURE_PATTERNS) {
    if (pattern.test(stderr)) return reason;
  }
  return 'unknown';
}

export interface ProcessOutput {
  code: number | null;
  stdout: string;
  stderr: string;
}

export const execProcess = (
  command: string,
  args: string[],
  options: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<ProcessOutput> => {
  return new Promise((resolve) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => stdout += data.toString());
    proc.stderr.on('data', (data: Buffer) => stderr += data.toString());

    proc.on('error', (error) => resolve({ code: null, stdout: '', stderr: error.message }));
    proc.on('close', (code) => resolve({ code, stdout: stdout.trim(), stderr: stderr.trim() }));
  });
};

/**
 * `GitClient` backed by the git executable.
 */
export class CliGitClient implements GitClient {
  constructor(
    private readonly cwd: string,
    private readonly logger: Logger,
  ) {}

  private async run(args: string[], options: { cwd?: string | null; env?: NodeJS.ProcessEnv } = {}): Promise<GitResult> {
    const cwd = options.cwd === null ? undefined : options.cwd ?? this.cwd;
    this.logger.info(`Running command: git ${args.join(' ')}`);
    const result = await execProcess('git', args, { cwd, env: options.env });
    if (result.code === 0) {
      if (result.stdout) this.logger.debug(`Command output: ${result.stdout}`);
      return { ok: true, stdout: result.stdout };
    }
    this.logger.error(`Command failed with exit code ${result.code ?? 'none'}: git ${args.join(' ')}`);
    if (result.stderr) this.logger.error(`Error output: ${result.stderr}`);
    return { ok: false, reason: classifyGitFailure(result.stderr), stderr: result.stderr, code: result.code };
  }

  clone(url: string, destination: string): Promise<GitResult> {
    return this.run(['clone', url, destination], { cwd: null });
  }

  currentBranch(): Promise<GitResult> {
    return this.run(['rev-parse', '--abbrev-ref', 'HEAD']);
  }

  hasLocalBranch(branch: string): Promise<GitResult> {
    return this.run(['show-ref', '--verify', `refs/heads/${branch}`]);
  }

  stash(): Promise<GitResult> {
    return this.run(['stash']);
  }

  fetch(remote: string, branch?: string): Promise<GitResult> {
    return this.run(branch ? ['fetch', remote, branch] : ['fetch', remote]);
  }

  fetchAll(): Promise<GitResult> {
    return this.run(['fetch', '--all']);
  }

  mergeBase(a: string, b: string): Promise<GitResult> {
    return this.run(['merge-base', a, b]);
  }

  revParse(ref: string): Promise<GitResult> {
    return this.run(['rev-parse', ref]);
  }

  isAncestor(ancestor: string, descendant: string): Promise<GitResult> {
    return this.run(['merge-base', '--is-ancestor', ancestor, descendant]);
  }

  mergeFastForward(ref: string): Promise<GitResult> {
    return this.run(['merge', '--ff-only', ref]);
  }

  merge(ref: string): Promise<GitResult> {
    return this.run(['merge', ref]);
  }

  rebase(onto: string): Promise<GitResult> {
    return this.run(['rebase', onto]);
  }

  abortRebase(): Promise<GitResult> {
    return this.run(['rebase', '--abort']);
  }

  pull(remote: string, branch: string, options: { rebase?: boolean } = {}): Promise<GitResult> {
    return this.run(options.rebase ? ['pull', '--rebase', remote, branch] : ['pull', remote, branch]);
  }

  add(paths: string[]): Promise<GitResult> {
    return this.run(['add', ...paths]);
  }

  addAll(): Promise<GitResult> {
    return this.run(['add', '--all']);
  }

  commit(message: string, options: CommitOptions = {}): Promise<GitResult> {
    const env = options.date
      ? { ...process.env, GIT_AUTHOR_DATE: options.date, GIT_COMMITTER_DATE: options.date }
      : undefined;
    return this.run(['commit', '-m', message], { env });
  }

  push(mode: PushMode, remote?: string, branch?: string): Promise<GitResult> {
    const args = ['push'];
    if (mode === 'force-with-lease') args.push('--force-with-lease');
    if (mode === 'force') args.push('--force');
    if (remote) args.push(remote);
    if (remote && branch) args.push(branch);
    return this.run(args);
  }

  status(): Promise<GitResult> {
    return this.run(['status', '--porcelain']);
  }

  resetHard(ref: string): Promise<GitResult> {
    return this.run(['reset', '--hard', ref]);
  }

  clean(): Promise<GitResult> {
    return this.run(['clean', '-fd']);
  }

  remotes(): Promise<GitResult> {
    return this.run(['remote', '-v']);
  }

  setRemoteUrl(remote: string, url: string): Promise<GitResult> {
    return this.run(['remote', 'set-url', remote, url]);
  }

  branches(scope: BranchScope): Promise<GitResult> {
    if (scope === 'remote') return this.run(['branch', '-r']);
    if (scope === 'all') return this.run(['branch', '-a']);
    return this.run(['branch']);
  }

  checkout(branch: string, options: { create?: boolean; startPoint?: string } = {}): Promise<GitResult> {
    const args = options.create ? ['checkout', '-b', branch] : ['checkout', branch];
    if (options.startPoint) args.push(options.startPoint);
    return this.run(args);
  }

  log(count: number, options: { oneline?: boolean } = {}): Promise<GitResult> {
    return this.run(options.oneline ? ['log', '-n', String(count), '--oneline'] : ['log', '-n', String(count)]);
  }

  configGet(key: string): Promise<GitResult> {
    return this.run(['config', key]);
  }

  gc(): Promise<GitResult> {
    return this.run(['gc', '--aggressive', '--prune=now']);
  }

  remoteShow(remote: string): Promise<GitResult> {
    return this.run(['remote', 'show', remote]);
  }

  isInsideWorkTree(): Promise<GitResult> {
    return this.run(['rev-parse', '--is-inside-work-tree']);
  }

  async probeSsh(host: string): Promise<GitResult> {
    this.logger.info(`Running command: ssh -T git@${host}`);
    // The host greets with exit code 1 even when authentication succeeds.
    const result = await execProcess('ssh', ['-T', `git@${host}`]);
    const output = `${result.stderr}\n${result.stdout}`.trim();
    if (output.includes('successfully authenticated')) {
      return { ok: true, stdout: output };
    }
    return { ok: false, reason: classifyGitFailure(output), stderr: output, code: result.code };
  }
}
