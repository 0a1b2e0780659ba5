import { mkdir } from 'fs/promises';
import type {
  BranchScope,
  CommitOptions,
  GitClient,
  GitFailureReason,
  GitResult,
  PushMode,
} from '../../src/utils/git.ts';

export type GitMethod = keyof GitClient;

export interface GitCall {
  method: GitMethod | 'marker';
  args: unknown[];
}

export const ok = (stdout: string = ''): GitResult => ({ ok: true, stdout });

export const fail = (reason: GitFailureReason = 'unknown', stderr: string = ''): GitResult => ({
  ok: false,
  reason,
  stderr,
  code: 1,
});

/**
 * In-process `GitClient` that records every call. Results are taken from a
 * per-method queue, then a per-method default, then `ok('')`.
 */
export class FakeGitClient implements GitClient {
  readonly calls: GitCall[] = [];
  private readonly queued = new Map<GitMethod, GitResult[]>();
  private readonly defaults = new Map<GitMethod, GitResult>();

  constructor(private readonly options: { createOnClone?: boolean } = {}) {
    this.defaults.set('currentBranch', ok('main'));
  }

  script(method: GitMethod, ...results: GitResult[]): this {
    this.queued.set(method, [...(this.queued.get(method) ?? []), ...results]);
    return this;
  }

  setDefault(method: GitMethod, result: GitResult): this {
    this.defaults.set(method, result);
    return this;
  }

  /** Interleave a label with recorded calls, e.g. from a stubbed collaborator. */
  mark(label: string): void {
    this.calls.push({ method: 'marker', args: [label] });
  }

  callsTo(method: GitMethod): unknown[][] {
    return this.calls.filter((call) => call.method === method).map((call) => call.args);
  }

  methods(): string[] {
    return this.calls.map((call) => (call.method === 'marker' ? `marker:${String(call.args[0])}` : call.method));
  }

  pushModes(): unknown[] {
    return this.callsTo('push').map((args) => args[0]);
  }

  private record(method: GitMethod, args: unknown[]): GitResult {
    this.calls.push({ method, args });
    const next = this.queued.get(method)?.shift();
    return next ?? this.defaults.get(method) ?? ok();
  }

  async clone(url: string, destination: string): Promise<GitResult> {
    const result = this.record('clone', [url, destination]);
    if (result.ok && this.options.createOnClone) await mkdir(destination, { recursive: true });
    return result;
  }

  async currentBranch() { return this.record('currentBranch', []); }
  async hasLocalBranch(branch: string) { return this.record('hasLocalBranch', [branch]); }
  async stash() { return this.record('stash', []); }
  async fetch(remote: string, branch?: string) { return this.record('fetch', [remote, branch]); }
  async fetchAll() { return this.record('fetchAll', []); }
  async mergeBase(a: string, b: string) { return this.record('mergeBase', [a, b]); }
  async revParse(ref: string) { return this.record('revParse', [ref]); }
  async isAncestor(ancestor: string, descendant: string) { return this.record('isAncestor', [ancestor, descendant]); }
  async mergeFastForward(ref: string) { return this.record('mergeFastForward', [ref]); }
  async merge(ref: string) { return this.record('merge', [ref]); }
  async rebase(onto: string) { return this.record('rebase', [onto]); }
  async abortRebase() { return this.record('abortRebase', []); }
  async pull(remote: string, branch: string, options: { rebase?: boolean } = {}) {
    return this.record('pull', [remote, branch, options]);
  }
  async add(paths: string[]) { return this.record('add', [paths]); }
  async addAll() { return this.record('addAll', []); }
  async commit(message: string, options: CommitOptions = {}) { return this.record('commit', [message, options]); }
  async push(mode: PushMode, remote?: string, branch?: string) { return this.record('push', [mode, remote, branch]); }
  async status() { return this.record('status', []); }
  async resetHard(ref: string) { return this.record('resetHard', [ref]); }
  async clean() { return this.record('clean', []); }
  async remotes() { return this.record('remotes', []); }
  async setRemoteUrl(remote: string, url: string) { return this.record('setRemoteUrl', [remote, url]); }
  async branches(scope: BranchScope) { return this.record('branches', [scope]); }
  async checkout(branch: string, options: { create?: boolean; startPoint?: string } = {}) {
    return this.record('checkout', [branch, options]);
  }
  async log(count: number, options: { oneline?: boolean } = {}) { return this.record('log', [count, options]); }
  async configGet(key: string) { return this.record('configGet', [key]); }
  async gc() { return this.record('gc', []); }
  async remoteShow(remote: string) { return this.record('remoteShow', [remote]); }
  async isInsideWorkTree() { return this.record('isInsideWorkTree', []); }
  async probeSsh(host: string) { return this.record('probeSsh', [host]); }
}
