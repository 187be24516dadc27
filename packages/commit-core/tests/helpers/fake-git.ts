/**
 * In-memory RepoGit for tests
 */

import type { RepoGit, IgnoreCheck } from '../../src/analyzer/repo-git';

export type FakeGitCall =
  | { op: 'add'; path: string }
  | { op: 'commit'; path: string; message: string }
  | { op: 'push'; remote: string; branch: string };

type FailingOp = 'listModified' | 'checkIgnore' | 'add' | 'commit' | 'currentBranch' | 'push' | 'isTracked';

export interface FakeGitState {
  root?: string;
  modified?: string[];
  untracked?: string[];
  staged?: string[];
  tracked?: string[];
  head?: string[];
  ignored?: string[];
  diffs?: Record<string, string>;
  stagedDiffs?: Record<string, string>;
  branch?: string;
}

export class FakeRepoGit implements RepoGit {
  readonly calls: FakeGitCall[] = [];
  private readonly failures = new Map<FailingOp, Error>();
  private commitCount = 0;

  constructor(private readonly state: FakeGitState = {}) {}

  /** Make every later call of `op` reject with `message` */
  failOn(op: FailingOp, message: string): this {
    this.failures.set(op, new Error(message));
    return this;
  }

  private check(op: FailingOp): void {
    const failure = this.failures.get(op);
    if (failure) {
      throw failure;
    }
  }

  async getRepoRoot(): Promise<string | undefined> {
    return this.state.root;
  }

  async listModified(): Promise<string[]> {
    this.check('listModified');
    return [...(this.state.modified ?? [])];
  }

  async listUntracked(): Promise<string[]> {
    return [...(this.state.untracked ?? [])];
  }

  async listStaged(): Promise<string[]> {
    return [...(this.state.staged ?? [])];
  }

  async listTrackedFiles(): Promise<string[]> {
    return [...(this.state.tracked ?? [])];
  }

  async diffFile(path: string): Promise<string> {
    return this.state.diffs?.[path] ?? '';
  }

  async diffStagedFile(path: string): Promise<string> {
    return this.state.stagedDiffs?.[path] ?? '';
  }

  async isTracked(path: string): Promise<boolean> {
    this.check('isTracked');
    return (this.state.tracked ?? []).includes(path) || (this.state.head ?? []).includes(path);
  }

  async isInHead(path: string): Promise<boolean> {
    return (this.state.head ?? []).includes(path);
  }

  async checkIgnore(path: string): Promise<IgnoreCheck> {
    this.check('checkIgnore');
    return (this.state.ignored ?? []).includes(path) ? { ignored: true, path } : { ignored: false };
  }

  async add(path: string): Promise<void> {
    this.check('add');
    this.calls.push({ op: 'add', path });
  }

  async commit(path: string, message: string): Promise<string> {
    this.check('commit');
    this.calls.push({ op: 'commit', path, message });
    this.commitCount += 1;
    return `sha${this.commitCount}`;
  }

  async currentBranch(): Promise<string> {
    this.check('currentBranch');
    return this.state.branch ?? 'main';
  }

  async push(remote: string, branch: string): Promise<void> {
    this.check('push');
    this.calls.push({ op: 'push', remote, branch });
  }
}
