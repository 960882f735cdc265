/**
 * Secret sources the resolver can query.
 *
 * OnePasswordSource shells out to the 1Password CLI once per token:
 *   op item get <NAME> --vault <VAULT> --fields <FIELD> [--account <ACCOUNT>]
 *
 * The spawn function is injectable so tests can drive a fake process
 * instead of a real `op` binary.
 */
import { spawn } from 'child_process';

import { logger } from './logger.js';
import type { MissingReason, SecretFetchResult, SecretSource } from './types.js';

/** The slice of a child process the 1Password source relies on. */
export interface SpawnedProcess {
  stdout: NodeJS.ReadableStream | null;
  stderr: NodeJS.ReadableStream | null;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: (code: number | null) => void): unknown;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFn = (command: string, args: string[]) => SpawnedProcess;

interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  spawnError?: string;
}

export interface OnePasswordSourceOptions {
  /** Path or name of the op binary. Default: "op" */
  command?: string;
  /** Vault to read from. Default: "Employee" */
  vault?: string;
  /** Item field holding the secret. Default: "credential" */
  field?: string;
  /** Account alias to query first. Unset means op's default account. */
  account?: string;
  /** Accounts tried, in order, when the secret is not in the primary account. */
  fallbackAccounts?: string[];
  /** Alias to real account mapping, e.g. { work: "example.1password.com" } */
  accountMap?: Record<string, string>;
  /** Kill the op process after this many milliseconds. Default: 10000 */
  timeoutMs?: number;
  spawnFn?: SpawnFn;
}

export const DEFAULT_VAULT = 'Employee';
export const DEFAULT_FIELD = 'credential';
export const DEFAULT_OP_TIMEOUT_MS = 10_000;

const defaultSpawn: SpawnFn = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * Map op's stderr for a failed `item get` to a missing-secret reason.
 */
export function classifyOpFailure(stderr: string): MissingReason {
  const text = stderr.toLowerCase();
  if (
    /not (currently )?signed in|session expired|sign ?in|authorization/.test(
      text,
    )
  ) {
    return 'not-signed-in';
  }
  if (/isn't an item|not found|no item/.test(text)) {
    return 'not-found';
  }
  return 'command-failed';
}

function firstLine(text: string): string | undefined {
  const line = text.trim().split('\n')[0]?.trim();
  return line ? line : undefined;
}

export class OnePasswordSource implements SecretSource {
  readonly name = '1password';

  private readonly command: string;
  private readonly vault: string;
  private readonly field: string;
  private readonly account?: string;
  private readonly fallbackAccounts: string[];
  private readonly accountMap: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly spawnFn: SpawnFn;

  constructor(options: OnePasswordSourceOptions = {}) {
    this.command = options.command ?? 'op';
    this.vault = options.vault ?? DEFAULT_VAULT;
    this.field = options.field ?? DEFAULT_FIELD;
    this.account = options.account;
    this.fallbackAccounts = options.fallbackAccounts ?? [];
    this.accountMap = options.accountMap ?? {};
    this.timeoutMs = options.timeoutMs ?? DEFAULT_OP_TIMEOUT_MS;
    this.spawnFn = options.spawnFn ?? defaultSpawn;
  }

  async fetch(tokenName: string): Promise<SecretFetchResult> {
    const accounts: Array<string | undefined> = [
      this.account,
      ...this.fallbackAccounts.filter((a) => a !== this.account),
    ];

    let last: SecretFetchResult = { ok: false, reason: 'not-found' };
    for (const account of accounts) {
      const result = await this.fetchFrom(tokenName, account);
      if (result.ok) return result;
      // Another account cannot help when op itself is missing or hanging
      if (result.reason === 'timeout' || result.reason === 'unavailable') {
        return result;
      }
      last = result;
    }
    return last;
  }

  /** True when `op account get` succeeds for the configured account. */
  async isSignedIn(): Promise<boolean> {
    const args = ['account', 'get'];
    if (this.account) args.push('--account', this.mapAccount(this.account));
    const result = await this.run(args);
    return !result.timedOut && !result.spawnError && result.code === 0;
  }

  private mapAccount(alias: string): string {
    return this.accountMap[alias] ?? alias;
  }

  private async fetchFrom(
    tokenName: string,
    account: string | undefined,
  ): Promise<SecretFetchResult> {
    const args = [
      'item',
      'get',
      tokenName,
      '--vault',
      this.vault,
      '--fields',
      this.field,
    ];
    if (account) args.push('--account', this.mapAccount(account));

    const result = await this.run(args);

    if (result.spawnError) {
      return { ok: false, reason: 'unavailable', detail: result.spawnError };
    }
    if (result.timedOut) {
      return {
        ok: false,
        reason: 'timeout',
        detail: `op did not respond within ${this.timeoutMs}ms`,
      };
    }
    if (result.code !== 0) {
      return {
        ok: false,
        reason: classifyOpFailure(result.stderr),
        detail: firstLine(result.stderr),
      };
    }

    const value = result.stdout.replace(/\r?\n$/, '');
    if (!value) {
      return { ok: false, reason: 'empty-output' };
    }
    return { ok: true, value };
  }

  private run(args: string[]): Promise<CommandResult> {
    return new Promise((resolve) => {
      let proc: SpawnedProcess;
      try {
        proc = this.spawnFn(this.command, args);
      } catch (err) {
        resolve({
          code: null,
          stdout: '',
          stderr: '',
          timedOut: false,
          spawnError: err instanceof Error ? err.message : String(err),
        });
        return;
      }

      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (result: CommandResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      // An interactive sign-in prompt would otherwise hang the whole batch
      const timer = setTimeout(() => {
        logger.warn(
          { command: this.command, subcommand: args.slice(0, 2).join(' '), timeoutMs: this.timeoutMs },
          'Credential store call timed out, killing process',
        );
        proc.kill('SIGKILL');
        finish({ code: null, stdout, stderr, timedOut: true });
      }, this.timeoutMs);

      proc.stdout?.on('data', (chunk: Buffer | string) => {
        stdout += chunk.toString();
      });
      proc.stderr?.on('data', (chunk: Buffer | string) => {
        stderr += chunk.toString();
      });

      proc.on('error', (err) => {
        finish({ code: null, stdout, stderr, timedOut: false, spawnError: err.message });
      });
      proc.on('close', (code) => {
        finish({ code, stdout, stderr, timedOut: false });
      });
    });
  }
}

/**
 * Secrets from a fixed map. Used in tests and when values are already known.
 */
export class StaticSecretSource implements SecretSource {
  readonly name = 'static';
  readonly requested: string[] = [];

  constructor(private readonly values: Record<string, string>) {}

  async fetch(tokenName: string): Promise<SecretFetchResult> {
    this.requested.push(tokenName);
    if (!Object.prototype.hasOwnProperty.call(this.values, tokenName)) {
      return { ok: false, reason: 'not-found' };
    }
    const value = this.values[tokenName];
    if (!value) return { ok: false, reason: 'empty-output' };
    return { ok: true, value };
  }
}
