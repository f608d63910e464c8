/**
 * xferctl Runtime Host — Token Store
 *
 * Persists one TokenBundle per profile at `<configRoot>/tokens/<profile>.json`.
 *
 * Writes are atomic: the bundle is written to a sibling temp file created
 * with mode 0600, fsynced, and renamed over the target. A concurrent reader
 * sees either the old bundle or the new one, never a partial file.
 * Concurrent writers are not coordinated; the last rename wins.
 *
 * Error mapping:
 *   ENOENT on load/delete  → NotAuthenticatedError
 *   other I/O, bad content → LocalStoreError
 *
 * Token values never appear in messages or logs.
 */

import {
  chmodSync,
  closeSync,
  fsyncSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  unlinkSync,
  writeSync,
} from 'node:fs';
import { randomBytes } from 'node:crypto';

import {
  LocalStoreError,
  NOOP_LOG_SINK,
  NotAuthenticatedError,
  TokenExpiredError,
  isNodeError,
  isTokenValid,
  parseTokenBundle,
  serializeTokenBundle,
} from '@xferctl/kernel';
import type { LogSink, TokenBundle } from '@xferctl/kernel';

import { ensureTokensDir, tokenPath } from '../config/env.js';
import type { Env } from '../config/env.js';

const FILE_MODE = 0o600;

/** Anything that can trade a refresh credential for a new bundle. */
export interface TokenRefresher {
  refresh(refreshCredential: string, signal?: AbortSignal): Promise<TokenBundle>;
}

export class TokenStore {
  constructor(
    private readonly env: Env,
    private readonly log: LogSink = NOOP_LOG_SINK,
  ) {}

  /** @throws {InvalidArgumentError} for unsafe profile names */
  path(profile: string): string {
    return tokenPath(this.env, profile);
  }

  save(profile: string, bundle: TokenBundle): void {
    const target = this.path(profile);
    ensureTokensDir(this.env);

    const tmp = `${target}.${randomBytes(6).toString('hex')}.tmp`;
    const data = serializeTokenBundle(bundle);
    try {
      const fd = openSync(tmp, 'wx', FILE_MODE);
      try {
        writeSync(fd, data);
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(tmp, target);
      chmodSync(target, FILE_MODE);
    } catch (err) {
      rmSync(tmp, { force: true });
      throw new LocalStoreError(`Cannot write token file for profile "${profile}".`, { cause: err });
    }
    this.log.debug(`saved token bundle for profile "${profile}"`);
  }

  load(profile: string): TokenBundle {
    const file = this.path(profile);
    let text: string;
    try {
      text = readFileSync(file, 'utf-8');
    } catch (err) {
      if (isNodeError(err, 'ENOENT')) {
        throw new NotAuthenticatedError(
          `Not logged in for profile "${profile}". Run \`xferctl login\` first.`,
          { cause: err },
        );
      }
      throw new LocalStoreError(`Cannot read token file for profile "${profile}".`, { cause: err });
    }
    return parseTokenBundle(text, file);
  }

  delete(profile: string): void {
    const file = this.path(profile);
    try {
      unlinkSync(file);
    } catch (err) {
      if (isNodeError(err, 'ENOENT')) {
        throw new NotAuthenticatedError(`Not logged in for profile "${profile}".`, { cause: err });
      }
      throw new LocalStoreError(`Cannot delete token file for profile "${profile}".`, { cause: err });
    }
    this.log.debug(`deleted token bundle for profile "${profile}"`);
  }

  /**
   * Return the stored bundle if still valid. An expired bundle that carries a
   * refresh credential is exchanged for a new one, which is saved before it
   * is returned. A refresh response without a refresh credential or scopes
   * keeps the old ones.
   *
   * @throws {TokenExpiredError} when expired and no refresh credential exists
   */
  async refreshIfNeeded(
    profile: string,
    refresher: TokenRefresher,
    now: Date,
    signal?: AbortSignal,
  ): Promise<TokenBundle> {
    const bundle = this.load(profile);
    if (isTokenValid(bundle, now)) {
      return bundle;
    }
    if (bundle.refreshCredential === undefined || bundle.refreshCredential === '') {
      throw new TokenExpiredError(
        `Token for profile "${profile}" has expired and cannot be refreshed. Run \`xferctl login\` again.`,
      );
    }

    this.log.info(`refreshing expired token for profile "${profile}"`);
    const fresh = await refresher.refresh(bundle.refreshCredential, signal);
    const merged: TokenBundle = {
      ...fresh,
      refreshCredential: fresh.refreshCredential ?? bundle.refreshCredential,
      scopes: fresh.scopes.length > 0 ? fresh.scopes : bundle.scopes,
    };
    this.save(profile, merged);
    return merged;
  }
}
