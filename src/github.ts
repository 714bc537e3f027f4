import { execFileSync } from 'node:child_process';
import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { ConfigError } from './errors.js';
import type { Transport } from './client.js';

/**
 * Resolve a GitHub token: GITHUB_TOKEN, then GH_TOKEN, then `gh auth token`.
 * Throws ConfigError when none of them yields a token.
 */
export function getGitHubToken(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.GITHUB_TOKEN?.trim() || env.GH_TOKEN?.trim();
  if (fromEnv) return fromEnv;

  let token = '';
  try {
    token = execFileSync('gh', ['auth', 'token'], {
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
    }).trim();
  } catch {
    // gh missing or not logged in; reported below
  }

  if (!token) {
    throw new ConfigError('No GitHub token found. Set GITHUB_TOKEN or run: gh auth login');
  }
  return token;
}

/**
 * Create an authenticated Octokit instance.
 * Octokit's own request logging goes to `debug` (verbose mode) or nowhere.
 */
export function createOctokit(token: string, debug?: (message: string) => void): Octokit {
  const log = (message: string) => debug?.(message);
  return new Octokit({
    auth: token,
    log: { debug: log, info: log, warn: log, error: log },
  });
}

/**
 * Adapt Octokit to the client's Transport contract.
 *
 * Octokit rejects on every status >= 400; those rejections carry the response and
 * are turned back into plain responses so the client can inspect status and
 * rate limit headers. Rejections without a response are transport failures.
 */
export function octokitTransport(octokit: Octokit): Transport {
  return async (url) => {
    try {
      const response = await octokit.request(`GET ${url}`);
      return { status: response.status, headers: response.headers, data: response.data };
    } catch (error: unknown) {
      if (error instanceof RequestError && error.response) {
        return {
          status: error.status,
          headers: error.response.headers,
          data: error.response.data,
        };
      }
      throw error;
    }
  };
}
