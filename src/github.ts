/**
 * GitHub API Client
 * Layer: infra
 *
 * Provided ports:
 *   - github.getContentSha
 *   - github.putContent
 *   - github.uploadFile
 *
 * Creates or updates files through the repository contents API.
 */

import type { RepoTarget } from './types';
import { FETCH_TIMEOUT_MS } from './types';
import { isARealObject } from './utils';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

const API_URL = 'https://api.github.com';
const USER_AGENT = 'stock-data-sync';

// -----------------------------------------------------------------------------
// Port: github.getContentSha
// -----------------------------------------------------------------------------

export type ContentShaOutcome =
  | { success: true; exists: true; sha: string }
  | { success: true; exists: false }
  | { success: false; error: string };

/**
 * Looks up the blob sha of a file on the target branch.
 * A 404 means the file does not exist yet.
 */
export async function getContentSha(
  target: RepoTarget,
  filePath: string,
): Promise<ContentShaOutcome> {
  const url = `${contentsUrl(target, filePath)}?ref=${encodeURIComponent(target.branch)}`;
  const result = await request(target.token, url, { method: 'GET' });
  if (!result.success) {
    return result;
  }

  const { response } = result;
  if (response.status === 404) {
    return { success: true, exists: false };
  }
  if (!response.ok) {
    return { success: false, error: await describeHttpError(response) };
  }

  const raw: unknown = await response.json();
  const sha = isARealObject(raw) ? raw['sha'] : undefined;
  if (typeof sha !== 'string') {
    return { success: false, error: `Failed to parse contents response for ${filePath}` };
  }
  return { success: true, exists: true, sha };
}

// -----------------------------------------------------------------------------
// Port: github.putContent
// -----------------------------------------------------------------------------

export type PutContentOutcome =
  | { success: true; status: number }
  | { success: false; error: string };

/**
 * Creates (no sha) or replaces (with sha) a file on the target branch.
 */
export async function putContent(
  target: RepoTarget,
  filePath: string,
  content: string,
  message: string,
  sha?: string,
): Promise<PutContentOutcome> {
  const body: Record<string, string> = {
    message,
    content: Buffer.from(content, 'utf-8').toString('base64'),
    branch: target.branch,
  };
  if (sha) {
    body['sha'] = sha;
  }

  const result = await request(target.token, contentsUrl(target, filePath), {
    method: 'PUT',
    body: JSON.stringify(body),
  });
  if (!result.success) {
    return result;
  }

  const { response } = result;
  if (response.status === 200 || response.status === 201) {
    return { success: true, status: response.status };
  }
  return { success: false, error: await describeHttpError(response) };
}

// -----------------------------------------------------------------------------
// Port: github.uploadFile
// -----------------------------------------------------------------------------

export type UploadOutcome =
  | { success: true; created: boolean }
  | { success: false; error: string };

/**
 * Uploads a file, creating it or updating the existing blob.
 */
export async function uploadFile(
  target: RepoTarget,
  filePath: string,
  content: string,
  message: string,
): Promise<UploadOutcome> {
  const existing = await getContentSha(target, filePath);
  if (!existing.success) {
    return { success: false, error: `Error accessing ${filePath}: ${existing.error}` };
  }

  const sha = existing.exists ? existing.sha : undefined;
  const put = await putContent(target, filePath, content, message, sha);
  if (!put.success) {
    return { success: false, error: `Failed to push ${filePath}: ${put.error}` };
  }
  return { success: true, created: !existing.exists };
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

type RequestOutcome = { success: true; response: Response } | { success: false; error: string };

function contentsUrl(target: RepoTarget, filePath: string): string {
  const encodedPath = filePath.split('/').map(encodeURIComponent).join('/');
  return `${API_URL}/repos/${target.repository}/contents/${encodedPath}`;
}

async function request(token: string, url: string, init: RequestInit): Promise<RequestOutcome> {
  // Set up abort controller with timeout to prevent indefinite hangs
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);

  try {
    const response = await fetch(url, {
      ...init,
      signal: controller.signal,
      headers: {
        Authorization: `Bearer ${token}`,
        Accept: 'application/vnd.github+json',
        'User-Agent': USER_AGENT,
        'X-GitHub-Api-Version': '2022-11-28',
      },
    });
    clearTimeout(timeoutId);
    return { success: true, response };
  } catch (err) {
    clearTimeout(timeoutId);

    const error = err as Error;
    if (error.name === 'AbortError') {
      return {
        success: false,
        error: `Request timeout: GitHub API did not respond within ${FETCH_TIMEOUT_MS}ms`,
      };
    }
    return { success: false, error: `Network error: ${error.message}` };
  }
}

async function describeHttpError(response: Response): Promise<string> {
  const message = await readErrorMessage(response);
  const statusText = response.statusText || 'Unknown error';
  return message
    ? `HTTP ${response.status}: ${statusText} - ${message}`
    : `HTTP ${response.status}: ${statusText}`;
}

async function readErrorMessage(response: Response): Promise<string | null> {
  try {
    const text = (await response.text()).trim();
    if (!text) return null;
    try {
      const parsed: unknown = JSON.parse(text);
      const message = isARealObject(parsed) ? parsed['message'] : undefined;
      if (typeof message === 'string') {
        return message;
      }
    } catch {
      // Fall back to raw text
    }
    return text;
  } catch {
    return null;
  }
}
