/**
 * Repository metadata from the GitHub REST API, mapped to a CardModel.
 * Network calls live here; the parsing helpers are pure.
 */

import path from 'node:path';
import { decodeAvatar } from './avatar.js';
import type { AvatarBitmap, CardModel } from './types.js';

const API_ROOT = 'https://api.github.com';
const REQUEST_TIMEOUT_MS = 10_000;

/** Subset of GET /repos/{owner}/{repo} the card uses */
export interface RepoResponse {
  name?: string;
  description?: string | null;
  stargazers_count?: number;
  forks_count?: number;
  open_issues_count?: number;
  owner?: { login?: string; avatar_url?: string };
}

export interface RepoRef {
  owner: string;
  repo: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function count(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : undefined;
}

/** Keep only the fields the card uses, dropping any with the wrong type. */
export function readRepoResponse(raw: unknown): RepoResponse {
  if (!isRecord(raw)) return {};
  const owner: Record<string, unknown> = isRecord(raw.owner) ? raw.owner : {};
  return {
    name: typeof raw.name === 'string' ? raw.name : undefined,
    description: typeof raw.description === 'string' ? raw.description : null,
    stargazers_count: count(raw.stargazers_count),
    forks_count: count(raw.forks_count),
    open_issues_count: count(raw.open_issues_count),
    owner: {
      login: typeof owner.login === 'string' ? owner.login : undefined,
      avatar_url: typeof owner.avatar_url === 'string' ? owner.avatar_url : undefined,
    },
  };
}

/**
 * Accepts "https://github.com/o/r", "github.com/o/r" or "o/r"; the last
 * two path segments win.
 */
export function parseRepoUrl(url: string): RepoRef {
  let rest = url.trim().replace(/\/+$/, '');
  const scheme = rest.indexOf('://');
  if (scheme >= 0) rest = rest.slice(scheme + 3);
  if (rest.startsWith('github.com/')) rest = rest.slice('github.com/'.length);

  const parts = rest.split('/').filter(Boolean);
  const owner = parts.at(-2);
  const repo = parts.at(-1);
  if (!owner || !repo) {
    throw new Error(`not a repository URL: ${url}`);
  }
  return { owner, repo };
}

/**
 * Page number of the rel="last" link in a pagination Link header,
 * or null when there is none.
 */
export function parseLastPage(linkHeader: string | null): number | null {
  if (!linkHeader) return null;
  const m = /[?&]page=(\d+)>;\s*rel="last"/.exec(linkHeader);
  return m?.[1] ? parseInt(m[1], 10) : null;
}

export function toCardModel(
  ref: RepoRef,
  repo: RepoResponse,
  contributors: number,
  avatarBitmap: AvatarBitmap | null,
): CardModel {
  return {
    // Title follows the requested URL, even for renamed or transferred repos
    ownerName: ref.owner,
    repoName: ref.repo,
    description: repo.description ?? null,
    avatarBitmap,
    stats: [
      { value: contributors, label: 'Contributors', iconKind: 'contributors' },
      { value: repo.open_issues_count ?? 0, label: 'Issues+PRs', iconKind: 'issues' },
      { value: repo.forks_count ?? 0, label: 'Forks', iconKind: 'fork' },
      { value: repo.stargazers_count ?? 0, label: 'Stars', iconKind: 'star' },
    ],
  };
}

/** Replace characters that are not allowed in file names. */
export function sanitizeFilename(name: string): string {
  return name
    .replace(/[<>:"/\\|?*]/g, '_')
    .replace(/\s+/g, '_')
    .replace(/^[. ]+|[. ]+$/g, '');
}

/** <outputDir>/<owner>/<repo>.png */
export function cardPath(outputDir: string, ref: RepoRef): string {
  return path.join(outputDir, sanitizeFilename(ref.owner), `${sanitizeFilename(ref.repo)}.png`);
}

function headers(token: string | null): Record<string, string> {
  const h: Record<string, string> = { Accept: 'application/vnd.github+json' };
  if (token) h.Authorization = `Bearer ${token}`;
  return h;
}

async function countContributors(ref: RepoRef, token: string | null): Promise<number> {
  const res = await fetch(`${API_ROOT}/repos/${ref.owner}/${ref.repo}/contributors?per_page=1`, {
    headers: headers(token),
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  });
  if (!res.ok) return 0;
  const last = parseLastPage(res.headers.get('link'));
  if (last !== null) return last;
  const body: unknown = await res.json();
  return Array.isArray(body) ? body.length : 0;
}

async function fetchAvatar(url: string | undefined): Promise<AvatarBitmap | null> {
  if (!url) {
    console.warn('  [avatar] no avatar URL');
    return null;
  }
  try {
    const res = await fetch(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
    if (!res.ok) {
      console.warn(`  [avatar] download failed: HTTP ${res.status}`);
      return null;
    }
    return await decodeAvatar(Buffer.from(await res.arrayBuffer()));
  } catch (err) {
    console.warn(`  [avatar] download failed: ${err}`);
    return null;
  }
}

/**
 * Fetch repository data, contributor count and avatar, or null when the
 * repository lookup fails.
 */
export async function fetchRepoCard(ref: RepoRef, token: string | null = null): Promise<CardModel | null> {
  try {
    const res = await fetch(`${API_ROOT}/repos/${ref.owner}/${ref.repo}`, {
      headers: headers(token),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!res.ok) {
      console.warn(`  [github] ${ref.owner}/${ref.repo}: HTTP ${res.status}`);
      return null;
    }
    const repo = readRepoResponse(await res.json());
    const contributors = await countContributors(ref, token);
    const avatar = await fetchAvatar(repo.owner?.avatar_url);
    return toCardModel(ref, repo, contributors, avatar);
  } catch (err) {
    console.warn(`  [github] fetch failed for ${ref.owner}/${ref.repo}: ${err}`);
    return null;
  }
}
