// ============================================
// depsync Registry Fetchers
// ============================================

import type { RegistryConfig } from "../config/index.js";
import type { FetchSource } from "../dependencies/types.js";
import type { Logger } from "../logger/index.js";
import { selectLatestStableTag } from "../version/index.js";
import type { RegistryHttpClient } from "./client.js";
import { BitbucketTagPageSchema, TagListSchema, type BitbucketTagPage } from "./schemas.js";

/**
 * Everything a fetcher needs besides the source itself.
 */
export interface FetchContext {
  client: RegistryHttpClient;
  registry: RegistryConfig;
  /** Sent as a bearer token to the GitHub API only */
  githubToken?: string;
  logger?: Logger;
}

/**
 * Resolve the latest stable tag for a fetch source.
 *
 * @example
 * ```typescript
 * const tag = await fetchLatestTag(
 *   { type: "github", repo: "xiph/opus", tagPattern: /^v[0-9]+(?:\.[0-9]+)*$/ },
 *   { client, registry: config.registry }
 * );
 * // "v1.5.2"
 * ```
 */
export async function fetchLatestTag(source: FetchSource, context: FetchContext): Promise<string> {
  switch (source.type) {
    case "static":
      return source.version;
    case "github":
      return selectLatestStableTag(await listGitHubTags(source.repo, context), source.tagPattern);
    case "gitlab":
      return selectLatestStableTag(
        await listGitLabTags(source.host, source.project, context),
        source.tagPattern
      );
    case "bitbucket":
      return selectLatestStableTag(await listBitbucketTags(source.repo, context), source.tagPattern);
    default:
      return assertNever(source);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled fetch source: ${JSON.stringify(value)}`);
}

/**
 * List tags from `api.github.com`, newest first as GitHub returns them.
 * Reads at most `maxPages` pages and stops on an empty or short page.
 */
export async function listGitHubTags(repo: string, context: FetchContext): Promise<string[]> {
  const { pageSize, maxPages } = context.registry;
  const headers: Record<string, string> = { Accept: "application/vnd.github+json" };
  if (context.githubToken) {
    headers.Authorization = `Bearer ${context.githubToken}`;
  }

  const tags: string[] = [];
  for (let page = 1; page <= maxPages; page++) {
    const url = `https://api.github.com/repos/${repo}/tags?per_page=${pageSize}&page=${page}`;
    const pageTags = await context.client.getJson(url, TagListSchema, { headers });
    if (pageTags.length === 0) {
      break;
    }

    tags.push(...pageTags.map((tag) => tag.name));
    if (pageTags.length < pageSize) {
      break;
    }
  }

  context.logger?.debug(`Fetched ${tags.length} tags for ${repo}`);
  return tags;
}

/**
 * List tags of a GitLab project. A single page is enough: GitLab orders
 * tags by most recent update.
 */
export async function listGitLabTags(
  host: string,
  project: string,
  context: FetchContext
): Promise<string[]> {
  const url =
    `https://${host}/api/v4/projects/${encodeURIComponent(project)}` +
    `/repository/tags?per_page=${context.registry.pageSize}`;
  const tags = await context.client.getJson(url, TagListSchema);
  return tags.map((tag) => tag.name);
}

/**
 * List every tag of a BitBucket repository by following `next` links.
 * BitBucket returns oldest first, so no page can be skipped.
 */
export async function listBitbucketTags(repo: string, context: FetchContext): Promise<string[]> {
  const tags: string[] = [];
  const visited = new Set<string>();
  let nextUrl: string | undefined =
    `https://api.bitbucket.org/2.0/repositories/${repo}/refs/tags?pagelen=${context.registry.pageSize}`;

  while (nextUrl !== undefined && !visited.has(nextUrl)) {
    visited.add(nextUrl);
    const page: BitbucketTagPage = await context.client.getJson(nextUrl, BitbucketTagPageSchema);
    tags.push(...page.values.map((tag) => tag.name));
    nextUrl = page.next;
  }

  context.logger?.debug(`Fetched ${tags.length} tags for ${repo} in ${visited.size} pages`);
  return tags;
}
