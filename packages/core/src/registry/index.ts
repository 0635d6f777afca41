export {
  type FetchLike,
  RegistryHttpClient,
  type RegistryHttpClientOptions,
  type RequestOptions,
} from "./client.js";
export {
  type FetchContext,
  fetchLatestTag,
  listBitbucketTags,
  listGitHubTags,
  listGitLabTags,
} from "./fetchers.js";
export {
  type BitbucketTagPage,
  BitbucketTagPageSchema,
  type Tag,
  TagListSchema,
  TagSchema,
} from "./schemas.js";
