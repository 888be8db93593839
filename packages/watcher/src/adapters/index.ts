export { GitHubCommitSource, nextPageUrl } from "./github.js";
export type { GitHubSourceOptions } from "./github.js";
