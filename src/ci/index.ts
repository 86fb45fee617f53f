/**
 * CI/CD Integration Module
 *
 * Builds the lint failure report and posts it on the pull request.
 */

export {
  type Report,
  type ReportSection,
  type ReportInput,
  buildReport,
  renderReport,
  renderSection,
  codeFenceFor,
} from "./reportBuilder.js";
export {
  type FetchLike,
  type PublishResult,
  PullRequestEventSchema,
  shouldPublish,
  readCommentsUrl,
  createCommentPayload,
  postComment,
  publishReport,
} from "./githubComment.js";
