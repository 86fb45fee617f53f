/**
 * GitHub PR Comment Publisher
 *
 * Posts the lint failure report as a comment on the pull request that
 * triggered the workflow, via the GitHub REST API.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ACTION_NAME, PULL_REQUEST_EVENT, type PublishContext } from "../config/actionConfig.js";
import { PublishError } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import { renderReport, type Report } from "./reportBuilder.js";

// ============================================================================
// Types
// ============================================================================

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface PublishResult {
  commentsUrl: string;
  status: number;
}

const publishLogger = logger.child({ component: "comment-publisher" });

/**
 * The part of the `pull_request` event payload we read.
 */
export const PullRequestEventSchema = z.object({
  pull_request: z.object({
    comments_url: z.string().url(),
  }),
});

// ============================================================================
// Gating
// ============================================================================

/**
 * Comment only for pull request events with commenting switched on.
 */
export function shouldPublish(context: PublishContext): boolean {
  return context.eventName === PULL_REQUEST_EVENT && context.enabled;
}

// ============================================================================
// GitHub API Integration
// ============================================================================

/**
 * Read the pull request's comments endpoint from the event payload file.
 */
export async function readCommentsUrl(eventPath: string): Promise<string> {
  let raw: string;
  try {
    raw = await readFile(eventPath, "utf-8");
  } catch (error) {
    throw new PublishError(`Failed to read event payload: ${eventPath}`, { cause: error });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new PublishError(`Event payload is not valid JSON: ${eventPath}`, { cause: error });
  }

  const parsed = PullRequestEventSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PublishError(`Event payload has no pull_request.comments_url: ${eventPath}`, {
      cause: parsed.error,
    });
  }

  return parsed.data.pull_request.comments_url;
}

/**
 * JSON request body for a new comment. Any text survives the round trip,
 * fences and quotes included.
 */
export function createCommentPayload(body: string): string {
  return JSON.stringify({ body });
}

/**
 * Create a comment on the pull request. One POST, no retries.
 */
export async function postComment(
  commentsUrl: string,
  body: string,
  token: string,
  fetchImpl: FetchLike = fetch
): Promise<number> {
  let response: Response;
  try {
    response = await fetchImpl(commentsUrl, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${token}`,
        Accept: "application/vnd.github.v3+json",
        "User-Agent": ACTION_NAME,
        "Content-Type": "application/json",
      },
      body: createCommentPayload(body),
    });
  } catch (error) {
    throw new PublishError(
      `Failed to create comment: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (!response.ok) {
    throw new PublishError(
      `Failed to create comment: ${response.status} ${response.statusText}`,
      { status: response.status }
    );
  }

  return response.status;
}

/**
 * Render the report and post it on the pull request described by `context`.
 */
export async function publishReport(
  report: Report,
  context: PublishContext,
  fetchImpl: FetchLike = fetch
): Promise<PublishResult> {
  if (!context.token || !context.eventPath) {
    throw new PublishError("GITHUB_TOKEN and GITHUB_EVENT_PATH are required to comment");
  }

  publishLogger.info("Creating comment JSON payload", { sections: report.sections.length });
  const body = renderReport(report);
  const commentsUrl = await readCommentsUrl(context.eventPath);

  publishLogger.info("Commenting on the pull request", { commentsUrl });
  const status = await postComment(commentsUrl, body, context.token, fetchImpl);

  return { commentsUrl, status };
}
