/**
 * Action Configuration
 *
 * Builds the explicit configuration every component receives, from the
 * variables the CI platform injects. Nothing else reads process.env.
 */

import { z } from "zod";
import { ConfigurationError } from "../types/errors.js";

// ============================================================================
// Identity
// ============================================================================

export const ACTION_NAME = "ansible-lint-pr-action";
export const ACTION_VERSION = "1.0.0";
export const DEFAULT_LINTER_COMMAND = "ansible-lint";
export const PULL_REQUEST_EVENT = "pull_request";

// ============================================================================
// Types
// ============================================================================

/**
 * Everything the publisher needs to decide whether, and where, to comment.
 */
export interface PublishContext {
  eventName: string;
  /** Path of the JSON event payload describing the pull request */
  eventPath?: string;
  token?: string;
  enabled: boolean;
}

export interface ActionConfig {
  /** Raw TARGETS blob */
  targets: string;
  workspace: string;
  linterCommand: string;
  /** Space-separated pip package specs to install first */
  override: string;
  workflow: string;
  action: string;
  publish: PublishContext;
}

// ============================================================================
// Schema
// ============================================================================

/**
 * The comment toggle accepts `true` and `1`; everything else is off.
 */
export function isCommentToggleEnabled(value: string | undefined): boolean {
  return value === "true" || value === "1";
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

export const ActionEnvSchema = z
  .object({
    TARGETS: z
      .string({ required_error: "TARGETS is not set: no targets to check, nothing to do" })
      .refine((value) => value.trim().length > 0, {
        message: "TARGETS is empty: no targets to check, nothing to do",
      }),
    GITHUB_WORKSPACE: z
      .string({
        required_error:
          "GITHUB_WORKSPACE has to be set. Did you use the actions/checkout action?",
      })
      .min(1, "GITHUB_WORKSPACE has to be set. Did you use the actions/checkout action?"),
    GITHUB_EVENT_NAME: z.string().default(""),
    GITHUB_EVENT_PATH: optionalString,
    GITHUB_TOKEN: optionalString,
    INPUT_COMMENT: z.string().optional().transform(isCommentToggleEnabled),
    GITHUB_WORKFLOW: z.string().default(""),
    GITHUB_ACTION: z.string().default(""),
    OVERRIDE: z.string().default(""),
    ANSIBLE_LINT_COMMAND: z.string().min(1).default(DEFAULT_LINTER_COMMAND),
  })
  .superRefine((env, ctx) => {
    if (env.GITHUB_EVENT_NAME !== PULL_REQUEST_EVENT || !env.INPUT_COMMENT) {
      return;
    }
    if (!env.GITHUB_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GITHUB_TOKEN"],
        message: "GITHUB_TOKEN is required to comment on the pull request",
      });
    }
    if (!env.GITHUB_EVENT_PATH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GITHUB_EVENT_PATH"],
        message: "GITHUB_EVENT_PATH is required to comment on the pull request",
      });
    }
  });

// ============================================================================
// Loader
// ============================================================================

/**
 * Validate the environment and build an ActionConfig.
 *
 * @throws ConfigurationError listing every problem found
 */
export function loadActionConfig(env: Record<string, string | undefined>): ActionConfig {
  const parsed = ActionEnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((issue) => issue.message));
  }

  const values = parsed.data;
  return {
    targets: values.TARGETS,
    workspace: values.GITHUB_WORKSPACE,
    linterCommand: values.ANSIBLE_LINT_COMMAND,
    override: values.OVERRIDE,
    workflow: values.GITHUB_WORKFLOW,
    action: values.GITHUB_ACTION,
    publish: {
      eventName: values.GITHUB_EVENT_NAME,
      eventPath: values.GITHUB_EVENT_PATH,
      token: values.GITHUB_TOKEN,
      enabled: values.INPUT_COMMENT,
    },
  };
}
