export {
  ACTION_NAME,
  ACTION_VERSION,
  DEFAULT_LINTER_COMMAND,
  PULL_REQUEST_EVENT,
  ActionEnvSchema,
  isCommentToggleEnabled,
  loadActionConfig,
  type ActionConfig,
  type PublishContext,
} from "./actionConfig.js";
