/**
 * Slack — public API.
 */

export { SlackClient, slackErrorCode } from "./client.js";
export type { ChannelClient, ChannelMessage, ThreadReply } from "./client.js";
export { SlackError, SlackApiError } from "./errors.js";
export { convertMarkdownToMrkdwn, escapeSlackSpecialChars, escapeMrkdwnText, markdownToMrkdwn } from "./markdown.js";
export { chunkMrkdwnText, splitMrkdwnText, joinChunks, SLACK_TEXT_LIMIT } from "./chunker.js";
export type { Chunk } from "./chunker.js";
export * from "./blocks.js";
