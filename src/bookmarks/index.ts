/**
 * Bookmarks — public API.
 */

export { HatenaBookmarkClient, DEFAULT_BOOKMARK_TIMEOUT_MS } from "./client.js";
export type { BookmarkClient } from "./client.js";
export { commentsOf, commentCountOf } from "./models.js";
export type { Bookmark, BookmarkEntry } from "./models.js";
