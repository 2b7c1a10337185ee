/**
 * Hatena Bookmark entry model.
 */

export interface Bookmark {
    user: string;
    comment: string;
    timestamp: string;
}

export interface BookmarkEntry {
    /** Total bookmark count, with or without comment. */
    count: number;
    bookmarks: Bookmark[];
}

/** Bookmarks whose comment is not blank. */
export function commentsOf(entry: BookmarkEntry): Bookmark[] {
    return entry.bookmarks.filter((b) => b.comment.trim() !== "");
}

export function commentCountOf(entry: BookmarkEntry): number {
    return commentsOf(entry).length;
}
