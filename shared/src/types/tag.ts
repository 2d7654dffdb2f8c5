/**
 * Tag-related types and interfaces.
 * Tags are derived from hashtags in time entry descriptions; they are never
 * created directly.
 */

/**
 * Tag entity as stored in the database.
 */
export interface Tag {
  id: number;
  name: string;
  createdAt: string;
}

/**
 * Tag with the number of time entries currently linked to it.
 */
export interface TagWithUsage extends Tag {
  entryCount: number;
}

/**
 * Response for GET /api/tags - list all tags.
 */
export interface TagListResponse {
  tags: TagWithUsage[];
}
