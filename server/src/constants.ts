/**
 * Application-wide constants shared across server modules.
 */

/** Color given to categories created without one, including those created by CSV import. */
export const DEFAULT_CATEGORY_COLOR = '#cccccc';

/** Description stored when a timer is started without one. */
export const DEFAULT_DESCRIPTION = 'No description';

/**
 * Synthetic report bucket for time entries without a category.
 * The id doubles as the "uncategorized only" report filter value.
 */
export const NO_CATEGORY_ID = -1;
export const NO_CATEGORY_NAME = 'No Category';
export const NO_CATEGORY_COLOR = '#888888';

/** Number of entries returned by the recent-entries listing when no limit is given. */
export const DEFAULT_ENTRY_LIST_LIMIT = 50;
