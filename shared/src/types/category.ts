/**
 * Category types and interfaces.
 * Categories group time entries (e.g., Work, Personal) and carry a display color.
 */

export interface Category {
  id: number;
  name: string;
  color: string;
  createdAt: string;
}

/**
 * Request body for creating a new category.
 */
export interface CreateCategoryRequest {
  name: string;
  color?: string;
}

/**
 * Request body for updating a category.
 * All fields are optional; at least one must be provided.
 */
export interface UpdateCategoryRequest {
  name?: string;
  color?: string;
}

/**
 * Response for GET /api/categories - list all categories.
 */
export interface CategoryListResponse {
  categories: Category[];
}
