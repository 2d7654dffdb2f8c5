import { and, eq, ne, sql } from 'drizzle-orm';
import type { Category, CreateCategoryRequest, UpdateCategoryRequest } from '@timekeep/shared';
import { categories, timeEntries } from '../db/schema.js';
import type { DbHandle } from '../db/transaction.js';
import { withTransaction } from '../db/transaction.js';
import { DEFAULT_CATEGORY_COLOR } from '../constants.js';
import { NotFoundError, ValidationError, ConflictError } from '../errors/AppError.js';

const MAX_NAME_LENGTH = 100;

/**
 * Convert database category row to Category shape.
 */
function toCategory(category: typeof categories.$inferSelect): Category {
  return {
    id: category.id,
    name: category.name,
    color: category.color,
    createdAt: category.createdAt,
  };
}

/**
 * Validate hex color format (#RRGGBB).
 */
function isValidHexColor(color: string): boolean {
  return /^#[0-9A-Fa-f]{6}$/.test(color);
}

function normalizeName(name: string): string {
  const trimmedName = name.trim();
  if (trimmedName.length === 0 || trimmedName.length > MAX_NAME_LENGTH) {
    throw new ValidationError(`Category name must be between 1 and ${MAX_NAME_LENGTH} characters`);
  }
  return trimmedName;
}

function assertColor(color: string): void {
  if (!isValidHexColor(color)) {
    throw new ValidationError('Color must be a hex color code in format #RRGGBB', { color });
  }
}

/**
 * List all categories, sorted alphabetically by name (case-insensitive).
 */
export function listCategories(db: DbHandle): Category[] {
  const rows = db
    .select()
    .from(categories)
    .orderBy(sql`LOWER(${categories.name})`)
    .all();
  return rows.map(toCategory);
}

/**
 * Get a single category by ID.
 * @throws NotFoundError if category does not exist
 */
export function getCategoryById(db: DbHandle, id: number): Category {
  const category = db.select().from(categories).where(eq(categories.id, id)).get();
  if (!category) {
    throw new NotFoundError('Category not found', { id });
  }
  return toCategory(category);
}

/**
 * Look up a category by its exact name.
 */
export function findCategoryByName(db: DbHandle, name: string): Category | null {
  const category = db.select().from(categories).where(eq(categories.name, name)).get();
  return category ? toCategory(category) : null;
}

/**
 * Create a new category.
 * @throws ValidationError if name or color is invalid
 * @throws ConflictError if a category with the same name (ignoring case) already exists
 */
export function createCategory(db: DbHandle, data: CreateCategoryRequest): Category {
  const name = normalizeName(data.name);
  const color = data.color ?? DEFAULT_CATEGORY_COLOR;
  assertColor(color);

  // Check for duplicate name (case-insensitive)
  const existing = db
    .select({ id: categories.id })
    .from(categories)
    .where(sql`LOWER(${categories.name}) = LOWER(${name})`)
    .get();
  if (existing) {
    throw new ConflictError('A category with this name already exists', { name });
  }

  const created = db
    .insert(categories)
    .values({ name, color, createdAt: new Date().toISOString() })
    .returning()
    .get();
  return toCategory(created);
}

/**
 * Return the category with this exact name, inserting it with `color` if missing.
 * Used by CSV import: any non-empty name is accepted as-is, without the
 * length and case-insensitive uniqueness rules of createCategory.
 */
export function getOrCreateCategoryByName(
  db: DbHandle,
  name: string,
  color: string = DEFAULT_CATEGORY_COLOR,
): Category {
  const existing = findCategoryByName(db, name);
  if (existing) {
    return existing;
  }

  const created = db
    .insert(categories)
    .values({ name, color, createdAt: new Date().toISOString() })
    .returning()
    .get();
  return toCategory(created);
}

/**
 * Update a category's name and/or color.
 * @throws NotFoundError if category does not exist
 * @throws ValidationError if fields are invalid or no fields provided
 * @throws ConflictError if the new name (ignoring case) belongs to another category
 */
export function updateCategory(db: DbHandle, id: number, data: UpdateCategoryRequest): Category {
  getCategoryById(db, id);

  if (data.name === undefined && data.color === undefined) {
    throw new ValidationError('At least one field must be provided');
  }

  const updates: Partial<typeof categories.$inferInsert> = {};

  if (data.name !== undefined) {
    const name = normalizeName(data.name);
    const duplicate = db
      .select({ id: categories.id })
      .from(categories)
      .where(and(sql`LOWER(${categories.name}) = LOWER(${name})`, ne(categories.id, id)))
      .get();
    if (duplicate) {
      throw new ConflictError('A category with this name already exists', { name });
    }
    updates.name = name;
  }

  if (data.color !== undefined) {
    assertColor(data.color);
    updates.color = data.color;
  }

  db.update(categories).set(updates).where(eq(categories.id, id)).run();
  return getCategoryById(db, id);
}

/**
 * Delete a category. Entries that referenced it become uncategorized; none are deleted.
 * @throws NotFoundError if category does not exist
 */
export function deleteCategory(db: DbHandle, id: number): void {
  withTransaction(db, 'delete category', (tx) => {
    getCategoryById(tx, id);
    tx.update(timeEntries).set({ categoryId: null }).where(eq(timeEntries.categoryId, id)).run();
    tx.delete(categories).where(eq(categories.id, id)).run();
  });
}
