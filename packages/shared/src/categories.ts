import { CATEGORY_GLYPHS } from './constants.js';
import { CategorySchema, type Category } from './schemas.js';

/**
 * Narrow an arbitrary label to a Category, or null if it is not in the set.
 */
export function toCategory(label: string): Category | null {
    const parsed = CategorySchema.safeParse(label.trim().toLowerCase());
    return parsed.success ? parsed.data : null;
}

/**
 * Display glyph for a category.
 */
export function categoryGlyph(category: Category): string {
    return CATEGORY_GLYPHS[category];
}

/**
 * Human-readable name: "personal_care" -> "Personal Care".
 */
export function categoryDisplayName(category: Category): string {
    return category
        .split('_')
        .map(word => word.charAt(0).toUpperCase() + word.slice(1))
        .join(' ');
}

/**
 * Deduplicate and sort labels into the stored/display order.
 */
export function sortCategories(categories: Iterable<Category>): Category[] {
    return [...new Set(categories)].sort();
}
