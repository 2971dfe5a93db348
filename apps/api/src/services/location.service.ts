import { and, eq, isNotNull, ne } from 'drizzle-orm';
import { CatalogDatabase } from '../db';
import { catalogItems } from '../db/schema';
import { ValidationError } from '../middleware/errorHandler';

export const LOCATION_FIELD = 'unboxedLocationNumber';

export type LocationCheck =
  | { ok: true; value: string }
  | { ok: false; field: typeof LOCATION_FIELD; message: string };

const DIGITS = /^\d+$/;

export function parseLocationNumber(value: string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  if (!DIGITS.test(trimmed)) return null;
  const parsed = Number.parseInt(trimmed, 10);
  // Past 2^53 the stored string would no longer round-trip
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Sequential shelf numbers for items taken out of their boxes. Numbers are
 * computed from the table on every call and never reserved.
 */
export class LocationService {
  constructor(private db: CatalogDatabase) {}

  nextLocationNumber(): number {
    const rows = this.db
      .select({ location: catalogItems.unboxedLocationNumber })
      .from(catalogItems)
      .where(
        and(
          eq(catalogItems.lifecycleState, 'unboxed'),
          isNotNull(catalogItems.unboxedLocationNumber)
        )
      )
      .all();

    let max = 0;
    for (const row of rows) {
      const parsed = parseLocationNumber(row.location);
      if (parsed !== null && parsed > max) {
        max = parsed;
      }
    }
    return max + 1;
  }

  isLocationTaken(candidate: string, excludeId?: number | null): boolean {
    const parsed = parseLocationNumber(candidate);
    const value = parsed !== null ? String(parsed) : candidate.trim();
    const conditions = [
      eq(catalogItems.lifecycleState, 'unboxed'),
      eq(catalogItems.unboxedLocationNumber, value),
    ];
    if (excludeId !== null && excludeId !== undefined) {
      conditions.push(ne(catalogItems.id, excludeId));
    }

    const match = this.db
      .select({ id: catalogItems.id })
      .from(catalogItems)
      .where(and(...conditions))
      .limit(1)
      .get();
    return match !== undefined;
  }

  nextSequentialLocations(count: number): string[] {
    if (!Number.isInteger(count) || count <= 0) {
      return [];
    }
    const start = this.nextLocationNumber();
    return Array.from({ length: count }, (_, index) => String(start + index));
  }

  checkUnboxedLocation(value: string | null | undefined, itemId?: number | null): LocationCheck {
    const trimmed = value?.trim() ?? '';
    if (trimmed === '') {
      return {
        ok: false,
        field: LOCATION_FIELD,
        message: 'Location is required when status is Unboxed.',
      };
    }

    const parsed = parseLocationNumber(trimmed);
    if (parsed === null || parsed < 1) {
      return {
        ok: false,
        field: LOCATION_FIELD,
        message: 'Location must be a positive whole number.',
      };
    }

    // Stored without leading zeros so "07" and "7" cannot both be taken
    const canonical = String(parsed);
    if (this.isLocationTaken(canonical, itemId)) {
      return {
        ok: false,
        field: LOCATION_FIELD,
        message: `Location ${canonical} is already taken by another unboxed item.`,
      };
    }

    return { ok: true, value: canonical };
  }

  /** Throws a field-scoped ValidationError instead of returning the check. */
  validateUnboxedLocation(value: string | null | undefined, itemId?: number | null): string {
    const check = this.checkUnboxedLocation(value, itemId);
    if (!check.ok) {
      throw new ValidationError(check.message, 400, check.field);
    }
    return check.value;
  }
}
