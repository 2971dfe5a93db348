import { and, asc, eq, isNull, SQL } from 'drizzle-orm';
import type { DuplicateSetSummary } from '@shelfarr/shared-types';
import { CatalogDatabase } from '../db';
import { catalogItems, CatalogItem } from '../db/schema';
import { logger } from '../utils/logger';

/**
 * How two catalog rows are judged to be the same movie. A TMDB id wins
 * outright; rows without one fall back to exact title and release year.
 */
export type DuplicateKey =
  | { kind: 'tmdb'; tmdbId: number }
  | { kind: 'titleYear'; title: string; releaseYear: number | null };

export interface DuplicateCandidate {
  tmdbId?: number | null;
  title?: string | null;
  releaseYear?: number | null;
}

export type CopyLabelSource = Pick<CatalogItem, 'id' | 'copyNumber' | 'copyNotes'> &
  DuplicateCandidate;

export function duplicateKeyFor(item: DuplicateCandidate): DuplicateKey {
  if (item.tmdbId !== null && item.tmdbId !== undefined) {
    return { kind: 'tmdb', tmdbId: item.tmdbId };
  }
  return {
    kind: 'titleYear',
    title: item.title ?? '',
    releaseYear: item.releaseYear ?? null,
  };
}

export function describeDuplicateKey(key: DuplicateKey): string {
  switch (key.kind) {
    case 'tmdb':
      return `tmdb:${key.tmdbId}`;
    case 'titleYear':
      return `title:${key.title}|${key.releaseYear ?? ''}`;
  }
}

function matchDuplicateKey(key: DuplicateKey): SQL | undefined {
  switch (key.kind) {
    case 'tmdb':
      return eq(catalogItems.tmdbId, key.tmdbId);
    case 'titleYear':
      return and(
        isNull(catalogItems.tmdbId),
        eq(catalogItems.title, key.title),
        key.releaseYear === null
          ? isNull(catalogItems.releaseYear)
          : eq(catalogItems.releaseYear, key.releaseYear)
      );
  }
}

export function formatCopyLabelFor(
  copyNumber: number,
  copyNotes: string | null | undefined,
  isSoleMember: boolean
): string {
  if (isSoleMember && copyNumber === 1) {
    return '';
  }
  const notes = copyNotes?.trim();
  return notes ? `Copy #${copyNumber} (${notes})` : `Copy #${copyNumber}`;
}

export class DuplicateService {
  constructor(private db: CatalogDatabase) {}

  findByKey(key: DuplicateKey): CatalogItem[] {
    return this.db
      .select()
      .from(catalogItems)
      .where(matchDuplicateKey(key))
      .orderBy(asc(catalogItems.copyNumber), asc(catalogItems.id))
      .all();
  }

  /**
   * Every row representing the same movie as `item`, the item included,
   * ordered by copy number.
   */
  resolveDuplicateSet(item: DuplicateCandidate): CatalogItem[] {
    return this.findByKey(duplicateKeyFor(item));
  }

  hasDuplicates(item: DuplicateCandidate & { id: number }): boolean {
    return this.resolveDuplicateSet(item).some((member) => member.id !== item.id);
  }

  nextCopyNumber(item: DuplicateCandidate & { id: number }): number {
    const members = this.resolveDuplicateSet(item);
    if (!members.some((member) => member.id !== item.id)) {
      return 1;
    }
    return Math.max(...members.map((member) => member.copyNumber)) + 1;
  }

  /** Copy number for a row that has not been inserted yet. */
  nextCopyNumberForKey(key: DuplicateKey): number {
    const members = this.findByKey(key);
    if (members.length === 0) {
      return 1;
    }
    return Math.max(...members.map((member) => member.copyNumber)) + 1;
  }

  isCopyNumberTaken(key: DuplicateKey, copyNumber: number, excludeId?: number): boolean {
    return this.findByKey(key).some(
      (member) => member.copyNumber === copyNumber && member.id !== excludeId
    );
  }

  formatCopyLabel(item: CopyLabelSource): string {
    const isSoleMember = !this.hasDuplicates(item);
    return formatCopyLabelFor(item.copyNumber, item.copyNotes, isSoleMember);
  }

  listDuplicateSets(): DuplicateSetSummary[] {
    const rows = this.db
      .select({
        id: catalogItems.id,
        title: catalogItems.title,
        tmdbId: catalogItems.tmdbId,
        releaseYear: catalogItems.releaseYear,
        copyNumber: catalogItems.copyNumber,
      })
      .from(catalogItems)
      .orderBy(asc(catalogItems.copyNumber), asc(catalogItems.id))
      .all();

    const groups = new Map<string, typeof rows>();
    for (const row of rows) {
      const key = describeDuplicateKey(duplicateKeyFor(row));
      const group = groups.get(key);
      if (group) {
        group.push(row);
      } else {
        groups.set(key, [row]);
      }
    }

    const sets: DuplicateSetSummary[] = [];
    for (const [key, members] of groups) {
      if (members.length < 2) continue;
      const first = members[0];
      sets.push({
        key,
        title: first.title,
        releaseYear: first.releaseYear,
        tmdbId: first.tmdbId,
        copies: members.length,
        itemIds: members.map((member) => member.id),
      });
    }

    return sets.sort((a, b) => a.title.localeCompare(b.title));
  }

  /**
   * Renumbers the set 1..n in its current copy order, closing gaps left by
   * deleted copies.
   */
  resequenceDuplicateSet(item: DuplicateCandidate): CatalogItem[] {
    const members = this.resolveDuplicateSet(item);
    const now = new Date().toISOString();
    let changed = 0;

    this.db.transaction((tx) => {
      members.forEach((member, index) => {
        const copyNumber = index + 1;
        if (member.copyNumber === copyNumber) return;
        tx.update(catalogItems)
          .set({ copyNumber, updatedAt: now })
          .where(eq(catalogItems.id, member.id))
          .run();
        changed += 1;
      });
    });

    if (changed > 0) {
      logger.info(
        `Resequenced ${changed} cop${changed === 1 ? 'y' : 'ies'} in ${describeDuplicateKey(duplicateKeyFor(item))}`
      );
    }

    return this.resolveDuplicateSet(item);
  }
}
