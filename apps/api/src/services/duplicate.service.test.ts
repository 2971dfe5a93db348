import { beforeEach, describe, expect, it } from 'vitest';
import { DatabaseHandle } from '../db';
import { createTestDatabase, insertItem } from '../testing/fixtures';
import {
  describeDuplicateKey,
  duplicateKeyFor,
  DuplicateService,
  formatCopyLabelFor,
} from './duplicate.service';

describe('DuplicateService', () => {
  let handle: DatabaseHandle;
  let service: DuplicateService;

  beforeEach(() => {
    handle = createTestDatabase();
    service = new DuplicateService(handle.db);
  });

  describe('resolveDuplicateSet', () => {
    it('returns the same set from every member sharing a TMDB id', () => {
      const a = insertItem(handle.db, { title: 'The Matrix', tmdbId: 603, copyNumber: 2 });
      const b = insertItem(handle.db, { title: 'Matrix, The', tmdbId: 603, copyNumber: 1 });
      insertItem(handle.db, { title: 'The Matrix', tmdbId: 604 });

      const fromA = service.resolveDuplicateSet(a).map((item) => item.id);
      const fromB = service.resolveDuplicateSet(b).map((item) => item.id);

      expect(fromA).toEqual([b.id, a.id]);
      expect(fromB).toEqual(fromA);
    });

    it('ignores title and year when a TMDB id is present', () => {
      const a = insertItem(handle.db, { title: 'Alien', releaseYear: 1979, tmdbId: 348 });
      insertItem(handle.db, { title: 'Alien', releaseYear: 1979 });

      expect(service.resolveDuplicateSet(a).map((item) => item.id)).toEqual([a.id]);
    });

    it('matches on title and year when there is no TMDB id', () => {
      const a = insertItem(handle.db, { title: 'Local Hero', releaseYear: 1983 });
      const b = insertItem(handle.db, { title: 'Local Hero', releaseYear: 1983, copyNumber: 2 });
      insertItem(handle.db, { title: 'Local Hero', releaseYear: 1984 });
      insertItem(handle.db, { title: 'Local Hero', releaseYear: 1983, tmdbId: 11235 });

      expect(service.resolveDuplicateSet(a).map((item) => item.id)).toEqual([a.id, b.id]);
      expect(service.resolveDuplicateSet(b).map((item) => item.id)).toEqual([a.id, b.id]);
    });

    it('treats two missing years as equal but not a missing year and a set one', () => {
      const a = insertItem(handle.db, { title: 'Home Movies' });
      const b = insertItem(handle.db, { title: 'Home Movies', copyNumber: 2 });
      insertItem(handle.db, { title: 'Home Movies', releaseYear: 2001 });

      expect(service.resolveDuplicateSet(a).map((item) => item.id)).toEqual([a.id, b.id]);
    });

    it('does not fail on a missing title', () => {
      expect(service.resolveDuplicateSet({ title: null, releaseYear: null })).toEqual([]);
    });
  });

  describe('hasDuplicates', () => {
    it('is false for a lone item and true once another copy exists', () => {
      const a = insertItem(handle.db, { title: 'Heat', tmdbId: 949 });
      expect(service.hasDuplicates(a)).toBe(false);

      insertItem(handle.db, { title: 'Heat', tmdbId: 949, copyNumber: 2 });
      expect(service.hasDuplicates(a)).toBe(true);
    });

    it('compares by id, not by field values', () => {
      const a = insertItem(handle.db, { title: 'Heat', releaseYear: 1995 });
      insertItem(handle.db, { title: 'Heat', releaseYear: 1995 });

      expect(service.hasDuplicates(a)).toBe(true);
    });
  });

  describe('nextCopyNumber', () => {
    it('returns 1 for an item without duplicates', () => {
      const a = insertItem(handle.db, { title: 'Heat', tmdbId: 949, copyNumber: 3 });
      expect(service.nextCopyNumber(a)).toBe(1);
    });

    it('returns max + 1 without filling gaps', () => {
      const a = insertItem(handle.db, { title: 'Heat', tmdbId: 949, copyNumber: 1 });
      insertItem(handle.db, { title: 'Heat', tmdbId: 949, copyNumber: 2 });
      insertItem(handle.db, { title: 'Heat', tmdbId: 949, copyNumber: 4 });

      expect(service.nextCopyNumber(a)).toBe(5);
    });
  });

  describe('nextCopyNumberForKey', () => {
    it('returns 1 when nothing matches and max + 1 otherwise', () => {
      expect(service.nextCopyNumberForKey({ kind: 'tmdb', tmdbId: 949 })).toBe(1);

      insertItem(handle.db, { title: 'Heat', tmdbId: 949, copyNumber: 1 });
      expect(service.nextCopyNumberForKey({ kind: 'tmdb', tmdbId: 949 })).toBe(2);
    });
  });

  describe('isCopyNumberTaken', () => {
    it('checks the set only and can exclude the item itself', () => {
      const a = insertItem(handle.db, { title: 'Heat', tmdbId: 949, copyNumber: 1 });
      insertItem(handle.db, { title: 'Alien', tmdbId: 348, copyNumber: 2 });
      const key = { kind: 'tmdb', tmdbId: 949 } as const;

      expect(service.isCopyNumberTaken(key, 1)).toBe(true);
      expect(service.isCopyNumberTaken(key, 1, a.id)).toBe(false);
      expect(service.isCopyNumberTaken(key, 2)).toBe(false);
    });
  });

  describe('formatCopyLabel', () => {
    it('is empty for a lone first copy', () => {
      const a = insertItem(handle.db, { title: 'Heat', tmdbId: 949 });
      expect(service.formatCopyLabel(a)).toBe('');
    });

    it('labels copies in a set with and without notes', () => {
      insertItem(handle.db, { title: 'Heat', tmdbId: 949 });
      const second = insertItem(handle.db, { title: 'Heat', tmdbId: 949, copyNumber: 2 });
      const cut = insertItem(handle.db, {
        title: 'Heat',
        tmdbId: 949,
        copyNumber: 2,
        copyNotes: "Director's Cut",
      });

      expect(service.formatCopyLabel(second)).toBe('Copy #2');
      expect(service.formatCopyLabel(cut)).toBe("Copy #2 (Director's Cut)");
    });

    it('labels a lone item whose copy number is not 1', () => {
      expect(formatCopyLabelFor(2, null, true)).toBe('Copy #2');
      expect(formatCopyLabelFor(1, '   ', false)).toBe('Copy #1');
    });
  });

  describe('listDuplicateSets', () => {
    it('lists only sets with more than one member, sorted by title', () => {
      const heat1 = insertItem(handle.db, { title: 'Heat', tmdbId: 949 });
      const heat2 = insertItem(handle.db, { title: 'Heat', tmdbId: 949, copyNumber: 2 });
      const alien1 = insertItem(handle.db, { title: 'Alien', releaseYear: 1979 });
      const alien2 = insertItem(handle.db, { title: 'Alien', releaseYear: 1979, copyNumber: 2 });
      insertItem(handle.db, { title: 'Ran', tmdbId: 11645 });

      expect(service.listDuplicateSets()).toEqual([
        {
          key: 'title:Alien|1979',
          title: 'Alien',
          releaseYear: 1979,
          tmdbId: null,
          copies: 2,
          itemIds: [alien1.id, alien2.id],
        },
        {
          key: 'tmdb:949',
          title: 'Heat',
          releaseYear: null,
          tmdbId: 949,
          copies: 2,
          itemIds: [heat1.id, heat2.id],
        },
      ]);
    });
  });

  describe('resequenceDuplicateSet', () => {
    it('renumbers the set 1..n in copy order', () => {
      const a = insertItem(handle.db, { title: 'Heat', tmdbId: 949, copyNumber: 2 });
      const b = insertItem(handle.db, { title: 'Heat', tmdbId: 949, copyNumber: 5 });
      const c = insertItem(handle.db, { title: 'Heat', tmdbId: 949, copyNumber: 9 });

      const result = service.resequenceDuplicateSet(a);

      expect(result.map((item) => [item.id, item.copyNumber])).toEqual([
        [a.id, 1],
        [b.id, 2],
        [c.id, 3],
      ]);
    });
  });

  it('describes keys for both match kinds', () => {
    expect(describeDuplicateKey(duplicateKeyFor({ tmdbId: 603 }))).toBe('tmdb:603');
    expect(describeDuplicateKey(duplicateKeyFor({ title: 'Heat', releaseYear: null }))).toBe(
      'title:Heat|'
    );
  });
});
