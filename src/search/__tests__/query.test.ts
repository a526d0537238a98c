/**
 * Full-Text Search Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { searchAll, searchPrompts, searchSkills, validateQuery } from '../query.js';
import { closeDatabase, type DatabaseHandle } from '../../database/index.js';
import { ValidationError } from '../../errors/index.js';
import {
  createSyncedDatabase,
  createTestWorkspace,
  type TestWorkspace,
} from '../../test-utils/index.js';

describe('full-text search', () => {
  let workspace: TestWorkspace;
  let db: DatabaseHandle;

  beforeEach(() => {
    workspace = createTestWorkspace();
    db = createSyncedDatabase(workspace);
  });

  afterEach(() => {
    closeDatabase(db);
    workspace.cleanup();
  });

  describe('searchSkills', () => {
    it('finds matches with a bracketed snippet', () => {
      const hits = searchSkills(db, 'pipelines');

      expect(hits).toHaveLength(1);
      expect(hits[0]?.name).toBe('arrows');
      expect(hits[0]?.snippet).toContain('[pipelines]');
    });

    it('matches across categories without a filter', () => {
      const names = searchSkills(db, 'data').map((hit) => hit.name).sort();
      expect(names).toEqual(['arrows', 'schemas']);
    });

    it('returns only the requested category', () => {
      const hits = searchSkills(db, 'data', { category: 'language' });

      expect(hits.map((hit) => hit.category)).toEqual(['language']);
    });

    it('caps the number of results', () => {
      expect(searchSkills(db, 'data', { maxResults: 1 })).toHaveLength(1);
    });

    it('orders by ascending rank', () => {
      const ranks = searchSkills(db, 'data').map((hit) => hit.rank);
      expect(ranks).toEqual([...ranks].sort((a, b) => a - b));
    });

    it('returns nothing for an unknown term', () => {
      expect(searchSkills(db, 'quaternion')).toEqual([]);
    });

    it('rejects a blank query', () => {
      expect(() => searchSkills(db, '   ')).toThrow(ValidationError);
    });

    it('reports FTS syntax errors as validation errors', () => {
      let caught: unknown;
      try {
        searchSkills(db, 'pipelines AND');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      if (caught instanceof ValidationError) {
        expect(caught.message).toBe('Invalid search query: pipelines AND');
        expect(caught.hint).toContain('double quotes');
      }
    });

    it('accepts quoted phrases', () => {
      expect(searchSkills(db, '"data pipelines"').map((hit) => hit.name)).toEqual(['arrows']);
    });
  });

  describe('searchPrompts', () => {
    it('searches prompt names and content', () => {
      expect(searchPrompts(db, 'reviewer').map((hit) => hit.name)).toEqual(['reviewer']);
      expect(searchPrompts(db, 'experiments').map((hit) => hit.name)).toEqual(['scratch']);
    });
  });

  describe('searchAll', () => {
    it('returns both kinds', () => {
      const result = searchAll(db, 'careful OR pipelines');

      expect(result.skills.map((hit) => hit.name)).toEqual(['arrows']);
      expect(result.prompts.map((hit) => hit.name)).toEqual(['reviewer']);
    });
  });
});

describe('validateQuery', () => {
  it('passes non-blank queries through', () => {
    expect(validateQuery('schemas')).toBe('schemas');
  });

  it('rejects empty input with a hint', () => {
    expect(() => validateQuery('')).toThrow('Search query cannot be empty');
  });
});
