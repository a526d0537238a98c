/**
 * Catalog Statistics Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { getStats } from '../stats.js';
import { listPrompts, listSkills } from '../catalog.js';
import {
  closeDatabase,
  openDatabase,
  runMigrations,
  type DatabaseHandle,
} from '../../database/index.js';
import {
  createSyncedDatabase,
  createTestWorkspace,
  SAMPLE_FILES,
  type TestWorkspace,
} from '../../test-utils/index.js';

describe('getStats', () => {
  let workspace: TestWorkspace;
  let db: DatabaseHandle;

  afterEach(() => {
    closeDatabase(db);
    workspace.cleanup();
  });

  it('reports zeros for an empty database', () => {
    workspace = createTestWorkspace();
    db = openDatabase(workspace.dbPath);
    runMigrations(db);

    expect(getStats(db)).toEqual({
      skills: 0,
      prompts: 0,
      categories: 0,
      totalSizeBytes: 0,
      totalTokens: 0,
      categoryBreakdown: [],
    });
  });

  it('aggregates both document tables', () => {
    workspace = createTestWorkspace();
    db = createSyncedDatabase(workspace);

    const stats = getStats(db);
    const rows = [...listSkills(db), ...listPrompts(db)];

    expect(stats.skills).toBe(3);
    expect(stats.prompts).toBe(2);
    expect(stats.categories).toBe(3);
    // Every sample file is counted once: skills, prompt configs and prompt bodies
    expect(stats.totalSizeBytes).toBe(
      Object.values(SAMPLE_FILES).reduce((sum, content) => sum + Buffer.byteLength(content), 0)
    );
    expect(stats.totalTokens).toBe(rows.reduce((sum, row) => sum + row.token_count, 0));
    expect(stats.categoryBreakdown.map((c) => c.category)).toEqual([
      'language',
      'libraries/data_validation',
      'uncategorized',
    ]);
  });
});
