/**
 * Test Utilities Module
 *
 * @example
 * ```typescript
 * import { createTestWorkspace, createSampleProject } from '../../test-utils/index.js';
 *
 * let workspace: TestWorkspace;
 * beforeEach(() => {
 *   workspace = createTestWorkspace();
 *   createSampleProject(workspace);
 * });
 * afterEach(() => workspace.cleanup());
 * ```
 */

export { createTestWorkspace, type TestWorkspace } from './workspace.js';
export { createSampleProject, createSyncedDatabase, SAMPLE_FILES } from './fixtures.js';
export { runCli, runCliJson, type CliRun } from './cli.js';
