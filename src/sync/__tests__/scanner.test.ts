/**
 * File Scanner Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { scanFiles, scanPromptConfigFiles, scanSkillFiles } from '../scanner.js';
import { createTestWorkspace, type TestWorkspace } from '../../test-utils/index.js';

describe('scanFiles', () => {
  let workspace: TestWorkspace;

  beforeEach(() => {
    workspace = createTestWorkspace();
    workspace.write('skills/zeta.md', 'z');
    workspace.write('skills/alpha/beta.md', 'b');
    workspace.write('skills/alpha/notes.txt', 'n');
    workspace.write('skills/.hidden/secret.md', 's');
    workspace.write('prompt_configs/reviewer.yaml', 'name: reviewer');
    workspace.write('prompt_configs/reviewer.md', 'x');
  });

  afterEach(() => {
    workspace.cleanup();
  });

  it('returns sorted absolute paths with the extension', () => {
    const skillsDir = join(workspace.projectRoot, 'skills');

    expect(scanSkillFiles(skillsDir)).toEqual([
      join(skillsDir, 'alpha', 'beta.md'),
      join(skillsDir, 'zeta.md'),
    ]);
  });

  it('accepts an extension with a leading dot', () => {
    const skillsDir = join(workspace.projectRoot, 'skills');
    expect(scanFiles(skillsDir, '.md')).toEqual(scanFiles(skillsDir, 'md'));
  });

  it('scans prompt configs by .yaml', () => {
    expect(scanPromptConfigFiles(join(workspace.projectRoot, 'prompt_configs'))).toEqual([
      join(workspace.projectRoot, 'prompt_configs', 'reviewer.yaml'),
    ]);
  });

  it('returns an empty list for a missing directory', () => {
    expect(scanSkillFiles(join(workspace.projectRoot, 'nope'))).toEqual([]);
  });

  it('returns an empty list when given a file', () => {
    expect(scanSkillFiles(join(workspace.projectRoot, 'skills', 'zeta.md'))).toEqual([]);
  });
});
