/**
 * Default Configuration Values
 *
 * The loader folds every configuration layer ON TOP of these defaults.
 */

import type { Config } from './schema.js';
import { getDefaultDbPath } from './paths.js';

/**
 * Build the defaults for an environment.
 * Only the database location depends on it ($XDG_CONFIG_HOME).
 */
export function createDefaultConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    database: {
      path: getDefaultDbPath(env),
      auto_migrate: true,
    },

    // Layout of a skills repository
    project: {
      root: null,
      skills_dir: 'skills',
      prompts_dir: 'prompts',
      prompt_configs_dir: 'prompt_configs',
    },

    search: {
      max_results: 50,
      snippet_tokens: 30,
    },

    // JSON by default so output can be piped into jq
    output: {
      format: 'json',
      color: true,
    },
  };
}

export const DEFAULT_CONFIG: Config = createDefaultConfig();

/**
 * Config file template (TOML format)
 * Written to the global config path by `skillbook db init`
 */
export const CONFIG_TEMPLATE = `# skillbook configuration
#
# Precedence (highest first):
#   SKILLBOOK_DB_PATH / SKILLBOOK_PROJECT_ROOT environment variables
#   ./.skillbook.toml in the working directory
#   this file
#   built-in defaults

[database]
# path = "~/.config/skillbook/skillbook.db"
auto_migrate = ${DEFAULT_CONFIG.database.auto_migrate}

[project]
# root = "~/src/my-skills"     # defaults to the current directory
skills_dir = "${DEFAULT_CONFIG.project.skills_dir}"
prompts_dir = "${DEFAULT_CONFIG.project.prompts_dir}"
prompt_configs_dir = "${DEFAULT_CONFIG.project.prompt_configs_dir}"

[search]
max_results = ${DEFAULT_CONFIG.search.max_results}
snippet_tokens = ${DEFAULT_CONFIG.search.snippet_tokens}

[output]
format = "${DEFAULT_CONFIG.output.format}"   # "json" or "human"
color = ${DEFAULT_CONFIG.output.color}
`;
