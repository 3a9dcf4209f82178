// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized path management for Revue.
 *
 * All ~/.revue paths are defined here. Each getter computes its path at
 * call time so tests can redirect everything through REVUE_HOME.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the base Revue directory.
 * Supports override via REVUE_HOME environment variable.
 */
export function getRevueHome(): string {
  if (process.env.REVUE_HOME) {
    return process.env.REVUE_HOME;
  }
  return join(homedir(), '.revue');
}

export const RevuePaths = {
  /** Base directory (~/.revue) */
  home: (): string => getRevueHome(),

  /** Review result cache (~/.revue/cache) */
  cache: (): string => join(getRevueHome(), 'cache'),

  /** Knowledge store collections (~/.revue/knowledge) */
  knowledge: (): string => join(getRevueHome(), 'knowledge'),

  /** Global configuration files (~/.revue/config.json, config.yaml) */
  globalConfigFiles: (): string[] => [
    join(getRevueHome(), 'config.json'),
    join(getRevueHome(), 'config.yaml'),
    join(getRevueHome(), 'config.yml'),
  ],
} as const;
