/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { isLogLevel } from './common/logger';
import type { LogLevel } from './common/logger';

export interface EngineSettings {
  /** Minimum level written by the default console logger. */
  logLevel: LogLevel;
  /**
   * Rule files per language, in load order. Rules in later files override
   * rules with the same node path in earlier ones.
   */
  languages: Record<string, string[]>;
}

export const DEFAULT_SETTINGS: EngineSettings = {
  logLevel: 'info',
  languages: {},
};

export interface ResolvedSettings {
  settings: EngineSettings;
  /** Settings that were present but invalid and replaced by defaults. */
  warnings: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Fill in defaults for missing settings. Invalid values are dropped with a
 * warning rather than rejected, so a bad entry does not disable the rest.
 */
export function resolveSettings(raw: unknown): ResolvedSettings {
  const warnings: string[] = [];
  const settings: EngineSettings = { logLevel: DEFAULT_SETTINGS.logLevel, languages: {} };
  if (raw === undefined || raw === null) return { settings, warnings };
  if (!isRecord(raw)) {
    warnings.push('Settings must be an object; using defaults');
    return { settings, warnings };
  }

  if (raw.logLevel !== undefined) {
    if (isLogLevel(raw.logLevel)) settings.logLevel = raw.logLevel;
    else warnings.push(`Unknown logLevel "${String(raw.logLevel)}"; using "${DEFAULT_SETTINGS.logLevel}"`);
  }

  if (raw.languages !== undefined) {
    if (!isRecord(raw.languages)) {
      warnings.push('languages must map language names to lists of rule files');
    } else {
      for (const [language, files] of Object.entries(raw.languages)) {
        if (Array.isArray(files) && files.every((f): f is string => typeof f === 'string')) {
          settings.languages[language] = [...files];
        } else {
          warnings.push(`Rule files for "${language}" must be a list of paths; language ignored`);
        }
      }
    }
  }

  return { settings, warnings };
}
