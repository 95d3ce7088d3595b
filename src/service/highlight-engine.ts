/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { resolveSettings } from '../config';
import type { EngineSettings } from '../config';
import { buildMatchTree, RuleError } from '../engine/match-tree';
import { highlight } from '../engine/matcher';
import type { HighlightInstruction, MatchTree, ParseTreeNode, Rule } from '../engine/types';
import { formatRuleDiagnostics, isRuleFileUsable } from '../rules/diagnostics';
import { readRuleFiles } from '../rules/loader';

export type RebuildResult =
    | { ok: true; tree: MatchTree }
    | { ok: false; error: string; diagnostics: string[] };

/**
 * Holds the active match tree of each language.
 *
 * A rebuild compiles a complete new tree before publishing it, so a
 * `highlight` call always sees either the old or the new tree, never a
 * partial one. A failed rebuild leaves the previous tree active.
 */
export class HighlightEngine {
    private trees = new Map<string, MatchTree>();
    private log: Logger;

    constructor(log: Logger) {
        this.log = log.clone();
        this.log.setContext('highlight |');
    }

    rebuild(language: string, rules: readonly Rule[]): RebuildResult {
        const started = Date.now();
        let tree: MatchTree;
        try {
            tree = buildMatchTree(rules);
        }
        catch (e) {
            if (!(e instanceof RuleError)) throw e;
            this.log.warn(`${language}: ${e.message}; previous rules stay active`);
            return { ok: false, error: e.message, diagnostics: [] };
        }
        this.trees.set(language, tree);
        this.log.debug(`${language}: compiled ${tree.ruleCount} rules into ${tree.nodeCount} match nodes in ${Date.now() - started}ms`);
        this.log.info(`${language}: highlight rules updated`);
        return { ok: true, tree };
    }

    /**
     * Read the given rule files (later files override earlier ones) and
     * rebuild from them. Any rule-file error rejects the whole reload.
     */
    reload(language: string, paths: readonly string[]): RebuildResult {
        const result = readRuleFiles(paths);
        if (!isRuleFileUsable(result)) {
            const diagnostics = formatRuleDiagnostics(result.errors);
            for (const line of diagnostics) this.log.error(line);
            const error = `${result.errors.length} error(s) in rule files for ${language}`;
            this.log.warn(`${language}: ${error}; previous rules stay active`);
            return { ok: false, error, diagnostics };
        }
        return this.rebuild(language, result.rules);
    }

    /**
     * Apply the settings: set the log level, drop languages that are no
     * longer listed and reload every listed one.
     */
    configure(settings: EngineSettings): Map<string, RebuildResult> {
        this.log.setLevel?.(settings.logLevel);
        for (const language of this.languages()) {
            if (!Object.prototype.hasOwnProperty.call(settings.languages, language)) {
                this.remove(language);
                this.log.info(`${language}: no longer configured, highlight rules removed`);
            }
        }
        const results = new Map<string, RebuildResult>();
        for (const [language, paths] of Object.entries(settings.languages)) {
            results.set(language, this.reload(language, paths));
        }
        return results;
    }

    highlight(language: string, tree: ParseTreeNode): HighlightInstruction[] {
        const matchTree = this.trees.get(language);
        if (!matchTree) return [];
        return highlight(tree, matchTree);
    }

    matchTree(language: string): MatchTree | undefined {
        return this.trees.get(language);
    }

    languages(): string[] {
        return [...this.trees.keys()];
    }

    remove(language: string): boolean {
        return this.trees.delete(language);
    }
}

/**
 * Create an engine from raw (e.g. JSON) settings, logging to the console
 * unless a logger is given, and load every configured language.
 */
export function createHighlightEngine(raw?: unknown, log?: Logger): HighlightEngine {
    const { settings, warnings } = resolveSettings(raw);
    const logger = log ?? new ConsoleLogger(settings.logLevel);
    for (const warning of warnings) logger.warn(warning);
    const engine = new HighlightEngine(logger);
    engine.configure(settings);
    return engine;
}
