/**
 * Pattern Matcher - Compiles ordered exclusion rules into an include/exclude decision.
 *
 * Rule syntax (one per line in pattern files, or per --exclude flag):
 *   name        glob against the entry name at any depth ("*.pyc", ".git")
 *   a/b/*.ts    glob against the root-relative path
 *   /build      anchored to the root
 *   dist/       directories only
 *   !keep.pyc   force-include, overriding earlier rules
 *   !vendor     also force-includes everything below a matching directory
 *
 * The last matching rule decides. A negated rule decides for a path when it
 * matches the path itself or any of its ancestor directories. Pruning happens
 * in the walker, so a rule can never rescue anything below a directory that
 * was already excluded.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { Minimatch } from 'minimatch';
import { ConfigError, errorMessage } from './errors.js';

export type RuleSource = 'default' | 'config' | 'user';

export interface ExclusionRule {
    /** Glob with the "!" prefix and any trailing "/" removed */
    pattern: string;
    negated: boolean;
    directoryOnly: boolean;
    /** Matched against the whole relative path instead of the entry name */
    anchored: boolean;
    source: RuleSource;
}

export interface PatternMatcher {
    readonly rules: readonly ExclusionRule[];
    /** The last rule matching this path (or, for negations, one of its ancestors), if any */
    match(relativePath: string, isDir: boolean): ExclusionRule | undefined;
    included(relativePath: string, isDir: boolean): boolean;
}

/** Bundled default pattern file, merged before any user pattern */
export const DEFAULT_EXCLUDE_FILE = fileURLToPath(new URL('../../config/default_excludes.txt', import.meta.url));

const MATCH_OPTIONS = {
    dot: true,
    nocase: false,
    nocomment: true,
    nonegate: true,
} as const;

/**
 * Parse one raw pattern. Returns null for blank lines and comments.
 * "\#" and "\!" escape a literal leading character.
 */
export function parseRule(raw: string, source: RuleSource = 'user'): ExclusionRule | null {
    let text = raw.trim();
    if (!text || text.startsWith('#')) return null;

    let negated = false;
    if (text.startsWith('!')) {
        negated = true;
        text = text.slice(1);
    } else if (text.startsWith('\\!') || text.startsWith('\\#')) {
        text = text.slice(1);
    }

    let directoryOnly = false;
    while (text.length > 1 && text.endsWith('/')) {
        directoryOnly = true;
        text = text.slice(0, -1);
    }

    let anchored = false;
    if (text.startsWith('/')) {
        anchored = true;
        text = text.replace(/^\/+/, '');
    } else if (text.includes('/')) {
        anchored = true;
    }

    if (!text) return null;

    return { pattern: text, negated, directoryOnly, anchored, source };
}

export function parseRules(patterns: readonly string[], source: RuleSource = 'user'): ExclusionRule[] {
    const rules: ExclusionRule[] = [];
    for (const raw of patterns) {
        const rule = parseRule(raw, source);
        if (rule) rules.push(rule);
    }
    return rules;
}

/** Parse a pattern file body: one pattern per line, blanks and "#" lines ignored */
export function parsePatternFile(text: string, source: RuleSource = 'default'): ExclusionRule[] {
    return parseRules(text.split(/\r?\n/), source);
}

export function loadPatternFile(filePath: string, source: RuleSource = 'default'): ExclusionRule[] {
    let text: string;
    try {
        text = readFileSync(filePath, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Failed to read exclude file ${filePath}: ${errorMessage(error)}`);
    }
    return parsePatternFile(text, source);
}

interface CompiledRule {
    rule: ExclusionRule;
    matcher: Minimatch;
}

function baseName(relativePath: string): string {
    const idx = relativePath.lastIndexOf('/');
    return idx === -1 ? relativePath : relativePath.slice(idx + 1);
}

/** "a/b/c.txt" => ["a", "a/b"] */
function ancestorsOf(relativePath: string): string[] {
    const ancestors: string[] = [];
    let idx = relativePath.indexOf('/');
    while (idx !== -1) {
        ancestors.push(relativePath.slice(0, idx));
        idx = relativePath.indexOf('/', idx + 1);
    }
    return ancestors;
}

function ruleMatches({ rule, matcher }: CompiledRule, relativePath: string, isDir: boolean): boolean {
    if (rule.directoryOnly && !isDir) return false;
    return matcher.match(rule.anchored ? relativePath : baseName(relativePath));
}

export function compileRules(rules: readonly ExclusionRule[]): PatternMatcher {
    const frozen = Object.freeze(rules.map(rule => Object.freeze({ ...rule })));
    const compiled: CompiledRule[] = frozen.map(rule => ({
        rule,
        matcher: new Minimatch(rule.pattern, MATCH_OPTIONS),
    }));

    function match(relativePath: string, isDir: boolean): ExclusionRule | undefined {
        const ancestors = ancestorsOf(relativePath);

        for (let i = compiled.length - 1; i >= 0; i--) {
            const entry = compiled[i];
            if (ruleMatches(entry, relativePath, isDir)) return entry.rule;
            if (entry.rule.negated && ancestors.some(dir => ruleMatches(entry, dir, true))) return entry.rule;
        }
        return undefined;
    }

    return {
        rules: frozen,
        match,
        included(relativePath, isDir) {
            const rule = match(relativePath, isDir);
            return rule === undefined || rule.negated;
        },
    };
}

/** Render a rule back to its source form, for log lines */
export function formatRule(rule: ExclusionRule): string {
    const prefix = rule.negated ? '!' : '';
    const anchor = rule.anchored && !rule.pattern.includes('/') ? '/' : '';
    const suffix = rule.directoryOnly ? '/' : '';
    return `${prefix}${anchor}${rule.pattern}${suffix}`;
}
