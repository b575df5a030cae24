import { minimatch } from 'minimatch';
import { Dependency } from '../models/Dependency';
import { DependencyClassifier } from './DependencyClassifier';

// Plain shell-style matching: "*" and "?" stop at "/", nothing else is special
const GLOB_OPTIONS = {
    dot: true,
    nobrace: true,
    noext: true,
    noglobstar: true,
    nocomment: true,
    nonegate: true,
} as const;

function isAnchor(char: string | undefined): boolean {
    return char === '/' || char === '.';
}

function matchesWildcard(name: string, pattern: string): boolean {
    return pattern.includes('*') && minimatch(name, pattern, GLOB_OPTIONS);
}

// "@company/" and "com.company." match names starting with the part before the separator
function matchesPrefix(name: string, pattern: string): boolean {
    if (!isAnchor(pattern.at(-1))) {
        return false;
    }
    let prefix = pattern;
    if (prefix.endsWith('/')) {
        prefix = prefix.slice(0, -1);
    }
    if (prefix.endsWith('.')) {
        prefix = prefix.slice(0, -1);
    }
    return name.startsWith(prefix);
}

function matchesSuffix(name: string, pattern: string): boolean {
    if (!isAnchor(pattern[0])) {
        return false;
    }
    let suffix = pattern;
    if (suffix.startsWith('/')) {
        suffix = suffix.slice(1);
    }
    if (suffix.startsWith('.')) {
        suffix = suffix.slice(1);
    }
    return name.endsWith(suffix);
}

// Only for patterns that are neither wildcards nor anchored; "company-" also matches "my-company-utils"
function matchesContains(name: string, pattern: string): boolean {
    const special = pattern.includes('*') || isAnchor(pattern.at(-1)) || isAnchor(pattern[0]);
    return !special && name.includes(pattern);
}

/**
 * Classifies dependencies by name against an ordered list of patterns. A name is
 * internal when any pattern matches it exactly, as a wildcard, as a prefix
 * ("ends with / or ."), as a suffix ("starts with / or .") or as a substring.
 * Matching is case-sensitive.
 */
export class PatternClassifier implements DependencyClassifier {
    private readonly patterns: readonly string[];

    constructor(patterns: readonly string[]) {
        this.patterns = [...patterns];
    }

    isInternal(dependency: Dependency | null | undefined): boolean {
        if (!dependency || dependency.name === '') {
            return false;
        }
        return this.patterns.some((pattern) => this.matchesPattern(dependency.name, pattern));
    }

    classifyDependencies<T extends Array<Dependency | null | undefined> | null | undefined>(dependencies: T): T {
        if (!dependencies) {
            return dependencies;
        }
        for (const dependency of dependencies) {
            if (dependency) {
                dependency.isInternal = this.isInternal(dependency);
            }
        }
        return dependencies;
    }

    private matchesPattern(name: string, pattern: string): boolean {
        return (
            name === pattern ||
            matchesWildcard(name, pattern) ||
            matchesPrefix(name, pattern) ||
            matchesSuffix(name, pattern) ||
            matchesContains(name, pattern)
        );
    }
}
