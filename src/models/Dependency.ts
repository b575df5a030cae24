import { Language } from './Language';

export type Ecosystem = 'go-modules' | 'npm' | 'maven' | 'pip';

/**
 * A single declared or locked dependency of a project
 */
export interface Dependency {
    name: string;        // "github.com/gin-gonic/gin"
    version: string;     // "v1.9.1"
    constraint: string;  // "^1.9.0", or the version when no range was declared
    minVersion: string;  // lower bound of the constraint, "" when unknown
    maxVersion: string;  // exclusive upper bound of the constraint, "" when unbounded
    isInternal: boolean; // set once by the classifier
    ecosystem: Ecosystem;
}

const ECOSYSTEMS: Record<Language, Ecosystem> = {
    go: 'go-modules',
    nodejs: 'npm',
    java: 'maven',
    python: 'pip',
};

/**
 * The package registry a language's manifests refer to
 */
export function ecosystemFor(language: Language): Ecosystem {
    return ECOSYSTEMS[language];
}
