import { Dependency } from '../models/Dependency';

/**
 * Labels dependencies as internal or external to the organization
 */
export interface DependencyClassifier {
    /**
     * Pure: the same ruleset and name always give the same answer
     */
    isInternal(dependency: Dependency | null | undefined): boolean;

    /**
     * Set every element's internal flag in place and return the same collection.
     * Missing elements are skipped; a missing collection is returned as is.
     */
    classifyDependencies<T extends Array<Dependency | null | undefined> | null | undefined>(dependencies: T): T;
}
