/**
 * Aggregate counters of one analysis run
 */
export interface AnalysisResult {
    readonly totalProjects: number;
    readonly totalDependencies: number;
    readonly internalCount: number;
    readonly externalCount: number;
}
