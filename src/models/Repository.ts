/**
 * A concrete source-control repository, as resolved from a configured URL
 */
export interface Repository {
    readonly id: number;            // GitLab project ID
    readonly name: string;          // "user-service"
    readonly url: string;           // canonical project URL
    readonly defaultBranch: string; // "main"
    readonly webUrl: string;        // browser URL
}
