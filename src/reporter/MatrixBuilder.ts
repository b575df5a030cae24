import { Project } from '../models/Project';
import { Dependency } from '../models/Dependency';

const SEMVER_PATTERN = /^v?(\d+)\.(\d+)\.(\d+)(?:-([a-zA-Z0-9.-]+))?(?:\+([a-zA-Z0-9.-]+))?$/;

export interface ReportSummary {
    total_projects: number;
    total_dependencies: number;
    languages: Record<string, number>;
    internal_external: { internal: number; external: number };
    ecosystems: Record<string, number>;
}

export interface MatrixColumn {
    name: string;
    is_internal: boolean;
    max_version: string;
}

export interface MatrixCell {
    version: string;
    constraint: string;
    is_internal: boolean;
    ecosystem: string;
    max_version: string;
    is_outdated: boolean;
}

export interface DependencyMatrix {
    dependencies: MatrixColumn[];
    projects: Project[];
    matrix: (MatrixCell | null)[][]; // [project][column]
}

interface SemVer {
    major: number;
    minor: number;
    patch: number;
    preRelease: string;
}

function parseSemVer(version: string): SemVer | undefined {
    const match = SEMVER_PATTERN.exec(version);
    if (!match) {
        return undefined;
    }
    return {
        major: Number(match[1]),
        minor: Number(match[2]),
        patch: Number(match[3]),
        preRelease: match[4] ?? '',
    };
}

function compareStrings(a: string, b: string): number {
    if (a === b) {
        return 0;
    }
    return a < b ? -1 : 1;
}

/**
 * Semantic version ordering with a plain string comparison for anything that is not
 * MAJOR.MINOR.PATCH. Build metadata is ignored; a pre-release sorts below its release.
 *
 * @returns -1, 0 or 1
 */
export function compareVersions(a: string, b: string): number {
    const left = parseSemVer(a);
    const right = parseSemVer(b);
    if (!left || !right) {
        return compareStrings(a, b);
    }

    for (const key of ['major', 'minor', 'patch'] as const) {
        if (left[key] !== right[key]) {
            return left[key] < right[key] ? -1 : 1;
        }
    }

    if (left.preRelease === right.preRelease) {
        return 0;
    }
    if (left.preRelease === '') {
        return 1;
    }
    if (right.preRelease === '') {
        return -1;
    }
    return compareStrings(left.preRelease, right.preRelease);
}

export function findMaxVersion(versions: readonly string[]): string {
    let max = '';
    for (const version of versions) {
        if (max === '' || compareVersions(version, max) > 0) {
            max = version;
        }
    }
    return max;
}

/**
 * Builds the aggregated views shared by the report formats
 */
export class MatrixBuilder {
    buildSummary(projects: readonly Project[]): ReportSummary {
        const summary: ReportSummary = {
            total_projects: projects.length,
            total_dependencies: 0,
            languages: {},
            internal_external: { internal: 0, external: 0 },
            ecosystems: {},
        };

        for (const project of projects) {
            summary.languages[project.language] = (summary.languages[project.language] ?? 0) + 1;

            for (const dependency of project.dependencies) {
                summary.total_dependencies++;
                if (dependency.isInternal) {
                    summary.internal_external.internal++;
                } else {
                    summary.internal_external.external++;
                }
                summary.ecosystems[dependency.ecosystem] = (summary.ecosystems[dependency.ecosystem] ?? 0) + 1;
            }
        }

        return summary;
    }

    /**
     * Projects without dependencies are left out. Rows are ordered by repository name,
     * then project path; columns put internal dependencies first, then sort by name.
     */
    buildMatrix(projects: readonly Project[]): DependencyMatrix {
        const rows = projects
            .filter((project) => project.dependencies.length > 0)
            .sort(
                (a, b) => compareStrings(a.repository.name, b.repository.name) || compareStrings(a.path, b.path)
            );

        // Last declaration of a name wins within a project
        const byProject = rows.map((project) => {
            const lookup = new Map<string, Dependency>();
            for (const dependency of project.dependencies) {
                lookup.set(dependency.name, dependency);
            }
            return lookup;
        });

        const internalByName = new Map<string, boolean>();
        for (const lookup of byProject) {
            for (const [name, dependency] of lookup) {
                if (!internalByName.has(name)) {
                    internalByName.set(name, dependency.isInternal);
                }
            }
        }

        const columns: MatrixColumn[] = [...internalByName.entries()]
            .sort(([nameA, internalA], [nameB, internalB]) => {
                if (internalA !== internalB) {
                    return internalA ? -1 : 1;
                }
                return compareStrings(nameA, nameB);
            })
            .map(([name, isInternal]) => ({
                name,
                is_internal: isInternal,
                max_version: findMaxVersion(
                    byProject.flatMap((lookup) => {
                        const version = lookup.get(name)?.version ?? '';
                        return version === '' ? [] : [version];
                    })
                ),
            }));

        const matrix = byProject.map((lookup) =>
            columns.map((column): MatrixCell | null => {
                const dependency = lookup.get(column.name);
                if (!dependency) {
                    return null;
                }
                return {
                    version: dependency.version,
                    constraint: dependency.constraint,
                    is_internal: dependency.isInternal,
                    ecosystem: dependency.ecosystem,
                    max_version: column.max_version,
                    is_outdated:
                        column.max_version !== '' &&
                        dependency.version !== '' &&
                        compareVersions(dependency.version, column.max_version) < 0,
                };
            })
        );

        return { dependencies: columns, projects: rows, matrix };
    }
}
