import { v4 as uuidv4 } from 'uuid';
import { Project } from '../models/Project';
import { ReportFormat } from '../config/schema';
import { ReportGenerator } from './ReportGenerator';
import { DependencyMatrix, MatrixBuilder, MatrixCell, ReportSummary } from './MatrixBuilder';
import { replaceExtension, writeFile } from '../utils/fileUtils';
import logger, { describeError } from '../utils/logger';

export class ReportError extends Error {
    constructor(
        message: string,
        public readonly filePath: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ReportError';
    }
}

export interface MatrixReportOptions {
    htmlFile: string;
    title: string;
    formats: ReportFormat[];
}

const CSV_HEADER = [
    'Project ID',
    'Project Name',
    'Repository Name',
    'Language',
    'Dependency Name',
    'Version',
    'Constraint',
    'Is Internal',
    'Ecosystem',
];

export function escapeHtml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

/**
 * RFC 4180 field: quoted when it holds a comma, quote or line break
 */
export function csvField(value: string): string {
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

/**
 * Writes the dependency matrix as HTML, CSV and JSON. CSV and JSON files sit
 * beside the HTML file, with the extension swapped.
 */
export class MatrixReportGenerator implements ReportGenerator {
    private readonly builder = new MatrixBuilder();

    constructor(private readonly options: MatrixReportOptions) {}

    async generate(projects: Project[]): Promise<string[]> {
        const written: string[] = [];

        for (const format of this.options.formats) {
            const reportPath = this.pathFor(format);
            const content = this.render(format, projects);
            try {
                await writeFile(reportPath, content);
            } catch (error) {
                throw new ReportError(
                    `failed to write ${format} report ${reportPath}: ${describeError(error)}`,
                    reportPath,
                    { cause: error }
                );
            }
            logger.info(`Generated ${format.toUpperCase()} report: ${reportPath}`);
            written.push(reportPath);
        }

        return written;
    }

    pathFor(format: ReportFormat): string {
        return format === 'html' ? this.options.htmlFile : replaceExtension(this.options.htmlFile, `.${format}`);
    }

    render(format: ReportFormat, projects: Project[]): string {
        switch (format) {
            case 'html':
                return this.renderHtml(projects);
            case 'csv':
                return this.renderCsv(projects);
            case 'json':
                return this.renderJson(projects);
        }
    }

    renderCsv(projects: Project[]): string {
        const lines = [CSV_HEADER.map(csvField).join(',')];
        for (const project of projects) {
            for (const dependency of project.dependencies) {
                const record = [
                    project.id,
                    project.name,
                    project.repository.name,
                    project.language,
                    dependency.name,
                    dependency.version,
                    dependency.constraint,
                    String(dependency.isInternal),
                    dependency.ecosystem,
                ];
                lines.push(record.map(csvField).join(','));
            }
        }
        return lines.join('\r\n') + '\r\n';
    }

    renderJson(projects: Project[], runId: string = uuidv4()): string {
        const report = {
            run_id: runId,
            title: this.options.title,
            generated_at: new Date().toISOString(),
            summary: this.builder.buildSummary(projects),
            projects: projects.map((project) => ({
                id: project.id,
                name: project.name,
                path: project.path,
                language: project.language,
                repository: project.repository,
                dependency_files: project.dependencyFiles.map((file) => ({
                    path: file.path,
                    language: file.language,
                    last_modified: file.lastModified.toISOString(),
                })),
                dependencies: project.dependencies,
            })),
        };
        return JSON.stringify(report, null, 2) + '\n';
    }

    renderHtml(projects: Project[]): string {
        const summary = this.builder.buildSummary(projects);
        const matrix = this.builder.buildMatrix(projects);
        const title = escapeHtml(this.options.title);

        return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${title}</title>
    ${this.getStyles()}
</head>
<body>
    <div class="container">
        <header>
            <h1>${title}</h1>
            <div class="meta">Generated at ${escapeHtml(new Date().toLocaleString())}</div>
        </header>
        ${this.buildSummary(summary)}
        ${this.buildMatrix(matrix)}
    </div>
    ${this.getScripts()}
</body>
</html>
`;
    }

    private buildSummary(summary: ReportSummary): string {
        const breakdown = (counts: Record<string, number>) =>
            Object.keys(counts)
                .sort()
                .map((key) => `<span class="chip">${escapeHtml(key)}: ${counts[key]}</span>`)
                .join('');

        return `
        <section class="summary">
            <h2>Summary</h2>
            <div class="metrics-grid">
                <div class="metric">
                    <div class="metric-value">${summary.total_projects}</div>
                    <div class="metric-label">Projects</div>
                </div>
                <div class="metric">
                    <div class="metric-value">${summary.total_dependencies}</div>
                    <div class="metric-label">Dependencies</div>
                </div>
                <div class="metric internal">
                    <div class="metric-value">${summary.internal_external.internal}</div>
                    <div class="metric-label">Internal</div>
                </div>
                <div class="metric">
                    <div class="metric-value">${summary.internal_external.external}</div>
                    <div class="metric-label">External</div>
                </div>
            </div>
            <div class="breakdown"><strong>Languages:</strong> ${breakdown(summary.languages)}</div>
            <div class="breakdown"><strong>Ecosystems:</strong> ${breakdown(summary.ecosystems)}</div>
        </section>`;
    }

    private buildMatrix(matrix: DependencyMatrix): string {
        if (matrix.projects.length === 0) {
            return '<section><p>No dependencies found.</p></section>';
        }

        const header = matrix.dependencies
            .map(
                (column) =>
                    `<th class="dep ${column.is_internal ? 'internal' : 'external'}" title="latest: ${escapeHtml(column.max_version)}">${escapeHtml(column.name)}</th>`
            )
            .join('');

        const rows = matrix.projects
            .map((project, row) => {
                const cells = (matrix.matrix[row] ?? []).map((cell) => this.buildCell(cell)).join('');
                return `
                    <tr data-language="${escapeHtml(project.language)}">
                        <th class="project" title="${escapeHtml(project.id)}">
                            <a href="${escapeHtml(project.repository.webUrl)}">${escapeHtml(project.name)}</a>
                        </th>
                        ${cells}
                    </tr>`;
            })
            .join('');

        return `
        <section class="matrix">
            <h2>Dependency Matrix</h2>
            <div class="filters">
                <input id="search" type="search" placeholder="Filter projects or dependencies">
                <select id="kind">
                    <option value="all">All dependencies</option>
                    <option value="internal">Internal only</option>
                    <option value="external">External only</option>
                </select>
            </div>
            <div class="table-wrapper">
                <table id="matrix">
                    <thead>
                        <tr><th class="project">Project</th>${header}</tr>
                    </thead>
                    <tbody>${rows}
                    </tbody>
                </table>
            </div>
        </section>`;
    }

    private buildCell(cell: MatrixCell | null): string {
        if (!cell) {
            return '<td class="empty"></td>';
        }
        const classes = [cell.is_internal ? 'internal' : 'external'];
        if (cell.is_outdated) {
            classes.push('outdated');
        }
        const tooltip = `constraint: ${cell.constraint} | ecosystem: ${cell.ecosystem} | latest: ${cell.max_version}`;
        return `<td class="${classes.join(' ')}" title="${escapeHtml(tooltip)}">${escapeHtml(cell.version || cell.constraint)}</td>`;
    }

    private getStyles(): string {
        return `<style>
        * { margin: 0; padding: 0; box-sizing: border-box; }
        body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; background: #f5f7fa; color: #333; line-height: 1.6; }
        .container { max-width: 100%; margin: 0 auto; padding: 20px; }
        header { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: white; padding: 30px; border-radius: 12px; margin-bottom: 30px; }
        header h1 { font-size: 2em; margin-bottom: 10px; }
        section { background: white; padding: 25px; border-radius: 12px; margin-bottom: 20px; box-shadow: 0 2px 4px rgba(0,0,0,0.05); }
        h2 { margin-bottom: 20px; color: #1f2937; font-size: 1.5em; }
        .metrics-grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(150px, 1fr)); gap: 20px; margin-bottom: 15px; }
        .metric { text-align: center; padding: 20px; background: #f9fafb; border-radius: 8px; }
        .metric-value { font-size: 2em; font-weight: bold; color: #1f2937; }
        .metric-label { color: #6b7280; font-size: 0.9em; }
        .metric.internal .metric-value { color: #4338ca; }
        .breakdown { margin: 6px 0; }
        .chip { display: inline-block; background: #e0e7ff; color: #4338ca; padding: 2px 10px; border-radius: 12px; font-size: 0.85em; margin-right: 6px; }
        .filters { display: flex; gap: 10px; margin-bottom: 15px; }
        .filters input { flex: 1; padding: 8px; border: 1px solid #d1d5db; border-radius: 6px; }
        .filters select { padding: 8px; border: 1px solid #d1d5db; border-radius: 6px; }
        .table-wrapper { overflow: auto; max-height: 80vh; }
        table { border-collapse: collapse; font-size: 0.85em; }
        th, td { padding: 6px 10px; border: 1px solid #e5e7eb; white-space: nowrap; }
        thead th { position: sticky; top: 0; background: #f9fafb; }
        th.project { position: sticky; left: 0; background: #f9fafb; text-align: left; }
        th.dep { writing-mode: vertical-rl; transform: rotate(180deg); }
        th.dep.internal { color: #4338ca; }
        td.internal { background: #eef2ff; }
        td.external { background: #f0fdf4; }
        td.outdated { background: #fef3c7; color: #92400e; font-weight: 600; }
        .hidden { display: none; }
    </style>`;
    }

    private getScripts(): string {
        return `<script>
        function applyFilters() {
            const query = document.getElementById('search').value.toLowerCase();
            const kind = document.getElementById('kind').value;
            const table = document.getElementById('matrix');
            const headers = Array.from(table.querySelectorAll('thead th.dep'));
            const visibleColumns = headers.map((th) => {
                const show = kind === 'all' || th.classList.contains(kind);
                th.classList.toggle('hidden', !show);
                return show;
            });
            table.querySelectorAll('tbody tr').forEach((row) => {
                const name = row.querySelector('th.project').textContent.toLowerCase();
                const cells = Array.from(row.querySelectorAll('td'));
                cells.forEach((cell, i) => cell.classList.toggle('hidden', !visibleColumns[i]));
                const depMatch = headers.some((th, i) =>
                    visibleColumns[i] && cells[i].textContent !== '' && th.textContent.toLowerCase().includes(query));
                row.classList.toggle('hidden', query !== '' && !name.includes(query) && !depMatch);
            });
        }
        document.addEventListener('DOMContentLoaded', () => {
            document.getElementById('search').addEventListener('input', applyFilters);
            document.getElementById('kind').addEventListener('change', applyFilters);
        });
    </script>`;
    }
}
