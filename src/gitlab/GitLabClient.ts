import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { Repository } from '../models/Repository';
import { SourceControlClient } from './SourceControlClient';
import { runConcurrent } from '../utils/concurrency';
import logger, { describeError } from '../utils/logger';

export enum GitLabErrorCategory {
    INVALID_URL = 'INVALID_URL',
    NOT_FOUND = 'NOT_FOUND',
    AUTH_ERROR = 'AUTH_ERROR',
    REQUEST_FAILED = 'REQUEST_FAILED',
}

export class GitLabError extends Error {
    constructor(
        message: string,
        public readonly category: GitLabErrorCategory,
        public readonly path: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'GitLabError';
    }
}

export interface GitLabClientOptions {
    baseUrl: string;
    token: string;
    perPage?: number;
    pageWorkers?: number;
    requestTimeoutMs?: number;
}

// Subsets of the GitLab REST v4 payloads this client reads
interface GitLabProject {
    id: number;
    name: string;
    web_url: string;
    default_branch?: string | null;
}

interface GitLabGroup {
    id: number;
    full_path: string;
}

interface GitLabTreeItem {
    path: string;
    type: 'blob' | 'tree' | 'commit';
}

interface GitLabFile {
    content: string;
    encoding: string;
}

interface GitLabUser {
    username: string;
}

const DEFAULT_PER_PAGE = 100;
const DEFAULT_PAGE_WORKERS = 5;

/**
 * GitLab REST API client. Resolves groups (with subgroups) to repositories and
 * reads repository trees and files from the default branch.
 */
export class GitLabClient implements SourceControlClient {
    private readonly http: AxiosInstance;
    private readonly perPage: number;
    private readonly pageWorkers: number;
    private readonly projectCache = new Map<string, Promise<GitLabProject>>();

    constructor(options: GitLabClientOptions, http?: AxiosInstance) {
        this.perPage = options.perPage ?? DEFAULT_PER_PAGE;
        this.pageWorkers = options.pageWorkers ?? DEFAULT_PAGE_WORKERS;
        this.http =
            http ??
            axios.create({
                baseURL: `${options.baseUrl.replace(/\/+$/, '')}/api/v4`,
                headers: { 'PRIVATE-TOKEN': options.token },
                timeout: options.requestTimeoutMs ?? 30000,
            });
    }

    async checkPermissions(signal?: AbortSignal): Promise<void> {
        try {
            const response = await this.http.get<GitLabUser>('/user', { signal });
            logger.debug(`Authenticated to GitLab as ${response.data.username}`);
        } catch (error) {
            throw this.wrapError(error, '', 'failed to verify token permissions', signal);
        }
    }

    async resolveRepositories(sourceUrl: string, signal?: AbortSignal): Promise<Repository[]> {
        const path = this.extractProjectPath(sourceUrl);
        logger.debug(`Resolving ${sourceUrl} (path: ${path})`);

        let group: GitLabGroup | undefined;
        try {
            const response = await this.http.get<GitLabGroup>(`/groups/${encodeURIComponent(path)}`, { signal });
            group = response.data;
        } catch (error) {
            signal?.throwIfAborted();
            // Not a group (or not visible as one): fall through to the project probe
            logger.debug(`${path} is not a group: ${describeError(error)}`);
        }

        if (group) {
            const repositories = await this.getGroupProjects(group.id, signal);
            logger.info(`Group ${group.full_path} resolved to ${repositories.length} repositories`);
            return repositories;
        }

        try {
            const project = await this.getProject(path, signal);
            return [this.toRepository(project)];
        } catch (error) {
            throw this.wrapError(error, path, `failed to get project or group ${path}`, signal);
        }
    }

    async listFiles(repoUrl: string, signal?: AbortSignal): Promise<string[]> {
        const path = this.extractProjectPath(repoUrl);
        const project = await this.getProjectOrThrow(path, signal);

        const files: string[] = [];
        for (let page = 1; ; page++) {
            let tree: GitLabTreeItem[];
            try {
                const response = await this.http.get<GitLabTreeItem[]>(
                    `/projects/${encodeURIComponent(path)}/repository/tree`,
                    {
                        params: {
                            recursive: true,
                            ref: project.default_branch ?? undefined,
                            per_page: this.perPage,
                            page,
                        },
                        signal,
                    }
                );
                tree = response.data;
            } catch (error) {
                throw this.wrapError(error, path, `failed to get repository tree for ${path}`, signal);
            }

            for (const item of tree) {
                if (item.type === 'blob') {
                    files.push(item.path);
                }
            }

            if (tree.length < this.perPage) {
                break;
            }
        }

        logger.debug(`Listed ${files.length} files in ${path}`);
        return files;
    }

    async getFileContent(repoUrl: string, filePath: string, signal?: AbortSignal): Promise<Buffer> {
        const path = this.extractProjectPath(repoUrl);
        const project = await this.getProjectOrThrow(path, signal);

        try {
            const response = await this.http.get<GitLabFile>(
                `/projects/${encodeURIComponent(path)}/repository/files/${encodeURIComponent(filePath)}`,
                { params: { ref: project.default_branch ?? undefined }, signal }
            );
            const { content, encoding } = response.data;
            return Buffer.from(content, encoding === 'base64' ? 'base64' : 'utf-8');
        } catch (error) {
            throw this.wrapError(error, path, `failed to get file ${filePath} from project ${path}`, signal);
        }
    }

    /**
     * Path of a project or group inside a GitLab URL ("https://gitlab.com/org/team/" -> "org/team").
     * A bare numeric ID is passed through, since the API accepts IDs wherever it accepts paths.
     */
    extractProjectPath(gitlabUrl: string): string {
        const trimmed = gitlabUrl.trim();
        if (/^\d+$/.test(trimmed)) {
            return trimmed;
        }

        let parsed: URL;
        try {
            parsed = new URL(trimmed);
        } catch (error) {
            throw new GitLabError(`invalid URL: ${gitlabUrl}`, GitLabErrorCategory.INVALID_URL, '', { cause: error });
        }

        const path = parsed.pathname.replace(/^\/+/, '').replace(/\/+$/, '');
        if (path === '') {
            throw new GitLabError(`no path found in URL: ${gitlabUrl}`, GitLabErrorCategory.INVALID_URL, '');
        }

        // Decode so the path is not encoded twice when it goes back into a request
        try {
            return decodeURIComponent(path);
        } catch {
            return path;
        }
    }

    private convertProjectsToRepositories(projects: GitLabProject[]): Repository[] {
        return projects.map((project) => this.toRepository(project));
    }

    private toRepository(project: GitLabProject): Repository {
        return {
            id: project.id,
            name: project.name,
            url: project.web_url,
            defaultBranch: project.default_branch ?? '',
            webUrl: project.web_url,
        };
    }

    /**
     * Every project of a group and its subgroups. Page 1 tells how many pages
     * there are; the rest are fetched through a bounded pool.
     */
    private async getGroupProjects(groupId: number, signal?: AbortSignal): Promise<Repository[]> {
        const firstPage = await this.fetchGroupPage(groupId, 1, signal);
        const repositories = this.convertProjectsToRepositories(firstPage.data);

        if (firstPage.data.length < this.perPage) {
            return repositories;
        }

        const totalPages = readIntHeader(firstPage, 'x-total-pages');
        if (totalPages === undefined) {
            // GitLab drops the total headers for very large result sets
            return [...repositories, ...(await this.walkGroupPages(groupId, firstPage, signal))];
        }
        if (totalPages <= 1) {
            return repositories;
        }

        logger.debug(`Group ${groupId} has ${totalPages} pages, fetching with ${this.pageWorkers} workers`);
        const remainingPages = Array.from({ length: totalPages - 1 }, (_, i) => i + 2);
        const pages = await runConcurrent(
            remainingPages,
            this.pageWorkers,
            async (page) => {
                const response = await this.fetchGroupPage(groupId, page, signal);
                return this.convertProjectsToRepositories(response.data);
            },
            signal
        );

        return [...repositories, ...pages.flat()];
    }

    private async walkGroupPages(
        groupId: number,
        firstPage: AxiosResponse<GitLabProject[]>,
        signal?: AbortSignal
    ): Promise<Repository[]> {
        const repositories: Repository[] = [];
        let nextPage = readIntHeader(firstPage, 'x-next-page');
        while (nextPage !== undefined) {
            const response = await this.fetchGroupPage(groupId, nextPage, signal);
            repositories.push(...this.convertProjectsToRepositories(response.data));
            nextPage = readIntHeader(response, 'x-next-page');
        }
        return repositories;
    }

    private async fetchGroupPage(
        groupId: number,
        page: number,
        signal?: AbortSignal
    ): Promise<AxiosResponse<GitLabProject[]>> {
        try {
            return await this.http.get<GitLabProject[]>(`/groups/${groupId}/projects`, {
                params: { include_subgroups: true, per_page: this.perPage, page },
                signal,
            });
        } catch (error) {
            throw this.wrapError(error, String(groupId), `failed to get page ${page} for group ${groupId}`, signal);
        }
    }

    /**
     * Project metadata is looked up once per path and shared by concurrent callers
     */
    private getProject(path: string, signal?: AbortSignal): Promise<GitLabProject> {
        const cached = this.projectCache.get(path);
        if (cached) {
            return cached;
        }

        const request = this.http
            .get<GitLabProject>(`/projects/${encodeURIComponent(path)}`, { signal })
            .then((response) => response.data)
            .catch((error: unknown) => {
                this.projectCache.delete(path);
                throw error;
            });
        this.projectCache.set(path, request);
        return request;
    }

    private async getProjectOrThrow(path: string, signal?: AbortSignal): Promise<GitLabProject> {
        try {
            return await this.getProject(path, signal);
        } catch (error) {
            throw this.wrapError(error, path, `failed to get project ${path}`, signal);
        }
    }

    private wrapError(error: unknown, path: string, message: string, signal?: AbortSignal): Error {
        if (signal?.aborted) {
            return error instanceof Error ? error : new Error(String(error));
        }
        if (error instanceof GitLabError) {
            return error;
        }

        let category = GitLabErrorCategory.REQUEST_FAILED;
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            if (status === 401 || status === 403) {
                category = GitLabErrorCategory.AUTH_ERROR;
            } else if (status === 404) {
                category = GitLabErrorCategory.NOT_FOUND;
            }
        }
        return new GitLabError(`${message}: ${describeError(error)}`, category, path, { cause: error });
    }
}

function readIntHeader(response: AxiosResponse, name: string): number | undefined {
    const raw: unknown = response.headers[name];
    if (typeof raw !== 'string' && typeof raw !== 'number') {
        return undefined;
    }
    const value = Number.parseInt(String(raw), 10);
    return Number.isNaN(value) ? undefined : value;
}
