import axios, { AxiosError, AxiosHeaders, AxiosInstance, AxiosRequestConfig } from 'axios';
import { GitLabClient, GitLabError, GitLabErrorCategory } from '../GitLabClient';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
    describeError: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

type Route = (params: Record<string, unknown>) => unknown;

function httpError(status: number): AxiosError {
    const config = { headers: new AxiosHeaders() };
    return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, undefined, {
        status,
        statusText: '',
        headers: {},
        config,
        data: {},
    });
}

function project(id: number, name: string, defaultBranch = 'main') {
    return { id, name, web_url: `https://gitlab.example.com/org/${name}`, default_branch: defaultBranch };
}

function stubGet(http: AxiosInstance, routes: Record<string, Route>) {
    return jest.spyOn(http, 'get').mockImplementation(async (url: string, config?: AxiosRequestConfig) => {
        const route = routes[url];
        if (!route) {
            throw httpError(404);
        }
        const params: Record<string, unknown> = config?.params ?? {};
        return route(params);
    });
}

describe('GitLabClient', () => {
    let http: AxiosInstance;
    let client: GitLabClient;

    beforeEach(() => {
        http = axios.create();
        client = new GitLabClient({ baseUrl: 'https://gitlab.example.com', token: 'test-token', perPage: 2 }, http);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('extractProjectPath', () => {
        it('strips leading and trailing slashes', () => {
            expect(client.extractProjectPath('https://gitlab.example.com/org/team/')).toBe('org/team');
        });

        it('decodes an already-encoded path', () => {
            expect(client.extractProjectPath('https://gitlab.example.com/org/my%20repo')).toBe('org/my repo');
        });

        it('passes numeric IDs through', () => {
            expect(client.extractProjectPath('1234')).toBe('1234');
        });

        it('rejects a URL without a path', () => {
            expect(() => client.extractProjectPath('https://gitlab.example.com/')).toThrow(
                'no path found in URL: https://gitlab.example.com/'
            );
        });

        it('rejects a malformed URL with an INVALID_URL error', () => {
            let caught: unknown;
            try {
                client.extractProjectPath('not a url');
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(GitLabError);
            expect(caught instanceof GitLabError && caught.category).toBe(GitLabErrorCategory.INVALID_URL);
        });
    });

    describe('resolveRepositories', () => {
        it('fails on an empty path before any request is made', async () => {
            const get = stubGet(http, {});

            await expect(client.resolveRepositories('https://gitlab.example.com')).rejects.toThrow(GitLabError);
            expect(get).not.toHaveBeenCalled();
        });

        it('returns a single repository when the path is a project', async () => {
            stubGet(http, {
                '/projects/org%2Fuser-service': () => ({ data: project(7, 'user-service', 'develop'), headers: {} }),
            });

            const repositories = await client.resolveRepositories('https://gitlab.example.com/org/user-service');

            expect(repositories).toEqual([
                {
                    id: 7,
                    name: 'user-service',
                    url: 'https://gitlab.example.com/org/user-service',
                    defaultBranch: 'develop',
                    webUrl: 'https://gitlab.example.com/org/user-service',
                },
            ]);
        });

        it('returns a group with fewer projects than a page without further requests', async () => {
            const get = stubGet(http, {
                '/groups/org': () => ({ data: { id: 42, full_path: 'org' }, headers: {} }),
                '/groups/42/projects': () => ({ data: [project(1, 'alpha')], headers: { 'x-total-pages': '1' } }),
            });

            const repositories = await client.resolveRepositories('https://gitlab.example.com/org');

            expect(repositories.map((r) => r.name)).toEqual(['alpha']);
            expect(get).toHaveBeenCalledTimes(2);
        });

        it('fetches the remaining pages of a group through the page pool', async () => {
            const pages: Record<number, ReturnType<typeof project>[]> = {
                1: [project(1, 'alpha'), project(2, 'beta')],
                2: [project(3, 'gamma'), project(4, 'delta')],
                3: [project(5, 'epsilon')],
            };
            const requestedPages: unknown[] = [];
            stubGet(http, {
                '/groups/org': () => ({ data: { id: 42, full_path: 'org' }, headers: {} }),
                '/groups/42/projects': (params) => {
                    requestedPages.push(params.page);
                    expect(params.include_subgroups).toBe(true);
                    return { data: pages[Number(params.page)], headers: { 'x-total-pages': '3' } };
                },
            });

            const repositories = await client.resolveRepositories('https://gitlab.example.com/org');

            expect(repositories.map((r) => r.id).sort()).toEqual([1, 2, 3, 4, 5]);
            expect(requestedPages.sort()).toEqual([1, 2, 3]);
        });

        it('discards everything when one page fails', async () => {
            stubGet(http, {
                '/groups/org': () => ({ data: { id: 42, full_path: 'org' }, headers: {} }),
                '/groups/42/projects': (params) => {
                    if (params.page === 3) {
                        throw httpError(500);
                    }
                    return { data: [project(1, 'alpha'), project(2, 'beta')], headers: { 'x-total-pages': '3' } };
                },
            });

            await expect(client.resolveRepositories('https://gitlab.example.com/org')).rejects.toThrow(
                'failed to get page 3 for group 42: Request failed with status code 500'
            );
        });

        it('follows x-next-page when the total is not reported', async () => {
            stubGet(http, {
                '/groups/org': () => ({ data: { id: 42, full_path: 'org' }, headers: {} }),
                '/groups/42/projects': (params) =>
                    params.page === 1
                        ? { data: [project(1, 'alpha'), project(2, 'beta')], headers: { 'x-next-page': '2' } }
                        : { data: [project(3, 'gamma')], headers: { 'x-next-page': '' } },
            });

            const repositories = await client.resolveRepositories('https://gitlab.example.com/org');

            expect(repositories.map((r) => r.name)).toEqual(['alpha', 'beta', 'gamma']);
        });

        it('reports a NOT_FOUND error naming the path when neither probe succeeds', async () => {
            stubGet(http, {});

            const error = await client.resolveRepositories('https://gitlab.example.com/org/missing').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(GitLabError);
            expect(error instanceof GitLabError && error.category).toBe(GitLabErrorCategory.NOT_FOUND);
            expect(error instanceof Error && error.message).toBe(
                'failed to get project or group org/missing: Request failed with status code 404'
            );
        });
    });

    describe('listFiles', () => {
        it('pages through the tree on the default branch and keeps only blobs', async () => {
            const refs: unknown[] = [];
            stubGet(http, {
                '/projects/org%2Fapi': () => ({ data: project(9, 'api', 'trunk'), headers: {} }),
                '/projects/org%2Fapi/repository/tree': (params) => {
                    refs.push(params.ref);
                    return params.page === 1
                        ? {
                              data: [
                                  { path: 'go.mod', type: 'blob' },
                                  { path: 'backend', type: 'tree' },
                              ],
                              headers: {},
                          }
                        : { data: [{ path: 'backend/package.json', type: 'blob' }], headers: {} };
                },
            });

            const files = await client.listFiles('https://gitlab.example.com/org/api');

            expect(files).toEqual(['go.mod', 'backend/package.json']);
            expect(refs).toEqual(['trunk', 'trunk']);
        });

        it('wraps a tree failure with the project path', async () => {
            stubGet(http, {
                '/projects/org%2Fapi': () => ({ data: project(9, 'api'), headers: {} }),
                '/projects/org%2Fapi/repository/tree': () => {
                    throw httpError(403);
                },
            });

            await expect(client.listFiles('https://gitlab.example.com/org/api')).rejects.toMatchObject({
                category: GitLabErrorCategory.AUTH_ERROR,
                message: 'failed to get repository tree for org/api: Request failed with status code 403',
            });
        });
    });

    describe('getFileContent', () => {
        it('decodes base64 content and looks the project up only once', async () => {
            const get = stubGet(http, {
                '/projects/org%2Fapi': () => ({ data: project(9, 'api'), headers: {} }),
                '/projects/org%2Fapi/repository/files/backend%2Fgo.mod': () => ({
                    data: { content: Buffer.from('module example.com/api\n').toString('base64'), encoding: 'base64' },
                    headers: {},
                }),
            });

            const first = await client.getFileContent('https://gitlab.example.com/org/api', 'backend/go.mod');
            const second = await client.getFileContent('https://gitlab.example.com/org/api', 'backend/go.mod');

            expect(first.toString('utf-8')).toBe('module example.com/api\n');
            expect(second.equals(first)).toBe(true);
            const projectLookups = get.mock.calls.filter(([url]) => url === '/projects/org%2Fapi');
            expect(projectLookups).toHaveLength(1);
        });
    });

    describe('checkPermissions', () => {
        it('maps a 401 to an AUTH_ERROR', async () => {
            stubGet(http, {
                '/user': () => {
                    throw httpError(401);
                },
            });

            await expect(client.checkPermissions()).rejects.toMatchObject({
                name: 'GitLabError',
                category: GitLabErrorCategory.AUTH_ERROR,
            });
        });

        it('resolves when the token can read the current user', async () => {
            stubGet(http, { '/user': () => ({ data: { username: 'analyst' }, headers: {} }) });

            await expect(client.checkPermissions()).resolves.toBeUndefined();
        });
    });
});
