import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError, ConfigLoader } from '../ConfigLoader';
import { internalPatterns, repositorySources } from '../schema';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
    describeError: (error: unknown) => (error instanceof Error ? error.message : String(error)),
    isLogLevel: (value: string | undefined) => ['error', 'warn', 'info', 'debug'].includes(String(value)),
}));

const ORIGINAL_ENV = { ...process.env };
const OVERRIDE_VARS = [
    'GITLAB_BASE_URL',
    'GITLAB_TOKEN',
    'OUTPUT_HTML_FILE',
    'OUTPUT_TITLE',
    'ANALYSIS_TIMEOUT_MINUTES',
    'LOG_LEVEL',
    'LOG_DIR',
];

const MINIMAL = `
gitlab:
  base_url: https://gitlab.example.com
  token: test-token
repositories:
  - url: https://gitlab.example.com/org/platform
`;

describe('ConfigLoader', () => {
    const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'config-loader-'));
    let counter = 0;

    function writeConfig(content: string): string {
        counter++;
        const file = path.join(tmpRoot, `config-${counter}.yaml`);
        fs.writeFileSync(file, content);
        return file;
    }

    beforeEach(() => {
        for (const name of OVERRIDE_VARS) {
            delete process.env[name];
        }
    });

    afterEach(() => {
        process.env = { ...ORIGINAL_ENV };
    });

    afterAll(() => {
        fs.rmSync(tmpRoot, { recursive: true, force: true });
    });

    it('fills in defaults around a minimal file', async () => {
        const loader = new ConfigLoader();
        const file = writeConfig(MINIMAL);

        const config = await loader.load(file);

        expect(config.gitlab).toEqual({ base_url: 'https://gitlab.example.com', token: 'test-token' });
        expect(config.repositories).toEqual([{ url: 'https://gitlab.example.com/org/platform' }]);
        expect(config.output).toEqual({
            html_file: 'dependency-matrix.html',
            title: 'Dependency Matrix Report',
            formats: ['html'],
        });
        expect(config.timeout.analysis_timeout_minutes).toBe(10);
        expect(config.concurrency).toEqual({
            page_workers: 5,
            repository_workers: 0,
            project_workers: 5,
            file_workers: 3,
            classification_threshold: 10,
        });
        expect(config.logging).toEqual({ level: 'info', file_dir: '' });
        expect(loader.getConfigSource()).toBe(file);
    });

    it('reads every section of a full file', async () => {
        const file = writeConfig(`
gitlab:
  base_url: https://gitlab.example.com
  token: test-token
repositories:
  - https://gitlab.example.com/org/api
  - id: 1234
    name: billing
internal:
  patterns: ["github.com/acme/*", "@acme/"]
  domains: ["acme.io"]
output:
  html_file: out/matrix.html
  title: Acme Dependencies
  formats: [html, csv, json]
timeout:
  analysis_timeout_minutes: 30
concurrency:
  page_workers: 2
  repository_workers: 4
  project_workers: 8
  file_workers: 1
  classification_threshold: 0
logging:
  level: debug
  file_dir: logs
`);

        const config = await new ConfigLoader().load(file);

        expect(config.repositories).toEqual([
            { url: 'https://gitlab.example.com/org/api' },
            { id: 1234, name: 'billing' },
        ]);
        expect(repositorySources(config)).toEqual(['https://gitlab.example.com/org/api', '1234']);
        expect(internalPatterns(config)).toEqual(['github.com/acme/*', '@acme/', 'acme.io']);
        expect(config.output.formats).toEqual(['html', 'csv', 'json']);
        expect(config.timeout.analysis_timeout_minutes).toBe(30);
        expect(config.concurrency.repository_workers).toBe(4);
        expect(config.concurrency.classification_threshold).toBe(0);
        expect(config.logging).toEqual({ level: 'debug', file_dir: 'logs' });
    });

    it('lets environment variables override the file', async () => {
        process.env.GITLAB_BASE_URL = 'https://git.internal.example.com';
        process.env.GITLAB_TOKEN = 'env-token';
        process.env.OUTPUT_HTML_FILE = 'env.html';
        process.env.OUTPUT_TITLE = 'From Env';
        process.env.ANALYSIS_TIMEOUT_MINUTES = '3';
        process.env.LOG_LEVEL = 'warn';
        process.env.LOG_DIR = '/var/log/matrix';

        const config = await new ConfigLoader().load(writeConfig(MINIMAL));

        expect(config.gitlab).toEqual({ base_url: 'https://git.internal.example.com', token: 'env-token' });
        expect(config.output.html_file).toBe('env.html');
        expect(config.output.title).toBe('From Env');
        expect(config.timeout.analysis_timeout_minutes).toBe(3);
        expect(config.logging).toEqual({ level: 'warn', file_dir: '/var/log/matrix' });
    });

    it('takes the token from the environment when the file leaves it out', async () => {
        process.env.GITLAB_TOKEN = 'env-token';
        const file = writeConfig(`
gitlab:
  base_url: https://gitlab.example.com
repositories:
  - url: https://gitlab.example.com/org/platform
`);

        const config = await new ConfigLoader().load(file);

        expect(config.gitlab.token).toBe('env-token');
    });

    it('rejects a non-integer timeout override', async () => {
        process.env.ANALYSIS_TIMEOUT_MINUTES = 'soon';

        await expect(new ConfigLoader().load(writeConfig(MINIMAL))).rejects.toThrow(
            'ANALYSIS_TIMEOUT_MINUTES must be an integer (got soon)'
        );
    });

    it('requires a path', async () => {
        await expect(new ConfigLoader().load('')).rejects.toThrow('config path is required');
    });

    it('reports a missing file', async () => {
        const missing = path.join(tmpRoot, 'missing.yaml');

        await expect(new ConfigLoader().load(missing)).rejects.toThrow(`config file does not exist: ${missing}`);
    });

    it('wraps YAML syntax errors', async () => {
        const file = writeConfig('gitlab: [unclosed\n');

        const error = await new ConfigLoader().load(file).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ConfigError);
        expect(error instanceof Error && error.message.startsWith('failed to read config file: ')).toBe(true);
    });

    it('rejects a document that is not a mapping', async () => {
        await expect(new ConfigLoader().load(writeConfig('- a\n- b\n'))).rejects.toThrow(
            'config file must contain a YAML mapping'
        );
    });

    it('rejects an unknown report format', async () => {
        const file = writeConfig(`${MINIMAL}output:\n  formats: [html, pdf]\n`);

        await expect(new ConfigLoader().load(file)).rejects.toThrow('output.formats contains unsupported format: pdf');
    });

    it('rejects an unknown log level', async () => {
        const file = writeConfig(`${MINIMAL}logging:\n  level: verbose\n`);

        await expect(new ConfigLoader().load(file)).rejects.toMatchObject({
            name: 'ConfigError',
            field: 'logging.level',
        });
    });

    describe('validation', () => {
        it.each([
            [
                'an empty file',
                '',
                'config validation failed: gitlab.base_url is required',
            ],
            [
                'a malformed base URL',
                'gitlab:\n  base_url: not a url\n  token: test-token\n',
                'config validation failed: gitlab.base_url is not a valid URL: not a url',
            ],
            [
                'a missing token',
                'gitlab:\n  base_url: https://gitlab.example.com\n',
                'config validation failed: gitlab.token is required',
            ],
            [
                'no repositories',
                'gitlab:\n  base_url: https://gitlab.example.com\n  token: test-token\n',
                'config validation failed: at least one repository must be configured',
            ],
            [
                'a repository with neither url nor id',
                `${MINIMAL}  - name: nameless\n`,
                'config validation failed: repository[1] must have either url or id specified',
            ],
            [
                'a repository with both url and id',
                `${MINIMAL}  - url: https://gitlab.example.com/org/api\n    id: 7\n`,
                'config validation failed: repository[1] should not have both url and id specified',
            ],
            [
                'an empty internal pattern',
                `${MINIMAL}internal:\n  patterns: ["@acme/", ""]\n`,
                'config validation failed: internal.patterns[1] must not be empty',
            ],
            [
                'a zero timeout',
                `${MINIMAL}timeout:\n  analysis_timeout_minutes: 0\n`,
                'config validation failed: timeout.analysis_timeout_minutes must be positive',
            ],
            [
                'zero file workers',
                `${MINIMAL}concurrency:\n  file_workers: 0\n`,
                'config validation failed: concurrency.file_workers must be at least 1',
            ],
            [
                'negative repository workers',
                `${MINIMAL}concurrency:\n  repository_workers: -1\n`,
                'config validation failed: concurrency.repository_workers must not be negative',
            ],
        ])('rejects %s', async (_label, content, message) => {
            await expect(new ConfigLoader().load(writeConfig(content))).rejects.toThrow(message);
        });
    });
});
