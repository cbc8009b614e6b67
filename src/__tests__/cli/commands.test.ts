import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createProgram } from '../../cli/index';
import { stripAnsi } from '../../cli/formatters/icons';
import { UpdateDaemon } from '../../daemon/updateDaemon';
import { FakeRunner, FAST_FORWARD, UP_TO_DATE } from '../helpers/fakeRunner';

const CONFIG = [
    'intervalMinutes: 5',
    'projects:',
    '  - name: api',
    '    path: /srv/api',
    '    type: pm2',
    '    buildCommand: npm ci && npm run build',
    '  - name: docs',
    '    path: /srv/docs',
    '    type: static',
    '',
].join('\n');

describe('updatectl CLI', () => {
    let tempDir: string;
    let configPath: string;
    let log: MockInstance;
    let stderr: MockInstance;

    async function run(...args: string[]): Promise<void> {
        await createProgram().parseAsync(['node', 'updatectl', '-c', configPath, ...args]);
    }

    function printed(): string[] {
        return log.mock.calls.map(call => stripAnsi(String(call[0])));
    }

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-test-'));
        configPath = path.join(tempDir, 'updatectl.yaml');
        fs.writeFileSync(configPath, CONFIG);

        log = vi.spyOn(console, 'log').mockImplementation(() => {});
        stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
        vi.spyOn(process, 'exit').mockImplementation((code) => {
            throw new Error(`process.exit(${code})`);
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    describe('list', () => {
        it('prints the configured projects as a table', async () => {
            await run('list');

            expect(printed()[0].split('\n')).toEqual([
                'Name  Type    Path       Build',
                '────  ──────  ─────────  ───────────────────────',
                'api   pm2     /srv/api   npm ci && npm run build',
                'docs  static  /srv/docs  -',
            ]);
        });

        it('prints JSON when asked', async () => {
            await run('list', '--json');

            expect(JSON.parse(printed()[0])).toEqual([
                { name: 'api', path: '/srv/api', repo: '', type: 'pm2', buildCommand: 'npm ci && npm run build' },
                { name: 'docs', path: '/srv/docs', repo: '', type: 'static', buildCommand: '' },
            ]);
        });

        it('says so when no projects are configured', async () => {
            fs.writeFileSync(configPath, 'intervalMinutes: 5\n');

            await run('list');

            expect(printed()).toEqual(['No projects configured.']);
        });

        it('exits 1 when the config cannot be read', async () => {
            fs.rmSync(configPath);

            await expect(run('list')).rejects.toThrow('process.exit(1)');
            expect(stderr).toHaveBeenCalledWith(expect.stringContaining('Failed to read config: ENOENT'));
        });
    });

    describe('init', () => {
        it('writes the starter config once', async () => {
            configPath = path.join(tempDir, 'etc', 'updatectl.yaml');

            await run('init');
            await run('init');

            expect(printed()).toEqual([
                `Created config at ${configPath}`,
                `Config already exists at ${configPath}`,
            ]);
            expect(fs.existsSync(configPath)).toBe(true);
        });
    });

    describe('build', () => {
        it('does nothing for a project without a build command', async () => {
            await run('build', 'docs');

            expect(printed()).toEqual(['No build command configured for project docs']);
        });

        it('exits 1 for an unknown project', async () => {
            await expect(run('build', 'shop')).rejects.toThrow('process.exit(1)');
            expect(stderr).toHaveBeenCalledWith('Project shop not found in configuration');
            expect(log).not.toHaveBeenCalled();
        });
    });

    describe('update', () => {
        let runner: FakeRunner;
        let sitePath: string;

        async function runWithFakeProcesses(...args: string[]): Promise<void> {
            const program = createProgram({
                createDaemon: (config, options) => new UpdateDaemon(config, { ...options, runner }),
            });
            await program.parseAsync(['node', 'updatectl', '-c', configPath, ...args]);
        }

        beforeEach(() => {
            runner = new FakeRunner();
            sitePath = path.join(tempDir, 'site');
            fs.mkdirSync(sitePath);
            fs.writeFileSync(configPath, [
                'projects:',
                '  - name: site',
                `    path: ${sitePath}`,
                '    type: pm2',
                '    buildCommand: npm run build',
                '',
            ].join('\n'));
        });

        it('prints each step and the pulled changes', async () => {
            runner.respond('git', FAST_FORWARD);

            await runWithFakeProcesses('update', 'site');

            expect(printed()).toEqual([
                'Checking site',
                FAST_FORWARD.output.trimEnd(),
                '→ Running build command for site',
                '→ Restarting PM2 process: site',
                '✓ Updated site: built, restarted PM2 process',
            ]);
        });

        it('prints the pull output of an unchanged project', async () => {
            runner.respond('git', UP_TO_DATE);

            await runWithFakeProcesses('update', 'site');

            expect(printed()).toEqual([
                'Checking site',
                'Already up to date.',
                '● No new commits for site',
            ]);
        });

        it('exits 1 for an unknown project', async () => {
            await expect(run('update', 'shop')).rejects.toThrow('process.exit(1)');
            expect(stderr).toHaveBeenCalledWith('Project shop not found in configuration');
        });
    });
});
