import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { stripVTControlCharacters } from 'util';
import type { RunReport } from '@trialpack/types';
import {
    SpinnerRegistry,
    checkOutputDirectory,
    createProgram,
    exitCode,
    formatReport,
    parseArgs,
    progressText,
    toRunConfig,
} from '@trialpack/cli';

describe('parseArgs', () => {
    it('should apply the defaults', () => {
        expect(parseArgs(['node', 'trialpack', '1001'])).toEqual({
            cases: ['1001'],
            output: '.',
            playerVersion: 'master',
            language: 'en',
            concurrency: 5,
            retries: 3,
            timeout: 30_000,
            sequence: 'none',
            singleFile: false,
            assetPolicy: 'best-effort',
            replaceExisting: false,
            httpHandling: 'redirect-to-https',
            html5Audio: true,
            removeWatermarks: true,
            userscripts: [],
            verbose: false,
        });
    });

    it('should read every flag', () => {
        const options = parseArgs([
            'node',
            'trialpack',
            '1001',
            'https://aaonline.fr/player.php?trial_id=1002',
            '-o',
            'cases',
            '-j',
            '8',
            '-s',
            'every',
            '-1',
            '--no-html5-audio',
            '--no-remove-watermarks',
            '--asset-policy',
            'fail-fast',
            '-r',
            '--retries',
            '0',
        ]);

        expect(options).toMatchObject({
            cases: ['1001', 'https://aaonline.fr/player.php?trial_id=1002'],
            output: 'cases',
            concurrency: 8,
            sequence: 'every',
            singleFile: true,
            html5Audio: false,
            removeWatermarks: false,
            assetPolicy: 'fail-fast',
            replaceExisting: true,
            retries: 0,
        });
    });

    it('should reject a concurrency of zero', () => {
        const program = createProgram()
            .exitOverride()
            .configureOutput({ writeErr: () => undefined });

        expect(() => program.parse(['node', 'trialpack', '1001', '-j', '0'])).toThrow(
            expect.objectContaining({ code: 'commander.invalidArgument' }),
        );
    });
});

describe('toRunConfig', () => {
    it('should map options onto the run configuration', async () => {
        const directory = await mkdtemp(join(tmpdir(), 'trialpack-cli-'));
        const script = join(directory, 'skip.js');
        await writeFile(script, 'console.log("userscript");', 'utf-8');
        const options = parseArgs(['node', 'trialpack', '1001', '-o', 'out', '--retries', '0', '-u', script]);

        const config = await toRunConfig(options, true);

        expect(config).toMatchObject({
            outputRoot: 'out',
            retry: { maxAttempts: 1 },
            userscripts: ['console.log("userscript");'],
            replaceExisting: true,
            timeoutMs: 30_000,
        });
    });
});

describe('checkOutputDirectory', () => {
    it('should replace without asking when told to', async () => {
        expect(await checkOutputDirectory('anything', { replaceExisting: true })).toBe('replace');
    });

    it('should keep the current directory and missing ones', async () => {
        expect(await checkOutputDirectory('.', { interactive: true })).toBe('keep');
        expect(
            await checkOutputDirectory(join(tmpdir(), 'trialpack-missing-dir'), { interactive: true }),
        ).toBe('keep');
    });

    it('should not prompt without a terminal', async () => {
        const directory = await mkdtemp(join(tmpdir(), 'trialpack-out-'));
        await writeFile(join(directory, 'index.html'), '<html></html>', 'utf-8');

        expect(await checkOutputDirectory(directory, { interactive: false })).toBe('keep');
    });
});

describe('formatReport', () => {
    const report: RunReport = {
        status: 'succeeded-with-warnings',
        cases: [
            {
                caseId: 1001,
                title: 'Turnabout Sample',
                status: 'succeeded',
                outputPath: 'out/Turnabout Sample/index.html',
                assetCount: 28,
                missingAssets: [],
            },
            {
                caseId: 1002,
                title: 'Part 2',
                status: 'partial',
                outputPath: 'out/Part 2/index.html',
                assetCount: 10,
                missingAssets: ['https://media.example.test/gone.mp3'],
            },
            {
                caseId: 'nonsense',
                status: 'failed',
                assetCount: 0,
                missingAssets: [],
                error: 'Not a case id or case URL: nonsense',
            },
        ],
        assetFailures: [
            {
                url: 'https://media.example.test/gone.mp3',
                role: 'music',
                code: 'NOT_FOUND',
                message: 'HTTP 404',
                status: 404,
            },
        ],
        links: [
            {
                from: 1002,
                to: 1003,
                trigger: 'player.php?trial_id=1003',
                origin: 'sequence',
                state: 'unlinked',
            },
        ],
        warnings: [],
    };

    it('should list every case and failed asset', () => {
        expect(formatReport(report).map((line) => stripVTControlCharacters(line))).toEqual([
            'Downloaded 2 of 3 case(s)',
            '  ✔ Turnabout Sample (1001) -> out/Turnabout Sample/index.html',
            '  ⚠ Part 2 (1002) -> out/Part 2/index.html (1 of 10 assets missing)',
            '  ✖ nonsense: Not a case id or case URL: nonsense',
            '',
            '1 asset(s) could not be downloaded:',
            '  - https://media.example.test/gone.mp3: HTTP 404',
            '',
            '1 sequence link(s) lead to cases outside this download; use --sequence every to download whole sequences.',
            'Done, with warnings.',
        ]);
    });

    it('should map statuses to exit codes', () => {
        expect(exitCode('succeeded')).toBe(0);
        expect(exitCode('succeeded-with-warnings')).toBe(0);
        expect(exitCode('failed')).toBe(1);
        expect(exitCode('cancelled')).toBe(130);
    });
});

describe('progressText', () => {
    it('should describe the stage', () => {
        expect(progressText({ stage: 'resolving', completed: 1, total: 2 })).toBe(
            'Resolving cases (1/2)...',
        );
        expect(
            progressText({
                stage: 'fetching',
                url: 'https://media.example.test/a.png',
                role: 'background',
                status: 'fetched',
                completed: 3,
                total: 28,
            }),
        ).toBe('Downloading assets (3/28)...');
    });
});

describe('SpinnerRegistry', () => {
    it('should write timestamped lines', () => {
        const lines: string[] = [];
        const registry = new SpinnerRegistry((line) => lines.push(line));

        registry.safeLog('Template loaded', 'verbose');

        expect(lines).toHaveLength(1);
        expect(stripVTControlCharacters(lines[0] ?? '')).toMatch(
            /^\[\d{2}:\d{2}:\d{2}\.\d{3}\] Template loaded$/,
        );
    });
});
