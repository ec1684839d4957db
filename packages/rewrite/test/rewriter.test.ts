import { describe, it, expect } from 'vitest';
import { AllowList, AssetGraph } from '@trialpack/assets';
import type {
    AssetRecord,
    AssetReference,
    FailedAssetRecord,
    FetchedAssetRecord,
    JsonObject,
    SequenceLink,
} from '@trialpack/types';
import {
    IMAGE_SIZE_PATCH,
    LocalForms,
    RewriteError,
    RewriteErrorCode,
    appendUserscripts,
    configureHowler,
    localForm,
    patchImageSize,
    replacePhpBlocks,
    rewriteCase,
    rewriteCaseData,
    rewritePsycheLocks,
    rewriteText,
    spriteLookup,
    voiceLookup,
} from '../src/index.js';
import { loadSample, makeRecord } from '../../../test/helpers/builders.js';

const BADGE = 'https://aaonline.fr/images/evidence/badge.png';
const LOGO = 'https://aaonline.fr/images/ui/logo.png';

const badgeReference: AssetReference = {
    url: BADGE,
    role: 'evidence',
    sites: [
        {
            kind: 'case-data',
            caseId: 1,
            pointer: '/evidence/1/icon',
            externalFlag: '/evidence/1/icon_external',
        },
    ],
};

function sampleData(): JsonObject {
    return {
        evidence: [0, { id: 1, icon: 'badge', icon_external: false }],
        frames: [
            0,
            {
                id: 1,
                action_parameters: { url: 'player.php?trial_id=7' },
                text: 'See https://aaonline.fr/bridge.js.php for details',
            },
        ],
    };
}

function failedRecord(reference: AssetReference): FailedAssetRecord {
    return {
        status: 'failed',
        url: reference.url,
        role: reference.role,
        error: { url: reference.url, role: reference.role, code: 'NOT_FOUND', message: 'gone' },
    };
}

describe('localForm', () => {
    it('should point into the asset directory in directory mode', () => {
        expect(localForm(makeRecord(BADGE, 'badge-1.png'), 'directory')).toBe(
            'assets/badge-1.png',
        );
    });

    it('should inline the bytes in single-file mode', () => {
        const record = makeRecord(BADGE, 'badge-1.png');

        expect(localForm(record, 'single-file')).toBe(
            `data:image/png;base64,${Buffer.from(`bytes of ${BADGE}`).toString('base64')}`,
        );
    });
});

describe('rewriteCaseData', () => {
    it('should localise asset values, link targets and drop live endpoints', () => {
        const records = new Map([[BADGE, makeRecord(BADGE, 'badge-1.png')]]);
        const forms = new LocalForms([badgeReference], records, 'directory');
        const data = sampleData();

        const result = rewriteCaseData(
            data,
            1,
            [badgeReference],
            forms,
            new Map([[7, '../Seven/index.html']]),
        );

        expect(result).toEqual({
            evidence: [0, { id: 1, icon: 'assets/badge-1.png', icon_external: true }],
            frames: [
                0,
                {
                    id: 1,
                    action_parameters: { url: '../Seven/index.html' },
                    text: 'See  for details',
                },
            ],
        });
        expect(data).toEqual(sampleData());
    });

    it('should be idempotent', () => {
        const records = new Map([[BADGE, makeRecord(BADGE, 'badge-1.png')]]);
        const forms = new LocalForms([badgeReference], records, 'directory');
        const targets = new Map([[7, '../Seven/index.html']]);

        const once = rewriteCaseData(sampleData(), 1, [badgeReference], forms, targets);

        expect(rewriteCaseData(once, 1, [badgeReference], forms, targets)).toEqual(once);
    });

    it('should point failed assets at their remote URL', () => {
        const records = new Map<string, AssetRecord>([[BADGE, failedRecord(badgeReference)]]);
        const forms = new LocalForms([badgeReference], records, 'directory');

        const result = rewriteCaseData(sampleData(), 1, [badgeReference], forms);

        expect(result.evidence).toEqual([0, { id: 1, icon: BADGE, icon_external: true }]);
        expect(forms.missing).toEqual([BADGE]);
    });

    it('should ignore sites of other cases', () => {
        const records = new Map([[BADGE, makeRecord(BADGE, 'badge-1.png')]]);
        const forms = new LocalForms([badgeReference], records, 'directory');

        const result = rewriteCaseData(sampleData(), 2, [badgeReference], forms);

        expect(result.evidence).toEqual([0, { id: 1, icon: 'badge', icon_external: false }]);
    });
});

describe('rewriteText', () => {
    const logoReference: AssetReference = {
        url: LOGO,
        role: 'markup',
        sites: [{ kind: 'template-text', version: 'master', document: 'player' }],
    };
    const forms = new LocalForms(
        [logoReference],
        new Map([[LOGO, makeRecord(LOGO, 'logo-1.png')]]),
        'directory',
    );
    const text =
        '<img src="images/ui/logo.png" /> <a href="https://forum.example.test/">f</a>\n' +
        '<script src="https://aaonline.fr/bridge.js.php"></script>';

    it('should replace assets, keep other links and drop live endpoints', () => {
        expect(rewriteText(text, forms, new AllowList())).toBe(
            '<img src="assets/logo-1.png" /> <a href="https://forum.example.test/">f</a>\n' +
                '<script src=""></script>',
        );
    });

    it('should be idempotent', () => {
        const once = rewriteText(text, forms, new AllowList());

        expect(rewriteText(once, forms, new AllowList())).toBe(once);
    });
});

describe('lookups', () => {
    const voice: AssetReference = {
        url: 'https://aaonline.fr/voices/voice_singleblip_1.opus',
        role: 'voice',
        sites: [
            { kind: 'default-voice', caseId: 1, voiceId: 1, extension: 'opus' },
            { kind: 'default-voice', caseId: 2, voiceId: 1, extension: 'opus' },
        ],
    };
    const sprite: AssetReference = {
        url: 'https://aaonline.fr/images/chars/Phoenix/3.gif',
        role: 'sprite',
        sites: [{ kind: 'default-sprite', caseId: 1, base: 'Phoenix', spriteId: 3, status: 'talking' }],
    };
    const forms = new LocalForms(
        [voice, sprite],
        new Map([
            [voice.url, makeRecord(voice.url, 'blip-1.opus')],
            [sprite.url, makeRecord(sprite.url, 'phoenix-3.gif')],
        ]),
        'directory',
    );

    it('should list the case voices, then fall back to no URL', () => {
        expect(voiceLookup(1, [voice, sprite], forms)).toBe(
            '\n' +
                "\tif (-voice_id === 1 && ext === 'opus') return \"assets/blip-1.opus\";\n" +
                "\treturn '';\n",
        );
    });

    it('should list the case default sprites, then fall back to no URL', () => {
        expect(spriteLookup(1, [voice, sprite], forms)).toBe(
            '\n' +
                '\tif (base === "Phoenix" && sprite_id === 3 && status === \'talking\') return "assets/phoenix-3.gif";\n' +
                "\treturn '';\n",
        );
    });

    it('should add no data URI of its own in single-file mode', () => {
        const inline = new LocalForms([voice, sprite], new Map(), 'single-file');

        expect(voiceLookup(3, [voice, sprite], inline)).toBe("\n\treturn '';\n");
        expect(spriteLookup(3, [voice, sprite], inline)).toBe("\n\treturn '';\n");
    });
});

describe('rewritePsycheLocks', () => {
    const APPEAR = 'https://aaonline.fr/images/psyche_locks/fg_chains_appear.gif';
    const appear: AssetReference = {
        url: APPEAR,
        role: 'psyche-lock',
        defaultExtension: 'gif',
        sites: [{ kind: 'psyche-lock', caseId: 1, name: 'fg_chains_appear', count: 2 }],
    };
    const scripts =
        "chains.src = cfg.picture_dir + cfg.locks_subdir + 'fg_chains_appear.gif?id=' + lock_id;";
    const records = new Map<string, AssetRecord>([
        [APPEAR, makeRecord(APPEAR, 'fg_chains_appear-1.gif', { contentType: 'image/gif' })],
    ]);

    function rewrite(
        text: string,
        forms: LocalForms,
        caseId = 1,
    ): { text: string; copies: unknown[]; warnings: string[] } {
        const warnings: string[] = [];
        const result = rewritePsycheLocks(text, caseId, [appear], forms, (m) => warnings.push(m));
        return { ...result, warnings };
    }

    it('should give each lock instance its own copy in directory mode', () => {
        const result = rewrite(scripts, new LocalForms([appear], records, 'directory'));

        expect(result.text).toBe('chains.src = "assets/fg_chains_appear-1_" + lock_id + ".gif";');
        expect(result.copies).toEqual([
            { url: APPEAR, localName: 'fg_chains_appear-1_1.gif' },
            { url: APPEAR, localName: 'fg_chains_appear-1_2.gif' },
        ]);
        expect(result.warnings).toEqual([]);
    });

    it('should make the data URI of each instance distinct in single-file mode', () => {
        const base64 = Buffer.from(`bytes of ${APPEAR}`).toString('base64');

        const result = rewrite(scripts, new LocalForms([appear], records, 'single-file'));

        expect(result.text).toBe(
            `chains.src = "data:image/gif;lock=" + lock_id + ";base64,${base64}";`,
        );
        expect(result.copies).toEqual([]);
    });

    it('should blank the expressions of a case without locks', () => {
        const result = rewrite(scripts, new LocalForms([appear], records, 'directory'), 2);

        expect(result.text).toBe("chains.src = '';");
        expect(result.copies).toEqual([]);
    });

    it('should keep a failed lock at its remote URL', () => {
        const failed = new Map<string, AssetRecord>([[APPEAR, failedRecord(appear)]]);

        const result = rewrite(scripts, new LocalForms([appear], failed, 'directory'));

        expect(result.text).toBe(`chains.src = "${APPEAR}?id=" + lock_id;`);
        expect(result.copies).toEqual([]);
    });

    it('should leave unknown lock animations alone and warn', () => {
        const unknown =
            "glow.src = cfg.picture_dir + cfg.locks_subdir + 'jfa_lock_glows.gif?id=' + lock_id;";

        const result = rewrite(unknown, new LocalForms([appear], records, 'directory'));

        expect(result.text).toBe(unknown);
        expect(result.warnings).toEqual(['Unknown psyche lock jfa_lock_glows stays remote']);
    });
});

describe('patchImageSize', () => {
    const scripts =
        'function setGraphicElementImage(graphic_element, img)\n{\n' +
        "graphic_element.style.width = img.width + 'px';\n}";

    it('should give sizeless images the screen size before they are used', () => {
        expect(patchImageSize(scripts, () => undefined)).toBe(
            'function setGraphicElementImage(graphic_element, img)\n{\n' +
                'if (img.height == 0) img.height = 192; if (img.width == 0) img.width = 256;\n' +
                "graphic_element.style.width = img.width + 'px';\n}",
        );
    });

    it('should be idempotent', () => {
        const once = patchImageSize(scripts, () => undefined);

        expect(patchImageSize(once, () => undefined)).toBe(once);
    });

    it('should warn when the loader is missing', () => {
        const warnings: string[] = [];

        expect(patchImageSize('var x = 1;', (m) => warnings.push(m))).toBe('var x = 1;');
        expect(warnings).toEqual([
            'Image handling code not found in player scripts; sprites may show late',
        ]);
    });
});

describe('configureHowler', () => {
    const scripts = 'new Howl({ src: [url], preload: true });';

    it('should set HTML5 audio in directory mode', () => {
        const warn = (): void => {
            throw new Error('unexpected warning');
        };

        expect(configureHowler(scripts, 'directory', false, warn)).toBe(
            'new Howl({ src: [url], preload: true, html5: false });',
        );
        expect(configureHowler(scripts, 'directory', undefined, warn)).toBe(
            'new Howl({ src: [url], preload: true, html5: true });',
        );
    });

    it('should not add the option twice', () => {
        const once = configureHowler(scripts, 'directory', true, () => undefined);

        expect(configureHowler(once, 'directory', true, () => undefined)).toBe(once);
    });

    it('should leave single-file scripts alone and warn when the toggle is off', () => {
        const warnings: string[] = [];

        expect(configureHowler(scripts, 'single-file', false, (m) => warnings.push(m))).toBe(
            scripts,
        );
        expect(warnings).toEqual(['The HTML5 audio setting has no effect on single-file output']);
    });
});

describe('appendUserscripts', () => {
    it('should add the scripts before the closing html tag', () => {
        expect(appendUserscripts('<html><body></body></html>', ['a();', 'b();'])).toBe(
            '<html><body></body><script type="text/javascript">a();\n\nb();</script>\n</html>',
        );
    });

    it('should leave the document alone without scripts', () => {
        expect(appendUserscripts('<html></html>', [])).toBe('<html></html>');
    });
});

describe('replacePhpBlocks', () => {
    it('should fill expected blocks and remove unknown ones', () => {
        const warnings: string[] = [];

        const result = replacePhpBlocks(
            '<p><?php echo $name; ?></p><?php phpinfo(); ?>',
            [{ id: 'name', detector: /echo \$name/, replacement: 'Maya' }],
            (m) => warnings.push(m),
        );

        expect(result).toBe('<p>Maya</p>');
        expect(warnings).toEqual(['Unexpected PHP block removed: phpinfo();']);
    });

    it('should use each expected block once', () => {
        const result = replacePhpBlocks(
            '<?php echo 1; ?>|<?php echo 1; ?>',
            [{ id: 'one', detector: /echo 1/, replacement: 'one' }],
            () => undefined,
        );

        expect(result).toBe('one|');
    });

    it('should refuse a block that matches two expected blocks', () => {
        expect(() =>
            replacePhpBlocks(
                '<?php echo title(); ?>',
                [
                    { id: 'title', detector: /echo/, replacement: 'a' },
                    { id: 'heading', detector: /title/, replacement: 'b' },
                ],
                () => undefined,
            ),
        ).toThrow(expect.objectContaining({ code: RewriteErrorCode.AMBIGUOUS_BLOCK }));
    });

    it('should refuse a template without a required block', () => {
        const error = (() => {
            try {
                replacePhpBlocks(
                    'no blocks',
                    [{ id: 'script', detector: /include/, replacement: '', required: true }],
                    () => undefined,
                );
            } catch (e) {
                return e;
            }
            return undefined;
        })();

        expect(error).toBeInstanceOf(RewriteError);
        expect(error).toMatchObject({ code: RewriteErrorCode.MISSING_BLOCK, block: 'script' });
    });
});

describe('rewriteCase', () => {
    async function prepare(caseId = 1001) {
        const { template, manifests } = await loadSample([caseId]);
        const [manifest] = manifests;
        const references = new AssetGraph({ onWarning: () => undefined }).enumerate(
            manifest,
            template,
        );
        const records = new Map(
            references.map((reference, index): [string, FetchedAssetRecord] => [
                reference.url,
                makeRecord(reference.url, `asset-${index}.bin`),
            ]),
        );
        const nameOf = (url: string): string => {
            const record = records.get(url);
            if (!record) throw new Error(`No record for ${url}`);
            return record.localName;
        };
        return { template, manifest, references, records, nameOf };
    }

    it('should produce a document without PHP or origin references', async () => {
        const { template, manifest, references, records } = await prepare();

        const result = rewriteCase({
            manifest,
            template,
            references,
            records,
            mode: 'directory',
            onWarning: () => undefined,
        });

        expect(result.document.startsWith('<!DOCTYPE html>')).toBe(true);
        expect(result.document).not.toContain('<?php');
        expect(result.document).not.toContain('aaonline.fr');
        expect(result.document).toContain('<title>Turnabout Sample</title>');
        expect(result.document).toContain('<h1>Turnabout Sample</h1>');
        expect(result.document).toContain('<body lang="en">');
        expect(result.document).toContain('preload: true, html5: true');
        expect(result.document).toContain(
            `${IMAGE_SIZE_PATCH}graphic_element.style.width = img.width + 'px';`,
        );
        expect(result.document).toContain("\tchains.src = '';\n");
        expect(result.missing).toEqual([]);
        expect(result.copies).toEqual([]);
    });

    it('should point psyche locks at one copy per displayed lock', async () => {
        const { template, manifest, references, records, nameOf } = await prepare(2001);
        const explodes = nameOf('https://aaonline.fr/images/psyche_locks/jfa_lock_explodes.gif');

        const result = rewriteCase({
            manifest,
            template,
            references,
            records,
            mode: 'directory',
            onWarning: () => undefined,
        });

        expect(result.document).toContain(
            `lock.src = "assets/${explodes.replace(/\.bin$/, '')}_" + lock_id + ".bin";`,
        );
        expect(result.document).not.toContain('cfg.locks_subdir');
        expect(result.copies).toHaveLength(12);
        expect(result.copies).toContainEqual({
            url: 'https://aaonline.fr/images/psyche_locks/jfa_lock_explodes.gif',
            localName: explodes.replace(/\.bin$/, '_3.bin'),
        });
    });

    it('should embed the rewritten data and default places', async () => {
        const { template, manifest, references, records, nameOf } = await prepare();

        const result = rewriteCase({
            manifest,
            template,
            references,
            records,
            mode: 'directory',
            onWarning: () => undefined,
        });

        expect(result.data.evidence).toEqual([
            0,
            {
                id: 1,
                icon: `assets/${nameOf(BADGE)}`,
                icon_external: true,
                check_button_data: [
                    { type: 'text', content: 'A shiny badge' },
                    {
                        type: 'image',
                        content: `assets/${nameOf('https://media.example.test/evidence/badge-photo.png')}`,
                    },
                ],
            },
        ]);
        expect(result.document).toContain(
            `var initial_trial_data = ${JSON.stringify(result.data)};`,
        );
        expect(result.defaultPlaces['-1']).toEqual({
            id: -1,
            name: 'Courtroom',
            background: {
                image: `assets/${nameOf('https://aaonline.fr/images/backgrounds/courtroom.jpg')}`,
                external: true,
            },
            background_objects: [],
            foreground_objects: [],
        });
        expect(result.document).toContain(
            `var default_places = ${JSON.stringify(result.defaultPlaces)};`,
        );
        expect(result.document).toContain(
            `\tif (base === "Phoenix" && sprite_id === 3 && status === 'still') return "assets/${nameOf('https://aaonline.fr/images/charsStill/Phoenix/3.gif')}";\n`,
        );
        expect(result.document).toContain(
            `\tif (-voice_id === 2 && ext === 'wav') return "assets/${nameOf('https://aaonline.fr/voices/voice_singleblip_2.wav')}";\n`,
        );
    });

    it('should inline every asset in single-file mode', async () => {
        const { template, manifest, references, records } = await prepare();

        const result = rewriteCase({
            manifest,
            template,
            references,
            records,
            mode: 'single-file',
            options: { userscripts: ['window.extra = 1;'] },
            onWarning: () => undefined,
        });

        expect(result.document).not.toContain('assets/');
        expect(result.document).not.toContain('aaonline.fr');
        expect(result.document).toContain('data:image/png;base64,');
        expect(result.document).toContain('preload: true })');
        expect(
            result.document.endsWith(
                '<script type="text/javascript">window.extra = 1;</script>\n</html>\n',
            ),
        ).toBe(true);
    });

    it('should redirect to linked cases of the batch', async () => {
        const { template, manifest, references, records } = await prepare();
        const links: SequenceLink[] = [
            {
                from: 1001,
                to: 1002,
                trigger: 'player.php?trial_id=1002',
                origin: 'sequence',
                state: 'linked',
            },
        ];

        const result = rewriteCase({
            manifest,
            template,
            references,
            records,
            mode: 'directory',
            links,
            outputs: new Map([
                [1001, 'out/Turnabout Sample/index.html'],
                [1002, 'out/Turnabout Sample, Part 2/index.html'],
            ]),
            onWarning: () => undefined,
        });

        expect(result.document).toContain(
            'switch (Number.parseInt(target_trial_id)) {\n' +
                "case 1002: window.location.href = '../Turnabout%20Sample%2C%20Part%202/index.html' + '?save_data=' + encodeURIComponent(save_data);\n" +
                'break;\n' +
                "default: window.location.href = 'player.php?trial_id=' + target_trial_id + '&save_data=' + encodeURIComponent(save_data);\n" +
                '}',
        );
    });

    it('should keep failed assets remote and report them', async () => {
        const { template, manifest, references, records } = await prepare();
        const lobby = 'https://media.example.test/places/lobby.jpg';
        const lobbyReference = references.find((reference) => reference.url === lobby);
        if (!lobbyReference) throw new Error('lobby not enumerated');
        const withFailure = new Map<string, AssetRecord>(records);
        withFailure.set(lobby, failedRecord(lobbyReference));

        const result = rewriteCase({
            manifest,
            template,
            references,
            records: withFailure,
            mode: 'directory',
            onWarning: () => undefined,
        });

        expect(result.missing).toEqual([lobby]);
        expect(result.data.places).toEqual([
            0,
            {
                id: 1,
                background: { image: lobby, external: true },
                background_objects: [
                    {
                        image: expect.stringMatching(/^assets\/asset-\d+\.bin$/),
                        external: true,
                    },
                ],
                foreground_objects: [],
            },
        ]);
    });
});
