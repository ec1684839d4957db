import { describe, it, expect } from 'vitest';
import type { AssetReference } from '@trialpack/types';
import {
    AllowList,
    AssetGraph,
    canonicalizeUrl,
    countPsycheLocks,
    findUsedDefaultSprites,
    mergeReferences,
    resolveAssetUrl,
} from '../src/index.js';
import { loadSample, makeManifest, makeTemplate } from '../../../test/helpers/builders.js';

function byUrl(references: AssetReference[], url: string): AssetReference {
    const reference = references.find((candidate) => candidate.url === url);
    if (!reference) {
        throw new Error(`No reference for ${url}`);
    }
    return reference;
}

const VOICES = [1, 2, 3].flatMap((id) =>
    ['opus', 'wav', 'mp3'].map(
        (ext) => `https://aaonline.fr/voices/voice_singleblip_${id}.${ext}`,
    ),
);

describe('canonicalizeUrl', () => {
    it('should drop fragments and collapse slashes', () => {
        expect(canonicalizeUrl('https://media.example.test//a//b.png#top')).toBe(
            'https://media.example.test/a/b.png',
        );
    });

    it('should force protocol-relative URLs to https', () => {
        expect(canonicalizeUrl('//i.imgur.com/a.png')).toBe('https://i.imgur.com/a.png');
    });

    it('should resolve relative paths against the origin', () => {
        expect(canonicalizeUrl('images/ui/logo.png')).toBe('https://aaonline.fr/images/ui/logo.png');
    });

    it('should ignore inline and empty values', () => {
        expect(canonicalizeUrl('data:image/png;base64,AAAA')).toBeNull();
        expect(canonicalizeUrl('  ')).toBeNull();
        expect(canonicalizeUrl('#anchor')).toBeNull();
    });
});

describe('resolveAssetUrl', () => {
    it('should place origin files under their site directories', () => {
        expect(
            resolveAssetUrl('badge', {
                components: ['images', 'evidence'],
                external: false,
                defaultExtension: 'png',
            }),
        ).toBe('https://aaonline.fr/images/evidence/badge.png');
    });

    it('should keep external URLs as they are', () => {
        expect(
            resolveAssetUrl('https://media.example.test/a', {
                external: true,
                defaultExtension: 'png',
            }),
        ).toBe('https://media.example.test/a');
    });

    it('should treat external values without a scheme as origin paths', () => {
        expect(
            resolveAssetUrl('images/icons/Maya', { external: true, defaultExtension: 'png' }),
        ).toBe('https://aaonline.fr/images/icons/Maya.png');
    });
});

describe('findUsedDefaultSprites', () => {
    it('should map negative sprite ids to their profile base', () => {
        const data = {
            profiles: [0, { id: 4, base: 'Maya' }],
            frames: [
                0,
                { characters: [{ profile_id: 4, sprite_id: -2 }, { profile_id: 0, sprite_id: -1 }] },
                { characters: [0, { profile_id: 4, sprite_id: -2 }, { profile_id: 4, sprite_id: 3 }] },
                { characters: [{ profile_id: null, sprite_id: -5 }] },
            ],
        };

        expect(findUsedDefaultSprites(data)).toEqual([
            ['Maya', 2],
            ['Juge', 1],
        ]);
    });
});

describe('countPsycheLocks', () => {
    it('should return the most locks any dialogue shows', () => {
        const data = {
            scenes: [
                0,
                {
                    dialogues: [
                        0,
                        { locks: { locks_to_display: [{ id: 1 }] } },
                        { locks: null },
                        { locks: { locks_to_display: [{ id: 1 }, { id: 2 }, { id: 3 }, { id: 4 }] } },
                    ],
                },
                { dialogues: [{ locks: { locks_to_display: [{ id: 1 }, { id: 2 }] } }] },
            ],
        };

        expect(countPsycheLocks(data)).toBe(4);
    });

    it('should return 0 for cases without scenes', () => {
        expect(countPsycheLocks({ frames: [0] })).toBe(0);
    });
});

describe('AssetGraph', () => {
    const graph = new AssetGraph({ onWarning: () => undefined });

    it('should enumerate every asset of a case', async () => {
        const { template, manifests } = await loadSample([1001]);

        const references = graph.enumerate(manifests[0], template);

        expect(references.map((reference) => reference.url).sort()).toEqual(
            [
                'https://aaonline.fr/images/icons/Phoenix.png',
                'https://media.example.test/sprites/phoenix-talk.gif',
                'https://media.example.test/sprites/phoenix-still.gif',
                'https://aaonline.fr/images/chars/Phoenix/3.gif',
                'https://aaonline.fr/images/charsStill/Phoenix/3.gif',
                'https://aaonline.fr/images/charsStartup/Phoenix/3.gif',
                'https://aaonline.fr/images/evidence/badge.png',
                'https://media.example.test/evidence/badge-photo.png',
                'https://media.example.test/places/lobby.jpg',
                'https://media.example.test/places/bench.png',
                'https://aaonline.fr/images/backgrounds/courtroom.jpg',
                'https://aaonline.fr/images/popups/objection.gif',
                'https://media.example.test/music/trial.mp3',
                'https://aaonline.fr/sounds/gavel.mp3',
                ...VOICES,
                'https://aaonline.fr/images/ui/logo.png',
                'https://aaonline.fr/images/ui/panel.png',
                'https://aaonline.fr/CSS/img/frame.gif',
                'https://aaonline.fr/images/ui/button.png',
                'https://aaonline.fr/images/ui/arrow.png',
            ].sort(),
        );
    });

    it('should record where each asset occurs', async () => {
        const { template, manifests } = await loadSample([1001]);

        const references = graph.enumerate(manifests[0], template);

        expect(byUrl(references, 'https://aaonline.fr/images/evidence/badge.png').sites).toEqual([
            {
                kind: 'case-data',
                caseId: 1001,
                pointer: '/evidence/1/icon',
                externalFlag: '/evidence/1/icon_external',
            },
        ]);
        expect(
            byUrl(references, 'https://aaonline.fr/images/backgrounds/courtroom.jpg').sites,
        ).toEqual([
            {
                kind: 'default-place',
                caseId: 1001,
                placeId: '-1',
                pointer: '/-1/background/image',
                externalFlag: '/-1/background/external',
            },
        ]);
        expect(
            byUrl(references, 'https://aaonline.fr/images/charsStartup/Phoenix/3.gif').sites,
        ).toEqual([
            { kind: 'default-sprite', caseId: 1001, base: 'Phoenix', spriteId: 3, status: 'startup' },
        ]);
        expect(byUrl(references, 'https://aaonline.fr/images/ui/panel.png')).toMatchObject({
            role: 'stylesheet',
            sites: [{ kind: 'template-text', version: 'master', document: 'player' }],
        });
        expect(byUrl(references, 'https://aaonline.fr/images/ui/arrow.png')).toMatchObject({
            role: 'script',
            sites: [{ kind: 'template-text', version: 'master', document: 'scripts' }],
        });
    });

    it('should enumerate the psyche lock animations of a case with locks', () => {
        const manifest = makeManifest({
            scenes: [0, { dialogues: [0, { locks: { locks_to_display: [{ id: 1 }, { id: 2 }] } }] }],
        });

        const locks = graph
            .enumerate(manifest, makeTemplate())
            .filter((reference) => reference.role === 'psyche-lock');

        expect(locks).toEqual(
            [
                'fg_chains_appear',
                'jfa_lock_appears',
                'jfa_lock_explodes',
                'fg_chains_disappear',
            ].map((name) => ({
                url: `https://aaonline.fr/images/psyche_locks/${name}.gif`,
                role: 'psyche-lock',
                defaultExtension: 'gif',
                sites: [{ kind: 'psyche-lock', caseId: 1, name, count: 2 }],
            })),
        );
    });

    it('should skip psyche locks when no dialogue shows any', async () => {
        const { template, manifests } = await loadSample([1001]);

        const roles = graph.enumerate(manifests[0], template).map((reference) => reference.role);

        expect(roles).not.toContain('psyche-lock');
    });

    it('should keep one reference per URL with every site', () => {
        const manifest = makeManifest({
            music: [
                0,
                { id: 1, path: 'https://media.example.test/music/theme.mp3', external: true },
                { id: 2, path: 'https://media.example.test/music/theme.mp3#again', external: true },
            ],
        });

        const references = graph
            .enumerate(manifest, makeTemplate())
            .filter((reference) => reference.role === 'music');

        expect(references).toHaveLength(1);
        expect(references[0].sites.map((site) => site.kind === 'case-data' && site.pointer)).toEqual(
            ['/music/1/path', '/music/2/path'],
        );
    });

    it('should skip startup sprites the default data does not list', () => {
        const manifest = makeManifest({
            profiles: [0, { id: 1, base: 'Edgeworth', icon: 'x.png', custom_sprites: [] }],
            frames: [0, { characters: [{ profile_id: 1, sprite_id: -2 }] }],
        });

        const urls = graph
            .enumerate(manifest, makeTemplate())
            .filter((reference) => reference.role === 'sprite')
            .map((reference) => reference.url);

        expect(urls).toEqual([
            'https://aaonline.fr/images/chars/Edgeworth/2.gif',
            'https://aaonline.fr/images/charsStill/Edgeworth/2.gif',
        ]);
    });

    it('should discard template URLs outside the allow-list', () => {
        const template = makeTemplate({
            document:
                '<img src="https://tracker.example.test/pixel.gif" /> ' +
                '<a href="https://aaonline.fr/forum/index.php">forum</a> ' +
                '<img src="images/ui/ok.png" />',
        });

        const urls = graph
            .enumerate(makeManifest({}), template)
            .filter((reference) => reference.role === 'markup')
            .map((reference) => reference.url);

        expect(urls).toEqual(['https://aaonline.fr/images/ui/ok.png']);
    });

    it('should honour a custom allow-list', () => {
        const custom = new AssetGraph({
            allowList: new AllowList({ hosts: ['*.example.test'], extensions: ['gif'] }),
        });
        const template = makeTemplate({
            scripts: "a = 'https://tracker.example.test/pixel.gif'; b = 'https://aaonline.fr/x.gif';",
        });

        const urls = custom
            .enumerate(makeManifest({}), template)
            .filter((reference) => reference.role === 'script')
            .map((reference) => reference.url);

        expect(urls).toEqual(['https://tracker.example.test/pixel.gif']);
    });
});

describe('mergeReferences', () => {
    it('should union the sites of shared URLs', async () => {
        const { template, manifests } = await loadSample([1001, 1002]);
        const graph = new AssetGraph();

        const merged = mergeReferences(
            manifests.map((manifest) => graph.enumerate(manifest, template)),
        );

        expect(merged).toHaveLength(28);
        expect(
            byUrl(merged, 'https://media.example.test/places/lobby.jpg').sites.map(
                (site) => site.kind === 'case-data' && site.caseId,
            ),
        ).toEqual([1001, 1002]);
        expect(byUrl(merged, 'https://aaonline.fr/images/ui/logo.png').sites).toHaveLength(1);
    });
});
