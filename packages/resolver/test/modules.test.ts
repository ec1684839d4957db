import { describe, it, expect } from 'vitest';
import {
    ResolutionErrorCode,
    combineModules,
    missingDependencies,
    parseDefaultData,
    parseModule,
    parseSitePaths,
    joinUrlPath,
} from '../src/index.js';

function moduleText(name: string, dependencies: string[], init = ''): string {
    return [
        'Modules.load(new Object({',
        `\tname : '${name}',`,
        `\tdependencies : [${dependencies.map((d) => `'${d}'`).join(', ')}],`,
        '\tinit : function()',
        '\t{',
        init,
        '\t}',
        '}));',
        `var ${name}_ready = true;`,
        `Modules.complete('${name}');`,
    ].join('\n');
}

describe('parseModule', () => {
    it('should read the name, dependencies and init body', () => {
        const module = parseModule('frames', moduleText('frames', ['display', 'dom_loaded'], 'go();'));

        expect(module.name).toBe('frames');
        expect(module.dependencies).toEqual(['display', 'dom_loaded']);
        expect(module.init.trim()).toBe('go();');
        expect(module.content).toContain('var frames_ready = true;');
        expect(module.content).not.toContain('Modules.complete');
    });

    it('should reject a module declared under another name', () => {
        expect(() => parseModule('frames', moduleText('display', []))).toThrow(
            expect.objectContaining({ code: ResolutionErrorCode.TEMPLATE_ERROR }),
        );
    });

    it('should reject a file without a declaration', () => {
        expect(() => parseModule('frames', 'var x = 1;')).toThrow(
            expect.objectContaining({ code: ResolutionErrorCode.TEMPLATE_ERROR }),
        );
    });
});

describe('missingDependencies', () => {
    it('should skip loaded and built-in modules', () => {
        const modules = [
            parseModule('a', moduleText('a', ['b', 'page_loaded'])),
            parseModule('b', moduleText('b', ['c', 'dom_loaded'])),
        ];

        expect(missingDependencies(modules)).toEqual(['c']);
    });
});

describe('combineModules', () => {
    it('should order modules after their dependencies', () => {
        const text = combineModules([
            parseModule('a', moduleText('a', ['b'])),
            parseModule('b', moduleText('b', ['c'])),
            parseModule('c', moduleText('c', [])),
        ]);

        expect(text.indexOf('// c.js')).toBeLessThan(text.indexOf('// b.js'));
        expect(text.indexOf('// b.js')).toBeLessThan(text.indexOf('// a.js'));
    });

    it('should reject dependency cycles', () => {
        expect(() =>
            combineModules([
                parseModule('a', moduleText('a', ['b'])),
                parseModule('b', moduleText('b', ['a'])),
            ]),
        ).toThrow(expect.objectContaining({ code: ResolutionErrorCode.TEMPLATE_ERROR }));
    });

    it('should qualify the audio global once', () => {
        const text = combineModules([
            parseModule('a', moduleText('a', [], 'SoundHowler.x(); window.SoundHowler.y();')),
        ]);

        expect(text).toContain('window.SoundHowler.x(); window.SoundHowler.y();');
    });
});

describe('parseSitePaths', () => {
    it('should reject a configuration missing a directory', () => {
        expect(() => parseSitePaths('var cfg = {"picture_dir":"images"};')).toThrow(
            expect.objectContaining({ code: ResolutionErrorCode.TEMPLATE_ERROR }),
        );
    });
});

describe('parseDefaultData', () => {
    it('should accept startup sprites given as object keys', () => {
        const data = parseDefaultData(
            [
                'var default_profiles_startup = JSON.parse("{\\"Maya\\\\/2\\":1}");',
                'var default_places = {"-3":{"id":-3}};',
            ].join('\n'),
        );

        expect([...data.profilesStartup]).toEqual(['Maya/2']);
        expect(data.places['-3']).toEqual({ id: -3 });
    });
});

describe('joinUrlPath', () => {
    it('should drop empty components and collapse slashes', () => {
        expect(joinUrlPath('https://aaonline.fr', 'images/', '', '/chars', 'a.gif')).toBe(
            'https://aaonline.fr/images/chars/a.gif',
        );
    });
});
