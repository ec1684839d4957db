/**
 * Loading and case-independent preparation of the player template.
 */

import { NetworkError, type HttpClient } from '@trialpack/http';
import type { DefaultData, JsonObject, PlayerTemplate, SitePaths } from '@trialpack/types';
import {
    ANALYTICS_PATTERN,
    CSS_IMPORT_PATTERN,
    CSS_URL_PATTERN,
    DEFAULT_LANGUAGE,
    DEFAULT_PLAYER_VERSION,
    HOWLER_INCLUDE_PATTERN,
    LANGUAGE_INCLUDE_PATTERN,
    LANGUAGE_OBJECT_PATTERN,
    ORIGIN_BASE_URL,
    PRELOAD_PLACES_PATTERN,
    STYLESHEET_LINK_PATTERN,
    STYLE_INCLUDE_PATTERN,
    templateFileUrl,
} from './constants.js';
import { ResolutionError, ResolutionErrorCode } from './errors.js';
import { isJsonObject, parseJson } from './js-literal.js';
import {
    combineModules,
    missingDependencies,
    parseModule,
    type PlayerModule,
} from './modules.js';
import { fetchDefaultData, fetchSitePaths, joinUrlPath } from './site.js';

export interface TemplateLoaderOptions {
    /** Language of the player interface */
    language?: string;
    /** Receives non-fatal problems, such as a stylesheet that failed to load */
    onWarning?: (message: string) => void;
    /** Receives progress messages */
    onVerbose?: (message: string) => void;
}

/**
 * Makes the relative `url(...)` references of a stylesheet absolute.
 *
 * @param css - Stylesheet text
 * @param stylesheetUrl - URL the stylesheet was served from
 */
export function absolutizeCssUrls(css: string, stylesheetUrl: string): string {
    return css.replace(
        CSS_URL_PATTERN,
        (match: string, prefix: string, quote: string, target: string) => {
            const trimmed = target.trim();
            if (
                trimmed === '' ||
                trimmed.startsWith('data:') ||
                trimmed.startsWith('#')
            ) {
                return match;
            }
            let absolute: string;
            try {
                absolute = new URL(trimmed, stylesheetUrl).href;
            } catch {
                return match;
            }
            return `${prefix}url(${quote}${absolute}${quote})`;
        },
    );
}

/**
 * Loads player templates. Each version is fetched and prepared once per
 * loader; concurrent requests for the same version share one promise.
 *
 * @example
 * ```ts
 * const loader = new TemplateLoader(client, { language: 'fr' });
 * const [a, b] = await Promise.all([loader.load('master'), loader.load('master')]);
 * // a === b
 * ```
 */
export class TemplateLoader {
    private readonly templates = new Map<string, Promise<PlayerTemplate>>();
    private sitePaths?: Promise<SitePaths>;
    private defaultData?: Promise<{ script: string; data: DefaultData }>;
    private readonly language: string;

    constructor(
        private readonly client: HttpClient,
        private readonly options: TemplateLoaderOptions = {},
    ) {
        this.language = options.language ?? DEFAULT_LANGUAGE;
    }

    /**
     * Returns the prepared template of a version.
     *
     * @param version - Commit-ish of the template repository
     * @throws ResolutionError `TEMPLATE_ERROR` when the template is incomplete
     * @throws NetworkError when the template cannot be fetched
     */
    load(version: string = DEFAULT_PLAYER_VERSION): Promise<PlayerTemplate> {
        let template = this.templates.get(version);
        if (!template) {
            template = this.build(version);
            this.templates.set(version, template);
        }
        return template;
    }

    /** Number of distinct versions requested so far */
    get versionCount(): number {
        return this.templates.size;
    }

    private async build(version: string): Promise<PlayerTemplate> {
        this.options.onVerbose?.(`Loading player template ${version}`);
        this.sitePaths ??= fetchSitePaths(this.client);
        this.defaultData ??= fetchDefaultData(this.client);

        const [sitePaths, defaults, player, common] = await Promise.all([
            this.sitePaths,
            this.defaultData,
            this.fetchTemplateFile(version, 'player.php'),
            this.fetchTemplateFile(version, 'Javascript/common.js'),
        ]);

        const modules = await this.fetchModules(version, defaults.script);
        let scripts = [
            `var cfg = ${JSON.stringify(sitePaths)};`,
            'function getFileVersion(path_components)',
            '{',
            "\treturn '';",
            '}',
            common,
            '',
            'let initScripts = [];',
            combineModules(modules),
            "window.addEventListener('load', function() {",
            '\tinitScripts.forEach((x) => x());',
            '}, false);',
            '',
        ].join('\n');

        let document = player.replace(ANALYTICS_PATTERN, '');
        document = await this.inlineStylesheetLinks(document);

        const included = await this.extractIncludedStyles(scripts, sitePaths);
        scripts = included.scripts;
        if (included.styles.length > 0) {
            const styles = included.styles.map((css) => `<style>\n${css}\n</style>`).join('\n');
            document = document.includes('</head>')
                ? document.replace('</head>', () => `${styles}\n</head>`)
                : `${styles}\n${document}`;
        }

        scripts = await this.inlineLanguage(scripts, sitePaths);
        scripts = await this.inlineHowler(scripts, version);
        scripts = scripts.replace(PRELOAD_PLACES_PATTERN, '');

        return Object.freeze({
            version,
            sitePaths: Object.freeze(sitePaths),
            defaultData: defaults.data,
            document,
            scripts,
        });
    }

    private async fetchTemplateFile(version: string, path: string): Promise<string> {
        try {
            return await this.client.getText(templateFileUrl(version, path));
        } catch (error) {
            if (error instanceof NetworkError && error.isNotFound) {
                throw new ResolutionError(
                    ResolutionErrorCode.TEMPLATE_ERROR,
                    `Player template ${version} has no ${path}`,
                    version,
                    error,
                );
            }
            throw error;
        }
    }

    private async fetchModule(
        version: string,
        name: string,
        defaultDataScript: string,
    ): Promise<PlayerModule> {
        let text: string;
        if (name === 'default_data') {
            // Rendered by the origin, not part of the template repository
            text = defaultDataScript;
        } else if (name === 'trial') {
            text = await this.fetchTemplateFile(version, 'trial.js.php');
        } else {
            text = await this.fetchTemplateFile(version, `Javascript/${name}.js`);
        }
        return parseModule(name, text);
    }

    private async fetchModules(
        version: string,
        defaultDataScript: string,
    ): Promise<PlayerModule[]> {
        const modules = new Map<string, PlayerModule>();
        let targets = ['player'];
        while (targets.length > 0) {
            const fetched = await Promise.all(
                targets.map((name) =>
                    this.fetchModule(version, name, defaultDataScript),
                ),
            );
            for (const module of fetched) {
                modules.set(module.name, module);
            }
            targets = missingDependencies(modules.values());
        }
        return [...modules.values()];
    }

    private async fetchStylesheet(
        url: string,
        visited: Set<string>,
    ): Promise<string | null> {
        if (visited.has(url)) {
            return '';
        }
        visited.add(url);

        let css: string;
        try {
            css = await this.client.getText(url);
        } catch (error) {
            if (error instanceof NetworkError) {
                this.options.onWarning?.(`Stylesheet skipped: ${error.format()}`);
                return null;
            }
            throw error;
        }

        css = absolutizeCssUrls(css, url);

        const imports = [...css.matchAll(CSS_IMPORT_PATTERN)];
        for (const match of imports) {
            const target = match[1] ?? match[2];
            const imported = await this.fetchStylesheet(
                new URL(target, url).href,
                visited,
            );
            css = css.replace(match[0], () => imported ?? '');
        }
        return css;
    }

    private async inlineStylesheetLinks(document: string): Promise<string> {
        const visited = new Set<string>();
        let result = document;
        for (const match of [...document.matchAll(STYLESHEET_LINK_PATTERN)]) {
            const url = new URL(match[1], `${ORIGIN_BASE_URL}/`).href;
            const css = await this.fetchStylesheet(url, visited);
            if (css !== null) {
                result = result.replace(match[0], () => `<style>\n${css}\n</style>`);
            }
        }
        return result;
    }

    private async extractIncludedStyles(
        scripts: string,
        sitePaths: SitePaths,
    ): Promise<{ scripts: string; styles: string[] }> {
        const visited = new Set<string>();
        const styles: string[] = [];
        let result = scripts;
        for (const match of [...scripts.matchAll(STYLE_INCLUDE_PATTERN)]) {
            const url = joinUrlPath(ORIGIN_BASE_URL, sitePaths.css_dir, `${match[1]}.css`);
            const css = await this.fetchStylesheet(url, visited);
            if (css !== null) {
                styles.push(css);
                result = result.replace(match[0], '');
            }
        }
        return { scripts: result, styles };
    }

    private async inlineLanguage(scripts: string, sitePaths: SitePaths): Promise<string> {
        const include = LANGUAGE_INCLUDE_PATTERN.exec(scripts);
        if (!include) {
            return scripts;
        }
        const files = [...include[1].matchAll(/['"]([^'"]+)['"]/g)].map((m) => m[1]);
        const callback = include[2];

        const merged: JsonObject = {};
        for (const file of files) {
            const url = joinUrlPath(
                ORIGIN_BASE_URL,
                sitePaths.lang_dir,
                this.language,
                `${file}.js`,
            );
            try {
                const value = parseJson(await this.client.getText(url));
                if (isJsonObject(value)) {
                    Object.assign(merged, value);
                } else {
                    this.options.onWarning?.(`Language file ${url} is not an object`);
                }
            } catch (error) {
                if (error instanceof NetworkError || error instanceof SyntaxError) {
                    this.options.onWarning?.(`Language file ${url} skipped: ${error.message}`);
                    continue;
                }
                throw error;
            }
        }

        return scripts
            .replace(LANGUAGE_OBJECT_PATTERN, () => `var lang = ${JSON.stringify(merged)};`)
            .replace(
                include[0],
                () => `Languages.requestFiles([], function(){\n${callback}\n});`,
            );
    }

    private async inlineHowler(scripts: string, version: string): Promise<string> {
        const include = HOWLER_INCLUDE_PATTERN.exec(scripts);
        if (!include) {
            return scripts;
        }
        let howler: string;
        try {
            howler = await this.client.getText(
                templateFileUrl(version, 'Javascript/howler.js/howler.min.js'),
            );
        } catch (error) {
            if (error instanceof NetworkError) {
                this.options.onWarning?.(`Audio library not inlined: ${error.format()}`);
                return scripts;
            }
            throw error;
        }
        return scripts.replace(include[0], () => `${howler}\n${include[1]}`);
    }
}
