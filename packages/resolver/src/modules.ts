/**
 * Player module declarations and their combination into one script.
 *
 * Each module file declares itself with
 * `Modules.load(new Object({ name, dependencies, init }))`. The player loads
 * them lazily at run time; an offline copy has them all in one script,
 * ordered so every module follows its dependencies.
 */

import { BUILT_IN_MODULES, MODULE_PATTERN } from './constants.js';
import { ResolutionError, ResolutionErrorCode } from './errors.js';

/**
 * One parsed player module.
 */
export interface PlayerModule {
    name: string;
    dependencies: string[];
    /** Body of the module's init function */
    init: string;
    /** Module text with its declaration removed */
    content: string;
}

/**
 * Parses a module file.
 *
 * @param expectedName - Name the module was requested under
 * @param text - Module file text
 * @throws ResolutionError `TEMPLATE_ERROR` when the declaration is missing
 *   or names another module
 */
export function parseModule(expectedName: string, text: string): PlayerModule {
    const match = MODULE_PATTERN.exec(text);
    if (!match) {
        throw new ResolutionError(
            ResolutionErrorCode.TEMPLATE_ERROR,
            `Player module '${expectedName}' has no module declaration`,
            expectedName,
        );
    }
    const [declaration, name, dependencyList, init] = match;
    if (name !== expectedName) {
        throw new ResolutionError(
            ResolutionErrorCode.TEMPLATE_ERROR,
            `Player module '${expectedName}' declares itself as '${name}'`,
            expectedName,
        );
    }

    const dependencies = [...dependencyList.matchAll(/['"]([^'"]+)['"]/g)].map(
        (dependency) => dependency[1],
    );
    const content = text
        .replace(declaration, '\n')
        .replaceAll(`Modules.complete('${name}');`, '\n')
        .replaceAll(`Modules.complete('${name}')`, '\n');

    return { name, dependencies, init, content };
}

/**
 * Names of the dependencies of `modules` that are neither loaded nor built in.
 */
export function missingDependencies(modules: Iterable<PlayerModule>): string[] {
    const list = [...modules];
    const loaded = new Set(list.map((module) => module.name));
    const missing = new Set<string>();
    for (const module of list) {
        for (const dependency of module.dependencies) {
            if (!loaded.has(dependency) && !BUILT_IN_MODULES.has(dependency)) {
                missing.add(dependency);
            }
        }
    }
    return [...missing];
}

/**
 * Combines modules into one script in dependency order. Each init body is
 * queued on `initScripts`, which the page runs once it has loaded.
 *
 * @throws ResolutionError `TEMPLATE_ERROR` when some dependency can never be
 *   satisfied
 */
export function combineModules(modules: PlayerModule[]): string {
    const satisfied = new Set(BUILT_IN_MODULES);
    let remaining = [...modules];
    let text = '';

    while (remaining.length > 0) {
        const ready = remaining.filter((module) =>
            module.dependencies.every((dependency) => satisfied.has(dependency)),
        );
        if (ready.length === 0) {
            throw new ResolutionError(
                ResolutionErrorCode.TEMPLATE_ERROR,
                `Player modules have unsatisfiable dependencies: ${remaining
                    .map((module) => module.name)
                    .join(', ')}`,
            );
        }
        for (const module of ready) {
            satisfied.add(module.name);
            text += `// ${module.name}.js\n\n`;
            // A function, not a block: init bodies may `return`
            text += `initScripts.push(() => {${module.init}});\n`;
            text += module.content;
        }
        remaining = remaining.filter((module) => !ready.includes(module));
    }

    // Avoids a clash between the global and a local of the same name
    return text.replace(/(?<!window\.)\bSoundHowler\./g, 'window.SoundHowler.');
}
