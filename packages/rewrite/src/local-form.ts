/**
 * The form a fetched asset takes inside an output.
 */

import type {
    AssetRecord,
    AssetRecordIndex,
    AssetReference,
    FetchedAssetRecord,
    OutputMode,
} from '@trialpack/types';

/** Directory of the assets next to a directory-mode document */
export const ASSET_DIRECTORY = 'assets';

/**
 * `assets/<local name>` in directory mode, a base64 `data:` URI in
 * single-file mode.
 */
export function localForm(record: FetchedAssetRecord, mode: OutputMode): string {
    if (mode === 'directory') {
        return `${ASSET_DIRECTORY}/${record.localName}`;
    }
    return `data:${record.contentType};base64,${Buffer.from(record.bytes).toString('base64')}`;
}

/**
 * What each referenced URL of one case is rewritten to. Failed and
 * unrecorded references keep their canonical remote URL.
 */
export class LocalForms {
    private readonly forms = new Map<string, string>();
    private readonly missingUrls: string[] = [];

    constructor(
        references: readonly AssetReference[],
        records: AssetRecordIndex,
        readonly mode: OutputMode,
    ) {
        for (const reference of references) {
            const record: AssetRecord | undefined = records.get(reference.url);
            if (record?.status === 'fetched') {
                this.forms.set(reference.url, localForm(record, mode));
            } else {
                this.forms.set(reference.url, reference.url);
                this.missingUrls.push(reference.url);
            }
        }
    }

    /** Replacement of `url`, or undefined when the case does not reference it */
    get(url: string): string | undefined {
        return this.forms.get(url);
    }

    /** Whether `url` is rewritten to a local form */
    isLocal(url: string): boolean {
        const form = this.forms.get(url);
        return form !== undefined && form !== url;
    }

    /** Referenced URLs without a fetched record */
    get missing(): readonly string[] {
        return this.missingUrls;
    }
}
