import { InfoSettings } from '../../services/settingsTypes';
import { cloneDocument, getObject, getString, JsonObject, SwaggerDocument } from '../swaggerTypes';

const CONNECTOR_METADATA_KEY = 'x-ms-connector-metadata';

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function normalizeTitle(title: string, restrictedWords: readonly string[]): string {
    let normalized = title;
    for (const word of restrictedWords) {
        normalized = normalized.replace(new RegExp(`(?<![A-Za-z0-9_])${escapeRegExp(word)}(?![A-Za-z0-9_])`, 'gi'), '');
    }
    return normalized
        .replace(/\s+/g, ' ')
        .trim()
        .replace(/[^a-zA-Z0-9]+$/, '');
}

/**
 * Brings `info` in line with certification rules: no restricted words in
 * the title, a description of usable length, a contact, and connector
 * metadata at the document root rather than inside `info`.
 */
export function fixInfoSection(document: SwaggerDocument, settings: InfoSettings): SwaggerDocument {
    const result = cloneDocument(document);
    const info = getObject(result, 'info');
    if (!info) {
        return result;
    }

    const title = getString(info, 'title');
    if (title !== undefined) {
        info.title = normalizeTitle(title, settings.restrictedTitleWords);
    }

    const description = getString(info, 'description');
    if (!description || description.length < settings.minDescriptionLength) {
        info.description = settings.defaultDescription;
    }

    if (!('contact' in info)) {
        info.contact = { ...settings.defaultContact };
    }

    delete info[CONNECTOR_METADATA_KEY];

    if (!(CONNECTOR_METADATA_KEY in result)) {
        result[CONNECTOR_METADATA_KEY] = settings.connectorMetadata.map((entry): JsonObject => ({ ...entry }));
    }

    return result;
}
