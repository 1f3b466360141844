/**
 * Business settings document (configuration/branch)
 */

import { BusinessSettingsSchema, DEFAULT_BUSINESS_SETTINGS, type BusinessSettings } from '@tillsync/shared';
import { COLLECTIONS, SETTINGS_DOCUMENT_ID } from '../config/index.js';
import type { DocumentStore } from '../lib/store/index.js';

export class SettingsRepository {
    constructor(private readonly store: DocumentStore) {}

    /** Missing document means defaults; a malformed one is a ZodError */
    async load(): Promise<BusinessSettings> {
        const doc = await this.store.get(COLLECTIONS.configuration, SETTINGS_DOCUMENT_ID);
        if (!doc) return DEFAULT_BUSINESS_SETTINGS;
        return BusinessSettingsSchema.parse(doc.data);
    }
}
