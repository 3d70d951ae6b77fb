/**
 * Supported languages, chosen once at startup.
 */

import type { LanguageCapability, LanguageId } from './language';
import { TallyLanguage } from './tally/language';

export function createLanguage(id: LanguageId): LanguageCapability {
    switch (id) {
        case 'tally':
            return new TallyLanguage({ dialect: 'script' });
        case 'tally-query':
            return new TallyLanguage({ dialect: 'query' });
    }
}
