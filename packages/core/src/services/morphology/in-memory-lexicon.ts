import { createChildLogger } from '@spurn/shared/src/logger.js';
import { upperFirst } from '@spurn/shared/src/utils/text.js';
import type { DeclensionForms, MorphologyClient } from './types.js';

const log = createChildLogger('morphology:lexicon');

/**
 * Lexicon-backed declension lookup. Any inflected form finds its entry, and a
 * lowercase miss is retried with the first letter capitalized so that proper
 * nouns resolve.
 */
export function createInMemoryLexicon(entries: readonly DeclensionForms[] = []): MorphologyClient {
  const byForm = new Map<string, DeclensionForms>();
  for (const entry of entries) {
    for (const form of [entry.nominative, entry.accusative, entry.dative, entry.genitive]) {
      // First entry wins for shared forms
      if (!byForm.has(form)) {
        byForm.set(form, entry);
      }
    }
  }

  log.debug({ entries: entries.length, forms: byForm.size }, 'Lexicon loaded');

  return {
    lookupDeclension(word: string): Promise<DeclensionForms | null> {
      const entry = byForm.get(word) ?? byForm.get(upperFirst(word));
      return Promise.resolve(entry ?? null);
    },
  };
}
