import { createChildLogger } from '@spurn/shared/src/logger.js';
import type { PlainTextQueryType } from '@spurn/shared/src/types/query.types.js';
import { InvariantViolation } from '@spurn/shared/src/utils/errors.js';
import type { MorphologyClient } from '../services/morphology/types.js';
import type { Query } from './query.js';
import { E_EXCEPTION } from './dispatcher.js';

const log = createChildLogger('queries:plain-text');

/** How letters are read aloud when a word is spelled out. */
const CHAR_PRONUNCIATION: Readonly<Record<string, string>> = {
  a: 'a',
  á: 'á',
  b: 'bé',
  c: 'sé',
  d: 'dé',
  ð: 'eð',
  e: 'e',
  é: 'je',
  f: 'eff',
  g: 'gé',
  h: 'há',
  i: 'i',
  í: 'í',
  j: 'joð',
  k: 'ká',
  l: 'ell',
  m: 'emm',
  n: 'enn',
  o: 'o',
  ó: 'ó',
  p: 'pé',
  q: 'kú',
  r: 'err',
  s: 'ess',
  t: 'té',
  u: 'u',
  ú: 'ú',
  v: 'vaff',
  x: 'ex',
  y: 'ufsilon i',
  ý: 'ufsilon í',
  þ: 'þoddn',
  æ: 'æ',
  ö: 'ö',
  z: 'seta',
};

const PAUSE = '<break time="0.3s"/>';

const WORDTYPE_NOM = '(?:orðið|nafnið|nafnorðið|lýsingarorðið)';
const WORDTYPE_GEN = '(?:orðsins|nafnsins|nafnorðsins|lýsingarorðsins)';

const SPELLING_PATTERNS: readonly RegExp[] = [
  `^hvernig stafsetur maður ${WORDTYPE_NOM}?\\s?(.+)$`,
  `^hvernig skal stafsetja ${WORDTYPE_NOM}?\\s?(.+)$`,
  `^hvernig skrifar maður ${WORDTYPE_NOM}?\\s?(.+)$`,
  `^hvernig stafar maður ${WORDTYPE_NOM}?\\s?(.+)$`,
  `^hvernig er ${WORDTYPE_NOM}?\\s?(.+) stafsett$`,
  `^hvernig er ${WORDTYPE_NOM}?\\s?(.+) skrifað$`,
  `^hvernig er ${WORDTYPE_NOM}?\\s?(.+) stafað$`,
  `^hvernig skal stafa ${WORDTYPE_NOM}?\\s?(.+)$`,
  `^hvernig stafast ${WORDTYPE_NOM}?\\s?(.+)$`,
].map((source) => new RegExp(source, 'u'));

const DECLENSION_PATTERNS: readonly RegExp[] = [
  `^hvernig beygi ég ${WORDTYPE_NOM} (.+)$`,
  `^hvernig beygirðu ${WORDTYPE_NOM} (.+)$`,
  `^hvernig á að beygja ${WORDTYPE_NOM} (.+)$`,
  `^hvernig á ég að beygja ${WORDTYPE_NOM} (.+)$`,
  `^hvernig á maður að beygja ${WORDTYPE_NOM} (.+)$`,
  `^hvernig beygir maður ${WORDTYPE_NOM} (.+)$`,
  `^hvernig beygist ${WORDTYPE_NOM} (.+)$`,
  `^hvernig skal beygja ${WORDTYPE_NOM} (.+)$`,
  `^hvernig er ${WORDTYPE_NOM} (.+) beygt$`,
  `^hverjar eru beygingarmyndir ${WORDTYPE_GEN} (.+)$`,
  `^hvað eru beygingarmyndir ${WORDTYPE_GEN} (.+)$`,
].map((source) => new RegExp(source, 'u'));

export interface PlainTextMatch {
  readonly qtype: PlainTextQueryType;
  readonly word: string;
}

export interface PlainTextAnswer {
  readonly answer: { readonly answer: string };
  readonly voiceAnswer: string;
}

export interface PlainTextOptions {
  readonly morphology: MorphologyClient;
  readonly ttlHours: number;
  readonly now?: Date;
}

function firstMatch(patterns: readonly RegExp[], text: string): string | undefined {
  for (const pattern of patterns) {
    const word = pattern.exec(text)?.[1];
    if (word) {
      return word;
    }
  }
  return undefined;
}

/** Matches the lowercased query text, less any trailing `?`, against the word query patterns. */
export function matchPlainText(text: string): PlainTextMatch | undefined {
  const normalized = text.trim().toLowerCase().replace(/\?+$/, '');
  const spelled = firstMatch(SPELLING_PATTERNS, normalized);
  if (spelled) {
    return { qtype: 'Spelling', word: spelled };
  }
  const declined = firstMatch(DECLENSION_PATTERNS, normalized);
  if (declined) {
    return { qtype: 'Declension', word: declined };
  }
  return undefined;
}

export function spellingAnswer(word: string): PlainTextAnswer {
  const chars = [...word];
  const answer = chars.map((c) => c.toUpperCase()).join(' ');
  const spoken = chars.map((c) => CHAR_PRONUNCIATION[c] ?? c);
  return {
    answer: { answer },
    voiceAnswer: `Orðið '${word}' er stafað á eftirfarandi hátt: ${PAUSE} ${spoken.join(PAUSE)}`,
  };
}

export async function declensionAnswer(word: string, morphology: MorphologyClient): Promise<PlainTextAnswer> {
  const forms = await morphology.lookupDeclension(word);
  if (!forms) {
    const message = `Orðið '${word}' fannst ekki í Beygingarlýsingu íslensks nútímamáls.`;
    return { answer: { answer: message }, voiceAnswer: message };
  }

  const { nominative, accusative, dative, genitive } = forms;
  return {
    answer: { answer: [nominative, accusative, dative, genitive].join(', ') },
    voiceAnswer:
      `Orðið '${word}' beygist á eftirfarandi hátt: ` +
      `Hér er ${nominative}, um ${accusative}, frá ${dative}, til ${genitive}.`,
  };
}

/**
 * Answers spelling and declension questions straight from the query text.
 * Returns false when the text is not such a question; otherwise the query
 * has been answered or has failed.
 */
export async function handlePlainText(query: Query, options: PlainTextOptions): Promise<boolean> {
  const match = matchPlainText(query.text);
  if (!match) {
    return false;
  }

  const { qtype, word } = match;
  query.setQtype(qtype);
  query.setKey(word);

  try {
    const result =
      qtype === 'Spelling' ? spellingAnswer(word) : await declensionAnswer(word, options.morphology);
    query.setAnswer(result.answer, result.voiceAnswer);
    const now = options.now ?? new Date();
    query.setExpires(new Date(now.getTime() + options.ttlHours * 60 * 60 * 1000));
    log.info({ qtype, word }, 'Plain text query answered');
  } catch (error) {
    if (error instanceof InvariantViolation) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    log.warn({ qtype, word, err: error }, 'Exception generating word query answer');
    query.setError(`${E_EXCEPTION}: ${message}`);
  }
  return true;
}
