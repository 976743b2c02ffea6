import type {
  AnswerBucket,
  AnswerSource,
  BucketTable,
  Mention,
  RankedAnswer,
} from '@spurn/shared/src/types/mention.types.js';

/** Maximum number of answers returned. */
export const MAX_ANSWERS = 20;
/** Maximum number of sources returned per answer. */
export const MAX_SOURCES = 5;
/** Newest mentions of an answer taken into account when scoring it. */
export const MAX_MENTIONS = 5;
/** Cross mentions counted per answer. */
export const MAX_CROSSES = 5;
/**
 * If the answer at this index has more than one source, answers with only
 * one source are dropped.
 */
export const CUTOFF_AFTER = 4;

const CROSS_MENTION_FACTOR = 0.2;
const EX_MENTION_FACTOR = 0.35;
const MAX_LENGTH_WEIGHT = 10.0;
const MENTION_WEIGHT = 14.0;
const DAY_MS = 24 * 60 * 60 * 1000;

// "former", "outgoing", "previously", "then", "ex-"
const EXCEPTION_MARKERS = ['fyrrverandi', 'fráfarandi', 'áður', 'þáverandi', 'fyrrum'] as const;

/** True if `needle` occurs in `haystack` as whole words, ignoring case. */
export function isContained(needle: string, haystack: string): boolean {
  return ` ${haystack.toLowerCase()} `.includes(` ${needle.toLowerCase()} `);
}

export function hasExceptionMarker(text: string): boolean {
  return EXCEPTION_MARKERS.some((marker) => isContained(marker, text));
}

export function sortMentions(bucket: AnswerBucket): Mention[] {
  return [...bucket.values()].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
}

export function ageInDays(timestamp: Date, now: Date): number {
  return Math.max(0, Math.floor((now.getTime() - timestamp.getTime()) / DAY_MS));
}

/** Recency-weighted mention count; a lone mention counts for 1/e. */
export function mentionWeight(bucket: AnswerBucket, now: Date): number {
  const newest = sortMentions(bucket).slice(0, MAX_MENTIONS);
  let weight = 0;
  for (const mention of newest) {
    const age = ageInDays(mention.timestamp, now);
    weight += MENTION_WEIGHT / (1 + Math.log(age + 4) / Math.log(4));
  }
  return newest.length === 1 ? weight / Math.E : weight;
}

export function lengthWeight(text: string): number {
  return Math.min(Math.E * Math.log([...text].length), MAX_LENGTH_WEIGHT);
}

/**
 * Total score per answer: mention weight, length weight and the bonus for
 * answers that contain or are contained in other answers. The bonus for an
 * answer decays with the number of cross mentions already found for it.
 */
export function scoreAnswers(table: BucketTable, now: Date): Map<string, number> {
  const mentionWeights = new Map<string, number>();
  const scores = new Map<string, number>();

  for (const [text, bucket] of table) {
    const mw = mentionWeight(bucket, now);
    mentionWeights.set(text, mw);
    scores.set(text, mw + lengthWeight(text));
  }

  const mw = (text: string): number => mentionWeights.get(text) ?? 0;
  const addScore = (text: string, bonus: number): void => {
    scores.set(text, (scores.get(text) ?? 0) + bonus);
  };

  const byMentionWeight = [...table.keys()].sort((a, b) => mw(b) - mw(a));

  for (let i = 0; i < byMentionWeight.length - 1; i++) {
    const ri = byMentionWeight[i];
    const exI = hasExceptionMarker(ri);
    let crosses = 0;

    for (let j = i + 1; j < byMentionWeight.length; j++) {
      const rj = byMentionWeight[j];
      if (!isContained(rj, ri) && !isContained(ri, rj)) {
        continue;
      }
      crosses++;
      const exJ = hasExceptionMarker(rj);

      if (exI && !exJ) {
        // "fyrrverandi forseti Íslands" wins over plain "forseti Íslands"
        addScore(ri, mw(rj) * EX_MENTION_FACTOR);
      } else if (exJ && !exI) {
        addScore(rj, mw(ri) * EX_MENTION_FACTOR);
      } else {
        addScore(rj, (mw(ri) * CROSS_MENTION_FACTOR) / crosses);
        addScore(ri, (mw(rj) * CROSS_MENTION_FACTOR) / crosses);
      }

      if (crosses === MAX_CROSSES) {
        break;
      }
    }
  }

  return scores;
}

function toSource(mention: Mention): AnswerSource {
  return {
    domain: mention.domain,
    uuid: mention.articleId,
    heading: mention.heading,
    timestamp: mention.timestamp,
    ts: mention.timestamp.toISOString().slice(0, 16),
    url: mention.url,
  };
}

/**
 * Orders the answers in `table` by score and trims the result: at most
 * {@link MAX_ANSWERS} answers with at most {@link MAX_SOURCES} sources each,
 * newest source first.
 */
export function rankAnswers(table: BucketTable, now: Date = new Date()): RankedAnswer[] {
  const scores = scoreAnswers(table, now);
  const score = (text: string): number => scores.get(text) ?? 0;

  let ranked = [...table.entries()]
    .map(([answer, bucket]) => ({ answer, mentions: sortMentions(bucket) }))
    .sort((a, b) => score(b.answer) - score(a.answer));

  if (ranked.length > CUTOFF_AFTER && ranked[CUTOFF_AFTER].mentions.length > 1) {
    ranked = ranked.filter((r) => r.mentions.length > 1);
  }

  return ranked.slice(0, MAX_ANSWERS).map((r) => ({
    answer: r.answer,
    sources: r.mentions.slice(0, MAX_SOURCES).map(toSource),
  }));
}
