import type { QueryRecord, QueryStatus, QueryToken } from '@spurn/shared/src/types/query.types.js';
import { InvariantViolation } from '@spurn/shared/src/utils/errors.js';

/**
 * A single question on its way through the pipeline. Starts out
 * `unresolved` and ends either `answered` or `errored`; once terminal it
 * can no longer change outcome.
 */
export interface Query {
  readonly text: string;
  readonly tokens: readonly QueryToken[];
  readonly status: QueryStatus;
  setQtype(qtype: string): void;
  setKey(key: string): void;
  setAnswer(answer: unknown, voiceAnswer?: string): void;
  setError(error: string): void;
  setExpires(expires: Date): void;
  toJSON(): QueryRecord;
}

export function createQuery(text: string, tokens: readonly QueryToken[] = []): Query {
  let status: QueryStatus = 'unresolved';
  let qtype: string | null = null;
  let key: string | null = null;
  let answer: unknown = null;
  let voiceAnswer: string | null = null;
  let error: string | null = null;
  let expires: Date | null = null;

  function assertUnresolved(next: QueryStatus): void {
    if (status !== 'unresolved') {
      throw new InvariantViolation(`Query is already ${status}, cannot become ${next}`);
    }
  }

  return {
    text,
    tokens,
    get status(): QueryStatus {
      return status;
    },
    setQtype(value: string): void {
      qtype = value;
    },
    setKey(value: string): void {
      key = value;
    },
    setAnswer(value: unknown, voice?: string): void {
      assertUnresolved('answered');
      status = 'answered';
      answer = value;
      voiceAnswer = voice ?? null;
    },
    setError(value: string): void {
      assertUnresolved('errored');
      status = 'errored';
      error = value;
    },
    setExpires(value: Date): void {
      expires = value;
    },
    toJSON(): QueryRecord {
      return { text, status, qtype, key, answer, voiceAnswer, error, expires };
    },
  };
}
