import { OpenAPIHono } from '@hono/zod-openapi';
import type { ZodIssue } from 'zod';

export interface AppEnv {
  Variables: {
    requestId: string;
    /** `Date.now()` when the request entered the app. */
    receivedAt: number;
  };
}

export interface ErrorBody {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

export function validationErrorBody(requestId: string, issues: readonly ZodIssue[]): ErrorBody {
  return {
    error: 'Validation failed',
    code: 'VALIDATION_ERROR',
    requestId,
    details: formatIssues(issues),
  };
}

/** Request bodies failing their route schema get the same 400 body as a thrown ZodError. */
export function createRouter(): OpenAPIHono<AppEnv> {
  return new OpenAPIHono<AppEnv>({
    defaultHook: (result, c): Response | undefined => {
      if (!result.success) {
        return c.json(validationErrorBody(c.get('requestId'), result.error.issues), 400);
      }
    },
  });
}
