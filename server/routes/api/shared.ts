import type { Request } from 'express';
import { z } from 'zod';
import { InputError, StateError } from '../../../utils/errors';
import type { Broadcaster } from '../../../utils/voice/Broadcaster';
import type { Session } from '../../../utils/voice/Session';
import type { SessionRegistry } from '../../../utils/voice/SessionRegistry';

export interface ServerContext {
  registry: SessionRegistry;
  broadcaster: Broadcaster;
  /** Whether the Discord gateway is logged in and ready */
  isReady: () => boolean;
}

const tenantIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(64)
  .regex(/^[\w-]+$/, 'must contain only letters, digits, "_" or "-"');

const indexSchema = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform(Number)
  .pipe(z.number().int().max(Number.MAX_SAFE_INTEGER));

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    .join('; ');
}

/**
 * Validate a request body, throwing InputError on failure
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new InputError(`Invalid request: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function tenantParam(req: Request): string {
  const result = tenantIdSchema.safeParse(req.params['tenantId']);
  if (!result.success) {
    throw new InputError(`Invalid tenantId: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function indexParam(req: Request): number {
  const raw = req.params['index'];
  const result = indexSchema.safeParse(raw);
  if (!result.success) {
    throw new InputError(`Invalid queue index: ${raw ?? ''}`);
  }
  return result.data;
}

/**
 * Session for commands that only make sense once the tenant has joined voice
 */
export function requireSession(registry: SessionRegistry, tenantId: string): Session {
  const session = registry.get(tenantId);
  if (!session) {
    throw new StateError('Not connected to a voice channel');
  }
  return session;
}
