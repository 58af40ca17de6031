import { z } from 'zod';
import type { KeyEvent, SessionConfig } from '../shared/types.js';

export const sessionConfigSchema = z
  .object({
    candidateCount: z.union([z.literal(5), z.literal(7), z.literal(9)]).default(9),
    learningEnabled: z.boolean().default(true),
    autoSubmitSingleCandidate: z.boolean().default(false),
    fullWidthPunctuation: z.boolean().default(true),
    fuzzyToneMatching: z.boolean().default(false),
    initialText: z.string().default(''),
  })
  .strict();

export const keyEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('symbol'), symbolId: z.string().min(1) }),
  z.object({ type: z.literal('complete') }),
  z.object({ type: z.literal('select'), index: z.number().int().min(1).max(9) }),
  z.object({ type: z.literal('delete') }),
  z.object({ type: z.literal('punctuation'), char: z.string().min(1) }),
  z.object({ type: z.literal('cursor'), direction: z.enum(['left', 'right', 'home', 'end']) }),
  z.object({ type: z.literal('navigate'), direction: z.enum(['up', 'down', 'left', 'right']) }),
  z.object({ type: z.literal('cancel') }),
  z.object({ type: z.literal('submit') }),
]);

const eventRequestSchema = z.object({ event: keyEventSchema });

export const createSessionSchema = z.object({
  callerId: z.string().min(1).max(200),
  config: z.unknown().optional(),
});

export const phraseSchema = z.object({
  zhuyin: z.string().min(1),
  text: z.string().min(1).max(64),
});

export type ParseResult<T> = { ok: true; value: T } | { ok: false; message: string };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseSessionConfig(input: unknown): ParseResult<SessionConfig> {
  const parsed = sessionConfigSchema.safeParse(input ?? {});
  return parsed.success
    ? { ok: true, value: parsed.data }
    : { ok: false, message: formatIssues(parsed.error) };
}

export function parseKeyEvent(input: unknown): ParseResult<KeyEvent> {
  const parsed = keyEventSchema.safeParse(input);
  return parsed.success
    ? { ok: true, value: parsed.data }
    : { ok: false, message: formatIssues(parsed.error) };
}

export function parseEventRequest(input: unknown): ParseResult<KeyEvent> {
  const parsed = eventRequestSchema.safeParse(input);
  return parsed.success
    ? { ok: true, value: parsed.data.event }
    : { ok: false, message: formatIssues(parsed.error) };
}

export function parsePhrase(input: unknown): ParseResult<{ zhuyin: string; text: string }> {
  const parsed = phraseSchema.safeParse(input);
  return parsed.success
    ? { ok: true, value: parsed.data }
    : { ok: false, message: formatIssues(parsed.error) };
}
