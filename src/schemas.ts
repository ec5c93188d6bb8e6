import { z } from 'zod';

export const KarmaRecordSchema = z
  .object({
    name: z.string(),
    pluses: z.number().int().nonnegative(),
    minuses: z.number().int().nonnegative()
  })
  .strict();

export const KarmaFileSchema = z.array(KarmaRecordSchema).superRefine((records, ctx) => {
  const seen = new Set<string>();
  records.forEach((record, index) => {
    if (seen.has(record.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'name'],
        message: `Duplicate karma entry for "${record.name}"`
      });
    }
    seen.add(record.name);
  });
});

export const MessageEventSchema = z.object({
  user: z.string().min(1),
  text: z.string()
});

const UrlVerificationSchema = z.object({
  type: z.literal('url_verification'),
  challenge: z.string()
});

const EventCallbackSchema = z.object({
  type: z.literal('event_callback'),
  event: z
    .object({
      type: z.string(),
      subtype: z.string().optional(),
      bot_id: z.string().optional(),
      user: z.string().optional(),
      text: z.string().optional(),
      channel: z.string().optional()
    })
    .passthrough()
});

export const SlackEnvelopeSchema = z.discriminatedUnion('type', [
  UrlVerificationSchema,
  EventCallbackSchema
]);

export const SlashCommandSchema = z.object({
  command: z.string().min(1),
  text: z.string().default(''),
  user_id: z.string().min(1)
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
