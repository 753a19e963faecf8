import { z } from 'zod';

import { ANSWER_TYPES, type Answer, type FormResponse, type Responses } from './types';

// Missing keys and explicit nulls both decode to undefined. Unknown keys are stripped.
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

const int32 = z.number().int().min(-2147483648).max(2147483647);

const choiceSchema = z.object({
  label: z.string(),
  other: optional(z.string()),
});

const choicesSchema = z.object({
  labels: z.array(z.string()),
  other: optional(z.string()),
});

const paymentSchema = z.object({
  amount: z.string(),
  last4: z.string(),
  name: z.string(),
});

const answerFieldSchema = z.object({
  id: z.string(),
  type: z.string(),
  ref: z.string(),
  title: optional(z.string()),
});

const answerSchema: z.ZodType<Answer, z.ZodTypeDef, unknown> = z.object({
  field: answerFieldSchema,
  type: z.enum(ANSWER_TYPES),
  choice: optional(choiceSchema),
  choices: optional(choicesSchema),
  date: optional(z.string()),
  email: optional(z.string()),
  url: optional(z.string()),
  file_url: optional(z.string()),
  number: optional(int32),
  boolean: optional(z.boolean()),
  text: optional(z.string()),
  payment: optional(paymentSchema),
  phone_number: optional(z.string()),
});

const metadataSchema = z.object({
  user_agent: z.string(),
  platform: optional(z.string()),
  referer: z.string(),
  network_id: z.string(),
});

const fieldDefinitionSchema = z.object({
  id: z.string(),
  type: z.string(),
  title: z.string(),
  description: z.string(),
});

const formResponseSchema: z.ZodType<FormResponse, z.ZodTypeDef, unknown> = z.object({
  token: z.string(),
  response_id: optional(z.string()),
  landed_at: z.string(),
  submitted_at: z.string(),
  metadata: metadataSchema,
  definition: optional(z.object({ fields: z.array(fieldDefinitionSchema) })),
  answers: optional(z.array(answerSchema)),
  calculated: z.object({ score: int32 }),
});

export const responsesSchema: z.ZodType<Responses, z.ZodTypeDef, unknown> = z.object({
  total_items: optional(z.number().int().nonnegative()),
  page_count: optional(z.number().int().nonnegative()),
  items: z.array(formResponseSchema),
});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}
