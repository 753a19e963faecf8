// Typeform Responses API model.
// Field names follow the wire format; absent optional values decode to undefined.

export const ANSWER_TYPES = [
  'choice',
  'choices',
  'date',
  'email',
  'url',
  'file_url',
  'number',
  'boolean',
  'text',
  'payment',
  'phone_number',
] as const;

export type AnswerType = (typeof ANSWER_TYPES)[number];

/** Paged list of form responses. */
export interface Responses {
  /** Total number of items in the retrieved collection. */
  total_items?: number;
  /** Number of pages. */
  page_count?: number;
  items: FormResponse[];
}

export interface FormResponse {
  /** Unique per request. Also the cursor for `after` paging. */
  token: string;
  /** Unique per form, not globally. */
  response_id?: string;
  /** ISO 8601, UTC, to the second. */
  landed_at: string;
  /** ISO 8601, UTC, to the second. */
  submitted_at: string;
  metadata: ResponseMetadata;
  /** Subset of the form definition relevant to this submission. */
  definition?: ResponseDefinition;
  answers?: Answer[];
  calculated: Calculated;
}

/** Metadata about the respondent's HTTP request. */
export interface ResponseMetadata {
  user_agent: string;
  /** Derived from the user agent. */
  platform?: string;
  referer: string;
  /** IP of the client. */
  network_id: string;
}

export interface ResponseDefinition {
  fields: FieldDefinition[];
}

export interface FieldDefinition {
  id: string;
  type: string;
  title: string;
  description: string;
}

export interface AnswerField {
  /** Id of the form field the answer refers to. */
  id: string;
  /** The field's type in the form, e.g. `multiple_choice` or `short_text`. */
  type: string;
  /** Use `ref` to match answers with questions. */
  ref: string;
  title?: string;
}

export interface Choice {
  label: string;
  other?: string;
}

export interface Choices {
  labels: string[];
  other?: string;
}

export interface Payment {
  amount: string;
  last4: string;
  name: string;
}

export interface Calculated {
  score: number;
}

/**
 * One answer as the provider sends it: a discriminant plus eleven optional
 * payload slots. Only the slot named by `type` is expected to be set, but the
 * flat form does not check it. Use `resolveAnswer` for the checked variant.
 */
export interface Answer {
  field: AnswerField;
  type: AnswerType;
  choice?: Choice;
  choices?: Choices;
  date?: string;
  email?: string;
  url?: string;
  file_url?: string;
  number?: number;
  boolean?: boolean;
  text?: string;
  payment?: Payment;
  phone_number?: string;
}

export interface AnswerPayloads {
  choice: Choice;
  choices: Choices;
  date: string;
  email: string;
  url: string;
  file_url: string;
  number: number;
  boolean: boolean;
  text: string;
  payment: Payment;
  phone_number: string;
}

export type TypedAnswer = {
  [K in AnswerType]: { type: K; field: AnswerField; value: AnswerPayloads[K] };
}[AnswerType];

export interface DecodeOptions {
  /**
   * Reject the whole collection when an answer's populated payload does not
   * match its discriminant. Answers are still returned in their flat form; use
   * `resolveAnswers` for the tagged variants.
   */
  strictAnswers?: boolean;
}
