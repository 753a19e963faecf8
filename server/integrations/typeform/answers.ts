import { DecodeError } from '../errors';
import { ANSWER_TYPES, type Answer, type FormResponse, type TypedAnswer } from './types';

function toTyped(answer: Answer): TypedAnswer | undefined {
  const { field } = answer;
  switch (answer.type) {
    case 'choice':
      return answer.choice === undefined ? undefined : { type: 'choice', field, value: answer.choice };
    case 'choices':
      return answer.choices === undefined ? undefined : { type: 'choices', field, value: answer.choices };
    case 'date':
      return answer.date === undefined ? undefined : { type: 'date', field, value: answer.date };
    case 'email':
      return answer.email === undefined ? undefined : { type: 'email', field, value: answer.email };
    case 'url':
      return answer.url === undefined ? undefined : { type: 'url', field, value: answer.url };
    case 'file_url':
      return answer.file_url === undefined ? undefined : { type: 'file_url', field, value: answer.file_url };
    case 'number':
      return answer.number === undefined ? undefined : { type: 'number', field, value: answer.number };
    case 'boolean':
      return answer.boolean === undefined ? undefined : { type: 'boolean', field, value: answer.boolean };
    case 'text':
      return answer.text === undefined ? undefined : { type: 'text', field, value: answer.text };
    case 'payment':
      return answer.payment === undefined ? undefined : { type: 'payment', field, value: answer.payment };
    case 'phone_number':
      return answer.phone_number === undefined
        ? undefined
        : { type: 'phone_number', field, value: answer.phone_number };
  }
}

/**
 * Converts a flat answer into its tagged variant. Throws a DecodeError when the
 * payload named by `type` is missing or another payload slot is populated.
 */
export function resolveAnswer(answer: Answer): TypedAnswer {
  const typed = toTyped(answer);
  if (!typed) {
    throw new DecodeError(`answer for field ${answer.field.id} has type "${answer.type}" but no ${answer.type} payload`, [
      `field ${answer.field.id}: missing ${answer.type}`,
    ]);
  }

  const unexpected = ANSWER_TYPES.filter(slot => slot !== answer.type && answer[slot] !== undefined);
  if (unexpected.length > 0) {
    throw new DecodeError(
      `answer for field ${answer.field.id} has type "${answer.type}" but also carries ${unexpected.join(', ')}`,
      unexpected.map(slot => `field ${answer.field.id}: unexpected ${slot}`),
    );
  }

  return typed;
}

export function resolveAnswers(response: FormResponse): TypedAnswer[] {
  return (response.answers ?? []).map(resolveAnswer);
}
