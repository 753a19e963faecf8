import { DecodeError } from '../errors';
import { getErrorMessage } from '../../types/common';
import { resolveAnswer } from './answers';
import { formatIssues, responsesSchema } from './schemas';
import type { DecodeOptions, Responses } from './types';

// Re-raises an answer check failure with the answer's position in the collection.
function checkAnswers(responses: Responses): void {
  responses.items.forEach((item, itemIndex) => {
    (item.answers ?? []).forEach((answer, answerIndex) => {
      try {
        resolveAnswer(answer);
      } catch (error) {
        if (!(error instanceof DecodeError)) {
          throw error;
        }
        const issues = error.issues.map(issue => `items.${itemIndex}.answers.${answerIndex}: ${issue}`);
        throw new DecodeError(issues.join('; '), issues, { cause: error });
      }
    });
  });
}

export function decodeResponses(payload: unknown, options: DecodeOptions = {}): Responses {
  const result = responsesSchema.safeParse(payload);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new DecodeError(issues.join('; '), issues, { cause: result.error });
  }

  if (options.strictAnswers) {
    checkAnswers(result.data);
  }

  return result.data;
}

export function parseResponses(text: string, options: DecodeOptions = {}): Responses {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(`body is not valid JSON (${getErrorMessage(error)})`, [], { cause: error });
  }
  return decodeResponses(payload, options);
}
