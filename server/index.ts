export { TypeformAPIClient, DEFAULT_TYPEFORM_URL } from './integrations/TypeformAPIClient';
export type { TypeformClientOptions } from './integrations/TypeformAPIClient';
export type { APIResponse, APISuccess, APIFailure, APIClientOptions } from './integrations/BaseAPIClient';
export {
  TypeformClientError,
  RequestBuildError,
  TransportError,
  DecodeError,
  ApiError,
  ConfigurationError,
} from './integrations/errors';
export type { TypeformClientErrorKind } from './integrations/errors';
export { decodeResponses, parseResponses } from './integrations/typeform/decode';
export { resolveAnswer, resolveAnswers } from './integrations/typeform/answers';
export { ANSWER_TYPES } from './integrations/typeform/types';
export type {
  Answer,
  AnswerField,
  AnswerPayloads,
  AnswerType,
  Calculated,
  Choice,
  Choices,
  DecodeOptions,
  FieldDefinition,
  FormResponse,
  Payment,
  ResponseDefinition,
  ResponseMetadata,
  Responses,
  TypedAnswer,
} from './integrations/typeform/types';
export { loadTypeformEnv, createTypeformClientFromEnv } from './env';
export type { TypeformEnv } from './env';
