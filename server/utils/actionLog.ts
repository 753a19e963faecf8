import { logs, SeverityNumber } from '@opentelemetry/api-logs';

import { redactSecrets } from './redact';

const DEFAULT_SCOPE = 'typeform-responses.client';
const DEFAULT_VERSION = '1.0.0';

export type SeverityLevel = 'debug' | 'info' | 'warn' | 'error';

type AttributeValue = string | number | boolean;

export interface ActionEvent {
  type: string;
  message?: string;
  severity?: SeverityLevel;
  attributes?: Record<string, unknown>;
}

const severityMap: Record<SeverityLevel, { number: SeverityNumber; text: string }> = {
  debug: { number: SeverityNumber.DEBUG, text: 'DEBUG' },
  info: { number: SeverityNumber.INFO, text: 'INFO' },
  warn: { number: SeverityNumber.WARN, text: 'WARN' },
  error: { number: SeverityNumber.ERROR, text: 'ERROR' },
};

const loggerCache = new Map<string, ReturnType<typeof logs.getLogger>>();

function getLogger(scope: string): ReturnType<typeof logs.getLogger> {
  const cached = loggerCache.get(scope);
  if (cached) {
    return cached;
  }
  const logger = logs.getLogger(scope, DEFAULT_VERSION);
  loggerCache.set(scope, logger);
  return logger;
}

function sanitizeAttributeValue(value: unknown): AttributeValue | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function collectAttributes(event: ActionEvent): Record<string, AttributeValue> {
  const attributes: Record<string, AttributeValue> = { 'event.type': event.type };
  const redacted = redactSecrets(event.attributes ?? {});
  if (!redacted || typeof redacted !== 'object') {
    return attributes;
  }

  for (const [key, raw] of Object.entries(redacted)) {
    const value = sanitizeAttributeValue(raw);
    if (value !== undefined) {
      attributes[`event.${key.replace(/[^a-zA-Z0-9_.:-]/g, '_')}`] = value;
    }
  }
  return attributes;
}

export function logAction(event: ActionEvent, scope: string = DEFAULT_SCOPE): void {
  const severity = severityMap[event.severity ?? 'info'];
  const message = event.message ?? `Action recorded: ${event.type}`;
  const attributes = collectAttributes(event);

  try {
    getLogger(scope).emit({
      severityNumber: severity.number,
      severityText: severity.text,
      body: message,
      attributes,
      timestamp: Date.now(),
    });
  } catch (error) {
    const fallback = `[actionLog] Failed to emit ${event.type}: ${error instanceof Error ? error.message : String(error)}`;
    if (severity.number >= SeverityNumber.WARN) {
      console.warn(fallback, { message, attributes });
    } else {
      console.debug(fallback, { message, attributes });
    }
  }
}
