/**
 * Raw error from the ElevenLabs HTTP API, before classification.
 * Not an SFXError; the client classifies it into one.
 */
export class ElevenLabsApiError extends Error {
  readonly statusCode?: number;
  readonly body?: unknown;

  constructor(statusCode?: number, body?: unknown) {
    super(`status_code: ${statusCode ?? 'unknown'}, body: ${renderBody(body)}`);
    this.name = 'ElevenLabsApiError';
    this.statusCode = statusCode;
    this.body = body;
  }
}

function renderBody(body: unknown): string {
  if (body === undefined) {
    return 'none';
  }
  if (typeof body === 'string') {
    return body;
  }
  try {
    return JSON.stringify(body);
  } catch {
    return String(body);
  }
}
