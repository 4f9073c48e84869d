import { z } from 'zod';
import { ActionError, TransportError } from './errors.js';
import { logVerbose } from './logger.js';

export const ANKI_CONNECT_URL = 'http://127.0.0.1:8765';
export const ANKI_CONNECT_VERSION = 6;

export type AnkiRequestPayload = {
  action: string;
  version: number;
  params?: Record<string, unknown>;
};

export type AnkiResponse<R> = {
  result: R | null;
  error: string | null;
};

/**
 * Delivers one request envelope and resolves with the decoded JSON body.
 */
export type AnkiTransport = (payload: AnkiRequestPayload) => Promise<unknown>;

// Generic response schema
export function AnkiConnectResponse<T extends z.ZodTypeAny>(resultSchema: T) {
  return z.object({
    result: resultSchema.nullable(),
    error: z.string().nullable(),
  });
}

export function createHttpTransport(
  url: string = ANKI_CONNECT_URL,
): AnkiTransport {
  return async (payload) => {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
      });
    } catch (error) {
      const details = error instanceof Error ? error.message : String(error);
      throw new TransportError(
        `Network error: Could not connect to AnkiConnect at ${url}. Is Anki running? Details: ${details}`,
        { cause: error },
      );
    }

    if (!response.ok) {
      throw new TransportError(`HTTP error! status: ${response.status}`, {
        status: response.status,
      });
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new TransportError(
        `AnkiConnect returned a non-JSON body for action: ${payload.action}`,
        { cause: error },
      );
    }
  };
}

export class AnkiConnectClient {
  private readonly transport: AnkiTransport;

  constructor(transport: AnkiTransport = createHttpTransport()) {
    this.transport = transport;
  }

  /**
   * Sends an action and returns the validated envelope as-is.
   * A non-null `error` from AnkiConnect is returned, not thrown.
   */
  async send<R>(
    action: string,
    resultSchema: z.ZodType<R>,
    params?: Record<string, unknown>,
  ): Promise<AnkiResponse<R>> {
    const payload: AnkiRequestPayload =
      params === undefined
        ? { action, version: ANKI_CONNECT_VERSION }
        : { action, version: ANKI_CONNECT_VERSION, params };

    await logVerbose(`Request: ${JSON.stringify(payload)}`);
    const body = await this.transport(payload);
    await logVerbose(`Response (${action}): ${JSON.stringify(body)}`);

    const parsed = AnkiConnectResponse(resultSchema).safeParse(body);
    if (!parsed.success) {
      throw new TransportError(
        `AnkiConnect response validation failed for action "${action}":\n${z.prettifyError(parsed.error)}`,
      );
    }
    return { result: parsed.data.result ?? null, error: parsed.data.error };
  }

  /**
   * Like `send`, but the action must succeed with a non-null result.
   */
  async request<R>(
    action: string,
    resultSchema: z.ZodType<R>,
    params?: Record<string, unknown>,
  ): Promise<R> {
    const response = await this.send(action, resultSchema, params);
    if (response.error !== null) {
      throw new ActionError(action, response.error);
    }
    if (response.result === null) {
      throw new ActionError(action, 'returned a null result');
    }
    return response.result;
  }
}
