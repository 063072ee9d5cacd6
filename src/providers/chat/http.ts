import type { z } from 'zod';
import { ApiError, NetworkError, ParseError, describeError } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { HttpTransport } from './IChatProvider.js';

const logger = createChildLogger('chat-http');

const FRAGMENT_LENGTH = 200;

interface PostJsonInput {
  provider: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  transport: HttpTransport;
  signal?: AbortSignal;
  timeoutMs?: number;
}

function describeTransportError(error: unknown): string {
  if (error instanceof Error && error.cause instanceof Error) {
    return `${error.message} (${error.cause.message})`;
  }
  return describeError(error);
}

function buildSignal(signal?: AbortSignal, timeoutMs?: number): AbortSignal | undefined {
  const timeout = timeoutMs === undefined ? undefined : AbortSignal.timeout(timeoutMs);
  if (signal && timeout) {
    return AbortSignal.any([signal, timeout]);
  }
  return signal ?? timeout;
}

export interface JsonReply {
  status: number;
  data: unknown;
}

/**
 * POST a JSON body and return the decoded JSON response.
 * The status is checked before the body is touched; a non-2xx body is discarded unread
 * so the connection goes back to the pool.
 */
export async function postJson(input: PostJsonInput): Promise<JsonReply> {
  const { provider } = input;

  let response: Response;
  try {
    response = await input.transport(input.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...input.headers },
      body: JSON.stringify(input.body),
      signal: buildSignal(input.signal, input.timeoutMs),
    });
  } catch (error) {
    throw new NetworkError(provider, describeTransportError(error));
  }

  if (!response.ok) {
    await response.body?.cancel().catch((error: unknown) => {
      logger.debug({ provider, error: describeError(error) }, 'Discarding error body failed');
    });
    throw new ApiError(provider, response.status);
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throw new NetworkError(provider, describeTransportError(error));
  }

  try {
    return { status: response.status, data: JSON.parse(text) };
  } catch {
    throw new ParseError(provider, 'response body is not valid JSON', text.slice(0, FRAGMENT_LENGTH));
  }
}

export function decodeBody<T>(provider: string, schema: z.ZodType<T>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ParseError(
      provider,
      `unexpected response shape (${issues.join('; ')})`,
      JSON.stringify(data).slice(0, FRAGMENT_LENGTH)
    );
  }
  return result.data;
}
