/**
 * JSON-RPC 2.0 messages and the `Content-Length` framing used on a language
 * server's stdio.
 */

export type RequestId = number | string;

export interface ResponseError {
  code: number;
  message: string;
  data?: unknown;
}

export interface RequestMessage {
  kind: 'request';
  id: RequestId;
  method: string;
  params?: unknown;
}

export interface ResponseMessage {
  kind: 'response';
  id: RequestId;
  result?: unknown;
  error?: ResponseError;
}

export interface NotificationMessage {
  kind: 'notification';
  method: string;
  params?: unknown;
}

export type LspMessage = RequestMessage | ResponseMessage | NotificationMessage;

export const ErrorCodes = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
} as const;

const HEADER_DELIMITER = '\r\n\r\n';
const CONTENT_LENGTH = /Content-Length:\s*(\d+)/i;

let lastRequestId = 0;

/**
 * Process-wide request id. Strictly increasing from 1 and never reused, so
 * ids stay unique across every server this process talks to.
 */
export function nextRequestId(): number {
  lastRequestId += 1;
  return lastRequestId;
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function isRequestId(value: unknown): value is RequestId {
  return (
    (typeof value === 'number' && Number.isInteger(value)) ||
    typeof value === 'string'
  );
}

function toEnvelope(message: LspMessage): Record<string, unknown> {
  switch (message.kind) {
    case 'request':
      return {
        jsonrpc: '2.0',
        id: message.id,
        method: message.method,
        ...(message.params !== undefined ? { params: message.params } : {}),
      };
    case 'response':
      return message.error
        ? { jsonrpc: '2.0', id: message.id, error: message.error }
        : { jsonrpc: '2.0', id: message.id, result: message.result ?? null };
    case 'notification':
      return {
        jsonrpc: '2.0',
        method: message.method,
        ...(message.params !== undefined ? { params: message.params } : {}),
      };
    default: {
      const exhaustive: never = message;
      return exhaustive;
    }
  }
}

/**
 * Serializes a message into one wire frame. The header counts UTF-8 bytes,
 * not string length.
 */
export function encodeMessage(message: LspMessage): string {
  const body = JSON.stringify(toEnvelope(message));
  return `Content-Length: ${Buffer.byteLength(body, 'utf8')}${HEADER_DELIMITER}${body}`;
}

function decodeError(value: unknown): ResponseError | undefined {
  if (
    !isRecord(value) ||
    typeof value.code !== 'number' ||
    typeof value.message !== 'string'
  ) {
    return undefined;
  }
  return value.data === undefined
    ? { code: value.code, message: value.message }
    : { code: value.code, message: value.message, data: value.data };
}

/**
 * Classifies a parsed JSON value. `id` and `method` make a request, `id`
 * alone a response, `method` alone a notification. Anything else is not a
 * message.
 */
export function decodeMessage(value: unknown): LspMessage | undefined {
  if (!isRecord(value)) {
    return undefined;
  }

  const { id, method } = value;
  const hasId = id !== undefined;

  if (hasId && !isRequestId(id)) {
    return undefined;
  }

  if (typeof method === 'string') {
    const params = value.params;
    if (hasId && isRequestId(id)) {
      return params === undefined
        ? { kind: 'request', id, method }
        : { kind: 'request', id, method, params };
    }
    return params === undefined
      ? { kind: 'notification', method }
      : { kind: 'notification', method, params };
  }

  if (method !== undefined || !isRequestId(id)) {
    return undefined;
  }

  const error = decodeError(value.error);
  const response: ResponseMessage = { kind: 'response', id };
  if ('result' in value) {
    response.result = value.result;
  }
  if (error) {
    response.error = error;
  }
  return response;
}

/**
 * Parses one frame payload. Malformed JSON yields `undefined`.
 */
export function parseMessage(payload: string): LspMessage | undefined {
  let value: unknown;
  try {
    value = JSON.parse(payload);
  } catch {
    return undefined;
  }
  return decodeMessage(value);
}

export interface FrameBufferOptions {
  /** Called with a header block that carried no Content-Length. */
  onMalformedHeader?: (header: string) => void;
}

/**
 * Accumulates raw stdout bytes and cuts them into frame payloads. A frame
 * split across chunks stays buffered until its last byte arrives.
 */
export class FrameBuffer {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly options: FrameBufferOptions = {}) {}

  get size(): number {
    return this.buffer.length;
  }

  push(chunk: Buffer | string): void {
    const bytes =
      typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    this.buffer =
      this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);
  }

  /**
   * Removes and returns the next complete payload, if one is buffered.
   */
  next(): string | undefined {
    while (true) {
      const headerEnd = this.buffer.indexOf(HEADER_DELIMITER);
      if (headerEnd < 0) {
        return undefined;
      }

      const header = this.buffer.subarray(0, headerEnd).toString('ascii');
      const start = headerEnd + HEADER_DELIMITER.length;
      const match = CONTENT_LENGTH.exec(header);
      if (!match) {
        this.buffer = this.buffer.subarray(start);
        this.options.onMalformedHeader?.(header);
        continue;
      }

      const end = start + Number.parseInt(match[1], 10);
      if (this.buffer.length < end) {
        return undefined;
      }

      const payload = this.buffer.subarray(start, end).toString('utf8');
      this.buffer = this.buffer.subarray(end);
      return payload;
    }
  }

  /**
   * Removes every complete payload currently buffered.
   */
  drain(): string[] {
    const payloads: string[] = [];
    let payload = this.next();
    while (payload !== undefined) {
      payloads.push(payload);
      payload = this.next();
    }
    return payloads;
  }
}
