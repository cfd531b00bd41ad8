import type { HandlerContext, HandlerEvent, HandlerResponse } from '@netlify/functions';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { describeError, isRelayError } from '../../src/lib/errors';
import { corsHeaders, correlationIdFrom, originFrom } from '../../src/lib/http/httpUtils';
import { createLogger } from '../../src/lib/logging/logger';

type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'OPTIONS';

type HandlerUtilities = {
  json: (statusCode: number, body: unknown, headers?: Record<string, string>) => HandlerResponse;
  text: (statusCode: number, body: string, headers?: Record<string, string>) => HandlerResponse;
  binary: (data: Uint8Array, contentType: string, headers?: Record<string, string>) => HandlerResponse;
  requestId: string;
};

type WrappedHandler = (
  event: HandlerEvent,
  utils: HandlerUtilities
) => Promise<HandlerResponse | Record<string, unknown> | string | void>;

type RequestContext = Partial<Pick<HandlerContext, 'awsRequestId'>>;

export type RelayHandler = (event: HandlerEvent, context?: RequestContext) => Promise<HandlerResponse>;

export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

const log = createLogger('http');

function createUtilities(requestId: string, cors: Record<string, string>): HandlerUtilities {
  return {
    json(statusCode, body, headers = {}) {
      return {
        statusCode,
        headers: { 'Content-Type': 'application/json; charset=utf-8', ...cors, ...headers },
        body: JSON.stringify(body ?? {}),
      };
    },
    text(statusCode, body, headers = {}) {
      return {
        statusCode,
        headers: { 'Content-Type': 'text/plain; charset=utf-8', ...cors, ...headers },
        body,
      };
    },
    binary(data, contentType, headers = {}) {
      return {
        statusCode: 200,
        headers: { 'Content-Type': contentType, ...cors, ...headers },
        body: Buffer.from(data).toString('base64'),
        isBase64Encoded: true,
      };
    },
    requestId,
  };
}

function buildErrorResponse(err: unknown, utils: HandlerUtilities): HandlerResponse {
  if (err instanceof ZodError) {
    const issues = err.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
    return utils.json(400, { ok: false, error: 'Invalid request', issues, requestId: utils.requestId });
  }

  if (err instanceof HttpError) {
    return utils.json(err.statusCode, { ok: false, error: err.message, requestId: utils.requestId });
  }

  if (isRelayError(err)) {
    if (err.statusCode >= 500) {
      log.error('request failed', { requestId: utils.requestId, code: err.code, error: err.message });
    }
    return utils.json(err.statusCode, {
      ok: false,
      error: err.message,
      code: err.code,
      requestId: utils.requestId,
    });
  }

  log.error('unhandled error', { requestId: utils.requestId, error: describeError(err) });
  return utils.json(500, { ok: false, error: 'Internal Server Error', requestId: utils.requestId });
}

function isHandlerResponse(value: object): value is HandlerResponse {
  return 'statusCode' in value && typeof value.statusCode === 'number';
}

function normaliseResult(
  result: HandlerResponse | Record<string, unknown> | string | void,
  utils: HandlerUtilities
): HandlerResponse {
  if (result && typeof result === 'object' && isHandlerResponse(result)) {
    return result;
  }

  if (typeof result === 'string') {
    return utils.text(200, result);
  }

  return utils.json(200, result ?? {});
}

export function createHandler(methods: HttpMethod[], handler: WrappedHandler): RelayHandler {
  const allowed = methods.map((method) => method.toUpperCase());

  return async (event, context = {}) => {
    const requestId = event.headers?.['x-request-id'] || context.awsRequestId || correlationIdFrom(event.headers);
    const utils = createUtilities(requestId, corsHeaders(originFrom(event.headers)));

    if (event.httpMethod === 'OPTIONS') {
      return utils.text(204, '');
    }

    if (event.httpMethod && !allowed.includes(event.httpMethod.toUpperCase())) {
      return utils.json(
        405,
        { ok: false, error: `Method ${event.httpMethod} not allowed`, requestId },
        { Allow: allowed.join(', ') }
      );
    }

    try {
      const result = await handler(event, utils);
      return normaliseResult(result, utils);
    } catch (err) {
      return buildErrorResponse(err, utils);
    }
  };
}

export function parseJsonBody<T>(event: HandlerEvent, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const raw = event.body
    ? event.isBase64Encoded
      ? Buffer.from(event.body, 'base64').toString('utf8')
      : event.body
    : '';

  let json: unknown = {};
  if (raw.trim()) {
    try {
      json = JSON.parse(raw);
    } catch {
      throw new HttpError(400, 'Invalid JSON body');
    }
  }
  return schema.parse(json);
}

export function parseQuery<T>(event: HandlerEvent, schema: ZodType<T, ZodTypeDef, unknown>): T {
  return schema.parse(event.queryStringParameters ?? {});
}

/** Base64 payloads are how the browser sends file bytes through a JSON body. */
export function decodeBase64(data: string): Uint8Array {
  const bytes = Buffer.from(data, 'base64');
  if (bytes.length === 0 && data.length > 0) {
    throw new HttpError(400, 'file must be base64 encoded');
  }
  return new Uint8Array(bytes);
}

export type { HandlerUtilities };
