import { writeFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { request as undiciRequest } from 'undici';
import type { z } from 'zod';
import { createChildLogger } from '../../logger.js';
import { config } from '../../config.js';
import { NetworkError, describeError } from '../../errors.js';
import { createUpbitJwt, sha512Hex, toQueryString } from './auth.js';

const log = createChildLogger('upbit-client');

const DEFAULT_TIMEOUT_MS = 5_000;
const RETRY_BASE_MS = 500;

export interface RequestOptions {
  timeoutMs?: number;
  /** 재시도 횟수 (기본 config.execution.maxRetries). 주문 POST는 0 */
  retries?: number;
}

export interface PrivateRequest extends RequestOptions {
  method: 'GET' | 'POST' | 'DELETE';
  query?: Record<string, string>;
  body?: Record<string, string>;
}

export interface PrivateResponse {
  statusCode: number;
  raw: unknown;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function isOk(status: number): boolean {
  return status >= 200 && status < 300;
}

function backoffMs(attempt: number): number {
  return RETRY_BASE_MS * Math.pow(2, attempt);
}

async function readJson(body: { text(): Promise<string> }): Promise<unknown> {
  const text = await body.text();
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return { _rawBody: text };
  }
}

/**
 * raw 응답을 로그 및 파일로 덤프 (zod 실패 시 디버깅용)
 */
function dumpRaw(endpoint: string, raw: unknown): void {
  const payload = JSON.stringify(raw, null, 2);
  log.warn({ endpoint, rawLength: payload.length }, 'Response validation failed; raw dump');
  try {
    const dumpDir = join(process.cwd(), 'data');
    mkdirSync(dumpDir, { recursive: true });
    const file = join(dumpDir, `upbit-raw-${Date.now()}-${endpoint.replace(/\//g, '_')}.json`);
    writeFileSync(file, payload, 'utf8');
    log.warn({ file }, 'Raw response written to file');
  } catch (e) {
    log.warn({ err: e }, 'Could not write raw dump file');
  }
}

function validate<T>(path: string, raw: unknown, schema: z.ZodType<T>): T {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;
  dumpRaw(path, raw);
  throw new NetworkError(`Upbit response validation failed: ${result.error.message}`, path);
}

/**
 * Public GET: URL은 endpoints 상수만 사용. 429/5xx/timeout 재시도(지수 백오프).
 * 비정상 상태 코드는 예외 대신 NetworkError(status 포함)로 실패.
 */
export async function requestPublic(
  path: string,
  query: Record<string, string> = {},
  options: RequestOptions = {},
): Promise<unknown> {
  const url = new URL(path, config.upbit.restBaseUrl);
  Object.entries(query).forEach(([k, v]) => url.searchParams.set(k, v));
  const timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxRetries = options.retries ?? config.execution.maxRetries;
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    let statusCode: number;
    let raw: unknown;
    try {
      const res = await undiciRequest(url.toString(), {
        method: 'GET',
        headers: { Accept: 'application/json' },
        bodyTimeout: timeout,
        headersTimeout: timeout,
      });
      statusCode = res.statusCode;
      raw = await readJson(res.body);
    } catch (err) {
      lastError = err;
      if (attempt < maxRetries) {
        log.warn({ attempt, path, err }, 'Public request failed, retrying');
        await sleep(backoffMs(attempt));
        continue;
      }
      break;
    }

    if (isOk(statusCode)) return raw;
    if (isRetryableStatus(statusCode) && attempt < maxRetries) {
      const delay = backoffMs(attempt);
      log.warn({ statusCode, attempt, delay, path }, 'Retryable error, backing off');
      await sleep(delay);
      continue;
    }
    log.warn({ statusCode, path, raw }, 'Public request failed');
    throw new NetworkError(`GET ${path} failed with status ${statusCode}`, path, statusCode);
  }
  throw new NetworkError(`GET ${path} failed: ${describeError(lastError)}`, path, null, lastError);
}

/**
 * Public GET + zod 검증. 실패 시 raw 덤프 후 NetworkError.
 */
export async function requestPublicValidated<T>(
  path: string,
  query: Record<string, string>,
  schema: z.ZodType<T>,
  options: RequestOptions = {},
): Promise<T> {
  const raw = await requestPublic(path, query, options);
  return validate(path, raw, schema);
}

/**
 * Private 요청: Authorization: Bearer <JWT>, JWT는 매 요청 새로 생성.
 * 401/403 즉시 중단(설정 오류). 429/5xx/timeout 재시도.
 * 그 외 4xx는 호출자가 원본 응답을 볼 수 있도록 그대로 반환 (주문 거절 사유 등).
 */
export async function requestPrivate(path: string, options: PrivateRequest): Promise<PrivateResponse> {
  const url = new URL(path, config.upbit.restBaseUrl);
  const query = options.query ?? {};
  const hasQuery = Object.keys(query).length > 0;
  Object.entries(query).forEach(([k, v]) => url.searchParams.set(k, v));
  const hasBody = options.body !== undefined && Object.keys(options.body).length > 0;

  // 파라미터가 있으면 JWT에 query_hash 필수. body는 JSON 키 순서 그대로 해시
  const queryHash = hasBody && options.body
    ? sha512Hex(toQueryString(options.body))
    : hasQuery
      ? sha512Hex(toQueryString(query))
      : undefined;
  const timeout = options.timeoutMs ?? config.execution.orderTimeoutMs;
  const maxRetries = options.retries ?? config.execution.maxRetries;

  let lastError: unknown = null;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    // nonce 재사용 금지 → 시도마다 새 토큰
    const token = await createUpbitJwt(config.upbit.accessKey, config.upbit.secretKey, { queryHash });
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: 'application/json',
    };
    let body: string | undefined;
    if (hasBody) {
      body = JSON.stringify(options.body);
      headers['Content-Type'] = 'application/json; charset=utf-8';
    }

    let statusCode: number;
    let raw: unknown;
    try {
      const res = await undiciRequest(url.toString(), {
        method: options.method,
        headers,
        body,
        bodyTimeout: timeout,
        headersTimeout: timeout,
      });
      statusCode = res.statusCode;
      raw = await readJson(res.body);
    } catch (err) {
      lastError = err;
      if (attempt < maxRetries) {
        await sleep(backoffMs(attempt));
        continue;
      }
      break;
    }

    if (statusCode === 401 || statusCode === 403) {
      log.error({ statusCode, path, raw }, 'Private API auth error');
      throw new NetworkError(`Upbit private API auth error: ${statusCode}`, path, statusCode);
    }
    if (isRetryableStatus(statusCode) && attempt < maxRetries) {
      const delay = backoffMs(attempt);
      log.warn({ statusCode, attempt, delay, path }, 'Retryable, backing off');
      await sleep(delay);
      continue;
    }
    if (!isOk(statusCode)) {
      log.warn({ statusCode, path, raw }, 'Private request failed');
    }
    return { statusCode, raw };
  }
  throw new NetworkError(
    `${options.method} ${path} failed: ${describeError(lastError)}`,
    path,
    null,
    lastError,
  );
}

/**
 * Private + 상태 코드 확인 + zod 검증.
 */
export async function requestPrivateValidated<T>(
  path: string,
  options: PrivateRequest,
  schema: z.ZodType<T>,
): Promise<T> {
  const { statusCode, raw } = await requestPrivate(path, options);
  if (!isOk(statusCode)) {
    throw new NetworkError(`${options.method} ${path} failed with status ${statusCode}`, path, statusCode);
  }
  return validate(path, raw, schema);
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
