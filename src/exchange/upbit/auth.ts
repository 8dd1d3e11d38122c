import * as jose from 'jose';
import { createHash, randomUUID } from 'node:crypto';

/**
 * Private API JWT (HS256): 업비트 규격.
 * 파라미터(쿼리 또는 body)가 있으면 query_hash(SHA512), query_hash_alg 필수.
 * Secret Key는 발급 문자열 그대로(UTF-8) 서명에 사용.
 */
export async function createUpbitJwt(
  accessKey: string,
  secretKey: string,
  options?: { queryHash?: string },
): Promise<string> {
  if (!accessKey || !secretKey) {
    throw new Error('Upbit API keys not configured');
  }
  const payload: Record<string, string> = {
    access_key: accessKey,
    nonce: randomUUID(),
  };
  if (options?.queryHash) {
    payload.query_hash = options.queryHash;
    payload.query_hash_alg = 'SHA512';
  }
  return await new jose.SignJWT(payload)
    .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
    .sign(new TextEncoder().encode(secretKey));
}

/** 키 삽입 순서 그대로 query string 생성 (URL·body와 해시 순서가 같아야 함) */
export function toQueryString(params: Record<string, string>): string {
  return Object.entries(params)
    .map(([k, v]) => `${k}=${v}`)
    .join('&');
}

/** query string → SHA512 (소문자 hex) */
export function sha512Hex(queryString: string): string {
  return createHash('sha512').update(queryString, 'utf8').digest('hex');
}
