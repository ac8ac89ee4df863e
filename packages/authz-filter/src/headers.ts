import type {HeaderMapping} from '@authz-gateway/schemas';

import type {HeaderPair} from './contracts';

export const PSEUDO_HEADER_PREFIX = ':';
export const ORIGINAL_REQUEST_HEADER_PREFIX = 'x-original-req-';

const PSEUDO_HEADER_RENAMES: ReadonlyMap<string, string> = new Map([
  ['method', 'x-original-req-method'],
  ['scheme', 'x-original-req-scheme'],
  ['authority', 'x-original-req-authority'],
  ['path', 'x-original-req-path']
]);

export const FORWARDED_HEADER_ALLOWLIST: ReadonlySet<string> = new Set([
  'x-forwarded-client-cert',
  'x-request-id',
  'x-correlation-id',
  'authorization',
  'x-uip-wasm-impersonated-user',
  'x-event-service-user',
  'x-trino-user'
]);

const HTTP_HEADER_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
// Octets Node's http layer and fetch accept in a header value.
const WRITABLE_HEADER_VALUE_REGEX = /^[\t\x20-\x7e\x80-\xff]*$/u;
const GRPC_MESSAGE_UNRESERVED_REGEX = /^[\x20-\x24\x26-\x7e]$/u;

export const HOP_BY_HOP_HEADER_NAMES: ReadonlySet<string> = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade'
]);

// Owned by the host for the upstream hop.
const HOST_CONTROLLED_REQUEST_HEADERS: ReadonlySet<string> = new Set(['host', 'content-length']);

export type PseudoHeaderName = 'method' | 'scheme' | 'authority' | 'path';

/** Maps a pseudo-header name (without the leading colon) to its outbound key. */
export const renamePseudoHeader = (name: string): string =>
  PSEUDO_HEADER_RENAMES.get(name) ?? `${ORIGINAL_REQUEST_HEADER_PREFIX}${name}`;

export const isPseudoHeader = (name: string) => name.startsWith(PSEUDO_HEADER_PREFIX);

export const readPseudoHeader = (headers: readonly HeaderPair[], name: PseudoHeaderName): string | undefined => {
  const wanted = `${PSEUDO_HEADER_PREFIX}${name}`;
  let value: string | undefined;
  for (const [headerName, headerValue] of headers) {
    if (headerName === wanted) {
      value = headerValue;
    }
  }

  return value;
};

/**
 * Builds the header mapping carried in the authorization request.
 *
 * Pseudo-headers are renamed; ordinary headers survive only when allow-listed.
 * A repeated name keeps its last value.
 */
export const buildHeaderMapping = (headers: readonly HeaderPair[]): HeaderMapping => {
  const mapping: HeaderMapping = {};

  for (const [name, value] of headers) {
    if (isPseudoHeader(name)) {
      const pseudoName = name.slice(PSEUDO_HEADER_PREFIX.length);
      if (pseudoName.length > 0) {
        mapping[renamePseudoHeader(pseudoName)] = value;
      }
      continue;
    }

    const normalizedName = name.toLowerCase();
    if (FORWARDED_HEADER_ALLOWLIST.has(normalizedName)) {
      mapping[normalizedName] = value;
    }
  }

  return mapping;
};

export const estimateHeaderMappingBytes = (mapping: HeaderMapping) =>
  Object.entries(mapping).reduce(
    (total, [name, value]) => total + Buffer.byteLength(name, 'utf8') + Buffer.byteLength(value, 'utf8'),
    0
  );

export const isValidHeaderName = (name: string) => HTTP_HEADER_NAME_REGEX.test(name);

export const isWritableHeaderValue = (value: string) => WRITABLE_HEADER_VALUE_REGEX.test(value);

/** Whether a reply header may be copied onto the upstream request under its (lower-cased) name. */
export const isForwardableReplyHeader = (name: string, value: string) =>
  isValidHeaderName(name) &&
  !HOP_BY_HOP_HEADER_NAMES.has(name) &&
  !HOST_CONTROLLED_REQUEST_HEADERS.has(name) &&
  isWritableHeaderValue(value);

const utf8Encoder = new TextEncoder();

/**
 * Percent-encodes a status message the way gRPC carries `grpc-message`:
 * printable ASCII other than `%` is kept, every other UTF-8 byte becomes `%XX`.
 */
export const encodeGrpcMessage = (message: string) => {
  let encoded = '';
  for (const character of message) {
    if (GRPC_MESSAGE_UNRESERVED_REGEX.test(character)) {
      encoded += character;
      continue;
    }

    for (const byte of utf8Encoder.encode(character)) {
      encoded += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }

  return encoded;
};
