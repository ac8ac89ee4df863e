const DEFAULT_SENSITIVE_SUBSTRINGS = [
  'token',
  'secret',
  'password',
  'authorization',
  'authenticate',
  'cookie',
  'clientcert',
  'privatekey',
  'private_key'
] as const;

const REDACTED_VALUE = '[REDACTED]';
const MAX_RECURSION_DEPTH = 12;

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

const isSensitiveKey = ({key, extraSensitiveKeys}: {key: string; extraSensitiveKeys: Set<string>}) => {
  const normalized = normalizeKey(key);
  if (extraSensitiveKeys.has(normalized)) {
    return true;
  }

  return DEFAULT_SENSITIVE_SUBSTRINGS.some(entry => normalized.includes(entry));
};

const sanitizeErrorForLog = (error: Error) => ({
  name: error.name,
  message: error.message,
  ...(error.stack ? {stack: error.stack} : {})
});

type SanitizeState = {
  seen: WeakSet<object>;
  extraSensitiveKeys: Set<string>;
};

const sanitizeEntries = ({
  entries,
  depth,
  state
}: {
  entries: [string, unknown][];
  depth: number;
  state: SanitizeState;
}): Record<string, unknown> =>
  Object.fromEntries(
    entries.map(([key, entryValue]) =>
      isSensitiveKey({key, extraSensitiveKeys: state.extraSensitiveKeys})
        ? [key, REDACTED_VALUE]
        : [key, sanitizeInternal({value: entryValue, depth: depth + 1, state})]
    )
  );

const sanitizeInternal = ({value, depth, state}: {value: unknown; depth: number; state: SanitizeState}): unknown => {
  if (depth > MAX_RECURSION_DEPTH) {
    return '[TRUNCATED]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return value;
    case 'bigint':
      return value.toString();
    case 'symbol':
      return value.toString();
    case 'function':
      return '[FUNCTION]';
    default:
      break;
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '[INVALID_DATE]' : value.toISOString();
  }

  if (value instanceof Error) {
    return sanitizeErrorForLog(value);
  }

  if (value instanceof Uint8Array) {
    return `[BYTES ${value.byteLength}]`;
  }

  if (Array.isArray(value)) {
    return value.map(item => sanitizeInternal({value: item, depth: depth + 1, state}));
  }

  if (typeof value === 'object') {
    if (state.seen.has(value)) {
      return '[CIRCULAR]';
    }

    state.seen.add(value);
    return sanitizeEntries({entries: Object.entries(value), depth, state});
  }

  return Object.prototype.toString.call(value);
};

const createState = (extraSensitiveKeys: string[]): SanitizeState => ({
  seen: new WeakSet<object>(),
  extraSensitiveKeys: new Set(extraSensitiveKeys.map(item => normalizeKey(item)).filter(item => item.length > 0))
});

export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown => sanitizeInternal({value, depth: 0, state: createState(extraSensitiveKeys)});

export const sanitizeMetadataForLog = ({
  metadata,
  extraSensitiveKeys = []
}: {
  metadata: Record<string, unknown>;
  extraSensitiveKeys?: string[];
}): Record<string, unknown> => {
  const state = createState(extraSensitiveKeys);
  state.seen.add(metadata);
  return sanitizeEntries({entries: Object.entries(metadata), depth: 0, state});
};
