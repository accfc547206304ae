import { ActionTokenDecodeError, ActionTokenEncodeError } from '../common/errors';
import { ActionToken, ActionTokenDecodeOutcome } from '../common/interfaces/action-token.interface';

/** Telegram's limit on callback_data, in bytes */
export const MAX_ACTION_TOKEN_BYTES = 64;

const SEPARATOR = ':';

/**
 * Serialises an action for the callback channel:
 * `toggle:<namespace>:<name>` or `logs:<appName>`.
 *
 * @throws {ActionTokenEncodeError} When a segment is empty, a toggle segment
 *   contains the separator, or the result exceeds the callback size limit
 */
export function encodeActionToken(token: ActionToken): string {
  const encoded = serialise(token);
  const size = Buffer.byteLength(encoded, 'utf8');
  if (size > MAX_ACTION_TOKEN_BYTES) {
    throw new ActionTokenEncodeError(`token is ${size} bytes, limit is ${MAX_ACTION_TOKEN_BYTES}`);
  }
  return encoded;
}

function serialise(token: ActionToken): string {
  switch (token.action) {
    case 'toggle': {
      for (const [field, value] of [['namespace', token.namespace], ['name', token.name]] as const) {
        if (!value) throw new ActionTokenEncodeError(`${field} is empty`);
        if (value.includes(SEPARATOR)) throw new ActionTokenEncodeError(`${field} contains '${SEPARATOR}'`);
      }
      return ['toggle', token.namespace, token.name].join(SEPARATOR);
    }
    case 'logs':
      if (!token.appName) throw new ActionTokenEncodeError('appName is empty');
      return `logs${SEPARATOR}${token.appName}`;
  }
}

/**
 * Parses callback data back into an action. Never throws; malformed input is
 * reported through the outcome.
 */
export function decodeActionToken(data: string | null | undefined): ActionTokenDecodeOutcome {
  const raw = data ?? '';
  const fail = (reason: string): ActionTokenDecodeOutcome => ({
    decoded: false,
    error: new ActionTokenDecodeError(raw, reason),
  });

  if (!raw) return fail('empty action token');

  const separatorIndex = raw.indexOf(SEPARATOR);
  if (separatorIndex < 0) return fail('missing action parameters');

  const action = raw.slice(0, separatorIndex);
  const rest = raw.slice(separatorIndex + 1);

  if (action === 'toggle') {
    const parts = rest.split(SEPARATOR);
    if (parts.length !== 2) return fail('toggle expects a namespace and a name');
    const [namespace, name] = parts;
    if (!namespace || !name) return fail('toggle namespace and name must not be empty');
    return { decoded: true, token: { action: 'toggle', namespace, name } };
  }

  if (action === 'logs') {
    if (!rest) return fail('logs expects an application name');
    return { decoded: true, token: { action: 'logs', appName: rest } };
  }

  return fail(`unknown action '${action}'`);
}
