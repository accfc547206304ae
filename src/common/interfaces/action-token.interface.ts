import { ActionTokenDecodeError } from '../errors';

export type ActionToken =
  | { action: 'toggle'; namespace: string; name: string }
  | { action: 'logs'; appName: string };

export type ActionTokenDecodeOutcome =
  | { decoded: true; token: ActionToken }
  | { decoded: false; error: ActionTokenDecodeError };
