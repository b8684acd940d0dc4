import { AppError } from './errors.js';
import { isRecord, readNumber, readString } from './utils/jsonGuards.js';

/**
 * Classified JSON-RPC frame from the Solana RPC WebSocket
 */
export type FeedMessage =
  | { kind: 'subscription-ack'; id: number; subscriptionId: number }
  | { kind: 'logs'; subscriptionId: number; signature: string; failed: boolean; slot: number | null }
  | { kind: 'error'; id: number | null; message: string }
  | { kind: 'unknown' };

export function buildLogsSubscribeRequest(id: number, address: string): string {
  return JSON.stringify({
    jsonrpc: '2.0',
    id,
    method: 'logsSubscribe',
    params: [{ mentions: [address] }, { commitment: 'confirmed' }],
  });
}

export function parseFeedMessage(text: string): FeedMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new AppError('JsonParseError', `Invalid feed frame: ${text.substring(0, 80)}`, { cause: error });
  }
  if (!isRecord(parsed)) {
    return { kind: 'unknown' };
  }

  const id = readNumber(parsed, 'id');
  const error = parsed['error'];
  if (isRecord(error)) {
    return { kind: 'error', id: id ?? null, message: readString(error, 'message') ?? 'unknown error' };
  }

  const result = readNumber(parsed, 'result');
  if (id !== undefined && result !== undefined) {
    return { kind: 'subscription-ack', id, subscriptionId: result };
  }

  if (readString(parsed, 'method') === 'logsNotification' && isRecord(parsed['params'])) {
    const params = parsed['params'];
    const subscriptionId = readNumber(params, 'subscription');
    const notification = params['result'];
    if (subscriptionId === undefined || !isRecord(notification)) {
      return { kind: 'unknown' };
    }

    const value = notification['value'];
    const context = notification['context'];
    if (!isRecord(value)) {
      return { kind: 'unknown' };
    }
    const signature = readString(value, 'signature');
    if (!signature) {
      return { kind: 'unknown' };
    }

    return {
      kind: 'logs',
      subscriptionId,
      signature,
      failed: value['err'] !== null && value['err'] !== undefined,
      slot: isRecord(context) ? readNumber(context, 'slot') ?? null : null,
    };
  }

  return { kind: 'unknown' };
}
