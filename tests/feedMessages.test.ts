import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildLogsSubscribeRequest, parseFeedMessage } from '../src/feedMessages.js';
import { isAppError } from '../src/errors.js';

describe('buildLogsSubscribeRequest', () => {
  it('subscribes to logs mentioning the address at confirmed commitment', () => {
    assert.deepEqual(JSON.parse(buildLogsSubscribeRequest(3, 'WalletA')), {
      jsonrpc: '2.0',
      id: 3,
      method: 'logsSubscribe',
      params: [{ mentions: ['WalletA'] }, { commitment: 'confirmed' }],
    });
  });
});

describe('parseFeedMessage', () => {
  it('recognises subscription acknowledgements', () => {
    assert.deepEqual(parseFeedMessage('{"jsonrpc":"2.0","result":24040,"id":1}'), {
      kind: 'subscription-ack',
      id: 1,
      subscriptionId: 24040,
    });
  });

  it('extracts the signature from log notifications', () => {
    const frame = JSON.stringify({
      jsonrpc: '2.0',
      method: 'logsNotification',
      params: {
        result: {
          context: { slot: 5208469 },
          value: { signature: 'SigA', err: null, logs: ['Program log: Instruction: Buy'] },
        },
        subscription: 24040,
      },
    });

    assert.deepEqual(parseFeedMessage(frame), {
      kind: 'logs',
      subscriptionId: 24040,
      signature: 'SigA',
      failed: false,
      slot: 5208469,
    });
  });

  it('flags failed transactions', () => {
    const frame = JSON.stringify({
      jsonrpc: '2.0',
      method: 'logsNotification',
      params: {
        result: { context: { slot: 1 }, value: { signature: 'SigB', err: { InstructionError: [0, 'Custom'] } } },
        subscription: 7,
      },
    });

    const message = parseFeedMessage(frame);
    assert.equal(message.kind, 'logs');
    assert.equal(message.kind === 'logs' && message.failed, true);
  });

  it('surfaces JSON-RPC errors', () => {
    assert.deepEqual(
      parseFeedMessage('{"jsonrpc":"2.0","error":{"code":-32602,"message":"Invalid param"},"id":4}'),
      { kind: 'error', id: 4, message: 'Invalid param' }
    );
  });

  it('treats other frames as unknown', () => {
    assert.deepEqual(parseFeedMessage('{"jsonrpc":"2.0","method":"slotNotification","params":{}}'), {
      kind: 'unknown',
    });
    assert.deepEqual(parseFeedMessage('[1,2]'), { kind: 'unknown' });
  });

  it('rejects malformed JSON', () => {
    assert.throws(() => parseFeedMessage('{not json'), (error: unknown) => isAppError(error, 'JsonParseError'));
  });
});
