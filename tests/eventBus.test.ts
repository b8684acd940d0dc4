import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { EventBus, createEvent } from '../src/eventBus.js';
import { AsyncQueue } from '../src/utils/asyncQueue.js';
import type { SolPriceUpdate } from '../src/types.js';

function solPrice(price: number): SolPriceUpdate {
  return { price_usd: price, source: 'Pyth', timestamp: 1_700_000_000, confidence: null };
}

describe('EventBus', () => {
  it('tags events with their notification type', () => {
    const event = createEvent('sol-price-updated', solPrice(150));

    assert.equal(event.kind, 'sol-price-updated');
    assert.equal(event.origin, 'local');
    assert.deepEqual(event.notification, { type: 'sol_price_update', data: solPrice(150) });
  });

  it('delivers every event to every receiver independently', () => {
    const bus = new EventBus();
    const first = bus.subscribe();
    const second = bus.subscribe();

    const reached = bus.publish(createEvent('sol-price-updated', solPrice(150)));
    bus.publish(createEvent('sol-price-updated', solPrice(151)));

    assert.equal(reached, 2);
    assert.equal(first.pending, 2);
    assert.equal(second.pending, 2);
    first.tryRecv();
    assert.equal(first.pending, 1);
    assert.equal(second.pending, 2);
  });

  it('keeps FIFO order per receiver', () => {
    const bus = new EventBus();
    const first = bus.subscribe();
    const second = bus.subscribe();

    bus.publish(createEvent('sol-price-updated', solPrice(150)));
    bus.publish(createEvent('sol-price-updated', solPrice(151)));

    const prices = (receiver: typeof first): number[] => {
      const seen: number[] = [];
      for (let event = receiver.tryRecv(); event; event = receiver.tryRecv()) {
        if (event.kind === 'sol-price-updated') seen.push(event.notification.data.price_usd);
      }
      return seen;
    };
    assert.deepEqual(prices(first), [150, 151]);
    assert.deepEqual(prices(second), [150, 151]);
  });

  it('drops the oldest events for a receiver that falls behind', () => {
    const bus = new EventBus();
    const slow = bus.subscribe(2);

    for (const price of [1, 2, 3, 4]) {
      bus.publish(createEvent('sol-price-updated', solPrice(price)));
    }

    assert.equal(slow.lagged, 2);
    assert.equal(slow.pending, 2);
    const remaining = [slow.tryRecv(), slow.tryRecv()].map(event =>
      event?.kind === 'sol-price-updated' ? event.notification.data.price_usd : null
    );
    assert.deepEqual(remaining, [3, 4]);
  });

  it('stops delivering to a closed receiver', () => {
    const bus = new EventBus();
    const receiver = bus.subscribe();
    receiver.close();

    assert.equal(bus.publish(createEvent('sol-price-updated', solPrice(1))), 0);
    assert.equal(bus.receiverCount, 0);
    assert.equal(receiver.tryRecv(), undefined);
  });

  it('wakes a waiting receiver on publish', async () => {
    const bus = new EventBus();
    const receiver = bus.subscribe();

    const pending = receiver.recv(1000);
    bus.publish(createEvent('sol-price-updated', solPrice(42)));
    const event = await pending;

    assert.equal(event?.kind, 'sol-price-updated');
  });

  it('runs handlers for their kind only and isolates throwing handlers', () => {
    const bus = new EventBus();
    const seen: string[] = [];

    bus.on('sol-price-updated', () => {
      throw new Error('handler exploded');
    });
    bus.on('sol-price-updated', event => seen.push(`sol:${event.notification.data.price_usd}`));
    bus.on('settings-deleted', event => seen.push(`deleted:${event.notification.data.settings_id}`));

    bus.publish(createEvent('sol-price-updated', solPrice(7)));
    bus.publish(createEvent('settings-deleted', { settings_id: 's-1' }));

    assert.deepEqual(seen, ['sol:7', 'deleted:s-1']);
  });

  it('unregisters a handler', () => {
    const bus = new EventBus();
    let calls = 0;
    const off = bus.on('sol-price-updated', () => {
      calls++;
    });

    bus.publish(createEvent('sol-price-updated', solPrice(1)));
    off();
    bus.publish(createEvent('sol-price-updated', solPrice(2)));

    assert.equal(calls, 1);
  });
});

describe('AsyncQueue', () => {
  it('resolves undefined when nothing arrives in time', async () => {
    const queue = new AsyncQueue<number>();
    assert.equal(await queue.next(5), undefined);
  });

  it('resolves undefined on abort', async () => {
    const queue = new AsyncQueue<number>();
    const controller = new AbortController();

    const pending = queue.next(10_000, controller.signal);
    controller.abort();

    assert.equal(await pending, undefined);
  });

  it('hands an item straight to a waiter', async () => {
    const queue = new AsyncQueue<number>();

    const pending = queue.next(10_000);
    queue.push(9);

    assert.equal(await pending, 9);
    assert.equal(queue.size, 0);
  });

  it('refuses items once closed', async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.next(10_000);
    queue.close();

    assert.equal(await pending, undefined);
    assert.equal(queue.push(1), false);
    assert.equal(queue.isClosed, true);
  });
});
