import { describe, expect, it, vi } from 'vitest';

import { HandlerFailureError } from '../errors.js';
import { InterceptionProxy } from '../network/interception-proxy.js';
import { ProxyHandler, type ProxyLink } from '../network/proxy-handler.js';
import { freezeMessage, type PeerId, type PeerMessage, type RoutedMessage } from '../types/message.js';
import { sleep } from '../utils/time.js';
import { blockMessage, handshake } from './helpers.js';

const link: ProxyLink = { from: 'node2', to: 'node3', seed: 5 };

class ScriptedHandler extends ProxyHandler {
  readonly seen: PeerMessage[] = [];

  constructor(private readonly decide: (message: PeerMessage) => boolean | Promise<boolean>) {
    super(link);
  }

  async handle(message: PeerMessage, _from: PeerId, _to: PeerId): Promise<boolean> {
    this.seen.push(message);
    return this.decide(message);
  }
}

function routed(message: PeerMessage): RoutedMessage {
  return { message, from: link.from, to: link.to };
}

function proxyFor(handler: ProxyHandler, onFatal = vi.fn()): InterceptionProxy {
  return new InterceptionProxy({ link, handler, onFatal });
}

describe('InterceptionProxy', () => {
  it('maps handler decisions to forward and drop', async () => {
    const handler = new ScriptedHandler((message) => message.kind === 'Block');
    const proxy = proxyFor(handler);

    expect(await proxy.intercept(routed(blockMessage(1)))).toBe('forward');
    expect(await proxy.intercept(routed(handshake))).toBe('drop');
    expect(proxy.stats()).toEqual({
      from: 'node2',
      to: 'node3',
      intercepted: 2,
      forwarded: 1,
      dropped: 1,
      failed: 0,
    });
  });

  it('hands the handler the very message it was given', async () => {
    const handler = new ScriptedHandler(() => true);
    const proxy = proxyFor(handler);
    const message = freezeMessage(blockMessage(4));

    await proxy.intercept(routed(message));

    expect(handler.seen[0]).toBe(message);
    expect(Object.isFrozen(message.block.header.innerLite)).toBe(true);
    expect(message.block.header.innerLite.height).toBe(4);
  });

  it('reports a throwing handler as fatal and keeps the link usable', async () => {
    const onFatal = vi.fn();
    const handler = new ScriptedHandler((message) => {
      if (message.kind === 'Block') {
        throw new Error('boom');
      }
      return true;
    });
    const proxy = proxyFor(handler, onFatal);

    expect(await proxy.intercept(routed(blockMessage(2)))).toBe('failed');
    expect(await proxy.intercept(routed(handshake))).toBe('forward');

    expect(onFatal).toHaveBeenCalledTimes(1);
    const failure = onFatal.mock.calls[0]?.[0];
    expect(failure).toBeInstanceOf(HandlerFailureError);
    expect(failure).toMatchObject({ from: 'node2', to: 'node3', messageKind: 'Block' });
    expect(failure?.message).toBe('Proxy handler failed on Block message node2 -> node3: boom');
    expect(proxy.stats().failed).toBe(1);
  });

  it('wraps non-error rejections', async () => {
    const onFatal = vi.fn();
    const handler = new ScriptedHandler(() => Promise.reject('nope'));
    const proxy = proxyFor(handler, onFatal);

    expect(await proxy.intercept(routed(handshake))).toBe('failed');
    expect(onFatal.mock.calls[0]?.[0].cause).toEqual(new Error('nope'));
  });

  it('runs one decision at a time in arrival order', async () => {
    let active = 0;
    let maxActive = 0;
    const order: number[] = [];

    const handler = new ScriptedHandler(async (message) => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await sleep(1);
      if (message.kind === 'Block') {
        order.push(message.block.header.innerLite.height);
      }
      active -= 1;
      return true;
    });
    const proxy = proxyFor(handler);

    await Promise.all([1, 2, 3, 4, 5].map((height) => proxy.intercept(routed(blockMessage(height)))));

    expect(maxActive).toBe(1);
    expect(order).toEqual([1, 2, 3, 4, 5]);
    expect(proxy.stats().intercepted).toBe(5);
  });

  it('refuses a message addressed to another link', async () => {
    const handler = new ScriptedHandler(() => true);
    const proxy = proxyFor(handler);

    await expect(proxy.intercept({ message: handshake, from: 'node3', to: 'node2' })).rejects.toThrow(
      'message for node3 -> node2 sent through link node2 -> node3'
    );
    expect(handler.seen).toEqual([]);
    expect(proxy.stats().intercepted).toBe(0);
  });

  it('drains queued decisions', async () => {
    const handler = new ScriptedHandler(async () => {
      await sleep(2);
      return false;
    });
    const proxy = proxyFor(handler);

    void proxy.intercept(routed(handshake));
    void proxy.intercept(routed(handshake));
    await proxy.drain();

    expect(proxy.stats().dropped).toBe(2);
  });
});
