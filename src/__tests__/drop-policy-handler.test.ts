import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DropPolicyHandler, type DropPolicyOptions } from '../harness/drop-policy-handler.js';
import { setLogLevel } from '../logging/logger.js';
import { MetricsRegistry } from '../metrics/registry.js';
import type { ProxyLink } from '../network/proxy-handler.js';
import { LivenessGate } from '../sync/liveness-gate.js';
import { blockMessage, captureLogs, handshake, type CapturedLog } from './helpers.js';

const link: ProxyLink = { from: 'node0', to: 'node1', seed: 11 };

function scripted(samples: number[]): () => () => number {
  return () => () => {
    const next = samples.shift();
    if (next === undefined) {
      throw new Error('ran out of scripted samples');
    }
    return next;
  };
}

function handlerWith(overrides: Partial<DropPolicyOptions> = {}): { handler: DropPolicyHandler; gate: LivenessGate } {
  const gate = overrides.gate ?? new LivenessGate();
  const handler = new DropPolicyHandler(link, {
    gate,
    dropRatio: 0.05,
    heightTarget: 10,
    ...overrides,
  });
  return { handler, gate };
}

let logs: { entries: CapturedLog[]; restore: () => void };

beforeEach(() => {
  setLogLevel('info');
  logs = captureLogs();
});

afterEach(() => {
  logs.restore();
});

function summaries(): CapturedLog[] {
  return logs.entries.filter((entry) => entry.message === 'liveness target reached');
}

describe('DropPolicyHandler', () => {
  it('tracks heights 7 then 10 while the drop draw stays independent', async () => {
    const { handler, gate } = handlerWith({ random: scripted([0.9, 0.01]) });

    const first = await handler.handle(blockMessage(7), 'node0', 'node1');
    expect(first).toBe(true);
    expect(gate.snapshot()).toEqual({ success: false, bestHeight: 7 });

    const second = await handler.handle(blockMessage(10), 'node0', 'node1');
    expect(second).toBe(false);
    expect(gate.snapshot()).toEqual({ success: true, bestHeight: 10 });

    expect(handler.counters()).toEqual({ dropped: 1, total: 2, finished: true });
  });

  it('reports the counters seen before the target block in the summary', async () => {
    const { handler } = handlerWith({ random: scripted([0.01, 0.5, 0.5]) });

    await handler.handle(handshake, 'node0', 'node1');
    await handler.handle(blockMessage(3), 'node0', 'node1');
    await handler.handle(blockMessage(10), 'node0', 'node1');

    expect(summaries()).toHaveLength(1);
    expect(summaries()[0]).toMatchObject({ dropped: 1, total: 2, height: 10, latched: true });
  });

  it('emits the summary once even when higher blocks keep arriving', async () => {
    const { handler, gate } = handlerWith({ dropRatio: 0 });

    for (const height of [10, 11, 12, 13]) {
      await handler.handle(blockMessage(height), 'node0', 'node1');
    }

    expect(summaries()).toHaveLength(1);
    expect(gate.bestHeight()).toBe(13);
    expect(handler.counters()).toEqual({ dropped: 0, total: 4, finished: true });
  });

  it('latches the shared gate once across handlers on different links', async () => {
    const gate = new LivenessGate();
    const a = new DropPolicyHandler({ from: 'node0', to: 'node1', seed: 1 }, { gate, dropRatio: 0, heightTarget: 10 });
    const b = new DropPolicyHandler({ from: 'node1', to: 'node0', seed: 1 }, { gate, dropRatio: 0, heightTarget: 10 });

    await Promise.all([a.handle(blockMessage(10), 'node0', 'node1'), b.handle(blockMessage(10), 'node1', 'node0')]);

    expect(gate.isSuccess()).toBe(true);
    expect(summaries().map((entry) => entry.latched)).toEqual([true, false]);
  });

  it('logs each new best height once', async () => {
    const { handler } = handlerWith({ dropRatio: 0 });

    for (const height of [2, 2, 1, 4]) {
      await handler.handle(blockMessage(height), 'node0', 'node1');
    }

    const advances = logs.entries.filter((entry) => entry.message === 'height advanced').map((entry) => entry.height);
    expect(advances).toEqual([2, 4]);
  });

  it('never drops with a zero ratio', async () => {
    const { handler } = handlerWith({ dropRatio: 0 });

    const decisions = await Promise.all(Array.from({ length: 200 }, () => handler.handle(handshake, 'node0', 'node1')));

    expect(decisions.every((forward) => forward)).toBe(true);
    expect(handler.counters()).toEqual({ dropped: 0, total: 200, finished: false });
  });

  it('never forwards with a ratio of one', async () => {
    const { handler, gate } = handlerWith({ dropRatio: 1 });

    const decisions: boolean[] = [];
    for (let height = 1; height <= 12; height += 1) {
      decisions.push(await handler.handle(blockMessage(height), 'node0', 'node1'));
    }

    expect(decisions.some((forward) => forward)).toBe(false);
    expect(handler.counters()).toEqual({ dropped: 12, total: 12, finished: true });
    // inspection still happens on dropped traffic
    expect(gate.bestHeight()).toBe(12);
  });

  it('subjects non-block traffic to the draw without touching the gate', async () => {
    const { handler, gate } = handlerWith({ random: scripted([0.0]) });

    expect(await handler.handle(handshake, 'node0', 'node1')).toBe(false);
    expect(gate.snapshot()).toEqual({ success: false, bestHeight: 0 });
    expect(handler.counters()).toEqual({ dropped: 1, total: 1, finished: false });
  });

  it('counts every concurrent invocation exactly once', async () => {
    const { handler } = handlerWith({ dropRatio: 0.3 });

    const decisions = await Promise.all(Array.from({ length: 500 }, () => handler.handle(handshake, 'node0', 'node1')));
    const counters = handler.counters();

    expect(counters.total).toBe(500);
    expect(counters.dropped).toBe(decisions.filter((forward) => !forward).length);
    expect(counters.dropped).toBeLessThanOrEqual(counters.total);
  });

  it('draws the same sequence for the same link and seed', async () => {
    const gate = new LivenessGate();
    const first = DropPolicyHandler.factory({ gate, dropRatio: 0.5, heightTarget: 10 })(link);
    const second = DropPolicyHandler.factory({ gate, dropRatio: 0.5, heightTarget: 10 })(link);

    const a: boolean[] = [];
    const b: boolean[] = [];
    for (let i = 0; i < 32; i += 1) {
      a.push(await first.handle(handshake, 'node0', 'node1'));
      b.push(await second.handle(handshake, 'node0', 'node1'));
    }

    expect(a).toEqual(b);
  });

  it('uses an independent stream per link', async () => {
    const factory = DropPolicyHandler.factory({ gate: new LivenessGate(), dropRatio: 0.5, heightTarget: 10 });
    const forward = factory({ from: 'node0', to: 'node1', seed: 11 });
    const reverse = factory({ from: 'node1', to: 'node0', seed: 11 });

    const a: boolean[] = [];
    const b: boolean[] = [];
    for (let i = 0; i < 64; i += 1) {
      a.push(await forward.handle(handshake, 'node0', 'node1'));
      b.push(await reverse.handle(handshake, 'node1', 'node0'));
    }

    expect(a).not.toEqual(b);
  });

  it('rejects a drop ratio outside [0, 1]', () => {
    expect(() => handlerWith({ dropRatio: 1.2 })).toThrow('drop ratio must be within [0, 1], got 1.2');
    expect(() => handlerWith({ dropRatio: Number.NaN })).toThrow(RangeError);
  });

  it('publishes best height and liveness to metrics', async () => {
    const metrics = new MetricsRegistry();
    const { handler } = handlerWith({ dropRatio: 0, metrics });

    await handler.handle(blockMessage(10), 'node0', 'node1');

    const best = await metrics.bestHeight.get();
    const live = await metrics.livenessReached.get();
    expect(best.values[0]?.value).toBe(10);
    expect(live.values[0]?.value).toBe(1);
  });
});
