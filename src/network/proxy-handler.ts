import type { PeerId, PeerMessage } from '../types/message.js';

/** One direction of a connection between two cluster nodes. */
export interface ProxyLink {
  readonly from: PeerId;
  readonly to: PeerId;
  /** Base seed of the run; handlers derive their own stream from it. */
  readonly seed: number;
}

/**
 * Decision hook invoked once per intercepted message. One instance is bound to
 * each ordered link, so implementations may keep plain private counters.
 * Resolve `true` to deliver the message and `false` to drop it.
 */
export abstract class ProxyHandler {
  constructor(protected readonly link: ProxyLink) {}

  abstract handle(message: PeerMessage, from: PeerId, to: PeerId): Promise<boolean>;
}

export type ProxyHandlerFactory = (link: ProxyLink) => ProxyHandler;

/** Delivers everything. Used when a cluster is started without fault injection. */
export class PassThroughHandler extends ProxyHandler {
  async handle(): Promise<boolean> {
    return true;
  }
}
