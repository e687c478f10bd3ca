import { toError } from '../errors.js';
import { Logger } from '../logging/logger.js';
import type { MetricsRegistry } from '../metrics/registry.js';
import type { ProxyNetwork } from '../network/proxy-network.js';
import type { GenesisConfig, NodeConfig } from '../types/config.js';
import type { Block, HandshakeMessage, PeerId, PeerMessage } from '../types/message.js';
import { nowMs } from '../utils/time.js';
import { buildBlock, epochFor, proposerFor, validateChild } from './block.js';

export interface LocalNodeOptions {
  peerId: PeerId;
  genesis: GenesisConfig;
  genesisBlock: Block;
  config: NodeConfig;
  /** Peer dialled first on start; undefined for the boot node itself. */
  bootPeer?: PeerId;
  network: ProxyNetwork;
  metrics?: MetricsRegistry;
}

export interface NodeStatus {
  peerId: PeerId;
  height: number;
  headHash: string;
  knownPeers: PeerId[];
  connectedPeers: PeerId[];
}

/**
 * Simulated validator. Produces a block when the round-robin schedule picks it
 * and it holds the previous block, gossips its head, and pulls missing blocks
 * from peers that announce a higher head. All traffic goes through the
 * {@link ProxyNetwork}, so any message may be lost.
 */
export class LocalNode {
  readonly peerId: PeerId;

  private readonly logger: Logger;
  private readonly chain: Block[];
  private readonly knownPeers = new Set<PeerId>();
  private readonly connectedPeers = new Set<PeerId>();
  private readonly peerHeads = new Map<PeerId, number>();
  private gossipTimer: NodeJS.Timeout | null = null;
  private productionTimer: NodeJS.Timeout | null = null;

  constructor(private readonly options: LocalNodeOptions) {
    this.peerId = options.peerId;
    this.logger = new Logger('local-node', { node: options.peerId });
    this.chain = [options.genesisBlock];
  }

  get running(): boolean {
    return this.gossipTimer !== null;
  }

  start(): void {
    if (this.running) {
      return;
    }

    this.options.network.register(this.peerId, (message, from) => this.receive(message, from));
    if (this.options.bootPeer !== undefined && this.options.bootPeer !== this.peerId) {
      this.knownPeers.add(this.options.bootPeer);
    }

    this.gossipTimer = setInterval(() => this.gossip(), this.options.config.gossipIntervalMs);
    this.productionTimer = setInterval(() => this.tryProduceBlock(), this.options.config.blockProductionDelayMs);
    this.gossip();
    this.logger.debug('node started', { bootPeer: this.options.bootPeer });
  }

  stop(): void {
    if (this.gossipTimer) {
      clearInterval(this.gossipTimer);
      this.gossipTimer = null;
    }

    if (this.productionTimer) {
      clearInterval(this.productionTimer);
      this.productionTimer = null;
    }

    this.options.network.unregister(this.peerId);
  }

  get head(): Block {
    return this.chain[this.chain.length - 1] ?? this.options.genesisBlock;
  }

  headHeight(): number {
    return this.head.header.innerLite.height;
  }

  status(): NodeStatus {
    return {
      peerId: this.peerId,
      height: this.headHeight(),
      headHash: this.head.header.hash,
      knownPeers: Array.from(this.knownPeers).sort(),
      connectedPeers: Array.from(this.connectedPeers).sort(),
    };
  }

  receive(message: PeerMessage, from: PeerId): void {
    switch (message.kind) {
      case 'Handshake':
        this.onHandshake(message, from);
        return;
      case 'PeersRequest':
        this.send(from, { kind: 'PeersResponse', peers: Array.from(this.connectedPeers) });
        return;
      case 'PeersResponse':
        for (const peer of message.peers) {
          if (peer !== this.peerId) {
            this.knownPeers.add(peer);
          }
        }
        return;
      case 'Block':
        this.onBlock(message.block, from);
        return;
      case 'BlockRequest': {
        const block = this.chain[message.height];
        if (block) {
          this.send(from, { kind: 'Block', block });
        }
        return;
      }
    }
  }

  /**
   * Every dial is answered, even from a peer already connected here: the
   * dialler keeps dialling until an answer gets through.
   */
  private onHandshake(handshake: HandshakeMessage, from: PeerId): void {
    if (handshake.chainId !== this.options.genesis.chainId) {
      this.logger.warn('handshake from foreign chain ignored', { from, chainId: handshake.chainId });
      return;
    }

    this.knownPeers.add(from);
    this.connectedPeers.add(from);
    this.notePeerHead(from, handshake.headHeight);
    if (!handshake.ack) {
      this.send(from, this.handshake(true));
    }
  }

  private onBlock(block: Block, from: PeerId): void {
    const height = block.header.innerLite.height;
    const headHeight = this.headHeight();
    this.notePeerHead(from, height);

    if (height <= headHeight) {
      return;
    }

    if (height > headHeight + 1) {
      this.send(from, { kind: 'BlockRequest', height: headHeight + 1 });
      return;
    }

    const problem = validateChild(this.options.genesis, this.head, block);
    if (problem) {
      this.logger.warn('rejected block', { from, height, reason: problem });
      return;
    }

    this.append(block);
    this.broadcast({ kind: 'Block', block }, from);

    if ((this.peerHeads.get(from) ?? 0) > height) {
      this.send(from, { kind: 'BlockRequest', height: height + 1 });
    }
  }

  private tryProduceBlock(): void {
    const { genesis } = this.options;
    const parent = this.head;
    const height = parent.header.innerLite.height + 1;

    if (proposerFor(genesis, height) !== this.peerId) {
      return;
    }

    const block = buildBlock({
      prevHash: parent.header.hash,
      height,
      epochId: epochFor(genesis, height),
      producer: this.peerId,
      timestampMs: nowMs(),
      chunkMask: new Array<boolean>(genesis.numShards).fill(true),
    });

    this.append(block);
    this.logger.debug('produced block', { height, hash: block.header.hash });
    this.broadcast({ kind: 'Block', block });
  }

  private gossip(): void {
    for (const peer of this.knownPeers) {
      if (!this.connectedPeers.has(peer)) {
        this.send(peer, this.handshake(false));
      }
    }

    const expectedPeers = this.options.genesis.blockProducers.length - 1;
    const firstConnected = this.connectedPeers.values().next();
    if (this.knownPeers.size < expectedPeers && !firstConnected.done) {
      this.send(firstConnected.value, { kind: 'PeersRequest' });
    }

    if (this.headHeight() > 0) {
      this.broadcast({ kind: 'Block', block: this.head });
    }
  }

  private append(block: Block): void {
    this.chain.push(block);
    this.options.metrics?.nodeHeight.set({ node: this.peerId }, block.header.innerLite.height);
  }

  private notePeerHead(peer: PeerId, height: number): void {
    if (height > (this.peerHeads.get(peer) ?? -1)) {
      this.peerHeads.set(peer, height);
    }
  }

  private handshake(ack: boolean): HandshakeMessage {
    return {
      kind: 'Handshake',
      chainId: this.options.genesis.chainId,
      peerId: this.peerId,
      headHeight: this.headHeight(),
      ack,
    };
  }

  private broadcast(message: PeerMessage, except?: PeerId): void {
    for (const peer of this.connectedPeers) {
      if (peer !== except) {
        this.send(peer, message);
      }
    }
  }

  private send(to: PeerId, message: PeerMessage): void {
    this.options.network.send(this.peerId, to, message).catch((error: unknown) => {
      this.logger.error('send failed', { to, kind: message.kind, error: toError(error).message });
    });
  }
}
