import type { Hex } from 'viem';

export type PeerId = string;

export interface BlockHeaderInnerLite {
  readonly height: number;
  readonly epochId: number;
  readonly timestampMs: number;
}

export interface BlockHeaderV2 {
  readonly version: 'V2';
  readonly hash: Hex;
  readonly prevHash: Hex;
  readonly producer: PeerId;
  readonly innerLite: BlockHeaderInnerLite;
  readonly chunkMask: readonly boolean[];
}

export type BlockHeader = BlockHeaderV2;

export interface BlockV1 {
  readonly version: 'V1';
  readonly header: BlockHeader;
}

export type Block = BlockV1;

export interface HandshakeMessage {
  readonly kind: 'Handshake';
  readonly chainId: string;
  readonly peerId: PeerId;
  readonly headHeight: number;
  /** True on the answer to a dial; answers are never answered. */
  readonly ack: boolean;
}

export interface PeersRequestMessage {
  readonly kind: 'PeersRequest';
}

export interface PeersResponseMessage {
  readonly kind: 'PeersResponse';
  readonly peers: readonly PeerId[];
}

export interface BlockMessage {
  readonly kind: 'Block';
  readonly block: Block;
}

export interface BlockRequestMessage {
  readonly kind: 'BlockRequest';
  readonly height: number;
}

export type PeerMessage =
  | HandshakeMessage
  | PeersRequestMessage
  | PeersResponseMessage
  | BlockMessage
  | BlockRequestMessage;

export type PeerMessageKind = PeerMessage['kind'];

/** One send, addressed; lives until the link's proxy has decided on it. */
export interface RoutedMessage {
  readonly message: PeerMessage;
  readonly from: PeerId;
  readonly to: PeerId;
}

export function blockHeight(message: PeerMessage): number | undefined {
  if (message.kind !== 'Block') {
    return undefined;
  }

  return message.block.header.innerLite.height;
}

/**
 * Deep-freezes a message so nothing on the delivery path can alter it.
 * Returns the same object.
 */
export function freezeMessage<T extends PeerMessage>(message: T): T {
  deepFreeze(message);
  return message;
}

function deepFreeze(value: unknown): void {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return;
  }

  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
}
