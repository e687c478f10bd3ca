import { encodePacked, keccak256, zeroHash, type Hex } from 'viem';

import type { GenesisConfig } from '../types/config.js';
import type { Block, PeerId } from '../types/message.js';

export interface BlockFields {
  prevHash: Hex;
  height: number;
  epochId: number;
  producer: PeerId;
  timestampMs: number;
  chunkMask: readonly boolean[];
}

export function computeBlockHash(fields: BlockFields): Hex {
  const mask = fields.chunkMask.map((included) => (included ? '1' : '0')).join('');
  return keccak256(
    encodePacked(
      ['bytes32', 'uint64', 'uint32', 'string', 'uint64', 'string'],
      [
        fields.prevHash,
        BigInt(fields.height),
        fields.epochId,
        fields.producer,
        BigInt(fields.timestampMs),
        mask,
      ]
    )
  );
}

export function buildBlock(fields: BlockFields): Block {
  return {
    version: 'V1',
    header: {
      version: 'V2',
      hash: computeBlockHash(fields),
      prevHash: fields.prevHash,
      producer: fields.producer,
      innerLite: {
        height: fields.height,
        epochId: fields.epochId,
        timestampMs: fields.timestampMs,
      },
      chunkMask: [...fields.chunkMask],
    },
  };
}

export function buildGenesisBlock(genesis: GenesisConfig): Block {
  return buildBlock({
    prevHash: zeroHash,
    height: 0,
    epochId: 0,
    producer: genesis.chainId,
    timestampMs: genesis.genesisTimeMs,
    chunkMask: new Array<boolean>(genesis.numShards).fill(true),
  });
}

export function epochFor(genesis: GenesisConfig, height: number): number {
  return Math.floor(height / genesis.epochLength);
}

/** Round-robin over the genesis block producers. */
export function proposerFor(genesis: GenesisConfig, height: number): PeerId {
  const producers = genesis.blockProducers;
  return producers[height % producers.length] ?? '';
}

/** Checks that `block` extends `parent` and that its hash matches its contents. */
export function validateChild(genesis: GenesisConfig, parent: Block, block: Block): string | undefined {
  const { header } = block;
  const height = header.innerLite.height;

  if (height !== parent.header.innerLite.height + 1) {
    return `height ${height} does not follow ${parent.header.innerLite.height}`;
  }

  if (header.prevHash !== parent.header.hash) {
    return 'prev hash mismatch';
  }

  if (header.producer !== proposerFor(genesis, height)) {
    return `unexpected producer ${header.producer}`;
  }

  if (header.innerLite.epochId !== epochFor(genesis, height)) {
    return `epoch ${header.innerLite.epochId} does not match height ${height}`;
  }

  if (header.chunkMask.length !== genesis.numShards) {
    return `chunk mask has ${header.chunkMask.length} entries, expected ${genesis.numShards}`;
  }

  const expected = computeBlockHash({
    prevHash: header.prevHash,
    height,
    epochId: header.innerLite.epochId,
    producer: header.producer,
    timestampMs: header.innerLite.timestampMs,
    chunkMask: header.chunkMask,
  });

  return expected === header.hash ? undefined : 'hash mismatch';
}
