import type { PeerId, PeerMessageKind } from './types/message.js';

export class ConfigError extends Error {
  override readonly name = 'ConfigError' as const;

  constructor(
    readonly variable: string,
    reason: string
  ) {
    super(`Invalid configuration for ${variable}: ${reason}`);
  }
}

export class ClusterStartError extends Error {
  override readonly name = 'ClusterStartError' as const;
  override readonly cause: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.cause = cause;
  }
}

/**
 * A proxy handler threw while deciding on a message. Always fatal to the run:
 * a broken handler must not pass for packet loss.
 */
export class HandlerFailureError extends Error {
  override readonly name = 'HandlerFailureError' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly from: PeerId,
    readonly to: PeerId,
    readonly messageKind: PeerMessageKind,
    cause?: Error
  ) {
    super(`Proxy handler failed on ${messageKind} message ${from} -> ${to}: ${cause?.message ?? 'unknown error'}`);
    this.cause = cause;
  }
}

/** The handler factory threw while a link was being set up. Fatal, like a handler failure. */
export class HandlerFactoryError extends Error {
  override readonly name = 'HandlerFactoryError' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly from: PeerId,
    readonly to: PeerId,
    cause?: Error
  ) {
    super(`Proxy handler could not be created for link ${from} -> ${to}: ${cause?.message ?? 'unknown error'}`);
    this.cause = cause;
  }
}

export class LivenessTimeoutError extends Error {
  override readonly name = 'LivenessTimeoutError' as const;

  constructor(
    readonly timeoutMs: number,
    readonly elapsedMs: number,
    readonly bestHeight: number,
    readonly heightTarget: number
  ) {
    super(
      `Liveness target height ${heightTarget} not reached within ${timeoutMs}ms ` +
        `(elapsed ${elapsedMs}ms, best height ${bestHeight})`
    );
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
