/**
 * Stream Errors
 * Error taxonomy reported by the streaming client
 */

import type { ChannelName, StreamEvent } from './types';

export const StreamErrorCode = {
  CONNECT_FAILURE: 'CONNECT_FAILURE',
  TRANSIENT_DISCONNECT: 'TRANSIENT_DISCONNECT',
  DECODE_ERROR: 'DECODE_ERROR',
  HANDLER_ERROR: 'HANDLER_ERROR',
  PROTOCOL_REJECTION: 'PROTOCOL_REJECTION',
  INVALID_CHANNEL: 'INVALID_CHANNEL',
} as const;

export type StreamErrorCode = typeof StreamErrorCode[keyof typeof StreamErrorCode];

export class StreamError extends Error {
  readonly code: StreamErrorCode;

  constructor(code: StreamErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StreamError';
    this.code = code;
  }
}

/**
 * The first attempt of a connect() call could not reach the endpoint
 */
export class ConnectionError extends StreamError {
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(StreamErrorCode.CONNECT_FAILURE, `Failed to connect to ${url}`, { cause });
    this.name = 'ConnectionError';
    this.url = url;
  }
}

/**
 * An established connection dropped, or a reconnect attempt failed
 */
export class TransientDisconnectError extends StreamError {
  readonly attempt: number;

  constructor(message: string, attempt: number, cause?: unknown) {
    super(StreamErrorCode.TRANSIENT_DISCONNECT, message, { cause });
    this.name = 'TransientDisconnectError';
    this.attempt = attempt;
  }
}

export class DecodeError extends StreamError {
  /** Leading part of the offending frame */
  readonly frame: string;
  /** Top-level key whose payload failed validation, when the frame itself parsed */
  readonly key: string | undefined;

  constructor(message: string, frame: string, key?: string, cause?: unknown) {
    super(StreamErrorCode.DECODE_ERROR, message, { cause });
    this.name = 'DecodeError';
    this.frame = frame;
    this.key = key;
  }
}

export class HandlerError extends StreamError {
  readonly event: StreamEvent;

  constructor(event: StreamEvent, cause: unknown) {
    super(StreamErrorCode.HANDLER_ERROR, `Handler failed for ${event.channel.name} event "${event.key}"`, { cause });
    this.name = 'HandlerError';
    this.event = event;
  }
}

export class ProtocolRejectionError extends StreamError {
  readonly channelName: ChannelName | undefined;
  readonly reason: string;

  constructor(key: string, reason: string, channelName?: ChannelName) {
    super(StreamErrorCode.PROTOCOL_REJECTION, `Provider rejected "${key}": ${reason}`);
    this.name = 'ProtocolRejectionError';
    this.channelName = channelName;
    this.reason = reason;
  }
}

export class InvalidChannelError extends StreamError {
  readonly input: unknown;

  constructor(input: unknown, detail: string) {
    super(StreamErrorCode.INVALID_CHANNEL, `Invalid channel: ${detail}`);
    this.name = 'InvalidChannelError';
    this.input = input;
  }
}
