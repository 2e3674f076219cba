import type { Protocol } from 'devtools-protocol';
import type { ProtocolMapping } from 'devtools-protocol/types/protocol-mapping.js';

export type CDPCommandName = keyof ProtocolMapping.Commands;

export type CDPEventName = keyof ProtocolMapping.Events;

/**
 * Parameters of a command. Commands declared without parameters take `undefined`,
 * commands with an optional parameter object accept it or `undefined`.
 */
export type CDPCommandParams<T extends CDPCommandName> = ProtocolMapping.Commands[T]['paramsType'] extends []
  ? undefined
  : ProtocolMapping.Commands[T]['paramsType'] extends [(infer P)?]
    ? P
    : never;

export type CDPCommandResult<T extends CDPCommandName> = ProtocolMapping.Commands[T]['returnType'];

export type CDPEventParams<T extends CDPEventName> = ProtocolMapping.Events[T] extends [infer P] ? P : undefined;

export type CDPError = { code?: number; message: string; data?: string };

export type CDPEventListener<T extends CDPEventName> = (params: CDPEventParams<T>) => void;

/** Payload the injected binding shim serializes into `Runtime.bindingCalled`. */
export type BindingPayload = {
  name: string;
  seq: number;
  args: unknown[];
};

export type WindowState = Protocol.Browser.WindowState;

export type Bounds = Protocol.Browser.Bounds;

export type { Protocol, ProtocolMapping };
