// src/types/rotator-types.ts

import type { LogDirection, LogProtocol } from '../constants/constants.js';

// !=============================================================================
// ! Client commands (K4-format)
// !=============================================================================

export interface QueryCommand {
  kind: 'query';
}

export interface MoveToCommand {
  kind: 'moveTo';
  /** Digit run as parsed; no range is enforced here */
  azimuth: number;
}

export interface StopCommand {
  kind: 'stop';
}

export interface InvalidCommand {
  kind: 'invalid';
}

export type Command = QueryCommand | MoveToCommand | StopCommand | InvalidCommand;

/** Commands that are forwarded to the device as an RT21 wire string */
export type EncodableCommand = MoveToCommand | StopCommand;

// !=============================================================================
// ! Translation results
// !=============================================================================

export interface PositionResult {
  kind: 'position';
  azimuth: number;
}

export interface AcknowledgedResult {
  kind: 'acknowledged';
  /** Advisory device reply, if one arrived before the ack timeout */
  response?: string;
}

export interface FailedResult {
  kind: 'failed';
  reason: string;
}

export type TranslationResult = PositionResult | AcknowledgedResult | FailedResult;

/**
 * What the client sees for a move/stop whose device write failed.
 * 'acknowledge' keeps the historical OK reply, 'report' answers ERROR.
 */
export type MoveFailurePolicy = 'acknowledge' | 'report';

export interface ReplyFormatterOptions {
  moveFailurePolicy?: MoveFailurePolicy;
}

// !=============================================================================
// ! Transport
// !=============================================================================

export interface NodeTcpTransportOptions {
  connectTimeout?: number;
  maxBufferSize?: number;
  pollInterval?: number;
}

/** Byte stream over one socket */
export interface Transport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  write(data: Uint8Array): Promise<void>;
  /**
   * Resolves with all buffered bytes once any are available,
   * or an empty array once the peer has closed.
   */
  read(timeout?: number): Promise<Uint8Array>;
  disconnect(): Promise<void>;
  flush(): Promise<void>;
}

export interface Rt21ClientOptions {
  ackTimeout?: number;
  sessionId?: number;
}

// !=============================================================================
// ! Session / server
// !=============================================================================

export type SessionState = 'connecting' | 'active' | 'closing' | 'closed';

export type TransportFactory = () => Transport;

export interface SessionOptions extends ReplyFormatterOptions {
  id: number;
  peer: string;
  ackTimeout?: number;
  signal?: AbortSignal;
}

export interface TranslatorServerOptions extends ReplyFormatterOptions {
  deviceHost: string;
  devicePort: number;
  listenHost?: string;
  listenPort?: number;
  connectTimeout?: number;
  ackTimeout?: number;
  /** Overrides how each session dials the device */
  transportFactory?: TransportFactory;
}

export interface ListenAddress {
  host: string;
  port: number;
}

export interface TranslatorConfig {
  deviceHost: string;
  devicePort: number;
  listenHost: string;
  listenPort: number;
  connectTimeout: number;
  ackTimeout: number;
  moveFailurePolicy: MoveFailurePolicy;
  logLevel: LogLevel;
  probeOnStart: boolean;
}

// !=============================================================================
// ! Device emulator
// !=============================================================================

export interface Rt21EmulatorOptions {
  host?: string;
  port?: number;
  initialAzimuth?: number;
  /** Reply to moves and stops; RT21 units usually stay silent */
  acknowledgeMoves?: boolean;
  /** Delay in ms before a move or stop acknowledgment is sent */
  ackDelay?: number;
  /** Raw reply for position queries; overrides the formatted azimuth */
  queryResponse?: string | null;
  /** Leave queries unanswered */
  silent?: boolean;
  loggerEnabled?: boolean;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  logger?: string;
  session?: number;
  peer?: string;
  protocol?: LogProtocol;
  direction?: LogDirection;
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

export interface LoggerInstance {
  trace: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  setLevel: (level: LogLevel | 'none') => void;
  pause: () => void;
  resume: () => void;
}

// !=============================================================================
// ! Self-test
// !=============================================================================

export interface SelfTestCase {
  input: number | 'stop';
  expected: string;
}

export interface SelfTestCaseResult extends SelfTestCase {
  actual: string;
  passed: boolean;
}

export interface SelfTestReport {
  passed: boolean;
  results: SelfTestCaseResult[];
}
