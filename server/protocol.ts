import { isSpeedLevel, type SpeedLevel } from '../src/pacing.ts';
import type { EndReason, ObservationGrid, PlayerMode, Position } from '../src/types.ts';

export const PROTOCOL_VERSION = 1;
const MAX_NAME_LENGTH = 24;

/** Wire action: an action name, an action-space index, or nothing. */
export type WireAction = string | number | null;

export interface HelloMsg {
  type: 'hello';
  version: number;
  mode: PlayerMode;
  name?: string;
  speed?: SpeedLevel;
}

export interface ResetMsg {
  type: 'reset';
}

/** Agent sessions: advance one tick and reply with the observation. */
export interface StepMsg {
  type: 'step';
  action: WireAction;
}

/** Human sessions: key press applied on the next paced move. */
export interface InputMsg {
  type: 'input';
  action: WireAction;
}

export interface QuitMsg {
  type: 'quit';
}

export interface PingMsg {
  type: 'ping';
  t?: number;
}

export type ClientMessage = HelloMsg | ResetMsg | StepMsg | InputMsg | QuitMsg | PingMsg;

export interface WelcomeMsg {
  type: 'welcome';
  sessionId: number;
  protocolVersion: number;
  boardSize: number;
  actionSpace: number;
  relativeActions: boolean;
  localState: boolean;
  mode: PlayerMode;
  speed: SpeedLevel | null;
  cfgHash: string;
}

export interface ObservationMsg {
  type: 'observation';
  grid: ObservationGrid;
  reward: number;
  done: boolean;
  steps: number;
  length: number;
  score: number;
  food: Position;
}

export interface OverMsg {
  type: 'over';
  score: number;
  steps: number;
  reason: EndReason;
}

export interface ErrorMsg {
  type: 'error';
  message: string;
}

export type ServerMessage = WelcomeMsg | ObservationMsg | OverMsg | ErrorMsg;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isWireAction(value: unknown): value is WireAction {
  return value === null || typeof value === 'string' || isFiniteNumber(value);
}

export function isHello(msg: unknown): msg is HelloMsg {
  if (!isRecord(msg)) return false;
  if (msg['type'] !== 'hello') return false;
  if (msg['version'] !== PROTOCOL_VERSION) return false;
  if (msg['mode'] !== 'agent' && msg['mode'] !== 'human') return false;
  if ('name' in msg) {
    if (typeof msg['name'] !== 'string') return false;
    if (msg['name'].length > MAX_NAME_LENGTH) return false;
  }
  if ('speed' in msg && !isSpeedLevel(msg['speed'])) return false;
  return true;
}

export function isStep(msg: unknown): msg is StepMsg {
  if (!isRecord(msg)) return false;
  return msg['type'] === 'step' && 'action' in msg && isWireAction(msg['action']);
}

export function isInput(msg: unknown): msg is InputMsg {
  if (!isRecord(msg)) return false;
  return msg['type'] === 'input' && 'action' in msg && isWireAction(msg['action']);
}

export function isPing(msg: unknown): msg is PingMsg {
  if (!isRecord(msg)) return false;
  if (msg['type'] !== 'ping') return false;
  if ('t' in msg && !isFiniteNumber(msg['t'])) return false;
  return true;
}

export function parseClientMessage(raw: unknown): ClientMessage | null {
  if (!isRecord(raw)) return null;
  if (typeof raw['type'] !== 'string') return null;
  switch (raw['type']) {
    case 'hello':
      return isHello(raw) ? raw : null;
    case 'reset':
      return { type: 'reset' };
    case 'step':
      return isStep(raw) ? raw : null;
    case 'input':
      return isInput(raw) ? raw : null;
    case 'quit':
      return { type: 'quit' };
    case 'ping':
      return isPing(raw) ? raw : null;
    default:
      return null;
  }
}
