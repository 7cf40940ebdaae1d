// Input event types consumed by termscroll views
// Keeps event shapes separate from view instances

export type EventType = 'keypress' | 'click' | 'wheel';

export interface BaseEvent {
  type: EventType;
  target?: string; // View ID
  timestamp: number;
}

export interface KeyPressEvent extends BaseEvent {
  type: 'keypress';
  key: string;
  code: string;
  ctrlKey: boolean;
  altKey: boolean;
  shiftKey: boolean;
  metaKey: boolean;
}

export interface MouseEvent extends BaseEvent {
  type: 'click';
  x: number;
  y: number;
  button: number; // 0=left, 1=middle, 2=right
}

export interface WheelEvent extends BaseEvent {
  type: 'wheel';
  x: number;
  y: number;
  deltaY: number; // positive = scroll down, negative = scroll up
}

export type TermscrollEvent = KeyPressEvent | MouseEvent | WheelEvent;

export function createKeyPressEvent(
  key: string,
  modifiers: {
    code?: string;
    ctrlKey?: boolean;
    altKey?: boolean;
    shiftKey?: boolean;
    metaKey?: boolean;
    target?: string;
  } = {}
): KeyPressEvent {
  return {
    type: 'keypress',
    key,
    code: modifiers.code || key,
    ctrlKey: modifiers.ctrlKey || false,
    altKey: modifiers.altKey || false,
    shiftKey: modifiers.shiftKey || false,
    metaKey: modifiers.metaKey || false,
    target: modifiers.target,
    timestamp: Date.now(),
  };
}

export function createMouseEvent(x: number, y: number, button = 0, target?: string): MouseEvent {
  return { type: 'click', x, y, button, target, timestamp: Date.now() };
}

export function createWheelEvent(x: number, y: number, deltaY: number, target?: string): WheelEvent {
  return { type: 'wheel', x, y, deltaY, target, timestamp: Date.now() };
}
