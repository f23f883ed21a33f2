import type { AlertResponse, ResponseKind } from '../core/types.js';

/** Storage / wire spelling of each known response. */
export const WIRE_RESPONSES = {
  moving_now: 'moving_now',
  five_minutes: '5_minutes',
  cant_move: 'cant_move',
  wrong_car: 'wrong_car'
} as const satisfies Record<ResponseKind, string>;

export type WireResponse = (typeof WIRE_RESPONSES)[ResponseKind];

const KIND_BY_WIRE = new Map<string, ResponseKind>([
  [WIRE_RESPONSES.moving_now, 'moving_now'],
  [WIRE_RESPONSES.five_minutes, 'five_minutes'],
  [WIRE_RESPONSES.cant_move, 'cant_move'],
  [WIRE_RESPONSES.wrong_car, 'wrong_car']
]);

const LABELS: Record<ResponseKind, string> = {
  moving_now: 'Moving now',
  five_minutes: 'Give me 5 minutes',
  cant_move: "Can't move right now",
  wrong_car: 'Wrong car'
};

export const isWireResponse = (value: unknown): value is WireResponse =>
  typeof value === 'string' && KIND_BY_WIRE.has(value);

/** Decode a stored/wire value. Unknown strings are kept as `unrecognized`. */
export const decodeResponse = (raw: string | null | undefined): AlertResponse | null => {
  if (raw === null || raw === undefined) return null;
  const kind = KIND_BY_WIRE.get(raw);
  return kind ? { kind } : { kind: 'unrecognized', raw };
};

export const encodeResponse = (response: AlertResponse): string =>
  response.kind === 'unrecognized' ? response.raw : WIRE_RESPONSES[response.kind];

export const describeResponse = (response: AlertResponse): string =>
  response.kind === 'unrecognized' ? 'Responded' : LABELS[response.kind];
