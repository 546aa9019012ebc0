// ============================================
// Inbound Message Validation
// ============================================

import type { ClientMessage } from '@asteroid-tap/shared';

type Payload = Record<string, unknown>;

function isPayload(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Turn a socket event name and its raw payload into a ClientMessage.
 * Returns undefined for unknown events and malformed payloads.
 * Intent messages carry no fields, so their payload is not inspected.
 */
export function parseClientMessage(type: string, payload: unknown): ClientMessage | undefined {
  switch (type) {
    case 'startGame':
      return { type: 'startGame' };
    case 'togglePause':
      return { type: 'togglePause' };
    case 'quitGame':
      return { type: 'quitGame' };

    case 'pointerDown': {
      if (!isPayload(payload)) return undefined;
      const { x, y } = payload;
      if (!isFiniteNumber(x) || !isFiniteNumber(y)) return undefined;
      return { type: 'pointerDown', x, y };
    }

    case 'updateSettings': {
      if (!isPayload(payload)) return undefined;
      const { uiOpacity, speedLevel, difficultyProgression } = payload;
      if (!isFiniteNumber(uiOpacity) || !isFiniteNumber(speedLevel)) return undefined;
      if (typeof difficultyProgression !== 'boolean') return undefined;
      return { type: 'updateSettings', uiOpacity, speedLevel, difficultyProgression };
    }

    default:
      return undefined;
  }
}
