import type { Notification } from './types';

/** Comment frame; EventSource clients ignore it. */
export const HEARTBEAT_FRAME = ': heartbeat\n\n';

/** Encode a payload as a single `data:` event terminated by a blank line. */
export function dataFrame(n: Notification): string {
  return `data: ${JSON.stringify(n)}\n\n`;
}

export const CONNECTED_FRAME = dataFrame({ type: 'connected' });
