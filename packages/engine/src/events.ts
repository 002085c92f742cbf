import type { Address, AirdropRecord } from '@semdrop/core';

export type AirdropEvent =
  | { type: 'AirdropCreated'; airdropId: bigint; airdrop: AirdropRecord }
  | { type: 'AirdropClaimed'; airdropId: bigint; receiver: Address }
  | { type: 'AirdropUpdated'; airdropId: bigint; airdrop: AirdropRecord };

export type AirdropListener = (event: AirdropEvent) => void;

/**
 * Fan-out for airdrop notifications. Listeners observe; a throwing listener
 * is logged and skipped.
 */
export class EventBus {
  private listeners: Set<AirdropListener> = new Set();

  on(listener: AirdropListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(...events: AirdropEvent[]): void {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          console.error(`Listener for ${event.type} failed:`, err);
        }
      }
    }
  }
}
