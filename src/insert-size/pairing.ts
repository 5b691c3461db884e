/**
 * Single-Slot Mate Pairing
 *
 * Pairs mates in a name-sorted stream by remembering only the most recent
 * first-in-pair record. Correct when each template's mates sit next to each
 * other; on unsorted input it silently loses pairs and never errors.
 *
 * Transitions:
 * ```
 * any      --first-->                        holding(first)   (previous first discarded)
 * holding  --second, same name-->            holding          emits pair
 * holding  --second, other name-->           holding          ignored
 * empty    --second-->                       empty            ignored
 * any      --unpaired-->                     unchanged        ignored
 * ```
 *
 * @module insert-size/pairing
 */

import type { ReadPair } from '../alignment/types.js';
import type { MateView } from './filter.js';

// ============================================================================
// Types
// ============================================================================

export type PairingState =
  | { readonly kind: 'empty' }
  | { readonly kind: 'holding'; readonly first: MateView; readonly timesPaired: number };

export type PairingEvent =
  | { readonly kind: 'buffered'; readonly discarded?: MateView }
  | { readonly kind: 'paired'; readonly pair: ReadPair<MateView> }
  | { readonly kind: 'ignored'; readonly reason: 'no_buffered_first' | 'name_mismatch' | 'unpaired' };

// ============================================================================
// Mate Pairer
// ============================================================================

export class MatePairer {
  private current: PairingState = { kind: 'empty' };

  get state(): PairingState {
    return this.current;
  }

  /**
   * Feed the next record in stream order.
   *
   * `discarded` on a buffered event is the previously held first mate when
   * it never found its partner.
   */
  push(mate: MateView): PairingEvent {
    switch (mate.record.mateRole) {
      case 'first': {
        const previous = this.current;
        this.current = { kind: 'holding', first: mate, timesPaired: 0 };
        if (previous.kind === 'holding' && previous.timesPaired === 0) {
          return { kind: 'buffered', discarded: previous.first };
        }
        return { kind: 'buffered' };
      }

      case 'second': {
        const held = this.current;
        if (held.kind === 'empty') {
          return { kind: 'ignored', reason: 'no_buffered_first' };
        }
        if (held.first.record.queryName !== mate.record.queryName) {
          return { kind: 'ignored', reason: 'name_mismatch' };
        }
        this.current = { ...held, timesPaired: held.timesPaired + 1 };
        return { kind: 'paired', pair: { first: held.first, second: mate } };
      }

      case 'unpaired':
        return { kind: 'ignored', reason: 'unpaired' };
    }
  }

  reset(): void {
    this.current = { kind: 'empty' };
  }
}
