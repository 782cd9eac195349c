/**
 * Participant data types
 */

import type { CurrencyCode } from '../constants/currencies';

export type ParticipantKind = 'user' | 'guest';

/**
 * Reference to a participant as it appears on expenses, splits and edges
 */
export interface ParticipantRef {
  kind: ParticipantKind;
  id: string;
}

/**
 * String form of a ParticipantRef, used as the key of every engine map
 */
export type ParticipantKey = `${ParticipantKind}:${string}`;

export interface RegisteredUser {
  kind: 'user';
  id: string;
  name: string;
  defaultCurrency?: CurrencyCode; // Preferred currency for dashboard totals
}

export interface Guest {
  kind: 'guest';
  id: string;
  name: string;
  claimedBy?: string | null; // Registered user ID; set once, never cleared
  isUnknownPlaceholder?: boolean; // Holds item assignments nobody has claimed yet
}

export type Participant = RegisteredUser | Guest;
