/**
 * Participant reference helpers
 */

import type { ParticipantKey, ParticipantRef } from '@splitledger/shared';

export function participantKey(ref: ParticipantRef): ParticipantKey {
  return `${ref.kind}:${ref.id}`;
}

export function parseParticipantKey(key: ParticipantKey): ParticipantRef {
  const separator = key.indexOf(':');
  const kind = key.slice(0, separator);
  const id = key.slice(separator + 1);
  return { kind: kind === 'guest' ? 'guest' : 'user', id };
}

export function sameParticipant(a: ParticipantRef, b: ParticipantRef): boolean {
  return a.kind === b.kind && a.id === b.id;
}

export function userRef(id: string): ParticipantRef {
  return { kind: 'user', id };
}

export function guestRef(id: string): ParticipantRef {
  return { kind: 'guest', id };
}

/**
 * Deterministic ordering of participant keys (plain code-unit comparison,
 * independent of locale)
 */
export function compareParticipantKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
