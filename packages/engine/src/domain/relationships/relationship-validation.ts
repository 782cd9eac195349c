/**
 * Relationship validation
 *
 * Write-time checks for the layer that creates management edges and claims.
 * The resolver re-checks integrity on every read; these functions let the
 * writer refuse a bad edge before it is stored.
 */

import type {
  GroupRelationships,
  Participant,
  ParticipantRef,
  RelationshipValidation,
} from '@splitledger/shared';
import { LEDGER_CONFIG } from '@splitledger/shared';
import { participantKey, sameParticipant } from '../../core/participants';
import { RelationshipResolver } from './relationship-resolver';

function findParticipant(
  relationships: GroupRelationships,
  ref: ParticipantRef
): Participant | undefined {
  return relationships.participants.find((p) => p.kind === ref.kind && p.id === ref.id);
}

/**
 * Check if `managed` may be linked to `manager`
 *
 * Valid only if:
 * - the managed entity exists and is not a claimed guest
 * - nobody manages themselves
 * - a guest manager exists and has not been claimed
 * - a user manager is a registered participant of the group
 * - the new edge does not close a management cycle
 */
export function canAssignManager(
  relationships: GroupRelationships,
  managed: ParticipantRef,
  manager: ParticipantRef
): RelationshipValidation {
  const managedParticipant = findParticipant(relationships, managed);
  if (!managedParticipant) {
    return { valid: false, reason: 'Participant does not exist' };
  }
  if (managedParticipant.kind === 'guest' && managedParticipant.claimedBy) {
    return { valid: false, reason: 'Cannot manage a claimed guest' };
  }
  if (sameParticipant(managed, manager)) {
    return { valid: false, reason: 'Participant cannot manage themselves' };
  }

  const managerParticipant = findParticipant(relationships, manager);
  if (manager.kind === 'guest') {
    if (!managerParticipant || (managerParticipant.kind === 'guest' && managerParticipant.claimedBy)) {
      return { valid: false, reason: 'Manager guest not found or already claimed' };
    }
  } else if (!managerParticipant) {
    return { valid: false, reason: 'Manager must be a group member' };
  }

  // Replace any existing edge of `managed`, then look for a cycle
  const candidate: GroupRelationships = {
    ...relationships,
    edges: [
      ...relationships.edges.filter((edge) => !sameParticipant(edge.managed, managed)),
      { managed, manager },
    ],
  };
  const resolver = RelationshipResolver.create(candidate);
  if (!resolver.ok) {
    return { valid: false, reason: resolver.error.message };
  }
  const resolved = resolver.value.resolve(managed);
  if (!resolved.ok) {
    return {
      valid: false,
      reason: `${participantKey(manager)} is already managed (directly or indirectly) by ${participantKey(managed)}`,
    };
  }
  return { valid: true };
}

/**
 * Check if a guest may be claimed by a registered user
 */
export function canClaimGuest(
  relationships: GroupRelationships,
  guestId: string,
  userId: string
): RelationshipValidation {
  const guest = relationships.participants.find((p) => p.kind === 'guest' && p.id === guestId);
  if (!guest || guest.kind !== 'guest') {
    return { valid: false, reason: 'Guest not found' };
  }
  if (guest.isUnknownPlaceholder) {
    return {
      valid: false,
      reason: `Cannot claim the ${LEDGER_CONFIG.UNKNOWN_GUEST_NAME} placeholder; claim its items individually instead`,
    };
  }
  if (guest.claimedBy) {
    return { valid: false, reason: 'Guest already claimed' };
  }
  if (!userId) {
    return { valid: false, reason: 'Claiming user is required' };
  }
  return { valid: true };
}

/**
 * Full integrity check of a relationship snapshot
 */
export function validateRelationships(relationships: GroupRelationships): RelationshipValidation {
  const resolver = RelationshipResolver.create(relationships);
  if (!resolver.ok) {
    return { valid: false, reason: resolver.error.message };
  }
  const all = resolver.value.resolveAll();
  if (!all.ok) {
    return { valid: false, reason: all.error.message };
  }
  return { valid: true };
}
